// src/eth/types.ts
/**
 * Native EVM records as handed over by the node client: hex quantities are
 * already decoded to `bigint`, hashes and addresses stay `0x`-prefixed strings.
 */
import type { Address, Hash, Hex } from 'viem';

/**
 * A transaction of a block fetched with full transaction objects.
 */
export type EthTransaction = {
  hash: Hash;
  nonce: bigint;
  blockHash: Hash | null;
  blockNumber: bigint | null;
  transactionIndex: bigint | null;
  from: Address;
  to: Address | null;
  value: bigint;
  gas: bigint;
  gasPrice: bigint | null;
  input: Hex;
};

/**
 * A block's reference to one of its transactions: the full object, or just
 * the hash when the block was fetched without transaction bodies.
 */
export type TransactionRef = EthTransaction | Hash;

export type EthBlock = {
  number: bigint | null;
  hash: Hash | null;
  parentHash: Hash;
  nonce: Hex | null;
  sha3Uncles: Hash;
  logsBloom: Hex | null;
  transactionsRoot: Hash;
  stateRoot: Hash;
  miner: Address;
  difficulty: bigint;
  totalDifficulty: bigint | null;
  size: bigint;
  extraData: Hex;
  gasLimit: bigint;
  gasUsed: bigint;
  timestamp: bigint;
  transactions: TransactionRef[];
  uncles: Hash[];
};

/**
 * A raw event log. `topics` and `data` are kept exactly as on the wire.
 */
export type EthLog = {
  address: Address;
  topics: Hex[];
  data: Hex;
  blockNumber: bigint | null;
  transactionHash: Hash | null;
  logIndex: number | null;
};

export function isEthTransaction(value: unknown): value is EthTransaction {
  if (value === null || typeof value !== 'object') return false;
  return (
    'hash' in value &&
    typeof value.hash === 'string' &&
    'input' in value &&
    typeof value.input === 'string' &&
    'from' in value &&
    typeof value.from === 'string' &&
    'nonce' in value &&
    typeof value.nonce === 'bigint'
  );
}

/** Hash of a transaction reference, whatever form it takes. */
export function transactionHash(ref: TransactionRef): Hash {
  return typeof ref === 'string' ? ref : ref.hash;
}
