// Shared test data: native records and their JSON-RPC wire forms.
import type { Address, Hash, Hex } from 'viem';
import type { EthBlock, EthLog, EthTransaction } from '../eth/types.js';
import { TRANSFER_EVENT_TOPIC } from '../erc20/transfer.js';

export const BLOCK_HASH: Hash = `0x${'11'.repeat(32)}`;
export const TX_HASH: Hash = `0x${'aa'.repeat(32)}`;
export const FROM: Address = `0x${'ab'.repeat(20)}`;
export const TO: Address = `0x${'cd'.repeat(20)}`;
export const DAI: Address = '0x6b175474e89094c44da98b954eedeac495271d0f';

export function hashOf(byte: string): Hash {
  return `0x${byte.repeat(32)}`;
}

/** Address left-padded to a 32-byte topic word. */
export function addressTopic(address: Address): Hex {
  return `0x${'0'.repeat(24)}${address.slice(2)}`;
}

/** 64-hex-digit word without the 0x prefix. */
export function word(value: bigint | Address): string {
  return typeof value === 'bigint' ? value.toString(16).padStart(64, '0') : '0'.repeat(24) + value.slice(2);
}

export function makeTx(overrides: Partial<EthTransaction> = {}): EthTransaction {
  return {
    hash: TX_HASH,
    nonce: 7n,
    blockHash: BLOCK_HASH,
    blockNumber: 100n,
    transactionIndex: 0n,
    from: FROM,
    to: TO,
    value: 1_000_000_000_000_000_000n,
    gas: 21_000n,
    gasPrice: 20_000_000_000n,
    input: '0x',
    ...overrides,
  };
}

export function makeBlock(overrides: Partial<EthBlock> = {}): EthBlock {
  return {
    number: 100n,
    hash: BLOCK_HASH,
    parentHash: hashOf('22'),
    nonce: '0x0000000000000042',
    sha3Uncles: hashOf('33'),
    logsBloom: `0x${'00'.repeat(256)}`,
    transactionsRoot: hashOf('44'),
    stateRoot: hashOf('55'),
    miner: `0x${'66'.repeat(20)}`,
    difficulty: 2n,
    totalDifficulty: 200n,
    size: 1234n,
    extraData: '0x',
    gasLimit: 30_000_000n,
    gasUsed: 21_000n,
    timestamp: 1_700_000_000n,
    transactions: [],
    uncles: [],
    ...overrides,
  };
}

export function makeLog(overrides: Partial<EthLog> = {}): EthLog {
  return {
    address: DAI,
    topics: [TRANSFER_EVENT_TOPIC, addressTopic(FROM), addressTopic(TO)],
    data: `0x${word(1000n)}`,
    blockNumber: 100n,
    transactionHash: TX_HASH,
    logIndex: 0,
    ...overrides,
  };
}

export function rpcTxJson(): Record<string, unknown> {
  return {
    hash: TX_HASH,
    nonce: '0x7',
    blockHash: BLOCK_HASH,
    blockNumber: '0x64',
    transactionIndex: '0x0',
    from: FROM,
    to: null,
    value: '0xde0b6b3a7640000',
    gas: '0x5208',
    gasPrice: '0x4a817c800',
    input: '0x60806040',
    v: '0x1b',
  };
}

export function rpcBlockJson(): Record<string, unknown> {
  return {
    number: '0x64',
    hash: BLOCK_HASH,
    parentHash: hashOf('22'),
    nonce: '0x0000000000000042',
    sha3Uncles: hashOf('33'),
    logsBloom: `0x${'00'.repeat(256)}`,
    transactionsRoot: hashOf('44'),
    stateRoot: hashOf('55'),
    miner: `0x${'66'.repeat(20)}`,
    difficulty: '0x2',
    totalDifficulty: '0xc8',
    size: '0x4d2',
    extraData: '0x',
    gasLimit: '0x1c9c380',
    gasUsed: '0x5208',
    timestamp: '0x6553f100',
    transactions: [rpcTxJson()],
    uncles: [],
  };
}

export function rpcLogJson(): Record<string, unknown> {
  return {
    address: DAI,
    topics: [TRANSFER_EVENT_TOPIC, addressTopic(FROM), addressTopic(TO)],
    data: `0x${word(1000n)}`,
    blockNumber: '0x64',
    transactionHash: TX_HASH,
    logIndex: '0x3',
    removed: false,
  };
}
