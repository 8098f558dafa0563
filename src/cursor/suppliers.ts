// src/cursor/suppliers.ts
/**
 * Per-row field suppliers, one array per record kind, indexed by the declared
 * column ordinal of the matching table (see schema/tables.ts).
 */
import type { EthBlock, EthTransaction } from '../eth/types.js';
import { transactionHash } from '../eth/types.js';
import type { TransferLog } from '../erc20/transfer.js';
import { transferAmount, transferFrom, transferTo, transferToken } from '../erc20/transfer.js';

export type FieldSupplier = () => unknown;

export function blockSuppliers(block: EthBlock): readonly FieldSupplier[] {
  return [
    () => block.number,
    () => block.hash,
    () => block.parentHash,
    () => block.nonce,
    () => block.sha3Uncles,
    () => block.logsBloom,
    () => block.transactionsRoot,
    () => block.stateRoot,
    () => block.miner,
    () => block.difficulty,
    () => block.totalDifficulty,
    () => block.size,
    () => block.extraData,
    () => block.gasLimit,
    () => block.gasUsed,
    () => block.timestamp,
    () => block.transactions.map(transactionHash),
    () => block.uncles,
  ];
}

export function transactionSuppliers(tx: EthTransaction): readonly FieldSupplier[] {
  return [
    () => tx.hash,
    () => tx.nonce,
    () => tx.blockHash,
    () => tx.blockNumber,
    () => tx.transactionIndex,
    () => tx.from,
    () => tx.to,
    () => tx.value,
    () => tx.gas,
    () => tx.gasPrice,
    () => tx.input,
  ];
}

export function transferSuppliers(transfer: TransferLog): readonly FieldSupplier[] {
  return [
    () => transferToken(transfer),
    () => transferFrom(transfer),
    () => transferTo(transfer),
    () => transferAmount(transfer),
    () => transfer.log.transactionHash,
    () => transfer.log.blockNumber,
  ];
}
