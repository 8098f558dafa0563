// src/schema/tables.ts
/**
 * Column schemas of the three tables a cursor can traverse.
 * Column order is part of the external contract: reordering requires a
 * SCHEMA_VERSION bump.
 */
import type { ColumnHandle, ColumnType } from '../column/types.js';
import { parseColumnType } from '../column/types.js';

export const SCHEMA_VERSION = 1;

export const TABLES = ['block', 'transaction', 'erc20'] as const;
export type EthereumTable = (typeof TABLES)[number];

export function isEthereumTable(x: string): x is EthereumTable {
  return TABLES.some((t) => t === x);
}

// [name, type signature] in declared order
const DECLARATIONS: Record<EthereumTable, ReadonlyArray<readonly [string, string]>> = {
  block: [
    ['block_number', 'bigint'],
    ['block_hash', 'varchar(66)'],
    ['block_parentHash', 'varchar(66)'],
    ['block_nonce', 'varchar(18)'],
    ['block_sha3Uncles', 'varchar(66)'],
    ['block_logsBloom', 'varchar(514)'],
    ['block_transactionsRoot', 'varchar(66)'],
    ['block_stateRoot', 'varchar(66)'],
    ['block_miner', 'varchar(42)'],
    ['block_difficulty', 'bigint'],
    ['block_totalDifficulty', 'bigint'],
    ['block_size', 'integer'],
    ['block_extraData', 'varchar'],
    ['block_gasLimit', 'double'],
    ['block_gasUsed', 'double'],
    ['block_timestamp', 'bigint'],
    ['block_transactions', 'array(varchar(66))'],
    ['block_uncles', 'array(varchar(66))'],
  ],
  transaction: [
    ['tx_hash', 'varchar(66)'],
    ['tx_nonce', 'bigint'],
    ['tx_blockHash', 'varchar(66)'],
    ['tx_blockNumber', 'bigint'],
    ['tx_transactionIndex', 'integer'],
    ['tx_from', 'varchar(42)'],
    ['tx_to', 'varchar(42)'],
    ['tx_value', 'double'],
    ['tx_gas', 'double'],
    ['tx_gasPrice', 'double'],
    ['tx_input', 'varchar'],
  ],
  erc20: [
    ['erc20_token', 'varchar'],
    ['erc20_from', 'varchar(42)'],
    ['erc20_to', 'varchar(42)'],
    ['erc20_value', 'double'],
    ['erc20_txHash', 'varchar(66)'],
    ['erc20_blockNumber', 'bigint'],
  ],
};

function buildSchema(table: EthereumTable): readonly ColumnHandle[] {
  return Object.freeze(
    DECLARATIONS[table].map(([name, signature], ordinalPosition) => ({
      name,
      type: parseColumnType(signature),
      ordinalPosition,
    })),
  );
}

const SCHEMAS: Record<EthereumTable, readonly ColumnHandle[]> = {
  block: buildSchema('block'),
  transaction: buildSchema('transaction'),
  erc20: buildSchema('erc20'),
};

/**
 * All columns of `table`, in declared order.
 */
export function tableColumns(table: EthereumTable): readonly ColumnHandle[] {
  return SCHEMAS[table];
}

/**
 * Row type matching the transaction table, for row-typed columns built from
 * transaction records.
 */
export function transactionRowType(): ColumnType {
  return {
    kind: 'row',
    fields: SCHEMAS.transaction.map((c) => ({ name: c.name, type: c.type })),
  };
}

/**
 * Picks the requested columns of `table` in the requested order.
 * With no names, every column in declared order.
 *
 * @throws {Error} for a name that is not a column of the table.
 */
export function resolveColumns(table: EthereumTable, names?: readonly string[]): ColumnHandle[] {
  const all = SCHEMAS[table];
  if (!names || names.length === 0) return [...all];
  const byName = new Map(all.map((c) => [c.name.toLowerCase(), c]));
  return names.map((n) => {
    const c = byName.get(n.trim().toLowerCase());
    if (!c) throw new Error(`Unknown column "${n}" for table ${table}; expected one of ${all.map((x) => x.name).join(', ')}`);
    return c;
  });
}
