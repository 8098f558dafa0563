// src/sink/pg/columns.ts
import type { ColumnHandle, ColumnType } from '../../column/types.js';
import { isStructuralType } from '../../column/types.js';
import type { NativeValue } from '../../column/reader.js';
import type { EthereumTable } from '../../schema/tables.js';
import { safeJsonStringify } from '../../utils/json.js';
import { quoteIdent } from './batch.js';

const DAY_MS = 86_400_000;

/** Natural key per table; rows repeating it are skipped on insert. */
const PRIMARY_KEYS: Partial<Record<EthereumTable, string>> = {
  block: 'block_number',
  transaction: 'tx_hash',
};

export function tableName(table: EthereumTable): string {
  return `eth_${table}`;
}

/**
 * PostgreSQL column type for a column kind. Nested values go to jsonb.
 */
export function sqlType(type: ColumnType): string {
  switch (type.kind) {
    case 'boolean':
      return 'boolean';
    case 'tinyint':
    case 'smallint':
      return 'smallint';
    case 'integer':
      return 'integer';
    case 'bigint':
      return 'bigint';
    case 'real':
      return 'real';
    case 'double':
      return 'double precision';
    case 'date':
      return 'date';
    case 'timestamp':
      return 'timestamp';
    case 'varchar':
      return type.length === undefined ? 'text' : `varchar(${type.length})`;
    case 'char':
      return `char(${type.length})`;
    case 'varbinary':
      return 'bytea';
    case 'array':
    case 'map':
    case 'row':
      return 'jsonb';
  }
}

/**
 * `CREATE TABLE IF NOT EXISTS` for the selected columns. The table's natural
 * key becomes the primary key when it is among them.
 */
export function createTableSql(table: EthereumTable, columns: readonly ColumnHandle[]): string {
  const defs = columns.map((c) => `${quoteIdent(c.name)} ${sqlType(c.type)}`);
  const key = PRIMARY_KEYS[table];
  if (key && columns.some((c) => c.name === key)) defs.push(`PRIMARY KEY (${quoteIdent(key)})`);
  return `CREATE TABLE IF NOT EXISTS ${quoteIdent(tableName(table))} (${defs.join(', ')})`;
}

/** Parameter casts for columns stored as jsonb. */
export function columnCasts(columns: readonly ColumnHandle[]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const c of columns) if (isStructuralType(c.type)) out[c.name] = 'jsonb';
  return out;
}

/**
 * Native row value → query parameter.
 */
export function toSqlValue(type: ColumnType, value: NativeValue): unknown {
  if (value === null) return null;
  if (isStructuralType(type)) return safeJsonStringify(value);
  if (typeof value === 'bigint') {
    // Dates are epoch days, timestamps local wall-clock millis.
    if (type.kind === 'date') return new Date(Number(value) * DAY_MS).toISOString().slice(0, 10);
    if (type.kind === 'timestamp') return new Date(Number(value)).toISOString().replace('T', ' ').replace('Z', '');
    return value.toString();
  }
  if (value instanceof Uint8Array) return Buffer.from(value);
  return value;
}
