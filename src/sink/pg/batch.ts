// src/sink/pg/batch.ts
import type { PgQueryable } from '../../db/pg.js';
import { getLogger } from '../../utils/logger.js';

const log = getLogger('sink/pg/batch');

export type SqlRow = Record<string, unknown>;

/**
 * Double-quotes an identifier, so mixed-case column names survive.
 */
export function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/**
 * Builds a multi-row INSERT statement with positional parameters.
 *
 * @param types - Optional casts per column, e.g. `{ block_transactions: 'jsonb' }`.
 */
export function makeMultiInsert(
  table: string,
  columns: readonly string[],
  rows: readonly SqlRow[],
  conflictClause: string,
  types?: Record<string, string>,
): { text: string; values: unknown[] } {
  const values: unknown[] = [];
  const chunks: string[] = [];
  let p = 1;

  for (const r of rows) {
    const tuple: string[] = [];
    for (const c of columns) {
      values.push(r[c] ?? null);
      const cast = types?.[c] ? `::${types[c]}` : '';
      tuple.push(`$${p++}${cast}`);
    }
    chunks.push(`(${tuple.join(',')})`);
  }

  const cols = columns.map(quoteIdent).join(',');
  const text = `INSERT INTO ${quoteIdent(table)} (${cols}) VALUES ${chunks.join(',')} ${conflictClause}`.trimEnd();
  return { text, values };
}

/**
 * Executes a multi-row INSERT in slices that stay under the row and
 * parameter limits.
 */
export async function execBatchedInsert(
  client: PgQueryable,
  table: string,
  columns: readonly string[],
  rows: readonly SqlRow[],
  conflictClause: string,
  types?: Record<string, string>,
  opts?: { maxRows?: number; maxParams?: number },
): Promise<void> {
  const maxRows = opts?.maxRows ?? 5_000;
  const maxParams = opts?.maxParams ?? 30_000;

  if (!rows.length || !columns.length) return;

  const perSlice = Math.max(1, Math.min(maxRows, Math.floor(maxParams / columns.length)));
  for (let i = 0; i < rows.length; i += perSlice) {
    const slice = rows.slice(i, i + perSlice);
    const { text, values } = makeMultiInsert(table, columns, slice, conflictClause, types);
    log.debug('exec batch', { table, rows: slice.length, params: values.length });
    await client.query(text, values);
  }
}
