// src/query/recordSet.ts
/**
 * Opens a cursor over one block of one table, fetching what the table
 * needs from the node first.
 */
import type { ColumnHandle } from '../column/types.js';
import type { ZoneRule } from '../column/scalar.js';
import { EthereumRecordCursor, type RecordCursor } from '../cursor/recordCursor.js';
import type { EthLog } from '../eth/types.js';
import type { RpcClient } from '../rpc/client.js';
import { resolveColumns, type EthereumTable } from '../schema/tables.js';
import { getLogger } from '../utils/logger.js';

const log = getLogger('query/recordSet');

export type RecordSetRequest = {
  table: EthereumTable;
  blockNumber: bigint | number;
  /** Column names in the order they will be read; all columns when omitted. */
  columns?: readonly string[];
  zone?: ZoneRule;
};

export type OpenedCursor = {
  cursor: RecordCursor;
  columns: ColumnHandle[];
};

export async function openRecordCursor(
  rpc: Pick<RpcClient, 'fetchBlock' | 'fetchLogs'>,
  req: RecordSetRequest,
): Promise<OpenedCursor> {
  const columns = resolveColumns(req.table, req.columns);
  const [block, logs] = await Promise.all([
    rpc.fetchBlock(req.blockNumber),
    req.table === 'erc20' ? rpc.fetchLogs(req.blockNumber) : Promise.resolve<EthLog[]>([]),
  ]);
  log.debug('opened cursor', {
    table: req.table,
    block: req.blockNumber.toString(),
    txs: block.transactions.length,
    logs: logs.length,
  });
  const cursor = new EthereumRecordCursor(columns, block, req.table, logs, { zone: req.zone });
  return { cursor, columns };
}
