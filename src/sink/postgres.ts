// src/sink/postgres.ts
/**
 * PostgreSQL sink.
 *
 * Creates `eth_<table>` from the selected columns on init, buffers rows and
 * inserts them in batched multi-row statements inside one transaction per
 * flush. Rows whose natural key already exists are skipped
 * (`ON CONFLICT DO NOTHING`), so re-scanning a range is harmless.
 */
import type { Sink, SinkConfig } from './types.js';
import type { Row } from '../query/rowReader.js';
import type { ColumnHandle } from '../column/types.js';
import type { EthereumTable } from '../schema/tables.js';
import type { PgSettings } from '../types.js';
import { closePgPool, createPgPool, type PgPoolLike } from '../db/pg.js';
import { execBatchedInsert, type SqlRow } from './pg/batch.js';
import { columnCasts, createTableSql, tableName, toSqlValue } from './pg/columns.js';
import { getLogger } from '../utils/logger.js';

const log = getLogger('sink/postgres');

export type PostgresSinkConfig = {
  table: EthereumTable;
  columns: readonly ColumnHandle[];
  pg: PgSettings;
  /** Pool to use instead of the shared one; not closed by the sink. */
  pool?: PgPoolLike;
};

export class PostgresSink implements Sink {
  private buf: SqlRow[] = [];
  private pool: PgPoolLike | null = null;
  private readonly ownsPool: boolean;
  private readonly casts: Record<string, string>;
  private readonly names: string[];

  constructor(private readonly cfg: PostgresSinkConfig) {
    this.ownsPool = cfg.pool === undefined;
    this.casts = columnCasts(cfg.columns);
    this.names = cfg.columns.map((c) => c.name);
  }

  /**
   * Connects and creates the target table if missing.
   */
  async init(): Promise<void> {
    this.pool = this.cfg.pool ?? createPgPool({ ...this.cfg.pg, applicationName: 'evm-record-cursor' });
    const client = await this.pool.connect();
    try {
      await client.query(createTableSql(this.cfg.table, this.cfg.columns));
    } finally {
      client.release();
    }
    log.info(`writing rows to ${tableName(this.cfg.table)}`);
  }

  async write(row: Row): Promise<void> {
    const out: SqlRow = {};
    for (const c of this.cfg.columns) out[c.name] = toSqlValue(c.type, row[c.name] ?? null);
    this.buf.push(out);
    if (this.buf.length >= this.cfg.pg.batchRows) await this.flush();
  }

  /**
   * Inserts buffered rows in one transaction. On failure the buffer is kept
   * and the error propagates.
   */
  async flush(): Promise<void> {
    if (this.buf.length === 0) return;
    if (!this.pool) throw new Error('PostgresSink is not initialized');

    const rows = this.buf;
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      await execBatchedInsert(client, tableName(this.cfg.table), this.names, rows, 'ON CONFLICT DO NOTHING', this.casts);
      await client.query('COMMIT');
      this.buf = [];
      log.debug(`flushed ${rows.length} row(s)`);
    } catch (e) {
      await client.query('ROLLBACK');
      throw e;
    } finally {
      client.release();
    }
  }

  /**
   * Flushes remaining rows and closes the pool the sink created.
   */
  async close(): Promise<void> {
    try {
      await this.flush();
    } finally {
      if (this.ownsPool && this.pool) await closePgPool();
      this.pool = null;
    }
  }
}

export function createPostgresSink(cfg: SinkConfig): PostgresSink {
  if (!cfg.pg) throw new Error('postgres sink requires pg settings');
  return new PostgresSink({ table: cfg.table, columns: cfg.columns, pg: cfg.pg });
}
