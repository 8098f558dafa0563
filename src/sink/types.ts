/**
 * Type definitions for sinks: where rows read from a cursor end up.
 */
import type { ColumnHandle } from '../column/types.js';
import type { Row } from '../query/rowReader.js';
import type { EthereumTable } from '../schema/tables.js';
import type { PgSettings, SinkKind } from '../types.js';

export type { SinkKind };

/**
 * Configuration options for a sink that defines how and where the rows will be output.
 */
export interface SinkConfig {
  kind: SinkKind;
  /** Table the rows come from. */
  table: EthereumTable;
  /** Columns of every row, in output order. */
  columns: readonly ColumnHandle[];
  /** Number of rows to buffer before writing (stdout/file). */
  flushEvery?: number;
  /** Output file path (for kind="file"). */
  outPath?: string;
  /** PostgreSQL connection and batching options (for kind="postgres"). */
  pg?: PgSettings;
}

/**
 * Interface for sink implementations which defines lifecycle methods and writing behavior.
 */
export interface Sink {
  /** Initialize the sink before writing any data. */
  init(): Promise<void>;
  /** Write a single row. May buffer. */
  write(row: Row): Promise<void>;
  /** Flush any buffered rows. */
  flush?(): Promise<void>;
  /** Flush and release resources. */
  close(): Promise<void>;
}
