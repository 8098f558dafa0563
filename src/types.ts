// src/types.ts
import type { EthereumTable } from './schema/tables.js';

export type ArgMap = Record<string, string | boolean>;

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent';

/** Where scanned rows go. */
export type SinkKind = 'stdout' | 'file' | 'postgres' | 'null';

export type PgSettings = {
  /** Full connection string; overrides the discrete fields. */
  connectionString?: string;
  host?: string;
  port: number;
  user?: string;
  password?: string;
  database?: string;
  ssl: boolean;
  /** Rows buffered before a batched INSERT. */
  batchRows: number;
  /** Maximum number of pooled connections. */
  poolSize: number;
};

/**
 * Runtime configuration resolved from CLI args, environment variables and defaults.
 */
export type Config = {
  /** Ethereum JSON-RPC endpoint (http/https). */
  rpcUrl: string;
  /** Table to scan. */
  table: EthereumTable;
  /** Columns to read, in output order; every column of the table when omitted. */
  columns?: string[];
  /** First block (inclusive). Defaults to `to`. */
  from?: number;
  /** Last block (inclusive). Resolved via eth_blockNumber when omitted or "latest". */
  to?: number;
  resolveLatestTo: boolean;
  /** Keep scanning new blocks after `to`. */
  follow: boolean;
  /** Poll interval while following. */
  followIntervalMs: number;
  /** Blocks processed concurrently. */
  concurrency: number;
  /** HTTP request timeout in milliseconds. */
  timeoutMs: number;
  /** Target requests-per-second throttle per process. */
  rps: number;
  /** Retry attempts for transient network failures. */
  retries: number;
  /** Initial backoff (ms) for retries. */
  backoffMs: number;
  /** Jitter factor [0..1] applied to backoff. */
  backoffJitter: number;
  /** Attempts per block before the scan fails. */
  blockRetries: number;
  /** Deadline for fetching and reading one block. */
  blockTimeoutMs: number;
  logLevel: LogLevel;
  /** Fixed UTC offset for date/timestamp columns; the host zone when omitted. */
  tzOffsetMinutes?: number;
  /** Emit progress log every N blocks. */
  progressEveryBlocks: number;
  /** Emit progress log at least every N seconds. */
  progressIntervalSec: number;
  sinkKind: SinkKind;
  /** Output path for the file sink. */
  outPath?: string;
  /** Rows buffered by stdout/file sinks before writing. */
  flushEvery: number;
  /** Present only for the postgres sink. */
  pg?: PgSettings;
};
