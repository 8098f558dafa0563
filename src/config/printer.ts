// src/config/printer.ts
import { pruneUndefined } from '../utils/pruneUndefined.js';
import { getLogger } from '../utils/logger.js';
import type { Config } from '../types.js';

const log = getLogger('config');

/**
 * Loggable view of the configuration. The database password is never included.
 */
export function configView(cfg: Config): unknown {
  return pruneUndefined({
    rpcUrl: cfg.rpcUrl,
    query: {
      table: cfg.table,
      columns: cfg.columns ?? '(all)',
      from: cfg.from ?? '(to)',
      to: cfg.resolveLatestTo ? 'latest' : cfg.to,
      follow: cfg.follow,
      followIntervalMs: cfg.follow ? cfg.followIntervalMs : undefined,
      tzOffsetMinutes: cfg.tzOffsetMinutes ?? '(system)',
    },
    network: {
      concurrency: cfg.concurrency,
      timeoutMs: cfg.timeoutMs,
      rps: cfg.rps,
      retries: cfg.retries,
      backoffMs: cfg.backoffMs,
      backoffJitter: cfg.backoffJitter,
      blockRetries: cfg.blockRetries,
      blockTimeoutMs: cfg.blockTimeoutMs,
    },
    logging: {
      logLevel: cfg.logLevel,
      progressEveryBlocks: cfg.progressEveryBlocks,
      progressIntervalSec: cfg.progressIntervalSec,
    },
    sink: {
      kind: cfg.sinkKind,
      outPath: cfg.outPath ?? '-',
      flushEvery: cfg.flushEvery,
    },
    postgres: cfg.pg
      ? {
          connectionString: cfg.pg.connectionString ? '(set)' : undefined,
          host: cfg.pg.host,
          port: cfg.pg.port,
          user: cfg.pg.user,
          database: cfg.pg.database,
          ssl: cfg.pg.ssl,
          batchRows: cfg.pg.batchRows,
          poolSize: cfg.pg.poolSize,
        }
      : 'disabled',
  });
}

/**
 * Pretty-print selected configuration values via logger.
 */
export function printConfig(cfg: Config): void {
  log.info('[config]\n' + JSON.stringify(configView(cfg), null, 2));
}
