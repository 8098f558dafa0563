// src/config.ts
import type { ArgMap, Config } from './types.js';
import { loadDotEnvIfPresent } from './config/dotenv.js';
import { parseArgv } from './config/argv.js';
import {
  asBool,
  asColumnList,
  asLogLevel,
  asNumberInRange,
  asOptionalInt,
  asOptionalString,
  asPositiveInt,
  asSinkKind,
  asString,
  asTable,
} from './config/parsers.js';
import { validateConfig } from './config/validate.js';
export { printConfig } from './config/printer.js';

type Env = Record<string, string | undefined>;

/**
 * Build and return the runtime configuration. CLI args win over the
 * environment, which wins over defaults.
 */
export function getConfig(argv: string[] = process.argv.slice(2), env: Env = process.env): Config {
  if (env === process.env) loadDotEnvIfPresent();
  const args: ArgMap = parseArgv(argv);
  const pick = (arg: string, envKey: string): unknown => args[arg] ?? env[envKey];

  const rpcUrl = asString('RPC_URL', pick('rpc-url', 'RPC_URL') ?? args.rpcUrl, 'http://127.0.0.1:8545');

  const toRaw = pick('to', 'TO');
  const resolveLatestTo =
    typeof toRaw !== 'string' || toRaw.trim() === '' || toRaw.trim().toLowerCase() === 'latest';
  const to = resolveLatestTo ? undefined : asOptionalInt('to', toRaw);
  const from = asOptionalInt('from', pick('from', 'FROM'));

  const sinkKind = asSinkKind(pick('sink', 'SINK'));

  const raw = {
    rpcUrl,
    table: asTable(pick('table', 'TABLE')),
    columns: asColumnList(pick('columns', 'COLUMNS')),
    from,
    to,
    resolveLatestTo,
    follow: asBool('follow', pick('follow', 'FOLLOW'), false),
    followIntervalMs: asPositiveInt('follow-interval-ms', pick('follow-interval-ms', 'FOLLOW_INTERVAL_MS'), 5000),
    concurrency: asPositiveInt('concurrency', pick('concurrency', 'CONCURRENCY'), 8),
    timeoutMs: asPositiveInt('timeout-ms', pick('timeout-ms', 'TIMEOUT_MS'), 10_000),
    rps: asPositiveInt('rps', pick('rps', 'RPS'), 25),
    retries: asPositiveInt('retries', pick('retries', 'RETRIES'), 3),
    backoffMs: asPositiveInt('backoff-ms', pick('backoff-ms', 'BACKOFF_MS'), 250),
    backoffJitter: asNumberInRange('backoff-jitter', pick('backoff-jitter', 'BACKOFF_JITTER'), 0, 1, 0.3),
    blockRetries: asPositiveInt('block-retries', pick('block-retries', 'BLOCK_RETRIES'), 2),
    blockTimeoutMs: asPositiveInt('block-timeout-ms', pick('block-timeout-ms', 'BLOCK_TIMEOUT_MS'), 60_000),
    logLevel: asLogLevel(pick('log-level', 'LOG_LEVEL')),
    tzOffsetMinutes: asOptionalInt('tz-offset-minutes', pick('tz-offset-minutes', 'TZ_OFFSET_MINUTES')),
    progressEveryBlocks: asPositiveInt(
      'progress-every-blocks',
      pick('progress-every-blocks', 'PROGRESS_EVERY_BLOCKS'),
      1000,
    ),
    progressIntervalSec: asPositiveInt(
      'progress-interval-sec',
      pick('progress-interval-sec', 'PROGRESS_INTERVAL_SEC'),
      15,
    ),
    sinkKind,
    outPath: asOptionalString(pick('out', 'OUT')),
    flushEvery: asPositiveInt('flush-every', pick('flush-every', 'FLUSH_EVERY'), 1),
    pg:
      sinkKind === 'postgres'
        ? {
            connectionString: asOptionalString(pick('pg-url', 'DATABASE_URL')),
            host: asOptionalString(pick('pg-host', 'PG_HOST')),
            port: asPositiveInt('pg-port', pick('pg-port', 'PG_PORT'), 5432),
            user: asOptionalString(pick('pg-user', 'PG_USER') ?? env.PGUSER),
            password: asOptionalString(pick('pg-pass', 'PG_PASS') ?? env.PG_PASSWORD),
            database: asOptionalString(pick('pg-db', 'PG_DB') ?? env.PGDATABASE),
            ssl: asBool('pg-ssl', pick('pg-ssl', 'PG_SSL'), false),
            batchRows: asPositiveInt('pg-batch-rows', pick('pg-batch-rows', 'PG_BATCH_ROWS'), 1000),
            poolSize: asPositiveInt('pg-pool-size', pick('pg-pool-size', 'PG_POOL_SIZE'), 4),
          }
        : undefined,
  };

  return validateConfig(raw);
}
