// src/utils/logger.ts
import winston from 'winston';

const NPM_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;
type NpmLevel = (typeof NPM_LEVELS)[number];

function isNpmLevel(x: string): x is NpmLevel {
  return (NPM_LEVELS as readonly string[]).includes(x);
}

/**
 * Converts an arbitrary text value to a winston level.
 * Supports standard npm levels as well as aliases `trace` → `silly`, `log` → `info`.
 *
 * @param l String representation of the level (may be undefined).
 * @returns Normalized logging level for winston.
 */
function mapLevel(l?: string): NpmLevel {
  const x = (l || '').toLowerCase();
  if (isNpmLevel(x)) return x;
  if (x === 'trace') return 'silly';
  if (x === 'log') return 'info';
  return 'info';
}

type Env = 'development' | 'production' | 'test';

function resolveEnv(raw: string | undefined): Env {
  return raw === 'production' || raw === 'test' ? raw : 'development';
}

const env: Env = resolveEnv(process.env.NODE_ENV);

const splatFormat = winston.format.splat();
const metadataFormat = winston.format.metadata({
  fillExcept: ['timestamp', 'level', 'message', 'label', 'stack'],
});

const baseFormat = winston.format.combine(
  winston.format.timestamp({ format: () => new Date().toISOString() }),
  winston.format.errors({ stack: true }),
);

const devFormat = winston.format.combine(
  baseFormat,
  splatFormat,
  metadataFormat,
  winston.format.colorize({ all: true }),
  winston.format.printf((info) => {
    const { timestamp, level, message, stack, label, metadata } = info;
    const metaObj = metadata && typeof metadata === 'object' ? metadata : {};
    const metaStr = Object.keys(metaObj).length ? ` ${JSON.stringify(metaObj)}` : '';
    const where = label ? `[${String(label)}]` : '';
    const line = stack ? `${String(message)}\n${String(stack)}` : String(message);
    return `${String(timestamp)} ${where} ${level}: ${line}${metaStr}`;
  }),
);

const prodFormat = winston.format.combine(baseFormat, splatFormat, metadataFormat, winston.format.json());

let root: winston.Logger | null = null;

/**
 * Creates the root logger with a console transport.
 * The default format depends on NODE_ENV: JSON in production, otherwise colored human-readable.
 *
 * @param options.level Logging level (error|warn|info|http|verbose|debug|silly|trace|log).
 * @param options.json Force JSON format.
 */
function buildRoot(options?: { level?: string; json?: boolean }): winston.Logger {
  const level = mapLevel(options?.level ?? process.env.LOG_LEVEL);
  const useJson = options?.json ?? env === 'production';

  const transports: winston.transport[] = [new winston.transports.Console({ handleExceptions: true })];

  return winston.createLogger({
    level,
    levels: winston.config.npm.levels,
    format: useJson ? prodFormat : devFormat,
    defaultMeta: { app: 'evm-record-cursor', env },
    transports,
    silent: env === 'test' || options?.level === 'silent',
  });
}

function ensureRoot(): winston.Logger {
  if (!root) root = buildRoot();
  return root;
}

/**
 * Initializes (or reinitializes) the root logger.
 * Call once at application start if you need to set level/format.
 */
export function initLogger(options?: { level?: string; json?: boolean }): winston.Logger {
  root = buildRoot(options);
  return root;
}

/**
 * Returns a child logger with the specified module label.
 *
 * @param label Label (usually a file path or module name).
 */
export function getLogger(label: string): winston.Logger {
  return ensureRoot().child({ label });
}

/**
 * Closes transports and waits for the buffer to flush.
 * Useful to call before clean process exit.
 */
export async function flushLogger(): Promise<void> {
  const logger = ensureRoot();
  await new Promise<void>((resolve) => {
    logger.on('finish', () => resolve());
    logger.end();
  });
}
