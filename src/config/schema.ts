// src/config/schema.ts
import { z } from 'zod';
import { TABLES } from '../schema/tables.js';

// Runtime validation schema (Zod)
const PgConfigSchema = z.object({
  connectionString: z.string().min(1).optional(),
  host: z.string().min(1).optional(),
  port: z.number().int().positive(),
  user: z.string().min(1).optional(),
  password: z.string().optional(),
  database: z.string().min(1).optional(),
  ssl: z.boolean(),
  batchRows: z.number().int().positive(),
  poolSize: z.number().int().positive(),
});

const LogLevelEnum = z.enum(['debug', 'info', 'warn', 'error', 'trace', 'silent']);
const SinkKindEnum = z.enum(['stdout', 'file', 'postgres', 'null']);

export const ConfigSchema = z
  .object({
    rpcUrl: z.string().url().or(z.string().startsWith('http://')).or(z.string().startsWith('https://')),
    table: z.enum(TABLES),
    columns: z.array(z.string().min(1)).min(1).optional(),
    from: z.number().int().min(0).optional(),
    to: z.number().int().min(0).optional(),
    resolveLatestTo: z.boolean(),
    follow: z.boolean(),
    followIntervalMs: z.number().int().min(100),
    concurrency: z.number().int().min(1),
    timeoutMs: z.number().int().min(1),
    rps: z.number().int().min(1),
    retries: z.number().int().min(0),
    backoffMs: z.number().int().min(0),
    backoffJitter: z.number().min(0).max(1),
    blockRetries: z.number().int().min(0),
    blockTimeoutMs: z.number().int().min(1),
    logLevel: LogLevelEnum,
    tzOffsetMinutes: z.number().int().min(-14 * 60).max(14 * 60).optional(),
    progressEveryBlocks: z.number().int().min(1),
    progressIntervalSec: z.number().int().min(1),
    sinkKind: SinkKindEnum,
    outPath: z.string().min(1).optional(),
    flushEvery: z.number().int().min(1),
    pg: PgConfigSchema.optional(),
  })
  .refine((c) => !(c.from !== undefined && c.to !== undefined && c.to < c.from), {
    message: 'to must be greater than or equal to from',
    path: ['to'],
  })
  .refine((c) => c.sinkKind !== 'file' || c.outPath !== undefined, {
    message: 'file sink requires an output path',
    path: ['outPath'],
  })
  .refine((c) => c.sinkKind !== 'postgres' || c.pg !== undefined, {
    message: 'postgres sink requires pg settings',
    path: ['pg'],
  });
