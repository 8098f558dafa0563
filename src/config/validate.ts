// src/config/validate.ts
import type { ZodError } from 'zod';
import { ConfigSchema } from './schema.js';
import type { Config } from '../types.js';

/**
 * Format Zod validation errors into a compact, readable multi-line string.
 */
export function formatZodError(err: ZodError): string {
  return err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      const base = `${path}: ${issue.message}`;
      if (issue.code === 'invalid_enum_value' && issue.options.length) {
        return `${base} (allowed: ${issue.options.join(', ')})`;
      }
      return base;
    })
    .join('\n');
}

/**
 * Validate a raw config object against the schema and return the typed result.
 * Throws an Error with a pretty message on failure.
 */
export function validateConfig(raw: unknown): Config {
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid configuration\n${formatZodError(parsed.error)}`);
  }
  return parsed.data;
}
