import { toHex } from '@cosmjs/encoding';

/**
 * JSON replacer for row values:
 * - bigint -> decimal string
 * - Uint8Array -> 0x-prefixed hex
 * - Date -> ISO string
 * - Map -> plain object keyed by the string form of each key
 */
export function safeJsonReplacer(_key: string, value: unknown): unknown {
  if (typeof value === 'bigint') return value.toString();
  if (value instanceof Uint8Array) return `0x${toHex(value)}`;
  if (value instanceof Date) return value.toISOString();
  if (value instanceof Map) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of value) out[mapKey(k)] = v;
    return out;
  }
  return value;
}

function mapKey(k: unknown): string {
  if (k instanceof Uint8Array) return `0x${toHex(k)}`;
  return String(k);
}

/**
 * `JSON.stringify` with {@link safeJsonReplacer}. One line by default, for NDJSON.
 */
export function safeJsonStringify(obj: unknown, space?: number): string {
  return JSON.stringify(obj, safeJsonReplacer, space);
}
