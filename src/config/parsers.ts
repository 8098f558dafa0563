// src/config/parsers.ts
import type { LogLevel, SinkKind } from '../types.js';
import { isEthereumTable, TABLES, type EthereumTable } from '../schema/tables.js';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'silent'];
const SINK_KINDS: readonly SinkKind[] = ['stdout', 'file', 'postgres', 'null'];

export function stripInlineComment(raw: string): string {
  let v = raw;
  const hashPos = v.indexOf('#');
  const semiPos = v.indexOf(';');
  let cutPos = -1;
  if (hashPos !== -1) cutPos = hashPos;
  if (semiPos !== -1 && (cutPos === -1 || semiPos < cutPos)) cutPos = semiPos;
  if (cutPos !== -1) v = v.slice(0, cutPos);
  return v.trim();
}

function isMissing(v: unknown): v is undefined | null | '' {
  return v === undefined || v === null || v === '' || (typeof v === 'string' && v.toLowerCase() === 'undefined');
}

export function asInt(name: string, v: unknown, def?: number): number {
  if (isMissing(v)) {
    if (def === undefined) throw new Error(`Missing required numeric option: ${name}`);
    return def;
  }
  const n = typeof v === 'number' ? v : Number(v);
  if (!Number.isFinite(n) || !Number.isInteger(n)) throw new Error(`Option ${name} must be an integer, got "${String(v)}"`);
  if (!Number.isSafeInteger(n)) throw new Error(`Option ${name} exceeds JS safe integer: ${n}`);
  return n;
}

export function asPositiveInt(name: string, v: unknown, def?: number): number {
  const n = asInt(name, v, def);
  if (n < 0) throw new Error(`Option ${name} must be >= 0, got ${n}`);
  return n;
}

export function asOptionalInt(name: string, v: unknown): number | undefined {
  return isMissing(v) || typeof v === 'boolean' ? undefined : asInt(name, v);
}

export function asNumberInRange(name: string, v: unknown, min: number, max: number, def: number): number {
  const n = isMissing(v) ? def : Number(v);
  if (!(n >= min && n <= max)) throw new Error(`Option ${name} must be in [${min}..${max}], got "${String(v)}"`);
  return n;
}

export function asString(name: string, v: unknown, def?: string): string {
  if (isMissing(v) || typeof v === 'boolean') {
    if (def === undefined) throw new Error(`Missing required option: ${name}`);
    return def;
  }
  return String(v);
}

export function asOptionalString(v: unknown): string | undefined {
  return isMissing(v) || typeof v === 'boolean' ? undefined : String(v);
}

export function asBool(name: string, v: unknown, def = false): boolean {
  if (isMissing(v)) return def;
  if (typeof v === 'boolean') return v;
  let s = String(v).trim();

  const isSingleQuoted = s.startsWith("'") && s.endsWith("'");
  const isDoubleQuoted = s.startsWith('"') && s.endsWith('"');
  if (isSingleQuoted || isDoubleQuoted) {
    s = s.slice(1, -1).trim();
  }

  s = stripInlineComment(s).toLowerCase();

  if (s === '1' || s === 'true' || s === 'yes' || s === 'y' || s === 'on') return true;
  if (s === '0' || s === 'false' || s === 'no' || s === 'n' || s === 'off') return false;

  throw new Error(`Option ${name} must be a boolean-like value, got "${String(v)}"`);
}

export function asLogLevel(v: unknown, def: LogLevel = 'info'): LogLevel {
  if (isMissing(v)) return def;
  const s = String(v).trim().toLowerCase();
  return LOG_LEVELS.find((l) => l === s) ?? def;
}

export function asSinkKind(v: unknown, def: SinkKind = 'stdout'): SinkKind {
  if (isMissing(v)) return def;
  const s = String(v).trim().toLowerCase();
  const kind = SINK_KINDS.find((k) => k === s);
  if (!kind) throw new Error(`sink must be one of ${SINK_KINDS.join(', ')}, got "${String(v)}"`);
  return kind;
}

export function asTable(v: unknown, def: EthereumTable = 'block'): EthereumTable {
  if (isMissing(v)) return def;
  const s = String(v).trim().toLowerCase();
  if (!isEthereumTable(s)) throw new Error(`table must be one of ${TABLES.join(', ')}, got "${String(v)}"`);
  return s;
}

/**
 * Comma-separated column names; `undefined` when empty.
 */
export function asColumnList(v: unknown): string[] | undefined {
  const s = asOptionalString(v);
  if (s === undefined) return undefined;
  const names = s
    .split(',')
    .map((x) => x.trim())
    .filter((x) => x.length > 0);
  return names.length ? names : undefined;
}
