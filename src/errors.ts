// src/errors.ts
import type { ColumnType } from './column/types.js';
import { formatColumnType } from './column/types.js';

/**
 * Describes the runtime type of a value for error messages.
 */
export function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (value instanceof Uint8Array) return 'Uint8Array';
  if (value instanceof Map) return 'Map';
  if (value instanceof Date) return 'Date';
  if (typeof value === 'object') return value.constructor?.name ?? 'object';
  return typeof value;
}

/**
 * A value whose runtime shape disagrees with the declared column type.
 * Fatal for the field being resolved.
 */
export class ShapeMismatchError extends Error {
  constructor(
    public readonly type: ColumnType,
    public readonly value: unknown,
    detail?: string,
  ) {
    super(
      `unsupported ${describeValue(value)} value for column type ${formatColumnType(type)}` +
        (detail ? `: ${detail}` : ''),
    );
    this.name = 'ShapeMismatchError';
  }
}

/**
 * A column type with no encoding rule, or an unknown type name.
 */
export class UnsupportedTypeError extends Error {
  constructor(public readonly typeName: string) {
    super(`Unsupported column type: ${typeName}`);
    this.name = 'UnsupportedTypeError';
  }
}

/**
 * Malformed type signature text.
 */
export class TypeSignatureError extends Error {
  constructor(
    public readonly signature: string,
    reason: string,
  ) {
    super(`Invalid type signature "${signature}": ${reason}`);
    this.name = 'TypeSignatureError';
  }
}

/**
 * Error object returned by a JSON-RPC node.
 */
export class RpcError extends Error {
  constructor(
    public readonly method: string,
    public readonly code: number,
    message: string,
  ) {
    super(`${method} failed with code ${code}: ${message}`);
    this.name = 'RpcError';
  }
}
