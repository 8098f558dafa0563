// src/column/types.ts
/**
 * Column type model.
 *
 * A column type is either a scalar kind or one of the structural kinds
 * (array, map, row) whose parameters are themselves column types. Types can be
 * written as signatures in the usual SQL form, e.g. `array(varchar(66))`,
 * `map(varchar, bigint)` or `row(hash varchar(66), nonce bigint)`.
 */
import { TypeSignatureError, UnsupportedTypeError } from '../errors.js';

export type IntegralKind = 'tinyint' | 'smallint' | 'integer' | 'bigint';

export type ScalarType =
  | { kind: 'boolean' }
  | { kind: IntegralKind }
  | { kind: 'real' }
  | { kind: 'double' }
  | { kind: 'date' }
  | { kind: 'timestamp' }
  /** Unbounded when `length` is omitted. */
  | { kind: 'varchar'; length?: number }
  | { kind: 'char'; length: number }
  | { kind: 'varbinary' };

export type ArrayType = { kind: 'array'; element: ColumnType };
export type MapType = { kind: 'map'; key: ColumnType; value: ColumnType };
export type RowField = { name?: string; type: ColumnType };
export type RowType = { kind: 'row'; fields: readonly RowField[] };

export type StructuralType = ArrayType | MapType | RowType;
export type ColumnType = ScalarType | StructuralType;

/**
 * A column of a table, with its position in the table's declared schema.
 */
export interface ColumnHandle {
  name: string;
  type: ColumnType;
  ordinalPosition: number;
}

export function isStructuralType(type: ColumnType): type is StructuralType {
  return type.kind === 'array' || type.kind === 'map' || type.kind === 'row';
}

export function isIntegralType(type: ColumnType): type is { kind: IntegralKind } {
  return type.kind === 'tinyint' || type.kind === 'smallint' || type.kind === 'integer' || type.kind === 'bigint';
}

/** True for the kinds whose column-native form is a byte sequence. */
export function isSliceType(type: ColumnType): type is Extract<ScalarType, { kind: 'varchar' | 'char' | 'varbinary' }> {
  return type.kind === 'varchar' || type.kind === 'char' || type.kind === 'varbinary';
}

/** True for the kinds whose column-native form is a 64-bit integer. */
export function isLongType(type: ColumnType): boolean {
  return isIntegralType(type) || type.kind === 'real' || type.kind === 'date' || type.kind === 'timestamp';
}

export const BOOLEAN: ScalarType = { kind: 'boolean' };
export const TINYINT: ScalarType = { kind: 'tinyint' };
export const SMALLINT: ScalarType = { kind: 'smallint' };
export const INTEGER: ScalarType = { kind: 'integer' };
export const BIGINT: ScalarType = { kind: 'bigint' };
export const REAL: ScalarType = { kind: 'real' };
export const DOUBLE: ScalarType = { kind: 'double' };
export const DATE: ScalarType = { kind: 'date' };
export const TIMESTAMP: ScalarType = { kind: 'timestamp' };
export const VARBINARY: ScalarType = { kind: 'varbinary' };

export function varchar(length?: number): ScalarType {
  return length === undefined ? { kind: 'varchar' } : { kind: 'varchar', length };
}

export function char(length: number): ScalarType {
  return { kind: 'char', length };
}

export function arrayOf(element: ColumnType): ArrayType {
  return { kind: 'array', element };
}

export function mapOf(key: ColumnType, value: ColumnType): MapType {
  return { kind: 'map', key, value };
}

export function rowOf(...fields: Array<ColumnType | RowField>): RowType {
  return { kind: 'row', fields: fields.map((f) => ('kind' in f ? { type: f } : f)) };
}

/**
 * Formats a column type as its signature text.
 */
export function formatColumnType(type: ColumnType): string {
  switch (type.kind) {
    case 'varchar':
      return type.length === undefined ? 'varchar' : `varchar(${type.length})`;
    case 'char':
      return `char(${type.length})`;
    case 'array':
      return `array(${formatColumnType(type.element)})`;
    case 'map':
      return `map(${formatColumnType(type.key)}, ${formatColumnType(type.value)})`;
    case 'row':
      return `row(${type.fields
        .map((f) => (f.name ? `${f.name} ${formatColumnType(f.type)}` : formatColumnType(f.type)))
        .join(', ')})`;
    default:
      return type.kind;
  }
}

const SIMPLE_SCALARS: Record<string, ScalarType> = {
  boolean: BOOLEAN,
  tinyint: TINYINT,
  smallint: SMALLINT,
  integer: INTEGER,
  int: INTEGER,
  bigint: BIGINT,
  real: REAL,
  double: DOUBLE,
  date: DATE,
  timestamp: TIMESTAMP,
  varbinary: VARBINARY,
};

type Token = { kind: 'ident'; text: string } | { kind: 'number'; value: number } | { kind: 'punct'; text: '(' | ')' | ',' };

function tokenize(signature: string): Token[] {
  const out: Token[] = [];
  const re = /\s*(?:([A-Za-z_][A-Za-z0-9_]*)|(\d+)|([(),]))/y;
  let pos = 0;
  while (pos < signature.length) {
    if (/^\s*$/.test(signature.slice(pos))) break;
    re.lastIndex = pos;
    const m = re.exec(signature);
    if (!m) throw new TypeSignatureError(signature, `unexpected character at offset ${pos}`);
    pos = re.lastIndex;
    if (m[1] !== undefined) out.push({ kind: 'ident', text: m[1] });
    else if (m[2] !== undefined) out.push({ kind: 'number', value: Number(m[2]) });
    else if (m[3] === '(' || m[3] === ')' || m[3] === ',') out.push({ kind: 'punct', text: m[3] });
  }
  return out;
}

/**
 * Parses a type signature such as `map(varchar, array(bigint))`.
 *
 * @throws {UnsupportedTypeError} for an unknown type name.
 * @throws {TypeSignatureError} for malformed text.
 */
export function parseColumnType(signature: string): ColumnType {
  const tokens = tokenize(signature);
  let i = 0;

  const peek = (): Token | undefined => tokens[i];
  const fail = (reason: string): never => {
    throw new TypeSignatureError(signature, reason);
  };
  const expectPunct = (text: '(' | ')' | ','): void => {
    const t = tokens[i++];
    if (!t || t.kind !== 'punct' || t.text !== text) fail(`expected "${text}"`);
  };
  const expectNumber = (): number => {
    const t = tokens[i++];
    if (!t || t.kind !== 'number') return fail('expected a length');
    return t.value;
  };
  const isPunct = (t: Token | undefined, text: '(' | ')' | ','): boolean => t?.kind === 'punct' && t.text === text;

  function parseType(): ColumnType {
    const t = tokens[i++];
    if (!t || t.kind !== 'ident') return fail('expected a type name');
    const name = t.text.toLowerCase();
    switch (name) {
      case 'varchar': {
        if (!isPunct(peek(), '(')) return varchar();
        expectPunct('(');
        const n = expectNumber();
        expectPunct(')');
        return varchar(n);
      }
      case 'char': {
        if (!isPunct(peek(), '(')) return char(1);
        expectPunct('(');
        const n = expectNumber();
        expectPunct(')');
        return char(n);
      }
      case 'array': {
        expectPunct('(');
        const element = parseType();
        expectPunct(')');
        return arrayOf(element);
      }
      case 'map': {
        expectPunct('(');
        const key = parseType();
        expectPunct(',');
        const value = parseType();
        expectPunct(')');
        return mapOf(key, value);
      }
      case 'row': {
        expectPunct('(');
        const fields: RowField[] = [];
        for (;;) {
          fields.push(parseField());
          if (isPunct(peek(), ',')) {
            i++;
            continue;
          }
          expectPunct(')');
          return { kind: 'row', fields };
        }
      }
      default: {
        const scalar = SIMPLE_SCALARS[name];
        if (!scalar) throw new UnsupportedTypeError(t.text);
        return scalar;
      }
    }
  }

  // A row field is either `type` or `name type`.
  function parseField(): RowField {
    const first = peek();
    const second = tokens[i + 1];
    if (first?.kind === 'ident' && second?.kind === 'ident') {
      i++;
      return { name: first.text, type: parseType() };
    }
    return { type: parseType() };
  }

  const type = parseType();
  if (i !== tokens.length) fail('trailing input');
  return type;
}
