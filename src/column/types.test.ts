import { describe, it, expect } from 'vitest';
import {
  BIGINT,
  INTEGER,
  arrayOf,
  char,
  formatColumnType,
  mapOf,
  parseColumnType,
  rowOf,
  varchar,
} from './types.js';
import { TABLES, tableColumns } from '../schema/tables.js';
import { TypeSignatureError, UnsupportedTypeError } from '../errors.js';

describe('parseColumnType', () => {
  it('should parse nested structural signatures', () => {
    expect(parseColumnType('array(varchar(66))')).toEqual({ kind: 'array', element: { kind: 'varchar', length: 66 } });
    expect(parseColumnType('map(varchar, bigint)')).toEqual({
      kind: 'map',
      key: { kind: 'varchar' },
      value: { kind: 'bigint' },
    });
  });

  it('should keep row field names', () => {
    expect(parseColumnType('row(hash varchar(66), nonce bigint)')).toEqual({
      kind: 'row',
      fields: [
        { name: 'hash', type: { kind: 'varchar', length: 66 } },
        { name: 'nonce', type: { kind: 'bigint' } },
      ],
    });
  });

  it('should accept aliases and defaults', () => {
    expect(parseColumnType('INT')).toEqual(INTEGER);
    expect(parseColumnType('char')).toEqual(char(1));
    expect(parseColumnType('  Varchar ( 42 )  ')).toEqual(varchar(42));
  });

  it('should round-trip every declared table column', () => {
    for (const table of TABLES) {
      for (const c of tableColumns(table)) {
        expect(parseColumnType(formatColumnType(c.type))).toEqual(c.type);
      }
    }
  });

  it('should reject unknown type names', () => {
    expect(() => parseColumnType('uuid')).toThrow(UnsupportedTypeError);
    expect(() => parseColumnType('array(uuid)')).toThrow('Unsupported column type: uuid');
  });

  it('should reject malformed signatures', () => {
    expect(() => parseColumnType('array(bigint')).toThrow(TypeSignatureError);
    expect(() => parseColumnType('varchar(66) x')).toThrow(TypeSignatureError);
    expect(() => parseColumnType('varchar(-1)')).toThrow(TypeSignatureError);
    expect(() => parseColumnType('')).toThrow(TypeSignatureError);
  });
});

describe('formatColumnType', () => {
  it('should format anonymous and named row fields', () => {
    expect(formatColumnType(rowOf(BIGINT, { name: 'h', type: varchar(66) }))).toBe('row(bigint, h varchar(66))');
  });

  it('should format maps of arrays', () => {
    expect(formatColumnType(mapOf(varchar(), arrayOf(char(3))))).toBe('map(varchar, array(char(3)))');
  });
});
