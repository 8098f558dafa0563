import { describe, it, expect } from 'vitest';
import { safeJsonStringify } from './json.js';

describe('safeJsonStringify', () => {
  it('should write bigints as decimal strings and bytes as hex', () => {
    expect(safeJsonStringify({ a: 1n, b: new Uint8Array([1, 2]) })).toBe('{"a":"1","b":"0x0102"}');
  });

  it('should write dates as ISO strings', () => {
    expect(safeJsonStringify([new Date(0)])).toBe('["1970-01-01T00:00:00.000Z"]');
  });

  it('should write maps as objects', () => {
    const m = new Map<unknown, unknown>([
      ['k', 2n],
      [new Uint8Array([0xff]), true],
    ]);
    expect(safeJsonStringify(m)).toBe('{"k":"2","0xff":true}');
  });

  it('should indent when asked', () => {
    expect(safeJsonStringify({ a: 1 }, 2)).toBe('{\n  "a": 1\n}');
  });
});
