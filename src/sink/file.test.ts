import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { FileSink } from './file.js';

describe('FileSink', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'file-sink-'));
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  it('should create parent directories and append NDJSON', async () => {
    const outPath = path.join(dir, 'nested', 'rows.ndjson');
    const sink = new FileSink({ outPath, flushEvery: 2 });
    await sink.init();
    await sink.write({ block_number: 1n });
    await sink.write({ block_number: 2n });
    await sink.write({ block_number: 3n });
    await sink.close();
    expect(await fs.promises.readFile(outPath, 'utf8')).toBe(
      '{"block_number":"1"}\n{"block_number":"2"}\n{"block_number":"3"}\n',
    );
  });

  it('should append to an existing file', async () => {
    const outPath = path.join(dir, 'rows.ndjson');
    await fs.promises.writeFile(outPath, '{"x":0}\n');
    const sink = new FileSink({ outPath });
    await sink.init();
    await sink.write({ x: 1 });
    await sink.close();
    expect(await fs.promises.readFile(outPath, 'utf8')).toBe('{"x":0}\n{"x":1}\n');
  });

  it('should require an output path', () => {
    expect(() => new FileSink({})).toThrow('FileSink requires outPath');
  });

  it('should refuse to flush before init', async () => {
    const sink = new FileSink({ outPath: path.join(dir, 'rows.ndjson'), flushEvery: 1 });
    await expect(sink.write({ x: 1 })).rejects.toThrow('FileSink is not initialized');
  });
});
