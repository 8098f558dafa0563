/**
 * @module FileSink
 * Implements a sink that appends NDJSON rows into a file.
 */
// src/sink/file.ts
import fs from 'node:fs';
import path from 'node:path';
import type { Sink, SinkConfig } from './types.js';
import type { Row } from '../query/rowReader.js';
import { safeJsonStringify } from '../utils/json.js';
import { getLogger } from '../utils/logger.js';

const log = getLogger('sink/file');

/**
 * Buffers NDJSON lines in memory and appends them to the file every
 * `flushEvery` rows.
 */
export class FileSink implements Sink {
  private buf: string[] = [];
  private flushEvery: number;
  private outPath: string;
  private stream: fs.WriteStream | null = null;

  constructor(cfg: Pick<SinkConfig, 'outPath' | 'flushEvery'>) {
    if (!cfg.outPath) {
      throw new Error('FileSink requires outPath');
    }
    this.outPath = cfg.outPath;
    this.flushEvery = Math.max(1, cfg.flushEvery ?? 100);
  }

  /**
   * Creates parent directories as needed and opens the file for appending.
   */
  async init(): Promise<void> {
    await fs.promises.mkdir(path.dirname(this.outPath), { recursive: true });
    const stream = fs.createWriteStream(this.outPath, { flags: 'a' });
    await new Promise<void>((resolve, reject) => {
      stream.once('open', () => resolve());
      stream.once('error', reject);
    });
    this.stream = stream;
    log.info(`writing rows to ${this.outPath}`);
  }

  async write(row: Row): Promise<void> {
    this.buf.push(safeJsonStringify(row));
    if (this.buf.length >= this.flushEvery) await this.flush();
  }

  async flush(): Promise<void> {
    if (this.buf.length === 0) return;
    const stream = this.requireStream();
    log.debug(`flushing ${this.buf.length} row(s)`);
    const chunk = this.buf.join('\n') + '\n';
    this.buf.length = 0;
    if (!stream.write(chunk)) {
      await new Promise<void>((resolve, reject) => {
        stream.once('drain', () => resolve());
        stream.once('error', (e) => reject(e));
      });
    }
  }

  /**
   * Flushes remaining rows and closes the file stream.
   */
  async close(): Promise<void> {
    if (!this.stream) return;
    await this.flush();
    const stream = this.stream;
    this.stream = null;
    await new Promise<void>((resolve, reject) => {
      stream.once('error', (e) => reject(e));
      stream.end(() => resolve());
    });
  }

  private requireStream(): fs.WriteStream {
    if (!this.stream) throw new Error('FileSink is not initialized');
    return this.stream;
  }
}
