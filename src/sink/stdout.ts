// src/sink/stdout.ts
/**
 * Sink implementation that writes buffered NDJSON rows to standard output (stdout).
 */
import type { Sink, SinkConfig } from './types.js';
import type { Row } from '../query/rowReader.js';
import { safeJsonStringify } from '../utils/json.js';

/**
 * A sink that buffers rows and writes them to a stream in batches.
 */
export class StdoutSink implements Sink {
  private buf: string[] = [];
  private flushEvery: number;

  /**
   * @param out Destination stream; process.stdout by default.
   */
  constructor(
    cfg?: Pick<SinkConfig, 'flushEvery'>,
    private readonly out: NodeJS.WritableStream = process.stdout,
  ) {
    this.flushEvery = Math.max(1, cfg?.flushEvery ?? 1);
  }

  async init(): Promise<void> {}

  async write(row: Row): Promise<void> {
    this.buf.push(safeJsonStringify(row));
    if (this.buf.length >= this.flushEvery) await this.flush();
  }

  /**
   * Forces flushing the buffer.
   */
  async flush(): Promise<void> {
    if (this.buf.length === 0) return;
    const chunk = this.buf.join('\n') + '\n';
    this.buf.length = 0;
    await new Promise<void>((resolve, reject) => {
      this.out.write(chunk, (err) => (err ? reject(err) : resolve()));
    });
  }

  async close(): Promise<void> {
    await this.flush();
  }
}
