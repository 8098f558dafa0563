/**
 * Drops all rows; useful for measuring scan throughput without output cost.
 */
import type { Sink } from './types.js';
import type { Row } from '../query/rowReader.js';

export class NullSink implements Sink {
  private count = 0;

  async init(): Promise<void> {}

  async write(_row: Row): Promise<void> {
    this.count++;
  }

  async close(): Promise<void> {}

  /** Rows received so far. */
  get written(): number {
    return this.count;
  }
}
