/**
 * Factory for the configured sink.
 */
import type { Sink, SinkConfig } from './types.js';
import { StdoutSink } from './stdout.js';
import { FileSink } from './file.js';
import { NullSink } from './null.js';
import { createPostgresSink } from './postgres.js';

export function createSink(cfg: SinkConfig): Sink {
  switch (cfg.kind) {
    case 'stdout':
      return new StdoutSink(cfg);
    case 'file':
      return new FileSink(cfg);
    case 'postgres':
      return createPostgresSink(cfg);
    case 'null':
      return new NullSink();
  }
}
