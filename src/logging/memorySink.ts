import type { LogSink } from './logger.js';
import type { LogLevel, LogRecord } from './record.js';

export interface MemorySink extends LogSink {
  records: LogRecord[];
  clear(): void;
}

/**
 * Keeps records in an array. Used by tests and by callers that want to
 * inspect what a component logged.
 */
export function createMemorySink(level: LogLevel = 'DEBUG'): MemorySink {
  const sink: MemorySink = {
    level,
    records: [],
    write(record: LogRecord): void {
      sink.records.push(record);
    },
    clear(): void {
      sink.records.length = 0;
    },
  };
  return sink;
}
