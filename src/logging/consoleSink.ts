/**
 * Console Sink
 *
 * Human-readable rendering for terminals:
 *
 *   2024-06-15 12:00:00 - INFO - api - [a1b2c3d4] request completed
 *
 * The level is colored when the stream is a TTY. Exception text follows on
 * the next lines.
 *
 * @module logging/consoleSink
 */

import type { LogSink } from './logger.js';
import type { LogLevel, LogRecord } from './record.js';

export interface ConsoleStream {
  write(chunk: string): unknown;
  isTTY?: boolean;
}

export interface ConsoleSinkOptions {
  /** Minimum level. Defaults to 'INFO'. */
  level?: LogLevel;
  /** Defaults to process.stdout. */
  stream?: ConsoleStream;
  /** Force colors on or off. Defaults to the stream's TTY state. */
  colors?: boolean;
}

const LEVEL_COLORS: Record<LogLevel, string> = {
  DEBUG: '\u001b[36m',
  INFO: '\u001b[32m',
  WARNING: '\u001b[33m',
  ERROR: '\u001b[31m',
  CRITICAL: '\u001b[35m',
};

const RESET = '\u001b[0m';

export function formatConsoleLine(record: LogRecord, colors: boolean): string {
  // "2024-06-15T12:00:00.123456Z" → "2024-06-15 12:00:00"
  const time = `${record.timestamp.slice(0, 10)} ${record.timestamp.slice(11, 19)}`;
  const level = colors ? `${LEVEL_COLORS[record.level]}${record.level}${RESET}` : record.level;
  const requestId = record.attributes['requestId'];
  const prefix = typeof requestId === 'string' && requestId.length > 0 ? `[${requestId}] ` : '';
  let line = `${time} - ${level} - ${record.logger} - ${prefix}${record.message}`;
  if (record.exception !== undefined) line += `\n${record.exception}`;
  return line;
}

export function createConsoleSink(options: ConsoleSinkOptions = {}): LogSink {
  const stream = options.stream ?? process.stdout;
  const colors = options.colors ?? stream.isTTY === true;
  return {
    level: options.level ?? 'INFO',
    write(record: LogRecord): void {
      stream.write(`${formatConsoleLine(record, colors)}\n`);
    },
  };
}
