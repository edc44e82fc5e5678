/**
 * Structured Logger
 *
 * Builds {@link LogRecord}s with level filtering, bound attributes and
 * optional call-site capture, and fans each record out to a set of sinks.
 * Each sink has its own minimum level, so one logger can feed a full JSON
 * file, an error-only file and the console at the same time.
 *
 * @module logging/logger
 */

import { systemClock, type Clock } from './clock.js';
import {
  captureCallSite,
  createTimestampSource,
  isLevelEnabled,
  UNKNOWN_SOURCE,
  type LogAttributes,
  type LogLevel,
  type LogRecord,
  type TimestampSource,
} from './record.js';

// ─── Types ───────────────────────────────────────────────────────────────────

/** Destination for records at or above `level`. */
export interface LogSink {
  readonly level: LogLevel;
  write(record: LogRecord): void;
}

export interface Logger {
  readonly name: string;
  debug(message: string, attributes?: LogAttributes): void;
  info(message: string, attributes?: LogAttributes): void;
  warning(message: string, attributes?: LogAttributes): void;
  error(message: string, error?: unknown, attributes?: LogAttributes): void;
  critical(message: string, error?: unknown, attributes?: LogAttributes): void;
  /** Derive a logger that adds `attributes` to every record. */
  child(attributes: LogAttributes): Logger;
}

export interface LoggerOptions {
  /** Logger name written to the `logger` field. */
  name: string;
  /** Minimum level to emit. Defaults to 'INFO'. */
  level?: LogLevel;
  /** Record destinations. A logger without sinks discards everything. */
  sinks?: readonly LogSink[];
  /** Attributes merged into every record. */
  attributes?: LogAttributes;
  /** Time source for timestamps. Defaults to the system clock. */
  clock?: Clock;
  /** Shared timestamp source; overrides `clock` when given. */
  timestamps?: TimestampSource;
  /** Fill module/function/line from the caller's stack frame. Defaults to false. */
  captureSource?: boolean;
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

/** Trace text for a thrown value. */
export function formatException(error: unknown): string {
  if (error instanceof Error) {
    return error.stack ?? `${error.name}: ${error.message}`;
  }
  return String(error);
}

// ─── Implementation ──────────────────────────────────────────────────────────

export function createLogger(options: LoggerOptions): Logger {
  const name = options.name;
  const minLevel = options.level ?? 'INFO';
  const sinks = options.sinks ?? [];
  const baseAttributes: LogAttributes = { ...options.attributes };
  const timestamps = options.timestamps ?? createTimestampSource(options.clock ?? systemClock);
  const captureSource = options.captureSource ?? false;

  function emit(
    level: LogLevel,
    message: string,
    error: unknown,
    attributes: LogAttributes | undefined,
    boundary: (...args: never[]) => unknown,
  ): void {
    if (!isLevelEnabled(level, minLevel)) return;
    const targets = sinks.filter((sink) => isLevelEnabled(level, sink.level));
    if (targets.length === 0) return;

    const record: LogRecord = {
      timestamp: timestamps.next(),
      level,
      logger: name,
      message,
      source: captureSource ? captureCallSite(boundary) : UNKNOWN_SOURCE,
      attributes: { ...baseAttributes, ...attributes },
    };
    if (error !== undefined && isLevelEnabled(level, 'ERROR')) {
      record.exception = formatException(error);
    }

    // Every sink gets the record even if an earlier one fails.
    let firstFailure: unknown;
    let failed = false;
    for (const sink of targets) {
      try {
        sink.write(record);
      } catch (sinkError) {
        if (!failed) {
          failed = true;
          firstFailure = sinkError;
        }
      }
    }
    if (failed) throw firstFailure;
  }

  const debug = (message: string, attributes?: LogAttributes): void =>
    emit('DEBUG', message, undefined, attributes, debug);
  const info = (message: string, attributes?: LogAttributes): void =>
    emit('INFO', message, undefined, attributes, info);
  const warning = (message: string, attributes?: LogAttributes): void =>
    emit('WARNING', message, undefined, attributes, warning);
  const error = (message: string, err?: unknown, attributes?: LogAttributes): void =>
    emit('ERROR', message, err, attributes, error);
  const critical = (message: string, err?: unknown, attributes?: LogAttributes): void =>
    emit('CRITICAL', message, err, attributes, critical);

  return {
    name,
    debug,
    info,
    warning,
    error,
    critical,
    child(attributes: LogAttributes): Logger {
      return createLogger({
        name,
        level: minLevel,
        sinks,
        attributes: { ...baseAttributes, ...attributes },
        timestamps,
        captureSource,
      });
    },
  };
}

/** A logger that drops everything; the default for engine components. */
export function createSilentLogger(name = 'silent'): Logger {
  return createLogger({ name, sinks: [] });
}
