/**
 * Log Record Model
 *
 * Defines the structured record written to log files, the severity
 * ordering, and the one-line JSON wire format:
 *
 * ```json
 * {"timestamp":"2024-06-15T12:00:00.123456Z","level":"INFO","logger":"api",
 *  "message":"request completed","module":"server","function":"handle","line":42,
 *  "requestId":"a1b2c3d4","durationMs":12.5}
 * ```
 *
 * Attributes are merged at the top level; `exception` is present only on
 * records that carry failure detail.
 *
 * @module logging/record
 */

import { basename, extname } from 'node:path';
import type { Clock } from './clock.js';

// ─── Levels ──────────────────────────────────────────────────────────────────

export const LOG_LEVELS = ['DEBUG', 'INFO', 'WARNING', 'ERROR', 'CRITICAL'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARNING: 2,
  ERROR: 3,
  CRITICAL: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/** True when `level` is at or above `threshold`. */
export function isLevelEnabled(level: LogLevel, threshold: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[threshold];
}

// ─── Types ───────────────────────────────────────────────────────────────────

export type LogAttributeValue =
  | string
  | number
  | boolean
  | null
  | LogAttributeValue[]
  | { [key: string]: LogAttributeValue };

export interface LogAttributes {
  [key: string]: LogAttributeValue | undefined;
}

export interface SourceLocation {
  module: string | null;
  function: string | null;
  line: number | null;
}

export interface LogRecord {
  timestamp: string;
  level: LogLevel;
  logger: string;
  message: string;
  source: SourceLocation;
  attributes: LogAttributes;
  exception?: string;
}

export const UNKNOWN_SOURCE: SourceLocation = { module: null, function: null, line: null };

/** Keys owned by the record itself; attributes with these names are dropped. */
export const RESERVED_KEYS: ReadonlySet<string> = new Set([
  'timestamp',
  'level',
  'logger',
  'message',
  'module',
  'function',
  'line',
  'exception',
]);

// ─── Timestamps ──────────────────────────────────────────────────────────────

/**
 * Format microseconds since the epoch as ISO-8601 UTC with six fractional
 * digits, e.g. `2024-06-15T12:00:00.123456Z`.
 */
export function formatTimestamp(epochMicros: number): string {
  const ms = Math.floor(epochMicros / 1000);
  const micros = epochMicros - ms * 1000;
  const iso = new Date(ms).toISOString();
  return `${iso.slice(0, -1)}${String(micros).padStart(3, '0')}Z`;
}

export interface TimestampSource {
  next(): string;
}

/**
 * Produces strictly increasing timestamps even when the clock stalls or
 * steps backwards. Share one source between loggers that write to the
 * same files.
 */
export function createTimestampSource(clock: Clock): TimestampSource {
  let last = -1;
  return {
    next(): string {
      let micros = Math.floor(clock.epochMicros());
      if (micros <= last) micros = last + 1;
      last = micros;
      return formatTimestamp(micros);
    },
  };
}

// ─── Call Sites ──────────────────────────────────────────────────────────────

const FRAME_WITH_FUNCTION = /^\s*at (?:async )?(.+?) \((.+):(\d+):\d+\)$/;
const FRAME_WITHOUT_FUNCTION = /^\s*at (?:async )?(.+):(\d+):\d+$/;

function moduleFromFile(file: string): string {
  const clean = file.replace(/^file:\/\//, '').replace(/\?.*$/, '');
  const name = basename(clean);
  return name.slice(0, name.length - extname(name).length);
}

/** Parse one V8 stack frame line. Unrecognized frames yield {@link UNKNOWN_SOURCE}. */
export function parseStackFrame(frame: string): SourceLocation {
  const named = FRAME_WITH_FUNCTION.exec(frame);
  if (named) {
    return {
      module: moduleFromFile(named[2]),
      function: named[1],
      line: Number(named[3]),
    };
  }
  const anonymous = FRAME_WITHOUT_FUNCTION.exec(frame);
  if (anonymous) {
    return { module: moduleFromFile(anonymous[1]), function: null, line: Number(anonymous[2]) };
  }
  return UNKNOWN_SOURCE;
}

/**
 * Locate the caller of `boundary`: frames from `boundary` upward are
 * hidden, so the first remaining frame is whoever invoked it.
 */
export function captureCallSite(boundary: (...args: never[]) => unknown): SourceLocation {
  const holder: { stack?: string } = {};
  Error.captureStackTrace(holder, boundary);
  const frames = (holder.stack ?? '').split('\n').slice(1);
  return frames.length > 0 ? parseStackFrame(frames[0]) : UNKNOWN_SOURCE;
}

// ─── Serialization ───────────────────────────────────────────────────────────

function jsonReplacer(_key: string, value: unknown): unknown {
  if (typeof value === 'bigint') return value.toString();
  return value;
}

function toWireObject(record: LogRecord, attributes: LogAttributes): Record<string, unknown> {
  const wire: Record<string, unknown> = {
    timestamp: record.timestamp,
    level: record.level,
    logger: record.logger,
    message: record.message,
    module: record.source.module,
    function: record.source.function,
    line: record.source.line,
  };
  for (const [key, value] of Object.entries(attributes)) {
    if (value === undefined || RESERVED_KEYS.has(key)) continue;
    wire[key] = value;
  }
  if (record.exception !== undefined) wire['exception'] = record.exception;
  return wire;
}

/**
 * Serialize a record to a single JSON line (no trailing newline).
 * Attributes that cannot be encoded (e.g. circular objects) are written
 * as their string form instead of failing the whole record.
 */
export function serializeRecord(record: LogRecord): string {
  try {
    return JSON.stringify(toWireObject(record, record.attributes), jsonReplacer);
  } catch {
    const flattened: LogAttributes = {};
    for (const [key, value] of Object.entries(record.attributes)) {
      if (value !== undefined) flattened[key] = String(value);
    }
    return JSON.stringify(toWireObject(record, flattened), jsonReplacer);
  }
}

// ─── Parsing ─────────────────────────────────────────────────────────────────

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isAttributeValue(value: unknown): value is LogAttributeValue {
  if (value === null) return true;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return true;
  }
  if (Array.isArray(value)) return value.every(isAttributeValue);
  if (isPlainObject(value)) return Object.values(value).every(isAttributeValue);
  return false;
}

function nullableString(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

/**
 * Parse one persisted line back into a {@link LogRecord}.
 *
 * @throws SyntaxError when the line is not JSON
 * @throws TypeError when required fields are missing or mistyped
 */
export function parseRecord(line: string): LogRecord {
  const parsed: unknown = JSON.parse(line);
  if (!isPlainObject(parsed)) throw new TypeError('Log line is not a JSON object');

  const { timestamp, level, logger, message } = parsed;
  if (typeof timestamp !== 'string') throw new TypeError('Log line has no timestamp');
  if (typeof level !== 'string' || !isLogLevel(level)) {
    throw new TypeError(`Log line has invalid level: ${String(level)}`);
  }
  if (typeof logger !== 'string') throw new TypeError('Log line has no logger');
  if (typeof message !== 'string') throw new TypeError('Log line has no message');

  const attributes: LogAttributes = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (RESERVED_KEYS.has(key) || !isAttributeValue(value)) continue;
    attributes[key] = value;
  }

  const record: LogRecord = {
    timestamp,
    level,
    logger,
    message,
    source: {
      module: nullableString(parsed['module']),
      function: nullableString(parsed['function']),
      line: typeof parsed['line'] === 'number' ? parsed['line'] : null,
    },
    attributes,
  };
  if (typeof parsed['exception'] === 'string') record.exception = parsed['exception'];
  return record;
}
