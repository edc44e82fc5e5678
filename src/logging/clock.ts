/**
 * Clock and File Stat Providers
 *
 * Every age and date decision in the engine reads time through a
 * {@link Clock} and file metadata through a {@link FileStatProvider},
 * so tests can place "now" and file ages wherever they need to.
 *
 * Calendar dates are local-time `YYYY-MM-DD` strings.
 *
 * @module logging/clock
 */

import { stat } from 'node:fs/promises';
import { ConfigurationError } from './errors.js';

// ─── Types ───────────────────────────────────────────────────────────────────

export interface Clock {
  /** Current wall-clock time. */
  now(): Date;
  /** Current time as microseconds since the Unix epoch. */
  epochMicros(): number;
}

export interface FixedClock extends Clock {
  set(date: Date): void;
  advance(ms: number): void;
}

export interface FileStat {
  sizeBytes: number;
  mtime: Date;
  isFile: boolean;
}

export interface FileStatProvider {
  stat(path: string): Promise<FileStat>;
}

// ─── Implementations ─────────────────────────────────────────────────────────

export const systemClock: Clock = {
  now: () => new Date(),
  epochMicros: () => Math.floor((performance.timeOrigin + performance.now()) * 1000),
};

/**
 * A clock that only moves when told to.
 */
export function createFixedClock(start: Date): FixedClock {
  let current = start.getTime();
  return {
    now: () => new Date(current),
    epochMicros: () => current * 1000,
    set(date: Date): void {
      current = date.getTime();
    },
    advance(ms: number): void {
      current += ms;
    },
  };
}

export const nodeFileStatProvider: FileStatProvider = {
  async stat(path: string): Promise<FileStat> {
    const st = await stat(path);
    return { sizeBytes: st.size, mtime: st.mtime, isFile: st.isFile() };
  },
};

// ─── Calendar Helpers ────────────────────────────────────────────────────────

export const MS_PER_DAY = 24 * 60 * 60 * 1000;

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local calendar date of `date` as `YYYY-MM-DD`. */
export function toLocalDateString(date: Date): string {
  return `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
}

/**
 * Validate a `YYYY-MM-DD` string and return it unchanged.
 *
 * @throws ConfigurationError for malformed strings and impossible dates (e.g. 2024-02-30)
 */
export function parseDateString(value: string): string {
  const match = DATE_PATTERN.exec(value);
  if (!match) {
    throw new ConfigurationError(`Invalid date "${value}": expected YYYY-MM-DD`, 'date');
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const probe = new Date(year, month - 1, day);
  if (probe.getFullYear() !== year || probe.getMonth() !== month - 1 || probe.getDate() !== day) {
    throw new ConfigurationError(`Invalid date "${value}": no such calendar day`, 'date');
  }
  return value;
}

/** The local calendar day before `clock.now()`. */
export function yesterday(clock: Clock): string {
  const now = clock.now();
  return toLocalDateString(new Date(now.getFullYear(), now.getMonth(), now.getDate() - 1));
}
