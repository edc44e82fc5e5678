/**
 * Retention Policy
 *
 * Decides compression and deletion eligibility from a file's age. The two
 * thresholds are independent: `compressAfterDays` applies to the live log
 * directory, `deleteAfterDays` to the archive directory.
 *
 * Both boundaries are exclusive. A file exactly `n` days old is kept; one
 * millisecond older and it is eligible.
 *
 * @module archive/retention
 */

import { MS_PER_DAY } from '../logging/clock.js';
import { ConfigurationError } from '../logging/errors.js';

// ─── Types ───────────────────────────────────────────────────────────────────

export interface RetentionConfig {
  /** Live logs older than this many days are compressed (default: 7). */
  compressAfterDays: number;
  /** Archives older than this many days are deleted (default: 30). */
  deleteAfterDays: number;
}

export interface RetentionClassification {
  ageMs: number;
  shouldCompress: boolean;
  shouldDelete: boolean;
}

export interface RetentionPolicy {
  classify(modifiedAt: Date, now: Date): RetentionClassification;
  isCompressible(modifiedAt: Date, now: Date): boolean;
  isExpired(modifiedAt: Date, now: Date): boolean;
  config: Readonly<RetentionConfig>;
}

export const DEFAULT_RETENTION: Readonly<RetentionConfig> = {
  compressAfterDays: 7,
  deleteAfterDays: 30,
};

// ─── Helpers ─────────────────────────────────────────────────────────────────

function daysToMs(days: number): number {
  return days * MS_PER_DAY;
}

/**
 * @throws ConfigurationError unless `days` is a finite number ≥ 0
 */
export function validateDays(days: number, setting: string): number {
  if (!Number.isFinite(days) || days < 0) {
    throw new ConfigurationError(`${setting} must be a non-negative number, got ${days}`, setting);
  }
  return days;
}

// ─── Factory ─────────────────────────────────────────────────────────────────

export function createRetentionPolicy(overrides: Partial<RetentionConfig> = {}): RetentionPolicy {
  const config: RetentionConfig = {
    compressAfterDays: validateDays(
      overrides.compressAfterDays ?? DEFAULT_RETENTION.compressAfterDays,
      'compressAfterDays',
    ),
    deleteAfterDays: validateDays(
      overrides.deleteAfterDays ?? DEFAULT_RETENTION.deleteAfterDays,
      'deleteAfterDays',
    ),
  };

  const compressMs = daysToMs(config.compressAfterDays);
  const deleteMs = daysToMs(config.deleteAfterDays);

  function classify(modifiedAt: Date, now: Date): RetentionClassification {
    const ageMs = now.getTime() - modifiedAt.getTime();
    return {
      ageMs,
      shouldCompress: ageMs > compressMs,
      shouldDelete: ageMs > deleteMs,
    };
  }

  return {
    classify,
    isCompressible: (modifiedAt, now) => classify(modifiedAt, now).shouldCompress,
    isExpired: (modifiedAt, now) => classify(modifiedAt, now).shouldDelete,
    config,
  };
}
