/**
 * Rotating Log Writer
 *
 * Appends serialized records to an active log file and rolls it over once
 * the file reaches `maxBytes`:
 *
 *   app.json.log      ← active
 *   app.json.log.1    ← most recent backup
 *   app.json.log.2
 *   …
 *   app.json.log.N    ← oldest backup, N = backupCount
 *
 * The size check runs after each append, so rotation always falls between
 * two records. All I/O is synchronous; an append and a rotation can never
 * interleave within the process.
 *
 * The active file is addressed by path on every append and re-stat'ed
 * afterwards. If maintenance moves or deletes it, the next append simply
 * creates a fresh file.
 *
 * @module logging/rotatingFileWriter
 */

import { appendFileSync, renameSync, rmSync, statSync, writeFileSync } from 'node:fs';
import { ConfigurationError, LogWriteError } from './errors.js';
import { serializeRecord, type LogRecord } from './record.js';
import { isNotFound } from '../utils/files.js';

// ─── Types ───────────────────────────────────────────────────────────────────

export interface RotationPolicy {
  /** Size at which the active file is rolled over. 0 disables rotation. */
  maxBytes: number;
  /** Number of numbered backups kept. 0 disables rotation. */
  backupCount: number;
}

export interface RotatingFileWriterOptions extends Partial<RotationPolicy> {
  filePath: string;
}

export interface RotatingFileWriter {
  readonly filePath: string;
  readonly policy: Readonly<RotationPolicy>;
  /** Append one record; rolls over afterwards if the size ceiling was reached. */
  append(record: LogRecord): void;
  /** Force a rollover now. */
  rotate(): void;
  /** Rollovers performed by this writer instance. */
  rotationCount(): number;
}

export const DEFAULT_ROTATION_POLICY: Readonly<RotationPolicy> = {
  maxBytes: 10 * 1024 * 1024,
  backupCount: 30,
};

// ─── Helpers ─────────────────────────────────────────────────────────────────

export function backupPath(filePath: string, index: number): string {
  return `${filePath}.${index}`;
}

function validatePolicy(policy: RotationPolicy): void {
  if (!Number.isInteger(policy.maxBytes) || policy.maxBytes < 0) {
    throw new ConfigurationError(
      `maxBytes must be a non-negative integer, got ${policy.maxBytes}`,
      'maxBytes',
    );
  }
  if (!Number.isInteger(policy.backupCount) || policy.backupCount < 0) {
    throw new ConfigurationError(
      `backupCount must be a non-negative integer, got ${policy.backupCount}`,
      'backupCount',
    );
  }
}

/** Rename that treats a missing source as nothing to do. */
function renameIfPresent(from: string, to: string): void {
  try {
    renameSync(from, to);
  } catch (error) {
    if (!isNotFound(error)) throw error;
  }
}

// ─── Implementation ──────────────────────────────────────────────────────────

export function createRotatingFileWriter(options: RotatingFileWriterOptions): RotatingFileWriter {
  const filePath = options.filePath;
  const policy: RotationPolicy = {
    maxBytes: options.maxBytes ?? DEFAULT_ROTATION_POLICY.maxBytes,
    backupCount: options.backupCount ?? DEFAULT_ROTATION_POLICY.backupCount,
  };
  validatePolicy(policy);

  const rotationEnabled = policy.maxBytes > 0 && policy.backupCount > 0;
  let rotations = 0;

  /** Size after an append; null when the file was moved away since. */
  function currentSize(): number | null {
    try {
      return statSync(filePath).size;
    } catch (error) {
      if (isNotFound(error)) return null;
      throw new LogWriteError(`Cannot stat active log file ${filePath}`, filePath, error);
    }
  }

  function rotate(): void {
    try {
      // The backup that would shift past the ceiling is removed, never the newest.
      rmSync(backupPath(filePath, policy.backupCount), { force: true });
      for (let index = policy.backupCount - 1; index >= 1; index--) {
        renameIfPresent(backupPath(filePath, index), backupPath(filePath, index + 1));
      }
      renameIfPresent(filePath, backupPath(filePath, 1));
      writeFileSync(filePath, '', { flag: 'a' });
    } catch (error) {
      throw new LogWriteError(`Failed to rotate log file ${filePath}`, filePath, error);
    }
    rotations++;
  }

  function append(record: LogRecord): void {
    const line = `${serializeRecord(record)}\n`;
    try {
      appendFileSync(filePath, line, 'utf8');
    } catch (error) {
      throw new LogWriteError(`Failed to append to log file ${filePath}`, filePath, error);
    }
    if (!rotationEnabled) return;
    const size = currentSize();
    if (size !== null && size >= policy.maxBytes) rotate();
  }

  return {
    filePath,
    policy,
    append,
    rotate(): void {
      if (policy.backupCount === 0) return;
      rotate();
    },
    rotationCount: () => rotations,
  };
}
