/**
 * Directory scanning for the maintenance passes.
 *
 * Lists regular files directly under a directory (no recursion, no
 * symlinks, no subdirectories) with their size and mtime. Files that
 * disappear between listing and stat are dropped silently; other stat
 * errors become {@link MaintenanceFailure}s.
 *
 * @module archive/scanner
 */

import type { Dirent } from 'node:fs';
import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { FileStatProvider } from '../logging/clock.js';
import type { MaintenanceFailure } from './types.js';
import { describeError, errorCode, isNotFound } from '../utils/files.js';

export interface ScannedFile {
  name: string;
  path: string;
  sizeBytes: number;
  mtime: Date;
}

export interface ScanResult {
  /** False when the directory itself does not exist. */
  exists: boolean;
  files: ScannedFile[];
  failures: MaintenanceFailure[];
}

export function toFailure(
  path: string,
  operation: MaintenanceFailure['operation'],
  error: unknown,
): MaintenanceFailure {
  const failure: MaintenanceFailure = { path, operation, message: describeError(error) };
  const code = errorCode(error);
  if (code !== undefined) failure.code = code;
  return failure;
}

export async function scanDirectory(dir: string, fileStat: FileStatProvider): Promise<ScanResult> {
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (error) {
    if (isNotFound(error)) return { exists: false, files: [], failures: [] };
    return { exists: true, files: [], failures: [toFailure(dir, 'scan', error)] };
  }

  const files: ScannedFile[] = [];
  const failures: MaintenanceFailure[] = [];
  const names = entries
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .sort();

  for (const name of names) {
    const path = join(dir, name);
    try {
      const st = await fileStat.stat(path);
      if (!st.isFile) continue;
      files.push({ name, path, sizeBytes: st.sizeBytes, mtime: st.mtime });
    } catch (error) {
      if (isNotFound(error)) continue;
      failures.push(toFailure(path, 'stat', error));
    }
  }

  return { exists: true, files, failures };
}
