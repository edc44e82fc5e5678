/**
 * Filesystem helpers shared by the writer and the maintenance passes.
 *
 * @module utils/files
 */

import { accessSync, constants, mkdirSync } from 'node:fs';
import { open, stat } from 'node:fs/promises';
import { ConfigurationError } from '../logging/errors.js';

// ─── Error Classification ────────────────────────────────────────────────────

/** Returns the errno-style code of a Node filesystem error, if any. */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/** True when the error means the path no longer exists. */
export function isNotFound(error: unknown): boolean {
  return errorCode(error) === 'ENOENT';
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ─── Paths ───────────────────────────────────────────────────────────────────

export async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (error) {
    if (isNotFound(error)) return false;
    throw error;
  }
}

/**
 * Flush a file's contents to stable storage.
 */
export async function fsyncFile(path: string): Promise<void> {
  const handle = await open(path, 'r+');
  try {
    await handle.sync();
  } finally {
    await handle.close();
  }
}

/**
 * Create `dir` if needed and verify the process can write to it.
 *
 * @throws ConfigurationError when the directory cannot be created or written
 */
export function ensureWritableDirectory(dir: string, setting: string): void {
  try {
    mkdirSync(dir, { recursive: true });
    accessSync(dir, constants.W_OK);
  } catch (error) {
    throw new ConfigurationError(
      `Directory is not writable: ${dir} (${describeError(error)})`,
      setting,
      { cause: error },
    );
  }
}
