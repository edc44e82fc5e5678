/**
 * Archive file naming.
 *
 * Archives are never overwritten. When a name is taken, a `~N` counter is
 * inserted before the extension (`app.json.log.1~1.zip`); bundles use
 * `_N` (`logs_bundle_2024-06-15_1.zip`).
 *
 * @module archive/naming
 */

import { join } from 'node:path';
import type { ArchiveKind } from './types.js';
import { pathExists } from '../utils/files.js';

export const DAILY_ARCHIVE_PREFIX = 'logs_archive_';
export const BUNDLE_ARCHIVE_PREFIX = 'logs_bundle_';
/** Suffix of archives still being written. */
export const PARTIAL_SUFFIX = '.partial';

const DAILY_PATTERN = /^logs_archive_\d{4}-\d{2}-\d{2}\.zip$/;
const BUNDLE_PATTERN = /^logs_bundle_\d{4}-\d{2}-\d{2}(?:_\d+)?\.zip$/;
const ARCHIVE_PATTERN = /\.(?:zip|gz)$/;

export function dailyArchiveName(date: string): string {
  return `${DAILY_ARCHIVE_PREFIX}${date}.zip`;
}

export function bundleArchiveName(date: string, attempt = 0): string {
  return attempt === 0
    ? `${BUNDLE_ARCHIVE_PREFIX}${date}.zip`
    : `${BUNDLE_ARCHIVE_PREFIX}${date}_${attempt}.zip`;
}

export function singleArchiveName(source: string, extension: 'zip' | 'gz', attempt = 0): string {
  return attempt === 0 ? `${source}.${extension}` : `${source}~${attempt}.${extension}`;
}

/** Kind of archive `name` denotes, or null when it is not a `.zip` or `.gz` file. */
export function classifyArchive(name: string): ArchiveKind | null {
  if (DAILY_PATTERN.test(name)) return 'daily';
  if (BUNDLE_PATTERN.test(name)) return 'bundle';
  return ARCHIVE_PATTERN.test(name) ? 'single' : null;
}

/**
 * First name produced by `nameFor(0)`, `nameFor(1)`, … that does not exist
 * in `dir`. Assumes a single maintenance process.
 */
export async function firstFreeName(
  dir: string,
  nameFor: (attempt: number) => string,
): Promise<string> {
  for (let attempt = 0; ; attempt++) {
    const name = nameFor(attempt);
    if (!(await pathExists(join(dir, name)))) return name;
  }
}
