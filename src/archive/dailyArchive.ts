/**
 * Daily Archive Builder
 *
 * Bundles every log artifact of one local calendar day into
 * `logs_archive_<YYYY-MM-DD>.zip`:
 *
 * - regular files in the log directory modified on that day
 * - per-file archives in the archive directory modified on that day,
 *   stored under `compressed/` inside the bundle
 *
 * Selection is by calendar day of the mtime, not a rolling 24h window.
 * Sources are left in place. A file that vanishes before it is read is
 * skipped; one that cannot be read is reported and the rest still go in.
 *
 * When an archive for the date already exists it is kept as is and the
 * result reports `exists`: daily archives are never rebuilt or overwritten.
 *
 * @module archive/dailyArchive
 */

import { join } from 'node:path';
import {
  nodeFileStatProvider,
  parseDateString,
  systemClock,
  toLocalDateString,
  yesterday,
  type Clock,
  type FileStatProvider,
} from '../logging/clock.js';
import { createSilentLogger, type Logger } from '../logging/logger.js';
import { writeZipArchive, type ZipSource, type ZipWriteResult } from './compressionWriter.js';
import { classifyArchive, dailyArchiveName } from './naming.js';
import { scanDirectory, toFailure } from './scanner.js';
import type { ArchiveEntry, DailyArchiveResult, MaintenanceFailure } from './types.js';
import { ensureWritableDirectory, isNotFound } from '../utils/files.js';

export interface DailyArchiveOptions {
  archiveDir: string;
  clock?: Clock;
  fileStat?: FileStatProvider;
  logger?: Logger;
  /** Also bundle per-file archives from the archive directory. Defaults to true. */
  includeCompressed?: boolean;
}

export interface DailyArchiveBuilder {
  createDailyArchive(directory: string, date?: string): Promise<DailyArchiveResult>;
}

export const COMPRESSED_ENTRY_PREFIX = 'compressed/';

export function createDailyArchiveBuilder(options: DailyArchiveOptions): DailyArchiveBuilder {
  const archiveDir = options.archiveDir;
  const clock = options.clock ?? systemClock;
  const fileStat = options.fileStat ?? nodeFileStatProvider;
  const logger = options.logger ?? createSilentLogger();
  const includeCompressed = options.includeCompressed ?? true;

  async function existingArchive(name: string): Promise<ArchiveEntry | null> {
    const path = join(archiveDir, name);
    try {
      const st = await fileStat.stat(path);
      return { name, path, sizeBytes: st.sizeBytes, createdAt: st.mtime, kind: 'daily' };
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
  }

  async function collectSources(
    directory: string,
    date: string,
    failures: MaintenanceFailure[],
  ): Promise<ZipSource[]> {
    const sources: ZipSource[] = [];

    const logs = await scanDirectory(directory, fileStat);
    failures.push(...logs.failures);
    for (const file of logs.files) {
      if (toLocalDateString(file.mtime) === date) {
        sources.push({ path: file.path, name: file.name });
      }
    }

    if (includeCompressed) {
      const archives = await scanDirectory(archiveDir, fileStat);
      failures.push(...archives.failures);
      for (const file of archives.files) {
        if (classifyArchive(file.name) !== 'single') continue;
        if (toLocalDateString(file.mtime) === date) {
          sources.push({ path: file.path, name: `${COMPRESSED_ENTRY_PREFIX}${file.name}` });
        }
      }
    }

    return sources;
  }

  async function createDailyArchive(directory: string, date?: string): Promise<DailyArchiveResult> {
    const target = date === undefined ? yesterday(clock) : parseDateString(date);
    const name = dailyArchiveName(target);
    const failures: MaintenanceFailure[] = [];

    const existing = await existingArchive(name);
    if (existing) {
      logger.info('daily archive already exists, skipping', { date: target, archive: name });
      return { status: 'exists', date: target, archive: existing, sources: [], failures };
    }

    const sources = await collectSources(directory, target, failures);
    if (sources.length === 0) {
      logger.info('nothing to archive for date', { date: target });
      return { status: 'empty', date: target, archive: null, sources: [], failures };
    }

    ensureWritableDirectory(archiveDir, 'archiveDir');
    const path = join(archiveDir, name);
    let outcome: ZipWriteResult;
    try {
      outcome = await writeZipArchive(path, sources);
    } catch (error) {
      failures.push(toFailure(path, 'compress', error));
      logger.error('failed to write daily archive', error, { date: target, archive: name });
      return { status: 'failed', date: target, archive: null, sources: [], failures };
    }
    for (const { source, error } of outcome.unreadable) {
      failures.push(toFailure(source.path, 'compress', error));
      logger.error('failed to read file for daily archive', error, { source: source.name });
    }
    if (outcome.written.length === 0) {
      logger.info('nothing to archive for date', { date: target });
      return { status: 'empty', date: target, archive: null, sources: [], failures };
    }

    const st = await fileStat.stat(path);
    const archive: ArchiveEntry = {
      name,
      path,
      sizeBytes: st.sizeBytes,
      createdAt: st.mtime,
      kind: 'daily',
    };
    logger.info('daily archive created', { date: target, archive: name, files: outcome.written.length });
    return { status: 'created', date: target, archive, sources: outcome.written, failures };
  }

  return { createDailyArchive };
}
