/**
 * Archive Compressor
 *
 * Compresses log files older than a threshold into the archive directory
 * and removes each source once its compressed copy is committed.
 *
 * - `zip` / `gz`: one archive per source, `<source>.zip` / `<source>.gz`
 * - `bundle`:     one zip for the whole run, `logs_bundle_<date>.zip`
 *
 * Re-running right away compresses nothing: archived sources no longer
 * exist. Files that vanish mid-run are skipped without a failure; any
 * other per-file error is recorded and the run moves on. A source that was
 * written to while it was being archived is kept for the next run.
 *
 * @module archive/compressor
 */

import { unlink } from 'node:fs/promises';
import { join } from 'node:path';
import {
  nodeFileStatProvider,
  systemClock,
  toLocalDateString,
  type Clock,
  type FileStat,
  type FileStatProvider,
} from '../logging/clock.js';
import { ConfigurationError } from '../logging/errors.js';
import { createSilentLogger, type Logger } from '../logging/logger.js';
import { writeGzipFile, writeZipArchive, type ZipWriteResult } from './compressionWriter.js';
import { bundleArchiveName, firstFreeName, singleArchiveName } from './naming.js';
import { createRetentionPolicy, DEFAULT_RETENTION } from './retention.js';
import { scanDirectory, toFailure, type ScannedFile } from './scanner.js';
import {
  COMPRESSION_FORMATS,
  type ArchiveEntry,
  type ArchiveKind,
  type CompressionFormat,
  type CompressResult,
  type MaintenanceFailure,
} from './types.js';
import { ensureWritableDirectory, isNotFound } from '../utils/files.js';

// ─── Types ───────────────────────────────────────────────────────────────────

export interface CompressorOptions {
  archiveDir: string;
  clock?: Clock;
  fileStat?: FileStatProvider;
  logger?: Logger;
}

export interface ArchiveCompressor {
  compress(
    directory: string,
    olderThanDays?: number,
    format?: CompressionFormat,
  ): Promise<CompressResult>;
}

export function isCompressionFormat(value: string): value is CompressionFormat {
  return COMPRESSION_FORMATS.some((format) => format === value);
}

// ─── Implementation ──────────────────────────────────────────────────────────

export function createArchiveCompressor(options: CompressorOptions): ArchiveCompressor {
  const archiveDir = options.archiveDir;
  const clock = options.clock ?? systemClock;
  const fileStat = options.fileStat ?? nodeFileStatProvider;
  const logger = options.logger ?? createSilentLogger();

  async function toEntry(name: string, kind: ArchiveKind): Promise<ArchiveEntry> {
    const path = join(archiveDir, name);
    const st = await fileStat.stat(path);
    return { name, path, sizeBytes: st.sizeBytes, createdAt: st.mtime, kind };
  }

  function changedSince(file: ScannedFile, current: FileStat): boolean {
    return current.sizeBytes !== file.sizeBytes || current.mtime.getTime() !== file.mtime.getTime();
  }

  /**
   * Delete a committed source, unless it changed since it was scanned: then
   * the archive may lack its newest lines and the file stays. A source that
   * is already gone counts as removed.
   */
  async function removeSource(file: ScannedFile, failures: MaintenanceFailure[]): Promise<boolean> {
    try {
      const current = await fileStat.stat(file.path);
      if (changedSince(file, current)) {
        failures.push({
          path: file.path,
          operation: 'remove',
          message: 'source changed after it was scanned; left in place',
        });
        logger.warning('log file changed while being archived, keeping it', { source: file.name });
        return false;
      }
      await unlink(file.path);
      return true;
    } catch (error) {
      if (isNotFound(error)) return true;
      failures.push(toFailure(file.path, 'remove', error));
      logger.error('failed to remove archived source', error, { source: file.name });
      return false;
    }
  }

  function recordUnreadable(outcome: ZipWriteResult, result: CompressResult): void {
    for (const { source, error } of outcome.unreadable) {
      result.failures.push(toFailure(source.path, 'compress', error));
      logger.error('failed to read log file', error, { source: source.name });
    }
  }

  async function compressEach(
    files: ScannedFile[],
    extension: 'zip' | 'gz',
    result: CompressResult,
  ): Promise<void> {
    for (const file of files) {
      const name = await firstFreeName(archiveDir, (attempt) =>
        singleArchiveName(file.name, extension, attempt),
      );
      const target = join(archiveDir, name);
      try {
        if (extension === 'gz') {
          await writeGzipFile(file.path, target);
        } else {
          const outcome = await writeZipArchive(target, [{ path: file.path, name: file.name }]);
          recordUnreadable(outcome, result);
          if (outcome.written.length === 0) continue;
        }
      } catch (error) {
        if (isNotFound(error)) continue;
        result.failures.push(toFailure(file.path, 'compress', error));
        logger.error('failed to compress log file', error, { source: file.name });
        continue;
      }

      result.archives.push(await toEntry(name, 'single'));
      if (await removeSource(file, result.failures)) result.compressedSources.push(file.name);
      logger.info('compressed log file', { source: file.name, archive: name });
    }
  }

  async function compressBundle(files: ScannedFile[], result: CompressResult): Promise<void> {
    const date = toLocalDateString(clock.now());
    const name = await firstFreeName(archiveDir, (attempt) => bundleArchiveName(date, attempt));
    const target = join(archiveDir, name);
    let outcome: ZipWriteResult;
    try {
      outcome = await writeZipArchive(
        target,
        files.map((file) => ({ path: file.path, name: file.name })),
      );
    } catch (error) {
      for (const file of files) result.failures.push(toFailure(file.path, 'compress', error));
      logger.error('failed to write log bundle', error, { archive: name });
      return;
    }
    recordUnreadable(outcome, result);
    if (outcome.written.length === 0) return;

    result.archives.push(await toEntry(name, 'bundle'));
    for (const file of files) {
      if (!outcome.written.includes(file.name)) continue;
      if (await removeSource(file, result.failures)) result.compressedSources.push(file.name);
    }
    logger.info('compressed log bundle', { archive: name, files: outcome.written.length });
  }

  async function compress(
    directory: string,
    olderThanDays: number = DEFAULT_RETENTION.compressAfterDays,
    format: CompressionFormat = 'zip',
  ): Promise<CompressResult> {
    if (!isCompressionFormat(format)) {
      throw new ConfigurationError(`Unknown archive format "${String(format)}"`, 'format');
    }
    const policy = createRetentionPolicy({ compressAfterDays: olderThanDays });
    const result: CompressResult = { archives: [], compressedSources: [], failures: [] };

    const scan = await scanDirectory(directory, fileStat);
    result.failures.push(...scan.failures);
    if (!scan.exists) {
      logger.warning('log directory does not exist', { directory });
      return result;
    }

    const now = clock.now();
    const eligible = scan.files.filter((file) => policy.isCompressible(file.mtime, now));
    if (eligible.length === 0) {
      logger.info('no log files eligible for compression', { directory, olderThanDays });
      return result;
    }

    ensureWritableDirectory(archiveDir, 'archiveDir');
    if (format === 'bundle') {
      await compressBundle(eligible, result);
    } else {
      await compressEach(eligible, format, result);
    }
    return result;
  }

  return { compress };
}
