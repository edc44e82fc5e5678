/**
 * Stats / Inventory Reporter
 *
 * Read-only views over the log and archive directories. Only `.zip` and
 * `.gz` files count as archives; in-progress `.partial` archives and stray
 * files are never reported.
 *
 * @module archive/inventory
 */

import { nodeFileStatProvider, type FileStatProvider } from '../logging/clock.js';
import { createSilentLogger, type Logger } from '../logging/logger.js';
import { classifyArchive } from './naming.js';
import { scanDirectory, type ScannedFile } from './scanner.js';
import type {
  ArchiveEntry,
  ArchiveKind,
  FileSetStats,
  InventoryStats,
  MaintenanceFailure,
} from './types.js';

export interface InventoryOptions {
  fileStat?: FileStatProvider;
  logger?: Logger;
}

interface ArchiveFile extends ScannedFile {
  kind: ArchiveKind;
}

export interface InventoryReporter {
  getStats(logDir: string, archiveDir: string): Promise<InventoryStats>;
  listArchives(archiveDir: string): Promise<ArchiveEntry[]>;
}

export function summarize(files: readonly ScannedFile[]): FileSetStats {
  let totalBytes = 0;
  let oldest: Date | null = null;
  let newest: Date | null = null;
  for (const file of files) {
    totalBytes += file.sizeBytes;
    if (oldest === null || file.mtime < oldest) oldest = file.mtime;
    if (newest === null || file.mtime > newest) newest = file.mtime;
  }
  return { fileCount: files.length, totalBytes, oldest, newest };
}

/** Newest first; names break ties. */
export function compareArchives(a: ArchiveEntry, b: ArchiveEntry): number {
  const byTime = b.createdAt.getTime() - a.createdAt.getTime();
  if (byTime !== 0) return byTime;
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

export function createInventoryReporter(options: InventoryOptions = {}): InventoryReporter {
  const fileStat = options.fileStat ?? nodeFileStatProvider;
  const logger = options.logger ?? createSilentLogger();

  /** Archive files with their kind; in-progress and stray files are skipped. */
  async function archiveFiles(
    archiveDir: string,
  ): Promise<{ files: ArchiveFile[]; failures: MaintenanceFailure[] }> {
    const scan = await scanDirectory(archiveDir, fileStat);
    const files: ArchiveFile[] = [];
    for (const file of scan.files) {
      const kind = classifyArchive(file.name);
      if (kind !== null) files.push({ ...file, kind });
    }
    return { files, failures: scan.failures };
  }

  async function getStats(logDir: string, archiveDir: string): Promise<InventoryStats> {
    const logs = await scanDirectory(logDir, fileStat);
    const archives = await archiveFiles(archiveDir);
    const failures = [...logs.failures, ...archives.failures];
    if (failures.length > 0) {
      logger.warning('some files could not be inspected', { failures: failures.length });
    }
    return {
      logs: summarize(logs.files),
      archives: summarize(archives.files),
      failures,
    };
  }

  async function listArchives(archiveDir: string): Promise<ArchiveEntry[]> {
    const { files } = await archiveFiles(archiveDir);
    return files
      .map(
        (file): ArchiveEntry => ({
          name: file.name,
          path: file.path,
          sizeBytes: file.sizeBytes,
          createdAt: file.mtime,
          kind: file.kind,
        }),
      )
      .sort(compareArchives);
  }

  return { getStats, listArchives };
}
