/**
 * Plain-text renderers for the manage-logs commands. Each returns the
 * lines to print; sizes are shown in MB with two decimals.
 *
 * @module cli/render
 */

import type {
  ArchiveEntry,
  CleanupResult,
  CompressResult,
  DailyArchiveResult,
  FileSetStats,
  FullMaintenanceResult,
  InventoryStats,
  MaintenanceFailure,
} from '../archive/index.js';

const BYTES_PER_MB = 1024 * 1024;

export function formatMb(bytes: number): string {
  return `${(bytes / BYTES_PER_MB).toFixed(2)} MB`;
}

export function renderFailures(failures: readonly MaintenanceFailure[]): string[] {
  return failures.map((f) => `  ! ${f.operation} failed for ${f.path}: ${f.message}`);
}

export function renderCompress(result: CompressResult): string[] {
  if (result.archives.length === 0) return ['No files to compress.'];
  return [
    `Compressed ${result.compressedSources.length} file(s):`,
    ...result.archives.map((a) => `  - ${a.name}: ${formatMb(a.sizeBytes)}`),
  ];
}

export function renderDailyArchive(result: DailyArchiveResult): string[] {
  switch (result.status) {
    case 'created':
      return [`Created archive: ${result.archive?.path ?? ''} (${result.sources.length} file(s))`];
    case 'exists':
      return [`Archive already exists, skipped: ${result.archive?.path ?? ''}`];
    case 'empty':
      return [`No files found for ${result.date}.`];
    case 'failed':
      return [`Archive for ${result.date} was not created.`];
  }
}

export function renderCleanup(result: CleanupResult): string[] {
  return [`Deleted archives: ${result.deletedCount}`];
}

function renderFileSet(title: string, set: FileSetStats): string[] {
  const lines = [
    `${title}:`,
    `  - count: ${set.fileCount}`,
    `  - total size: ${formatMb(set.totalBytes)}`,
  ];
  if (set.oldest) lines.push(`  - oldest: ${set.oldest.toISOString()}`);
  if (set.newest) lines.push(`  - newest: ${set.newest.toISOString()}`);
  return lines;
}

export function renderStats(stats: InventoryStats): string[] {
  return [...renderFileSet('Log files', stats.logs), ...renderFileSet('Archives', stats.archives)];
}

export function renderList(archives: readonly ArchiveEntry[]): string[] {
  if (archives.length === 0) return ['No archives found.'];
  const lines = [`Archives (${archives.length}):`];
  for (const a of archives) {
    lines.push(
      `${a.name}`,
      `  - size: ${formatMb(a.sizeBytes)}`,
      `  - created: ${a.createdAt.toISOString()}`,
      `  - path: ${a.path}`,
    );
  }
  return lines;
}

export function renderFullMaintenance(result: FullMaintenanceResult): string[] {
  return [
    `Compressed: ${result.archive.compressedSources.length} file(s)`,
    `Deleted archives: ${result.cleanup.deletedCount}`,
  ];
}
