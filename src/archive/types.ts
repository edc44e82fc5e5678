/**
 * Shared types for the archival engine.
 *
 * @module archive/types
 */

/**
 * - `single`: one source file compressed on its own (`<source>.zip|gz`)
 * - `daily`:  every artifact of one calendar day (`logs_archive_<date>.zip`)
 * - `bundle`: all files eligible in one compression run (`logs_bundle_<date>.zip`)
 */
export type ArchiveKind = 'single' | 'daily' | 'bundle';

export type CompressionFormat = 'zip' | 'gz' | 'bundle';

export const COMPRESSION_FORMATS: readonly CompressionFormat[] = ['zip', 'gz', 'bundle'];

export interface ArchiveEntry {
  name: string;
  path: string;
  sizeBytes: number;
  /** Modification time of the archive file. */
  createdAt: Date;
  kind: ArchiveKind;
}

export type MaintenanceOperation = 'scan' | 'stat' | 'compress' | 'remove' | 'delete';

/** One item a maintenance pass could not handle; the pass continued without it. */
export interface MaintenanceFailure {
  path: string;
  operation: MaintenanceOperation;
  message: string;
  code?: string;
}

export interface CompressResult {
  archives: ArchiveEntry[];
  /** Source files that were archived and then removed. */
  compressedSources: string[];
  failures: MaintenanceFailure[];
}

/** `failed`: the archive could not be written; see `failures`. */
export type DailyArchiveStatus = 'created' | 'exists' | 'empty' | 'failed';

export interface DailyArchiveResult {
  status: DailyArchiveStatus;
  date: string;
  /** The new archive (`created`) or the one already on disk (`exists`). */
  archive: ArchiveEntry | null;
  /** Entry names written into the archive. */
  sources: string[];
  failures: MaintenanceFailure[];
}

export interface CleanupResult {
  deletedCount: number;
  deleted: string[];
  failures: MaintenanceFailure[];
}

export interface FileSetStats {
  fileCount: number;
  totalBytes: number;
  oldest: Date | null;
  newest: Date | null;
}

export interface InventoryStats {
  logs: FileSetStats;
  archives: FileSetStats;
  failures: MaintenanceFailure[];
}

export interface FullMaintenanceResult {
  archive: CompressResult;
  cleanup: CleanupResult;
}
