/**
 * Archive Module
 *
 * Compression, daily bundling, retention and inventory of rotated logs.
 */

export type {
  ArchiveKind,
  CompressionFormat,
  ArchiveEntry,
  MaintenanceOperation,
  MaintenanceFailure,
  CompressResult,
  DailyArchiveStatus,
  DailyArchiveResult,
  CleanupResult,
  FileSetStats,
  InventoryStats,
  FullMaintenanceResult,
} from './types.js';
export { COMPRESSION_FORMATS } from './types.js';

export {
  dailyArchiveName,
  bundleArchiveName,
  singleArchiveName,
  classifyArchive,
} from './naming.js';

export {
  type RetentionConfig,
  type RetentionClassification,
  type RetentionPolicy,
  DEFAULT_RETENTION,
  createRetentionPolicy,
} from './retention.js';

export {
  type CompressorOptions,
  type ArchiveCompressor,
  isCompressionFormat,
  createArchiveCompressor,
} from './compressor.js';

export {
  type DailyArchiveOptions,
  type DailyArchiveBuilder,
  createDailyArchiveBuilder,
} from './dailyArchive.js';

export { type SweeperOptions, type RetentionSweeper, createRetentionSweeper } from './sweeper.js';

export {
  type InventoryOptions,
  type InventoryReporter,
  createInventoryReporter,
} from './inventory.js';

export { type MaintenanceConfig, loadMaintenanceConfig } from './config.js';

export {
  type MaintenanceDeps,
  type LogMaintenance,
  createLogMaintenance,
} from './maintenance.js';
