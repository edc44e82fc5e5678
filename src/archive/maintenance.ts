/**
 * Log Maintenance
 *
 * Binds the compressor, daily archive builder, sweeper and inventory
 * reporter to one pair of directories and one set of defaults. This is
 * what the CLI and any scheduler call.
 *
 * @module archive/maintenance
 */

import type { Clock, FileStatProvider } from '../logging/clock.js';
import { createSilentLogger, type Logger } from '../logging/logger.js';
import { createArchiveCompressor } from './compressor.js';
import type { MaintenanceConfig } from './config.js';
import { createDailyArchiveBuilder } from './dailyArchive.js';
import { createInventoryReporter } from './inventory.js';
import { validateDays } from './retention.js';
import { createRetentionSweeper } from './sweeper.js';
import type {
  ArchiveEntry,
  CleanupResult,
  CompressionFormat,
  CompressResult,
  DailyArchiveResult,
  FullMaintenanceResult,
  InventoryStats,
} from './types.js';
import { ensureWritableDirectory } from '../utils/files.js';

export interface MaintenanceDeps {
  clock?: Clock;
  fileStat?: FileStatProvider;
  logger?: Logger;
}

export interface LogMaintenance {
  readonly config: Readonly<MaintenanceConfig>;
  archive(olderThanDays?: number, format?: CompressionFormat): Promise<CompressResult>;
  dailyArchive(date?: string): Promise<DailyArchiveResult>;
  cleanup(keepDays?: number): Promise<CleanupResult>;
  stats(): Promise<InventoryStats>;
  list(): Promise<ArchiveEntry[]>;
  fullMaintenance(olderThanDays?: number, keepDays?: number): Promise<FullMaintenanceResult>;
}

/**
 * @throws ConfigurationError when either directory cannot be created or
 *   written, or a default is out of range
 */
export function createLogMaintenance(
  config: MaintenanceConfig,
  deps: MaintenanceDeps = {},
): LogMaintenance {
  validateDays(config.olderThanDays, 'olderThanDays');
  validateDays(config.keepDays, 'keepDays');
  ensureWritableDirectory(config.logDir, 'LOG_DIR');
  ensureWritableDirectory(config.archiveDir, 'LOG_ARCHIVE_DIR');

  const logger = deps.logger ?? createSilentLogger();
  const shared = { clock: deps.clock, fileStat: deps.fileStat, logger };

  const compressor = createArchiveCompressor({ archiveDir: config.archiveDir, ...shared });
  const daily = createDailyArchiveBuilder({ archiveDir: config.archiveDir, ...shared });
  const sweeper = createRetentionSweeper(shared);
  const inventory = createInventoryReporter({ fileStat: deps.fileStat, logger });

  const archive = (olderThanDays = config.olderThanDays, format = config.format) =>
    compressor.compress(config.logDir, olderThanDays, format);

  const cleanup = (keepDays = config.keepDays) => sweeper.cleanup(config.archiveDir, keepDays);

  return {
    config,
    archive,
    dailyArchive: (date) => daily.createDailyArchive(config.logDir, date),
    cleanup,
    stats: () => inventory.getStats(config.logDir, config.archiveDir),
    list: () => inventory.listArchives(config.archiveDir),
    async fullMaintenance(olderThanDays, keepDays) {
      logger.info('starting full maintenance');
      const archived = await archive(olderThanDays);
      const cleaned = await cleanup(keepDays);
      logger.info('full maintenance finished', {
        archived: archived.compressedSources.length,
        deleted: cleaned.deletedCount,
      });
      return { archive: archived, cleanup: cleaned };
    },
  };
}
