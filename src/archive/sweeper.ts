/**
 * Retention Sweeper
 *
 * Deletes archives older than the keep window. Only regular files directly
 * under the archive directory are considered; subdirectories are left alone.
 *
 * @module archive/sweeper
 */

import { unlink } from 'node:fs/promises';
import { nodeFileStatProvider, systemClock, type Clock, type FileStatProvider } from '../logging/clock.js';
import { createSilentLogger, type Logger } from '../logging/logger.js';
import { createRetentionPolicy, DEFAULT_RETENTION } from './retention.js';
import { scanDirectory, toFailure } from './scanner.js';
import type { CleanupResult } from './types.js';
import { isNotFound } from '../utils/files.js';

export interface SweeperOptions {
  clock?: Clock;
  fileStat?: FileStatProvider;
  logger?: Logger;
}

export interface RetentionSweeper {
  cleanup(archiveDir: string, keepDays?: number): Promise<CleanupResult>;
}

export function createRetentionSweeper(options: SweeperOptions = {}): RetentionSweeper {
  const clock = options.clock ?? systemClock;
  const fileStat = options.fileStat ?? nodeFileStatProvider;
  const logger = options.logger ?? createSilentLogger();

  async function cleanup(
    archiveDir: string,
    keepDays: number = DEFAULT_RETENTION.deleteAfterDays,
  ): Promise<CleanupResult> {
    const policy = createRetentionPolicy({ deleteAfterDays: keepDays });
    const result: CleanupResult = { deletedCount: 0, deleted: [], failures: [] };

    const scan = await scanDirectory(archiveDir, fileStat);
    result.failures.push(...scan.failures);
    if (!scan.exists) {
      logger.info('archive directory does not exist, nothing to clean', { archiveDir });
      return result;
    }

    const now = clock.now();
    for (const file of scan.files) {
      if (!policy.isExpired(file.mtime, now)) continue;
      try {
        await unlink(file.path);
      } catch (error) {
        if (isNotFound(error)) continue;
        result.failures.push(toFailure(file.path, 'delete', error));
        logger.error('failed to delete expired archive', error, { archive: file.name });
        continue;
      }
      result.deleted.push(file.name);
      result.deletedCount += 1;
      logger.info('deleted expired archive', { archive: file.name });
    }

    logger.info('archive cleanup finished', { archiveDir, keepDays, deleted: result.deletedCount });
    return result;
  }

  return { cleanup };
}
