/**
 * Maintenance Configuration
 *
 * Directory and default settings for the archival passes. The archive
 * directory defaults to `<LOG_DIR>/archive`.
 *
 * @module archive/config
 */

import { join } from 'node:path';
import { ConfigurationError } from '../logging/errors.js';
import { readNonNegativeInt, readString, type Env } from '../logging/config.js';
import { isCompressionFormat } from './compressor.js';
import { DEFAULT_RETENTION } from './retention.js';
import type { CompressionFormat } from './types.js';

export interface MaintenanceConfig {
  logDir: string;
  archiveDir: string;
  olderThanDays: number;
  keepDays: number;
  format: CompressionFormat;
}

export function readFormat(env: Env, name: string, fallback: CompressionFormat): CompressionFormat {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const normalized = raw.trim().toLowerCase();
  if (!isCompressionFormat(normalized)) {
    throw new ConfigurationError(`${name} must be one of zip, gz, bundle; got "${raw}"`, name);
  }
  return normalized;
}

export function loadMaintenanceConfig(env: Env = process.env): MaintenanceConfig {
  const logDir = readString(env, 'LOG_DIR', 'logs');
  return {
    logDir,
    archiveDir: readString(env, 'LOG_ARCHIVE_DIR', join(logDir, 'archive')),
    olderThanDays: readNonNegativeInt(
      env,
      'LOG_ARCHIVE_OLDER_THAN_DAYS',
      DEFAULT_RETENTION.compressAfterDays,
    ),
    keepDays: readNonNegativeInt(env, 'LOG_ARCHIVE_KEEP_DAYS', DEFAULT_RETENTION.deleteAfterDays),
    format: readFormat(env, 'LOG_ARCHIVE_FORMAT', 'zip'),
  };
}
