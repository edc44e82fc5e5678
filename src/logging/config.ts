/**
 * Logging Configuration
 *
 * Settings for the logger registry, read from environment variables.
 * Invalid values raise {@link ConfigurationError} rather than falling back
 * silently.
 *
 * @module logging/config
 */

import { ConfigurationError } from './errors.js';
import { isLogLevel, type LogLevel } from './record.js';
import { DEFAULT_ROTATION_POLICY } from './rotatingFileWriter.js';

export interface LoggingConfig {
  logDir: string;
  level: LogLevel;
  fileName: string;
  errorFileName: string;
  maxBytes: number;
  backupCount: number;
  consoleEnabled: boolean;
  consoleLevel: LogLevel;
}

export type Env = Record<string, string | undefined>;

// ─── Parsers ─────────────────────────────────────────────────────────────────

export function readNonNegativeInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  if (!/^\d+$/.test(raw.trim())) {
    throw new ConfigurationError(`${name} must be a non-negative integer, got "${raw}"`, name);
  }
  return parseInt(raw, 10);
}

export function readBoolean(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const normalized = raw.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  throw new ConfigurationError(`${name} must be true or false, got "${raw}"`, name);
}

export function readLevel(env: Env, name: string, fallback: LogLevel): LogLevel {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const normalized = raw.trim().toUpperCase();
  if (!isLogLevel(normalized)) {
    throw new ConfigurationError(`${name} must be a log level, got "${raw}"`, name);
  }
  return normalized;
}

export function readString(env: Env, name: string, fallback: string): string {
  const raw = env[name];
  return raw === undefined || raw.trim() === '' ? fallback : raw.trim();
}

// ─── Loader ──────────────────────────────────────────────────────────────────

export function loadLoggingConfig(env: Env = process.env): LoggingConfig {
  return {
    logDir: readString(env, 'LOG_DIR', 'logs'),
    level: readLevel(env, 'LOG_LEVEL', 'INFO'),
    fileName: readString(env, 'LOG_FILE_NAME', 'app.json.log'),
    errorFileName: readString(env, 'LOG_ERROR_FILE_NAME', 'error.log'),
    maxBytes: readNonNegativeInt(env, 'LOG_MAX_BYTES', DEFAULT_ROTATION_POLICY.maxBytes),
    backupCount: readNonNegativeInt(env, 'LOG_BACKUP_COUNT', DEFAULT_ROTATION_POLICY.backupCount),
    consoleEnabled: readBoolean(env, 'LOG_CONSOLE_ENABLED', true),
    consoleLevel: readLevel(env, 'LOG_CONSOLE_LEVEL', 'INFO'),
  };
}
