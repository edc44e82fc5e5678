/**
 * manage-logs CLI
 *
 * Commands:
 *   manage-logs archive        - Compress log files older than N days
 *   manage-logs daily-archive  - Bundle one day's logs and archives
 *   manage-logs cleanup        - Delete archives older than N days
 *   manage-logs stats          - Show log and archive totals
 *   manage-logs list           - List archives, newest first
 *   manage-logs full           - archive, then cleanup
 *
 * Global options:
 *   --log-dir <dir>      - Log directory (default: $LOG_DIR or ./logs)
 *   --archive-dir <dir>  - Archive directory (default: <log-dir>/archive)
 *
 * Exit code is 0 on success and 1 when any file failed or the command
 * raised an error.
 *
 * @module cli/manageLogs
 */

import { Command, CommanderError, InvalidArgumentError } from 'commander';
import {
  createLogMaintenance,
  isCompressionFormat,
  loadMaintenanceConfig,
  type CompressionFormat,
  type LogMaintenance,
  type MaintenanceFailure,
} from '../archive/index.js';
import type { Clock, FileStatProvider } from '../logging/clock.js';
import type { Env } from '../logging/config.js';
import { ConfigurationError } from '../logging/errors.js';
import { createSilentLogger, type Logger } from '../logging/logger.js';
import {
  renderCleanup,
  renderCompress,
  renderDailyArchive,
  renderFailures,
  renderFullMaintenance,
  renderList,
  renderStats,
} from './render.js';

// ─── Types ───────────────────────────────────────────────────────────────────

export interface CliDeps {
  env?: Env;
  /** Receives each line of normal output. */
  out?: (line: string) => void;
  /** Receives each line of error output. */
  err?: (line: string) => void;
  logger?: Logger;
  clock?: Clock;
  fileStat?: FileStatProvider;
}

interface GlobalOptions {
  logDir?: string;
  archiveDir?: string;
}

// ─── Option parsers ──────────────────────────────────────────────────────────

export function parseDays(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Must be a non-negative integer.');
  }
  return parseInt(value, 10);
}

export function parseFormat(value: string): CompressionFormat {
  if (!isCompressionFormat(value)) {
    throw new InvalidArgumentError('Must be one of zip, gz, bundle.');
  }
  return value;
}

// ─── Program ─────────────────────────────────────────────────────────────────

export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const out = deps.out ?? ((line: string) => process.stdout.write(`${line}\n`));
  const err = deps.err ?? ((line: string) => process.stderr.write(`${line}\n`));
  const logger = deps.logger ?? createSilentLogger('manage-logs');
  let exitCode = 0;

  const print = (lines: string[]) => lines.forEach((line) => out(line));
  const report = (failures: readonly MaintenanceFailure[]) => {
    if (failures.length === 0) return;
    renderFailures(failures).forEach((line) => err(line));
    exitCode = 1;
  };

  const program = new Command()
    .name('manage-logs')
    .description('Compress, bundle, prune and inspect rotated log files')
    .option('--log-dir <dir>', 'log directory')
    .option('--archive-dir <dir>', 'archive directory')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => out(text.trimEnd()),
      writeErr: (text) => err(text.trimEnd()),
    });

  /** Command-line directories take precedence over LOG_DIR / LOG_ARCHIVE_DIR. */
  function maintenance(): LogMaintenance {
    const globals = program.opts<GlobalOptions>();
    const env: Env = { ...(deps.env ?? process.env) };
    if (globals.logDir !== undefined) {
      env['LOG_DIR'] = globals.logDir;
      if (globals.archiveDir === undefined) delete env['LOG_ARCHIVE_DIR'];
    }
    if (globals.archiveDir !== undefined) env['LOG_ARCHIVE_DIR'] = globals.archiveDir;
    return createLogMaintenance(loadMaintenanceConfig(env), {
      clock: deps.clock,
      fileStat: deps.fileStat,
      logger,
    });
  }

  program
    .command('archive')
    .description('Compress log files older than N days')
    .option('--older-than-days <n>', 'age threshold in days', parseDays)
    .option('--type <format>', 'zip, gz or bundle', parseFormat)
    .action(async (options: { olderThanDays?: number; type?: CompressionFormat }) => {
      const result = await maintenance().archive(options.olderThanDays, options.type);
      print(renderCompress(result));
      report(result.failures);
    });

  program
    .command('daily-archive')
    .description("Bundle one day's logs into logs_archive_<date>.zip")
    .option('--date <YYYY-MM-DD>', 'day to archive (default: yesterday)')
    .action(async (options: { date?: string }) => {
      const result = await maintenance().dailyArchive(options.date);
      print(renderDailyArchive(result));
      report(result.failures);
    });

  program
    .command('cleanup')
    .description('Delete archives older than N days')
    .option('--keep-days <n>', 'retention window in days', parseDays)
    .action(async (options: { keepDays?: number }) => {
      const result = await maintenance().cleanup(options.keepDays);
      print(renderCleanup(result));
      report(result.failures);
    });

  program
    .command('stats')
    .description('Show log and archive totals')
    .action(async () => {
      const stats = await maintenance().stats();
      print(renderStats(stats));
      report(stats.failures);
    });

  program
    .command('list')
    .description('List archives, newest first')
    .action(async () => {
      print(renderList(await maintenance().list()));
    });

  program
    .command('full')
    .alias('full-maintenance')
    .description('Compress old logs, then delete expired archives')
    .option('--older-than-days <n>', 'age threshold in days', parseDays)
    .option('--keep-days <n>', 'retention window in days', parseDays)
    .action(async (options: { olderThanDays?: number; keepDays?: number }) => {
      const result = await maintenance().fullMaintenance(options.olderThanDays, options.keepDays);
      print(renderFullMaintenance(result));
      report([...result.archive.failures, ...result.cleanup.failures]);
    });

  try {
    await program.parseAsync([...argv], { from: 'user' });
    return exitCode;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    if (error instanceof ConfigurationError) {
      err(`error: ${error.message}`);
      return 1;
    }
    logger.error('manage-logs command failed', error);
    err(`error: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
}
