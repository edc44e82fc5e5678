/**
 * Logger Registry
 *
 * Binds the process's log sinks exactly once and hands out named loggers
 * that share them:
 *
 * - `<fileName>`      every record at or above the configured level, JSON lines
 * - `<errorFileName>` ERROR and CRITICAL only, with its own rotation state
 * - console           human-readable, optional
 *
 * There is no way to re-initialize a registry; build a new one instead.
 *
 * @example
 * ```typescript
 * const registry = createLoggerRegistry(loadLoggingConfig());
 * const log = registry.getLogger('api');
 * log.info('server started', { port: 8080 });
 * ```
 *
 * @module logging/registry
 */

import { join } from 'node:path';
import { systemClock, type Clock } from './clock.js';
import type { LoggingConfig } from './config.js';
import { createConsoleSink, type ConsoleStream } from './consoleSink.js';
import { createLogger, type Logger, type LogSink } from './logger.js';
import { createTimestampSource, type LogLevel } from './record.js';
import { createRotatingFileWriter, type RotatingFileWriter } from './rotatingFileWriter.js';
import { ensureWritableDirectory } from '../utils/files.js';

export interface LoggerRegistryOptions {
  clock?: Clock;
  /** Stream for the console sink. Defaults to process.stdout. */
  consoleStream?: ConsoleStream;
  /** Record module/function/line for every record. Defaults to true. */
  captureSource?: boolean;
}

export interface LoggerRegistry {
  readonly config: Readonly<LoggingConfig>;
  readonly sinks: readonly LogSink[];
  readonly mainWriter: RotatingFileWriter;
  readonly errorWriter: RotatingFileWriter;
  getLogger(name: string): Logger;
}

/** Adapts a rotating writer to the sink interface. */
export function createFileSink(writer: RotatingFileWriter, level: LogLevel): LogSink {
  return {
    level,
    write: (record) => writer.append(record),
  };
}

/**
 * @throws ConfigurationError when the log directory cannot be created or written
 */
export function createLoggerRegistry(
  config: LoggingConfig,
  options: LoggerRegistryOptions = {},
): LoggerRegistry {
  ensureWritableDirectory(config.logDir, 'LOG_DIR');

  const policy = { maxBytes: config.maxBytes, backupCount: config.backupCount };
  const mainWriter = createRotatingFileWriter({
    filePath: join(config.logDir, config.fileName),
    ...policy,
  });
  const errorWriter = createRotatingFileWriter({
    filePath: join(config.logDir, config.errorFileName),
    ...policy,
  });

  const sinks: LogSink[] = [createFileSink(mainWriter, 'DEBUG'), createFileSink(errorWriter, 'ERROR')];
  if (config.consoleEnabled) {
    sinks.push(createConsoleSink({ level: config.consoleLevel, stream: options.consoleStream }));
  }

  const timestamps = createTimestampSource(options.clock ?? systemClock);
  const captureSource = options.captureSource ?? true;
  const loggers = new Map<string, Logger>();

  return {
    config,
    sinks,
    mainWriter,
    errorWriter,
    getLogger(name: string): Logger {
      let logger = loggers.get(name);
      if (!logger) {
        logger = createLogger({ name, level: config.level, sinks, timestamps, captureSource });
        loggers.set(name, logger);
      }
      return logger;
    },
  };
}
