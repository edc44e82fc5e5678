/**
 * Logging Module
 *
 * Structured JSON logging with size-based rotation, an ERROR-only file
 * and a human-readable console sink.
 */

export {
  type Clock,
  type FixedClock,
  type FileStat,
  type FileStatProvider,
  systemClock,
  createFixedClock,
  nodeFileStatProvider,
  MS_PER_DAY,
  toLocalDateString,
  parseDateString,
  yesterday,
} from './clock.js';

export { ConfigurationError, LogWriteError } from './errors.js';

export {
  LOG_LEVELS,
  type LogLevel,
  LOG_LEVEL_PRIORITY,
  isLogLevel,
  isLevelEnabled,
  type LogAttributeValue,
  type LogAttributes,
  type SourceLocation,
  type LogRecord,
  type TimestampSource,
  UNKNOWN_SOURCE,
  RESERVED_KEYS,
  formatTimestamp,
  createTimestampSource,
  serializeRecord,
  parseRecord,
} from './record.js';

export {
  type LogSink,
  type Logger,
  type LoggerOptions,
  formatException,
  createLogger,
  createSilentLogger,
} from './logger.js';

export {
  type RotationPolicy,
  type RotatingFileWriterOptions,
  type RotatingFileWriter,
  DEFAULT_ROTATION_POLICY,
  backupPath,
  createRotatingFileWriter,
} from './rotatingFileWriter.js';

export { listBackupIndexes, readRecordFile, readRotatedRecords } from './recordReader.js';

export { type MemorySink, createMemorySink } from './memorySink.js';

export {
  type ConsoleStream,
  type ConsoleSinkOptions,
  formatConsoleLine,
  createConsoleSink,
} from './consoleSink.js';

export { type LoggingConfig, type Env, loadLoggingConfig } from './config.js';

export {
  type LoggerRegistryOptions,
  type LoggerRegistry,
  createFileSink,
  createLoggerRegistry,
} from './registry.js';
