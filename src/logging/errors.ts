/**
 * Typed errors raised by the logging and archival engine.
 *
 * @module logging/errors
 */

/**
 * Invalid configuration or arguments: bad environment values, negative
 * day counts, unknown archive formats, malformed dates, directories that
 * cannot be created or written. Fatal at startup.
 */
export class ConfigurationError extends Error {
  public readonly code = 'CONFIGURATION_ERROR';

  constructor(
    message: string,
    public readonly setting?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * An append or rotation on a log file was rejected by the filesystem.
 * Surfaced to the caller as-is; the writer never retries.
 */
export class LogWriteError extends Error {
  public readonly code = 'LOG_WRITE_ERROR';

  constructor(
    message: string,
    public readonly filePath: string,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = 'LogWriteError';
  }
}
