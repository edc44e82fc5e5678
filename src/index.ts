/**
 * logvault – Entry Point
 *
 * Re-exports the logging and archival modules and the HTTP request
 * logging middleware.
 *
 * @module logvault
 */

// ─── Logging ───
export * from './logging/index.js';

// ─── Archival ───
export * from './archive/index.js';

// ─── Middleware ───
export { requestLogger, errorLogger } from './middleware/requestLogging.js';
