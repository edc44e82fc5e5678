/**
 * Request Logging Middleware
 *
 * Express middleware that writes one record when a request starts and one
 * when its response finishes, tagged with a short request id. The id is
 * echoed back in the `x-request-id` header and exposed on
 * `res.locals.requestId`. A failing log sink never fails the request: the
 * line is dropped and reported through `process.emitWarning`.
 *
 * @module middleware/requestLogging
 */

import { randomUUID } from 'node:crypto';
import { performance } from 'node:perf_hooks';
import type { ErrorRequestHandler, Request, RequestHandler } from 'express';
import type { Logger } from '../logging/index.js';

// ── Request ID helper ───────────────────────────────────────────────────────

export const REQUEST_ID_HEADER = 'x-request-id';

function getOrCreateRequestId(req: Request): string {
  const existing = req.headers[REQUEST_ID_HEADER];
  if (typeof existing === 'string' && existing.length > 0) return existing;
  return randomUUID().slice(0, 8);
}

function roundMs(ms: number): number {
  return Math.round(ms * 100) / 100;
}

/**
 * Run a log call whose failure must not reach the request. A line that
 * cannot be written is dropped and surfaced as a process warning.
 */
function logOrDrop(write: () => void): void {
  try {
    write();
  } catch (error) {
    process.emitWarning(error instanceof Error ? error : String(error), 'RequestLogWarning');
  }
}

// ── Request Logger ──────────────────────────────────────────────────────────

export function requestLogger(logger: Logger): RequestHandler {
  return (req, res, next) => {
    const requestId = getOrCreateRequestId(req);
    res.locals['requestId'] = requestId;
    res.setHeader(REQUEST_ID_HEADER, requestId);

    const start = performance.now();
    const method = req.method;
    const path = req.path;
    const child = logger.child({ requestId });
    logOrDrop(() => child.info('request started', { method, path }));

    res.on('finish', () => {
      logOrDrop(() =>
        child.info('request completed', {
          method,
          path,
          statusCode: res.statusCode,
          durationMs: roundMs(performance.now() - start),
        }),
      );
    });

    next();
  };
}

// ── Error Logger ────────────────────────────────────────────────────────────

/**
 * Logs an unhandled route error at ERROR and hands it to the next error
 * handler.
 */
export function errorLogger(logger: Logger): ErrorRequestHandler {
  return (err: unknown, req, res, next) => {
    const requestId: unknown = res.locals['requestId'];
    const attributes = typeof requestId === 'string' ? { requestId } : {};
    logOrDrop(() =>
      logger.error('request failed', err, { ...attributes, method: req.method, path: req.path }),
    );
    next(err);
  };
}
