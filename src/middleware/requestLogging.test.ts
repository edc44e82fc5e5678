import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import express, { type NextFunction, type Request, type Response } from 'express';
import request from 'supertest';
import { createLogger, type LogSink } from '../logging/logger.js';
import { createMemorySink, type MemorySink } from '../logging/memorySink.js';
import { errorLogger, REQUEST_ID_HEADER, requestLogger } from './requestLogging.js';

function buildApp(...sinks: LogSink[]) {
  const logger = createLogger({ name: 'api', level: 'DEBUG', sinks });
  const app = express();
  app.use(requestLogger(logger));
  app.get('/archives', (_req, res) => {
    res.status(201).json({ ok: true });
  });
  app.get('/boom', () => {
    throw new Error('boom');
  });
  app.use(errorLogger(logger));
  app.use((_err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    res.status(500).json({ error: 'internal' });
  });
  return app;
}

describe('requestLogger', () => {
  let sink: MemorySink;

  beforeEach(() => {
    sink = createMemorySink();
  });

  it('should log start and completion with a short request id', async () => {
    const res = await request(buildApp(sink)).get('/archives');

    expect(res.status).toBe(201);
    const requestId = res.headers[REQUEST_ID_HEADER];
    expect(requestId).toMatch(/^[0-9a-f]{8}$/);

    await vi.waitFor(() => expect(sink.records).toHaveLength(2));
    const [started, completed] = sink.records;
    expect(started?.message).toBe('request started');
    expect(started?.attributes).toEqual({ requestId, method: 'GET', path: '/archives' });
    expect(completed?.message).toBe('request completed');
    expect(completed?.attributes).toMatchObject({
      requestId,
      method: 'GET',
      path: '/archives',
      statusCode: 201,
    });
  });

  it('should round the duration to two decimals', async () => {
    await request(buildApp(sink)).get('/archives');
    await vi.waitFor(() => expect(sink.records).toHaveLength(2));

    const duration = sink.records[1]?.attributes['durationMs'];
    expect(typeof duration).toBe('number');
    if (typeof duration === 'number') {
      expect(duration).toBeGreaterThanOrEqual(0);
      expect(Math.round(duration * 100) / 100).toBe(duration);
    }
  });

  it('should reuse an incoming x-request-id', async () => {
    const res = await request(buildApp(sink)).get('/archives').set('X-Request-ID', 'req-test-1');

    expect(res.headers[REQUEST_ID_HEADER]).toBe('req-test-1');
    await vi.waitFor(() => expect(sink.records).toHaveLength(2));
    expect(sink.records.map((r) => r.attributes['requestId'])).toEqual(['req-test-1', 'req-test-1']);
  });
});

describe('errorLogger', () => {
  it('should log the failure at ERROR and pass it on', async () => {
    const sink = createMemorySink();

    const res = await request(buildApp(sink)).get('/boom').set('X-Request-ID', 'req-test-2');

    expect(res.status).toBe(500);
    expect(res.body).toEqual({ error: 'internal' });
    await vi.waitFor(() => expect(sink.records).toHaveLength(3));
    const failed = sink.records.find((r) => r.message === 'request failed');
    expect(failed?.level).toBe('ERROR');
    expect(failed?.attributes).toEqual({ requestId: 'req-test-2', method: 'GET', path: '/boom' });
    expect(failed?.exception?.startsWith('Error: boom')).toBe(true);
    const completed = sink.records.find((r) => r.message === 'request completed');
    expect(completed?.attributes['statusCode']).toBe(500);
  });
});

describe('with a failing sink', () => {
  const diskFull: LogSink = {
    level: 'DEBUG',
    write: () => {
      throw Object.assign(new Error('ENOSPC: no space left on device'), { code: 'ENOSPC' });
    },
  };

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should drop the lines it cannot write and still answer', async () => {
    const warn = vi.spyOn(process, 'emitWarning').mockImplementation(() => undefined);
    const sink = createMemorySink();

    const res = await request(buildApp(sink, diskFull)).get('/archives');

    expect(res.status).toBe(201);
    await vi.waitFor(() => expect(warn).toHaveBeenCalledTimes(2));
    expect(warn).toHaveBeenCalledWith(
      expect.objectContaining({ message: 'ENOSPC: no space left on device' }),
      'RequestLogWarning',
    );
    expect(sink.records.map((r) => r.message)).toEqual(['request started', 'request completed']);
  });

  it('should still hand a route error on when logging it fails', async () => {
    vi.spyOn(process, 'emitWarning').mockImplementation(() => undefined);

    const res = await request(buildApp(createMemorySink(), diskFull)).get('/boom');

    expect(res.status).toBe(500);
    expect(res.body).toEqual({ error: 'internal' });
  });
});
