import { describe, it, expect, beforeEach } from 'vitest';
import { createFixedClock } from './clock.js';
import { createLogger, createSilentLogger, formatException, type LogSink } from './logger.js';
import { createMemorySink, type MemorySink } from './memorySink.js';
import { serializeRecord } from './record.js';

const START = new Date(Date.UTC(2024, 5, 15, 12, 0, 0));

describe('Logger', () => {
  let sink: MemorySink;

  beforeEach(() => {
    sink = createMemorySink('DEBUG');
  });

  // ─── Record Fields ─────────────────────────────────────────────────────

  describe('record fields', () => {
    it('should fill timestamp, level, logger name and message', () => {
      const logger = createLogger({ name: 'api', sinks: [sink], clock: createFixedClock(START) });

      logger.info('server started', { port: 8080 });

      expect(sink.records).toEqual([
        {
          timestamp: '2024-06-15T12:00:00.000000Z',
          level: 'INFO',
          logger: 'api',
          message: 'server started',
          source: { module: null, function: null, line: null },
          attributes: { port: 8080 },
        },
      ]);
    });

    it('should merge bound attributes under call-site attributes', () => {
      const logger = createLogger({
        name: 'api',
        sinks: [sink],
        attributes: { service: 'billing', region: 'eu' },
      });

      logger.info('hello', { region: 'us' });

      expect(sink.records[0]?.attributes).toEqual({ service: 'billing', region: 'us' });
    });

    it('should keep reserved fields out of reach of attributes', () => {
      const logger = createLogger({ name: 'api', sinks: [sink], clock: createFixedClock(START) });

      logger.warning('disk almost full', { level: 'DEBUG', logger: 'spoof', pct: 91 });

      const parsed = JSON.parse(serializeRecord(sink.records[0] ?? expect.fail('no record')));
      expect(parsed.level).toBe('WARNING');
      expect(parsed.logger).toBe('api');
      expect(parsed.pct).toBe(91);
    });
  });

  // ─── Level Filtering ───────────────────────────────────────────────────

  describe('level filtering', () => {
    it('should drop records below the logger level', () => {
      const logger = createLogger({ name: 'api', level: 'WARNING', sinks: [sink] });

      logger.debug('d');
      logger.info('i');
      logger.warning('w');
      logger.error('e');

      expect(sink.records.map((r) => r.level)).toEqual(['WARNING', 'ERROR']);
    });

    it('should default to INFO', () => {
      const logger = createLogger({ name: 'api', sinks: [sink] });

      logger.debug('hidden');
      logger.info('shown');

      expect(sink.records.map((r) => r.message)).toEqual(['shown']);
    });

    it('should route each record only to sinks whose level admits it', () => {
      const errors = createMemorySink('ERROR');
      const logger = createLogger({ name: 'api', level: 'DEBUG', sinks: [sink, errors] });

      logger.debug('d');
      logger.error('e');
      logger.critical('c');

      expect(sink.records.map((r) => r.message)).toEqual(['d', 'e', 'c']);
      expect(errors.records.map((r) => r.message)).toEqual(['e', 'c']);
    });
  });

  // ─── Exceptions ────────────────────────────────────────────────────────

  describe('exceptions', () => {
    it('should attach the stack of an Error on error()', () => {
      const logger = createLogger({ name: 'api', sinks: [sink] });
      const failure = new Error('boom');

      logger.error('request failed', failure);

      expect(sink.records[0]?.exception).toBe(failure.stack);
      expect(sink.records[0]?.exception?.startsWith('Error: boom')).toBe(true);
    });

    it('should stringify thrown non-Error values', () => {
      const logger = createLogger({ name: 'api', sinks: [sink] });

      logger.critical('unexpected', 'disk on fire');

      expect(sink.records[0]?.exception).toBe('disk on fire');
    });

    it('should leave exception unset when no error is given', () => {
      const logger = createLogger({ name: 'api', sinks: [sink] });

      logger.error('plain failure', undefined, { code: 'E1' });

      expect(sink.records[0]?.exception).toBeUndefined();
      expect(sink.records[0]?.attributes).toEqual({ code: 'E1' });
    });

    it('formatException should fall back to name and message without a stack', () => {
      const failure = new TypeError('bad input');
      failure.stack = undefined;
      expect(formatException(failure)).toBe('TypeError: bad input');
    });
  });

  // ─── Sink Failures ─────────────────────────────────────────────────────

  describe('sink failures', () => {
    it('should deliver to every sink and rethrow the first failure', () => {
      const first = new Error('first sink down');
      const failing = (error: Error): LogSink => ({
        level: 'DEBUG',
        write: () => {
          throw error;
        },
      });
      const logger = createLogger({
        name: 'api',
        sinks: [failing(first), sink, failing(new Error('second sink down'))],
      });

      expect(() => logger.info('still delivered')).toThrow(first);
      expect(sink.records.map((r) => r.message)).toEqual(['still delivered']);
    });
  });

  // ─── Child Loggers ─────────────────────────────────────────────────────

  describe('child', () => {
    it('should add attributes and keep name, level and sinks', () => {
      const logger = createLogger({
        name: 'api',
        level: 'WARNING',
        sinks: [sink],
        attributes: { service: 'billing' },
      });
      const child = logger.child({ requestId: 'a1b2c3d4' });

      child.info('hidden');
      child.warning('slow request');

      expect(child.name).toBe('api');
      expect(sink.records).toHaveLength(1);
      expect(sink.records[0]?.attributes).toEqual({ service: 'billing', requestId: 'a1b2c3d4' });
    });

    it('should share the timestamp sequence with its parent', () => {
      const logger = createLogger({ name: 'api', sinks: [sink], clock: createFixedClock(START) });

      logger.info('parent');
      logger.child({ requestId: 'r' }).info('child');

      expect(sink.records.map((r) => r.timestamp)).toEqual([
        '2024-06-15T12:00:00.000000Z',
        '2024-06-15T12:00:00.000001Z',
      ]);
    });
  });

  // ─── Call Sites ────────────────────────────────────────────────────────

  describe('source capture', () => {
    it('should record the calling function when enabled', () => {
      const logger = createLogger({ name: 'api', sinks: [sink], captureSource: true });
      function handleRequest() {
        logger.info('handled');
      }

      handleRequest();

      expect(sink.records[0]?.source.function).toBe('handleRequest');
      expect(sink.records[0]?.source.module).toBe('logger.test');
    });

    it('should leave the source empty by default', () => {
      const logger = createLogger({ name: 'api', sinks: [sink] });
      logger.info('x');
      expect(sink.records[0]?.source).toEqual({ module: null, function: null, line: null });
    });
  });

  it('createSilentLogger should accept every call without output', () => {
    const logger = createSilentLogger();
    expect(() => {
      logger.info('nothing');
      logger.error('nothing', new Error('ignored'));
    }).not.toThrow();
    expect(logger.name).toBe('silent');
  });
});
