import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, readFileSync, rmSync, statSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { ConfigurationError, LogWriteError } from './errors.js';
import { readRecordFile, readRotatedRecords } from './recordReader.js';
import { serializeRecord, type LogRecord } from './record.js';
import {
  backupPath,
  createRotatingFileWriter,
  DEFAULT_ROTATION_POLICY,
} from './rotatingFileWriter.js';
import { createInventoryReporter } from '../archive/inventory.js';
import { createTempDir, type TempDir } from '../test/fsHelpers.js';

function record(message: string): LogRecord {
  return {
    timestamp: '2024-06-15T12:00:00.000000Z',
    level: 'INFO',
    logger: 'api',
    message,
    source: { module: 'server', function: 'handle', line: 1 },
    attributes: {},
  };
}

describe('RotatingFileWriter', () => {
  let tmp: TempDir;
  let filePath: string;

  beforeEach(() => {
    tmp = createTempDir();
    filePath = join(tmp.path, 'app.json.log');
  });

  afterEach(() => {
    tmp.cleanup();
  });

  it('should default to 10 MiB and 30 backups', () => {
    const writer = createRotatingFileWriter({ filePath });
    expect(writer.policy).toEqual({ maxBytes: 10485760, backupCount: 30 });
    expect(DEFAULT_ROTATION_POLICY).toEqual(writer.policy);
  });

  it('should append one JSON line per record', () => {
    const writer = createRotatingFileWriter({ filePath });
    writer.append(record('first'));
    writer.append(record('second'));

    expect(readFileSync(filePath, 'utf8')).toBe(
      `${serializeRecord(record('first'))}\n${serializeRecord(record('second'))}\n`,
    );
    expect(writer.rotationCount()).toBe(0);
  });

  it('should rotate exactly once for 101 records of ~100 KB at the default policy', async () => {
    // Pad the message so that 100 lines reach 10 MiB but 99 do not.
    const lineLength = 105_000;
    const overhead = serializeRecord(record('')).length + 1;
    const message = 'x'.repeat(lineLength - overhead);
    const line = `${serializeRecord(record(message))}\n`;
    expect(line.length).toBe(lineLength);
    expect(100 * lineLength).toBeGreaterThanOrEqual(10485760);
    expect(99 * lineLength).toBeLessThan(10485760);

    const writer = createRotatingFileWriter({ filePath });
    for (let i = 0; i < 101; i++) writer.append(record(message));

    expect(writer.rotationCount()).toBe(1);
    expect(readRecordFile(filePath)).toHaveLength(1);
    expect(readRecordFile(backupPath(filePath, 1))).toHaveLength(100);
    expect(existsSync(backupPath(filePath, 2))).toBe(false);
    expect(statSync(backupPath(filePath, 1)).size).toBe(100 * lineLength);

    const stats = await createInventoryReporter().getStats(tmp.path, join(tmp.path, 'archive'));
    expect(stats.logs.fileCount).toBe(2);
    expect(stats.logs.totalBytes).toBe(101 * lineLength);
  });

  it('should shift backups and discard the oldest past backupCount', () => {
    const writer = createRotatingFileWriter({ filePath, maxBytes: 1, backupCount: 3 });
    for (const message of ['m1', 'm2', 'm3', 'm4', 'm5']) writer.append(record(message));

    expect(writer.rotationCount()).toBe(5);
    expect(readRecordFile(backupPath(filePath, 1)).map((r) => r.message)).toEqual(['m5']);
    expect(readRecordFile(backupPath(filePath, 2)).map((r) => r.message)).toEqual(['m4']);
    expect(readRecordFile(backupPath(filePath, 3)).map((r) => r.message)).toEqual(['m3']);
    expect(existsSync(backupPath(filePath, 4))).toBe(false);
    expect(readFileSync(filePath, 'utf8')).toBe('');
    expect(readRotatedRecords(filePath).map((r) => r.message)).toEqual(['m3', 'm4', 'm5']);
  });

  it('should rotate only after the record that reaches the ceiling', () => {
    const lineLength = serializeRecord(record('ab')).length + 1;
    const writer = createRotatingFileWriter({
      filePath,
      maxBytes: lineLength * 2,
      backupCount: 2,
    });

    writer.append(record('ab'));
    expect(writer.rotationCount()).toBe(0);
    writer.append(record('cd'));
    expect(writer.rotationCount()).toBe(1);
    writer.append(record('ef'));

    expect(readRecordFile(backupPath(filePath, 1)).map((r) => r.message)).toEqual(['ab', 'cd']);
    expect(readRecordFile(filePath).map((r) => r.message)).toEqual(['ef']);
  });

  it('should tolerate gaps in the backup sequence', () => {
    writeFileSync(backupPath(filePath, 2), `${serializeRecord(record('old'))}\n`);
    const writer = createRotatingFileWriter({ filePath, maxBytes: 1, backupCount: 3 });

    writer.append(record('new'));

    expect(readRecordFile(backupPath(filePath, 1)).map((r) => r.message)).toEqual(['new']);
    expect(readRecordFile(backupPath(filePath, 3)).map((r) => r.message)).toEqual(['old']);
    expect(existsSync(backupPath(filePath, 2))).toBe(false);
  });

  it('should never rotate when maxBytes is 0', () => {
    const writer = createRotatingFileWriter({ filePath, maxBytes: 0, backupCount: 3 });
    for (let i = 0; i < 5; i++) writer.append(record(`m${i}`));

    expect(writer.rotationCount()).toBe(0);
    expect(readRecordFile(filePath)).toHaveLength(5);
    expect(existsSync(backupPath(filePath, 1))).toBe(false);
  });

  it('should never rotate when backupCount is 0, even on request', () => {
    const writer = createRotatingFileWriter({ filePath, maxBytes: 1, backupCount: 0 });
    writer.append(record('a'));
    writer.append(record('b'));
    writer.rotate();

    expect(writer.rotationCount()).toBe(0);
    expect(readRecordFile(filePath).map((r) => r.message)).toEqual(['a', 'b']);
  });

  it('should roll over on an explicit rotate()', () => {
    const writer = createRotatingFileWriter({ filePath });
    writer.append(record('before'));
    writer.rotate();
    writer.append(record('after'));

    expect(writer.rotationCount()).toBe(1);
    expect(readRotatedRecords(filePath).map((r) => r.message)).toEqual(['before', 'after']);
  });

  it('should start a fresh file when the active one is removed externally', () => {
    const writer = createRotatingFileWriter({ filePath });
    writer.append(record('one'));
    rmSync(filePath);
    writer.append(record('two'));

    expect(readRecordFile(filePath).map((r) => r.message)).toEqual(['two']);
  });

  it.each([
    [{ maxBytes: -1 }, 'maxBytes'],
    [{ maxBytes: 1.5 }, 'maxBytes'],
    [{ backupCount: -3 }, 'backupCount'],
  ])('should reject policy %j', (policy, setting) => {
    expect(() => createRotatingFileWriter({ filePath, ...policy })).toThrow(ConfigurationError);
    expect(() => createRotatingFileWriter({ filePath, ...policy })).toThrow(setting);
  });

  it('should raise LogWriteError when the file cannot be written', () => {
    const writer = createRotatingFileWriter({ filePath: join(tmp.path, 'missing', 'app.log') });
    try {
      writer.append(record('lost'));
      expect.fail('expected append to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(LogWriteError);
      expect(error).toMatchObject({
        code: 'LOG_WRITE_ERROR',
        filePath: join(tmp.path, 'missing', 'app.log'),
      });
    }
  });
});
