/**
 * Reads a rotated log stream back in write order: the oldest backup first,
 * the active file last.
 *
 * @module logging/recordReader
 */

import { readdirSync, readFileSync } from 'node:fs';
import { basename, dirname, join } from 'node:path';
import { parseRecord, type LogRecord } from './record.js';
import { isNotFound } from '../utils/files.js';

/** Backup indexes present on disk for `filePath`, highest (oldest) first. */
export function listBackupIndexes(filePath: string): number[] {
  const base = basename(filePath);
  const pattern = new RegExp(`^${base.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')}\\.(\\d+)$`);
  let names: string[];
  try {
    names = readdirSync(dirname(filePath));
  } catch (error) {
    if (isNotFound(error)) return [];
    throw error;
  }
  const indexes: number[] = [];
  for (const name of names) {
    const match = pattern.exec(name);
    if (match && Number(match[1]) > 0) indexes.push(Number(match[1]));
  }
  return indexes.sort((a, b) => b - a);
}

export function readRecordFile(path: string): LogRecord[] {
  let content: string;
  try {
    content = readFileSync(path, 'utf8');
  } catch (error) {
    if (isNotFound(error)) return [];
    throw error;
  }
  return content
    .split('\n')
    .filter((line) => line.length > 0)
    .map(parseRecord);
}

export function readRotatedRecords(filePath: string): LogRecord[] {
  const dir = dirname(filePath);
  const base = basename(filePath);
  const records: LogRecord[] = [];
  for (const index of listBackupIndexes(filePath)) {
    records.push(...readRecordFile(join(dir, `${base}.${index}`)));
  }
  records.push(...readRecordFile(filePath));
  return records;
}
