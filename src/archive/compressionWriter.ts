/**
 * Streaming Archive Writers
 *
 * Both writers stream into `<target>.partial`, fsync it, then rename it to
 * `<target>`. An archive that exists under its final name is therefore
 * complete and on disk; a crash leaves at most a `.partial` file behind.
 *
 * @module archive/compressionWriter
 */

import { createReadStream, createWriteStream } from 'node:fs';
import { open, rename, rm, stat, type FileHandle } from 'node:fs/promises';
import { pipeline } from 'node:stream/promises';
import { createGzip } from 'node:zlib';
import archiver from 'archiver';
import { PARTIAL_SUFFIX } from './naming.js';
import { fsyncFile, isNotFound } from '../utils/files.js';

export interface ZipSource {
  /** File to read. */
  path: string;
  /** Entry name inside the archive. */
  name: string;
}

export interface ZipSourceError {
  source: ZipSource;
  error: unknown;
}

export interface ZipWriteResult {
  /** Entry names actually written. */
  written: string[];
  /** Entry names whose source disappeared before it could be opened. */
  missing: string[];
  /** Sources that could not be opened for another reason. */
  unreadable: ZipSourceError[];
  /** Size of the finished archive; 0 when nothing was written. */
  sizeBytes: number;
}

async function commit(partial: string, target: string): Promise<number> {
  await fsyncFile(partial);
  await rename(partial, target);
  return (await stat(target)).size;
}

/**
 * Write `sources` into a deflated zip at `target`.
 *
 * Each source is opened before it is queued. A source that is already gone
 * lands in `missing`, one that cannot be opened lands in `unreadable`, and
 * neither stops the others. Once open, a source stays readable even if it
 * is unlinked mid-write. If nothing could be opened, no archive is created.
 */
export async function writeZipArchive(target: string, sources: ZipSource[]): Promise<ZipWriteResult> {
  const missing: string[] = [];
  const unreadable: ZipSourceError[] = [];
  const opened: Array<{ source: ZipSource; handle: FileHandle }> = [];
  for (const source of sources) {
    try {
      opened.push({ source, handle: await open(source.path, 'r') });
    } catch (error) {
      if (isNotFound(error)) missing.push(source.name);
      else unreadable.push({ source, error });
    }
  }
  if (opened.length === 0) return { written: [], missing, unreadable, sizeBytes: 0 };

  const partial = `${target}${PARTIAL_SUFFIX}`;
  const archive = archiver('zip', { zlib: { level: 9 } });
  const written: string[] = [];
  archive.on('entry', (entry) => {
    written.push(entry.name);
  });

  try {
    const done = pipeline(archive, createWriteStream(partial));
    for (const { source, handle } of opened) {
      archive.append(handle.createReadStream(), { name: source.name });
    }
    await Promise.all([archive.finalize(), done]);
    return { written, missing, unreadable, sizeBytes: await commit(partial, target) };
  } catch (error) {
    await rm(partial, { force: true });
    throw error;
  } finally {
    // Streams close their handles on end; this covers an aborted write.
    await Promise.all(opened.map(({ handle }) => handle.close()));
  }
}

/**
 * Gzip one file to `target`. Rejects with ENOENT when the source is gone.
 */
export async function writeGzipFile(source: string, target: string): Promise<number> {
  const partial = `${target}${PARTIAL_SUFFIX}`;
  try {
    await pipeline(createReadStream(source), createGzip({ level: 9 }), createWriteStream(partial));
    return await commit(partial, target);
  } catch (error) {
    await rm(partial, { force: true });
    throw error;
  }
}
