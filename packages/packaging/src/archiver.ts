/**
 * Archiver
 *
 * Streams a finished pack directory into <prefix>-<version>.tar.gz.
 * Every entry sits under a "<prefix>-<version>/" directory, is owned by
 * 0:0 with empty user and group names, and everything under bin/ gets
 * mode 0755 whatever its mode on disk. Top-level Makefile and VERSION
 * stay out of the archive.
 */

import { createReadStream, type Stats } from 'node:fs';
import { lstat, open, readdir, readlink, stat, type FileHandle } from 'node:fs/promises';
import { join } from 'node:path';
import { pipeline } from 'node:stream/promises';
import { constants, createGzip } from 'node:zlib';
import { pack as createTarPack, type Headers, type Pack } from 'tar-stream';
import { ensureDir, type Logger } from '@jarpack/utils';
import { ArchiveError } from '@jarpack/core';

export const EXCLUDED_ROOT_FILES: ReadonlySet<string> = new Set(['Makefile', 'VERSION']);
export const BIN_MODE = 0o755;

const COPY_BUFFER_SIZE = 1024 * 1024;

export interface ArchiveOptions {
  distDir: string;
  targetDir: string;
  prefix: string;
  version: string;
  /** Sort siblings by name so the listing does not depend on the filesystem */
  sort?: boolean;
}

export interface ArchiveResult {
  archivePath: string;
  /** Entry names in the order they were written */
  entries: string[];
  size: number;
}

export function archiveStem(prefix: string, version: string): string {
  return `${prefix}-${version}`;
}

function isUnderBin(relative: string): boolean {
  return relative === 'bin' || relative.startsWith('bin/');
}

function normalizedHeader(
  name: string,
  stats: Stats,
  relative: string
): Headers {
  return {
    name,
    mode: isUnderBin(relative) ? BIN_MODE : stats.mode & 0o7777,
    mtime: stats.mtime,
    uid: 0,
    gid: 0,
    uname: '',
    gname: '',
  };
}

export async function createArchive(options: ArchiveOptions, logger: Logger): Promise<ArchiveResult> {
  const stem = archiveStem(options.prefix, options.version);
  const archivePath = join(options.targetDir, `${stem}.tar.gz`);
  const sort = options.sort ?? true;
  const entries: string[] = [];

  logger.info({ archivePath }, 'Generating archive');

  const handle = await openArchive(archivePath, options.targetDir);
  const tar = createTarPack();
  const gzip = createGzip({ level: constants.Z_BEST_COMPRESSION });
  // Settles with the write-side error, if any, so it is never left unhandled
  const written = pipeline(gzip, handle.createWriteStream()).then(
    () => undefined,
    (error: unknown) => new ArchiveError(archivePath, error)
  );
  tar.pipe(gzip);

  const add = async (absolute: string, relative: string): Promise<void> => {
    const stats = await lstat(absolute);
    const name = `${stem}/${relative}`;

    if (stats.isDirectory()) {
      await addEntry(tar, { ...normalizedHeader(`${name}/`, stats, relative), type: 'directory' });
      entries.push(`${name}/`);
      await addChildren(absolute, relative);
    } else if (stats.isSymbolicLink()) {
      const linkname = await readlink(absolute);
      await addEntry(tar, { ...normalizedHeader(name, stats, relative), type: 'symlink', linkname });
      entries.push(name);
    } else if (stats.isFile()) {
      await addFileEntry(tar, { ...normalizedHeader(name, stats, relative), type: 'file', size: stats.size }, absolute);
      entries.push(name);
    } else {
      logger.warn({ path: absolute }, 'skipping special file');
    }
  };

  const addChildren = async (dir: string, relative: string): Promise<void> => {
    const names = await readdir(dir);
    if (sort) {
      names.sort();
    }
    for (const child of names) {
      if (relative === '' && EXCLUDED_ROOT_FILES.has(child)) continue;
      const childRelative = relative === '' ? child : `${relative}/${child}`;
      await add(join(dir, child), childRelative);
    }
  };

  try {
    const root = await stat(options.distDir);
    await addEntry(tar, {
      name: `${stem}/`,
      type: 'directory',
      mode: BIN_MODE,
      mtime: root.mtime,
      uid: 0,
      gid: 0,
      uname: '',
      gname: '',
    });
    entries.push(`${stem}/`);
    await addChildren(options.distDir, '');
    tar.finalize();
    const writeError = await written;
    if (writeError) {
      throw writeError;
    }
  } catch (error) {
    tar.destroy();
    gzip.destroy();
    await written;
    throw error instanceof ArchiveError ? error : new ArchiveError(archivePath, error);
  }

  const { size } = await stat(archivePath);
  logger.info({ archivePath, entries: entries.length, size }, 'Archive written');
  return { archivePath, entries, size };
}

async function openArchive(archivePath: string, targetDir: string): Promise<FileHandle> {
  try {
    await ensureDir(targetDir);
    return await open(archivePath, 'w');
  } catch (error) {
    throw new ArchiveError(archivePath, error);
  }
}

function addEntry(tar: Pack, header: Headers): Promise<void> {
  return new Promise((resolve, reject) => {
    tar.entry(header, (error) => (error ? reject(error) : resolve()));
  });
}

function addFileEntry(tar: Pack, header: Headers, source: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const entry = tar.entry(header, (error) => (error ? reject(error) : resolve()));
    const input = createReadStream(source, { highWaterMark: COPY_BUFFER_SIZE });
    input.on('error', (error) => {
      entry.destroy(error);
      reject(error);
    });
    input.pipe(entry);
  });
}
