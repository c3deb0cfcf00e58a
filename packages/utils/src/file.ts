/**
 * File Operations
 *
 * Thin wrappers over node:fs/promises used by the packaging pipeline.
 * Every copy creates the destination's parent directory first.
 */

import {
  mkdir,
  writeFile,
  readdir,
  rm,
  stat,
  chmod,
  utimes,
  access,
  copyFile as fsCopyFile,
} from 'node:fs/promises';
import { dirname, join } from 'node:path';

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

/**
 * Remove a directory tree; a missing directory is not an error
 */
export async function removeDir(dirPath: string): Promise<void> {
  await rm(dirPath, { recursive: true, force: true });
}

/**
 * Check whether a path exists
 */
export async function pathExists(target: string): Promise<boolean> {
  try {
    await access(target);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check whether a path exists and is a directory
 */
export async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await stat(target)).isDirectory();
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * Safely write a file, ensuring the directory exists
 */
export async function safeWriteFile(
  filePath: string,
  content: string | Buffer
): Promise<void> {
  await ensureDir(dirname(filePath));
  await writeFile(filePath, content, 'utf8');
}

export interface CopyOptions {
  /** Copy the source's access and modification times onto the destination */
  preserveTimestamps?: boolean;
}

/**
 * Copy a file to a new location, replacing any existing file
 */
export async function copyFile(
  source: string,
  destination: string,
  options: CopyOptions = {}
): Promise<void> {
  await ensureDir(dirname(destination));
  await fsCopyFile(source, destination);
  if (options.preserveTimestamps) {
    const stats = await stat(source);
    await utimes(destination, stats.atime, stats.mtime);
  }
}

/**
 * Recursively copy the contents of a directory into another one.
 * Existing files in the destination are overwritten; others are left alone.
 */
export async function copyDirectory(
  source: string,
  destination: string,
  options: CopyOptions = {}
): Promise<string[]> {
  const copied: string[] = [];
  await ensureDir(destination);

  for (const name of await readdir(source)) {
    const from = join(source, name);
    const to = join(destination, name);
    // stat follows symlinks: a linked directory is copied as a directory
    if ((await stat(from)).isDirectory()) {
      copied.push(...await copyDirectory(from, to, options));
    } else {
      await copyFile(from, to, options);
      copied.push(to);
    }
  }

  if (options.preserveTimestamps) {
    const stats = await stat(source);
    await utimes(destination, stats.atime, stats.mtime);
  }
  return copied;
}

/**
 * List the files directly inside a directory (names only), counting
 * symlinks by what they point at
 */
export async function listFiles(dirPath: string): Promise<string[]> {
  const files: string[] = [];
  for (const entry of await readdir(dirPath, { withFileTypes: true })) {
    if (entry.isFile()) {
      files.push(entry.name);
    } else if (entry.isSymbolicLink() && (await stat(join(dirPath, entry.name))).isFile()) {
      files.push(entry.name);
    }
  }
  return files;
}

/**
 * Add execute permission to a file: owner only, or owner, group and others
 */
export async function setExecutable(
  filePath: string,
  ownerOnly: boolean
): Promise<number> {
  const { mode } = await stat(filePath);
  const bits = ownerOnly ? 0o100 : 0o111;
  const updated = (mode & 0o7777) | bits;
  await chmod(filePath, updated);
  return updated;
}
