/**
 * Layout Builder
 *
 * Creates the pack directory and fills lib/ and the mapped extra files.
 * Every run starts from an empty directory.
 */

import { basename, join } from 'node:path';
import {
  copyDirectory,
  copyFile,
  ensureDir,
  isDirectory,
  listFiles,
  removeDir,
  setExecutable,
  resolveFrom,
  relativePath,
  type Logger,
} from '@jarpack/utils';
import {
  formatModule,
  resolveJarName,
  withIO,
  type JarNameConvention,
  type PackMapping,
} from '@jarpack/core';
import type { ResolvedDependencySet } from '@jarpack/resolver';

export interface LayoutPaths {
  distDir: string;
  libDir: string;
  binDir: string;
}

export interface LayoutInput {
  distDir: string;
  /** Base for relative mapping sources and log output */
  baseDir: string;
  projectJars: readonly string[];
  dependencies: ResolvedDependencySet;
  unmanagedJars: readonly string[];
  mappings: readonly PackMapping[];
  convention: JarNameConvention;
}

export function layoutPaths(distDir: string): LayoutPaths {
  return {
    distDir,
    libDir: join(distDir, 'lib'),
    binDir: join(distDir, 'bin'),
  };
}

export async function buildLayout(input: LayoutInput, logger: Logger): Promise<LayoutPaths> {
  const paths = layoutPaths(input.distDir);
  const rel = (p: string): string => relativePath(input.baseDir, p);

  await withIO('remove', input.distDir, () => removeDir(input.distDir));
  await withIO('create', paths.libDir, () => ensureDir(paths.libDir));
  await withIO('create', paths.binDir, () => ensureDir(paths.binDir));

  logger.info({ libDir: rel(paths.libDir) }, 'Copying libraries');

  logger.info(`project jars:\n${input.projectJars.map(rel).join('\n')}`);
  for (const jar of input.projectJars) {
    await copyInto(jar, join(paths.libDir, basename(jar)), logger);
  }

  logger.info(`project dependencies:\n${input.dependencies.map((d) => formatModule(d.module)).join('\n')}`);
  for (const { module, file } of input.dependencies) {
    await copyInto(file, join(paths.libDir, resolveJarName(module, input.convention)), logger);
  }

  logger.info(`unmanaged dependencies:\n${input.unmanagedJars.map(rel).join('\n')}`);
  for (const jar of input.unmanagedJars) {
    await copyInto(jar, join(paths.libDir, basename(jar)), logger);
  }

  if (input.mappings.length > 0) {
    logger.info(`explicit dependencies:\n${input.mappings.map((m) => m.file).join('\n')}`);
  }
  for (const mapping of input.mappings) {
    await copyInto(resolveFrom(input.baseDir, mapping.file), join(input.distDir, mapping.path), logger);
  }

  return paths;
}

async function copyInto(source: string, destination: string, logger: Logger): Promise<void> {
  logger.debug({ source, destination }, 'copy');
  await withIO('copy', source, () => copyFile(source, destination));
}

/**
 * Copy each existing resource directory into the pack directory,
 * overwriting and keeping modification times. Returns the directories
 * that were actually copied.
 */
export async function copyResourceDirs(
  distDir: string,
  resourceDirs: readonly string[],
  logger: Logger
): Promise<string[]> {
  const copied: string[] = [];
  for (const dir of resourceDirs) {
    if (!(await withIO('inspect', dir, () => isDirectory(dir)))) {
      logger.debug({ dir }, 'resource directory not found, skipping');
      continue;
    }
    const files = await withIO('copy', dir, () =>
      copyDirectory(dir, distDir, { preserveTimestamps: true })
    );
    logger.debug({ dir, files: files.length }, 'copied resources');
    copied.push(dir);
  }
  return copied;
}

/**
 * chmod +x every file directly inside bin/
 */
export async function markExecutable(
  binDir: string,
  options: { others: boolean }
): Promise<string[]> {
  const names = await withIO('list', binDir, () => listFiles(binDir));
  for (const name of names) {
    const file = join(binDir, name);
    await withIO('chmod', file, () => setExecutable(file, !options.others));
  }
  return names;
}
