/**
 * Launcher Generator
 *
 * Renders bin/<program> (and bin/<program>.bat) for every configured
 * program, plus the Makefile and VERSION files at the pack root.
 */

import { basename, join } from 'node:path';
import {
  isDirectory,
  listFiles,
  safeWriteFile,
  stripWhitespace,
  relativePath,
  type Logger,
} from '@jarpack/utils';
import {
  resolveJarName,
  withIO,
  type JarNameConvention,
  type PackSettings,
} from '@jarpack/core';
import type { ResolvedDependencySet } from '@jarpack/resolver';
import type {
  LauncherTemplateVars,
  MakefileTemplateVars,
  TemplatePaths,
  TemplateRenderer,
} from './templates.js';

export const PATH_SEPARATOR = '${PSEP}';
export const WINDOWS_PATH_SEPARATOR = '%PSEP%';
export const PROG_HOME_LIB = '${PROG_HOME}/lib/';

export interface LaunchEntry {
  name: string;
  mainClass: string;
  jvmOpts: readonly string[];
  extraClasspath: readonly string[];
}

export interface ClasspathJars {
  projectJars: readonly string[];
  dependencies: ResolvedDependencySet;
  unmanagedJars: readonly string[];
  convention: JarNameConvention;
}

export interface LauncherContext {
  distDir: string;
  baseDir: string;
  projectName: string;
  version: string;
  settings: PackSettings;
  templates: TemplatePaths;
  renderer: TemplateRenderer;
  jars: ClasspathJars;
  logger: Logger;
}

export interface GeneratedLauncher {
  name: string;
  script: string;
  batFile?: string;
}

export function launchEntries(settings: PackSettings): LaunchEntry[] {
  return Object.entries(settings.main).map(([name, mainClass]) => ({
    name,
    mainClass,
    jvmOpts: settings.jvmOpts[name] ?? [],
    extraClasspath: settings.extraClasspath[name] ?? [],
  }));
}

/**
 * Launcher file name: the program name without whitespace
 */
export function launcherFileName(programName: string): string {
  return stripWhitespace(programName);
}

/**
 * Each entry followed by the separator; empty when there are none
 */
export function buildExtraClasspath(entries: readonly string[], separator: string): string {
  return entries.map((entry) => entry + separator).join('');
}

/**
 * Every jar under ${PROG_HOME}/lib/: project jars, then dependencies in
 * their canonical order, then unmanaged jars, each followed by the separator
 */
export function buildExpandedClasspath(jars: ClasspathJars, separator: string): string {
  const names = [
    ...jars.projectJars.map((jar) => basename(jar)),
    ...jars.dependencies.map((d) => resolveJarName(d.module, jars.convention)),
    ...jars.unmanagedJars.map((jar) => basename(jar)),
  ];
  return names.map((name) => PROG_HOME_LIB + name + separator).join('');
}

/**
 * Rewrite a classpath built for the shell script into batch syntax
 */
export function toWindowsClasspath(classpath: string): string {
  return classpath
    .split(PATH_SEPARATOR).join(WINDOWS_PATH_SEPARATOR)
    .split('${PROG_HOME}').join('%PROG_HOME%')
    .replace(/\//g, '\\');
}

export function formatJvmOpts(opts: readonly string[]): string {
  return opts.map((opt) => `"${opt}"`).join(' ');
}

export async function generateLaunchers(ctx: LauncherContext): Promise<GeneratedLauncher[]> {
  const { settings, logger } = ctx;
  const entries = launchEntries(settings);

  logger.info('Generating launch scripts');
  if (entries.length === 0) {
    logger.warn('No mapping (program name) -> main class is defined. Set "main" in the pack settings.');
    return [];
  }

  const expanded = settings.expandedClasspath
    ? buildExpandedClasspath(ctx.jars, PATH_SEPARATOR)
    : undefined;

  const generated: GeneratedLauncher[] = [];
  for (const entry of entries) {
    logger.info(`main class for ${entry.name}: ${entry.mainClass}`);

    const vars: LauncherTemplateVars = {
      PROG_NAME: entry.name,
      PROG_VERSION: ctx.version,
      MAIN_CLASS: entry.mainClass,
      MAC_ICON_FILE: settings.macIconFile,
      JVM_OPTS: formatJvmOpts(entry.jvmOpts),
      EXTRA_CLASSPATH: buildExtraClasspath(entry.extraClasspath, PATH_SEPARATOR),
      ...(expanded !== undefined ? { EXPANDED_CLASSPATH: expanded } : {}),
    };

    const fileName = launcherFileName(entry.name);
    const script = join(ctx.distDir, 'bin', fileName);
    await writeGenerated(ctx, script, await ctx.renderer.render(ctx.templates.bash, vars));

    const launcher: GeneratedLauncher = { name: entry.name, script };

    if (settings.generateWindowsBatFile) {
      const windowsVars: LauncherTemplateVars = {
        ...vars,
        EXTRA_CLASSPATH: toWindowsClasspath(
          buildExtraClasspath(entry.extraClasspath, WINDOWS_PATH_SEPARATOR)
        ),
        ...(expanded !== undefined
          ? { EXPANDED_CLASSPATH: toWindowsClasspath(buildExpandedClasspath(ctx.jars, WINDOWS_PATH_SEPARATOR)) }
          : {}),
      };
      const batFile = join(ctx.distDir, 'bin', `${fileName}.bat`);
      await writeGenerated(ctx, batFile, await ctx.renderer.render(ctx.templates.bat, windowsVars));
      launcher.batFile = batFile;
    }

    generated.push(launcher);
  }
  return generated;
}

export function symlinkCommand(name: string): string {
  return `\tln -sf "../$(PROG)/current/bin/${name}" "$(PREFIX)/bin/${name}"`;
}

/**
 * Names of the scripts in <resourceDir>/bin of every resource directory
 */
export async function resourceScripts(resourceDirs: readonly string[]): Promise<string[]> {
  const scripts: string[] = [];
  for (const dir of resourceDirs) {
    const binDir = join(dir, 'bin');
    if (await withIO('inspect', binDir, () => isDirectory(binDir))) {
      scripts.push(...await withIO('list', binDir, () => listFiles(binDir)));
    }
  }
  return scripts;
}

export async function generateMakefile(
  ctx: LauncherContext,
  resourceDirs: readonly string[]
): Promise<string> {
  const programs = Object.keys(ctx.settings.main).map(launcherFileName);
  const additional = await resourceScripts(resourceDirs);
  const vars: MakefileTemplateVars = {
    PROG_NAME: ctx.projectName,
    PROG_SYMLINK: [...programs, ...additional].map(symlinkCommand).join('\n'),
  };
  const makefile = join(ctx.distDir, 'Makefile');
  await writeGenerated(ctx, makefile, await ctx.renderer.render(ctx.templates.makefile, vars));
  return makefile;
}

export async function writeVersionFile(ctx: LauncherContext): Promise<string> {
  const file = join(ctx.distDir, 'VERSION');
  await writeGenerated(ctx, file, `version:=${ctx.version}\n`);
  return file;
}

async function writeGenerated(ctx: LauncherContext, path: string, content: string): Promise<void> {
  ctx.logger.info(`Generating ${relativePath(ctx.baseDir, path)}`);
  await withIO('write', path, () => safeWriteFile(path, content));
}
