/**
 * Packager
 *
 * Runs the whole pipeline for one build manifest: select projects,
 * collect dependencies, lay out lib/, generate launchers, copy resources
 * and, on request, archive the result.
 */

import { join } from 'node:path';
import {
  formatModule,
  resolveJarName,
  type BuildManifest,
  type PackSettings,
} from '@jarpack/core';
import {
  collectDependencies,
  selectProjectInputs,
  allPass,
  type DependencyFilter,
  type ResolvedDependencySet,
} from '@jarpack/resolver';
import { relativePath, resolveFrom, createSilentLogger, type Logger } from '@jarpack/utils';
import { buildLayout, copyResourceDirs, markExecutable } from './layout.js';
import {
  generateLaunchers,
  generateMakefile,
  writeVersionFile,
  type GeneratedLauncher,
  type LauncherContext,
} from './launcher.js';
import { createArchive, type ArchiveResult } from './archiver.js';
import {
  MustacheTemplateRenderer,
  resolveTemplatePaths,
  type TemplateRenderer,
} from './templates.js';

export interface PackResult {
  distDir: string;
  projects: string[];
  dependencies: ResolvedDependencySet;
  launchers: GeneratedLauncher[];
}

export interface PackagerOptions {
  renderer?: TemplateRenderer;
  filter?: DependencyFilter;
  logger?: Logger;
}

export interface ResolvedJar {
  module: string;
  source: string;
  fileName: string;
}

export class Packager {
  private readonly renderer: TemplateRenderer;
  private readonly filter: DependencyFilter;
  private readonly logger: Logger;

  constructor(
    private readonly settings: PackSettings,
    options: PackagerOptions = {}
  ) {
    this.renderer = options.renderer ?? new MustacheTemplateRenderer();
    this.filter = options.filter ?? allPass;
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * Dependencies the manifest resolves to and the lib/ file name each gets
   */
  resolve(manifest: BuildManifest): ResolvedJar[] {
    const inputs = selectProjectInputs(manifest, this.settings.exclude);
    const dependencies = collectDependencies(inputs.reports, this.settings.includeClassifiers, this.filter);
    return dependencies.map(({ module, file }) => ({
      module: formatModule(module),
      source: file,
      fileName: resolveJarName(module, this.settings.jarNameConvention),
    }));
  }

  /**
   * Build the pack directory: <targetDir>/<packDir>
   */
  async pack(manifest: BuildManifest): Promise<PackResult> {
    const { settings, logger } = this;
    const baseDir = manifest.baseDir;
    const distDir = join(targetDirOf(manifest), settings.packDir);

    const inputs = selectProjectInputs(manifest, settings.exclude);
    logger.debug({ projects: inputs.projects }, 'selected projects');

    const dependencies = collectDependencies(inputs.reports, settings.includeClassifiers, this.filter);
    logger.info(
      `Creating a distributable package in ${relativePath(baseDir, distDir)} ` +
      `(additional classifiers: [${settings.includeClassifiers.join(', ')}])`
    );

    const layout = await buildLayout({
      distDir,
      baseDir,
      projectJars: inputs.projectJars,
      dependencies,
      unmanagedJars: inputs.unmanagedJars,
      mappings: settings.mappings,
      convention: settings.jarNameConvention,
    }, logger);

    const resourceDirs = settings.resourceDirs.map((dir) => resolveFrom(baseDir, dir));
    const ctx: LauncherContext = {
      distDir,
      baseDir,
      projectName: manifest.name,
      version: manifest.version,
      settings,
      templates: resolveTemplatePaths(settings, baseDir),
      renderer: this.renderer,
      jars: {
        projectJars: inputs.projectJars,
        dependencies,
        unmanagedJars: inputs.unmanagedJars,
        convention: settings.jarNameConvention,
      },
      logger,
    };

    const launchers = await generateLaunchers(ctx);
    await generateMakefile(ctx, resourceDirs);
    await writeVersionFile(ctx);

    const copied = await copyResourceDirs(distDir, resourceDirs, logger);
    logger.info(`packed resource directories = ${copied.map((dir) => relativePath(baseDir, dir)).join(',')}`);

    await markExecutable(layout.binDir, { others: settings.executableByOthers });

    logger.info('done.');
    return { distDir, projects: inputs.projects, dependencies, launchers };
  }

  /**
   * pack, then write <targetDir>/<prefix>-<version>.tar.gz
   */
  async archive(manifest: BuildManifest): Promise<ArchiveResult & { pack: PackResult }> {
    const pack = await this.pack(manifest);
    const result = await createArchive({
      distDir: pack.distDir,
      targetDir: targetDirOf(manifest),
      prefix: this.settings.archivePrefix ?? manifest.name,
      version: manifest.version,
    }, this.logger);
    return { ...result, pack };
  }
}

export function targetDirOf(manifest: BuildManifest): string {
  return resolveFrom(manifest.baseDir, manifest.targetDir ?? 'target');
}
