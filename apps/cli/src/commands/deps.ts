/**
 * Deps Command
 *
 * Show the resolved dependencies and their file names in lib/.
 */

import chalk from 'chalk';
import type { Command } from 'commander';
import { Packager } from '@jarpack/packaging';
import { loadManifest, loadSettings } from '../config/index.js';
import { createCliLogger } from '../lib/logger.js';
import { printHeader, printInfo, printJson, reportFailure } from '../lib/output.js';
import { globalFlags, type PackCommandOptions } from './options.js';

export async function depsCommand(options: PackCommandOptions, command: Command): Promise<void> {
  try {
    const manifest = await loadManifest(options.manifest);
    const settings = await loadSettings(options.config);
    const packager = new Packager(settings, { logger: createCliLogger(globalFlags(command)) });
    const jars = packager.resolve(manifest);

    if (options.json) {
      printJson(jars);
      return;
    }

    printHeader(`Dependencies (${settings.jarNameConvention} names)`);
    if (jars.length === 0) {
      printInfo('No runtime dependencies');
      return;
    }
    for (const jar of jars) {
      console.log(`  ${jar.module} ${chalk.gray('->')} ${chalk.cyan(`lib/${jar.fileName}`)}`);
    }
  } catch (error) {
    reportFailure(error);
  }
}
