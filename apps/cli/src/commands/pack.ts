/**
 * Pack Command
 *
 * Build the distributable directory.
 */

import ora from 'ora';
import type { Command } from 'commander';
import { Packager } from '@jarpack/packaging';
import { formatDuration, relativePath } from '@jarpack/utils';
import { loadManifest, loadSettings } from '../config/index.js';
import { createCliLogger } from '../lib/logger.js';
import { printHeader, printJson, printKeyValue, printSuccess, reportFailure } from '../lib/output.js';
import { globalFlags, type PackCommandOptions } from './options.js';

export async function packCommand(options: PackCommandOptions, command: Command): Promise<void> {
  const spinner = ora('Creating distributable package...').start();
  const started = Date.now();

  try {
    const manifest = await loadManifest(options.manifest);
    const settings = await loadSettings(options.config);
    const packager = new Packager(settings, { logger: createCliLogger(globalFlags(command)) });

    const result = await packager.pack(manifest);
    spinner.stop();

    if (options.json) {
      printJson({
        distDir: result.distDir,
        projects: result.projects,
        dependencies: result.dependencies.length,
        launchers: result.launchers,
      });
      return;
    }

    printHeader('Package');
    printKeyValue('Directory', relativePath(process.cwd(), result.distDir));
    printKeyValue('Projects', result.projects.join(', '));
    printKeyValue('Dependencies', result.dependencies.length);
    printKeyValue('Launchers', result.launchers.map((l) => l.name).join(', ') || '(none)');
    console.log();
    printSuccess(`Packed in ${formatDuration(Date.now() - started)}`);
  } catch (error) {
    spinner.fail('Packaging failed');
    reportFailure(error);
  }
}
