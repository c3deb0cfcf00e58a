/**
 * Archive Command
 *
 * Build the distributable directory and archive it as tar.gz.
 */

import ora from 'ora';
import type { Command } from 'commander';
import { Packager } from '@jarpack/packaging';
import { formatBytes, formatDuration, relativePath } from '@jarpack/utils';
import { loadManifest, loadSettings } from '../config/index.js';
import { createCliLogger } from '../lib/logger.js';
import { printJson, printKeyValue, printSuccess, reportFailure } from '../lib/output.js';
import { globalFlags, type PackCommandOptions } from './options.js';

export async function archiveCommand(options: PackCommandOptions, command: Command): Promise<void> {
  const spinner = ora('Creating archive...').start();
  const started = Date.now();

  try {
    const manifest = await loadManifest(options.manifest);
    const settings = await loadSettings(options.config);
    const packager = new Packager(settings, { logger: createCliLogger(globalFlags(command)) });

    const result = await packager.archive(manifest);
    spinner.stop();

    if (options.json) {
      printJson({
        archivePath: result.archivePath,
        size: result.size,
        entries: result.entries,
      });
      return;
    }

    printKeyValue('Archive', relativePath(process.cwd(), result.archivePath));
    printKeyValue('Entries', result.entries.length);
    printKeyValue('Size', formatBytes(result.size));
    console.log();
    printSuccess(`Archived in ${formatDuration(Date.now() - started)}`);
  } catch (error) {
    spinner.fail('Archiving failed');
    reportFailure(error);
  }
}
