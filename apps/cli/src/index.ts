#!/usr/bin/env -S node --import tsx
/**
 * CLI Entry Point
 *
 * Reads a build manifest produced by the build system and packages it.
 */

import { Command } from 'commander';
import chalk from 'chalk';

import { packCommand } from './commands/pack.js';
import { archiveCommand } from './commands/archive.js';
import { depsCommand } from './commands/deps.js';

const program = new Command();

program
  .name('jarpack')
  .description('Package jars, launch scripts and resources into a distributable tar.gz')
  .version('0.1.0')
  .option('--verbose', 'Log each packaging step')
  .option('--debug', 'Enable debug output');

program
  .command('pack')
  .description('Create the distributable directory (<targetDir>/<packDir>)')
  .requiredOption('-m, --manifest <file>', 'Build manifest (JSON)')
  .option('-c, --config <file>', 'Pack settings (JSON)')
  .option('--json', 'Output in JSON format')
  .action(packCommand);

program
  .command('archive')
  .description('Create the distributable directory and archive it as <prefix>-<version>.tar.gz')
  .requiredOption('-m, --manifest <file>', 'Build manifest (JSON)')
  .option('-c, --config <file>', 'Pack settings (JSON)')
  .option('--json', 'Output in JSON format')
  .action(archiveCommand);

program
  .command('deps')
  .description('List resolved runtime dependencies and their jar names')
  .requiredOption('-m, --manifest <file>', 'Build manifest (JSON)')
  .option('-c, --config <file>', 'Pack settings (JSON)')
  .option('--json', 'Output in JSON format')
  .action(depsCommand);

program.exitOverride((err) => {
  if (err.code === 'commander.unknownCommand') {
    console.error(chalk.red('Unknown command:'), err.message);
    console.log('Run', chalk.cyan('jarpack --help'), 'for available commands');
  }
  process.exit(err.exitCode);
});

await program.parseAsync();
