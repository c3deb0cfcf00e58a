/**
 * Options shared by every packaging command
 */

import type { Command } from 'commander';
import type { LogFlags } from '../lib/logger.js';

export interface PackCommandOptions {
  manifest: string;
  config?: string;
  json?: boolean;
}

/**
 * Global flags live on the root program
 */
export function globalFlags(command: Command): LogFlags {
  const root = command.parent ?? command;
  return root.opts<LogFlags>();
}
