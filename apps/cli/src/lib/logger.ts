/**
 * CLI Logger
 *
 * Pipeline logs go to stderr so stdout stays clean for --json output.
 */

import { createLogger, type Logger } from '@jarpack/utils';
import { getConfig } from '../config/index.js';

export interface LogFlags {
  verbose?: boolean;
  debug?: boolean;
}

export function createCliLogger(flags: LogFlags): Logger {
  const config = getConfig();
  return createLogger({
    level: flags.debug ? 'debug' : flags.verbose ? 'info' : config.logLevel,
    service: 'jarpack-cli',
    env: config.nodeEnv,
    pretty: true,
    destination: 2,
  });
}
