/**
 * Logger
 *
 * Pino-based structured logger shared by every workspace.
 */

import { pino, type Logger as PinoLogger } from 'pino';

export type Logger = PinoLogger;

export interface LoggerOptions {
  level: string;
  service: string;
  env: string;
  /** Human-readable output through pino-pretty */
  pretty: boolean;
  /** File descriptor for pretty output; stdout when unset */
  destination?: number;
}

export function createLogger(options: LoggerOptions): Logger {
  return pino({
    level: options.level,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: options.service,
      env: options.env,
    },
    transport: options.pretty ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        ignore: 'pid,hostname,service,env',
        destination: options.destination ?? 1,
      },
    } : undefined,
  });
}

/**
 * Logger that discards everything; handy for library callers and tests
 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
