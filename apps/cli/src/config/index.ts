/**
 * CLI Configuration
 *
 * Environment settings plus loaders for the two JSON inputs: the build
 * manifest written by the build system and the optional pack settings.
 */

import { config as dotenvConfig } from 'dotenv';
import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { z } from 'zod';
import {
  ConfigurationError,
  PackIOError,
  parseBuildManifest,
  parsePackSettings,
  type BuildManifest,
  type PackSettings,
} from '@jarpack/core';

dotenvConfig();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('warn'),
  JARPACK_SETTINGS: z.string().optional(),
});

export interface CliConfig {
  nodeEnv: z.infer<typeof envSchema>['NODE_ENV'];
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
  /** Settings file used when --config is not given */
  defaultSettingsFile: string | undefined;
}

/**
 * Validate the environment; a bad value is a ConfigurationError
 */
export function parseEnv(env: NodeJS.ProcessEnv): CliConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigurationError(
      'environment',
      result.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
    );
  }
  return {
    nodeEnv: result.data.NODE_ENV,
    logLevel: result.data.LOG_LEVEL,
    defaultSettingsFile: result.data.JARPACK_SETTINGS,
  };
}

let cached: CliConfig | undefined;

export function getConfig(): CliConfig {
  cached ??= parseEnv(process.env);
  return cached;
}

async function readJson(file: string, source: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(file, 'utf-8');
  } catch (error) {
    throw new PackIOError('read', file, error);
  }
  try {
    return JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(source, [{ path: '', message: `${file} is not valid JSON: ${reason}` }]);
  }
}

/**
 * Load a build manifest; a relative baseDir is taken relative to the
 * manifest file itself.
 */
export async function loadManifest(file: string): Promise<BuildManifest> {
  const path = resolve(file);
  const manifest = parseBuildManifest(await readJson(path, 'build manifest'));
  return {
    ...manifest,
    baseDir: resolve(dirname(path), manifest.baseDir),
  };
}

export async function loadSettings(file: string | undefined): Promise<PackSettings> {
  const settingsFile = file ?? getConfig().defaultSettingsFile;
  if (!settingsFile) {
    return parsePackSettings({});
  }
  return parsePackSettings(await readJson(resolve(settingsFile), 'pack settings'));
}
