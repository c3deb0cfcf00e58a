/**
 * Pack Settings
 *
 * Everything the packaging pipeline can be told, validated once and
 * threaded through as an immutable value.
 */

import { z, type ZodError } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import { JAR_NAME_CONVENTIONS } from '../types/module.js';
import type { BuildManifest } from '../types/report.js';

export const DEFAULT_RESOURCE_DIRECTORY = 'src/pack';

const mappingSchema = z.object({
  /** Source file */
  file: z.string().min(1),
  /** Destination relative to the pack directory */
  path: z.string().min(1),
});

export const packSettingsSchema = z.object({
  packDir: z.string().min(1).default('pack'),

  // Template files; the bundled templates are used when unset
  bashTemplate: z.string().min(1).optional(),
  batTemplate: z.string().min(1).optional(),
  makefileTemplate: z.string().min(1).optional(),

  /** program name -> main class */
  main: z.record(z.string(), z.string().min(1)).default({}),
  /** Projects left out of packaging */
  exclude: z.array(z.string()).default([]),
  macIconFile: z.string().default('icon-mac.png'),
  resourceDirs: z.array(z.string()).default([DEFAULT_RESOURCE_DIRECTORY]),
  jvmOpts: z.record(z.string(), z.array(z.string())).default({}),
  extraClasspath: z.record(z.string(), z.array(z.string())).default({}),
  expandedClasspath: z.boolean().default(false),
  jarNameConvention: z.enum(JAR_NAME_CONVENTIONS).default('default'),
  generateWindowsBatFile: z.boolean().default(true),
  mappings: z.array(mappingSchema).default([]),
  /** Classifiers (e.g. "sources") whose artifacts are packaged too */
  includeClassifiers: z.array(z.string()).default([]),
  archivePrefix: z.string().min(1).optional(),
  /** chmod bin/ scripts for group and others too, not just the owner */
  executableByOthers: z.boolean().default(true),
}).strict();

export type PackSettings = Readonly<z.infer<typeof packSettingsSchema>>;
export type PackSettingsInput = z.input<typeof packSettingsSchema>;
export type PackMapping = z.infer<typeof mappingSchema>;

const optionalClassifier = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

const updateReportSchema = z.object({
  configurations: z.array(z.object({
    configuration: z.string(),
    modules: z.array(z.object({
      module: z.object({
        organization: z.string().min(1),
        name: z.string().min(1),
        revision: z.string().min(1),
      }),
      artifacts: z.array(z.object({
        artifact: z.object({
          name: z.string(),
          type: z.string().optional(),
          extension: z.string().optional(),
          classifier: optionalClassifier,
        }),
        file: z.string().min(1),
      })).default([]),
    })).default([]),
  })).default([]),
});

const projectSchema = z.object({
  uses: z.array(z.string()).default([]),
  jars: z.array(z.string()).default([]),
  unmanagedJars: z.array(z.string()).default([]),
  reports: z.array(updateReportSchema).default([]),
});

export const buildManifestSchema: z.ZodType<BuildManifest, z.ZodTypeDef, unknown> = z.object({
  name: z.string().min(1),
  version: z.string().min(1),
  baseDir: z.string().default('.'),
  targetDir: z.string().optional(),
  root: z.string().min(1),
  projects: z.record(z.string(), projectSchema),
});

function toConfigurationError(source: string, error: ZodError): ConfigurationError {
  return new ConfigurationError(
    source,
    error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }))
  );
}

/**
 * Validate settings, filling in defaults
 */
export function parsePackSettings(input: unknown): PackSettings {
  const result = packSettingsSchema.safeParse(input ?? {});
  if (!result.success) {
    throw toConfigurationError('pack settings', result.error);
  }
  return Object.freeze(result.data);
}

/**
 * Validate a build manifest handed over by the build system
 */
export function parseBuildManifest(input: unknown): BuildManifest {
  const result = buildManifestSchema.safeParse(input);
  if (!result.success) {
    throw toConfigurationError('build manifest', result.error);
  }
  return result.data;
}
