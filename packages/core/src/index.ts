/**
 * @jarpack/core
 *
 * Core package containing:
 * - Module identity and jar naming
 * - Build manifest types
 * - Pack settings schema
 * - Error handling
 */

// Module identity
export {
  JAR_NAME_CONVENTIONS,
  createModuleIdentity,
  defaultJarName,
  originalJarName,
  fullJarName,
  noVersionJarName,
  resolveJarName,
  formatModule,
  compareModules,
  moduleKey,
} from './types/module.js';

export type {
  ModuleIdentity,
  JarNameConvention,
} from './types/module.js';

// Build manifest
export type {
  ModuleId,
  ArtifactRef,
  ArtifactFile,
  ModuleReport,
  ConfigurationReport,
  UpdateReport,
  ProjectDescriptor,
  BuildManifest,
} from './types/report.js';

// Settings
export {
  DEFAULT_RESOURCE_DIRECTORY,
  packSettingsSchema,
  buildManifestSchema,
  parsePackSettings,
  parseBuildManifest,
  type PackSettings,
  type PackSettingsInput,
  type PackMapping,
} from './config/settings.js';

// Errors
export {
  JarpackError,
  ConfigurationError,
  ManifestError,
  PackIOError,
  TemplateRenderError,
  ArchiveError,
  withIO,
  type ConfigurationIssue,
} from './errors/index.js';
