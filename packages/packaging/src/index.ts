/**
 * @jarpack/packaging
 *
 * Distribution packaging layer.
 *
 * Responsibilities:
 * - Lay out lib/ with project, dependency and unmanaged jars
 * - Generate launch scripts, Makefile and VERSION
 * - Copy resource directories
 * - Archive the pack directory as tar.gz
 */

export { Packager, targetDirOf, type PackResult, type PackagerOptions, type ResolvedJar } from './packager.js';

export {
  buildLayout,
  copyResourceDirs,
  markExecutable,
  layoutPaths,
  type LayoutInput,
  type LayoutPaths,
} from './layout.js';

export {
  generateLaunchers,
  generateMakefile,
  writeVersionFile,
  launchEntries,
  launcherFileName,
  buildExtraClasspath,
  buildExpandedClasspath,
  toWindowsClasspath,
  formatJvmOpts,
  symlinkCommand,
  PATH_SEPARATOR,
  WINDOWS_PATH_SEPARATOR,
  type LaunchEntry,
  type LauncherContext,
  type ClasspathJars,
  type GeneratedLauncher,
} from './launcher.js';

export {
  createArchive,
  archiveStem,
  EXCLUDED_ROOT_FILES,
  BIN_MODE,
  type ArchiveOptions,
  type ArchiveResult,
} from './archiver.js';

export {
  MustacheTemplateRenderer,
  DEFAULT_TEMPLATES,
  resolveTemplatePaths,
  type TemplateRenderer,
  type TemplatePaths,
  type TemplateVars,
  type LauncherTemplateVars,
  type MakefileTemplateVars,
} from './templates.js';
