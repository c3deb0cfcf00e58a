/**
 * @jarpack/utils
 *
 * Shared utilities package containing:
 * - Logger
 * - File operations
 * - Path utilities
 * - Formatting helpers
 */

// File operations
export {
  ensureDir,
  removeDir,
  pathExists,
  isDirectory,
  safeWriteFile,
  copyFile,
  copyDirectory,
  listFiles,
  setExecutable,
  type CopyOptions,
} from './file.js';

// Path utilities
export {
  relativePath,
  resolveFrom,
  stripWhitespace,
} from './path.js';

// Formatting
export {
  formatDuration,
  formatBytes,
} from './time.js';

// Logger
export { createLogger, createSilentLogger, type Logger, type LoggerOptions } from './logger.js';
