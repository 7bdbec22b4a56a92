/**
 * @modelfetch/utils
 * 
 * Shared utilities package containing:
 * - File operations
 * - Path and filename helpers
 * - Byte formatting
 * - Type guards
 * - Logger
 */

// File operations
export {
  ensureDir,
  pathExists,
  safeWriteFile,
  safeReadFile,
  removeFile,
  isErrnoException,
  type WriteOptions,
} from './file.js';

// Path utilities
export { sanitizeFilename, lastPathSegment } from './path.js';

// Formatting
export { formatBytes, formatPercent } from './format.js';

// Type guards
export { isString, isNonEmptyString } from './guards.js';

// Logger
export { logger, createLogger, setLogLevel, type Logger } from './logger.js';
