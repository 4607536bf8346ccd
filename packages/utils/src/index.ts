/**
 * @flightlog/utils
 * 
 * Shared utilities package containing:
 * - File operations
 * - Path utilities
 * - Type guards
 * - Logger
 */

// File operations
export {
  safeStat,
  pathExists,
  isDirectory,
  getFileSizeBytes,
  createTempDir,
  removeDir,
} from './file.js';

// Path utilities
export {
  secureFilename,
  normalizeExtension,
} from './path.js';

// Type guards
export {
  isString,
  isObject,
  isErrnoException,
  errorMessage,
} from './guards.js';

// Logger
export { logger, createLogger, type Logger } from './logger.js';
