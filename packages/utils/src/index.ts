/**
 * @tempo-consensus/utils
 * 
 * Shared utilities package containing:
 * - File operations
 * - Path utilities
 * - Type guards
 * - Logger
 */

// File operations
export {
  ensureDir,
  safeWriteFile,
  safeReadFile,
  writeJsonFile,
} from './file.js';

// Path utilities
export {
  sanitizeFilename,
  artifactPath,
  displayName,
} from './path.js';

// Type guards
export {
  isString,
  isNumber,
  isObject,
  isNonEmptyString,
  isPositiveFinite,
} from './guards.js';

// Logger
export { logger, createLogger, type Logger } from './logger.js';
