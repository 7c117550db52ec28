/**
 * @transcode-mirror/utils
 *
 * Shared utilities package containing:
 * - Command execution wrapper
 * - File operations
 * - Retry logic
 * - Path utilities
 * - Type guards
 * - Logger
 */

// Command execution
export { executeCommand, type CommandResult, type CommandOptions } from './command.js';

// File operations
export {
  ensureDir,
  statOrNull,
  lstatOrNull,
  removeIfExists,
} from './file.js';

// Retry logic
export { retry, type RetryOptions } from './retry.js';

// Path utilities
export {
  toPosixPath,
  getExtension,
  stripExtension,
} from './path.js';

// Type guards
export {
  isErrnoException,
  hasErrorCode,
  errorMessage,
} from './guards.js';

// Time and size utilities
export {
  formatDuration,
  formatBytes,
  hoursToMs,
} from './time.js';

// Logger
export { logger, createLogger, type Logger } from './logger.js';
