/**
 * @reelport/utils
 *
 * Shared utilities package containing:
 * - Command execution wrappers
 * - File operations
 * - Retry logic
 * - Path utilities
 * - Type guards
 * - Logger
 */

// Command execution
export {
  executeCommand,
  streamCommand,
  type CommandResult,
  type CommandOptions,
  type StreamCommandOptions,
  type StreamCommandResult,
} from './command.js';

// File operations
export {
  ensureDir,
  safeWriteFile,
  getFileSizeBytes,
  fileExists,
  isNonEmptyFile,
  removePath,
} from './file.js';

// Retry logic
export { retry, type RetryOptions } from './retry.js';

// Path utilities
export {
  getJobDir,
  getExtension,
  stripExtension,
} from './path.js';

// Type guards
export {
  isObject,
  isArray,
  toFiniteNumber,
} from './guards.js';

// Time utilities
export {
  sleep,
  formatDuration,
  formatClock,
  parseClock,
} from './time.js';

// Logger
export { createLogger, type Logger, type LogComponent } from './logger.js';
