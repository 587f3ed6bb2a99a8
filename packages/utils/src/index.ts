/**
 * @subburn/utils
 *
 * Shared utilities package containing:
 * - Command execution wrapper
 * - File operations
 * - Path utilities
 * - Type guards
 * - Time utilities
 * - Logger
 */

// Command execution
export {
  executeCommand,
  formatCommand,
  extractErrorText,
  LineSplitter,
  type CommandResult,
  type CommandOptions,
  type CommandRunner,
} from './command.js';

// File operations
export {
  ensureDir,
  safeWriteFile,
  safeReadFile,
  removeIfExists,
  hasContent,
  findFilesByExtension,
} from './file.js';

// Path utilities
export {
  getExtension,
  getBasename,
  createTempPath,
  defaultOutputPath,
} from './path.js';

// Type guards
export { isObject } from './guards.js';

// Time utilities
export {
  formatDuration,
  parseTimecode,
  formatTimecode,
} from './time.js';

// Logger
export { logger, createLogger, type Logger } from './logger.js';
