/**
 * @clipset/utils
 * 
 * Shared utilities package containing:
 * - Command execution wrapper
 * - File operations
 * - Path and label sanitizing
 * - Async mutex
 * - Logger
 */

// Command execution
export {
  executeCommand,
  formatCommand,
  type CommandResult,
  type CommandOptions,
  type CommandRunner,
} from './command.js';

// File operations
export {
  ensureDir,
  safeReadFile,
  writeFileAtomic,
  appendText,
  getFileSizeBytes,
  pathExists,
  removeIfExists,
  moveFile,
} from './file.js';

// Path utilities
export {
  VIDEO_EXTENSIONS,
  sanitizeFilename,
  getExtension,
  getBasename,
  normalizeExtensions,
  isListableVideo,
} from './path.js';

// Time utilities
export {
  formatDuration,
  formatSeconds,
  toMilliseconds,
} from './time.js';

// Concurrency
export { Mutex, mutexFor } from './mutex.js';

// Logger
export { logger, createLogger, type Logger } from './logger.js';
