/**
 * Utility exports for fits-regress
 */

// Logger
export {
  createLogger,
  createChildLogger,
  createSilentLogger,
  logTiming,
  LOG_LEVELS,
  type LogLevel,
  type LoggerConfig,
} from "./logger.js";

// Errors
export {
  HarnessError,
  ConfigError,
  DiscoveryError,
  FileSystemError,
  UnreadableArtifactError,
  ValidationError,
  isHarnessError,
  formatError,
  type ConfigIssue,
} from "./errors.js";

// Async utilities
export { parallel, createChannel, type Channel } from "./async.js";

// File utilities
export { ensureDir, fileExists, isDirectory, listFiles, filesEqual, moveFile } from "./files.js";
