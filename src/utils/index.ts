/**
 * Utility exports
 */

// Errors
export {
  CommandFailedError,
  ConfigError,
  errorMessage,
  LockError,
  PolicyError,
  UsageError,
} from "./errors";
// Formatting utilities
export { formatBytes, formatDuration, formatLocalTimestamp, SIZE_WIDTH } from "./format";
// Lock file
export { acquireLock, isProcessAlive, releaseLock, withLock } from "./lock";
export type { Logger, LoggerOptions, LogLevel } from "./logger";
// Logger
export { createLogger, levelForVerbosity } from "./logger";
// Shell display helpers
export { formatCommandFailure, quoteArg, quoteCommand } from "./shell";
