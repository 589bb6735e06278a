/**
 * Utility exports
 */

// Errors
export {
  AmbiguousSelfResolutionError,
  ChecksumSelfTestError,
  type ErrorCode,
  errorMessage,
  InvalidChecksumFormatError,
  InvalidRecordError,
  isNotFound,
  isPermissionDenied,
  NotFoundError,
  PermissionDeniedError,
  RetryExhaustedError,
  SessionIdentifierMissingError,
  SessionMismatchError,
  TierkeepError,
  toFsError,
} from "./errors";
// Formatting utilities
export { formatBytes, formatDuration } from "./format";
export type { LogLevel, Logger } from "./logger";
// Logger
export { debug, error, getLogLevel, info, logger, setLogLevel, warn } from "./logger";
// Path utilities
export { isPathWithinDir, joinLocation, locationKey, normalizeLocation, sameLocation } from "./path";
// Worker pool
export { runPool, type Settled } from "./pool";
