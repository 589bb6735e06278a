/**
 * Error taxonomy
 *
 * Per-file failures inside a sweep are caught and aggregated by the
 * orchestrators; construction-time errors propagate to the caller.
 */

export type ErrorCode =
  | "NOT_FOUND"
  | "PERMISSION_DENIED"
  | "INVALID_CHECKSUM_FORMAT"
  | "INVALID_RECORD"
  | "SESSION_IDENTIFIER_MISSING"
  | "SESSION_MISMATCH"
  | "AMBIGUOUS_SELF_RESOLUTION"
  | "RETRY_EXHAUSTED"
  | "CHECKSUM_SELF_TEST"
  | "CONFIG";

export class TierkeepError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TierkeepError";
    this.code = code;
  }
}

/** File vanished or was never there. */
export class NotFoundError extends TierkeepError {
  constructor(
    readonly path: string,
    options?: { cause?: unknown },
  ) {
    super("NOT_FOUND", `File not found: ${path}`, options);
    this.name = "NotFoundError";
  }
}

export class PermissionDeniedError extends TierkeepError {
  constructor(
    readonly path: string,
    readonly operation: string,
    options?: { cause?: unknown },
  ) {
    super("PERMISSION_DENIED", `Permission denied (${operation}): ${path}`, options);
    this.name = "PermissionDeniedError";
  }
}

export class InvalidChecksumFormatError extends TierkeepError {
  constructor(
    readonly algorithm: string,
    readonly value: string,
  ) {
    super("INVALID_CHECKSUM_FORMAT", `Invalid ${algorithm} checksum: "${value}"`);
    this.name = "InvalidChecksumFormatError";
  }
}

export class InvalidRecordError extends TierkeepError {
  constructor(message: string) {
    super("INVALID_RECORD", message);
    this.name = "InvalidRecordError";
  }
}

export class SessionIdentifierMissingError extends TierkeepError {
  constructor(readonly path: string) {
    super("SESSION_IDENTIFIER_MISSING", `No session identifier in path: ${path}`);
    this.name = "SessionIdentifierMissingError";
  }
}

export class SessionMismatchError extends TierkeepError {
  constructor(
    readonly expected: string,
    readonly actual: string,
  ) {
    super(
      "SESSION_MISMATCH",
      `Destination belongs to session ${actual}, but the file belongs to session ${expected}`,
    );
    this.name = "SessionMismatchError";
  }
}

export class AmbiguousSelfResolutionError extends TierkeepError {
  constructor(
    readonly path: string,
    readonly checksums: string[],
  ) {
    super(
      "AMBIGUOUS_SELF_RESOLUTION",
      `Store holds conflicting checksums for ${path}: ${checksums.join(", ")}`,
    );
    this.name = "AmbiguousSelfResolutionError";
  }
}

export class RetryExhaustedError extends TierkeepError {
  constructor(
    readonly path: string,
    readonly attempts: number,
    readonly lastClassification: string | null,
  ) {
    super(
      "RETRY_EXHAUSTED",
      `Copy of ${path} could not be validated after ${attempts} attempt(s)` +
        (lastClassification ? ` (last result: ${lastClassification})` : ""),
    );
    this.name = "RetryExhaustedError";
  }
}

export class ChecksumSelfTestError extends TierkeepError {
  constructor(
    readonly algorithm: string,
    readonly expected: string,
    readonly actual: string,
  ) {
    super(
      "CHECKSUM_SELF_TEST",
      `Checksum self-test failed for ${algorithm}: expected ${expected}, got ${actual}`,
    );
    this.name = "ChecksumSelfTestError";
  }
}

function errnoOf(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

export function isNotFound(err: unknown): boolean {
  return err instanceof NotFoundError || errnoOf(err) === "ENOENT";
}

/** A path component that should be a folder is a file, so nothing can exist below it. */
export function isNotADirectory(err: unknown): boolean {
  return errnoOf(err) === "ENOTDIR";
}

export function isPermissionDenied(err: unknown): boolean {
  if (err instanceof PermissionDeniedError) return true;
  const code = errnoOf(err);
  return code === "EACCES" || code === "EPERM";
}

/**
 * Map a filesystem error onto the taxonomy. Unknown errors pass through.
 */
export function toFsError(err: unknown, filePath: string, operation: string): unknown {
  if (err instanceof TierkeepError) return err;
  if (isNotFound(err)) return new NotFoundError(filePath, { cause: err });
  if (isPermissionDenied(err)) return new PermissionDeniedError(filePath, operation, { cause: err });
  return err;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
