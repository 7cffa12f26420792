// ============================================================================
// Error Types: Typed failures for the scan pipeline
// ============================================================================
//
// Every failure the pipeline can surface carries a stable `code` and a
// `retryable` flag. The watch loop decides what to do with a file purely from
// these two fields:
//
//   TRANSIENT_FILE       file locked, vanished or never settled: drop it,
//                        a later notification may bring it back
//   EXTRACTION_FAILED    unsupported or corrupt file: terminal, left in place
//   MODEL_UNAVAILABLE    inference timeout / transport failure: retry with
//                        backoff, bounded attempts
//   COLLISION_EXHAUSTED  no free target name: terminal, left in place
//   CONFIG_INVALID       bad environment at startup: fatal
//
// An unparseable model reply is NOT an error: the classifier downgrades it to
// an `unrecognized` classification and the file is still renamed.

export type ScanRenamerErrorCode =
  | 'TRANSIENT_FILE'
  | 'EXTRACTION_FAILED'
  | 'MODEL_UNAVAILABLE'
  | 'COLLISION_EXHAUSTED'
  | 'CONFIG_INVALID';

/** Base error for all pipeline failures. */
export class ScanRenamerError extends Error {
  readonly code: ScanRenamerErrorCode;
  readonly retryable: boolean;

  constructor(
    code: ScanRenamerErrorCode,
    message: string,
    retryable = false,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'ScanRenamerError';
    this.code = code;
    this.retryable = retryable;
  }
}

/**
 * The file is locked, disappeared, or never stopped changing.
 * Not retried in place; the path is dropped from the pending set.
 */
export class TransientFileError extends ScanRenamerError {
  readonly path: string;

  constructor(path: string, message: string, options?: ErrorOptions) {
    super('TRANSIENT_FILE', message, false, options);
    this.name = 'TransientFileError';
    this.path = path;
  }
}

/** Why a file could not be turned into an image payload */
export type ExtractionFailureReason =
  | 'UNSUPPORTED_TYPE'
  | 'EMPTY_DOCUMENT'
  | 'DECODE_FAILED';

/** The file cannot be turned into an image payload. Terminal. */
export class ExtractionError extends ScanRenamerError {
  readonly reason: ExtractionFailureReason;

  constructor(reason: ExtractionFailureReason, message: string, options?: ErrorOptions) {
    super('EXTRACTION_FAILED', message, false, options);
    this.name = 'ExtractionError';
    this.reason = reason;
  }
}

/**
 * The vision model did not answer: timeout, refused connection, HTTP error.
 * Upstream callers retry this with exponential backoff.
 */
export class ModelUnavailableError extends ScanRenamerError {
  constructor(message: string, options?: ErrorOptions) {
    super('MODEL_UNAVAILABLE', message, true, options);
    this.name = 'ModelUnavailableError';
  }
}

/** Every disambiguated target name up to the configured cap is taken. */
export class CollisionExhaustedError extends ScanRenamerError {
  readonly attempts: number;

  constructor(targetName: string, attempts: number) {
    super(
      'COLLISION_EXHAUSTED',
      `No free name for "${targetName}" after ${attempts} attempts`,
    );
    this.name = 'CollisionExhaustedError';
    this.attempts = attempts;
  }
}

/** Environment configuration failed validation. */
export class ConfigError extends ScanRenamerError {
  constructor(message: string, options?: ErrorOptions) {
    super('CONFIG_INVALID', message, false, options);
    this.name = 'ConfigError';
  }
}

/** Human-readable message for anything thrown. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Node.js system error code (ENOENT, EBUSY, ...) if present. */
export function systemErrorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}
