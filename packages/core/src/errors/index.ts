/**
 * Custom Error Classes
 */

/**
 * Base error class for all clipset errors
 */
export class ClipsetError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ClipsetError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
    
    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error for invalid inputs
 */
export class ValidationError extends ClipsetError {
  constructor(field: string, message: string) {
    super(
      `Validation failed for ${field}: ${message}`,
      'VALIDATION_ERROR',
      400,
      { field, message }
    );
    this.name = 'ValidationError';
  }
}

/**
 * Not found error for missing resources
 */
export class NotFoundError extends ClipsetError {
  constructor(resource: string, identifier: string) {
    super(
      `${resource} not found: ${identifier}`,
      'NOT_FOUND',
      404,
      { resource, identifier }
    );
    this.name = 'NotFoundError';
  }
}

/**
 * The source video for an export does not exist
 */
export class SourceMissingError extends ClipsetError {
  constructor(path: string) {
    super(`Source video not found: ${path}`, 'SOURCE_MISSING', 404, { path });
    this.name = 'SourceMissingError';
  }
}

/**
 * A clip window with end <= start
 */
export class InvalidWindowError extends ClipsetError {
  constructor(start: number, end: number) {
    super(
      `Invalid clip window: start=${start} end=${end}`,
      'INVALID_WINDOW',
      400,
      { start, end }
    );
    this.name = 'InvalidWindowError';
  }
}

/**
 * One failed ffmpeg invocation, kept for troubleshooting
 */
export interface AttemptDiagnostics {
  strategy: string;
  command: string;
  exitCode: number | null;
  stderr: string;
}

/**
 * Every rung of the transcode ladder failed
 */
export class TranscodeFailedError extends ClipsetError {
  public readonly attempts: AttemptDiagnostics[];

  constructor(target: string, attempts: AttemptDiagnostics[]) {
    super(
      `Transcode failed for ${target} after ${attempts.length} attempt(s)`,
      'TRANSCODE_FAILED',
      500,
      { target, strategies: attempts.map((a) => a.strategy) }
    );
    this.name = 'TranscodeFailedError';
    this.attempts = attempts;
  }
}

/**
 * Output was produced but did not pass the compatibility re-check
 * or the decode check
 */
export class VerificationFailedError extends ClipsetError {
  public readonly attempts: AttemptDiagnostics[];

  constructor(target: string, reason: string, attempts: AttemptDiagnostics[] = []) {
    super(
      `Verification failed for ${target}: ${reason}`,
      'VERIFICATION_FAILED',
      500,
      { target, reason }
    );
    this.name = 'VerificationFailedError';
    this.attempts = attempts;
  }
}

/**
 * Backup or rename while swapping in a rewritten file failed
 */
export class ReplaceFailedError extends ClipsetError {
  constructor(target: string, cause: string) {
    super(`Could not replace ${target}: ${cause}`, 'REPLACE_FAILED', 500, { target, cause });
    this.name = 'ReplaceFailedError';
  }
}
