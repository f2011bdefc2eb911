/**
 * Base error class with error codes
 * @module @faultline/shared/errors/base-error
 */

/**
 * Error codes for categorization
 */
export enum ErrorCode {
  // General errors (1xxx)
  UNKNOWN = 1000,
  INTERNAL = 1001,
  NOT_IMPLEMENTED = 1002,
  TIMEOUT = 1003,
  CANCELLED = 1004,

  // Validation errors (2xxx)
  VALIDATION_FAILED = 2000,
  INVALID_INPUT = 2001,
  MISSING_REQUIRED_FIELD = 2002,
  INVALID_FORMAT = 2003,
  OUT_OF_RANGE = 2004,
  CONSTRAINT_VIOLATION = 2005,

  // Resource errors (5xxx)
  NOT_FOUND = 5000,
  ALREADY_EXISTS = 5001,
  CONFLICT = 5002,
  GONE = 5003,

  // Template errors (6xxx)
  TEMPLATE_NOT_FOUND = 6000,
  TEMPLATE_INVALID = 6001,
  TEMPLATE_SOURCE_UNREADABLE = 6002,

  // Backend errors (7xxx)
  RENDER_FAILED = 7000,
  APPLY_TRANSIENT = 7001,
  APPLY_REJECTED = 7002,
  REVERT_FAILED = 7003,
  BACKEND_UNSUPPORTED = 7004,
  BACKEND_UNREACHABLE = 7005,

  // Fault instance errors (8xxx)
  INSTANCE_NOT_FOUND = 8000,
  INSTANCE_CONFLICT = 8001,
  ILLEGAL_TRANSITION = 8002,
  PARTIAL_FAILURE = 8003,
}

/**
 * Error metadata for additional context
 */
export interface ErrorMeta {
  /** Resource type involved */
  resourceType?: string;
  /** Resource ID involved */
  resourceId?: string;
  /** Field that caused the error */
  field?: string;
  /** Additional context */
  [key: string]: unknown;
}

/**
 * Base error class for all Faultline errors
 */
export class FaultlineError extends Error {
  /** Error code for categorization */
  public readonly code: ErrorCode;
  /** Error metadata */
  public readonly meta: ErrorMeta;
  /** Timestamp when error occurred */
  public readonly timestamp: Date;
  /** Original error if this wraps another */
  public override readonly cause?: Error;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    meta: ErrorMeta = {},
    cause?: Error,
  ) {
    super(message);
    this.name = 'FaultlineError';
    this.code = code;
    this.meta = meta;
    this.timestamp = new Date();
    this.cause = cause;

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert to JSON for machine-readable output
   */
  toJSON(): Record<string, unknown> {
    return {
      error: {
        name: this.name,
        code: this.code,
        message: this.message,
        meta: this.meta,
        timestamp: this.timestamp.toISOString(),
      },
    };
  }

  /**
   * Check if this error is retryable
   */
  isRetryable(): boolean {
    return [
      ErrorCode.INTERNAL,
      ErrorCode.APPLY_TRANSIENT,
      ErrorCode.BACKEND_UNREACHABLE,
      ErrorCode.INSTANCE_CONFLICT,
    ].includes(this.code);
  }
}

/**
 * Check if an error is a FaultlineError
 */
export function isFaultlineError(error: unknown): error is FaultlineError {
  return error instanceof FaultlineError;
}

/**
 * Wrap an unknown error as a FaultlineError
 */
export function wrapError(error: unknown, code: ErrorCode = ErrorCode.UNKNOWN): FaultlineError {
  if (isFaultlineError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new FaultlineError(error.message, code, {}, error);
  }

  return new FaultlineError(String(error), code);
}
