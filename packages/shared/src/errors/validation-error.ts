/**
 * Validation error class
 * @module @faultline/shared/errors/validation-error
 */

import { FaultlineError, ErrorCode, type ErrorMeta } from './base-error';

/**
 * Validation error detail
 */
export interface ValidationErrorDetail {
  /** Field that failed validation (dotted path) */
  field: string;
  /** Error message */
  message: string;
  /** Validation rule that failed */
  rule?: string;
  /** Expected value/format */
  expected?: string;
  /** Actual value received */
  received?: unknown;
}

/**
 * Validation error for caller input defects. Always carries every violation found.
 */
export class ValidationError extends FaultlineError {
  /** Validation error details */
  public readonly details: ValidationErrorDetail[];

  constructor(
    message: string,
    details: ValidationErrorDetail[] = [],
    meta: ErrorMeta = {},
  ) {
    super(message, ErrorCode.VALIDATION_FAILED, meta);
    this.name = 'ValidationError';
    this.details = details;
  }

  /**
   * Create from a single field error
   */
  static field(
    field: string,
    message: string,
    rule?: string,
  ): ValidationError {
    return new ValidationError(`Validation failed for field: ${field}`, [
      { field, message, rule },
    ], { field });
  }

  /**
   * Create from multiple field errors
   */
  static multiple(errors: ValidationErrorDetail[], meta: ErrorMeta = {}): ValidationError {
    const fieldNames = [...new Set(errors.map(e => e.field))].join(', ');
    return new ValidationError(
      `Validation failed for fields: ${fieldNames}`,
      errors,
      meta,
    );
  }

  /**
   * Check if a specific field has an error
   */
  hasFieldError(field: string): boolean {
    return this.details.some(d => d.field === field);
  }

  /**
   * Get errors for a specific field
   */
  getFieldErrors(field: string): ValidationErrorDetail[] {
    return this.details.filter(d => d.field === field);
  }

  /**
   * Convert to JSON for machine-readable output
   */
  override toJSON(): Record<string, unknown> {
    return {
      error: {
        name: this.name,
        code: this.code,
        message: this.message,
        details: this.details,
        meta: this.meta,
        timestamp: this.timestamp.toISOString(),
      },
    };
  }
}

/**
 * Check if an error is a ValidationError
 */
export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

/**
 * Validation result type
 */
export type ValidationResult<T> =
  | { valid: true; value: T }
  | { valid: false; error: ValidationError };

/**
 * Create a successful validation result
 */
export function validResult<T>(value: T): ValidationResult<T> {
  return { valid: true, value };
}

/**
 * Create a failed validation result
 */
export function invalidResult<T>(error: ValidationError): ValidationResult<T> {
  return { valid: false, error };
}
