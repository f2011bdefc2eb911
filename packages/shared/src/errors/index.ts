/**
 * Error classes for Faultline
 * @module @faultline/shared/errors
 */

// Base error
export {
  FaultlineError,
  ErrorCode,
  isFaultlineError,
  wrapError,
} from './base-error';

export type { ErrorMeta } from './base-error';

// Validation errors
export {
  ValidationError,
  isValidationError,
  validResult,
  invalidResult,
} from './validation-error';

export type {
  ValidationErrorDetail,
  ValidationResult,
} from './validation-error';

// Template errors
export {
  TemplateNotFoundError,
  InvalidTemplateError,
  TemplateSourceError,
  isInvalidTemplateError,
} from './template-error';

export type { TemplateIssue } from './template-error';

// Backend errors
export {
  RenderError,
  ApplyError,
  RevertError,
  TimeoutError,
  UnsupportedError,
  isApplyError,
  isRevertError,
  isUnsupportedError,
} from './backend-error';

export type { ApplyFailureKind } from './backend-error';

// Instance errors
export {
  InstanceNotFoundError,
  ConflictError,
  IllegalTransitionError,
  PartialFailureError,
  isConflictError,
} from './instance-error';
