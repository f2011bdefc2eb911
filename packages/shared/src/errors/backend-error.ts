/**
 * Backend adapter errors
 * @module @faultline/shared/errors/backend-error
 */

import { FaultlineError, ErrorCode, type ErrorMeta } from './base-error';
import type { BackendHandle, BackendKind, BackendOperation } from '../types/backend';

/**
 * Apply failure kind
 * - transient: safe to retry (backend unreachable, throttled, server timeout)
 * - rejected: the backend refused the artifact, retrying cannot help
 */
export type ApplyFailureKind = 'transient' | 'rejected';

/**
 * Rendering failed for reasons the request validator could not catch
 */
export class RenderError extends FaultlineError {
  public readonly templateId: string;
  /** Placeholder expressions that could not be resolved */
  public readonly expressions: string[];

  constructor(templateId: string, message: string, expressions: string[] = [], cause?: Error) {
    super(message, ErrorCode.RENDER_FAILED, {
      resourceType: 'template',
      resourceId: templateId,
      expressions,
    }, cause);
    this.name = 'RenderError';
    this.templateId = templateId;
    this.expressions = expressions;
  }
}

/**
 * Submitting an artifact to a backend failed
 */
export class ApplyError extends FaultlineError {
  public readonly kind: ApplyFailureKind;
  public readonly backend: BackendKind;
  /** Set when the backend may hold state from this attempt */
  public readonly partialHandle?: BackendHandle;

  constructor(
    kind: ApplyFailureKind,
    backend: BackendKind,
    message: string,
    options: { partialHandle?: BackendHandle; cause?: Error; meta?: ErrorMeta } = {},
  ) {
    super(
      message,
      kind === 'transient' ? ErrorCode.APPLY_TRANSIENT : ErrorCode.APPLY_REJECTED,
      { ...options.meta, backend },
      options.cause,
    );
    this.name = 'ApplyError';
    this.kind = kind;
    this.backend = backend;
    this.partialHandle = options.partialHandle;
  }

  static transient(backend: BackendKind, message: string, cause?: Error): ApplyError {
    return new ApplyError('transient', backend, message, { cause });
  }

  static rejected(backend: BackendKind, message: string, cause?: Error): ApplyError {
    return new ApplyError('rejected', backend, message, { cause });
  }

  isTransient(): boolean {
    return this.kind === 'transient';
  }
}

/**
 * Reverting a fault through its backend failed
 */
export class RevertError extends FaultlineError {
  public readonly handle: BackendHandle;
  public readonly transient: boolean;

  constructor(handle: BackendHandle, message: string, transient = false, cause?: Error) {
    super(message, ErrorCode.REVERT_FAILED, {
      backend: handle.backend,
      token: handle.token,
      transient,
    }, cause);
    this.name = 'RevertError';
    this.handle = handle;
    this.transient = transient;
  }

  override isRetryable(): boolean {
    return this.transient;
  }
}

/**
 * A backend call did not finish in time. The outcome on the backend is unknown.
 */
export class TimeoutError extends FaultlineError {
  public readonly operation: BackendOperation;
  public readonly timeoutMs: number;
  public readonly partialHandle?: BackendHandle;

  constructor(operation: BackendOperation, timeoutMs: number, partialHandle?: BackendHandle) {
    super(`Backend ${operation} timed out after ${timeoutMs}ms`, ErrorCode.TIMEOUT, {
      operation,
      timeoutMs,
    });
    this.name = 'TimeoutError';
    this.operation = operation;
    this.timeoutMs = timeoutMs;
    this.partialHandle = partialHandle;
  }
}

/**
 * The backend kind is declared but has no working implementation
 */
export class UnsupportedError extends FaultlineError {
  public readonly backend: BackendKind;
  public readonly operation: BackendOperation;

  constructor(backend: BackendKind, operation: BackendOperation) {
    super(
      `Backend "${backend}" does not support ${operation}`,
      ErrorCode.BACKEND_UNSUPPORTED,
      { backend, operation },
    );
    this.name = 'UnsupportedError';
    this.backend = backend;
    this.operation = operation;
  }
}

export function isApplyError(error: unknown): error is ApplyError {
  return error instanceof ApplyError;
}

export function isRevertError(error: unknown): error is RevertError {
  return error instanceof RevertError;
}

export function isUnsupportedError(error: unknown): error is UnsupportedError {
  return error instanceof UnsupportedError;
}
