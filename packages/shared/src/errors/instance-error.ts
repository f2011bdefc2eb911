/**
 * Fault instance errors
 * @module @faultline/shared/errors/instance-error
 */

import { FaultlineError, ErrorCode } from './base-error';
import type { FaultState } from '../types/instance';

/**
 * Raised when an instance ID is unknown to the lifecycle manager
 */
export class InstanceNotFoundError extends FaultlineError {
  public readonly instanceId: string;

  constructor(instanceId: string) {
    super(`Fault instance not found: ${instanceId}`, ErrorCode.INSTANCE_NOT_FOUND, {
      resourceType: 'fault-instance',
      resourceId: instanceId,
    });
    this.name = 'InstanceNotFoundError';
    this.instanceId = instanceId;
  }
}

/**
 * Raised when a request's target overlaps an active, non-composable fault,
 * or its name is still held on the backend by another live fault.
 * Callers may retry after backoff or pick a different scope or name.
 */
export class ConflictError extends FaultlineError {
  public readonly conflictingInstanceIds: string[];

  constructor(namespace: string, conflictingInstanceIds: string[], instanceId?: string, faultName?: string) {
    super(
      faultName === undefined
        ? `Target overlaps active fault(s) in namespace "${namespace}": ${conflictingInstanceIds.join(', ')}`
        : `Fault name "${faultName}" is held by live fault(s) in namespace "${namespace}": ${conflictingInstanceIds.join(', ')}`,
      ErrorCode.INSTANCE_CONFLICT,
      {
        resourceType: 'fault-instance',
        resourceId: instanceId,
        namespace,
        faultName,
        conflictingInstanceIds,
      },
    );
    this.name = 'ConflictError';
    this.conflictingInstanceIds = conflictingInstanceIds;
  }
}

/**
 * Raised when a transition is not allowed by the lifecycle state machine
 */
export class IllegalTransitionError extends FaultlineError {
  public readonly from: FaultState;
  public readonly to: FaultState;

  constructor(instanceId: string, from: FaultState, to: FaultState) {
    super(`Illegal transition ${from} -> ${to} for ${instanceId}`, ErrorCode.ILLEGAL_TRANSITION, {
      resourceType: 'fault-instance',
      resourceId: instanceId,
      from,
      to,
    });
    this.name = 'IllegalTransitionError';
    this.from = from;
    this.to = to;
  }
}

/**
 * Raised when a failure left backend state behind that could not be cleaned up.
 * The instance is kept in FAILED_PARTIAL for operator or reconciler attention.
 */
export class PartialFailureError extends FaultlineError {
  public readonly instanceId: string;

  constructor(instanceId: string, message: string, cause?: Error) {
    super(message, ErrorCode.PARTIAL_FAILURE, {
      resourceType: 'fault-instance',
      resourceId: instanceId,
      state: 'FAILED_PARTIAL',
    }, cause);
    this.name = 'PartialFailureError';
    this.instanceId = instanceId;
  }
}

export function isConflictError(error: unknown): error is ConflictError {
  return error instanceof ConflictError;
}
