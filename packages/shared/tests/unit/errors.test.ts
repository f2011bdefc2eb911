/**
 * Unit tests for the error taxonomy
 */

import { describe, it, expect } from 'vitest';

import {
  ApplyError,
  ConflictError,
  ErrorCode,
  FaultlineError,
  IllegalTransitionError,
  InvalidTemplateError,
  RevertError,
  TemplateNotFoundError,
  TimeoutError,
  UnsupportedError,
  ValidationError,
  isApplyError,
  isFaultlineError,
  wrapError,
} from '../../src';

const handle = { backend: 'chaos-mesh' as const, token: 'shop/podchaos.chaos-mesh.org/kill-1', issuedAt: new Date(0) };

describe('FaultlineError', () => {
  it('should treat transient and reachability codes as retryable', () => {
    expect(new FaultlineError('x', ErrorCode.BACKEND_UNREACHABLE).isRetryable()).toBe(true);
    expect(new FaultlineError('x', ErrorCode.INSTANCE_CONFLICT).isRetryable()).toBe(true);
    expect(new FaultlineError('x', ErrorCode.VALIDATION_FAILED).isRetryable()).toBe(false);
    expect(new FaultlineError('x', ErrorCode.TEMPLATE_NOT_FOUND).isRetryable()).toBe(false);
  });

  it('should serialize to JSON with its meta', () => {
    const error = new FaultlineError('boom', ErrorCode.INTERNAL, { resourceId: 'fi-1' });
    const json = error.toJSON();

    expect(json).toEqual({
      error: {
        name: 'FaultlineError',
        code: ErrorCode.INTERNAL,
        message: 'boom',
        meta: { resourceId: 'fi-1' },
        timestamp: error.timestamp.toISOString(),
      },
    });
  });

  it('should wrap unknown errors', () => {
    const cause = new Error('boom');
    const wrapped = wrapError(cause);
    expect(wrapped.code).toBe(ErrorCode.UNKNOWN);
    expect(wrapped.message).toBe('boom');
    expect(wrapped.cause).toBe(cause);

    expect(wrapError('plain').message).toBe('plain');

    const original = new TemplateNotFoundError('cpu');
    expect(wrapError(original)).toBe(original);
  });
});

describe('backend errors', () => {
  it('should classify apply failures', () => {
    const transient = ApplyError.transient('chaos-mesh', 'connection refused');
    const rejected = ApplyError.rejected('chaos-mesh', 'admission webhook denied');

    expect(transient.code).toBe(ErrorCode.APPLY_TRANSIENT);
    expect(transient.isTransient()).toBe(true);
    expect(transient.isRetryable()).toBe(true);

    expect(rejected.code).toBe(ErrorCode.APPLY_REJECTED);
    expect(rejected.isTransient()).toBe(false);
    expect(rejected.isRetryable()).toBe(false);
    expect(rejected.meta.backend).toBe('chaos-mesh');
    expect(isApplyError(rejected)).toBe(true);
  });

  it('should take revert retryability from the transient flag', () => {
    expect(new RevertError(handle, 'i/o timeout', true).isRetryable()).toBe(true);
    expect(new RevertError(handle, 'forbidden').isRetryable()).toBe(false);
    expect(new RevertError(handle, 'forbidden').meta.token).toBe(handle.token);
  });

  it('should describe timeouts and unsupported operations', () => {
    const timeout = new TimeoutError('apply', 500, handle);
    expect(timeout.message).toBe('Backend apply timed out after 500ms');
    expect(timeout.partialHandle).toBe(handle);

    const unsupported = new UnsupportedError('chaosd', 'apply');
    expect(unsupported.message).toBe('Backend "chaosd" does not support apply');
  });
});

describe('ValidationError', () => {
  it('should list each failing field once', () => {
    const error = ValidationError.multiple([
      { field: 'metadata.name', message: 'a' },
      { field: 'spec.selector', message: 'b' },
      { field: 'metadata.name', message: 'c' },
    ]);

    expect(error.message).toBe('Validation failed for fields: metadata.name, spec.selector');
    expect(error.details).toHaveLength(3);
    expect(isFaultlineError(error)).toBe(true);
  });
});

describe('InvalidTemplateError', () => {
  it('should carry every issue', () => {
    const error = new InvalidTemplateError([
      { templateId: 'cpu', field: 'backend', message: 'x' },
      { templateId: 'disk', field: 'path', message: 'y' },
      { templateId: 'cpu', field: 'version', message: 'z' },
    ]);

    expect(error.message).toBe('Invalid template source: 3 issue(s) in cpu, disk');
    expect(error.issuesFor('cpu').map(i => i.field)).toEqual(['backend', 'version']);
    expect(error.toJSON()).toMatchObject({ error: { name: 'InvalidTemplateError', issues: error.issues } });
  });
});

describe('instance errors', () => {
  it('should name conflicting instances', () => {
    const error = new ConflictError('shop', ['fi-0001-a', 'fi-0002-b'], 'fi-0003-c');
    expect(error.message).toBe('Target overlaps active fault(s) in namespace "shop": fi-0001-a, fi-0002-b');
    expect(error.conflictingInstanceIds).toEqual(['fi-0001-a', 'fi-0002-b']);
    expect(error.meta.resourceId).toBe('fi-0003-c');
  });

  it('should name the fault when a name is taken', () => {
    const error = new ConflictError('shop', ['fi-0001-a'], 'fi-0002-b', 'cpu');
    expect(error.message).toBe('Fault name "cpu" is held by live fault(s) in namespace "shop": fi-0001-a');
    expect(error.meta.faultName).toBe('cpu');
    expect(error.code).toBe(ErrorCode.INSTANCE_CONFLICT);
  });

  it('should describe illegal transitions', () => {
    const error = new IllegalTransitionError('fi-1', 'REVERTED', 'ACTIVE');
    expect(error.message).toBe('Illegal transition REVERTED -> ACTIVE for fi-1');
    expect(error.code).toBe(ErrorCode.ILLEGAL_TRANSITION);
  });
});
