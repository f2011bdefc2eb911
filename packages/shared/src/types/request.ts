/**
 * Fault request types
 * @module @faultline/shared/types/request
 */

import type { Labels, TargetSelector } from './labels';
import type { ParameterValue } from './template';

/**
 * Namespace used when a request does not name one
 */
export const DEFAULT_FAULT_NAMESPACE = 'chaos-testing';

/**
 * Descriptive metadata of a fault request
 */
export interface FaultMetadata {
  /** Name the fault is created under on the backend */
  name: string;
  /** Namespace / scope the target selector applies to */
  namespace: string;
  /** Revert automatically after this many seconds */
  ttlSeconds?: number;
  /** Extra labels propagated to the backend artifact */
  labels?: Labels;
}

/**
 * What to target and with which parameters
 */
export interface FaultSpec {
  selector: TargetSelector;
  parameters: Record<string, ParameterValue>;
}

/**
 * Normalized, backend-agnostic description of intent
 */
export interface FaultRequest {
  templateId: string;
  /** Pin the template version the caller built the request against */
  templateVersion?: number;
  metadata: FaultMetadata;
  spec: FaultSpec;
}

/**
 * Request that passed validation against a specific template version
 */
export interface ValidatedRequest {
  request: FaultRequest;
  templateVersion: number;
  /** Parameters with template defaults applied */
  parameters: Record<string, ParameterValue>;
  /** Effective TTL, if any */
  ttlSeconds?: number;
}

/**
 * Caller-side input, before normalization
 */
export interface FaultRequestInput {
  templateId: string;
  templateVersion?: number;
  metadata?: Partial<FaultMetadata>;
  spec?: Partial<FaultSpec>;
}

/**
 * Fault name derived from a template ID, e.g. `host/disk_fill` -> `host-disk-fill-instance`
 */
export function defaultFaultName(templateId: string): string {
  const base = templateId.toLowerCase().replace(/[^a-z0-9.]+/g, '-').replace(/^[-.]+|[-.]+$/g, '');
  return `${base || 'fault'}-instance`;
}

/**
 * Build a normalized request, filling in a default name and namespace.
 *
 * @example
 * createFaultRequest({ templateId: 'cpu-throttle', spec: { selector: { pods: ['worker-0'] } } })
 * // metadata: { name: 'cpu-throttle-instance', namespace: 'chaos-testing' }
 */
export function createFaultRequest(
  input: FaultRequestInput,
  defaultNamespace: string = DEFAULT_FAULT_NAMESPACE,
): FaultRequest {
  const metadata = input.metadata ?? {};
  const request: FaultRequest = {
    templateId: input.templateId,
    metadata: {
      ...metadata,
      name: metadata.name ?? defaultFaultName(input.templateId),
      namespace: metadata.namespace ?? defaultNamespace,
    },
    spec: {
      selector: input.spec?.selector ?? {},
      parameters: input.spec?.parameters ?? {},
    },
  };
  if (input.templateVersion !== undefined) {
    request.templateVersion = input.templateVersion;
  }
  return request;
}
