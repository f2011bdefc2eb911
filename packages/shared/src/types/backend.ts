/**
 * Backend adapter contract
 * @module @faultline/shared/types/backend
 */

import type { FaultTemplate } from './template';
import type { ValidatedRequest } from './request';

/**
 * Supported backend families
 * - chaos-mesh: declarative Chaos Mesh custom resources applied through kubectl
 * - chaosd: host agent (declared, not implemented)
 * - custom: user-supplied executor
 */
export type BackendKind = 'chaos-mesh' | 'chaosd' | 'custom';

/**
 * All known backend kinds
 */
export const BACKEND_KINDS: readonly BackendKind[] = ['chaos-mesh', 'chaosd', 'custom'];

/**
 * Check if a value names a known backend kind
 */
export function isBackendKind(value: unknown): value is BackendKind {
  return typeof value === 'string' && BACKEND_KINDS.some(kind => kind === value);
}

/**
 * Adapter operations, used in error reporting
 */
export type BackendOperation = 'render' | 'apply' | 'revert' | 'status';

/**
 * Backend-specific artifact produced by render
 */
export interface Artifact {
  backend: BackendKind;
  templateId: string;
  /** Fault name the artifact is created under */
  name: string;
  namespace: string;
  /** Structured artifact */
  manifest: Record<string, unknown>;
  /** Serialized form submitted to the backend */
  document: string;
}

/**
 * Opaque token the adapter needs to revert or query a fault later
 */
export interface BackendHandle {
  backend: BackendKind;
  token: string;
  issuedAt: Date;
}

/**
 * Live state of a fault on its backend.
 * UNKNOWN means the backend could not be reached, not that the fault is gone.
 */
export type BackendStatus = 'RUNNING' | 'COMPLETED' | 'GONE' | 'UNKNOWN';

/**
 * Outcome of a revert
 */
export type RevertOutcome = 'reverted' | 'already-reverted' | 'not-applied' | 'unsupported';

export interface RevertResult {
  outcome: RevertOutcome;
  message?: string;
}

/**
 * One implementation per backend family
 */
export interface BackendAdapter {
  readonly kind: BackendKind;
  /** Pure transformation of a validated request into an artifact */
  render(template: FaultTemplate, request: ValidatedRequest): Artifact;
  /** Submit the artifact; resolves with the handle needed to revert it */
  apply(artifact: Artifact): Promise<BackendHandle>;
  /** Best-effort, idempotent undo */
  revert(handle: BackendHandle): Promise<RevertResult>;
  /** Used for reconciliation */
  status(handle: BackendHandle): Promise<BackendStatus>;
}
