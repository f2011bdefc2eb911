/**
 * Fault instance types and lifecycle state machine
 * @module @faultline/shared/types/instance
 */

import type { BackendHandle, BackendKind } from './backend';
import type { FaultRequest } from './request';

/**
 * Lifecycle state of a fault instance
 * - PENDING: validated, not yet applied
 * - ACTIVE: applied, handle recorded
 * - REVERTING: revert in progress
 * - REVERTED: terminal, success
 * - FAILED_PARTIAL: terminal but retryable; backend state needs attention
 * - REJECTED: terminal, never applied
 */
export type FaultState =
  | 'PENDING'
  | 'ACTIVE'
  | 'REVERTING'
  | 'REVERTED'
  | 'FAILED_PARTIAL'
  | 'REJECTED';

/**
 * Allowed transitions, keyed by source state
 */
export const FAULT_STATE_TRANSITIONS: Readonly<Record<FaultState, readonly FaultState[]>> = {
  PENDING: ['ACTIVE', 'REJECTED', 'FAILED_PARTIAL'],
  ACTIVE: ['REVERTING', 'FAILED_PARTIAL'],
  REVERTING: ['REVERTED', 'FAILED_PARTIAL'],
  FAILED_PARTIAL: ['REVERTING'],
  REVERTED: [],
  REJECTED: [],
};

/**
 * States in which the instance holds a backend handle
 */
export const HANDLE_STATES: readonly FaultState[] = ['ACTIVE', 'REVERTING', 'FAILED_PARTIAL'];

/**
 * States that no longer change without operator action
 */
export const TERMINAL_STATES: readonly FaultState[] = ['REVERTED', 'FAILED_PARTIAL', 'REJECTED'];

/**
 * Check if a transition is allowed
 */
export function canTransition(from: FaultState, to: FaultState): boolean {
  return FAULT_STATE_TRANSITIONS[from].includes(to);
}

/**
 * Check if a state is terminal
 */
export function isTerminalState(state: FaultState): boolean {
  return TERMINAL_STATES.includes(state);
}

/**
 * Serialized error kept on an instance
 */
export interface InstanceError {
  name: string;
  code: number;
  message: string;
}

/**
 * Lifecycle history entry
 */
export interface InstanceHistoryEntry {
  from: FaultState | null;
  to: FaultState;
  reason: string;
  at: Date;
}

/**
 * Authoritative unit of engine state
 */
export interface FaultInstance {
  instanceId: string;
  request: FaultRequest;
  templateId: string;
  templateVersion: number;
  backend: BackendKind;
  /** Copied from the template: may coexist with overlapping instances */
  composable: boolean;
  state: FaultState;
  createdAt: Date;
  updatedAt: Date;
  activatedAt?: Date;
  expiresAt?: Date;
  backendHandle?: BackendHandle;
  lastError?: InstanceError;
  history: InstanceHistoryEntry[];
}

/**
 * Filters for listing instances
 */
export interface FaultInstanceFilters {
  state?: FaultState | FaultState[];
  namespace?: string;
  templateId?: string;
}
