/**
 * Engine configuration types
 * @module @faultline/shared/types/config
 */

import { DEFAULT_FAULT_NAMESPACE } from './request';

/**
 * Bounded exponential backoff
 */
export interface RetryPolicy {
  /** Total attempts, including the first */
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  factor: number;
}

/**
 * kubectl invocation settings
 */
export interface KubectlConfig {
  binary: string;
  /** kubeconfig context, current context when unset */
  context?: string;
  /** Per-invocation timeout */
  timeoutMs: number;
}

/**
 * Engine configuration
 */
export interface EngineConfig {
  /** Namespace used when a request names none */
  defaultNamespace: string;
  /** Upper bound for request TTLs */
  maxTtlSeconds: number;
  /** Interval between reconciliation passes */
  reconcileIntervalMs: number;
  /** How long a backend may report UNKNOWN before the instance is marked FAILED_PARTIAL */
  unknownGracePeriodMs: number;
  /** Bound on each status call during reconciliation */
  statusTimeoutMs: number;
  /** Retry policy for transient apply/revert failures */
  retry: RetryPolicy;
  /** Directory holding index.yaml and rendering definitions */
  templatesDir?: string;
  kubectl: KubectlConfig;
}

/**
 * Default engine configuration
 */
export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  defaultNamespace: DEFAULT_FAULT_NAMESPACE,
  maxTtlSeconds: 24 * 60 * 60,
  reconcileIntervalMs: 15_000,
  unknownGracePeriodMs: 60_000,
  statusTimeoutMs: 5_000,
  retry: {
    attempts: 4,
    baseDelayMs: 250,
    maxDelayMs: 4_000,
    factor: 2,
  },
  kubectl: {
    binary: 'kubectl',
    timeoutMs: 30_000,
  },
};
