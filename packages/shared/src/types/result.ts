/**
 * Structured operation results
 * @module @faultline/shared/types/result
 */

import type { FaultlineError } from '../errors/base-error';

/**
 * Result of an engine API call. Failures carry a typed error, never a raw throwable.
 */
export type EngineResult<T> =
  | { success: true; data: T }
  | { success: false; error: FaultlineError };

export function ok<T>(data: T): EngineResult<T> {
  return { success: true, data };
}

export function fail<T>(error: FaultlineError): EngineResult<T> {
  return { success: false, error };
}
