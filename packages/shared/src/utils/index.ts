/**
 * General utilities
 * @module @faultline/shared/utils
 */

import { randomUUID } from 'node:crypto';
import type { RetryPolicy } from '../types/config';

/**
 * Generate a random UUID (v4)
 */
export function generateUUID(): string {
  return randomUUID();
}

/**
 * Current time as an ISO string
 */
export function nowISO(): string {
  return new Date().toISOString();
}

/**
 * Resolve after the given delay
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Check if a value is a plain object record
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep clone plain data (Dates, Maps, arrays and objects)
 */
export function deepClone<T>(value: T): T {
  return structuredClone(value);
}

/**
 * Backoff delay before the given retry (1-based), capped at maxDelayMs
 */
export function backoffDelay(policy: RetryPolicy, retryNumber: number): number {
  const delay = policy.baseDelayMs * Math.pow(policy.factor, retryNumber - 1);
  return Math.min(delay, policy.maxDelayMs);
}

/**
 * Retry options
 */
export interface RetryOptions {
  policy: RetryPolicy;
  /** Decide whether a failure is worth another attempt */
  shouldRetry: (error: unknown) => boolean;
  /** Called before each retry */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

/**
 * Run an async operation with bounded exponential backoff.
 * Non-retryable failures and the last failure are rethrown as is.
 */
export async function retry<T>(operation: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const attempts = Math.max(1, options.policy.attempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= attempts || !options.shouldRetry(error)) {
        throw error;
      }
      const delayMs = backoffDelay(options.policy, attempt);
      options.onRetry?.(error, attempt, delayMs);
      await sleep(delayMs);
    }
  }
}

/**
 * Race a promise against a timer. The timer is cleared once the promise settles.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Group items by a key
 */
export function groupBy<T, K>(items: Iterable<T>, keyOf: (item: T) => K): Map<K, T[]> {
  const groups = new Map<K, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    const group = groups.get(key);
    if (group) {
      group.push(item);
    } else {
      groups.set(key, [item]);
    }
  }
  return groups;
}
