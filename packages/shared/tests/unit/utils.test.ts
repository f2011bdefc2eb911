/**
 * Unit tests for retry, timeout and grouping helpers
 */

import { describe, it, expect, vi } from 'vitest';

import { backoffDelay, groupBy, retry, withTimeout, type RetryPolicy } from '../../src';

const immediate: RetryPolicy = { attempts: 3, baseDelayMs: 0, maxDelayMs: 0, factor: 2 };

describe('backoffDelay', () => {
  it('should grow exponentially up to the cap', () => {
    const policy: RetryPolicy = { attempts: 5, baseDelayMs: 100, maxDelayMs: 350, factor: 2 };

    expect(backoffDelay(policy, 1)).toBe(100);
    expect(backoffDelay(policy, 2)).toBe(200);
    expect(backoffDelay(policy, 3)).toBe(350);
  });
});

describe('retry', () => {
  it('should retry until the operation succeeds', async () => {
    const onRetry = vi.fn();
    let calls = 0;

    const result = await retry(async (attempt) => {
      calls++;
      if (attempt < 3) throw new Error('flaky');
      return 'done';
    }, { policy: immediate, shouldRetry: () => true, onRetry });

    expect(result).toBe('done');
    expect(calls).toBe(3);
    expect(onRetry.mock.calls.map(call => [call[1], call[2]])).toEqual([[1, 0], [2, 0]]);
  });

  it('should rethrow non-retryable failures immediately', async () => {
    const operation = vi.fn(async () => {
      throw new Error('rejected');
    });

    await expect(retry(operation, { policy: immediate, shouldRetry: () => false })).rejects.toThrow('rejected');
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('should give up after the last attempt', async () => {
    const operation = vi.fn(async () => {
      throw new Error('still down');
    });

    await expect(retry(operation, { policy: immediate, shouldRetry: () => true })).rejects.toThrow('still down');
    expect(operation).toHaveBeenCalledTimes(3);
  });
});

describe('withTimeout', () => {
  it('should resolve with the value when in time', async () => {
    await expect(withTimeout(Promise.resolve(7), 50, () => new Error('late'))).resolves.toBe(7);
  });

  it('should reject with the timeout error', async () => {
    const never = new Promise<number>(() => undefined);
    await expect(withTimeout(never, 5, () => new Error('late'))).rejects.toThrow('late');
  });
});

describe('groupBy', () => {
  it('should keep item order within groups', () => {
    const groups = groupBy(['ab', 'b', 'ac', 'c'], s => s.length);
    expect(groups.get(2)).toEqual(['ab', 'ac']);
    expect(groups.get(1)).toEqual(['b', 'c']);
  });
});
