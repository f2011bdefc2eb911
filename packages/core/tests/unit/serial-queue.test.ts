/**
 * Unit tests for KeyedSerialQueue
 * @module @faultline/core/tests/unit/serial-queue
 */

import { describe, it, expect } from 'vitest';

import { KeyedSerialQueue } from '../../src';
import { Gate } from '../helpers/fixtures';

describe('KeyedSerialQueue', () => {
  it('should run tasks under one key in submission order', async () => {
    const queue = new KeyedSerialQueue();
    const gate = new Gate();
    const events: string[] = [];

    const first = queue.run('a', async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
      return 1;
    });
    const second = queue.run('a', async () => {
      events.push('second');
      return 2;
    });

    await Promise.resolve();
    await Promise.resolve();
    expect(events).toEqual(['first:start']);
    expect(queue.isBusy('a')).toBe(true);

    gate.open();
    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(events).toEqual(['first:start', 'first:end', 'second']);
  });

  it('should run different keys concurrently', async () => {
    const queue = new KeyedSerialQueue();
    const gate = new Gate();

    const blocked = queue.run('a', () => gate.promise);
    const other = await queue.run('b', async () => 'done');

    expect(other).toBe('done');
    gate.open();
    await blocked;
  });

  it('should keep going after a failed task', async () => {
    const queue = new KeyedSerialQueue();

    const failed = queue.run('a', async () => {
      throw new Error('boom');
    });
    const next = queue.run('a', async () => 'next');

    await expect(failed).rejects.toThrow('boom');
    expect(await next).toBe('next');
  });

  it('should forget keys once idle', async () => {
    const queue = new KeyedSerialQueue();

    await queue.run('a', async () => undefined);
    await new Promise(resolve => setTimeout(resolve, 0));

    expect(queue.isBusy('a')).toBe(false);
    expect(queue.size).toBe(0);
  });
});
