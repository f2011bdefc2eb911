/**
 * Unit tests for the reactive stores
 * @module @faultline/core/tests/unit/stores
 */

import { describe, it, expect, beforeEach } from 'vitest';

import type { FaultInstance, FaultState, FaultTemplate } from '@faultline/shared';
import { InstanceStore, TemplateStore, detach } from '../../src';
import { testRequest } from '../helpers/fixtures';

const AT = new Date('2026-01-01T00:00:00.000Z');

function instance(store: InstanceStore, state: FaultState, namespace = 'default'): FaultInstance {
  return store.insert({
    instanceId: store.nextInstanceId(),
    request: testRequest({ namespace }),
    templateId: 'cpu-throttle',
    templateVersion: 1,
    backend: 'custom',
    composable: false,
    state,
    createdAt: AT,
    updatedAt: AT,
    history: [],
  });
}

function template(templateId: string, backend: FaultTemplate['backend']): FaultTemplate {
  return {
    templateId,
    version: 1,
    backend,
    composable: false,
    parameters: {},
    render: { path: `${templateId}.yaml`, definition: 'kind: a\n' },
  };
}

describe('InstanceStore', () => {
  let store: InstanceStore;

  beforeEach(() => {
    store = new InstanceStore(2);
  });

  it('should allocate sequential instance IDs', () => {
    expect(store.nextInstanceId()).toMatch(/^fi-0001-[0-9a-f]{8}$/);
    expect(store.nextInstanceId()).toMatch(/^fi-0002-[0-9a-f]{8}$/);
  });

  it('should keep computed views in step with the instances', () => {
    const active = instance(store, 'ACTIVE');
    instance(store, 'PENDING');
    instance(store, 'ACTIVE', 'staging');

    expect(store.instanceCount.value).toBe(3);
    expect(store.activeInstances.value).toHaveLength(2);
    expect(store.instancesByNamespace.value.get('staging')).toHaveLength(1);

    active.state = 'REVERTING';

    expect(store.activeInstances.value).toHaveLength(1);
    expect(store.instancesByState.value.get('REVERTING')?.[0]?.instanceId).toBe(active.instanceId);
  });

  it('should order instances by creation', () => {
    const first = instance(store, 'PENDING');
    const second = instance(store, 'PENDING');

    expect(store.orderOf(first.instanceId)).toBeLessThan(store.orderOf(second.instanceId));
    expect(store.orderOf('fi-unknown')).toBe(Number.POSITIVE_INFINITY);
    expect(store.find().map(i => i.instanceId)).toEqual([first.instanceId, second.instanceId]);
  });

  it('should hand out detached snapshots', () => {
    const live = instance(store, 'ACTIVE');
    const snapshot = store.snapshot(live.instanceId);

    expect(snapshot).toEqual(detach(live));
    if (snapshot) {
      snapshot.state = 'REVERTED';
    }
    expect(store.get(live.instanceId)?.state).toBe('ACTIVE');
  });

  it('should keep a bounded archive', () => {
    const ids = ['REVERTED', 'REJECTED', 'REVERTED'].map(state => {
      const created = instance(store, state === 'REJECTED' ? 'REJECTED' : 'REVERTED');
      store.archive(created.instanceId);
      return created.instanceId;
    });

    expect(store.find()).toEqual([]);
    expect(store.has(ids[0] ?? '')).toBe(false);
    expect(store.snapshot(ids[1] ?? '')?.state).toBe('REJECTED');
    expect(store.has(ids[2] ?? '')).toBe(true);
    expect(store.archive('fi-unknown')).toBe(false);
  });
});

describe('TemplateStore', () => {
  it('should swap the whole catalog at once', () => {
    const store = new TemplateStore();
    const first = new Map([['a', template('a', 'chaos-mesh')]]);
    const second = new Map([
      ['b', template('b', 'chaos-mesh')],
      ['c', template('c', 'custom')],
    ]);

    store.swap(first, AT);
    const previous = store.swap(second);

    expect(previous).toBe(first);
    expect(store.get('a')).toBeUndefined();
    expect(store.ids()).toEqual(['b', 'c']);
    expect(store.templateCount.value).toBe(2);
    expect(store.templatesByBackend.value.get('custom')?.map(t => t.templateId)).toEqual(['c']);
    expect(store.loadedAt.value).not.toBe(AT);
  });
});
