/**
 * Reactive fault instance store using Vue reactivity
 * @module @faultline/core/stores/instance-store
 */

import { reactive, computed, toRaw, type ComputedRef } from '@vue/reactivity';
import type {
  FaultInstance,
  FaultInstanceFilters,
  FaultState,
} from '@faultline/shared';
import { deepClone, generateUUID, groupBy } from '@faultline/shared';

/**
 * Archived terminal instances kept for status lookups
 */
const DEFAULT_ARCHIVE_LIMIT = 500;

/**
 * Raw store state
 */
export interface InstanceStoreState {
  /** Live instances keyed by instance ID */
  instances: Map<string, FaultInstance>;
  /** Acknowledged terminal instances, oldest first */
  archived: Map<string, FaultInstance>;
}

/**
 * Reactive store of fault instances.
 * Records handed out by `get` are live; use `snapshot` for anything leaving the engine.
 */
export class InstanceStore {
  readonly state: InstanceStoreState;

  /** Instances currently holding backend state */
  readonly activeInstances: ComputedRef<FaultInstance[]>;

  /** Live instances grouped by state */
  readonly instancesByState: ComputedRef<Map<FaultState, FaultInstance[]>>;

  /** Live instances grouped by namespace */
  readonly instancesByNamespace: ComputedRef<Map<string, FaultInstance[]>>;

  /** Live instance count */
  readonly instanceCount: ComputedRef<number>;

  private sequence = 0;
  private insertions = 0;
  private readonly order = new Map<string, number>();

  constructor(private readonly archiveLimit = DEFAULT_ARCHIVE_LIMIT) {
    this.state = reactive<InstanceStoreState>({
      instances: new Map(),
      archived: new Map(),
    });

    this.activeInstances = computed(() =>
      [...this.state.instances.values()].filter(i => i.state === 'ACTIVE'),
    );

    this.instancesByState = computed(() =>
      groupBy(this.state.instances.values(), i => i.state),
    );

    this.instancesByNamespace = computed(() =>
      groupBy(this.state.instances.values(), i => i.request.metadata.namespace),
    );

    this.instanceCount = computed(() => this.state.instances.size);
  }

  /**
   * Allocate a fresh instance ID. IDs are never reused within the process.
   */
  nextInstanceId(): string {
    this.sequence += 1;
    return `fi-${this.sequence.toString(36).padStart(4, '0')}-${generateUUID().slice(0, 8)}`;
  }

  /**
   * Insert a new instance and return its live record
   */
  insert(instance: FaultInstance): FaultInstance {
    this.state.instances.set(instance.instanceId, instance);
    this.insertions += 1;
    this.order.set(instance.instanceId, this.insertions);
    const live = this.state.instances.get(instance.instanceId);
    return live ?? instance;
  }

  /**
   * Live record of an instance
   */
  get(instanceId: string): FaultInstance | undefined {
    return this.state.instances.get(instanceId);
  }

  /**
   * Creation order of an instance; lower was created earlier
   */
  orderOf(instanceId: string): number {
    return this.order.get(instanceId) ?? Number.POSITIVE_INFINITY;
  }

  /**
   * Detached copy of a live or archived instance
   */
  snapshot(instanceId: string): FaultInstance | undefined {
    const instance = this.state.instances.get(instanceId) ?? this.state.archived.get(instanceId);
    return instance ? detach(instance) : undefined;
  }

  /**
   * Live instances matching the filters, oldest first
   */
  find(filters: FaultInstanceFilters = {}): FaultInstance[] {
    const states = filters.state === undefined
      ? undefined
      : Array.isArray(filters.state) ? filters.state : [filters.state];

    return [...this.state.instances.values()].filter(instance => {
      if (states && !states.includes(instance.state)) return false;
      if (filters.namespace && instance.request.metadata.namespace !== filters.namespace) return false;
      if (filters.templateId && instance.templateId !== filters.templateId) return false;
      return true;
    });
  }

  /**
   * Move an instance out of the live set. The oldest archived entries are dropped past the limit.
   */
  archive(instanceId: string): boolean {
    const instance = this.state.instances.get(instanceId);
    if (!instance) {
      return false;
    }
    this.state.instances.delete(instanceId);
    this.order.delete(instanceId);
    this.state.archived.set(instanceId, instance);

    while (this.state.archived.size > this.archiveLimit) {
      const oldest = this.state.archived.keys().next();
      if (oldest.done) break;
      this.state.archived.delete(oldest.value);
    }
    return true;
  }

  /**
   * Check whether an ID is known, live or archived
   */
  has(instanceId: string): boolean {
    return this.state.instances.has(instanceId) || this.state.archived.has(instanceId);
  }

  /**
   * Clear all instances (for testing). The ID sequence keeps counting.
   */
  reset(): void {
    this.state.instances.clear();
    this.state.archived.clear();
    this.order.clear();
  }
}

/**
 * Deep copy of an instance, free of reactive proxies
 */
export function detach(instance: FaultInstance): FaultInstance {
  return deepClone(toRaw(instance));
}

/**
 * Create an empty instance store
 */
export function createInstanceStore(archiveLimit?: number): InstanceStore {
  return new InstanceStore(archiveLimit);
}
