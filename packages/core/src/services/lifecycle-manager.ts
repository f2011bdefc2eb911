/**
 * Fault lifecycle manager
 * Owns instance records and enforces the lifecycle state machine
 * @module @faultline/core/services/lifecycle-manager
 */

import type {
  BackendHandle,
  FaultInstance,
  FaultInstanceFilters,
  FaultState,
  InstanceError,
  FaultTemplate,
  ValidatedRequest,
} from '@faultline/shared';
import {
  ConflictError,
  ErrorCode,
  FaultlineError,
  HANDLE_STATES,
  IllegalTransitionError,
  InstanceNotFoundError,
  canTransition,
  createServiceLogger,
  describeSelector,
  isTerminalState,
  selectorsOverlap,
} from '@faultline/shared';
import { InstanceStore, detach } from '../stores/instance-store';
import { KeyedSerialQueue } from './serial-queue';

/**
 * Logger for lifecycle operations
 */
const logger = createServiceLogger({
  level: 'debug',
  service: 'faultline',
}, { component: 'lifecycle-manager' });

/**
 * States whose instances exclude overlapping newcomers
 */
const BLOCKING_STATES: readonly FaultState[] = ['ACTIVE', 'REVERTING'];

/**
 * Lifecycle manager options
 */
export interface LifecycleManagerOptions {
  store?: InstanceStore;
  /** Clock, injectable for tests */
  now?: () => Date;
}

/**
 * Lifecycle manager.
 * All state changes go through here; every one is recorded in the instance history.
 */
export class FaultLifecycleManager {
  readonly store: InstanceStore;
  private readonly now: () => Date;
  private readonly queue = new KeyedSerialQueue();
  private readonly settled = new Map<string, { promise: Promise<void>; resolve: () => void }>();
  private readonly unknownSince = new Map<string, Date>();

  constructor(options: LifecycleManagerOptions = {}) {
    this.store = options.store ?? new InstanceStore();
    this.now = options.now ?? (() => new Date());
  }

  // ===========================================================================
  // Creation and lookup
  // ===========================================================================

  /**
   * Record a new PENDING instance for a validated request
   */
  create(validated: ValidatedRequest, template: FaultTemplate): FaultInstance {
    const at = this.now();
    const instanceId = this.store.nextInstanceId();

    const instance = this.store.insert({
      instanceId,
      request: validated.request,
      templateId: template.templateId,
      templateVersion: template.version,
      backend: template.backend,
      composable: template.composable,
      state: 'PENDING',
      createdAt: at,
      updatedAt: at,
      history: [{ from: null, to: 'PENDING', reason: 'submitted', at }],
    });

    let resolve: () => void = () => undefined;
    const promise = new Promise<void>(r => {
      resolve = r;
    });
    this.settled.set(instanceId, { promise, resolve });

    logger.forInstance(instanceId).info('Fault instance created', {
      templateId: template.templateId,
      namespace: validated.request.metadata.namespace,
      selector: describeSelector(validated.request.spec.selector),
    });

    return detach(instance);
  }

  /**
   * Snapshot of a live or archived instance
   */
  get(instanceId: string): FaultInstance | undefined {
    return this.store.snapshot(instanceId);
  }

  /**
   * Snapshot of an instance, or InstanceNotFoundError
   */
  require(instanceId: string): FaultInstance {
    const instance = this.store.snapshot(instanceId);
    if (!instance) {
      throw new InstanceNotFoundError(instanceId);
    }
    return instance;
  }

  has(instanceId: string): boolean {
    return this.store.has(instanceId);
  }

  /**
   * Snapshots of live instances matching the filters
   */
  list(filters: FaultInstanceFilters = {}): FaultInstance[] {
    return this.store.find(filters).map(detach);
  }

  /**
   * Active instances whose TTL has elapsed at `at`
   */
  expired(at: Date = this.now()): FaultInstance[] {
    return this.store.activeInstances.value
      .filter(i => i.expiresAt !== undefined && i.expiresAt.getTime() <= at.getTime())
      .map(detach);
  }

  // ===========================================================================
  // Serialization
  // ===========================================================================

  /**
   * Run a task after every earlier task on the same instance has finished
   */
  run<T>(instanceId: string, task: () => Promise<T>): Promise<T> {
    return this.queue.run(instanceId, task);
  }

  /**
   * Wait until earlier overlapping PENDING instances have settled, then fail with
   * ConflictError if an overlapping ACTIVE or REVERTING instance remains.
   * Two instances conflict when they share a namespace, their selectors may overlap,
   * and neither template is composable. Independently of scope, a fault name is held
   * on its backend and namespace by any instance that still owns a handle.
   */
  async awaitClearance(instanceId: string): Promise<void> {
    for (;;) {
      const instance = this.live(instanceId);
      const peers = this.overlappingPeers(instance);
      const namesakes = this.namesakes(instance);
      const order = this.store.orderOf(instanceId);

      const pending = [...new Map([...peers, ...namesakes].map(p => [p.instanceId, p])).values()]
        .filter(p => p.state === 'PENDING' && this.store.orderOf(p.instanceId) < order);
      if (pending.length === 0) {
        const conflicting = peers.filter(p => BLOCKING_STATES.includes(p.state));
        if (conflicting.length > 0) {
          throw new ConflictError(
            instance.request.metadata.namespace,
            conflicting.map(p => p.instanceId),
            instanceId,
          );
        }
        const holders = namesakes.filter(p => HANDLE_STATES.includes(p.state));
        if (holders.length > 0) {
          throw new ConflictError(
            instance.request.metadata.namespace,
            holders.map(p => p.instanceId),
            instanceId,
            instance.request.metadata.name,
          );
        }
        return;
      }

      logger.forInstance(instanceId).debug('Waiting for overlapping pending instances', {
        waitingOn: pending.map(p => p.instanceId),
      });
      await Promise.all(pending.map(p => this.settledPromise(p.instanceId)));
    }
  }

  // ===========================================================================
  // Transitions
  // ===========================================================================

  /**
   * PENDING -> ACTIVE, recording the handle and TTL deadline
   */
  activate(instanceId: string, handle: BackendHandle): FaultInstance {
    const at = this.now();
    return this.transition(instanceId, 'ACTIVE', 'applied', instance => {
      instance.backendHandle = handle;
      instance.activatedAt = at;
      const ttl = instance.request.metadata.ttlSeconds;
      if (ttl !== undefined) {
        instance.expiresAt = new Date(at.getTime() + ttl * 1000);
      }
      instance.lastError = undefined;
    });
  }

  /**
   * PENDING -> REJECTED
   */
  reject(instanceId: string, error: FaultlineError, reason = 'rejected'): FaultInstance {
    return this.transition(instanceId, 'REJECTED', reason, instance => {
      instance.lastError = toInstanceError(error);
    });
  }

  /**
   * ACTIVE or FAILED_PARTIAL -> REVERTING
   */
  beginRevert(instanceId: string, reason: string): FaultInstance {
    return this.transition(instanceId, 'REVERTING', reason);
  }

  /**
   * REVERTING -> REVERTED. The handle is dropped; its token stays in the logs.
   */
  completeRevert(instanceId: string, reason = 'reverted'): FaultInstance {
    this.unknownSince.delete(instanceId);
    return this.transition(instanceId, 'REVERTED', reason, instance => {
      logger.forInstance(instanceId).debug('Releasing backend handle', {
        token: instance.backendHandle?.token,
      });
      instance.backendHandle = undefined;
    });
  }

  /**
   * Any non-terminal state -> FAILED_PARTIAL.
   * A handle is required; it is taken from the argument or kept from the instance.
   */
  markFailedPartial(instanceId: string, error: FaultlineError, handle?: BackendHandle): FaultInstance {
    this.unknownSince.delete(instanceId);
    return this.transition(instanceId, 'FAILED_PARTIAL', error.message, instance => {
      if (handle) {
        instance.backendHandle = handle;
      }
      if (!instance.backendHandle) {
        throw new FaultlineError(
          `Cannot mark ${instanceId} FAILED_PARTIAL without a backend handle`,
          ErrorCode.INTERNAL,
          { resourceType: 'fault-instance', resourceId: instanceId },
          error,
        );
      }
      instance.lastError = toInstanceError(error);
    });
  }

  /**
   * Archive a terminal instance once an operator has seen it
   */
  acknowledge(instanceId: string): FaultInstance {
    const instance = this.live(instanceId);
    if (!isTerminalState(instance.state)) {
      throw new FaultlineError(
        `Only terminal instances can be acknowledged; ${instanceId} is ${instance.state}`,
        ErrorCode.ILLEGAL_TRANSITION,
        { resourceType: 'fault-instance', resourceId: instanceId, state: instance.state },
      );
    }
    const snapshot = detach(instance);
    this.store.archive(instanceId);
    this.unknownSince.delete(instanceId);
    logger.forInstance(instanceId).info('Fault instance acknowledged', { state: instance.state });
    return snapshot;
  }

  // ===========================================================================
  // Backend reachability tracking
  // ===========================================================================

  /**
   * Record an UNKNOWN status observation. Returns how long the instance has been unknown.
   */
  noteUnknown(instanceId: string, at: Date = this.now()): number {
    const since = this.unknownSince.get(instanceId);
    if (!since) {
      this.unknownSince.set(instanceId, at);
      return 0;
    }
    return at.getTime() - since.getTime();
  }

  clearUnknown(instanceId: string): void {
    this.unknownSince.delete(instanceId);
  }

  /**
   * Drop all instances and tracking (for testing)
   */
  reset(): void {
    for (const entry of this.settled.values()) {
      entry.resolve();
    }
    this.settled.clear();
    this.unknownSince.clear();
    this.store.reset();
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private live(instanceId: string): FaultInstance {
    const instance = this.store.get(instanceId);
    if (!instance) {
      throw new InstanceNotFoundError(instanceId);
    }
    return instance;
  }

  private overlappingPeers(instance: FaultInstance): FaultInstance[] {
    const namespace = instance.request.metadata.namespace;
    return this.store.find({ namespace }).filter(peer =>
      peer.instanceId !== instance.instanceId &&
      !(peer.composable || instance.composable) &&
      selectorsOverlap(peer.request.spec.selector, instance.request.spec.selector),
    );
  }

  private namesakes(instance: FaultInstance): FaultInstance[] {
    const { name, namespace } = instance.request.metadata;
    return this.store.find({ namespace }).filter(peer =>
      peer.instanceId !== instance.instanceId &&
      peer.backend === instance.backend &&
      peer.request.metadata.name === name,
    );
  }

  private settledPromise(instanceId: string): Promise<void> {
    return this.settled.get(instanceId)?.promise ?? Promise.resolve();
  }

  private transition(
    instanceId: string,
    to: FaultState,
    reason: string,
    mutate?: (instance: FaultInstance) => void,
  ): FaultInstance {
    const instance = this.live(instanceId);
    const from = instance.state;
    if (!canTransition(from, to)) {
      throw new IllegalTransitionError(instanceId, from, to);
    }

    mutate?.(instance);
    const at = this.now();
    instance.state = to;
    instance.updatedAt = at;
    instance.history.push({ from, to, reason, at });

    if (from === 'PENDING') {
      this.settled.get(instanceId)?.resolve();
      this.settled.delete(instanceId);
    }

    const log = logger.forInstance(instanceId);
    if (to === 'FAILED_PARTIAL') {
      log.warn(`Fault instance ${from} -> ${to}`, { reason });
    } else {
      log.info(`Fault instance ${from} -> ${to}`, { reason });
    }

    return detach(instance);
  }
}

/**
 * Serializable summary of an error kept on an instance
 */
export function toInstanceError(error: FaultlineError): InstanceError {
  return { name: error.name, code: error.code, message: error.message };
}

/**
 * Create a lifecycle manager
 */
export function createLifecycleManager(options?: LifecycleManagerOptions): FaultLifecycleManager {
  return new FaultLifecycleManager(options);
}
