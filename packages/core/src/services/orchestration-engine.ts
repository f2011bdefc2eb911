/**
 * Orchestration engine
 * Public entry point: submit, revert, status and reconciliation of fault instances
 * @module @faultline/core/services/orchestration-engine
 */

import type {
  Artifact,
  BackendAdapter,
  BackendHandle,
  BackendStatus,
  EngineConfig,
  EngineResult,
  FaultInstance,
  FaultInstanceFilters,
  FaultRequest,
  FaultTemplate,
  RevertOutcome,
  RevertResult,
  TemplateSummary,
  ValidatedRequest,
} from '@faultline/shared';
import {
  ApplyError,
  DEFAULT_ENGINE_CONFIG,
  ErrorCode,
  FaultlineError,
  InstanceNotFoundError,
  PartialFailureError,
  RevertError,
  TemplateNotFoundError,
  TimeoutError,
  UnsupportedError,
  createServiceLogger,
  fail,
  isApplyError,
  isRevertError,
  ok,
  retry,
  withTimeout,
  wrapError,
} from '@faultline/shared';
import type { BackendAdapterRegistry } from '../adapters/adapter-registry';
import type { TemplateSource } from '../sources/template-source';
import { FaultLifecycleManager } from './lifecycle-manager';
import { RequestValidator } from './request-validator';
import type { TemplateRegistry } from './template-registry';

/**
 * Logger for engine operations
 */
const logger = createServiceLogger({
  level: 'debug',
  service: 'faultline',
}, { component: 'orchestration-engine' });

/**
 * Orchestration engine options
 */
export interface OrchestrationEngineOptions {
  registry: TemplateRegistry;
  adapters: BackendAdapterRegistry;
  config?: EngineConfig;
  validator?: RequestValidator;
  lifecycle?: FaultLifecycleManager;
  /** Clock, injectable for tests */
  now?: () => Date;
}

/**
 * Result of a revert call
 */
export interface RevertReport {
  instance: FaultInstance;
  outcome: RevertOutcome;
}

/**
 * What one reconciliation pass did
 */
export interface ReconcileReport {
  startedAt: Date;
  finishedAt: Date;
  /** Another pass was already running; nothing was checked */
  skipped: boolean;
  /** ACTIVE instances examined */
  checked: number;
  /** Reverted because their TTL elapsed */
  expired: string[];
  /** Reverted because the backend reported them finished */
  completed: string[];
  /** Marked FAILED_PARTIAL because their backend state disappeared */
  drifted: string[];
  /** Backend status could not be determined */
  unreachable: string[];
  /** Marked FAILED_PARTIAL after staying unreachable past the grace period */
  abandoned: string[];
  failed: Array<{ instanceId: string; error: FaultlineError }>;
}

function emptyReport(startedAt: Date, skipped: boolean): ReconcileReport {
  return {
    startedAt,
    finishedAt: startedAt,
    skipped,
    checked: 0,
    expired: [],
    completed: [],
    drifted: [],
    unreachable: [],
    abandoned: [],
    failed: [],
  };
}

function withInstanceId(error: unknown, instanceId: string): FaultlineError {
  const wrapped = wrapError(error);
  wrapped.meta.instanceId ??= instanceId;
  return wrapped;
}

/**
 * Orchestration engine.
 * Operations on one instance are serialized; operations on different instances run concurrently.
 */
export class OrchestrationEngine {
  readonly registry: TemplateRegistry;
  readonly adapters: BackendAdapterRegistry;
  readonly lifecycle: FaultLifecycleManager;
  readonly config: EngineConfig;
  private readonly validator: RequestValidator;
  private readonly now: () => Date;
  private reconcileTimer: ReturnType<typeof setInterval> | null = null;
  private reconciling = false;

  constructor(options: OrchestrationEngineOptions) {
    this.registry = options.registry;
    this.adapters = options.adapters;
    this.config = options.config ?? DEFAULT_ENGINE_CONFIG;
    this.now = options.now ?? (() => new Date());
    this.lifecycle = options.lifecycle ?? new FaultLifecycleManager({ now: this.now });
    this.validator = options.validator ?? new RequestValidator({ maxTtlSeconds: this.config.maxTtlSeconds });
  }

  // ===========================================================================
  // Templates
  // ===========================================================================

  /**
   * Load a template source, replacing the catalog atomically
   */
  async loadTemplates(source: TemplateSource): Promise<EngineResult<TemplateSummary[]>> {
    try {
      return ok(await this.registry.load(source));
    } catch (error) {
      return fail(wrapError(error));
    }
  }

  /**
   * Re-read the current template source. Instances keep the template version they were created with.
   */
  async reloadTemplates(): Promise<EngineResult<TemplateSummary[]>> {
    try {
      return ok(await this.registry.reload());
    } catch (error) {
      return fail(wrapError(error));
    }
  }

  listTemplates(): TemplateSummary[] {
    return this.registry.list();
  }

  // ===========================================================================
  // Submit
  // ===========================================================================

  /**
   * Validate, render and apply a fault request.
   * Unknown templates and invalid requests fail without creating an instance.
   */
  async submit(request: FaultRequest): Promise<EngineResult<FaultInstance>> {
    const template = this.registry.find(request.templateId);
    if (!template) {
      return fail(new TemplateNotFoundError(request.templateId, this.registry.ids()));
    }

    const validation = this.validator.validate(request, template);
    if (!validation.valid) {
      logger.debug('Fault request rejected by validation', {
        templateId: request.templateId,
        errorCount: validation.error.details.length,
      });
      return fail(validation.error);
    }

    const adapter = this.adapters.resolve(template.backend);
    const { instanceId } = this.lifecycle.create(validation.value, template);

    try {
      const instance = await this.lifecycle.run(instanceId, () =>
        this.provision(instanceId, template, validation.value, adapter),
      );
      return ok(instance);
    } catch (error) {
      return fail(withInstanceId(error, instanceId));
    }
  }

  private async provision(
    instanceId: string,
    template: FaultTemplate,
    validated: ValidatedRequest,
    adapter: BackendAdapter,
  ): Promise<FaultInstance> {
    const log = logger.forInstance(instanceId);

    try {
      await this.lifecycle.awaitClearance(instanceId);
    } catch (error) {
      const wrapped = wrapError(error);
      this.lifecycle.reject(instanceId, wrapped, 'conflict');
      throw wrapped;
    }

    let artifact: Artifact;
    try {
      artifact = adapter.render(template, validated);
    } catch (error) {
      const wrapped = wrapError(error, ErrorCode.RENDER_FAILED);
      this.lifecycle.reject(instanceId, wrapped, 'render failed');
      throw wrapped;
    }

    let handle: BackendHandle;
    try {
      handle = await retry(() => adapter.apply(artifact), {
        policy: this.config.retry,
        shouldRetry: error => isApplyError(error) && error.isTransient(),
        onRetry: (error, attempt, delayMs) => {
          log.warn('Transient apply failure, retrying', {
            attempt,
            delayMs,
            error: wrapError(error).message,
          });
        },
      });
    } catch (error) {
      throw await this.recoverFailedApply(instanceId, adapter, wrapError(error));
    }

    return this.lifecycle.activate(instanceId, handle);
  }

  /**
   * Settle an instance whose apply failed. Partial backend state is reverted when the
   * error names it; the instance ends REJECTED, or FAILED_PARTIAL if cleanup fails.
   */
  private async recoverFailedApply(
    instanceId: string,
    adapter: BackendAdapter,
    error: FaultlineError,
  ): Promise<FaultlineError> {
    const partialHandle = error instanceof ApplyError || error instanceof TimeoutError
      ? error.partialHandle
      : undefined;

    if (!partialHandle) {
      this.lifecycle.reject(instanceId, error, 'apply failed');
      return error;
    }

    const log = logger.forInstance(instanceId);
    log.warn('Apply may have left backend state, reverting it', { token: partialHandle.token });

    try {
      await this.revertHandle(adapter, partialHandle, instanceId);
      this.lifecycle.reject(instanceId, error, 'apply failed; partial state reverted');
      return error;
    } catch (revertError) {
      const cause = wrapError(revertError);
      this.lifecycle.markFailedPartial(instanceId, cause, partialHandle);
      log.error('Cleanup after failed apply did not complete', cause);
      return new PartialFailureError(
        instanceId,
        `Apply failed (${error.message}) and cleanup did not complete: ${cause.message}`,
        cause,
      );
    }
  }

  // ===========================================================================
  // Revert
  // ===========================================================================

  /**
   * Revert an instance. Idempotent: reverting a REVERTED instance succeeds without
   * touching the backend, and a REJECTED instance reports `not-applied`.
   * A revert issued while apply is in flight runs once apply has finished.
   */
  async revert(instanceId: string): Promise<EngineResult<RevertReport>> {
    if (!this.lifecycle.has(instanceId)) {
      return fail(new InstanceNotFoundError(instanceId));
    }

    try {
      return ok(await this.lifecycle.run(instanceId, () => this.revertInstance(instanceId, 'revert requested')));
    } catch (error) {
      return fail(withInstanceId(error, instanceId));
    }
  }

  /**
   * Revert body; must run on the instance's queue
   */
  private async revertInstance(instanceId: string, reason: string): Promise<RevertReport> {
    const instance = this.lifecycle.require(instanceId);

    switch (instance.state) {
      case 'REVERTED':
        return { instance, outcome: 'already-reverted' };
      case 'REJECTED':
        return { instance, outcome: 'not-applied' };
      case 'ACTIVE':
      case 'FAILED_PARTIAL':
        break;
      default:
        throw new FaultlineError(
          `Cannot revert ${instanceId} while ${instance.state}`,
          ErrorCode.ILLEGAL_TRANSITION,
          { resourceType: 'fault-instance', resourceId: instanceId, state: instance.state },
        );
    }

    const handle = instance.backendHandle;
    if (!handle) {
      throw new FaultlineError(`Instance ${instanceId} has no backend handle`, ErrorCode.INTERNAL, {
        resourceType: 'fault-instance',
        resourceId: instanceId,
      });
    }

    this.lifecycle.beginRevert(instanceId, reason);
    const adapter = this.adapters.resolve(instance.backend);

    let result: RevertResult;
    try {
      result = await this.revertHandle(adapter, handle, instanceId);
    } catch (error) {
      const wrapped = wrapError(error);
      this.lifecycle.markFailedPartial(instanceId, wrapped);
      throw wrapped;
    }

    return {
      instance: this.lifecycle.completeRevert(instanceId, reason),
      outcome: result.outcome,
    };
  }

  /**
   * Revert a handle through its adapter, retrying transient failures.
   * Throws RevertError, or UnsupportedError when the backend cannot revert.
   */
  private async revertHandle(adapter: BackendAdapter, handle: BackendHandle, instanceId: string): Promise<RevertResult> {
    const log = logger.forInstance(instanceId);

    const result = await retry(async () => {
      try {
        return await adapter.revert(handle);
      } catch (error) {
        if (isRevertError(error)) throw error;
        const cause = wrapError(error);
        throw new RevertError(handle, cause.message, cause.isRetryable(), cause);
      }
    }, {
      policy: this.config.retry,
      shouldRetry: error => isRevertError(error) && error.transient,
      onRetry: (error, attempt, delayMs) => {
        log.warn('Transient revert failure, retrying', {
          attempt,
          delayMs,
          error: wrapError(error).message,
        });
      },
    });

    if (result.outcome === 'unsupported') {
      throw new UnsupportedError(adapter.kind, 'revert');
    }
    return result;
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  /**
   * Snapshot of one instance, live or archived
   */
  status(instanceId: string): EngineResult<FaultInstance> {
    const instance = this.lifecycle.get(instanceId);
    return instance ? ok(instance) : fail(new InstanceNotFoundError(instanceId));
  }

  list(filters: FaultInstanceFilters = {}): FaultInstance[] {
    return this.lifecycle.list(filters);
  }

  /**
   * Archive a terminal instance
   */
  acknowledge(instanceId: string): EngineResult<FaultInstance> {
    try {
      return ok(this.lifecycle.acknowledge(instanceId));
    } catch (error) {
      return fail(wrapError(error));
    }
  }

  // ===========================================================================
  // Reconciliation
  // ===========================================================================

  /**
   * One reconciliation pass over ACTIVE instances.
   * Expired instances are reverted; backend status is compared with recorded state.
   * A pass started while another runs is skipped.
   */
  async reconcile(): Promise<ReconcileReport> {
    const startedAt = this.now();
    if (this.reconciling) {
      logger.debug('Reconciliation already running, skipping pass');
      return emptyReport(startedAt, true);
    }

    this.reconciling = true;
    const report = emptyReport(startedAt, false);
    try {
      const active = this.lifecycle.list({ state: 'ACTIVE' });
      await Promise.all(active.map(instance =>
        this.lifecycle.run(instance.instanceId, () => this.reconcileInstance(instance.instanceId, startedAt, report)),
      ));
    } finally {
      this.reconciling = false;
    }

    report.finishedAt = this.now();
    if (report.expired.length + report.completed.length + report.drifted.length + report.abandoned.length > 0) {
      logger.info('Reconciliation pass changed instances', {
        checked: report.checked,
        expired: report.expired.length,
        completed: report.completed.length,
        drifted: report.drifted.length,
        abandoned: report.abandoned.length,
      });
    }
    return report;
  }

  /**
   * Reconcile one instance; must run on its queue
   */
  private async reconcileInstance(instanceId: string, at: Date, report: ReconcileReport): Promise<void> {
    const instance = this.lifecycle.get(instanceId);
    if (!instance || instance.state !== 'ACTIVE' || !instance.backendHandle) {
      return;
    }
    report.checked += 1;

    try {
      if (instance.expiresAt && instance.expiresAt.getTime() <= at.getTime()) {
        await this.revertInstance(instanceId, 'ttl expired');
        report.expired.push(instanceId);
        return;
      }

      const adapter = this.adapters.resolve(instance.backend);
      const status = await this.probe(adapter, instance.backendHandle);

      switch (status) {
        case 'RUNNING':
          this.lifecycle.clearUnknown(instanceId);
          break;
        case 'COMPLETED':
          await this.revertInstance(instanceId, 'finished on backend');
          report.completed.push(instanceId);
          break;
        case 'GONE':
          this.lifecycle.markFailedPartial(instanceId, new FaultlineError(
            'Fault state disappeared from the backend',
            ErrorCode.GONE,
            { resourceType: 'fault-instance', resourceId: instanceId },
          ));
          report.drifted.push(instanceId);
          break;
        case 'UNKNOWN': {
          report.unreachable.push(instanceId);
          const unknownForMs = this.lifecycle.noteUnknown(instanceId, at);
          if (unknownForMs > this.config.unknownGracePeriodMs) {
            this.lifecycle.markFailedPartial(instanceId, new FaultlineError(
              `Backend unreachable for ${unknownForMs}ms`,
              ErrorCode.BACKEND_UNREACHABLE,
              { resourceType: 'fault-instance', resourceId: instanceId },
            ));
            report.abandoned.push(instanceId);
          }
          break;
        }
      }
    } catch (error) {
      const wrapped = withInstanceId(error, instanceId);
      logger.forInstance(instanceId).error('Reconciliation failed for instance', wrapped);
      report.failed.push({ instanceId, error: wrapped });
    }
  }

  /**
   * Backend status bounded by statusTimeoutMs; failures read as UNKNOWN
   */
  private async probe(adapter: BackendAdapter, handle: BackendHandle): Promise<BackendStatus> {
    try {
      return await withTimeout(
        adapter.status(handle),
        this.config.statusTimeoutMs,
        () => new TimeoutError('status', this.config.statusTimeoutMs),
      );
    } catch (error) {
      logger.debug('Backend status unavailable', { token: handle.token, error: wrapError(error).message });
      return 'UNKNOWN';
    }
  }

  /**
   * Run reconciliation on an interval
   */
  startReconciliation(intervalMs: number = this.config.reconcileIntervalMs): void {
    if (this.reconcileTimer) {
      return;
    }
    this.reconcileTimer = setInterval(() => {
      this.reconcile().catch((error: unknown) => {
        logger.error('Reconciliation pass failed', wrapError(error));
      });
    }, intervalMs);
    logger.info('Reconciliation started', { intervalMs });
  }

  stopReconciliation(): void {
    if (this.reconcileTimer) {
      clearInterval(this.reconcileTimer);
      this.reconcileTimer = null;
      logger.info('Reconciliation stopped');
    }
  }

  isReconciling(): boolean {
    return this.reconcileTimer !== null;
  }

  /**
   * Stop background work
   */
  dispose(): void {
    this.stopReconciliation();
  }
}

/**
 * Create an orchestration engine
 */
export function createOrchestrationEngine(options: OrchestrationEngineOptions): OrchestrationEngine {
  return new OrchestrationEngine(options);
}
