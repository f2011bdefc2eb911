/**
 * Core services exports
 * @module @faultline/core/services
 */

export {
  TemplateRegistry,
  createTemplateRegistry,
  buildCatalog,
  type TemplateRegistryOptions,
  type TemplateListFilters,
} from './template-registry';

export {
  RequestValidator,
  createRequestValidator,
  type RequestValidatorOptions,
} from './request-validator';

export { KeyedSerialQueue } from './serial-queue';

export {
  FaultLifecycleManager,
  createLifecycleManager,
  toInstanceError,
  type LifecycleManagerOptions,
} from './lifecycle-manager';

export {
  OrchestrationEngine,
  createOrchestrationEngine,
  type OrchestrationEngineOptions,
  type RevertReport,
  type ReconcileReport,
} from './orchestration-engine';
