/**
 * Shared types for Faultline
 * @module @faultline/shared/types
 */

// Label and selector types
export type { Labels, TargetSelector } from './labels.js';

export {
  labelSelectorsCompatible,
  selectorsOverlap,
  describeSelector,
} from './labels.js';

// Template types
export type {
  ParameterType,
  ParameterValue,
  ParameterSpec,
  ParameterSchema,
  RenderReference,
  FaultTemplate,
  TemplateSummary,
} from './template.js';

export {
  PARAMETER_TYPES,
  DURATION_PATTERN,
  summarizeTemplate,
} from './template.js';

// Backend types
export type {
  BackendKind,
  BackendOperation,
  Artifact,
  BackendHandle,
  BackendStatus,
  RevertOutcome,
  RevertResult,
  BackendAdapter,
} from './backend.js';

export { BACKEND_KINDS, isBackendKind } from './backend.js';

// Request types
export type {
  FaultMetadata,
  FaultSpec,
  FaultRequest,
  ValidatedRequest,
  FaultRequestInput,
} from './request.js';

export { DEFAULT_FAULT_NAMESPACE, createFaultRequest, defaultFaultName } from './request.js';

// Instance types
export type {
  FaultState,
  InstanceError,
  InstanceHistoryEntry,
  FaultInstance,
  FaultInstanceFilters,
} from './instance.js';

export {
  FAULT_STATE_TRANSITIONS,
  HANDLE_STATES,
  TERMINAL_STATES,
  canTransition,
  isTerminalState,
} from './instance.js';

// Config types
export type { RetryPolicy, KubectlConfig, EngineConfig } from './config.js';

export { DEFAULT_ENGINE_CONFIG } from './config.js';

// Results
export type { EngineResult } from './result.js';

export { ok, fail } from './result.js';
