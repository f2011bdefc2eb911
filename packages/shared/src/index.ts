/**
 * Faultline - Shared Package
 * Types, validation, errors, logging, configuration and utilities
 * @module @faultline/shared
 */

// Types (includes helpers such as selectorsOverlap and canTransition)
export * from './types/index.js';

// Errors
export * from './errors/index.js';

// Validation
export {
  validateFaultName,
  validateNamespace,
  validateTtl,
  validateLabels,
  validateSelector,
  validateParameterValue,
  validateParameters,
  isParameterValue,
  validateParameterSpec,
  validateTemplateEntry,
  type TemplateEntry,
} from './validation/index.js';

// Configuration
export {
  loadEngineConfig,
  CONFIG_ENV_VARS,
  type EngineConfigOverrides,
} from './config/load-config.js';

// Logging
export {
  Logger,
  createLogger,
  createServiceLogger,
  isTestEnvironment,
  isLogLevel,
  setLogThreshold,
  formatPretty,
  type LogLevel,
  type LogMeta,
  type LogEntry,
  type LoggerConfig,
} from './logging/logger.js';

// Utilities
export {
  generateUUID,
  nowISO,
  sleep,
  isRecord,
  deepClone,
  backoffDelay,
  retry,
  withTimeout,
  groupBy,
  type RetryOptions,
} from './utils/index.js';
