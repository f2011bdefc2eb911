/**
 * Engine configuration loading
 * @module @faultline/shared/config/load-config
 */

import { ValidationError, type ValidationErrorDetail } from '../errors/validation-error';
import { DEFAULT_ENGINE_CONFIG, type EngineConfig, type RetryPolicy, type KubectlConfig } from '../types/config';
import { validateNamespace } from '../validation/request-validation';

/**
 * Environment variables read by loadEngineConfig
 */
export const CONFIG_ENV_VARS = {
  defaultNamespace: 'FAULTLINE_DEFAULT_NAMESPACE',
  maxTtlSeconds: 'FAULTLINE_MAX_TTL_SECONDS',
  reconcileIntervalMs: 'FAULTLINE_RECONCILE_INTERVAL_MS',
  unknownGracePeriodMs: 'FAULTLINE_UNKNOWN_GRACE_MS',
  statusTimeoutMs: 'FAULTLINE_STATUS_TIMEOUT_MS',
  retryAttempts: 'FAULTLINE_RETRY_ATTEMPTS',
  retryBaseDelayMs: 'FAULTLINE_RETRY_BASE_DELAY_MS',
  retryMaxDelayMs: 'FAULTLINE_RETRY_MAX_DELAY_MS',
  templatesDir: 'FAULTLINE_TEMPLATES_DIR',
  kubectl: 'FAULTLINE_KUBECTL',
  kubeContext: 'FAULTLINE_KUBE_CONTEXT',
  kubectlTimeoutMs: 'FAULTLINE_KUBECTL_TIMEOUT_MS',
} as const;

/**
 * Partial configuration accepted as overrides
 */
export interface EngineConfigOverrides extends Partial<Omit<EngineConfig, 'retry' | 'kubectl'>> {
  retry?: Partial<RetryPolicy>;
  kubectl?: Partial<KubectlConfig>;
}

type Env = Record<string, string | undefined>;

/**
 * Reads integer variables, collecting a detail for each malformed one
 */
class EnvReader {
  readonly errors: ValidationErrorDetail[] = [];

  constructor(private readonly env: Env) {}

  string(name: string): string | undefined {
    const value = this.env[name]?.trim();
    return value ? value : undefined;
  }

  integer(name: string, min: number): number | undefined {
    const raw = this.string(name);
    if (raw === undefined) {
      return undefined;
    }
    const value = Number(raw);
    if (!Number.isInteger(value) || value < min) {
      this.errors.push({
        field: name,
        message: `${name} must be an integer >= ${min}`,
        rule: 'range',
        expected: `integer >= ${min}`,
        received: raw,
      });
      return undefined;
    }
    return value;
  }
}

/**
 * Check the merged configuration for values no environment could have produced
 */
function validateEngineConfig(config: EngineConfig): ValidationErrorDetail[] {
  const errors: ValidationErrorDetail[] = [];
  const namespaceError = validateNamespace(config.defaultNamespace, 'defaultNamespace');
  if (namespaceError) {
    errors.push(namespaceError);
  }

  const positive: Array<[string, number]> = [
    ['maxTtlSeconds', config.maxTtlSeconds],
    ['reconcileIntervalMs', config.reconcileIntervalMs],
    ['statusTimeoutMs', config.statusTimeoutMs],
    ['retry.attempts', config.retry.attempts],
    ['retry.factor', config.retry.factor],
    ['kubectl.timeoutMs', config.kubectl.timeoutMs],
  ];
  for (const [field, value] of positive) {
    if (!(value > 0)) {
      errors.push({ field, message: `${field} must be positive`, rule: 'range', received: value });
    }
  }

  if (config.retry.baseDelayMs < 0 || config.retry.maxDelayMs < config.retry.baseDelayMs) {
    errors.push({
      field: 'retry',
      message: 'retry delays must satisfy 0 <= baseDelayMs <= maxDelayMs',
      rule: 'constraint',
    });
  }

  return errors;
}

/**
 * Build the engine configuration: defaults, then environment, then overrides.
 * All malformed values are reported together.
 */
export function loadEngineConfig(
  env: Env = process.env,
  overrides: EngineConfigOverrides = {},
): EngineConfig {
  const reader = new EnvReader(env);
  const vars = CONFIG_ENV_VARS;

  const defaults = DEFAULT_ENGINE_CONFIG;
  const retry = overrides.retry ?? {};
  const kubectl = overrides.kubectl ?? {};

  const config: EngineConfig = {
    defaultNamespace:
      overrides.defaultNamespace ?? reader.string(vars.defaultNamespace) ?? defaults.defaultNamespace,
    maxTtlSeconds:
      overrides.maxTtlSeconds ?? reader.integer(vars.maxTtlSeconds, 1) ?? defaults.maxTtlSeconds,
    reconcileIntervalMs:
      overrides.reconcileIntervalMs ?? reader.integer(vars.reconcileIntervalMs, 1) ?? defaults.reconcileIntervalMs,
    unknownGracePeriodMs:
      overrides.unknownGracePeriodMs ?? reader.integer(vars.unknownGracePeriodMs, 0) ?? defaults.unknownGracePeriodMs,
    statusTimeoutMs:
      overrides.statusTimeoutMs ?? reader.integer(vars.statusTimeoutMs, 1) ?? defaults.statusTimeoutMs,
    templatesDir: overrides.templatesDir ?? reader.string(vars.templatesDir) ?? defaults.templatesDir,
    retry: {
      attempts: retry.attempts ?? reader.integer(vars.retryAttempts, 1) ?? defaults.retry.attempts,
      baseDelayMs: retry.baseDelayMs ?? reader.integer(vars.retryBaseDelayMs, 0) ?? defaults.retry.baseDelayMs,
      maxDelayMs: retry.maxDelayMs ?? reader.integer(vars.retryMaxDelayMs, 0) ?? defaults.retry.maxDelayMs,
      factor: retry.factor ?? defaults.retry.factor,
    },
    kubectl: {
      binary: kubectl.binary ?? reader.string(vars.kubectl) ?? defaults.kubectl.binary,
      context: kubectl.context ?? reader.string(vars.kubeContext) ?? defaults.kubectl.context,
      timeoutMs: kubectl.timeoutMs ?? reader.integer(vars.kubectlTimeoutMs, 1) ?? defaults.kubectl.timeoutMs,
    },
  };

  const errors = [...reader.errors, ...validateEngineConfig(config)];
  if (errors.length > 0) {
    throw ValidationError.multiple(errors, { resourceType: 'engine-config' });
  }

  return config;
}
