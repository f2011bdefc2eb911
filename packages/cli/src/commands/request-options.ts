/**
 * Fault request construction from command-line options
 * @module @faultline/cli/commands/request-options
 */

import {
  BACKEND_KINDS,
  ValidationError,
  createFaultRequest,
  isBackendKind,
  type BackendKind,
  type FaultRequest,
  type FaultTemplate,
  type Labels,
  type ParameterSpec,
  type ParameterValue,
  type ValidationErrorDetail,
} from '@faultline/shared';

/**
 * Options accepted by commands that build a request
 */
export interface RequestOptions {
  name?: string;
  namespace?: string;
  pod?: string[];
  selector?: string[];
  label?: string[];
  param?: string[];
  ttl?: string;
}

/**
 * Split `key=value` pairs. Pairs without "=" are reported under `field`.
 */
export function parsePairs(
  pairs: string[] | undefined,
  field: string,
  errors: ValidationErrorDetail[],
): Record<string, string> {
  const result: Record<string, string> = {};
  for (const pair of pairs ?? []) {
    const separator = pair.indexOf('=');
    if (separator <= 0) {
      errors.push({ field, message: `Expected key=value, got "${pair}"`, rule: 'format', received: pair });
      continue;
    }
    result[pair.slice(0, separator)] = pair.slice(separator + 1);
  }
  return result;
}

/**
 * Convert a raw flag value to the parameter's declared type.
 * Values that do not convert are passed through for the validator to report.
 */
export function coerceParameter(spec: ParameterSpec | undefined, raw: string): ParameterValue {
  switch (spec?.type) {
    case 'number':
    case 'integer': {
      const value = Number(raw);
      return raw.trim() !== '' && Number.isFinite(value) ? value : raw;
    }
    case 'boolean':
      if (raw === 'true') return true;
      if (raw === 'false') return false;
      return raw;
    case 'string[]':
      return raw.length === 0 ? [] : raw.split(',').map(item => item.trim());
    default:
      return raw;
  }
}

/**
 * Build a fault request for a template from command-line options
 */
export function buildRequest(template: FaultTemplate, options: RequestOptions, defaultNamespace: string): FaultRequest {
  const errors: ValidationErrorDetail[] = [];

  const rawParams = parsePairs(options.param, 'spec.parameters', errors);
  const parameters: Record<string, ParameterValue> = {};
  for (const [name, raw] of Object.entries(rawParams)) {
    parameters[name] = coerceParameter(template.parameters[name], raw);
  }

  const labelSelectors: Labels = parsePairs(options.selector, 'spec.selector.labelSelectors', errors);
  const labels: Labels = parsePairs(options.label, 'metadata.labels', errors);

  let ttlSeconds: number | undefined;
  if (options.ttl !== undefined) {
    ttlSeconds = Number(options.ttl);
    if (!Number.isInteger(ttlSeconds)) {
      errors.push({ field: 'metadata.ttlSeconds', message: `TTL must be a whole number of seconds, got "${options.ttl}"`, rule: 'type' });
    }
  }

  if (errors.length > 0) {
    throw ValidationError.multiple(errors, { resourceType: 'fault-request' });
  }

  return createFaultRequest({
    templateId: template.templateId,
    metadata: {
      name: options.name,
      namespace: options.namespace,
      ttlSeconds,
      labels: Object.keys(labels).length > 0 ? labels : undefined,
    },
    spec: {
      selector: {
        pods: options.pod && options.pod.length > 0 ? options.pod : undefined,
        labelSelectors: Object.keys(labelSelectors).length > 0 ? labelSelectors : undefined,
      },
      parameters,
    },
  }, defaultNamespace);
}

/**
 * Check a --backend flag value
 */
export function parseBackend(value: string | undefined): BackendKind | undefined {
  if (value === undefined || isBackendKind(value)) {
    return value;
  }
  throw new ValidationError(`Unknown backend "${value}"`, [{
    field: 'backend',
    message: `Expected one of ${BACKEND_KINDS.join(', ')}`,
    rule: 'enum',
    received: value,
  }]);
}
