/**
 * Fault request validation
 * @module @faultline/shared/validation/request-validation
 */

import type { ValidationErrorDetail } from '../errors/validation-error';
import {
  DURATION_PATTERN,
  type ParameterSchema,
  type ParameterSpec,
  type ParameterValue,
} from '../types/template';

/**
 * DNS-1123 subdomain, as Kubernetes object names take
 */
const RESOURCE_NAME_PATTERN = /^[a-z0-9]([-a-z0-9.]*[a-z0-9])?$/;

/**
 * DNS-1123 label, as Kubernetes namespaces take
 */
const NAMESPACE_NAME_PATTERN = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/;

/**
 * Label key: optional DNS prefix, then a name segment
 */
const LABEL_KEY_PATTERN = /^([a-z0-9]([-a-z0-9.]*[a-z0-9])?\/)?[a-zA-Z0-9]([-a-zA-Z0-9_.]*[a-zA-Z0-9])?$/;

/**
 * Label value: empty, or alphanumeric at both ends
 */
const LABEL_VALUE_PATTERN = /^([a-zA-Z0-9]([-a-zA-Z0-9_.]*[a-zA-Z0-9])?)?$/;

const MAX_RESOURCE_NAME_LENGTH = 253;
const MAX_NAMESPACE_LENGTH = 63;
const MAX_LABEL_VALUE_LENGTH = 63;

/**
 * Validate the fault name
 */
export function validateFaultName(name: unknown, field = 'metadata.name'): ValidationErrorDetail | null {
  if (typeof name !== 'string' || name.length === 0) {
    return { field, message: 'Fault name is required', rule: 'required', received: name };
  }

  if (name.length > MAX_RESOURCE_NAME_LENGTH) {
    return {
      field,
      message: `Fault name cannot exceed ${MAX_RESOURCE_NAME_LENGTH} characters`,
      rule: 'max-length',
    };
  }

  if (!RESOURCE_NAME_PATTERN.test(name)) {
    return {
      field,
      message: 'Fault name must consist of lower case alphanumerics, "-" or "."',
      rule: 'format',
      expected: 'DNS-1123 subdomain',
      received: name,
    };
  }

  return null;
}

/**
 * Validate the namespace
 */
export function validateNamespace(namespace: unknown, field = 'metadata.namespace'): ValidationErrorDetail | null {
  if (typeof namespace !== 'string' || namespace.length === 0) {
    return { field, message: 'Namespace is required', rule: 'required', received: namespace };
  }

  if (namespace.length > MAX_NAMESPACE_LENGTH || !NAMESPACE_NAME_PATTERN.test(namespace)) {
    return {
      field,
      message: 'Namespace must be a DNS-1123 label of at most 63 characters',
      rule: 'format',
      expected: 'DNS-1123 label',
      received: namespace,
    };
  }

  return null;
}

/**
 * Validate the TTL against the configured maximum
 */
export function validateTtl(
  ttlSeconds: unknown,
  maxTtlSeconds: number,
  field = 'metadata.ttlSeconds',
): ValidationErrorDetail | null {
  if (ttlSeconds === undefined) {
    return null;
  }

  if (typeof ttlSeconds !== 'number' || !Number.isInteger(ttlSeconds)) {
    return { field, message: 'TTL must be an integer number of seconds', rule: 'type', received: ttlSeconds };
  }

  if (ttlSeconds <= 0) {
    return { field, message: 'TTL must be positive', rule: 'range', expected: '> 0', received: ttlSeconds };
  }

  if (ttlSeconds > maxTtlSeconds) {
    return {
      field,
      message: `TTL cannot exceed ${maxTtlSeconds} seconds`,
      rule: 'range',
      expected: `<= ${maxTtlSeconds}`,
      received: ttlSeconds,
    };
  }

  return null;
}

/**
 * Validate a label map
 */
export function validateLabels(labels: unknown, field: string): ValidationErrorDetail[] {
  const errors: ValidationErrorDetail[] = [];

  if (labels === undefined) {
    return errors;
  }

  if (typeof labels !== 'object' || labels === null || Array.isArray(labels)) {
    errors.push({ field, message: 'Labels must be an object', rule: 'type' });
    return errors;
  }

  for (const [key, value] of Object.entries(labels)) {
    if (!LABEL_KEY_PATTERN.test(key) || key.length > MAX_RESOURCE_NAME_LENGTH) {
      errors.push({ field: `${field}.${key}`, message: `Invalid label key: ${key}`, rule: 'format' });
    }
    if (typeof value !== 'string') {
      errors.push({ field: `${field}.${key}`, message: 'Label value must be a string', rule: 'type', received: value });
    } else if (value.length > MAX_LABEL_VALUE_LENGTH || !LABEL_VALUE_PATTERN.test(value)) {
      errors.push({ field: `${field}.${key}`, message: `Invalid label value: ${value}`, rule: 'format', received: value });
    }
  }

  return errors;
}

/**
 * Validate a target selector: non-empty and well-formed
 */
export function validateSelector(selector: unknown, field = 'spec.selector'): ValidationErrorDetail[] {
  const errors: ValidationErrorDetail[] = [];

  if (typeof selector !== 'object' || selector === null || Array.isArray(selector)) {
    errors.push({ field, message: 'Target selector is required', rule: 'required' });
    return errors;
  }

  const pods = 'pods' in selector ? selector.pods : undefined;
  const labelSelectors = 'labelSelectors' in selector ? selector.labelSelectors : undefined;
  let targets = 0;

  if (pods !== undefined) {
    if (!Array.isArray(pods)) {
      errors.push({ field: `${field}.pods`, message: 'Pods must be a list of pod names', rule: 'type' });
    } else {
      const seen = new Set<string>();
      pods.forEach((pod: unknown, index) => {
        const podField = `${field}.pods[${index}]`;
        if (typeof pod !== 'string' || !RESOURCE_NAME_PATTERN.test(pod)) {
          errors.push({ field: podField, message: 'Pod name must be a DNS-1123 subdomain', rule: 'format', received: pod });
        } else if (seen.has(pod)) {
          errors.push({ field: podField, message: `Duplicate pod name: ${pod}`, rule: 'unique' });
        } else {
          seen.add(pod);
        }
      });
      targets += pods.length;
    }
  }

  if (labelSelectors !== undefined) {
    errors.push(...validateLabels(labelSelectors, `${field}.labelSelectors`));
    if (typeof labelSelectors === 'object' && labelSelectors !== null) {
      targets += Object.keys(labelSelectors).length;
    }
  }

  if (targets === 0) {
    errors.push({
      field,
      message: 'Target selector must name at least one pod or label',
      rule: 'non-empty',
    });
  }

  return errors;
}

/**
 * Describe the runtime type of a parameter value for messages
 */
function describeType(value: unknown): string {
  if (Array.isArray(value)) return 'array';
  if (value === null) return 'null';
  return typeof value;
}

/**
 * Validate one parameter value against its spec
 */
export function validateParameterValue(
  name: string,
  spec: ParameterSpec,
  value: unknown,
  field = `spec.parameters.${name}`,
): ValidationErrorDetail[] {
  const errors: ValidationErrorDetail[] = [];
  const typeError = (): ValidationErrorDetail => ({
    field,
    message: `Expected ${spec.type}, received ${describeType(value)}`,
    rule: 'type',
    expected: spec.type,
    received: value,
  });

  switch (spec.type) {
    case 'string':
      if (typeof value !== 'string') return [typeError()];
      break;
    case 'boolean':
      if (typeof value !== 'boolean') return [typeError()];
      break;
    case 'number':
      if (typeof value !== 'number' || !Number.isFinite(value)) return [typeError()];
      break;
    case 'integer':
      if (typeof value !== 'number' || !Number.isInteger(value)) return [typeError()];
      break;
    case 'duration':
      if (typeof value !== 'string') return [typeError()];
      if (!DURATION_PATTERN.test(value)) {
        errors.push({
          field,
          message: `Invalid duration: ${value}`,
          rule: 'format',
          expected: 'duration such as 30s, 5m, 1h30m',
          received: value,
        });
      }
      break;
    case 'string[]':
      if (!Array.isArray(value) || value.some(item => typeof item !== 'string')) return [typeError()];
      break;
  }

  if (spec.enum && (typeof value === 'string' || typeof value === 'number') && !spec.enum.includes(value)) {
    errors.push({
      field,
      message: `Value must be one of: ${spec.enum.join(', ')}`,
      rule: 'enum',
      expected: spec.enum.join('|'),
      received: value,
    });
  }

  if (typeof value === 'number') {
    if (spec.min !== undefined && value < spec.min) {
      errors.push({ field, message: `Value must be at least ${spec.min}`, rule: 'range', expected: `>= ${spec.min}`, received: value });
    }
    if (spec.max !== undefined && value > spec.max) {
      errors.push({ field, message: `Value must be at most ${spec.max}`, rule: 'range', expected: `<= ${spec.max}`, received: value });
    }
  }

  return errors;
}

/**
 * Validate request parameters against a template schema.
 * Returns every violation and the parameters with defaults applied.
 */
export function validateParameters(
  schema: Readonly<ParameterSchema>,
  parameters: unknown,
  field = 'spec.parameters',
): { errors: ValidationErrorDetail[]; resolved: Record<string, ParameterValue> } {
  const errors: ValidationErrorDetail[] = [];
  const resolved: Record<string, ParameterValue> = {};

  if (parameters === undefined || parameters === null) {
    parameters = {};
  }

  if (typeof parameters !== 'object' || parameters === null || Array.isArray(parameters)) {
    errors.push({ field, message: 'Parameters must be an object', rule: 'type' });
    return { errors, resolved };
  }

  const supplied = new Map<string, unknown>(Object.entries(parameters));

  for (const [name, spec] of Object.entries(schema)) {
    const value = supplied.get(name);

    if (value === undefined) {
      if (spec.default !== undefined) {
        resolved[name] = spec.default;
      } else if (spec.required) {
        errors.push({
          field: `${field}.${name}`,
          message: `Missing required parameter: ${name}`,
          rule: 'required',
        });
      }
      continue;
    }

    const valueErrors = validateParameterValue(name, spec, value, `${field}.${name}`);
    if (valueErrors.length > 0) {
      errors.push(...valueErrors);
    } else if (isParameterValue(value)) {
      resolved[name] = value;
    }
  }

  for (const name of supplied.keys()) {
    if (!(name in schema)) {
      errors.push({
        field: `${field}.${name}`,
        message: `Unknown parameter: ${name}`,
        rule: 'unknown',
      });
    }
  }

  return { errors, resolved };
}

/**
 * Narrow an unknown value to a parameter value
 */
export function isParameterValue(value: unknown): value is ParameterValue {
  if (typeof value === 'string' || typeof value === 'boolean') return true;
  if (typeof value === 'number') return Number.isFinite(value);
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}
