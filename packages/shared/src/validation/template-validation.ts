/**
 * Template source validation
 * @module @faultline/shared/validation/template-validation
 */

import type { TemplateIssue } from '../errors/template-error';
import { isBackendKind, BACKEND_KINDS } from '../types/backend';
import type { FaultTemplate, ParameterSchema, ParameterSpec, ParameterType } from '../types/template';
import { PARAMETER_TYPES } from '../types/template';
import { isRecord } from '../utils/index';
import { isParameterValue, validateParameterValue } from './request-validation';

/**
 * Template ID pattern: lower case, digits, "-", "_" and "/" for grouping
 */
const TEMPLATE_ID_PATTERN = /^[a-z0-9][a-z0-9_/-]{0,127}$/;

/**
 * Parameter name pattern
 */
const PARAMETER_NAME_PATTERN = /^[a-zA-Z][a-zA-Z0-9_]{0,63}$/;

/**
 * A structurally valid index entry, before its rendering definition is read
 */
export interface TemplateEntry extends Omit<FaultTemplate, 'render'> {
  renderPath: string;
}

function isParameterType(value: unknown): value is ParameterType {
  return typeof value === 'string' && PARAMETER_TYPES.some(type => type === value);
}

/**
 * Validate one declared parameter
 */
export function validateParameterSpec(
  templateId: string,
  name: string,
  raw: unknown,
): { spec?: ParameterSpec; issues: TemplateIssue[] } {
  const field = `parameters.${name}`;
  const issues: TemplateIssue[] = [];
  const issue = (message: string, suffix = ''): void => {
    issues.push({ templateId, field: `${field}${suffix}`, message });
  };

  if (!PARAMETER_NAME_PATTERN.test(name)) {
    issue(`Invalid parameter name: ${name}`);
  }

  if (!isRecord(raw)) {
    issue('Parameter declaration must be an object');
    return { issues };
  }

  if (!isParameterType(raw.type)) {
    issue(`Unknown parameter type: ${String(raw.type)} (expected one of ${PARAMETER_TYPES.join(', ')})`, '.type');
    return { issues };
  }

  const spec: ParameterSpec = { type: raw.type };

  if (raw.required !== undefined) {
    if (typeof raw.required !== 'boolean') {
      issue('required must be a boolean', '.required');
    } else {
      spec.required = raw.required;
    }
  }

  if (raw.description !== undefined) {
    if (typeof raw.description !== 'string') {
      issue('description must be a string', '.description');
    } else {
      spec.description = raw.description;
    }
  }

  for (const bound of ['min', 'max'] as const) {
    const value = raw[bound];
    if (value === undefined) continue;
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      issue(`${bound} must be a number`, `.${bound}`);
    } else if (spec.type !== 'number' && spec.type !== 'integer') {
      issue(`${bound} only applies to number and integer parameters`, `.${bound}`);
    } else {
      spec[bound] = value;
    }
  }

  if (spec.min !== undefined && spec.max !== undefined && spec.min > spec.max) {
    issue(`min (${spec.min}) exceeds max (${spec.max})`);
  }

  if (raw.enum !== undefined) {
    const values: unknown = raw.enum;
    if (
      !Array.isArray(values) ||
      values.length === 0 ||
      !values.every((v): v is string | number => typeof v === 'string' || typeof v === 'number')
    ) {
      issue('enum must be a non-empty list of strings or numbers', '.enum');
    } else {
      spec.enum = values;
    }
  }

  if (raw.default !== undefined) {
    if (!isParameterValue(raw.default)) {
      issue('default must be a string, number, boolean or list of strings', '.default');
    } else {
      const defaultErrors = validateParameterValue(name, spec, raw.default);
      if (defaultErrors.length > 0) {
        for (const error of defaultErrors) {
          issue(`default is invalid: ${error.message}`, '.default');
        }
      } else {
        spec.default = raw.default;
      }
    }
  }

  return issues.length > 0 ? { issues } : { spec, issues };
}

/**
 * Validate one entry of a template index.
 * Collects every defect of the entry instead of stopping at the first.
 */
export function validateTemplateEntry(
  raw: unknown,
  index: number,
): { entry?: TemplateEntry; issues: TemplateIssue[] } {
  if (!isRecord(raw)) {
    return {
      issues: [{ templateId: `#${index}`, field: '', message: 'Template entry must be an object' }],
    };
  }

  const rawId = raw.templateID ?? raw.templateId;
  const templateId = typeof rawId === 'string' && rawId.length > 0 ? rawId : `#${index}`;
  const issues: TemplateIssue[] = [];
  const issue = (field: string, message: string): void => {
    issues.push({ templateId, field, message });
  };

  if (typeof rawId !== 'string' || !TEMPLATE_ID_PATTERN.test(rawId)) {
    issue('templateID', 'templateID is required and must match [a-z0-9][a-z0-9_/-]*');
  }

  let version = 1;
  if (raw.version !== undefined) {
    if (typeof raw.version !== 'number' || !Number.isInteger(raw.version) || raw.version < 1) {
      issue('version', 'version must be a positive integer');
    } else {
      version = raw.version;
    }
  }

  if (!isBackendKind(raw.backend)) {
    issue('backend', `Unknown backend: ${String(raw.backend)} (expected one of ${BACKEND_KINDS.join(', ')})`);
  }

  if (typeof raw.path !== 'string' || raw.path.trim().length === 0) {
    issue('path', 'path to the rendering definition is required');
  } else if (raw.path.split(/[\\/]/).includes('..')) {
    issue('path', 'path must stay inside the template source');
  }

  if (raw.composable !== undefined && typeof raw.composable !== 'boolean') {
    issue('composable', 'composable must be a boolean');
  }

  if (raw.description !== undefined && typeof raw.description !== 'string') {
    issue('description', 'description must be a string');
  }

  const parameters: ParameterSchema = {};
  if (raw.parameters !== undefined && raw.parameters !== null) {
    if (!isRecord(raw.parameters)) {
      issue('parameters', 'parameters must be a mapping of name to declaration');
    } else {
      for (const [name, declaration] of Object.entries(raw.parameters)) {
        const result = validateParameterSpec(templateId, name, declaration);
        issues.push(...result.issues);
        if (result.spec) {
          parameters[name] = result.spec;
        }
      }
    }
  }

  if (issues.length > 0 || typeof rawId !== 'string' || !isBackendKind(raw.backend) || typeof raw.path !== 'string') {
    return { issues };
  }

  return {
    entry: {
      templateId: rawId,
      version,
      backend: raw.backend,
      description: typeof raw.description === 'string' ? raw.description : undefined,
      composable: raw.composable === true,
      parameters,
      renderPath: raw.path,
    },
    issues,
  };
}
