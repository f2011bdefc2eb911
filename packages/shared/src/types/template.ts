/**
 * Fault template types
 * @module @faultline/shared/types/template
 */

import type { BackendKind } from './backend';

/**
 * Parameter value types a template schema may declare
 */
export type ParameterType = 'string' | 'number' | 'integer' | 'boolean' | 'duration' | 'string[]';

/**
 * All known parameter types
 */
export const PARAMETER_TYPES: readonly ParameterType[] = [
  'string',
  'number',
  'integer',
  'boolean',
  'duration',
  'string[]',
];

/**
 * Concrete parameter value
 */
export type ParameterValue = string | number | boolean | string[];

/**
 * Declared parameter of a template
 */
export interface ParameterSpec {
  type: ParameterType;
  /** Must be supplied by the request (ignored when a default exists) */
  required?: boolean;
  /** Used when the request omits the parameter */
  default?: ParameterValue;
  /** Allowed values (string and number types) */
  enum?: Array<string | number>;
  /** Inclusive lower bound (number and integer types) */
  min?: number;
  /** Inclusive upper bound (number and integer types) */
  max?: number;
  description?: string;
}

/**
 * Parameter schema, keyed by parameter name
 */
export type ParameterSchema = Record<string, ParameterSpec>;

/**
 * How the template turns parameters into a backend artifact
 */
export interface RenderReference {
  /** Path of the rendering definition, relative to the template source */
  path: string;
  /** Definition text, read once when the template is loaded */
  definition: string;
}

/**
 * Reusable, versioned fault definition. Immutable once loaded.
 */
export interface FaultTemplate {
  readonly templateId: string;
  readonly version: number;
  readonly backend: BackendKind;
  readonly description?: string;
  /** Allowed to coexist with overlapping-scope instances */
  readonly composable: boolean;
  readonly parameters: Readonly<ParameterSchema>;
  readonly render: Readonly<RenderReference>;
}

/**
 * Template as listed to callers (no definition text)
 */
export interface TemplateSummary {
  templateId: string;
  version: number;
  backend: BackendKind;
  description?: string;
  composable: boolean;
  parameters: string[];
  requiredParameters: string[];
}

/**
 * Duration syntax accepted for `duration` parameters (Go-style, as Chaos Mesh takes)
 */
export const DURATION_PATTERN = /^(\d+(\.\d+)?(ms|s|m|h))+$/;

/**
 * Summarise a template for listings
 */
export function summarizeTemplate(template: FaultTemplate): TemplateSummary {
  const names = Object.keys(template.parameters);
  return {
    templateId: template.templateId,
    version: template.version,
    backend: template.backend,
    description: template.description,
    composable: template.composable,
    parameters: names,
    requiredParameters: names.filter(name => {
      const spec = template.parameters[name];
      return spec?.required === true && spec.default === undefined;
    }),
  };
}
