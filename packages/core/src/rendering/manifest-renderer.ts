/**
 * Placeholder rendering of YAML definitions
 * @module @faultline/core/rendering/manifest-renderer
 */

import * as yaml from 'js-yaml';
import { RenderError, deepClone, isRecord, wrapError } from '@faultline/shared';

/**
 * Values placeholders resolve against, e.g. `{{ params.load }}` or `{{ metadata.name }}`
 */
export type RenderContext = Record<string, unknown>;

const PLACEHOLDER = /\{\{\s*([^{}]+?)\s*\}\}/g;
const WHOLE_PLACEHOLDER = /^\{\{\s*([^{}]+?)\s*\}\}$/;
const DEFAULT_FILTER = /^default\((.*)\)$/;

const UNRESOLVED = Symbol('unresolved');

interface Expression {
  path: string;
  fallback?: unknown;
}

function parseExpression(source: string): Expression {
  const pipe = source.indexOf('|');
  if (pipe === -1) {
    return { path: source.trim() };
  }

  const path = source.slice(0, pipe).trim();
  const filter = DEFAULT_FILTER.exec(source.slice(pipe + 1).trim());
  if (!filter) {
    // Unknown filters never resolve
    return { path: `${path}|${source.slice(pipe + 1).trim()}` };
  }
  return { path, fallback: yaml.load(filter[1] ?? '') };
}

function lookup(context: RenderContext, path: string): unknown {
  let current: unknown = context;
  for (const segment of path.split('.')) {
    if (Array.isArray(current) && /^\d+$/.test(segment)) {
      current = current[Number(segment)];
    } else if (isRecord(current) && Object.hasOwn(current, segment)) {
      current = current[segment];
    } else {
      return UNRESOLVED;
    }
  }
  return current ?? UNRESOLVED;
}

function resolve(context: RenderContext, source: string): unknown {
  const expression = parseExpression(source);
  const value = lookup(context, expression.path);
  if (value === UNRESOLVED && expression.fallback !== undefined && expression.fallback !== null) {
    return expression.fallback;
  }
  return value;
}

function stringify(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

/**
 * Renders YAML definitions containing `{{ path }}` placeholders.
 *
 * A scalar that is exactly one placeholder takes the raw value (numbers stay numbers,
 * lists stay lists). Placeholders embedded in longer strings are interpolated as text.
 * `{{ path | default(value) }}` supplies a fallback for absent values.
 */
export class ManifestRenderer {
  /**
   * Render a definition. Every unresolved expression is reported in one RenderError.
   */
  render(templateId: string, definition: string, context: RenderContext): Record<string, unknown> {
    const document = this.parse(templateId, definition);
    const unresolved = new Set<string>();
    const rendered = this.substitute(document, context, unresolved);

    if (unresolved.size > 0) {
      const expressions = [...unresolved];
      throw new RenderError(
        templateId,
        `Unresolved expression(s) in ${templateId}: ${expressions.join(', ')}`,
        expressions,
      );
    }

    if (!isRecord(rendered)) {
      throw new RenderError(templateId, `Rendered definition of ${templateId} is not a mapping`);
    }
    return rendered;
  }

  private parse(templateId: string, definition: string): Record<string, unknown> {
    let document: unknown;
    try {
      document = yaml.load(definition);
    } catch (error) {
      throw new RenderError(templateId, `Rendering definition of ${templateId} is not valid YAML`, [], wrapError(error));
    }
    if (!isRecord(document)) {
      throw new RenderError(templateId, `Rendering definition of ${templateId} must be a mapping`);
    }
    return document;
  }

  private substitute(value: unknown, context: RenderContext, unresolved: Set<string>): unknown {
    if (Array.isArray(value)) {
      return value.map(item => this.substitute(item, context, unresolved));
    }

    if (isRecord(value)) {
      const result: Record<string, unknown> = {};
      for (const [key, item] of Object.entries(value)) {
        result[key] = this.substitute(item, context, unresolved);
      }
      return result;
    }

    if (typeof value !== 'string') {
      return value;
    }

    const whole = WHOLE_PLACEHOLDER.exec(value);
    if (whole) {
      const source = whole[1] ?? '';
      const resolved = resolve(context, source);
      if (resolved === UNRESOLVED) {
        unresolved.add(source.trim());
        return value;
      }
      return deepClone(resolved);
    }

    return value.replace(PLACEHOLDER, (match: string, source: string) => {
      const resolved = resolve(context, source);
      if (resolved === UNRESOLVED) {
        unresolved.add(source.trim());
        return match;
      }
      return stringify(resolved);
    });
  }
}

/**
 * Check that a definition parses to a YAML mapping. Returns the problem, if any.
 */
export function checkDefinition(definition: string): string | undefined {
  try {
    const document = yaml.load(definition);
    return isRecord(document) ? undefined : 'rendering definition must be a YAML mapping';
  } catch (error) {
    return `rendering definition is not valid YAML: ${wrapError(error).message.split('\n')[0]}`;
  }
}

/**
 * Placeholder expressions used by a definition, without filters
 */
export function referencedPaths(definition: string): string[] {
  const paths = new Set<string>();
  for (const match of definition.matchAll(PLACEHOLDER)) {
    paths.add(parseExpression(match[1] ?? '').path);
  }
  return [...paths];
}
