/**
 * Values exposed to rendering definitions
 * @module @faultline/core/rendering/render-context
 */

import type { FaultTemplate, TargetSelector, ValidatedRequest } from '@faultline/shared';
import type { RenderContext } from './manifest-renderer';

/**
 * Top-level names a definition may reference
 */
export const RENDER_CONTEXT_ROOTS = ['template', 'metadata', 'params', 'target', 'selector', 'duration'] as const;

/**
 * Selector in the shape Chaos Mesh resources expect
 */
export function namespacedSelector(namespace: string, selector: TargetSelector): Record<string, unknown> {
  const result: Record<string, unknown> = { namespaces: [namespace] };
  if (selector.pods && selector.pods.length > 0) {
    result.pods = { [namespace]: [...selector.pods] };
  }
  if (selector.labelSelectors && Object.keys(selector.labelSelectors).length > 0) {
    result.labelSelectors = { ...selector.labelSelectors };
  }
  return result;
}

/**
 * Build the context a template is rendered against.
 * `duration` is only present when the request carries a TTL.
 */
export function buildRenderContext(template: FaultTemplate, validated: ValidatedRequest): RenderContext {
  const { metadata, spec } = validated.request;

  const context: RenderContext = {
    template: { id: template.templateId, version: template.version },
    metadata: {
      name: metadata.name,
      namespace: metadata.namespace,
      labels: { ...metadata.labels },
    },
    params: { ...validated.parameters },
    target: {
      namespace: metadata.namespace,
      pods: [...(spec.selector.pods ?? [])],
      labels: { ...spec.selector.labelSelectors },
    },
    selector: namespacedSelector(metadata.namespace, spec.selector),
  };

  if (validated.ttlSeconds !== undefined) {
    context.duration = `${validated.ttlSeconds}s`;
  }
  return context;
}
