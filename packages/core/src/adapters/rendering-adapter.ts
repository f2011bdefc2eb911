/**
 * Shared rendering for YAML-definition backends
 * @module @faultline/core/adapters/rendering-adapter
 */

import * as yaml from 'js-yaml';
import type {
  Artifact,
  BackendAdapter,
  BackendHandle,
  BackendKind,
  BackendStatus,
  FaultTemplate,
  RevertResult,
  ValidatedRequest,
} from '@faultline/shared';
import { ManifestRenderer } from '../rendering/manifest-renderer';
import { buildRenderContext } from '../rendering/render-context';

/**
 * Base for adapters whose artifact is a rendered YAML definition.
 * Subclasses may reshape the rendered manifest and implement the backend calls.
 */
export abstract class RenderingAdapter implements BackendAdapter {
  abstract readonly kind: BackendKind;

  constructor(protected readonly renderer: ManifestRenderer = new ManifestRenderer()) {}

  render(template: FaultTemplate, validated: ValidatedRequest): Artifact {
    const context = buildRenderContext(template, validated);
    const rendered = this.renderer.render(template.templateId, template.render.definition, context);
    const manifest = this.shape(template, validated, rendered);
    const { name, namespace } = validated.request.metadata;

    return {
      backend: this.kind,
      templateId: template.templateId,
      name,
      namespace,
      manifest,
      document: yaml.dump(manifest, { noRefs: true, lineWidth: -1 }),
    };
  }

  /**
   * Adjust a freshly rendered manifest. Throws RenderError when it is unusable.
   */
  protected shape(
    _template: FaultTemplate,
    _validated: ValidatedRequest,
    manifest: Record<string, unknown>,
  ): Record<string, unknown> {
    return manifest;
  }

  abstract apply(artifact: Artifact): Promise<BackendHandle>;
  abstract revert(handle: BackendHandle): Promise<RevertResult>;
  abstract status(handle: BackendHandle): Promise<BackendStatus>;
}
