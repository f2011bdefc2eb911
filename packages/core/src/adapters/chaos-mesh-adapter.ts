/**
 * Chaos Mesh backend adapter
 * Applies rendered Chaos Mesh resources through kubectl
 * @module @faultline/core/adapters/chaos-mesh-adapter
 */

import type {
  Artifact,
  BackendHandle,
  BackendStatus,
  FaultTemplate,
  RevertResult,
  ValidatedRequest,
} from '@faultline/shared';
import {
  ApplyError,
  RenderError,
  RevertError,
  TimeoutError,
  createServiceLogger,
  isRecord,
} from '@faultline/shared';
import type { ManifestRenderer } from '../rendering/manifest-renderer';
import {
  KubectlClient,
  describeFailure,
  isAmbiguousFailure,
  isTransientFailure,
  succeeded,
  type ResourceRef,
} from '../transport/kubectl-client';
import { RenderingAdapter } from './rendering-adapter';

const logger = createServiceLogger({
  level: 'debug',
  service: 'faultline',
}, { component: 'chaos-mesh-adapter' });

export const CHAOS_MESH_GROUP = 'chaos-mesh.org';

/**
 * Labels stamped on every resource created by the engine
 */
export const MANAGED_BY_LABEL = 'app.kubernetes.io/managed-by';
export const TEMPLATE_LABEL = 'faultline.dev/template';
export const MANAGER_NAME = 'faultline';

/**
 * Resource a manifest describes, or undefined when it lacks apiVersion or kind
 */
export function resourceRefOf(manifest: Record<string, unknown>, name: string, namespace: string): ResourceRef | undefined {
  const { apiVersion, kind } = manifest;
  if (typeof apiVersion !== 'string' || typeof kind !== 'string' || kind.length === 0) {
    return undefined;
  }
  const group = apiVersion.includes('/') ? apiVersion.slice(0, apiVersion.indexOf('/')) : '';
  const resource = group ? `${kind.toLowerCase()}.${group}` : kind.toLowerCase();
  return { resource, name, namespace };
}

/**
 * Handle tokens have the form `<namespace>/<resource>/<name>`
 */
export function encodeHandleToken(ref: ResourceRef): string {
  return `${ref.namespace}/${ref.resource}/${ref.name}`;
}

export function decodeHandleToken(token: string): ResourceRef | undefined {
  const parts = token.split('/');
  if (parts.length !== 3) {
    return undefined;
  }
  const [namespace, resource, name] = parts;
  if (!namespace || !resource || !name) {
    return undefined;
  }
  return { namespace, resource, name };
}

/**
 * Label values cannot contain "/" and are capped at 63 characters
 */
function toLabelValue(value: string): string {
  return value.replaceAll('/', '.').slice(0, 63).replace(/[^a-zA-Z0-9]+$/, '');
}

function liveStatus(resource: Record<string, unknown>): BackendStatus {
  const metadata = resource.metadata;
  if (isRecord(metadata) && metadata.deletionTimestamp) {
    return 'GONE';
  }
  const status = resource.status;
  const experiment = isRecord(status) ? status.experiment : undefined;
  if (isRecord(experiment) && experiment.desiredPhase === 'Stop') {
    return 'COMPLETED';
  }
  return 'RUNNING';
}

/**
 * Chaos Mesh adapter
 */
export class ChaosMeshAdapter extends RenderingAdapter {
  readonly kind = 'chaos-mesh' as const;

  constructor(
    private readonly kubectl: KubectlClient = new KubectlClient(),
    renderer?: ManifestRenderer,
  ) {
    super(renderer);
  }

  protected override shape(
    template: FaultTemplate,
    validated: ValidatedRequest,
    manifest: Record<string, unknown>,
  ): Record<string, unknown> {
    const { apiVersion, kind } = manifest;
    if (typeof apiVersion !== 'string' || !apiVersion.startsWith(`${CHAOS_MESH_GROUP}/`)) {
      throw new RenderError(
        template.templateId,
        `${template.templateId} must render a ${CHAOS_MESH_GROUP} resource, got apiVersion ${String(apiVersion)}`,
      );
    }
    if (typeof kind !== 'string' || kind.length === 0) {
      throw new RenderError(template.templateId, `${template.templateId} rendered a resource without kind`);
    }

    const { name, namespace, labels } = validated.request.metadata;
    const metadata = isRecord(manifest.metadata) ? manifest.metadata : {};
    const renderedLabels = isRecord(metadata.labels) ? metadata.labels : {};

    return {
      ...manifest,
      metadata: {
        ...metadata,
        name,
        namespace,
        labels: {
          ...renderedLabels,
          ...labels,
          [MANAGED_BY_LABEL]: MANAGER_NAME,
          [TEMPLATE_LABEL]: toLabelValue(template.templateId),
        },
      },
    };
  }

  async apply(artifact: Artifact): Promise<BackendHandle> {
    const ref = resourceRefOf(artifact.manifest, artifact.name, artifact.namespace);
    if (!ref) {
      throw ApplyError.rejected(this.kind, `Artifact for ${artifact.templateId} has no apiVersion or kind`);
    }

    const handle: BackendHandle = { backend: this.kind, token: encodeHandleToken(ref), issuedAt: new Date() };
    const result = await this.kubectl.apply(artifact.document);

    if (succeeded(result)) {
      logger.debug('Applied chaos resource', { token: handle.token, output: result.stdout.trim() });
      return handle;
    }

    if (result.timedOut) {
      throw new TimeoutError('apply', this.kubectl.timeoutMs, handle);
    }

    const message = describeFailure(result);
    if (isTransientFailure(result)) {
      throw new ApplyError('transient', this.kind, message, {
        partialHandle: isAmbiguousFailure(result) ? handle : undefined,
      });
    }
    throw ApplyError.rejected(this.kind, message);
  }

  async revert(handle: BackendHandle): Promise<RevertResult> {
    const ref = decodeHandleToken(handle.token);
    if (!ref) {
      throw new RevertError(handle, `Malformed chaos-mesh handle: ${handle.token}`);
    }

    const result = await this.kubectl.delete(ref);
    if (!succeeded(result)) {
      throw new RevertError(handle, describeFailure(result), isTransientFailure(result));
    }

    // --ignore-not-found prints nothing when the resource is already gone
    const deleted = result.stdout.trim().length > 0;
    logger.debug('Deleted chaos resource', { token: handle.token, deleted });
    return { outcome: deleted ? 'reverted' : 'already-reverted' };
  }

  async status(handle: BackendHandle): Promise<BackendStatus> {
    const ref = decodeHandleToken(handle.token);
    if (!ref) {
      return 'UNKNOWN';
    }

    const result = await this.kubectl.get(ref);
    if (!succeeded(result)) {
      if (!isTransientFailure(result) && /doesn't have a resource type|not found/i.test(result.stderr)) {
        return 'GONE';
      }
      return 'UNKNOWN';
    }

    const output = result.stdout.trim();
    if (output.length === 0) {
      return 'GONE';
    }

    let resource: unknown;
    try {
      resource = JSON.parse(output);
    } catch {
      logger.warn('Unparsable kubectl get output', { token: handle.token });
      return 'UNKNOWN';
    }
    return isRecord(resource) ? liveStatus(resource) : 'UNKNOWN';
  }
}
