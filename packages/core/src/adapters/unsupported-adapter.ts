/**
 * Adapter for declared backends without an implementation
 * @module @faultline/core/adapters/unsupported-adapter
 */

import type {
  BackendHandle,
  BackendKind,
  BackendStatus,
  RevertResult,
} from '@faultline/shared';
import { UnsupportedError } from '@faultline/shared';
import type { ManifestRenderer } from '../rendering/manifest-renderer';
import { RenderingAdapter } from './rendering-adapter';

/**
 * Renders like any other backend so definitions can be previewed.
 * Apply fails with UnsupportedError; revert reports `unsupported` without touching anything.
 */
export class UnsupportedBackendAdapter extends RenderingAdapter {
  constructor(readonly kind: BackendKind, renderer?: ManifestRenderer) {
    super(renderer);
  }

  async apply(): Promise<BackendHandle> {
    throw new UnsupportedError(this.kind, 'apply');
  }

  async revert(): Promise<RevertResult> {
    return { outcome: 'unsupported', message: `Backend "${this.kind}" cannot revert faults` };
  }

  async status(): Promise<BackendStatus> {
    return 'UNKNOWN';
  }
}
