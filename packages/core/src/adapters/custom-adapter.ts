/**
 * Custom backend adapter
 * Delegates apply, revert and status to a caller-supplied executor
 * @module @faultline/core/adapters/custom-adapter
 */

import type {
  Artifact,
  BackendHandle,
  BackendStatus,
  RevertResult,
} from '@faultline/shared';
import {
  ApplyError,
  RevertError,
  TimeoutError,
  createServiceLogger,
  isApplyError,
  isRevertError,
  wrapError,
} from '@faultline/shared';
import type { ManifestRenderer } from '../rendering/manifest-renderer';
import { RenderingAdapter } from './rendering-adapter';

const logger = createServiceLogger({
  level: 'debug',
  service: 'faultline',
}, { component: 'custom-adapter' });

/**
 * What a custom backend must provide.
 * Throw ApplyError or RevertError to control retry classification.
 */
export interface CustomExecutor {
  /** Inject the fault; resolves with a token identifying it */
  apply(artifact: Artifact): Promise<string>;
  /** Remove the fault; resolves false when there was nothing to remove */
  revert(token: string): Promise<boolean>;
  status(token: string): Promise<BackendStatus>;
}

export class CustomBackendAdapter extends RenderingAdapter {
  readonly kind = 'custom' as const;

  constructor(private readonly executor: CustomExecutor, renderer?: ManifestRenderer) {
    super(renderer);
  }

  async apply(artifact: Artifact): Promise<BackendHandle> {
    try {
      const token = await this.executor.apply(artifact);
      return { backend: this.kind, token, issuedAt: new Date() };
    } catch (error) {
      if (isApplyError(error) || error instanceof TimeoutError) {
        throw error;
      }
      const cause = wrapError(error);
      throw ApplyError.rejected(this.kind, cause.message, cause);
    }
  }

  async revert(handle: BackendHandle): Promise<RevertResult> {
    try {
      const removed = await this.executor.revert(handle.token);
      return { outcome: removed ? 'reverted' : 'already-reverted' };
    } catch (error) {
      if (isRevertError(error)) {
        throw error;
      }
      const cause = wrapError(error);
      throw new RevertError(handle, cause.message, false, cause);
    }
  }

  async status(handle: BackendHandle): Promise<BackendStatus> {
    try {
      return await this.executor.status(handle.token);
    } catch (error) {
      logger.warn('Custom executor status failed', { token: handle.token, error: wrapError(error).message });
      return 'UNKNOWN';
    }
  }
}
