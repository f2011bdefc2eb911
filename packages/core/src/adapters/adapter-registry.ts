/**
 * Backend adapter lookup
 * @module @faultline/core/adapters/adapter-registry
 */

import type { BackendAdapter, BackendKind } from '@faultline/shared';
import { ManifestRenderer } from '../rendering/manifest-renderer';
import { KubectlClient } from '../transport/kubectl-client';
import { ChaosMeshAdapter } from './chaos-mesh-adapter';
import { CustomBackendAdapter, type CustomExecutor } from './custom-adapter';
import { UnsupportedBackendAdapter } from './unsupported-adapter';

/**
 * Maps backend kinds to adapters. Unregistered kinds resolve to an UnsupportedBackendAdapter.
 */
export class BackendAdapterRegistry {
  private readonly adapters = new Map<BackendKind, BackendAdapter>();
  private readonly fallbacks = new Map<BackendKind, UnsupportedBackendAdapter>();

  constructor(adapters: Iterable<BackendAdapter> = []) {
    for (const adapter of adapters) {
      this.register(adapter);
    }
  }

  register(adapter: BackendAdapter): this {
    this.adapters.set(adapter.kind, adapter);
    return this;
  }

  resolve(kind: BackendKind): BackendAdapter {
    const adapter = this.adapters.get(kind);
    if (adapter) {
      return adapter;
    }
    let fallback = this.fallbacks.get(kind);
    if (!fallback) {
      fallback = new UnsupportedBackendAdapter(kind);
      this.fallbacks.set(kind, fallback);
    }
    return fallback;
  }

  /**
   * Whether apply can succeed for the kind
   */
  isSupported(kind: BackendKind): boolean {
    const adapter = this.adapters.get(kind);
    return adapter !== undefined && !(adapter instanceof UnsupportedBackendAdapter);
  }

  kinds(): BackendKind[] {
    return [...this.adapters.keys()];
  }
}

export interface DefaultAdapterOptions {
  kubectl?: KubectlClient;
  /** Enables the custom backend */
  customExecutor?: CustomExecutor;
  renderer?: ManifestRenderer;
}

/**
 * Chaos Mesh through kubectl, plus the custom backend when an executor is given
 */
export function createDefaultAdapters(options: DefaultAdapterOptions = {}): BackendAdapterRegistry {
  const renderer = options.renderer ?? new ManifestRenderer();
  const registry = new BackendAdapterRegistry([
    new ChaosMeshAdapter(options.kubectl ?? new KubectlClient(), renderer),
  ]);
  if (options.customExecutor) {
    registry.register(new CustomBackendAdapter(options.customExecutor, renderer));
  }
  return registry;
}
