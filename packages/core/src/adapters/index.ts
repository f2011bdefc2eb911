/**
 * Backend adapters
 * @module @faultline/core/adapters
 */

export { RenderingAdapter } from './rendering-adapter';
export {
  ChaosMeshAdapter,
  resourceRefOf,
  encodeHandleToken,
  decodeHandleToken,
  CHAOS_MESH_GROUP,
  MANAGED_BY_LABEL,
  TEMPLATE_LABEL,
  MANAGER_NAME,
} from './chaos-mesh-adapter';
export { CustomBackendAdapter, type CustomExecutor } from './custom-adapter';
export { UnsupportedBackendAdapter } from './unsupported-adapter';
export {
  BackendAdapterRegistry,
  createDefaultAdapters,
  type DefaultAdapterOptions,
} from './adapter-registry';
