/**
 * Manifest rendering
 * @module @faultline/core/rendering
 */

export {
  ManifestRenderer,
  checkDefinition,
  referencedPaths,
  type RenderContext,
} from './manifest-renderer';

export {
  buildRenderContext,
  namespacedSelector,
  RENDER_CONTEXT_ROOTS,
} from './render-context';
