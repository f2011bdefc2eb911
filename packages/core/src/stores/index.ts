/**
 * Reactive stores for Faultline
 * @module @faultline/core/stores
 */

// Instance store - fault instance state
export {
  InstanceStore,
  createInstanceStore,
  detach,
  type InstanceStoreState,
} from './instance-store';

// Template store - current template catalog
export {
  TemplateStore,
  createTemplateStore,
  type TemplateCatalog,
} from './template-store';
