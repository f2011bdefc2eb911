/**
 * Faultline Core Package
 * Template registry, backend adapters, lifecycle and orchestration engine
 * @module @faultline/core
 */

// Export reactive stores
export * from './stores/index.js';

// Export template sources
export * from './sources/index.js';

// Export rendering
export * from './rendering/index.js';

// Export process and kubectl transport
export * from './transport/index.js';

// Export backend adapters
export * from './adapters/index.js';

// Export services
export * from './services/index.js';

// Export engine assembly
export { bootstrapEngine, templateSourceFor, type BootstrapOptions } from './bootstrap.js';

// Reactive types exposed by the stores
export type { ComputedRef, ShallowRef } from '@vue/reactivity';
