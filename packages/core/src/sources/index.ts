/**
 * Template sources
 * @module @faultline/core/sources
 */

export type { TemplateSource } from './template-source';
export { FileTemplateSource, DEFAULT_INDEX_FILE, BUNDLED_TEMPLATES_DIR } from './file-template-source';
export { InMemoryTemplateSource, type InMemoryCatalog } from './memory-template-source';
