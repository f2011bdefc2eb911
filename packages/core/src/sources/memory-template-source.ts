/**
 * In-memory template source
 * @module @faultline/core/sources/memory-template-source
 */

import type { TemplateSource } from './template-source';

/**
 * Catalog held in memory, for tests and embedding
 */
export interface InMemoryCatalog {
  /** Index entries, in the same shape as index.yaml's `templates` list */
  templates: unknown[];
  /** Rendering definitions keyed by path */
  definitions: Record<string, string>;
}

export class InMemoryTemplateSource implements TemplateSource {
  readonly location = 'memory';
  private catalog: InMemoryCatalog;

  constructor(catalog: InMemoryCatalog) {
    this.catalog = catalog;
  }

  /**
   * Replace the catalog; takes effect on the next registry reload
   */
  update(catalog: InMemoryCatalog): void {
    this.catalog = catalog;
  }

  async readIndex(): Promise<unknown> {
    return { templates: this.catalog.templates };
  }

  async readDefinition(path: string): Promise<string> {
    const definition = this.catalog.definitions[path];
    if (definition === undefined) {
      throw new Error(`No definition at ${path}`);
    }
    return definition;
  }
}
