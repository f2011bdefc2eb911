/**
 * Template registry service
 * Loads, validates and serves fault templates
 * @module @faultline/core/services/template-registry
 */

import type { ComputedRef } from '@vue/reactivity';
import type {
  BackendKind,
  FaultTemplate,
  ParameterSchema,
  TemplateEntry,
  TemplateIssue,
  TemplateSummary,
} from '@faultline/shared';
import {
  InvalidTemplateError,
  TemplateNotFoundError,
  TemplateSourceError,
  createServiceLogger,
  isRecord,
  summarizeTemplate,
  validateTemplateEntry,
  wrapError,
} from '@faultline/shared';
import { checkDefinition, referencedPaths } from '../rendering/manifest-renderer';
import { RENDER_CONTEXT_ROOTS } from '../rendering/render-context';
import type { TemplateSource } from '../sources/template-source';
import { TemplateStore, type TemplateCatalog } from '../stores/template-store';

/**
 * Logger for template registry operations
 */
const logger = createServiceLogger({
  level: 'debug',
  service: 'faultline',
}, { component: 'template-registry' });

/**
 * Template registry options
 */
export interface TemplateRegistryOptions {
  /** Store holding the current catalog */
  store?: TemplateStore;
  /** Source used by reload() when none is passed */
  source?: TemplateSource;
}

/**
 * Template list filters
 */
export interface TemplateListFilters {
  backend?: BackendKind;
  composable?: boolean;
}

function freezeTemplate(template: FaultTemplate): FaultTemplate {
  for (const spec of Object.values(template.parameters)) {
    if (spec.enum) Object.freeze(spec.enum);
    Object.freeze(spec);
  }
  Object.freeze(template.parameters);
  Object.freeze(template.render);
  return Object.freeze(template);
}

/**
 * Issues with the placeholders a definition uses
 */
function checkReferences(templateId: string, definition: string, parameters: ParameterSchema): TemplateIssue[] {
  const issues: TemplateIssue[] = [];
  const roots: readonly string[] = RENDER_CONTEXT_ROOTS;

  for (const reference of referencedPaths(definition)) {
    const [root, name] = reference.split('.');
    if (!root || !roots.includes(root)) {
      issues.push({ templateId, field: 'path', message: `unknown placeholder root in "{{ ${reference} }}"` });
    } else if (root === 'params' && (!name || !(name in parameters))) {
      issues.push({ templateId, field: 'parameters', message: `rendering definition references undeclared parameter "${name ?? ''}"` });
    }
  }
  return issues;
}

async function loadDefinition(
  source: TemplateSource,
  entry: TemplateEntry,
): Promise<{ template?: FaultTemplate; issues: TemplateIssue[] }> {
  const { renderPath, ...fields } = entry;
  let definition: string;
  try {
    definition = await source.readDefinition(renderPath);
  } catch (error) {
    return {
      issues: [{
        templateId: entry.templateId,
        field: 'path',
        message: `cannot read rendering definition ${renderPath}: ${wrapError(error).message}`,
      }],
    };
  }

  const problem = checkDefinition(definition);
  if (problem) {
    return { issues: [{ templateId: entry.templateId, field: 'path', message: problem }] };
  }

  const issues = checkReferences(entry.templateId, definition, entry.parameters);
  if (issues.length > 0) {
    return { issues };
  }

  return {
    template: { ...fields, render: { path: renderPath, definition } },
    issues,
  };
}

/**
 * Read and validate a whole template source into a new catalog.
 * Throws InvalidTemplateError listing every defect found, or TemplateSourceError
 * when the index itself cannot be read.
 */
export async function buildCatalog(source: TemplateSource): Promise<TemplateCatalog> {
  const index = await source.readIndex();

  if (!isRecord(index) || !Array.isArray(index.templates)) {
    throw new InvalidTemplateError(
      [{ templateId: '<index>', field: 'templates', message: 'index must contain a "templates" list' }],
      { source: source.location },
    );
  }

  const issues: TemplateIssue[] = [];
  const entries: TemplateEntry[] = [];
  const firstSeen = new Map<string, number>();

  index.templates.forEach((raw: unknown, position: number) => {
    const result = validateTemplateEntry(raw, position);
    issues.push(...result.issues);
    if (!result.entry) {
      return;
    }

    const earlier = firstSeen.get(result.entry.templateId);
    if (earlier !== undefined) {
      issues.push({
        templateId: result.entry.templateId,
        field: 'templateID',
        message: `duplicate templateID (first declared at #${earlier})`,
      });
      return;
    }
    firstSeen.set(result.entry.templateId, position);
    entries.push(result.entry);
  });

  const loaded = await Promise.all(entries.map(entry => loadDefinition(source, entry)));

  const catalog = new Map<string, FaultTemplate>();
  for (const result of loaded) {
    issues.push(...result.issues);
    if (result.template) {
      catalog.set(result.template.templateId, freezeTemplate(result.template));
    }
  }

  if (issues.length > 0) {
    throw new InvalidTemplateError(issues, { source: source.location });
  }

  return catalog;
}

/**
 * Template registry.
 * A load either replaces the whole catalog or leaves the previous one in place.
 */
export class TemplateRegistry {
  private readonly store: TemplateStore;
  private source?: TemplateSource;

  constructor(options: TemplateRegistryOptions = {}) {
    this.store = options.store ?? new TemplateStore();
    this.source = options.source;
  }

  /**
   * Number of loaded templates
   */
  get templateCount(): ComputedRef<number> {
    return this.store.templateCount;
  }

  /**
   * Time of the last successful load
   */
  get loadedAt(): Date | null {
    return this.store.loadedAt.value;
  }

  /**
   * Load a source and make it the registry's source for later reloads
   */
  async load(source: TemplateSource): Promise<TemplateSummary[]> {
    const catalog = await this.read(source);
    this.source = source;
    this.store.swap(catalog);

    logger.info('Template catalog loaded', {
      source: source.location,
      templateCount: catalog.size,
    });

    return this.list();
  }

  /**
   * Re-read the current source. On failure the previous catalog stays active.
   */
  async reload(): Promise<TemplateSummary[]> {
    if (!this.source) {
      throw new TemplateSourceError('<none>', new Error('no template source configured'));
    }
    return this.load(this.source);
  }

  /**
   * Resolve a template or throw TemplateNotFoundError
   */
  get(templateId: string): FaultTemplate {
    const template = this.store.get(templateId);
    if (!template) {
      throw new TemplateNotFoundError(templateId, this.store.ids());
    }
    return template;
  }

  /**
   * Resolve a template if it exists
   */
  find(templateId: string): FaultTemplate | undefined {
    return this.store.get(templateId);
  }

  has(templateId: string): boolean {
    return this.store.get(templateId) !== undefined;
  }

  /**
   * Template summaries, sorted by ID
   */
  list(filters: TemplateListFilters = {}): TemplateSummary[] {
    return [...this.store.catalog.value.values()]
      .filter(t => filters.backend === undefined || t.backend === filters.backend)
      .filter(t => filters.composable === undefined || t.composable === filters.composable)
      .sort((a, b) => a.templateId.localeCompare(b.templateId))
      .map(summarizeTemplate);
  }

  /**
   * Loaded template IDs, sorted
   */
  ids(): string[] {
    return this.store.ids();
  }

  private async read(source: TemplateSource): Promise<TemplateCatalog> {
    try {
      return await buildCatalog(source);
    } catch (error) {
      const wrapped = wrapError(error);
      logger.warn('Template source rejected; keeping current catalog', {
        source: source.location,
        code: wrapped.code,
        error: wrapped.message,
        templateCount: this.store.templateCount.value,
      });
      throw wrapped;
    }
  }
}

/**
 * Create a template registry
 */
export function createTemplateRegistry(options?: TemplateRegistryOptions): TemplateRegistry {
  return new TemplateRegistry(options);
}
