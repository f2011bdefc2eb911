/**
 * Template catalog store
 * @module @faultline/core/stores/template-store
 */

import { computed, shallowRef, type ComputedRef, type ShallowRef } from '@vue/reactivity';
import type { BackendKind, FaultTemplate } from '@faultline/shared';
import { groupBy } from '@faultline/shared';

/**
 * Immutable mapping of template ID to template
 */
export type TemplateCatalog = ReadonlyMap<string, FaultTemplate>;

/**
 * Holds the current catalog behind a single reference.
 * Readers always observe either the old or the new mapping, never a mix.
 */
export class TemplateStore {
  readonly catalog: ShallowRef<TemplateCatalog> = shallowRef(new Map());
  readonly loadedAt: ShallowRef<Date | null> = shallowRef(null);

  readonly templateCount: ComputedRef<number> = computed(() => this.catalog.value.size);

  readonly templatesByBackend: ComputedRef<Map<BackendKind, FaultTemplate[]>> = computed(() =>
    groupBy(this.catalog.value.values(), t => t.backend),
  );

  /**
   * Replace the whole catalog
   */
  swap(next: TemplateCatalog, at: Date = new Date()): TemplateCatalog {
    const previous = this.catalog.value;
    this.catalog.value = next;
    this.loadedAt.value = at;
    return previous;
  }

  get(templateId: string): FaultTemplate | undefined {
    return this.catalog.value.get(templateId);
  }

  ids(): string[] {
    return [...this.catalog.value.keys()].sort();
  }
}

export function createTemplateStore(): TemplateStore {
  return new TemplateStore();
}
