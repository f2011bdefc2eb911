/**
 * Unit tests for TemplateRegistry
 * @module @faultline/core/tests/unit/template-registry
 */

import { describe, it, expect, beforeEach } from 'vitest';

import {
  ErrorCode,
  InvalidTemplateError,
  TemplateNotFoundError,
  TemplateSourceError,
} from '@faultline/shared';
import { InMemoryTemplateSource, TemplateRegistry, type InMemoryCatalog, type TemplateSource } from '../../src';
import { CPU_DEFINITION, Gate, testCatalog } from '../helpers/fixtures';

async function loadFailure(registry: TemplateRegistry, source: TemplateSource): Promise<InvalidTemplateError> {
  try {
    await registry.load(source);
  } catch (error) {
    if (error instanceof InvalidTemplateError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected the load to fail');
}

/**
 * Source whose definition reads wait on a gate once one is set
 */
class GatedSource extends InMemoryTemplateSource {
  gate?: Gate;
  readonly reading = new Gate();

  override async readDefinition(path: string): Promise<string> {
    if (this.gate) {
      this.reading.open();
      await this.gate.promise;
    }
    return super.readDefinition(path);
  }
}

function catalogOf(templates: unknown[], definitions: Record<string, string> = { 'a.yaml': 'kind: a\n' }): InMemoryCatalog {
  return { templates, definitions };
}

describe('TemplateRegistry', () => {
  let registry: TemplateRegistry;

  beforeEach(() => {
    registry = new TemplateRegistry();
  });

  describe('load', () => {
    it('should return summaries sorted by ID', async () => {
      const summaries = await registry.load(new InMemoryTemplateSource(testCatalog()));

      expect(summaries.map(s => s.templateId)).toEqual(['cpu-throttle', 'disk-fill', 'net-delay']);
      expect(summaries[0]).toEqual({
        templateId: 'cpu-throttle',
        version: 1,
        backend: 'custom',
        description: undefined,
        composable: false,
        parameters: ['load'],
        requiredParameters: [],
      });
      expect(summaries[2]?.requiredParameters).toEqual(['latency']);
      expect(registry.templateCount.value).toBe(3);
      expect(registry.loadedAt).toBeInstanceOf(Date);
    });

    it('should keep the definition text and freeze templates', async () => {
      await registry.load(new InMemoryTemplateSource(testCatalog()));
      const template = registry.get('cpu-throttle');

      expect(template.render).toEqual({ path: 'cpu.yaml', definition: CPU_DEFINITION });
      expect(Object.isFrozen(template)).toBe(true);
      expect(Object.isFrozen(template.parameters.load)).toBe(true);
    });

    it('should default the version to 1 and composable to false', async () => {
      await registry.load(new InMemoryTemplateSource(catalogOf([
        { templateID: 'plain', backend: 'chaos-mesh', path: 'a.yaml' },
      ])));

      const template = registry.get('plain');
      expect(template.version).toBe(1);
      expect(template.composable).toBe(false);
      expect(template.parameters).toEqual({});
    });
  });

  describe('lookup', () => {
    beforeEach(async () => {
      await registry.load(new InMemoryTemplateSource(testCatalog()));
    });

    it('should throw TemplateNotFoundError for an unknown ID', () => {
      expect(() => registry.get('cpu-melt')).toThrow(TemplateNotFoundError);
      expect(() => registry.get('cpu-melt')).toThrow('Template not found: cpu-melt');
      expect(registry.find('cpu-melt')).toBeUndefined();
      expect(registry.has('cpu-throttle')).toBe(true);
    });

    it('should filter by backend and composability', () => {
      expect(registry.list({ backend: 'chaosd' }).map(s => s.templateId)).toEqual(['disk-fill']);
      expect(registry.list({ composable: true }).map(s => s.templateId)).toEqual(['net-delay']);
      expect(registry.list({ composable: false }).map(s => s.templateId)).toEqual(['cpu-throttle', 'disk-fill']);
      expect(registry.list({ backend: 'chaos-mesh' })).toEqual([]);
    });
  });

  describe('invalid sources', () => {
    it('should report every defective entry in one error', async () => {
      const error = await loadFailure(registry, new InMemoryTemplateSource(catalogOf([
        { templateID: 'Bad ID', backend: 'custom', path: 'a.yaml' },
        { templateID: 'no-backend', backend: 'litmus', path: 'a.yaml' },
        { templateID: 'bad-param', backend: 'custom', path: 'a.yaml', parameters: { load: { type: 'float' } } },
        { templateID: 'fine', backend: 'custom', path: 'a.yaml' },
      ])));

      expect(error.code).toBe(ErrorCode.TEMPLATE_INVALID);
      expect(error.issues.map(i => `${i.templateId}:${i.field}`)).toEqual([
        'Bad ID:templateID',
        'no-backend:backend',
        'bad-param:parameters.load.type',
      ]);
      expect(error.message).toBe('Invalid template source: 3 issue(s) in Bad ID, no-backend, bad-param');
    });

    it('should reject duplicate IDs', async () => {
      const error = await loadFailure(registry, new InMemoryTemplateSource(catalogOf([
        { templateID: 'twice', backend: 'custom', path: 'a.yaml' },
        { templateID: 'twice', backend: 'custom', path: 'a.yaml' },
      ])));

      expect(error.issues).toEqual([
        { templateId: 'twice', field: 'templateID', message: 'duplicate templateID (first declared at #0)' },
      ]);
    });

    it('should reject placeholders naming undeclared parameters or unknown roots', async () => {
      const error = await loadFailure(registry, new InMemoryTemplateSource(catalogOf(
        [{ templateID: 'refs', backend: 'custom', path: 'refs.yaml' }],
        { 'refs.yaml': 'load: "{{ params.load }}"\npod: "{{ pod.name }}"\n' },
      )));

      expect(error.issues).toEqual([
        { templateId: 'refs', field: 'parameters', message: 'rendering definition references undeclared parameter "load"' },
        { templateId: 'refs', field: 'path', message: 'unknown placeholder root in "{{ pod.name }}"' },
      ]);
    });

    it('should reject missing and non-mapping definitions', async () => {
      const error = await loadFailure(registry, new InMemoryTemplateSource(catalogOf(
        [
          { templateID: 'missing', backend: 'custom', path: 'missing.yaml' },
          { templateID: 'listy', backend: 'custom', path: 'list.yaml' },
        ],
        { 'list.yaml': '- a\n- b\n' },
      )));

      expect(error.issuesFor('missing')).toEqual([
        { templateId: 'missing', field: 'path', message: 'cannot read rendering definition missing.yaml: No definition at missing.yaml' },
      ]);
      expect(error.issuesFor('listy')).toEqual([
        { templateId: 'listy', field: 'path', message: 'rendering definition must be a YAML mapping' },
      ]);
    });

    it('should reject an index without a templates list', async () => {
      const source: TemplateSource = {
        location: 'inline',
        readIndex: async () => ({ entries: [] }),
        readDefinition: async () => '',
      };

      const error = await loadFailure(registry, source);

      expect(error.issues).toEqual([
        { templateId: '<index>', field: 'templates', message: 'index must contain a "templates" list' },
      ]);
      expect(error.meta.source).toBe('inline');
    });
  });

  describe('reload', () => {
    it('should swap in the new catalog', async () => {
      const source = new InMemoryTemplateSource(testCatalog());
      await registry.load(source);

      source.update(testCatalog(3));
      await registry.reload();

      expect(registry.get('cpu-throttle').version).toBe(3);
    });

    it('should serve the whole old catalog until the new one is swapped in', async () => {
      const source = new GatedSource(testCatalog());
      await registry.load(source);
      const oldDelay = registry.get('net-delay');

      const gate = new Gate();
      source.gate = gate;
      source.update(testCatalog(3));
      const reloading = registry.reload();
      await source.reading.promise;

      expect(registry.get('cpu-throttle').version).toBe(1);
      expect(registry.get('net-delay')).toBe(oldDelay);

      gate.open();
      await reloading;

      expect(registry.get('cpu-throttle').version).toBe(3);
      expect(registry.get('net-delay')).not.toBe(oldDelay);
      expect(registry.get('net-delay').templateId).toBe('net-delay');
    });

    it('should keep the previous catalog when the new one is invalid', async () => {
      const source = new InMemoryTemplateSource(testCatalog());
      await registry.load(source);
      const before = registry.get('cpu-throttle');
      const loadedAt = registry.loadedAt;

      source.update(catalogOf([{ templateID: 'broken', backend: 'custom' }]));
      await expect(registry.reload()).rejects.toThrow(InvalidTemplateError);

      expect(registry.get('cpu-throttle')).toBe(before);
      expect(registry.ids()).toEqual(['cpu-throttle', 'disk-fill', 'net-delay']);
      expect(registry.find('broken')).toBeUndefined();
      expect(registry.loadedAt).toBe(loadedAt);
    });

    it('should fail without a source', async () => {
      await expect(registry.reload()).rejects.toThrow(TemplateSourceError);
    });
  });
});
