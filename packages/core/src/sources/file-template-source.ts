/**
 * Template source backed by a directory on disk
 * @module @faultline/core/sources/file-template-source
 */

import { readFile } from 'node:fs/promises';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import * as yaml from 'js-yaml';
import { TemplateSourceError, wrapError } from '@faultline/shared';
import type { TemplateSource } from './template-source';

export const DEFAULT_INDEX_FILE = 'index.yaml';

/**
 * Catalog shipped with the package
 */
export const BUNDLED_TEMPLATES_DIR = fileURLToPath(new URL('../../templates/', import.meta.url));

/**
 * Reads `<dir>/index.yaml` and resolves definition paths relative to `<dir>`
 */
export class FileTemplateSource implements TemplateSource {
  readonly location: string;
  private readonly indexPath: string;

  constructor(private readonly directory: string, indexFile: string = DEFAULT_INDEX_FILE) {
    this.directory = path.resolve(directory);
    this.indexPath = path.join(this.directory, indexFile);
    this.location = this.indexPath;
  }

  async readIndex(): Promise<unknown> {
    let content: string;
    try {
      content = await readFile(this.indexPath, 'utf-8');
    } catch (error) {
      throw new TemplateSourceError(this.indexPath, wrapError(error));
    }

    try {
      return yaml.load(content, { filename: this.indexPath });
    } catch (error) {
      throw new TemplateSourceError(this.indexPath, wrapError(error));
    }
  }

  async readDefinition(definitionPath: string): Promise<string> {
    const resolved = path.resolve(this.directory, definitionPath);
    const relative = path.relative(this.directory, resolved);
    if (relative.startsWith('..') || path.isAbsolute(relative)) {
      throw new TemplateSourceError(resolved, new Error('path escapes the template directory'));
    }
    return readFile(resolved, 'utf-8');
  }
}
