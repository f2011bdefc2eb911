/**
 * Engine assembly from configuration
 * @module @faultline/core/bootstrap
 */

import type { EngineConfig } from '@faultline/shared';
import { createServiceLogger } from '@faultline/shared';
import { createDefaultAdapters } from './adapters/adapter-registry';
import type { CustomExecutor } from './adapters/custom-adapter';
import { FileTemplateSource, BUNDLED_TEMPLATES_DIR } from './sources/file-template-source';
import type { TemplateSource } from './sources/template-source';
import { KubectlClient } from './transport/kubectl-client';
import type { CommandRunner } from './transport/command-runner';
import { OrchestrationEngine } from './services/orchestration-engine';
import { TemplateRegistry } from './services/template-registry';

const logger = createServiceLogger({
  level: 'debug',
  service: 'faultline',
}, { component: 'bootstrap' });

export interface BootstrapOptions {
  /** Defaults to config.templatesDir, then the bundled catalog */
  source?: TemplateSource;
  /** Replaces process execution for kubectl */
  runner?: CommandRunner;
  customExecutor?: CustomExecutor;
  now?: () => Date;
}

/**
 * Template source named by the configuration
 */
export function templateSourceFor(config: EngineConfig): TemplateSource {
  return new FileTemplateSource(config.templatesDir ?? BUNDLED_TEMPLATES_DIR);
}

/**
 * Build an engine and load its templates. Rejects when the catalog is invalid.
 */
export async function bootstrapEngine(config: EngineConfig, options: BootstrapOptions = {}): Promise<OrchestrationEngine> {
  const source = options.source ?? templateSourceFor(config);
  const registry = new TemplateRegistry();
  await registry.load(source);

  const adapters = createDefaultAdapters({
    kubectl: new KubectlClient(config.kubectl, options.runner),
    customExecutor: options.customExecutor,
  });

  logger.debug('Engine assembled', {
    source: source.location,
    templateCount: registry.templateCount.value,
    backends: adapters.kinds(),
  });

  return new OrchestrationEngine({ registry, adapters, config, now: options.now });
}
