/**
 * CLI Configuration
 *
 * Resolves engine configuration from the environment and global flags.
 * @module @faultline/cli/config
 */

import type { Command } from 'commander';
import {
  loadEngineConfig,
  type EngineConfig,
  type EngineConfigOverrides,
} from '@faultline/shared';

/**
 * Global flags shared by every command
 */
export interface GlobalFlags {
  templates?: string;
  context?: string;
  kubectl?: string;
}

/**
 * Global flags of the program a command belongs to
 */
export function globalFlags(command: Command): GlobalFlags {
  const opts = command.optsWithGlobals<GlobalFlags & Record<string, unknown>>();
  return {
    templates: opts.templates,
    context: opts.context,
    kubectl: opts.kubectl,
  };
}

/**
 * Engine configuration: defaults, then FAULTLINE_* variables, then flags
 */
export function loadConfig(
  flags: GlobalFlags = {},
  env: Record<string, string | undefined> = process.env,
): EngineConfig {
  const overrides: EngineConfigOverrides = {};
  if (flags.templates) {
    overrides.templatesDir = flags.templates;
  }
  if (flags.context || flags.kubectl) {
    overrides.kubectl = {};
    if (flags.context) overrides.kubectl.context = flags.context;
    if (flags.kubectl) overrides.kubectl.binary = flags.kubectl;
  }
  return loadEngineConfig(env, overrides);
}
