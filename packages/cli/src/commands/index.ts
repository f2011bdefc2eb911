/**
 * CLI Commands
 *
 * Exports all CLI command builders.
 * @module @faultline/cli/commands
 */

export { createTemplatesCommand } from './templates.js';
export { createInjectCommand, createRenderCommand } from './inject.js';
export { createRevertCommand, createProbeCommand } from './revert.js';
