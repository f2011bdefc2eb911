/**
 * Handle Commands
 *
 * Act on a fault left behind by a detached or interrupted run, by its revert token
 * @module @faultline/cli/commands/revert
 */

import { Command } from 'commander';
import { KubectlClient, createDefaultAdapters, type BackendAdapterRegistry } from '@faultline/core';
import type { BackendHandle } from '@faultline/shared';
import { globalFlags, loadConfig } from '../config.js';
import { error, getOutputFormat, keyValue, success, warn } from '../output.js';
import { parseBackend } from './request-options.js';

interface HandleOptions {
  backend: string;
}

function openAdapters(command: Command): BackendAdapterRegistry {
  const config = loadConfig(globalFlags(command));
  return createDefaultAdapters({ kubectl: new KubectlClient(config.kubectl) });
}

function handleFor(token: string, options: HandleOptions): BackendHandle {
  return {
    backend: parseBackend(options.backend) ?? 'chaos-mesh',
    token,
    issuedAt: new Date(),
  };
}

/**
 * Revert command handler
 */
async function revertHandler(token: string, options: HandleOptions, command: Command): Promise<void> {
  const handle = handleFor(token, options);
  const result = await openAdapters(command).resolve(handle.backend).revert(handle);

  if (getOutputFormat() === 'json') {
    console.log(JSON.stringify({ token, backend: handle.backend, ...result }, null, 2));
    return;
  }

  switch (result.outcome) {
    case 'reverted':
      success(`Reverted ${token}`);
      break;
    case 'already-reverted':
    case 'not-applied':
      success(`Nothing to revert for ${token} (${result.outcome})`);
      break;
    case 'unsupported':
      error(result.message ?? `Backend ${handle.backend} cannot revert`);
      process.exitCode = 1;
      break;
  }
}

/**
 * Probe command handler
 */
async function probeHandler(token: string, options: HandleOptions, command: Command): Promise<void> {
  const handle = handleFor(token, options);
  const status = await openAdapters(command).resolve(handle.backend).status(handle);

  keyValue({ Token: token, Backend: handle.backend, Status: status });
  if (status === 'UNKNOWN' && getOutputFormat() !== 'json') {
    warn('The backend could not be reached or did not report a usable status');
  }
}

/**
 * Creates the revert command
 */
export function createRevertCommand(): Command {
  return new Command('revert')
    .argument('<token>', 'Revert token printed by inject')
    .description('Revert a fault by its token; succeeds if it is already gone')
    .option('-b, --backend <backend>', 'Backend that issued the token', 'chaos-mesh')
    .action(revertHandler);
}

/**
 * Creates the probe command
 */
export function createProbeCommand(): Command {
  return new Command('probe')
    .argument('<token>', 'Revert token printed by inject')
    .description('Ask the backend whether a fault is still running')
    .option('-b, --backend <backend>', 'Backend that issued the token', 'chaos-mesh')
    .action(probeHandler);
}
