/**
 * Fault Commands
 *
 * Inject a fault and hold it, or preview what would be applied
 * @module @faultline/cli/commands/inject
 */

import { Command } from 'commander';
import chalk from 'chalk';
import {
  RequestValidator,
  bootstrapEngine,
  createDefaultAdapters,
  type OrchestrationEngine,
} from '@faultline/core';
import type { FaultInstance } from '@faultline/shared';
import { globalFlags, loadConfig } from '../config.js';
import {
  failure,
  getOutputFormat,
  info,
  keyValue,
  stateBadge,
  success,
  warn,
} from '../output.js';
import { openRegistry } from './templates.js';
import { buildRequest, type RequestOptions } from './request-options.js';

interface InjectOptions extends RequestOptions {
  detach?: boolean;
}

/**
 * Poll interval while holding a fault
 */
const WATCH_INTERVAL_MS = 1_000;

/**
 * Print a fault instance
 */
export function printInstance(instance: FaultInstance): void {
  if (getOutputFormat() === 'json') {
    console.log(JSON.stringify(instance, null, 2));
    return;
  }

  keyValue({
    Instance: instance.instanceId,
    State: stateBadge(instance.state),
    Template: `${instance.templateId} v${instance.templateVersion}`,
    Backend: instance.backend,
    Name: instance.request.metadata.name,
    Namespace: instance.request.metadata.namespace,
    Handle: instance.backendHandle?.token,
    Expires: instance.expiresAt,
    Error: instance.lastError?.message,
  });
}

/**
 * Hold an active instance until it leaves ACTIVE or the process is interrupted.
 * Reconciliation runs meanwhile so TTL expiry and backend drift are handled.
 */
async function holdInstance(engine: OrchestrationEngine, instanceId: string): Promise<void> {
  engine.startReconciliation(Math.min(engine.config.reconcileIntervalMs, WATCH_INTERVAL_MS * 5));

  try {
    await new Promise<void>(resolve => {
      const stop = (): void => {
        clearInterval(timer);
        process.off('SIGINT', stop);
        process.off('SIGTERM', stop);
        resolve();
      };
      const timer = setInterval(() => {
        const current = engine.status(instanceId);
        if (!current.success || current.data.state !== 'ACTIVE') {
          stop();
        }
      }, WATCH_INTERVAL_MS);
      process.once('SIGINT', stop);
      process.once('SIGTERM', stop);
    });
  } finally {
    engine.stopReconciliation();
  }

  const current = engine.status(instanceId);
  if (current.success && current.data.state === 'ACTIVE') {
    info('Reverting...');
    const reverted = await engine.revert(instanceId);
    if (!reverted.success) {
      failure(reverted.error);
      process.exitCode = 1;
      return;
    }
  }

  const final = engine.status(instanceId);
  if (!final.success) {
    failure(final.error);
    process.exitCode = 1;
    return;
  }

  printInstance(final.data);
  if (final.data.state === 'FAILED_PARTIAL') {
    warn(`Backend state needs attention; revert manually with: faultline revert ${final.data.backendHandle?.token ?? '<token>'} --backend ${final.data.backend}`);
    process.exitCode = 1;
  }
}

/**
 * Inject command handler
 */
async function injectHandler(templateId: string, options: InjectOptions, command: Command): Promise<void> {
  const config = loadConfig(globalFlags(command));
  const engine = await bootstrapEngine(config);

  try {
    const template = engine.registry.get(templateId);
    const request = buildRequest(template, options, config.defaultNamespace);

    const submitted = await engine.submit(request);
    if (!submitted.success) {
      failure(submitted.error);
      process.exitCode = 1;
      return;
    }

    const instance = submitted.data;
    success(`Fault ${instance.instanceId} is active`);
    printInstance(instance);

    if (options.detach) {
      const handle = instance.backendHandle;
      if (handle && getOutputFormat() !== 'json') {
        info(`Revert with: faultline revert ${handle.token} --backend ${handle.backend}`);
      }
      return;
    }

    info(instance.expiresAt
      ? `Holding until ${instance.expiresAt.toISOString()}; press Ctrl+C to revert early`
      : 'Holding until interrupted; press Ctrl+C to revert');
    await holdInstance(engine, instance.instanceId);
  } finally {
    engine.dispose();
  }
}

/**
 * Render command handler (dry run)
 */
async function renderHandler(templateId: string, options: RequestOptions, command: Command): Promise<void> {
  const config = loadConfig(globalFlags(command));
  const registry = await openRegistry(command);
  const template = registry.get(templateId);
  const request = buildRequest(template, options, config.defaultNamespace);

  const validated = new RequestValidator({ maxTtlSeconds: config.maxTtlSeconds }).validate(request, template);
  if (!validated.valid) {
    failure(validated.error);
    process.exitCode = 1;
    return;
  }

  const artifact = createDefaultAdapters().resolve(template.backend).render(template, validated.value);

  if (getOutputFormat() === 'json') {
    console.log(JSON.stringify(artifact.manifest, null, 2));
    return;
  }

  console.log(chalk.gray(`# ${template.templateId} v${template.version} -> ${artifact.backend}`));
  process.stdout.write(artifact.document);
}

/**
 * Adds the request options shared by inject and render
 */
function withRequestOptions(command: Command): Command {
  const collect = (value: string, previous: string[] = []): string[] => [...previous, value];

  return command
    .option('--name <name>', 'Name of the fault on the backend')
    .option('-n, --namespace <namespace>', 'Target namespace')
    .option('--pod <pod>', 'Target pod (can be repeated)', collect)
    .option('-s, --selector <key=value>', 'Target label selector (can be repeated)', collect)
    .option('-l, --label <key=value>', 'Label for the fault (can be repeated)', collect)
    .option('-p, --param <key=value>', 'Template parameter (can be repeated)', collect)
    .option('--ttl <seconds>', 'Revert automatically after this many seconds');
}

/**
 * Creates the inject command
 */
export function createInjectCommand(): Command {
  return withRequestOptions(
    new Command('inject')
      .argument('<templateId>', 'Template to instantiate')
      .description('Inject a fault and hold it until its TTL expires or the command is interrupted'),
  )
    .option('-d, --detach', 'Leave the fault active and print its revert token')
    .action(injectHandler);
}

/**
 * Creates the render command
 */
export function createRenderCommand(): Command {
  return withRequestOptions(
    new Command('render')
      .argument('<templateId>', 'Template to instantiate')
      .description('Print the backend artifact a request would apply, without applying it'),
  ).action(renderHandler);
}
