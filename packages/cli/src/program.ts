/**
 * CLI Program
 *
 * Global options and command registration.
 * @module @faultline/cli/program
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { isLogLevel, setLogThreshold } from '@faultline/shared';
import { globalFlags, loadConfig } from './config.js';
import { isOutputFormat, setOutputFormat } from './output.js';
import {
  createInjectCommand,
  createProbeCommand,
  createRenderCommand,
  createRevertCommand,
  createTemplatesCommand,
} from './commands/index.js';

/**
 * CLI version from package.json
 */
const VERSION = '0.1.0';

/**
 * CLI program description
 */
const DESCRIPTION = `
Faultline CLI

Injects faults into a cluster from a catalog of versioned templates,
and reverts them when their TTL expires or the command is interrupted.

Commands:
  templates   Template catalog (list, show, validate)
  render      Print the artifact a request would apply
  inject      Apply a fault and hold it
  revert      Revert a fault by its token
  probe       Ask the backend whether a fault is running

Examples:
  $ faultline templates list --backend chaos-mesh
  $ faultline render cpu_throttling --pod checkout-0 -p load=80
  $ faultline inject network/delay -n shop -s app=checkout -p latency=200ms --ttl 120
  $ faultline revert shop/networkchaos.chaos-mesh.org/checkout-delay
`;

/**
 * Creates and configures the main CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('faultline')
    .version(VERSION, '-v, --version', 'Display CLI version')
    .description(DESCRIPTION)
    .option('-o, --output <format>', 'Output format: json, table, plain', 'table')
    .option('--templates <dir>', 'Template catalog directory (index.yaml and definitions)')
    .option('--context <name>', 'kubeconfig context')
    .option('--kubectl <path>', 'kubectl binary')
    .option('--log-level <level>', 'Engine log level: debug, info, warn, error', 'warn')
    .option('--no-color', 'Disable colored output')
    .hook('preAction', (thisCommand) => {
      const opts = thisCommand.opts<{ output?: string; logLevel?: string; color?: boolean }>();

      if (isOutputFormat(opts.output)) {
        setOutputFormat(opts.output);
      } else if (opts.output !== undefined) {
        throw new Error(`Unknown output format "${opts.output}"`);
      }

      if (isLogLevel(opts.logLevel)) {
        setLogThreshold(opts.logLevel);
      }

      if (opts.color === false) {
        chalk.level = 0;
      }
    });

  program.addCommand(createTemplatesCommand());
  program.addCommand(createRenderCommand());
  program.addCommand(createInjectCommand());
  program.addCommand(createRevertCommand());
  program.addCommand(createProbeCommand());

  program
    .command('config')
    .description('Show the effective engine configuration')
    .action((_options: unknown, command: Command) => {
      console.log(JSON.stringify(loadConfig(globalFlags(command)), null, 2));
    });

  return program;
}
