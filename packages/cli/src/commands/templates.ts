/**
 * Template Commands
 *
 * Template catalog commands: list, show, validate
 * @module @faultline/cli/commands/templates
 */

import { Command } from 'commander';
import chalk from 'chalk';
import {
  buildCatalog,
  createTemplateRegistry,
  templateSourceFor,
  type TemplateRegistry,
} from '@faultline/core';
import { wrapError, type ParameterSpec } from '@faultline/shared';
import { globalFlags, loadConfig } from '../config.js';
import { parseBackend } from './request-options.js';
import {
  failure,
  getOutputFormat,
  keyValue,
  success,
  table,
  truncate,
} from '../output.js';

interface ListOptions {
  backend?: string;
  composable?: boolean;
}

/**
 * Load the configured catalog into a fresh registry
 */
export async function openRegistry(command: Command): Promise<TemplateRegistry> {
  const config = loadConfig(globalFlags(command));
  const registry = createTemplateRegistry();
  await registry.load(templateSourceFor(config));
  return registry;
}

function describeParameter(name: string, spec: ParameterSpec): Record<string, string> {
  const constraints: string[] = [];
  if (spec.enum) constraints.push(`one of ${spec.enum.join('|')}`);
  if (spec.min !== undefined) constraints.push(`>= ${spec.min}`);
  if (spec.max !== undefined) constraints.push(`<= ${spec.max}`);

  return {
    name,
    type: spec.type,
    required: spec.required && spec.default === undefined ? 'yes' : '',
    default: spec.default === undefined ? '' : JSON.stringify(spec.default),
    constraints: constraints.join(', '),
    description: spec.description ?? '',
  };
}

/**
 * List command handler
 */
async function listHandler(options: ListOptions, command: Command): Promise<void> {
  const registry = await openRegistry(command);
  const templates = registry.list({
    backend: parseBackend(options.backend),
    composable: options.composable,
  });

  if (getOutputFormat() === 'json') {
    console.log(JSON.stringify(templates, null, 2));
    return;
  }

  table(
    templates.map(t => ({
      templateId: t.templateId,
      version: String(t.version),
      backend: t.backend,
      composable: t.composable ? 'yes' : '',
      required: t.requiredParameters.join(', '),
      description: truncate(t.description ?? '', 48),
    })),
    [
      { key: 'templateId', header: 'TEMPLATE' },
      { key: 'version', header: 'VERSION' },
      { key: 'backend', header: 'BACKEND' },
      { key: 'composable', header: 'COMPOSABLE' },
      { key: 'required', header: 'REQUIRED PARAMS' },
      { key: 'description', header: 'DESCRIPTION' },
    ],
  );
}

/**
 * Show command handler
 */
async function showHandler(templateId: string, _options: unknown, command: Command): Promise<void> {
  const registry = await openRegistry(command);
  const template = registry.get(templateId);

  if (getOutputFormat() === 'json') {
    console.log(JSON.stringify(template, null, 2));
    return;
  }

  keyValue({
    Template: template.templateId,
    Version: template.version,
    Backend: template.backend,
    Composable: template.composable,
    Description: template.description,
    Definition: template.render.path,
  });

  console.log();
  console.log(chalk.bold('Parameters'));
  table(
    Object.entries(template.parameters).map(([name, spec]) => describeParameter(name, spec)),
    [
      { key: 'name', header: 'NAME' },
      { key: 'type', header: 'TYPE' },
      { key: 'required', header: 'REQUIRED' },
      { key: 'default', header: 'DEFAULT' },
      { key: 'constraints', header: 'CONSTRAINTS' },
      { key: 'description', header: 'DESCRIPTION' },
    ],
  );
}

/**
 * Validate command handler
 */
async function validateHandler(_options: unknown, command: Command): Promise<void> {
  const config = loadConfig(globalFlags(command));
  const source = templateSourceFor(config);

  try {
    const catalog = await buildCatalog(source);
    success(`${catalog.size} template(s) in ${source.location} are valid`);
  } catch (err) {
    failure(wrapError(err));
    process.exitCode = 1;
  }
}

/**
 * Creates the templates command group
 */
export function createTemplatesCommand(): Command {
  const templates = new Command('templates')
    .alias('template')
    .description('Fault template catalog');

  templates
    .command('list')
    .alias('ls')
    .description('List templates')
    .option('-b, --backend <backend>', 'Filter by backend: chaos-mesh, chaosd, custom')
    .option('--composable', 'Only templates that may overlap other faults')
    .action(listHandler);

  templates
    .command('show <templateId>')
    .description('Show a template and its parameters')
    .action(showHandler);

  templates
    .command('validate')
    .description('Check every template and rendering definition in the catalog')
    .action(validateHandler);

  return templates;
}
