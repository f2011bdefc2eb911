/**
 * CLI Output Utilities
 *
 * Provides structured output support for JSON and human-readable formats.
 * @module @faultline/cli/output
 */

import chalk from 'chalk';
import {
  isInvalidTemplateError,
  isValidationError,
  type FaultlineError,
} from '@faultline/shared';

/**
 * Output format type
 */
export type OutputFormat = 'json' | 'table' | 'plain';

const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'table', 'plain'];

export function isOutputFormat(value: unknown): value is OutputFormat {
  return typeof value === 'string' && OUTPUT_FORMATS.some(format => format === value);
}

/**
 * Global output format setting (can be overridden per command)
 */
let globalOutputFormat: OutputFormat = 'table';

/**
 * Sets the global output format
 */
export function setOutputFormat(format: OutputFormat): void {
  globalOutputFormat = format;
}

/**
 * Gets the current output format
 */
export function getOutputFormat(): OutputFormat {
  return globalOutputFormat;
}

/**
 * Outputs a success message
 */
export function success(message: string): void {
  if (globalOutputFormat === 'json') {
    console.log(JSON.stringify({ success: true, message }));
  } else {
    console.log(chalk.green('✓') + ' ' + message);
  }
}

/**
 * Outputs an error message
 */
export function error(message: string, details?: unknown): void {
  if (globalOutputFormat === 'json') {
    console.error(JSON.stringify({ success: false, error: message, details }));
  } else {
    console.error(chalk.red('✗') + ' ' + message);
    if (details) {
      console.error(chalk.gray(JSON.stringify(details, null, 2)));
    }
  }
}

/**
 * Outputs a warning message
 */
export function warn(message: string): void {
  if (globalOutputFormat === 'json') {
    console.log(JSON.stringify({ warning: message }));
  } else {
    console.log(chalk.yellow('⚠') + ' ' + message);
  }
}

/**
 * Outputs an info message
 */
export function info(message: string): void {
  if (globalOutputFormat === 'json') {
    console.log(JSON.stringify({ info: message }));
  } else {
    console.log(chalk.blue('ℹ') + ' ' + message);
  }
}

/**
 * Table column
 */
export interface Column<T> {
  key: keyof T & string;
  header: string;
  width?: number;
}

/**
 * Formats a table from an array of objects
 */
export function table<T extends object>(data: T[], columns: Array<Column<T>>): void {
  if (globalOutputFormat === 'json') {
    console.log(JSON.stringify(data, null, 2));
    return;
  }

  if (data.length === 0) {
    console.log(chalk.gray('No data to display'));
    return;
  }

  const cell = (row: T, column: Column<T>): string => String(row[column.key] ?? '');

  const widths = columns.map(column =>
    column.width ?? Math.max(column.header.length, ...data.map(row => cell(row, column).length), 4),
  );

  console.log(chalk.bold(columns.map((column, i) => column.header.padEnd(widths[i] ?? 0)).join('  ')));
  console.log(widths.map(w => '─'.repeat(w)).join('──'));

  for (const row of data) {
    console.log(columns.map((column, i) => cell(row, column).padEnd(widths[i] ?? 0)).join('  '));
  }
}

/**
 * Formats key-value pairs for display
 */
export function keyValue(data: Record<string, unknown>): void {
  if (globalOutputFormat === 'json') {
    console.log(JSON.stringify(data, null, 2));
    return;
  }

  const maxKeyLength = Math.max(...Object.keys(data).map((k) => k.length));

  for (const [key, value] of Object.entries(data)) {
    const formattedKey = chalk.bold(key.padEnd(maxKeyLength));
    console.log(`${formattedKey}  ${formatValue(value)}`);
  }
}

/**
 * Formats a single value for display
 */
function formatValue(value: unknown): string {
  if (value === null || value === undefined) {
    return chalk.gray('(none)');
  }
  if (typeof value === 'boolean') {
    return value ? chalk.green('true') : chalk.red('false');
  }
  if (typeof value === 'number') {
    return chalk.cyan(String(value));
  }
  if (value instanceof Date) {
    return chalk.yellow(value.toISOString());
  }
  if (typeof value === 'object') {
    return chalk.gray(JSON.stringify(value));
  }
  return String(value);
}

/**
 * Formats a fault state badge
 */
export function stateBadge(state: string): string {
  switch (state) {
    case 'ACTIVE':
      return chalk.green('●') + ' ' + chalk.green(state);
    case 'PENDING':
    case 'REVERTING':
      return chalk.yellow('◐') + ' ' + chalk.yellow(state);
    case 'FAILED_PARTIAL':
      return chalk.red('●') + ' ' + chalk.red(state);
    case 'REVERTED':
    case 'REJECTED':
      return chalk.gray('○') + ' ' + chalk.gray(state);
    default:
      return chalk.blue('●') + ' ' + state;
  }
}

/**
 * Print an engine error, with its field or template details
 */
export function failure(err: FaultlineError): void {
  if (globalOutputFormat === 'json') {
    console.error(JSON.stringify(err.toJSON(), null, 2));
    return;
  }

  console.error(chalk.red('✗') + ' ' + err.message + chalk.gray(` [${err.name} ${err.code}]`));

  if (isValidationError(err)) {
    for (const detail of err.details) {
      console.error(`  ${chalk.bold(detail.field)}: ${detail.message}`);
    }
  } else if (isInvalidTemplateError(err)) {
    for (const issue of err.issues) {
      console.error(`  ${chalk.bold(issue.templateId)} ${chalk.gray(issue.field)}: ${issue.message}`);
    }
  } else if (err.cause) {
    console.error(chalk.gray(`  caused by: ${err.cause.message}`));
  }
}

/**
 * Truncates a string to a maximum length
 */
export function truncate(str: string, maxLength: number): string {
  if (str.length <= maxLength) return str;
  return str.slice(0, maxLength - 3) + '...';
}
