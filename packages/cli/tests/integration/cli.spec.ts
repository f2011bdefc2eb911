/**
 * CLI Integration Tests
 *
 * Runs the program against the bundled template catalog. Nothing here calls kubectl.
 * @module @faultline/cli/tests/integration
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import chalk from 'chalk';
import { Command } from 'commander';

import { setLogThreshold } from '@faultline/shared';
import { createProgram } from '../../src/program.js';
import { loadConfig } from '../../src/config.js';
import {
  getOutputFormat,
  setOutputFormat,
  stateBadge,
  success,
  table,
  truncate,
} from '../../src/output.js';

// ============================================================================
// Test Utilities
// ============================================================================

/**
 * Run the program with the given arguments, as typed after `faultline`
 */
async function run(...args: string[]): Promise<void> {
  const program = createProgram();
  program.exitOverride();
  await program.parseAsync(args, { from: 'user' });
}

/**
 * Everything a spied console method was called with, one call per line
 */
function logged(method: typeof console.log): string {
  return vi.mocked(method).mock.calls.map(call => call.map(String).join(' ')).join('\n');
}

// ============================================================================
// Tests
// ============================================================================

describe('CLI', () => {
  const level = chalk.level;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    chalk.level = 0;
    process.exitCode = undefined;
  });

  afterEach(() => {
    vi.restoreAllMocks();
    setOutputFormat('table');
    setLogThreshold(undefined);
    chalk.level = level;
    process.exitCode = undefined;
  });

  describe('program', () => {
    it('should register every command', () => {
      const names = createProgram().commands.map((command: Command) => command.name());

      expect(names).toEqual(['templates', 'render', 'inject', 'revert', 'probe', 'config']);
    });

    it('should reject unknown output formats', async () => {
      await expect(run('-o', 'xml', 'templates', 'list')).rejects.toThrow('Unknown output format "xml"');
    });
  });

  describe('templates', () => {
    it('should list the bundled catalog as JSON', async () => {
      await run('-o', 'json', 'templates', 'list', '--backend', 'chaos-mesh', '--composable');

      expect(getOutputFormat()).toBe('json');
      expect(JSON.parse(logged(console.log))).toMatchObject([
        { templateId: 'network/delay', version: 2, backend: 'chaos-mesh', composable: true },
        { templateId: 'network/loss', version: 1, backend: 'chaos-mesh', composable: true },
      ]);
    });

    it('should validate the bundled catalog', async () => {
      await run('templates', 'validate');

      expect(logged(console.log)).toMatch(/9 template\(s\) in .*index\.yaml are valid$/);
      expect(process.exitCode).toBeUndefined();
    });

    it('should fail on an unknown template', async () => {
      await expect(run('templates', 'show', 'cpu-melt')).rejects.toThrow('Template not found: cpu-melt');
    });
  });

  describe('render', () => {
    it('should print the manifest a request would apply', async () => {
      await run(
        '-o', 'json',
        'render', 'cpu_throttling',
        '-n', 'default',
        '--pod', 'worker-0',
        '-p', 'load=80',
        '--ttl', '60',
      );

      expect(JSON.parse(logged(console.log))).toEqual({
        apiVersion: 'chaos-mesh.org/v1alpha1',
        kind: 'StressChaos',
        metadata: {
          name: 'cpu-throttling-instance',
          namespace: 'default',
          labels: {
            'app.kubernetes.io/managed-by': 'faultline',
            'faultline.dev/template': 'cpu_throttling',
          },
        },
        spec: {
          mode: 'all',
          selector: { namespaces: ['default'], pods: { default: ['worker-0'] } },
          duration: '5m',
          stressors: { cpu: { workers: 1, load: 80 } },
        },
      });
    });

    it('should report validation failures without rendering', async () => {
      await run('render', 'cpu_throttling', '-n', 'default', '-p', 'load=500');

      expect(process.exitCode).toBe(1);
      expect(console.log).not.toHaveBeenCalled();
      expect(logged(console.error)).toContain('spec.selector: Target selector must name at least one pod or label');
      expect(logged(console.error)).toContain('spec.parameters.load: Value must be at most 100');
    });
  });

  describe('config', () => {
    it('should apply global flags over the environment', () => {
      const config = loadConfig(
        { templates: '/srv/faults', context: 'kind-test' },
        { FAULTLINE_KUBECTL: '/usr/local/bin/kubectl' },
      );

      expect(config.templatesDir).toBe('/srv/faults');
      expect(config.kubectl).toEqual({ binary: '/usr/local/bin/kubectl', context: 'kind-test', timeoutMs: 30_000 });
    });
  });

  describe('output', () => {
    it('should print JSON messages in json mode', () => {
      setOutputFormat('json');
      success('done');

      expect(console.log).toHaveBeenCalledWith('{"success":true,"message":"done"}');
    });

    it('should print tables as JSON in json mode', () => {
      setOutputFormat('json');
      table([{ id: 'a' }], [{ key: 'id', header: 'ID' }]);

      expect(JSON.parse(logged(console.log))).toEqual([{ id: 'a' }]);
    });

    it('should truncate long text', () => {
      expect(truncate('short', 10)).toBe('short');
      expect(truncate('a rather long description', 10)).toBe('a rathe...');
    });

    it('should include the state in its badge', () => {
      expect(stateBadge('FAILED_PARTIAL')).toContain('FAILED_PARTIAL');
    });
  });
});
