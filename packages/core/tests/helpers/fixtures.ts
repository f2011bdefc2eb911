/**
 * Test doubles and catalogs shared by the core unit tests
 */

import {
  createFaultRequest,
  loadEngineConfig,
  type Artifact,
  type BackendStatus,
  type EngineConfigOverrides,
  type FaultRequest,
  type TargetSelector,
} from '@faultline/shared';
import {
  BackendAdapterRegistry,
  CustomBackendAdapter,
  InMemoryTemplateSource,
  OrchestrationEngine,
  TemplateRegistry,
  type CommandOptions,
  type CommandResult,
  type CommandRunner,
  type CustomExecutor,
  type InMemoryCatalog,
} from '../../src';

export const CPU_DEFINITION = `
kind: cpu
name: "{{ metadata.name }}"
load: "{{ params.load }}"
pods: "{{ target.pods }}"
duration: "{{ duration | default(5m) }}"
`;

export const DELAY_DEFINITION = `
kind: delay
name: "{{ metadata.name }}"
latency: "{{ params.latency }}"
`;

/**
 * Catalog served through the custom backend, plus one template on a backend without an adapter
 */
export function testCatalog(cpuVersion = 1): InMemoryCatalog {
  return {
    templates: [
      {
        templateID: 'cpu-throttle',
        version: cpuVersion,
        backend: 'custom',
        path: 'cpu.yaml',
        parameters: { load: { type: 'integer', default: 100, min: 1, max: 100 } },
      },
      {
        templateID: 'net-delay',
        backend: 'custom',
        path: 'delay.yaml',
        composable: true,
        parameters: { latency: { type: 'duration', required: true } },
      },
      {
        templateID: 'disk-fill',
        backend: 'chaosd',
        path: 'disk.yaml',
      },
    ],
    definitions: {
      'cpu.yaml': CPU_DEFINITION,
      'delay.yaml': DELAY_DEFINITION,
      'disk.yaml': 'kind: disk\npath: /tmp\n',
    },
  };
}

export interface RequestOverrides {
  templateId?: string;
  name?: string;
  namespace?: string;
  ttlSeconds?: number;
  selector?: TargetSelector;
  parameters?: FaultRequest['spec']['parameters'];
}

/**
 * Request against the test catalog; defaults to cpu-throttle on worker-0 in "default"
 */
export function testRequest(overrides: RequestOverrides = {}): FaultRequest {
  return createFaultRequest({
    templateId: overrides.templateId ?? 'cpu-throttle',
    metadata: {
      name: overrides.name ?? 'cpu-1',
      namespace: overrides.namespace ?? 'default',
      ttlSeconds: overrides.ttlSeconds,
    },
    spec: {
      selector: overrides.selector ?? { pods: ['worker-0'] },
      parameters: overrides.parameters ?? {},
    },
  });
}

/**
 * Manually advanced clock
 */
export class TestClock {
  current = new Date('2026-01-01T00:00:00.000Z');

  readonly now = (): Date => new Date(this.current.getTime());

  advance(ms: number): void {
    this.current = new Date(this.current.getTime() + ms);
  }
}

/**
 * Promise released from the outside
 */
export class Gate {
  readonly promise: Promise<void>;
  private release: () => void = () => undefined;

  constructor() {
    this.promise = new Promise<void>(resolve => {
      this.release = resolve;
    });
  }

  open(): void {
    this.release();
  }
}

/**
 * Scripted custom backend keeping its faults in memory
 */
export class FakeExecutor implements CustomExecutor {
  /** Faults currently injected, by token */
  readonly live = new Map<string, Artifact>();
  readonly calls: string[] = [];
  /** Thrown, in order, by the next apply calls */
  applyFailures: unknown[] = [];
  /** Thrown, in order, by the next revert calls */
  revertFailures: unknown[] = [];
  statusOverride?: BackendStatus;
  statusFailure?: Error;
  applyGate?: Promise<void>;
  private sequence = 0;

  async apply(artifact: Artifact): Promise<string> {
    this.calls.push(`apply ${artifact.name}`);
    if (this.applyGate) {
      await this.applyGate;
    }
    if (this.applyFailures.length > 0) {
      throw this.applyFailures.shift();
    }
    this.sequence += 1;
    const token = `${artifact.namespace}/${artifact.name}/${this.sequence}`;
    this.live.set(token, artifact);
    return token;
  }

  async revert(token: string): Promise<boolean> {
    this.calls.push(`revert ${token}`);
    if (this.revertFailures.length > 0) {
      throw this.revertFailures.shift();
    }
    return this.live.delete(token);
  }

  async status(token: string): Promise<BackendStatus> {
    if (this.statusFailure) {
      throw this.statusFailure;
    }
    if (this.statusOverride) {
      return this.statusOverride;
    }
    return this.live.has(token) ? 'RUNNING' : 'GONE';
  }

  count(prefix: 'apply' | 'revert'): number {
    return this.calls.filter(call => call.startsWith(`${prefix} `)).length;
  }
}

export interface TestEngine {
  engine: OrchestrationEngine;
  executor: FakeExecutor;
  source: InMemoryTemplateSource;
  clock: TestClock;
}

/**
 * Engine over the test catalog with an immediate retry policy
 */
export async function createTestEngine(config: EngineConfigOverrides = {}): Promise<TestEngine> {
  const executor = new FakeExecutor();
  const source = new InMemoryTemplateSource(testCatalog());
  const clock = new TestClock();

  const registry = new TemplateRegistry();
  await registry.load(source);

  const engine = new OrchestrationEngine({
    registry,
    adapters: new BackendAdapterRegistry([new CustomBackendAdapter(executor)]),
    config: loadEngineConfig({}, {
      unknownGracePeriodMs: 30_000,
      ...config,
      retry: { attempts: 3, baseDelayMs: 0, maxDelayMs: 0, ...config.retry },
    }),
    now: clock.now,
  });

  return { engine, executor, source, clock };
}

/**
 * Command runner answering from a queue of canned results
 */
export class FakeCommandRunner implements CommandRunner {
  readonly invocations: Array<{ command: string; args: string[]; options: CommandOptions }> = [];
  private readonly results: Array<Partial<CommandResult>> = [];

  push(...results: Array<Partial<CommandResult>>): this {
    this.results.push(...results);
    return this;
  }

  async run(command: string, args: string[], options: CommandOptions = {}): Promise<CommandResult> {
    this.invocations.push({ command, args, options });
    const result = this.results.shift() ?? {};
    return { exitCode: 0, stdout: '', stderr: '', timedOut: false, ...result };
  }
}
