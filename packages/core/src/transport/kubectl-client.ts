/**
 * kubectl invocation
 * @module @faultline/core/transport/kubectl-client
 */

import type { KubectlConfig } from '@faultline/shared';
import { DEFAULT_ENGINE_CONFIG } from '@faultline/shared';
import { ProcessCommandRunner, type CommandResult, type CommandRunner } from './command-runner';

/**
 * Namespaced resource reference, e.g. `stresschaos.chaos-mesh.org/cpu-1 -n chaos-testing`
 */
export interface ResourceRef {
  /** Resource type qualified by API group */
  resource: string;
  name: string;
  namespace: string;
}

/**
 * stderr fragments of failures worth retrying
 */
const TRANSIENT_FAILURES = [
  /connection refused/i,
  /unable to connect to the server/i,
  /i\/o timeout/i,
  /tls handshake timeout/i,
  /the server is currently unable to handle the request/i,
  /etcdserver: request timed out/i,
  /too many requests/i,
  /context deadline exceeded/i,
  /connection reset by peer/i,
  /no route to host/i,
  /service unavailable/i,
];

/**
 * Failures after which the request may still have reached the API server
 */
const AMBIGUOUS_FAILURES = [
  /i\/o timeout/i,
  /context deadline exceeded/i,
  /etcdserver: request timed out/i,
  /connection reset by peer/i,
];

/**
 * Check whether a kubectl failure is likely to pass on retry
 */
export function isTransientFailure(result: CommandResult): boolean {
  if (result.timedOut) return true;
  if (result.spawnError) return false;
  return TRANSIENT_FAILURES.some(pattern => pattern.test(result.stderr));
}

/**
 * Check whether a failed write may nevertheless have been persisted
 */
export function isAmbiguousFailure(result: CommandResult): boolean {
  return result.timedOut || AMBIGUOUS_FAILURES.some(pattern => pattern.test(result.stderr));
}

/**
 * First line of stderr, or a description of why the command did not run
 */
export function describeFailure(result: CommandResult): string {
  if (result.spawnError) {
    return `kubectl could not be started: ${result.spawnError.message}`;
  }
  if (result.timedOut) {
    return 'kubectl timed out';
  }
  const line = result.stderr.split('\n').map(l => l.trim()).find(l => l.length > 0);
  return line ?? `kubectl exited with code ${String(result.exitCode)}`;
}

export function succeeded(result: CommandResult): boolean {
  return result.exitCode === 0 && !result.timedOut && result.spawnError === undefined;
}

/**
 * Thin wrapper over the kubectl binary
 */
export class KubectlClient {
  constructor(
    private readonly config: KubectlConfig = DEFAULT_ENGINE_CONFIG.kubectl,
    private readonly runner: CommandRunner = new ProcessCommandRunner(),
  ) {}

  get timeoutMs(): number {
    return this.config.timeoutMs;
  }

  /**
   * Apply a YAML document read from stdin
   */
  apply(document: string): Promise<CommandResult> {
    return this.exec(['apply', '-f', '-', '-o', 'name'], document);
  }

  /**
   * Delete a resource; succeeds with empty output when it does not exist
   */
  delete(ref: ResourceRef): Promise<CommandResult> {
    return this.exec([
      'delete', `${ref.resource}/${ref.name}`,
      '-n', ref.namespace,
      '--ignore-not-found',
      '--wait=false',
    ]);
  }

  /**
   * Fetch a resource as JSON; empty output when it does not exist
   */
  get(ref: ResourceRef): Promise<CommandResult> {
    return this.exec([
      'get', `${ref.resource}/${ref.name}`,
      '-n', ref.namespace,
      '-o', 'json',
      '--ignore-not-found',
    ]);
  }

  private exec(args: string[], input?: string): Promise<CommandResult> {
    const contextArgs = this.config.context ? ['--context', this.config.context] : [];
    return this.runner.run(this.config.binary, [...contextArgs, ...args], {
      input,
      timeoutMs: this.config.timeoutMs,
    });
  }
}
