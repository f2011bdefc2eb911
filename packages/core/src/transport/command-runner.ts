/**
 * Child process execution
 * @module @faultline/core/transport/command-runner
 */

import { spawn } from 'node:child_process';

/**
 * Outcome of a finished (or abandoned) command
 */
export interface CommandResult {
  /** Exit code; null when the process was killed or never started */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  /** Killed after exceeding timeoutMs */
  timedOut: boolean;
  /** Set when the process could not be started */
  spawnError?: Error;
}

export interface CommandOptions {
  /** Written to stdin, which is then closed */
  input?: string;
  timeoutMs?: number;
}

/**
 * Runs external commands. Implementations never reject; failures are in the result.
 */
export interface CommandRunner {
  run(command: string, args: string[], options?: CommandOptions): Promise<CommandResult>;
}

/**
 * Runs commands as child processes without a shell
 */
export class ProcessCommandRunner implements CommandRunner {
  run(command: string, args: string[], options: CommandOptions = {}): Promise<CommandResult> {
    return new Promise(resolve => {
      const proc = spawn(command, args, { stdio: 'pipe', shell: false });
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let timedOut = false;
      let settled = false;

      const timer = options.timeoutMs === undefined
        ? undefined
        : setTimeout(() => {
          timedOut = true;
          proc.kill('SIGKILL');
        }, options.timeoutMs);

      const finish = (result: Omit<CommandResult, 'stdout' | 'stderr' | 'timedOut'>): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve({
          ...result,
          stdout: Buffer.concat(stdout).toString('utf-8'),
          stderr: Buffer.concat(stderr).toString('utf-8'),
          timedOut,
        });
      };

      proc.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
      proc.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));
      proc.on('error', error => finish({ exitCode: null, spawnError: error }));
      proc.on('close', code => finish({ exitCode: code }));

      // EPIPE when the process exits before reading its input
      proc.stdin.on('error', () => undefined);
      proc.stdin.end(options.input ?? '');
    });
  }
}
