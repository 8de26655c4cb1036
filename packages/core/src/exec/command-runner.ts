/**
 * Command Runner - Thin seam over child processes
 *
 * The gofmt formatter and the go vet checker run external binaries through
 * this interface so tests can substitute a fake.
 */

import { spawn } from 'node:child_process';

export interface CommandOptions {
  /** Working directory of the child */
  cwd?: string | undefined;
  /** Text written to the child's stdin */
  input?: string | undefined;
}

export interface CommandResult {
  /** Exit code, or null when the child was killed by a signal */
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

export interface CommandRunner {
  /**
   * Run a command to completion.
   *
   * Rejects only when the process cannot be started (e.g. binary missing);
   * a non-zero exit resolves with its code.
   */
  run(command: string, args: readonly string[], options?: CommandOptions): Promise<CommandResult>;
}

/**
 * Runner backed by `child_process.spawn`
 */
export class SpawnCommandRunner implements CommandRunner {
  run(command: string, args: readonly string[], options: CommandOptions = {}): Promise<CommandResult> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, [...args], {
        cwd: options.cwd,
        stdio: ['pipe', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';
      child.stdout.setEncoding('utf-8');
      child.stderr.setEncoding('utf-8');
      child.stdout.on('data', (chunk: string) => {
        stdout += chunk;
      });
      child.stderr.on('data', (chunk: string) => {
        stderr += chunk;
      });

      child.on('error', reject);
      child.on('close', (exitCode) => {
        resolve({ exitCode, stdout, stderr });
      });

      child.stdin.on('error', reject);
      child.stdin.end(options.input ?? '');
    });
  }
}

export const defaultCommandRunner: CommandRunner = new SpawnCommandRunner();
