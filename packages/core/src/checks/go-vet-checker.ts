/**
 * Go Vet Checker - runs `go vet` in the package directory
 */

import { toError } from '../errors.js';
import { defaultCommandRunner, type CommandResult, type CommandRunner } from '../exec/command-runner.js';

import type { CheckResult, PackageChecker } from './types.js';
import type { Diagnostic } from '../errors.js';
import type { GoPackage } from '../types.js';

const POSITION_LINE = /^(.+?\.go):(\d+)(?::\d+)?: (.*)$/;

/**
 * Turn go vet's stderr into diagnostics. Lines without a position keep line 0.
 */
export function parseVetOutput(output: string, dir: string): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];
  for (const raw of output.split('\n')) {
    const line = raw.trim();
    // "# pkg/path" headers
    if (line.length === 0 || line.startsWith('#')) {continue;}
    const match = POSITION_LINE.exec(line);
    if (match?.[1] !== undefined && match[2] !== undefined && match[3] !== undefined) {
      diagnostics.push({ file: match[1], line: Number(match[2]), message: match[3] });
    } else {
      diagnostics.push({ file: dir, line: 0, message: line });
    }
  }
  return diagnostics;
}

export class GoVetChecker implements PackageChecker {
  readonly kind = 'go-vet';

  constructor(private readonly runner: CommandRunner = defaultCommandRunner) {}

  async check(pkg: GoPackage): Promise<CheckResult> {
    let result: CommandResult;
    try {
      result = await this.runner.run('go', ['vet', '.'], { cwd: pkg.dir });
    } catch (error) {
      return {
        ok: false,
        diagnostics: [{ file: pkg.dir, line: 0, message: `failed to run go vet: ${toError(error).message}` }],
      };
    }

    if (result.exitCode === 0) {
      return { ok: true, diagnostics: [] };
    }

    const diagnostics = parseVetOutput(result.stderr, pkg.dir);
    if (diagnostics.length === 0) {
      diagnostics.push({ file: pkg.dir, line: 0, message: `go vet exited with ${String(result.exitCode)}` });
    }
    return { ok: false, diagnostics };
  }
}
