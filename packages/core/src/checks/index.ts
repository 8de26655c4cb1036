import { DeclarationChecker } from './declaration-checker.js';
import { GoVetChecker } from './go-vet-checker.js';

import type { CheckResult, PackageChecker } from './types.js';
import type { CheckerKind } from '../config/types.js';
import type { CommandRunner } from '../exec/command-runner.js';
import type { GoPackage } from '../types.js';

export type { CheckResult, PackageChecker } from './types.js';
export { DeclarationChecker } from './declaration-checker.js';
export { GoVetChecker, parseVetOutput } from './go-vet-checker.js';

/** Checker that accepts every package */
export class NoopChecker implements PackageChecker {
  readonly kind = 'none';

  async check(_pkg: GoPackage): Promise<CheckResult> {
    return { ok: true, diagnostics: [] };
  }
}

export function createChecker(kind: CheckerKind, runner?: CommandRunner): PackageChecker {
  switch (kind) {
    case 'declarations':
      return new DeclarationChecker();
    case 'go-vet':
      return new GoVetChecker(runner);
    case 'none':
      return new NoopChecker();
  }
}
