import type { CheckerKind } from '../config/types.js';
import type { Diagnostic } from '../errors.js';
import type { GoPackage } from '../types.js';

export interface CheckResult {
  ok: boolean;
  diagnostics: Diagnostic[];
}

/**
 * Gate a package must pass before constants are extracted from it
 */
export interface PackageChecker {
  readonly kind: CheckerKind;
  check(pkg: GoPackage): Promise<CheckResult>;
}
