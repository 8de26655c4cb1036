/**
 * Declaration Checker
 *
 * Reports the compile errors that can be seen from top-level declarations
 * alone: package-scope redeclarations and constant specs whose names and
 * initializers do not line up.
 */

import { BLANK_IDENTIFIER } from '../go/identifiers.js';

import type { CheckResult, PackageChecker } from './types.js';
import type { Diagnostic } from '../errors.js';
import type { ConstDeclaration, GoPackage, GoSourceFile } from '../types.js';

interface Declared {
  name: string;
  file: string;
  line: number;
}

/** Names that may be declared any number of times */
const REPEATABLE_NAMES = new Set([BLANK_IDENTIFIER, 'init']);

function packageScopeNames(file: GoSourceFile): Declared[] {
  const declared: Declared[] = [];
  for (const decl of file.decls) {
    if (decl.kind === 'const') {
      for (const spec of decl.specs) {
        for (const name of spec.names) {
          declared.push({ name, file: file.path, line: spec.line });
        }
      }
      continue;
    }
    // Imports are file-scoped and methods live in their receiver's scope
    if (decl.keyword === 'import' || decl.keyword === 'method') {continue;}
    for (const name of decl.names) {
      declared.push({ name, file: file.path, line: decl.line });
    }
  }
  return declared;
}

function checkConstGroup(decl: ConstDeclaration, file: string, diagnostics: Diagnostic[]): void {
  let inherited: string[] = [];

  decl.specs.forEach((spec, index) => {
    if (spec.values.length === 0) {
      if (spec.type !== null) {
        diagnostics.push({ file, line: spec.line, message: 'const declaration cannot have type without expression' });
        return;
      }
      if (index === 0) {
        diagnostics.push({ file, line: spec.line, message: 'missing init expr for const declaration' });
        return;
      }
    } else {
      inherited = spec.values;
    }

    if (spec.names.length > inherited.length) {
      diagnostics.push({ file, line: spec.line, message: 'missing init expr for const declaration' });
    } else if (spec.names.length < inherited.length) {
      diagnostics.push({ file, line: spec.line, message: 'extra init expr' });
    }
  });
}

export class DeclarationChecker implements PackageChecker {
  readonly kind = 'declarations';

  async check(pkg: GoPackage): Promise<CheckResult> {
    const diagnostics: Diagnostic[] = [];
    const seen = new Map<string, Declared>();

    for (const file of pkg.files) {
      for (const declared of packageScopeNames(file)) {
        if (REPEATABLE_NAMES.has(declared.name)) {continue;}
        const previous = seen.get(declared.name);
        if (previous) {
          diagnostics.push({
            file: declared.file,
            line: declared.line,
            message: `${declared.name} redeclared in this block (previous declaration at ${previous.file}:${previous.line})`,
          });
          continue;
        }
        seen.set(declared.name, declared);
      }

      for (const decl of file.decls) {
        if (decl.kind === 'const') {
          checkConstGroup(decl, file.path, diagnostics);
        }
      }
    }

    return { ok: diagnostics.length === 0, diagnostics };
  }
}
