/**
 * Declaration Extractor
 *
 * Finds the constants of a package whose effective type is the target type.
 * The effective type of a spec without its own type is the type remembered
 * from the closest typed spec above it in the same group; an untyped spec
 * with an initializer clears what is remembered.
 */

import { BLANK_IDENTIFIER, isExported } from '../go/identifiers.js';

import type { CandidateConstant, ConstDeclaration, GoPackage, GoSourceFile } from '../types.js';

/** Sentinel for "no remembered type" */
const NO_TYPE = '';

/**
 * Reduce one const declaration to its candidate constants.
 *
 * The remembered type starts empty for every declaration. Specs whose type
 * is not a plain identifier (`pkg.T`, `*T`, `T[int]`) are skipped without
 * touching the remembered type.
 */
export function reduceConstGroup(
  group: ConstDeclaration,
  typeName: string,
  file: string
): CandidateConstant[] {
  const candidates: CandidateConstant[] = [];
  let remembered = NO_TYPE;

  for (const spec of group.specs) {
    if (spec.type === null && spec.values.length > 0) {
      remembered = NO_TYPE;
      continue;
    }

    if (spec.type !== null) {
      if (spec.type.kind !== 'identifier') {continue;}
      remembered = spec.type.text;
    }

    if (remembered !== typeName) {continue;}

    for (const name of spec.names) {
      if (name === BLANK_IDENTIFIER || !isExported(name)) {continue;}
      candidates.push({
        name,
        type: remembered,
        doc: spec.doc,
        file,
        line: spec.line,
      });
    }
  }

  return candidates;
}

/**
 * Candidates of a single file, in source order
 */
export function extractFromFile(file: GoSourceFile, typeName: string): CandidateConstant[] {
  const candidates: CandidateConstant[] = [];
  for (const decl of file.decls) {
    if (decl.kind !== 'const') {continue;}
    candidates.push(...reduceConstGroup(decl, typeName, file.path));
  }
  return candidates;
}

/**
 * All candidates of a package, in file order then source order.
 * Duplicate names are kept.
 */
export function extractCandidates(pkg: GoPackage, typeName: string): CandidateConstant[] {
  return pkg.files.flatMap((file) => extractFromFile(file, typeName));
}
