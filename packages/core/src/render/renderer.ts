/**
 * Renderer
 *
 * Produces the Go source of a `String() string` method for the target type.
 * Output is already in gofmt layout; the formatter only validates it.
 */

import { RenderError } from '../errors.js';
import { isGoIdentifier } from '../go/identifiers.js';
import { quoteGoString } from './go-quote.js';

import type { DerivedEntry } from '../types.js';

/** First line of every generated file */
export const GENERATED_MARKER = '// Code generated by docstringer. DO NOT EDIT.';

/** Value returned for any value without a case */
export const UNKNOWN_LABEL = 'Unknown';

export interface RenderInput {
  packageName: string;
  typeName: string;
  entries: readonly DerivedEntry[];
}

/**
 * Receiver name for the method: the type's first character in lower case
 */
export function receiverName(typeName: string): string {
  const first = typeName.codePointAt(0);
  if (first === undefined) {
    throw new RenderError('type name is empty');
  }
  return String.fromCodePoint(first).toLowerCase();
}

function assertIdentifier(kind: string, name: string): void {
  if (name.length === 0) {
    throw new RenderError(`${kind} name is empty`);
  }
  if (!isGoIdentifier(name)) {
    throw new RenderError(`${kind} name "${name}" is not a Go identifier`);
  }
}

/**
 * Render the generated file.
 *
 * @throws RenderError when a package, type or constant name is not a Go identifier
 */
export function renderStringMethod(input: RenderInput): string {
  const { packageName, typeName, entries } = input;
  assertIdentifier('package', packageName);
  assertIdentifier('type', typeName);
  for (const entry of entries) {
    assertIdentifier('constant', entry.name);
  }

  const receiver = receiverName(typeName);
  const lines: string[] = [
    GENERATED_MARKER,
    '',
    `package ${packageName}`,
    '',
    `// String returns comment of const type ${typeName}`,
    `func (${receiver} ${typeName}) String() string {`,
    `\tswitch ${receiver} {`,
  ];

  for (const entry of entries) {
    lines.push(`\tcase ${entry.name}:`);
    lines.push(`\t\treturn ${quoteGoString(entry.message)}`);
  }

  lines.push(
    '\tdefault:',
    `\t\treturn ${quoteGoString(UNKNOWN_LABEL)}`,
    '\t}',
    '}',
    ''
  );

  return lines.join('\n');
}
