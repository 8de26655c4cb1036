/**
 * Errors - Failure taxonomy for a generation run
 *
 * Every fatal condition of a run surfaces as one of these classes. None of
 * them is retried: the run aborts on the first one thrown.
 */

/**
 * Machine-readable error codes, one per error class
 */
export type DocstringerErrorCode =
  | 'CONFIGURATION'
  | 'INPUT_NOT_FOUND'
  | 'PARSE'
  | 'SEMANTIC_VALIDATION'
  | 'RENDER'
  | 'FORMAT'
  | 'WRITE';

/**
 * Base class for all docstringer errors
 */
export abstract class DocstringerError extends Error {
  abstract readonly code: DocstringerErrorCode;
  public readonly errorCause: Error | undefined;

  constructor(message: string, errorCause?: Error | undefined) {
    super(message);
    this.name = new.target.name;
    this.errorCause = errorCause;
  }
}

/**
 * Thrown when the target type name is missing or the configuration is invalid
 */
export class ConfigurationError extends DocstringerError {
  readonly code = 'CONFIGURATION';
}

/**
 * Thrown when the input directory does not exist or is not a directory
 */
export class InputNotFoundError extends DocstringerError {
  readonly code = 'INPUT_NOT_FOUND';

  constructor(
    message: string,
    public readonly inputPath: string,
    errorCause?: Error | undefined
  ) {
    super(message, errorCause);
  }
}

/**
 * Thrown when a Go source file cannot be parsed
 */
export class ParseError extends DocstringerError {
  readonly code = 'PARSE';

  constructor(
    message: string,
    public readonly filePath: string,
    public readonly line: number,
    public readonly column: number,
    errorCause?: Error | undefined
  ) {
    super(`${filePath}:${line}:${column}: ${message}`, errorCause);
  }
}

/**
 * A single diagnostic reported by a package checker
 */
export interface Diagnostic {
  file: string;
  line: number;
  message: string;
}

/**
 * Thrown when a package fails the compiles-cleanly gate
 */
export class SemanticValidationError extends DocstringerError {
  readonly code = 'SEMANTIC_VALIDATION';

  constructor(
    public readonly packageName: string,
    public readonly diagnostics: Diagnostic[]
  ) {
    super(
      [
        `checking package ${packageName}:`,
        ...diagnostics.map((d) => d.line > 0 ? `${d.file}:${d.line}: ${d.message}` : `${d.file}: ${d.message}`),
      ].join('\n  ')
    );
  }
}

/**
 * Thrown when the renderer is handed data that violates its contract
 */
export class RenderError extends DocstringerError {
  readonly code = 'RENDER';
}

/**
 * Thrown when the generated text is not valid Go source
 */
export class FormatError extends DocstringerError {
  readonly code = 'FORMAT';

  constructor(
    message: string,
    public readonly diagnostic: string,
    errorCause?: Error | undefined
  ) {
    super(`${message}: ${diagnostic}`, errorCause);
  }
}

/**
 * Thrown when the generated file cannot be written
 */
export class WriteError extends DocstringerError {
  readonly code = 'WRITE';

  constructor(
    message: string,
    public readonly outputPath: string,
    errorCause?: Error | undefined
  ) {
    super(message, errorCause);
  }
}

/**
 * Check whether a value is one of the docstringer errors
 */
export function isDocstringerError(error: unknown): error is DocstringerError {
  return error instanceof DocstringerError;
}

/**
 * Normalise an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
