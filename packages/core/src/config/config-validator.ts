/**
 * Config Validator - Validation of configuration files
 *
 * Checks a parsed `.docstringer/config.json` field by field and returns
 * either the typed partial configuration or a list of errors with
 * suggestions.
 */

import type {
  CheckerKind,
  FormatterKind,
  ParserConfig,
  PartialDocstringerConfig,
} from './types.js';

// ============================================================================
// Constants
// ============================================================================

export const VALID_FORMATTERS: readonly FormatterKind[] = ['builtin', 'gofmt'];

export const VALID_CHECKERS: readonly CheckerKind[] = ['declarations', 'go-vet', 'none'];

const KNOWN_KEYS = ['parser', 'formatter', 'checker', 'exclude'];

const KNOWN_PARSER_KEYS = ['enableTreeSitter', 'enableFallback'] as const;

// ============================================================================
// Validation Error Types
// ============================================================================

/**
 * Represents a single configuration validation error
 */
export interface ConfigValidationError {
  /** Path to the invalid field (e.g., 'parser.enableTreeSitter') */
  path: string;
  /** Human-readable error message */
  message: string;
  /** Expected value or type */
  expected?: string;
  /** Actual value received */
  actual?: unknown;
  /** Suggestion for how to fix the error */
  suggestion?: string;
}

/**
 * Result of a configuration validation operation
 */
export type ConfigValidationResult =
  | { valid: true; data: PartialDocstringerConfig }
  | { valid: false; errors: ConfigValidationError[] };

// ============================================================================
// Helper Validation Functions
// ============================================================================

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOneOf<T extends string>(value: unknown, validValues: readonly T[]): value is T {
  return typeof value === 'string' && validValues.some((valid) => valid === value);
}

// ============================================================================
// Component Validators
// ============================================================================

function validateParser(
  parser: unknown,
  errors: ConfigValidationError[]
): Partial<ParserConfig> | undefined {
  if (parser === undefined) {return undefined;}

  if (!isObject(parser)) {
    errors.push({
      path: 'parser',
      message: 'Parser configuration must be an object',
      expected: '{ enableTreeSitter?: boolean, enableFallback?: boolean }',
      actual: typeof parser,
      suggestion: 'Configure the parser like: { "enableTreeSitter": false }',
    });
    return undefined;
  }

  const result: Partial<ParserConfig> = {};
  for (const key of KNOWN_PARSER_KEYS) {
    const value = parser[key];
    if (value === undefined) {continue;}
    if (typeof value !== 'boolean') {
      errors.push({
        path: `parser.${key}`,
        message: `${key} must be a boolean`,
        expected: 'true | false',
        actual: value,
      });
      continue;
    }
    result[key] = value;
  }

  for (const key of Object.keys(parser)) {
    if (!KNOWN_PARSER_KEYS.some((known) => known === key)) {
      errors.push({
        path: `parser.${key}`,
        message: `Unknown parser option "${key}"`,
        expected: KNOWN_PARSER_KEYS.join(' | '),
        actual: key,
      });
    }
  }

  return result;
}

function validateExclude(
  exclude: unknown,
  errors: ConfigValidationError[]
): string[] | undefined {
  if (exclude === undefined) {return undefined;}

  if (!Array.isArray(exclude)) {
    errors.push({
      path: 'exclude',
      message: 'Exclude patterns must be an array of strings',
      expected: 'string[]',
      actual: typeof exclude,
      suggestion: 'Use an array like: ["*_test.go", "mock_*.go"]',
    });
    return undefined;
  }

  const patterns: string[] = [];
  exclude.forEach((pattern: unknown, i) => {
    if (typeof pattern !== 'string' || pattern.length === 0) {
      errors.push({
        path: `exclude[${i}]`,
        message: 'Each exclude pattern must be a non-empty string',
        expected: 'non-empty string',
        actual: pattern,
      });
      return;
    }
    patterns.push(pattern);
  });

  return patterns;
}

// ============================================================================
// Main Validation Functions
// ============================================================================

/**
 * Validate a partial configuration as read from a config file.
 */
export function validatePartialConfig(data: unknown): ConfigValidationResult {
  const errors: ConfigValidationError[] = [];

  if (!isObject(data)) {
    errors.push({
      path: '',
      message: 'Configuration must be a JSON object',
      expected: 'object',
      actual: Array.isArray(data) ? 'array' : typeof data,
      suggestion: 'Ensure config.json contains an object like: { "formatter": "gofmt" }',
    });
    return { valid: false, errors };
  }

  const config: PartialDocstringerConfig = {};

  const parser = validateParser(data['parser'], errors);
  if (parser) {config.parser = parser;}

  const formatter = data['formatter'];
  if (formatter !== undefined) {
    if (isOneOf(formatter, VALID_FORMATTERS)) {
      config.formatter = formatter;
    } else {
      errors.push({
        path: 'formatter',
        message: `Invalid formatter "${String(formatter)}"`,
        expected: VALID_FORMATTERS.join(' | '),
        actual: formatter,
        suggestion: `Use one of: ${VALID_FORMATTERS.join(', ')}`,
      });
    }
  }

  const checker = data['checker'];
  if (checker !== undefined) {
    if (isOneOf(checker, VALID_CHECKERS)) {
      config.checker = checker;
    } else {
      errors.push({
        path: 'checker',
        message: `Invalid checker "${String(checker)}"`,
        expected: VALID_CHECKERS.join(' | '),
        actual: checker,
        suggestion: `Use one of: ${VALID_CHECKERS.join(', ')}`,
      });
    }
  }

  const exclude = validateExclude(data['exclude'], errors);
  if (exclude) {config.exclude = exclude;}

  for (const key of Object.keys(data)) {
    if (!KNOWN_KEYS.includes(key)) {
      errors.push({
        path: key,
        message: `Unknown configuration option "${key}"`,
        expected: KNOWN_KEYS.join(' | '),
        actual: key,
        suggestion: `Remove "${key}" or check for typos. Valid options are: ${KNOWN_KEYS.join(', ')}`,
      });
    }
  }

  return errors.length > 0 ? { valid: false, errors } : { valid: true, data: config };
}

/**
 * Format validation errors as a human-readable string
 */
export function formatConfigErrors(errors: ConfigValidationError[]): string {
  if (errors.length === 0) {return 'No errors';}

  const header = `Configuration validation failed with ${errors.length} error(s):\n`;
  const body = errors
    .map((e, i) => {
      let msg = `\n${i + 1}. ${e.path || 'root'}: ${e.message}`;
      if (e.expected) {msg += `\n   Expected: ${e.expected}`;}
      if (e.actual !== undefined) {msg += `\n   Got: ${JSON.stringify(e.actual)}`;}
      if (e.suggestion) {msg += `\n   ${e.suggestion}`;}
      return msg;
    })
    .join('\n');

  return header + body;
}
