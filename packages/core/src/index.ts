/**
 * docstringer-core
 *
 * Generates `String()` methods for Go constant types from the constants'
 * doc comments.
 */

// Errors
export {
  DocstringerError,
  ConfigurationError,
  InputNotFoundError,
  ParseError,
  SemanticValidationError,
  RenderError,
  FormatError,
  WriteError,
  isDocstringerError,
  toError,
} from './errors.js';
export type { Diagnostic, DocstringerErrorCode } from './errors.js';

// Logging
export { silentLogger } from './logger.js';
export type { Logger } from './logger.js';

// Source model
export type {
  TypeExpression,
  TypeExpressionKind,
  ConstSpec,
  ConstDeclaration,
  OtherDeclaration,
  OtherDeclarationKeyword,
  GoDeclaration,
  ParseMethod,
  GoSourceFile,
  GoPackage,
  CandidateConstant,
  DerivedEntry,
} from './types.js';
export { isExported, isGoIdentifier } from './go/identifiers.js';

// Configuration
export { ConfigLoader, loadConfig, mergeConfig, ENV_VARS } from './config/config-loader.js';
export type { ConfigLoaderOptions, ConfigLoadResult } from './config/config-loader.js';
export {
  validatePartialConfig,
  formatConfigErrors,
  VALID_FORMATTERS,
  VALID_CHECKERS,
} from './config/config-validator.js';
export type { ConfigValidationError, ConfigValidationResult } from './config/config-validator.js';
export { DEFAULT_CONFIG } from './config/defaults.js';
export type {
  CheckerKind,
  FormatterKind,
  ParserConfig,
  DocstringerConfig,
  PartialDocstringerConfig,
} from './config/types.js';

// Parsing
export { HybridGoParser, createGoFileParser, DEFAULT_PARSER_CONFIG } from './parsers/hybrid-go-parser.js';
export type { GoFileParser, ParsedGoFile } from './parsers/hybrid-go-parser.js';
export { parseGoDeclarations } from './parsers/fallback/go-declaration-parser.js';
export { tokenizeGo } from './parsers/fallback/go-lexer.js';
export { isGoTreeSitterAvailable, getGoLoadingError } from './parsers/tree-sitter/go-loader.js';
export { PackageLoader } from './package/package-loader.js';
export type { PackageLoaderOptions, LoadedPackages } from './package/package-loader.js';

// Extraction
export { extractCandidates, reduceConstGroup } from './extraction/declaration-extractor.js';
export { deriveLabel, deriveEntries } from './extraction/label-deriver.js';

// Rendering
export { renderStringMethod, receiverName, GENERATED_MARKER } from './render/renderer.js';
export type { RenderInput } from './render/renderer.js';
export { quoteGoString } from './render/go-quote.js';
export { BuiltinGoFormatter, GofmtFormatter, createFormatter } from './render/formatter.js';
export type { GoFormatter, FormatterOptions } from './render/formatter.js';

// Checks
export { DeclarationChecker, GoVetChecker, NoopChecker, createChecker } from './checks/index.js';
export type { CheckResult, PackageChecker } from './checks/index.js';

// External commands
export { SpawnCommandRunner, defaultCommandRunner } from './exec/command-runner.js';
export type { CommandRunner, CommandOptions, CommandResult } from './exec/command-runner.js';

// Generation
export { generateStringMethods } from './generator/generator.js';
export type {
  GenerateOptions,
  GenerationReport,
  GeneratedPackage,
  SkippedPackage,
  SkipReason,
} from './generator/generator.js';
export { resolveOutputPath, defaultOutputPath } from './generator/output-path.js';
