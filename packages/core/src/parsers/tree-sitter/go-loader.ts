/**
 * Tree-sitter Go Loader
 *
 * Loads the optional native modules tree-sitter and tree-sitter-go on first
 * use. When either is missing the generator keeps working on the fallback
 * declaration parser, so failures here are recorded, never thrown at import.
 */

import { createRequire } from 'node:module';

import type { TreeSitterParser, TreeSitterLanguage } from './types.js';

// Create require function for ESM compatibility
const require = createRequire(import.meta.url);

// ============================================
// Module State
// ============================================

interface LoadedGrammar {
  Parser: new () => TreeSitterParser;
  language: TreeSitterLanguage;
}

/** Loaded modules, null until the first successful load */
let loaded: LoadedGrammar | null = null;

/** Loading error message, set when the modules could not be loaded */
let loadingError: string | null = null;

// ============================================
// Public API
// ============================================

/**
 * Check if tree-sitter-go can be used. The result is cached.
 */
export function isGoTreeSitterAvailable(): boolean {
  if (loaded) {
    return true;
  }
  if (loadingError !== null) {
    return false;
  }

  try {
    loaded = loadGoTreeSitter();
    logDebug('tree-sitter and tree-sitter-go loaded');
    return true;
  } catch (error) {
    loadingError = error instanceof Error ? error.message : 'Unknown error loading tree-sitter-go';
    logDebug(`tree-sitter-go not available: ${loadingError}`);
    return false;
  }
}

/**
 * Create a tree-sitter parser configured for Go.
 *
 * @throws Error if tree-sitter-go is not available
 */
export function createGoParser(): TreeSitterParser {
  if (!isGoTreeSitterAvailable() || !loaded) {
    throw new Error(`tree-sitter-go is not available: ${loadingError ?? 'unknown error'}`);
  }

  const parser = new loaded.Parser();
  parser.setLanguage(loaded.language);
  return parser;
}

/**
 * Get the loading error message if tree-sitter-go failed to load.
 */
export function getGoLoadingError(): string | null {
  isGoTreeSitterAvailable();
  return loadingError;
}

/**
 * Reset the loader state (useful for testing).
 */
export function resetGoLoader(): void {
  loaded = null;
  loadingError = null;
}

// ============================================
// Internal Functions
// ============================================

function loadGoTreeSitter(): LoadedGrammar {
  let Parser: new () => TreeSitterParser;
  try {
    Parser = require('tree-sitter') as new () => TreeSitterParser;
  } catch (error) {
    throw new Error(
      `Failed to load tree-sitter: ${error instanceof Error ? error.message : 'unknown error'}. ` +
        'Install with: npm install tree-sitter tree-sitter-go'
    );
  }

  try {
    const language = require('tree-sitter-go') as TreeSitterLanguage;
    return { Parser, language };
  } catch (error) {
    throw new Error(
      `Failed to load tree-sitter-go: ${error instanceof Error ? error.message : 'unknown error'}. ` +
        'Install with: npm install tree-sitter-go'
    );
  }
}

function logDebug(message: string): void {
  if (process.env['DOCSTRINGER_PARSER_DEBUG'] === 'true') {
    console.debug(`[go-loader] ${message}`);
  }
}
