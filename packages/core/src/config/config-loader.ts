/**
 * Config Loader - Configuration loading and merging
 *
 * Loads configuration from .docstringer/config.json in the package directory
 * and merges it over the defaults, then applies environment variable
 * overrides. A missing config file is not an error.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import { ConfigurationError, toError } from '../errors.js';
import { formatConfigErrors, validatePartialConfig, VALID_CHECKERS, VALID_FORMATTERS } from './config-validator.js';
import { DEFAULT_CONFIG } from './defaults.js';

import type { DocstringerConfig, PartialDocstringerConfig } from './types.js';

// ============================================================================
// Constants
// ============================================================================

/** Directory name for docstringer configuration */
const CONFIG_DIR = '.docstringer';

/** Config file name */
const CONFIG_FILE = 'config.json';

/** Environment variable prefix for config overrides */
const ENV_PREFIX = 'DOCSTRINGER_';

/** Environment variable names for specific config options */
export const ENV_VARS = {
  FORMATTER: `${ENV_PREFIX}FORMATTER`,
  CHECKER: `${ENV_PREFIX}CHECKER`,
  TREE_SITTER: `${ENV_PREFIX}TREE_SITTER`,
  EXCLUDE: `${ENV_PREFIX}EXCLUDE`,
} as const;

// ============================================================================
// Helper Functions
// ============================================================================

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Parse a boolean from an environment variable string
 */
function parseEnvBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) {return undefined;}
  const lower = value.toLowerCase();
  if (lower === 'true' || lower === '1' || lower === 'yes') {return true;}
  if (lower === 'false' || lower === '0' || lower === 'no') {return false;}
  return undefined;
}

/**
 * Merge a partial configuration over a complete one
 */
export function mergeConfig(
  base: DocstringerConfig,
  override: PartialDocstringerConfig
): DocstringerConfig {
  return {
    parser: { ...base.parser, ...override.parser },
    formatter: override.formatter ?? base.formatter,
    checker: override.checker ?? base.checker,
    exclude: override.exclude ?? base.exclude,
  };
}

// ============================================================================
// Config Loader Class
// ============================================================================

/**
 * Configuration loader options
 */
export interface ConfigLoaderOptions {
  /** Directory to search for .docstringer/config.json */
  rootDir?: string | undefined;
  /** Whether to apply environment variable overrides */
  applyEnvOverrides?: boolean | undefined;
  /** Environment to read overrides from (defaults to process.env) */
  env?: NodeJS.ProcessEnv | undefined;
}

/**
 * Result of loading configuration
 */
export interface ConfigLoadResult {
  /** The loaded and merged configuration */
  config: DocstringerConfig;
  /** Path to the config file (if found) */
  configPath?: string | undefined;
  /** Whether the config file was found */
  configFileFound: boolean;
  /** Whether environment overrides were applied */
  envOverridesApplied: boolean;
}

/**
 * ConfigLoader - Loads docstringer configuration
 */
export class ConfigLoader {
  private readonly applyEnvOverrides: boolean;
  private readonly env: NodeJS.ProcessEnv;
  private readonly configPath: string;

  constructor(options: ConfigLoaderOptions = {}) {
    const rootDir = options.rootDir ?? process.cwd();
    this.applyEnvOverrides = options.applyEnvOverrides ?? true;
    this.env = options.env ?? process.env;
    this.configPath = path.join(rootDir, CONFIG_DIR, CONFIG_FILE);
  }

  /**
   * Load configuration from file, merge with defaults, and apply env overrides
   *
   * @throws ConfigurationError when the file is unreadable, not JSON, or invalid
   */
  async load(): Promise<ConfigLoadResult> {
    let config = DEFAULT_CONFIG;
    let configFileFound = false;
    let envOverridesApplied = false;

    if (await fileExists(this.configPath)) {
      config = mergeConfig(config, await this.loadFromFile(this.configPath));
      configFileFound = true;
    }

    if (this.applyEnvOverrides) {
      const envConfig = this.getEnvOverrides();
      if (Object.keys(envConfig).length > 0) {
        config = mergeConfig(config, envConfig);
        envOverridesApplied = true;
      }
    }

    return {
      config,
      configPath: configFileFound ? this.configPath : undefined,
      configFileFound,
      envOverridesApplied,
    };
  }

  /**
   * Get the path to the config file
   */
  getConfigPath(): string {
    return this.configPath;
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private async loadFromFile(filePath: string): Promise<PartialDocstringerConfig> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      const cause = toError(error);
      throw new ConfigurationError(`Failed to read configuration file ${filePath}: ${cause.message}`, cause);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      const cause = toError(error);
      throw new ConfigurationError(`Failed to parse configuration file ${filePath}: ${cause.message}`, cause);
    }

    const result = validatePartialConfig(parsed);
    if (!result.valid) {
      throw new ConfigurationError(`${filePath}\n${formatConfigErrors(result.errors)}`);
    }
    return result.data;
  }

  /**
   * Configuration overrides from environment variables
   *
   * @throws ConfigurationError on values that are set but not recognised
   */
  private getEnvOverrides(): PartialDocstringerConfig {
    const overrides: PartialDocstringerConfig = {};

    const formatter = this.env[ENV_VARS.FORMATTER];
    if (formatter) {
      const match = VALID_FORMATTERS.find((valid) => valid === formatter);
      if (!match) {
        throw new ConfigurationError(
          `${ENV_VARS.FORMATTER} must be one of ${VALID_FORMATTERS.join(', ')}, got "${formatter}"`
        );
      }
      overrides.formatter = match;
    }

    const checker = this.env[ENV_VARS.CHECKER];
    if (checker) {
      const match = VALID_CHECKERS.find((valid) => valid === checker);
      if (!match) {
        throw new ConfigurationError(
          `${ENV_VARS.CHECKER} must be one of ${VALID_CHECKERS.join(', ')}, got "${checker}"`
        );
      }
      overrides.checker = match;
    }

    const treeSitter = this.env[ENV_VARS.TREE_SITTER];
    if (treeSitter) {
      const enabled = parseEnvBoolean(treeSitter);
      if (enabled === undefined) {
        throw new ConfigurationError(`${ENV_VARS.TREE_SITTER} must be a boolean, got "${treeSitter}"`);
      }
      overrides.parser = { enableTreeSitter: enabled };
    }

    const exclude = this.env[ENV_VARS.EXCLUDE];
    if (exclude) {
      overrides.exclude = exclude.split(',').map((pattern) => pattern.trim()).filter(Boolean);
    }

    return overrides;
  }
}

// ============================================================================
// Convenience Functions
// ============================================================================

/**
 * Load configuration for a package directory
 */
export async function loadConfig(rootDir?: string): Promise<DocstringerConfig> {
  const loader = new ConfigLoader({ rootDir });
  const result = await loader.load();
  return result.config;
}
