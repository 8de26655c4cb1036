/**
 * Config Loader Tests
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

import { afterEach, beforeEach, describe, it, expect } from 'vitest';

import { ConfigurationError } from '../../errors.js';
import { ConfigLoader, mergeConfig } from '../config-loader.js';
import { DEFAULT_CONFIG } from '../defaults.js';

describe('ConfigLoader', () => {
  let rootDir: string;

  beforeEach(async () => {
    rootDir = await fs.mkdtemp(path.join(os.tmpdir(), 'docstringer-config-'));
  });

  afterEach(async () => {
    await fs.rm(rootDir, { recursive: true, force: true });
  });

  async function writeConfig(content: string): Promise<void> {
    await fs.mkdir(path.join(rootDir, '.docstringer'), { recursive: true });
    await fs.writeFile(path.join(rootDir, '.docstringer', 'config.json'), content);
  }

  it('should return the defaults without a config file', async () => {
    const result = await new ConfigLoader({ rootDir, env: {} }).load();

    expect(result).toEqual({
      config: DEFAULT_CONFIG,
      configPath: undefined,
      configFileFound: false,
      envOverridesApplied: false,
    });
  });

  it('should merge the config file over the defaults', async () => {
    await writeConfig(JSON.stringify({ formatter: 'gofmt', parser: { enableTreeSitter: false } }));

    const result = await new ConfigLoader({ rootDir, env: {} }).load();

    expect(result.configFileFound).toBe(true);
    expect(result.configPath).toBe(path.join(rootDir, '.docstringer', 'config.json'));
    expect(result.config).toEqual({
      parser: { enableTreeSitter: false, enableFallback: true },
      formatter: 'gofmt',
      checker: 'declarations',
      exclude: [],
    });
  });

  it('should apply environment overrides last', async () => {
    await writeConfig(JSON.stringify({ checker: 'go-vet', exclude: ['a.go'] }));

    const result = await new ConfigLoader({
      rootDir,
      env: {
        DOCSTRINGER_CHECKER: 'none',
        DOCSTRINGER_TREE_SITTER: 'false',
        DOCSTRINGER_EXCLUDE: 'mock_*.go, *_test.go',
      },
    }).load();

    expect(result.envOverridesApplied).toBe(true);
    expect(result.config).toEqual({
      parser: { enableTreeSitter: false, enableFallback: true },
      formatter: 'builtin',
      checker: 'none',
      exclude: ['mock_*.go', '*_test.go'],
    });
  });

  it('should ignore the environment when asked to', async () => {
    const result = await new ConfigLoader({
      rootDir,
      applyEnvOverrides: false,
      env: { DOCSTRINGER_FORMATTER: 'gofmt' },
    }).load();

    expect(result.config.formatter).toBe('builtin');
  });

  it('should reject unknown environment values', async () => {
    const loader = new ConfigLoader({ rootDir, env: { DOCSTRINGER_FORMATTER: 'prettier' } });

    await expect(loader.load()).rejects.toThrow(
      'DOCSTRINGER_FORMATTER must be one of builtin, gofmt, got "prettier"'
    );
  });

  it('should reject a config file that is not JSON', async () => {
    await writeConfig('{ formatter: gofmt');

    await expect(new ConfigLoader({ rootDir, env: {} }).load()).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('should reject an invalid config file with the field errors', async () => {
    await writeConfig(JSON.stringify({ checker: 'vet' }));

    await expect(new ConfigLoader({ rootDir, env: {} }).load()).rejects.toThrow(
      '1. checker: Invalid checker "vet"'
    );
  });
});

describe('mergeConfig', () => {
  it('should merge parser options field by field', () => {
    expect(mergeConfig(DEFAULT_CONFIG, { parser: { enableFallback: false } }).parser).toEqual({
      enableTreeSitter: true,
      enableFallback: false,
    });
  });
});
