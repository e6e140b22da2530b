/**
 * Unit Tests for Config Loader
 *
 * Tests defaults, file merging, environment overrides, credential
 * resolution and validation.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { homedir, tmpdir } from 'node:os';
import {
  CONFIG_FILE_NAME,
  checkConfig,
  DEFAULT_CONFIG,
  deepMerge,
  envCredentialSource,
  loadConfig,
  normalizeConfig,
  resolveConfig,
  resolveConfigPath,
  resolveRelayHome,
  validateConfig,
  type CredentialSource,
} from '@llm-relay/core';

let tempDir: string;

async function writeConfig(contents: unknown): Promise<string> {
  const path = join(tempDir, CONFIG_FILE_NAME);
  await writeFile(path, typeof contents === 'string' ? contents : JSON.stringify(contents), 'utf-8');
  return path;
}

describe('Config Loader', () => {
  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'relay-config-test-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  // ---------------------------------------------------------------------------
  // Defaults
  // ---------------------------------------------------------------------------
  describe('Load default config', () => {
    it('DEFAULT_CONFIG puts anthropic first and openai second', () => {
      expect(DEFAULT_CONFIG.primary).toBe('anthropic');
      expect(DEFAULT_CONFIG.order).toEqual(['anthropic', 'openai']);
    });

    it('DEFAULT_CONFIG reads keys from the conventional variables', () => {
      expect(DEFAULT_CONFIG.providers['anthropic']?.apiKeyEnv).toBe('ANTHROPIC_API_KEY');
      expect(DEFAULT_CONFIG.providers['openai']?.apiKeyEnv).toBe('OPENAI_API_KEY');
    });

    it('a missing file yields the defaults plus environment credentials', async () => {
      const { config, validation } = await loadConfig({
        path: join(tempDir, 'absent.json'),
        env: { ANTHROPIC_API_KEY: 'test-secret' },
      });

      expect(validation.valid).toBe(true);
      expect(validation.warnings).toEqual([]);
      expect(config.primary).toBe('anthropic');
      expect(config.retries).toBe(0);
      expect(config.timeoutMs).toBe(60000);
      expect(config.logLevel).toBe('info');
      expect(config.providers['anthropic']?.apiKey).toBe('test-secret');
      expect(config.providers['openai']?.apiKey).toBeUndefined();
    });

    it('warns when no provider has a key', async () => {
      const { validation } = await loadConfig({ path: join(tempDir, 'absent.json'), env: {} });

      expect(validation.valid).toBe(true);
      expect(validation.warnings).toEqual([
        {
          path: '/providers',
          message: 'No enabled provider has an API key; every call will fail until one is configured',
        },
      ]);
    });

    it('treats an empty variable as unset', async () => {
      const { config } = await loadConfig({
        path: join(tempDir, 'absent.json'),
        env: { ANTHROPIC_API_KEY: '', OPENAI_API_KEY: 'test-secret' },
      });

      expect(config.providers['anthropic']?.apiKey).toBeUndefined();
      expect(config.providers['openai']?.apiKey).toBe('test-secret');
    });
  });

  // ---------------------------------------------------------------------------
  // File merging
  // ---------------------------------------------------------------------------
  describe('Merging relay.json', () => {
    it('keeps default providers when the file only sets primary', async () => {
      const path = await writeConfig({ primary: 'openai' });

      const { config, validation } = await loadConfig({ path, env: { OPENAI_API_KEY: 'test-secret' } });

      expect(validation.valid).toBe(true);
      expect(config.primary).toBe('openai');
      expect(Object.keys(config.providers)).toEqual(['anthropic', 'openai']);
      expect(config.providers['openai']?.apiKey).toBe('test-secret');
    });

    it('merges per-provider settings into the defaults', async () => {
      const path = await writeConfig({ providers: { openai: { model: 'gpt-4o' } } });

      const { config } = await loadConfig({ path, env: {} });

      expect(config.providers['openai']).toEqual({
        enabled: true,
        apiKeyEnv: 'OPENAI_API_KEY',
        model: 'gpt-4o',
      });
    });

    it('replaces the order array instead of concatenating', async () => {
      const path = await writeConfig({ order: ['openai', 'anthropic'] });

      const { config } = await loadConfig({ path, env: {} });

      expect(config.order).toEqual(['openai', 'anthropic']);
    });

    it('finds the file through RELAY_CONFIG', async () => {
      const path = await writeConfig({ retries: 2 });

      const { config } = await loadConfig({ env: { RELAY_CONFIG: path } });

      expect(config.retries).toBe(2);
    });

    it('throws on malformed JSON', async () => {
      const path = await writeConfig('{ "primary": ');

      await expect(loadConfig({ path, env: {} })).rejects.toThrow(`Failed to parse ${path}`);
    });

    it('throws when the file is not an object', async () => {
      const path = await writeConfig(['anthropic']);

      await expect(loadConfig({ path, env: {} })).rejects.toThrow(
        `Failed to parse ${path}: expected a JSON object`,
      );
    });
  });

  // ---------------------------------------------------------------------------
  // Environment
  // ---------------------------------------------------------------------------
  describe('Environment overrides', () => {
    it('RELAY_PRIMARY wins over the file', async () => {
      const path = await writeConfig({ primary: 'anthropic' });

      const { config } = await loadConfig({ path, env: { RELAY_PRIMARY: 'openai' } });

      expect(config.primary).toBe('openai');
    });

    it('RELAY_LOG_LEVEL applies only when it names a level', async () => {
      const valid = await resolveConfig({}, { env: { RELAY_LOG_LEVEL: 'debug' } });
      const invalid = await resolveConfig({}, { env: { RELAY_LOG_LEVEL: 'loud' } });

      expect(valid.config.logLevel).toBe('debug');
      expect(invalid.config.logLevel).toBe('info');
    });

    it('resolves $env: references', async () => {
      const { config } = await resolveConfig(
        { providers: { openai: { apiKey: '$env:TEAM_OPENAI_KEY' } } },
        { env: { TEAM_OPENAI_KEY: 'test-secret' } },
      );

      expect(config.providers['openai']?.apiKey).toBe('test-secret');
    });

    it('drops an unresolved $env: reference and falls back to apiKeyEnv', async () => {
      const { config } = await resolveConfig(
        { providers: { openai: { apiKey: '$env:MISSING_KEY' } } },
        { env: { OPENAI_API_KEY: 'test-fallback' } },
      );

      expect(config.providers['openai']?.apiKey).toBe('test-fallback');
    });

    it('a literal apiKey wins over apiKeyEnv', async () => {
      const { config } = await resolveConfig(
        { providers: { anthropic: { apiKey: 'test-literal' } } },
        { env: { ANTHROPIC_API_KEY: 'test-secret' } },
      );

      expect(config.providers['anthropic']?.apiKey).toBe('test-literal');
    });

    it('uses a custom credential source', async () => {
      const lookups: string[] = [];
      const vault: CredentialSource = {
        resolve: async (key) => {
          lookups.push(key);
          return key === 'ANTHROPIC_API_KEY' ? 'test-vault' : undefined;
        },
      };

      const { config } = await resolveConfig({}, { env: {}, credentials: vault });

      expect(config.providers['anthropic']?.apiKey).toBe('test-vault');
      expect(config.providers['openai']?.apiKey).toBeUndefined();
      expect(lookups).toEqual(['ANTHROPIC_API_KEY', 'OPENAI_API_KEY']);
    });

    it('envCredentialSource reads the given map', async () => {
      const source = envCredentialSource({ KEY: 'test-secret', EMPTY: '' });

      await expect(source.resolve('KEY')).resolves.toBe('test-secret');
      await expect(source.resolve('EMPTY')).resolves.toBeUndefined();
      await expect(source.resolve('NOPE')).resolves.toBeUndefined();
    });
  });

  // ---------------------------------------------------------------------------
  // Validation
  // ---------------------------------------------------------------------------
  describe('Validation', () => {
    it('reports an undeclared primary', async () => {
      const { config, validation } = await resolveConfig({ primary: 'mistral' }, { env: {} });

      expect(validation.valid).toBe(false);
      expect(validation.errors).toContainEqual({
        path: '/primary',
        message: 'Primary provider "mistral" is not declared under providers',
      });
      expect(config.primary).toBe('mistral');
    });

    it('reports an undeclared provider in order', async () => {
      const { validation } = await resolveConfig({ order: ['anthropic', 'cohere'] }, { env: {} });

      expect(validation.errors).toEqual([
        { path: '/order/1', message: 'Provider "cohere" is not declared under providers' },
      ]);
    });

    it('warns on a duplicate order entry', () => {
      const result = validateConfig({
        ...DEFAULT_CONFIG,
        order: ['anthropic', 'openai', 'openai'],
        providers: { anthropic: { enabled: true, apiKey: 'test-key' }, openai: { enabled: true } },
      });

      expect(result.valid).toBe(true);
      expect(result.warnings).toEqual([
        {
          path: '/order/2',
          message: 'Provider "openai" appears more than once; only the first position is used',
        },
      ]);
    });

    it('warns on a provider that is never attempted', () => {
      const result = validateConfig({
        ...DEFAULT_CONFIG,
        providers: {
          ...DEFAULT_CONFIG.providers,
          local: { enabled: true, apiKey: 'test-key' },
        },
      });

      expect(result.warnings).toEqual([
        {
          path: '/providers/local',
          message: 'Provider "local" is neither primary nor listed in order and will never be attempted',
        },
      ]);
    });

    it('warns when the primary is disabled', () => {
      const result = validateConfig({
        ...DEFAULT_CONFIG,
        providers: {
          anthropic: { enabled: false },
          openai: { enabled: true, apiKey: 'test-key' },
        },
      });

      expect(result.warnings).toEqual([
        {
          path: '/primary',
          message: 'Primary provider "anthropic" is disabled; calls start with the next provider',
        },
      ]);
    });

    it('resets only the field that fails the schema', async () => {
      const { config, validation } = await resolveConfig({ retries: 50 }, { env: {} });

      expect(validation.valid).toBe(false);
      expect(validation.errors.map((e) => e.path)).toEqual(['/retries']);
      expect(config).toEqual(DEFAULT_CONFIG);
    });

    it('keeps credentials and overrides when another field fails', async () => {
      const { config, validation } = await resolveConfig(
        { retries: 50 },
        { env: { ANTHROPIC_API_KEY: 'test-secret', RELAY_PRIMARY: 'openai' } },
      );

      expect(validation.valid).toBe(false);
      expect(validation.errors.map((e) => e.path)).toEqual(['/retries']);
      expect(config.retries).toBe(0);
      expect(config.primary).toBe('openai');
      expect(config.providers['anthropic']?.apiKey).toBe('test-secret');
    });

    it('resets a failing built-in provider entry to its defaults', async () => {
      const { config, validation } = await resolveConfig(
        { providers: { anthropic: { model: '' }, openai: { model: 'gpt-4o' } } },
        { env: { ANTHROPIC_API_KEY: 'test-secret' } },
      );

      expect(validation.errors.map((e) => e.path)).toEqual(['/providers/anthropic/model']);
      expect(config.providers['anthropic']).toEqual({
        enabled: true,
        apiKeyEnv: 'ANTHROPIC_API_KEY',
        apiKey: 'test-secret',
      });
      expect(config.providers['openai']).toEqual({
        enabled: true,
        apiKeyEnv: 'OPENAI_API_KEY',
        model: 'gpt-4o',
      });
    });

    it('drops a malformed provider that has no built-in defaults', async () => {
      const { config, validation } = await resolveConfig(
        { providers: { local: { enabled: 'yes' } } },
        { env: {} },
      );

      expect(validation.errors.map((e) => e.path)).toEqual(['/providers/local/enabled']);
      expect(Object.keys(config.providers)).toEqual(['anthropic', 'openai']);
    });

    it('accepts a third provider declared in the file', async () => {
      const { config, validation } = await resolveConfig(
        {
          order: ['anthropic', 'openai', 'local'],
          providers: { local: { apiKey: 'test-local' } },
        },
        { env: {} },
      );

      expect(validation.valid).toBe(true);
      expect(validation.warnings).toEqual([]);
      expect(config.order).toEqual(['anthropic', 'openai', 'local']);
      expect(config.providers['local']).toEqual({ apiKey: 'test-local' });
    });

    it('treats a provider without enabled as enabled', () => {
      const result = validateConfig({
        providers: { anthropic: { apiKey: 'test-key' }, openai: {} },
      });

      expect(result.valid).toBe(true);
      expect(result.warnings).toEqual([]);
      expect(result.config.version).toBe(1);
      expect(result.config.primary).toBe('anthropic');
      expect(result.config.providers['openai']).toEqual({});
    });

    it('normalizeConfig falls back to the defaults for a non-object', () => {
      const { config, errors } = normalizeConfig('anthropic');

      expect(config).toEqual(DEFAULT_CONFIG);
      expect(errors.length).toBeGreaterThan(0);
    });

    it('checkConfig reports schema errors next to rule errors', () => {
      const result = checkConfig({
        config: { ...DEFAULT_CONFIG, primary: 'mistral' },
        errors: [{ path: '/retries', message: 'too many' }],
      });

      expect(result.errors).toEqual([
        { path: '/retries', message: 'too many' },
        { path: '/primary', message: 'Primary provider "mistral" is not declared under providers' },
      ]);
    });
  });

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------
  describe('deepMerge', () => {
    it('merges nested objects and replaces arrays', () => {
      const merged = deepMerge(
        { a: { b: 1, c: 2 }, list: [1, 2] },
        { a: { c: 3 }, list: [9] },
      );

      expect(merged).toEqual({ a: { b: 1, c: 3 }, list: [9] });
    });

    it('ignores undefined overrides', () => {
      expect(deepMerge({ a: 1 }, { a: undefined })).toEqual({ a: 1 });
    });
  });

  describe('Paths', () => {
    it('resolves relay.json under RELAY_HOME', () => {
      expect(resolveConfigPath({ RELAY_HOME: tempDir })).toBe(join(resolve(tempDir), 'relay.json'));
    });

    it('prefers RELAY_CONFIG', () => {
      const path = join(tempDir, 'custom.json');
      expect(resolveConfigPath({ RELAY_CONFIG: path, RELAY_HOME: '/elsewhere' })).toBe(resolve(path));
    });

    it('defaults to ~/.llm-relay', () => {
      expect(resolveRelayHome({})).toBe(join(homedir(), '.llm-relay'));
    });
  });
});
