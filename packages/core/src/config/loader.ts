/**
 * @llm-relay/core - Configuration loader
 *
 * Loads relay.json, merges with defaults, applies environment overrides,
 * resolves $env: references and provider credentials, then validates.
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { Value } from '@sinclair/typebox/value';
import { DEFAULT_CONFIG, LogLevelSchema, type RelayConfig } from './schema.js';
import { checkConfig, normalizeConfig, type ValidationResult } from './validator.js';
import { resolveConfigPath } from './paths.js';
import { errorMessage, isPlainObject } from '../utils/index.js';

/**
 * Where credentials come from. The process environment is one source;
 * hosts with a secret store supply their own.
 */
export interface CredentialSource {
  resolve(key: string): Promise<string | undefined>;
}

const ENV_REF_PREFIX = '$env:';

/** Credential source backed by an environment map (default: process.env). */
export function envCredentialSource(env: NodeJS.ProcessEnv = process.env): CredentialSource {
  return {
    resolve: async (key: string) => {
      const value = env[key];
      return value && value.length > 0 ? value : undefined;
    },
  };
}

export interface LoadConfigOptions {
  /** Explicit config file. Defaults to RELAY_CONFIG or RELAY_HOME/relay.json. */
  path?: string;
  /** Environment used for path resolution and overrides. Defaults to process.env. */
  env?: NodeJS.ProcessEnv;
  /** Credential source. Defaults to the environment above. */
  credentials?: CredentialSource;
}

/**
 * Deep-merge two objects.  Arrays are replaced (not concatenated).
 */
export function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };

  for (const [key, overVal] of Object.entries(override)) {
    const baseVal = result[key];

    if (isPlainObject(overVal) && isPlainObject(baseVal)) {
      result[key] = deepMerge(baseVal, overVal);
    } else if (overVal !== undefined) {
      result[key] = overVal;
    }
  }

  return result;
}

/**
 * Recursively walk an object and resolve any string values beginning with "$env:".
 * Unresolvable references are dropped so they never reach a vendor as a key.
 */
async function resolveEnvRefs(obj: unknown, source: CredentialSource): Promise<unknown> {
  if (typeof obj === 'string' && obj.startsWith(ENV_REF_PREFIX)) {
    return source.resolve(obj.slice(ENV_REF_PREFIX.length));
  }

  if (Array.isArray(obj)) {
    return Promise.all(obj.map((item) => resolveEnvRefs(item, source)));
  }

  if (isPlainObject(obj)) {
    const entries = await Promise.all(
      Object.entries(obj).map(async ([k, v]) => [k, await resolveEnvRefs(v, source)] as const),
    );
    return Object.fromEntries(entries.filter(([, v]) => v !== undefined));
  }

  return obj;
}

/**
 * Fill each provider's apiKey from its apiKeyEnv when no key is configured.
 */
async function resolveCredentials(config: RelayConfig, source: CredentialSource): Promise<void> {
  for (const provider of Object.values(config.providers)) {
    if (provider.apiKey || !provider.apiKeyEnv) continue;
    const key = await source.resolve(provider.apiKeyEnv);
    if (key) provider.apiKey = key;
  }
}

/**
 * Apply RELAY_PRIMARY and RELAY_LOG_LEVEL on top of the file contents.
 */
function applyEnvOverrides(
  raw: Record<string, unknown>,
  env: NodeJS.ProcessEnv,
): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};

  const primary = env['RELAY_PRIMARY']?.trim();
  if (primary) overrides['primary'] = primary;

  const logLevel = env['RELAY_LOG_LEVEL']?.trim();
  if (logLevel && Value.Check(LogLevelSchema, logLevel)) overrides['logLevel'] = logLevel;

  return { ...raw, ...overrides };
}

async function readConfigFile(configPath: string): Promise<Record<string, unknown>> {
  if (!existsSync(configPath)) return {};

  const text = await readFile(configPath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new Error(
      `Failed to parse ${configPath}: ${errorMessage(err)}`,
    );
  }

  if (!isPlainObject(parsed)) {
    throw new Error(`Failed to parse ${configPath}: expected a JSON object`);
  }
  return parsed;
}

/**
 * Build a validated config from an already-parsed object.
 *
 * 1. Deep-merge with DEFAULT_CONFIG
 * 2. Apply environment overrides
 * 3. Resolve $env: references
 * 4. Fill TypeBox defaults and repair fields that fail the schema
 * 5. Resolve provider credentials
 * 6. Validate
 */
export async function resolveConfig(
  raw: Record<string, unknown>,
  options: { env?: NodeJS.ProcessEnv; credentials?: CredentialSource } = {},
): Promise<{ config: RelayConfig; validation: ValidationResult }> {
  const env = options.env ?? process.env;
  const source = options.credentials ?? envCredentialSource(env);

  // The merge keeps default providers around, so a file that only sets
  // `primary` still gets credentials for both built-in integrations.
  const merged = applyEnvOverrides(
    deepMerge(Value.Clone(DEFAULT_CONFIG), raw),
    env,
  );
  const resolved = await resolveEnvRefs(merged, source);

  // Credentials are looked up after repair, so a bad field elsewhere in the
  // file does not cost the relay its keys.
  const normalized = normalizeConfig(resolved);
  await resolveCredentials(normalized.config, source);

  const validation = checkConfig(normalized);
  return { config: validation.config, validation };
}

/**
 * Load the relay configuration from disk.
 *
 * A missing file is not an error: defaults plus environment credentials
 * are a complete configuration.
 */
export async function loadConfig(
  options: LoadConfigOptions = {},
): Promise<{ config: RelayConfig; validation: ValidationResult }> {
  const env = options.env ?? process.env;
  const configPath = options.path ?? resolveConfigPath(env);
  const raw = await readConfigFile(configPath);
  return resolveConfig(raw, { env, credentials: options.credentials });
}
