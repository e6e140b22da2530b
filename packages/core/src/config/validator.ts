/**
 * @llm-relay/core - Configuration validator
 *
 * Validates a RelayConfig object using TypeBox, then applies the rules the
 * schema cannot express (primary and order must name declared providers).
 */

import { Value } from '@sinclair/typebox/value';
import { DEFAULT_CONFIG, RelayConfigSchema, type RelayConfig } from './schema.js';
import { isPlainObject } from '../utils/index.js';

/** Validation result */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationWarning[];
  config: RelayConfig;
}

export interface ValidationError {
  path: string;
  message: string;
}

export interface ValidationWarning {
  path: string;
  message: string;
}

/** A schema-conforming config plus the schema errors repaired to get there. */
export interface NormalizedConfig {
  config: RelayConfig;
  errors: ValidationError[];
}

/** Split a JSON pointer such as `/providers/openai/model` into segments. */
function pointerSegments(path: string): string[] {
  return path
    .split('/')
    .slice(1)
    .map((segment) => segment.replace(/~1/g, '/').replace(/~0/g, '~'));
}

/**
 * Reset the fields named by schema errors and leave everything else alone.
 *
 * A failing provider entry falls back to its built-in default, or is dropped
 * when there is none. A failing top-level field falls back to its default.
 */
function repair(candidate: Record<string, unknown>, errors: ValidationError[]): Record<string, unknown> {
  const repaired: Record<string, unknown> = { ...candidate };
  const defaults: Record<string, unknown> = { ...Value.Clone(DEFAULT_CONFIG) };

  for (const error of errors) {
    const [top, id] = pointerSegments(error.path);
    if (top === undefined || top === '') continue;

    const providers = repaired['providers'];
    if (top === 'providers' && id !== undefined && isPlainObject(providers)) {
      const next = { ...providers };
      const fallback = DEFAULT_CONFIG.providers[id];
      if (fallback) next[id] = Value.Clone(fallback);
      else delete next[id];
      repaired['providers'] = next;
    } else if (top in defaults) {
      repaired[top] = defaults[top];
    } else {
      delete repaired[top];
    }
  }

  return repaired;
}

/**
 * Bring a raw object into schema shape.
 *
 * Schema errors are reported and only the failing fields are reset, so keys
 * and overrides elsewhere in the file survive. Defaults stand in only when
 * the object cannot be repaired at all.
 */
export function normalizeConfig(raw: unknown): NormalizedConfig {
  const candidate = Value.Default(RelayConfigSchema, Value.Clone(raw));
  const errors: ValidationError[] = [];

  for (const err of Value.Errors(RelayConfigSchema, candidate)) {
    errors.push({ path: err.path, message: err.message });
  }

  if (Value.Check(RelayConfigSchema, candidate)) {
    return { config: candidate, errors };
  }

  if (isPlainObject(candidate)) {
    const repaired = Value.Default(RelayConfigSchema, repair(candidate, errors));
    if (Value.Check(RelayConfigSchema, repaired)) {
      return { config: repaired, errors };
    }
  }

  return { config: Value.Clone(DEFAULT_CONFIG), errors };
}

/**
 * Run the cross-field rules on a normalized config.
 *
 * Schema errors from normalization are reported alongside, so callers get
 * every problem in one pass.
 */
export function checkConfig({ config, errors: schemaErrors }: NormalizedConfig): ValidationResult {
  const errors: ValidationError[] = [...schemaErrors];
  const warnings: ValidationWarning[] = [];
  const declared = new Set(Object.keys(config.providers));

  // ----- Primary -----
  if (!declared.has(config.primary)) {
    errors.push({
      path: '/primary',
      message: `Primary provider "${config.primary}" is not declared under providers`,
    });
  } else if (config.providers[config.primary]?.enabled === false) {
    warnings.push({
      path: '/primary',
      message: `Primary provider "${config.primary}" is disabled; calls start with the next provider`,
    });
  }

  // ----- Order -----
  const seen = new Set<string>();
  config.order.forEach((id, index) => {
    if (!declared.has(id)) {
      errors.push({
        path: `/order/${index}`,
        message: `Provider "${id}" is not declared under providers`,
      });
    }
    if (seen.has(id)) {
      warnings.push({
        path: `/order/${index}`,
        message: `Provider "${id}" appears more than once; only the first position is used`,
      });
    }
    seen.add(id);
  });

  for (const id of declared) {
    if (id !== config.primary && !seen.has(id)) {
      warnings.push({
        path: `/providers/${id}`,
        message: `Provider "${id}" is neither primary nor listed in order and will never be attempted`,
      });
    }
  }

  // ----- Credentials -----
  const withKey = Object.values(config.providers).filter(
    (p) => p.enabled !== false && typeof p.apiKey === 'string' && p.apiKey.length > 0,
  );
  if (withKey.length === 0) {
    warnings.push({
      path: '/providers',
      message: 'No enabled provider has an API key; every call will fail until one is configured',
    });
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
    config,
  };
}

/** Validate and normalise a RelayConfig object. */
export function validateConfig(raw: unknown): ValidationResult {
  return checkConfig(normalizeConfig(raw));
}
