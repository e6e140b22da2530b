/**
 * @llm-relay/core - TypeBox schema for relay.json configuration
 *
 * Sections: primary provider, attempt order, per-provider settings, retry and
 * deadline policy, log level.
 */

import { Type, type Static } from '@sinclair/typebox';

// ---------------------------------------------------------------------------
// Sub-schemas
// ---------------------------------------------------------------------------

const ProviderConfigSchema = Type.Object({
  enabled: Type.Optional(Type.Boolean({ description: 'Absent means enabled' })),
  apiKey: Type.Optional(
    Type.String({ description: 'Literal key or $env:NAME reference' }),
  ),
  apiKeyEnv: Type.Optional(
    Type.String({ description: 'Environment variable holding the API key' }),
  ),
  model: Type.Optional(Type.String({ minLength: 1 })),
  baseUrl: Type.Optional(Type.String()),
});
export type ProviderConfig = Static<typeof ProviderConfigSchema>;

export const LogLevelSchema = Type.Union([
  Type.Literal('fatal'),
  Type.Literal('error'),
  Type.Literal('warn'),
  Type.Literal('info'),
  Type.Literal('debug'),
  Type.Literal('trace'),
  Type.Literal('silent'),
], { default: 'info' });
export type LogLevel = Static<typeof LogLevelSchema>;

// ---------------------------------------------------------------------------
// Root config schema
// ---------------------------------------------------------------------------

export const RelayConfigSchema = Type.Object({
  $schema: Type.Optional(Type.String()),
  version: Type.Number({ default: 1 }),
  primary: Type.String({ minLength: 1, default: 'anthropic' }),
  order: Type.Array(Type.String({ minLength: 1 }), {
    default: ['anthropic', 'openai'],
    description: 'Fallback order; the primary is always moved to the front',
  }),
  providers: Type.Record(Type.String(), ProviderConfigSchema, { default: {} }),
  retries: Type.Integer({
    minimum: 0,
    maximum: 10,
    default: 0,
    description: 'Extra immediate attempts on the same provider before moving on',
  }),
  timeoutMs: Type.Integer({ minimum: 0, default: 60000 }),
  logLevel: LogLevelSchema,
});

export type RelayConfig = Static<typeof RelayConfigSchema>;

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_CONFIG: RelayConfig = {
  version: 1,
  primary: 'anthropic',
  order: ['anthropic', 'openai'],
  providers: {
    anthropic: { enabled: true, apiKeyEnv: 'ANTHROPIC_API_KEY' },
    openai: { enabled: true, apiKeyEnv: 'OPENAI_API_KEY' },
  },
  retries: 0,
  timeoutMs: 60000,
  logLevel: 'info',
};
