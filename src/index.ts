/**
 * llm-relay - Main Entry Point
 *
 * Public API of the relay plus `createRelay()`, which wires the pieces the
 * way a host application usually wants them:
 *   1. Load relay.json and environment credentials through @llm-relay/core
 *   2. Report validation problems through pino
 *   3. Build a ModelFailover (registry, chain, status reporter) from the result
 */

import pino from 'pino';
import { loadConfig, type CredentialSource } from '@llm-relay/core';
import { ModelFailover, type FailoverHooks } from './models/failover.js';

export {
  ModelFailover,
  InvalidRequestError,
  type FailoverConfig,
  type FailoverHooks,
  type ProviderOptions,
  type DispatchResult,
} from './models/failover.js';
export {
  AbstractChatProvider,
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
  RESERVED_REQUEST_KEYS,
  type ModelProvider,
  type ProviderDefinition,
  type ProviderSettings,
  type ResolvedRequest,
} from './models/provider.js';
export { AnthropicProvider, ANTHROPIC_DEFAULT_MODEL } from './models/anthropic.js';
export { OpenAIProvider, OPENAI_DEFAULT_MODEL } from './models/openai.js';
export { BUILTIN_PROVIDERS, anthropicDefinition, openaiDefinition } from './models/definitions.js';

export {
  AllProvidersFailedError,
  DispatchAbortedError,
  LoggerSink,
  MemorySink,
  FanoutSink,
  type DispatchEvent,
  type EventSink,
  type FallbackAttempt,
  type StatusReport,
  type ProviderStatus,
  type OverallStatus,
} from '@llm-relay/fallback';
export {
  loadConfig,
  resolveConfig,
  envCredentialSource,
  validateConfig,
  DEFAULT_CONFIG,
  type RelayConfig,
  type CredentialSource,
  type ChatMessage,
  type CallParameters,
  type FailureClass,
} from '@llm-relay/core';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const LOG_NAME = 'llm-relay';

export interface CreateRelayOptions extends FailoverHooks {
  /** Explicit relay.json location. */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  credentials?: CredentialSource;
}

// ---------------------------------------------------------------------------
// Bootstrap
// ---------------------------------------------------------------------------

/**
 * Load configuration and build a ready-to-use ModelFailover.
 *
 * Validation errors are logged rather than thrown: an unknown provider is
 * simply unavailable, and calls report that through AllProvidersFailedError.
 */
export async function createRelay(options: CreateRelayOptions = {}): Promise<ModelFailover> {
  const { config, validation } = await loadConfig({
    path: options.configPath,
    env: options.env,
    credentials: options.credentials,
  });

  const log = options.logger ?? pino({ name: LOG_NAME, level: config.logLevel });

  for (const err of validation.errors) {
    log.error({ path: err.path }, `Config error: ${err.message}`);
  }
  for (const warn of validation.warnings) {
    log.warn({ path: warn.path }, `Config warning: ${warn.message}`);
  }

  return ModelFailover.fromConfig(config, {
    definitions: options.definitions,
    onFallback: options.onFallback,
    sink: options.sink,
    logger: log,
  });
}
