/**
 * @llm-relay/models - Model Failover
 *
 * Uses the FallbackChain from @llm-relay/fallback to send a conversation to
 * the primary provider and fail over to the others in declared order. The
 * registry is built once, here, and never changes afterwards.
 */

import pino from 'pino';
import { Value } from '@sinclair/typebox/value';
import type { TSchema } from '@sinclair/typebox';
import {
  CallParametersSchema,
  ConversationSchema,
  type RelayConfig,
} from '@llm-relay/core';
import {
  FallbackChain,
  LoggerSink,
  ProviderRegistry,
  StatusReporter,
  failed,
  type EventSink,
  type FallbackAttempt,
  type FallbackProvider,
  type ProviderHandle,
  type ProviderSpec,
  type StatusReport,
} from '@llm-relay/fallback';
import { BUILTIN_PROVIDERS } from './definitions.js';
import type {
  CallParameters,
  ChatMessage,
  ModelProvider,
  ProviderDefinition,
} from './provider.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Per-provider construction settings. */
export interface ProviderOptions {
  enabled?: boolean;
  apiKey?: string;
  /** Default model for this provider. */
  model?: string;
  baseUrl?: string;
}

export interface FailoverConfig {
  /** Provider attempted first on every call. */
  primary: string;
  /** Fallback order. Defaults to the order of `definitions`. The primary is always moved to the front. */
  order?: string[];
  /** Settings keyed by provider id. A provider without an apiKey is unavailable. */
  providers?: Record<string, ProviderOptions>;
  /** Integrations available to the registry. Defaults to Anthropic and OpenAI. */
  definitions?: readonly ProviderDefinition[];
  /** Extra attempts on the same provider before moving on. Default 0. */
  retries?: number;
  /** Per-attempt deadline in ms. Default 60000, 0 disables it. */
  timeoutMs?: number;
  /** Callback when failover occurs. */
  onFallback?: (from: string, to: string, error: string) => void;
  logger?: pino.Logger;
  /** Observability sink. Defaults to a LoggerSink over `logger`. */
  sink?: EventSink;
}

/** Host-side collaborators that never come from a config file. */
export type FailoverHooks = Pick<FailoverConfig, 'definitions' | 'onFallback' | 'logger' | 'sink'>;

/** A successful call. */
export interface DispatchResult {
  text: string;
  /** Id of the provider that produced `text`. */
  provider: string;
  attempts: FallbackAttempt[];
  callId: string;
}

interface DispatchInput {
  messages: ChatMessage[];
  params: CallParameters;
}

/** Thrown before any provider runs when the request itself is malformed. */
export class InvalidRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidRequestError';
  }
}

// ---------------------------------------------------------------------------
// ModelFailover
// ---------------------------------------------------------------------------

export class ModelFailover {
  private readonly registry: ProviderRegistry<ModelProvider>;
  private readonly status: StatusReporter<ModelProvider>;
  private readonly chain: FallbackChain<DispatchInput, string>;
  private readonly log: pino.Logger;

  constructor(config: FailoverConfig) {
    this.log = config.logger ?? pino({ name: '@llm-relay/failover' });

    const definitions = new Map(
      (config.definitions ?? BUILTIN_PROVIDERS).map((definition) => [definition.id, definition]),
    );
    const declared = config.order ?? [...definitions.keys()];
    const ids = [...new Set([config.primary, ...declared])];

    this.registry = ProviderRegistry.build({
      primary: config.primary,
      providers: ids.map((id) => toSpec(id, config.providers?.[id] ?? {}, definitions.get(id))),
      logger: this.log,
    });
    this.status = new StatusReporter(this.registry);

    this.chain = new FallbackChain<DispatchInput, string>({
      providers: this.registry.attemptOrder().map(toFallbackProvider),
      timeoutMs: config.timeoutMs ?? 60_000,
      retries: config.retries ?? 0,
      // An empty reply is indistinguishable from a failure here
      isUsable: (text) => text.length > 0,
      onFallback: config.onFallback,
      sink: config.sink ?? new LoggerSink(this.log),
    });

    this.log.info(
      { primary: config.primary, order: this.chain.getProviderNames() },
      'ModelFailover initialized',
    );
  }

  /**
   * Build from a validated relay configuration.
   */
  static fromConfig(config: RelayConfig, hooks: FailoverHooks = {}): ModelFailover {
    const providers: Record<string, ProviderOptions> = {};
    for (const [id, settings] of Object.entries(config.providers)) {
      providers[id] = {
        enabled: settings.enabled,
        apiKey: settings.apiKey,
        model: settings.model,
        baseUrl: settings.baseUrl,
      };
    }

    return new ModelFailover({
      ...hooks,
      primary: config.primary,
      order: config.order,
      providers,
      retries: config.retries,
      timeoutMs: config.timeoutMs,
      logger: hooks.logger ?? pino({ name: '@llm-relay/failover', level: config.logLevel }),
    });
  }

  /**
   * Send a conversation with automatic failover.
   *
   * Tries the primary, then every other provider in declared order, and
   * returns the first non-empty reply. Throws AllProvidersFailedError when
   * none produces one.
   */
  async call(messages: ChatMessage[], params: CallParameters = {}): Promise<DispatchResult> {
    const { signal, timeoutMs, ...forwarded } = params;
    assertValid(ConversationSchema, messages, 'messages');
    assertValid(CallParametersSchema, { ...forwarded, timeoutMs }, 'params');

    const { result, provider, attempts, callId } = await this.chain.execute(
      { messages, params: forwarded },
      { signal, timeoutMs },
    );
    return { text: result, provider, attempts, callId };
  }

  /**
   * Availability per provider and the primary, from registry state only.
   */
  getStatus(): StatusReport {
    return this.status.getStatus();
  }

  /**
   * Get the list of provider ids in failover order.
   */
  getProviderNames(): string[] {
    return this.chain.getProviderNames();
  }

  /**
   * Flush and release the observability sink.
   */
  async close(): Promise<void> {
    await this.chain.close();
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function toSpec(
  id: string,
  options: ProviderOptions,
  definition: ProviderDefinition | undefined,
): ProviderSpec<ModelProvider> {
  return {
    id,
    enabled: options.enabled,
    credential: options.apiKey,
    create: definition
      ? (apiKey: string) =>
          definition.create({ apiKey, id, model: options.model, baseUrl: options.baseUrl })
      : undefined,
  };
}

function toFallbackProvider(
  handle: ProviderHandle<ModelProvider>,
): FallbackProvider<DispatchInput, string> {
  const capability = handle.capability;
  if (!handle.available || !capability) {
    const reason = handle.reason ?? 'Provider unavailable';
    return {
      name: handle.id,
      available: false,
      reason,
      execute: async () => failed('unavailable', reason),
    };
  }

  return {
    name: handle.id,
    available: true,
    execute: (input, signal) => capability.invoke(input.messages, input.params, signal),
  };
}

function assertValid(schema: TSchema, value: unknown, label: string): void {
  if (Value.Check(schema, value)) return;
  const details = [...Value.Errors(schema, value)]
    .map((err) => `${label}${err.path} ${err.message}`)
    .join('; ');
  throw new InvalidRequestError(`Invalid request: ${details}`);
}
