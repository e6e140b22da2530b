/**
 * @llm-relay/models - Provider Capability Interface
 *
 * Defines the ModelProvider contract every vendor integration implements,
 * and the base class that keeps vendor errors inside the provider.
 */

import type { CallParameters, ChatMessage } from '@llm-relay/core';
import { omitKeys } from '@llm-relay/core';
import { classifyFailure, succeeded, type InvokeResult } from '@llm-relay/fallback';

export type { CallParameters, ChatMessage };

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const DEFAULT_MAX_TOKENS = 1024;
export const DEFAULT_TEMPERATURE = 0.7;

/** Request fields a provider sets itself; `extra` cannot override them. */
export const RESERVED_REQUEST_KEYS = [
  'model',
  'messages',
  'max_tokens',
  'temperature',
  'system',
  'stream',
] as const;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * The ModelProvider interface that all LLM providers must implement.
 */
export interface ModelProvider {
  /** Provider id (e.g. 'anthropic', 'openai'). */
  readonly id: string;

  /** Model used when the caller names none. */
  readonly defaultModel: string;

  /**
   * Send the conversation and return its text, or a classified failure.
   * Resolves in every case; vendor errors never escape.
   */
  invoke(
    messages: ChatMessage[],
    params?: CallParameters,
    signal?: AbortSignal,
  ): Promise<InvokeResult<string>>;
}

/** Call parameters after provider defaults are applied. */
export interface ResolvedRequest {
  model: string;
  maxTokens: number;
  temperature: number;
  /** Pass-through options with reserved keys removed. */
  extra: Record<string, unknown>;
}

/** Construction settings shared by the built-in providers. */
export interface ProviderSettings {
  apiKey: string;
  /** Registry id, when the provider is registered under another name. */
  id?: string;
  /** Default model override. */
  model?: string;
  baseUrl?: string;
}

/** How a provider id is turned into a capability. */
export interface ProviderDefinition {
  id: string;
  /** May throw; the registry then records the provider as unavailable. */
  create(settings: ProviderSettings): ModelProvider;
}

// ---------------------------------------------------------------------------
// Base class
// ---------------------------------------------------------------------------

export abstract class AbstractChatProvider implements ModelProvider {
  readonly id: string;
  readonly defaultModel: string;

  protected constructor(id: string, defaultModel: string) {
    this.id = id;
    this.defaultModel = defaultModel;
  }

  async invoke(
    messages: ChatMessage[],
    params: CallParameters = {},
    signal?: AbortSignal,
  ): Promise<InvokeResult<string>> {
    try {
      const text = await this.complete(messages, this.resolveRequest(params), signal);
      return succeeded(text);
    } catch (err: unknown) {
      return classifyFailure(err);
    }
  }

  /**
   * Model precedence: per-provider override, then the call-wide model,
   * then this provider's default.
   */
  resolveRequest(params: CallParameters): ResolvedRequest {
    return {
      model: params.models?.[this.id] ?? params.model ?? this.defaultModel,
      maxTokens: params.maxTokens ?? DEFAULT_MAX_TOKENS,
      temperature: params.temperature ?? DEFAULT_TEMPERATURE,
      extra: omitKeys(params.extra ?? {}, RESERVED_REQUEST_KEYS),
    };
  }

  /** Perform the vendor call. May throw; `invoke` classifies the error. */
  protected abstract complete(
    messages: ChatMessage[],
    request: ResolvedRequest,
    signal?: AbortSignal,
  ): Promise<string>;
}
