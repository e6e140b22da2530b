/**
 * @llm-relay/models - Anthropic Provider
 *
 * Implements ModelProvider for Anthropic's Messages API through the
 * official SDK.
 */

import Anthropic from '@anthropic-ai/sdk';
import {
  AbstractChatProvider,
  type ChatMessage,
  type ProviderSettings,
  type ResolvedRequest,
} from './provider.js';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const ANTHROPIC_DEFAULT_MODEL = 'claude-3-5-sonnet-20241022';

type TextBlock = Extract<Anthropic.Message['content'][number], { type: 'text' }>;

// ---------------------------------------------------------------------------
// AnthropicProvider
// ---------------------------------------------------------------------------

export class AnthropicProvider extends AbstractChatProvider {
  private readonly client: Anthropic;

  constructor(settings: ProviderSettings) {
    super(settings.id ?? 'anthropic', settings.model ?? ANTHROPIC_DEFAULT_MODEL);
    // Retries belong to the dispatcher, not the SDK.
    this.client = new Anthropic({
      apiKey: settings.apiKey,
      baseURL: settings.baseUrl,
      maxRetries: 0,
    });
  }

  protected async complete(
    messages: ChatMessage[],
    request: ResolvedRequest,
    signal?: AbortSignal,
  ): Promise<string> {
    // The Messages API takes the system prompt out of band
    const system = messages
      .filter((m) => m.role === 'system')
      .map((m) => m.content)
      .join('\n\n');

    const conversation = messages.flatMap((m): Anthropic.MessageParam[] =>
      m.role === 'system' ? [] : [{ role: m.role, content: m.content }],
    );

    const params: Anthropic.MessageCreateParamsNonStreaming = {
      model: request.model,
      max_tokens: request.maxTokens,
      temperature: request.temperature,
      messages: conversation,
    };
    if (system) {
      params.system = system;
    }
    Object.assign(params, request.extra);

    const response = await this.client.messages.create(params, { signal });
    return extractText(response.content);
  }
}

/** Concatenate the visible text blocks of a reply. */
export function extractText(blocks: Anthropic.Message['content']): string {
  return blocks
    .filter((block): block is TextBlock => block.type === 'text')
    .map((block) => block.text)
    .join('\n\n');
}
