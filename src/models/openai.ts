/**
 * @llm-relay/models - OpenAI Provider
 *
 * Implements ModelProvider for the OpenAI Chat Completions API through the
 * official SDK.
 */

import OpenAI from 'openai';
import {
  AbstractChatProvider,
  type ChatMessage,
  type ProviderSettings,
  type ResolvedRequest,
} from './provider.js';

export const OPENAI_DEFAULT_MODEL = 'gpt-4o-mini';

export class OpenAIProvider extends AbstractChatProvider {
  private readonly client: OpenAI;

  constructor(settings: ProviderSettings) {
    super(settings.id ?? 'openai', settings.model ?? OPENAI_DEFAULT_MODEL);
    this.client = new OpenAI({
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
    const params: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming = {
      model: request.model,
      max_tokens: request.maxTokens,
      temperature: request.temperature,
      messages: messages.map(toOpenAIMessage),
    };
    Object.assign(params, request.extra);

    const completion = await this.client.chat.completions.create(params, { signal });
    return completion.choices[0]?.message.content ?? '';
  }
}

function toOpenAIMessage(message: ChatMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
  }
}
