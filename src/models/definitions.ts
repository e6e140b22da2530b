/**
 * @llm-relay/models - Built-in provider definitions
 *
 * Adding a provider means adding a definition here (or passing one to
 * ModelFailover); the dispatcher itself never changes.
 */

import { AnthropicProvider } from './anthropic.js';
import { OpenAIProvider } from './openai.js';
import type { ProviderDefinition } from './provider.js';

export const anthropicDefinition: ProviderDefinition = {
  id: 'anthropic',
  create: (settings) => new AnthropicProvider(settings),
};

export const openaiDefinition: ProviderDefinition = {
  id: 'openai',
  create: (settings) => new OpenAIProvider(settings),
};

/** In default fallback order. */
export const BUILTIN_PROVIDERS: readonly ProviderDefinition[] = [
  anthropicDefinition,
  openaiDefinition,
];
