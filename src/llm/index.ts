/**
 * LLM provider factory.
 *
 * One adapter per configured provider, keyed by provider name.
 * Add new providers here and in types/provider.ts.
 */

import type { LLMProvider, ProviderName } from '../types/index.js';
import type { LLMAdapter } from './provider.js';
import { createOpenAIAdapter } from './openai.js';
import { createAnthropicAdapter } from './anthropic.js';
import { createGeminiAdapter } from './gemini.js';
import { createOllamaAdapter } from './ollama.js';

export type { LLMAdapter, LLMMessage, LLMResponse } from './provider.js';

export type AdapterTable = ReadonlyMap<ProviderName, LLMAdapter>;

export function createLLMAdapter(config: LLMProvider): LLMAdapter {
  switch (config.type) {
    case 'openai':
      return createOpenAIAdapter(config);
    case 'anthropic':
      return createAnthropicAdapter(config);
    case 'gemini':
      return createGeminiAdapter(config);
    case 'ollama':
      return createOllamaAdapter(config);
  }
}

export function createAdapterTable(providers: readonly LLMProvider[]): AdapterTable {
  return new Map(providers.map(p => [p.type, createLLMAdapter(p)] as const));
}
