/**
 * Anthropic adapter — Messages API.
 *
 * The system prompt goes in its own field, and max_tokens is required
 * by the API, so it falls back to a default when not configured.
 */

import { z } from 'zod';
import type { AnthropicProvider } from '../types/index.js';
import type { LLMAdapter } from './provider.js';
import { splitSystem } from './provider.js';
import { postJson, probe } from './http.js';

const DEFAULTS = {
  baseUrl: 'https://api.anthropic.com',
  version: '2023-06-01',
  maxTokens: 1024,
  timeout: 120,
};

const MessageSchema = z.object({
  content: z.array(z.object({
    type: z.string(),
    text: z.string().optional(),
  })),
  usage: z.object({
    input_tokens: z.number().optional(),
    output_tokens: z.number().optional(),
  }).optional(),
});

export function createAnthropicAdapter(config: AnthropicProvider): LLMAdapter {
  const baseUrl = config.baseUrl ?? DEFAULTS.baseUrl;
  const timeout = config.timeout ?? DEFAULTS.timeout;
  const headers = {
    'x-api-key': config.apiKey,
    'anthropic-version': DEFAULTS.version,
  };

  return {
    name: `anthropic/${config.model}`,

    async chat(messages, params, signal) {
      const { system, rest } = splitSystem(messages);
      const raw = await postJson(`${baseUrl}/v1/messages`, {
        headers,
        timeout,
        signal,
        body: {
          model: params.model,
          system: system || undefined,
          messages: rest.map(m => ({ role: m.role, content: m.content })),
          max_tokens: params.maxTokens ?? DEFAULTS.maxTokens,
          temperature: params.temperature,
          top_p: params.topP,
        },
      });

      const data = MessageSchema.parse(raw);
      return {
        content: data.content
          .filter(block => block.type === 'text')
          .map(block => block.text ?? '')
          .join(''),
        usage: {
          promptTokens: data.usage?.input_tokens,
          completionTokens: data.usage?.output_tokens,
        },
      };
    },

    health() {
      return probe(`${baseUrl}/v1/models`, headers);
    },
  };
}
