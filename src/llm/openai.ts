/**
 * OpenAI adapter — Chat Completions API.
 */

import { z } from 'zod';
import type { OpenAIProvider } from '../types/index.js';
import type { LLMAdapter } from './provider.js';
import { postJson, probe } from './http.js';

const DEFAULTS = {
  baseUrl: 'https://api.openai.com/v1',
  timeout: 120,
};

const CompletionSchema = z.object({
  choices: z.array(z.object({
    message: z.object({ content: z.string().nullable() }),
  })),
  usage: z.object({
    prompt_tokens: z.number().optional(),
    completion_tokens: z.number().optional(),
  }).optional(),
});

export function createOpenAIAdapter(config: OpenAIProvider): LLMAdapter {
  const baseUrl = config.baseUrl ?? DEFAULTS.baseUrl;
  const timeout = config.timeout ?? DEFAULTS.timeout;
  const headers = { Authorization: `Bearer ${config.apiKey}` };

  return {
    name: `openai/${config.model}`,

    async chat(messages, params, signal) {
      const raw = await postJson(`${baseUrl}/chat/completions`, {
        headers,
        timeout,
        signal,
        body: {
          model: params.model,
          messages: messages.map(m => ({ role: m.role, content: m.content })),
          max_tokens: params.maxTokens,
          temperature: params.temperature,
          top_p: params.topP,
        },
      });

      const data = CompletionSchema.parse(raw);
      return {
        content: data.choices[0]?.message.content ?? '',
        usage: {
          promptTokens: data.usage?.prompt_tokens,
          completionTokens: data.usage?.completion_tokens,
        },
      };
    },

    health() {
      return probe(`${baseUrl}/models`, headers);
    },
  };
}
