/**
 * Ollama adapter — talks to a local Ollama instance.
 *
 * No API keys, no cloud. Local models can be slow, so the default
 * timeout is generous.
 */

import { z } from 'zod';
import type { OllamaProvider } from '../types/index.js';
import type { LLMAdapter } from './provider.js';
import { postJson, probe } from './http.js';

const DEFAULTS = {
  baseUrl: 'http://localhost:11434',
  timeout: 600, // 10 minutes
};

const ChatSchema = z.object({
  message: z.object({ content: z.string() }).optional(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
});

export function createOllamaAdapter(config: OllamaProvider): LLMAdapter {
  const baseUrl = config.baseUrl ?? DEFAULTS.baseUrl;
  const timeout = config.timeout ?? DEFAULTS.timeout;

  return {
    name: `ollama/${config.model}`,

    async chat(messages, params, signal) {
      const raw = await postJson(`${baseUrl}/api/chat`, {
        timeout,
        signal,
        body: {
          model: params.model,
          messages: messages.map(m => ({
            role: m.role,
            content: m.content,
          })),
          stream: false,
          options: {
            num_predict: params.maxTokens,
            temperature: params.temperature,
            top_p: params.topP,
          },
        },
      });

      const data = ChatSchema.parse(raw);
      return {
        content: data.message?.content ?? '',
        usage: {
          promptTokens: data.prompt_eval_count,
          completionTokens: data.eval_count,
        },
      };
    },

    health() {
      return probe(`${baseUrl}/api/tags`);
    },
  };
}
