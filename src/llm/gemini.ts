/**
 * Google Gemini adapter — generateContent REST API.
 */

import { z } from 'zod';
import type { GeminiProvider } from '../types/index.js';
import type { LLMAdapter } from './provider.js';
import { splitSystem } from './provider.js';
import { postJson, probe } from './http.js';

const DEFAULTS = {
  baseUrl: 'https://generativelanguage.googleapis.com/v1beta',
  timeout: 120,
};

const GenerateSchema = z.object({
  candidates: z.array(z.object({
    content: z.object({
      parts: z.array(z.object({ text: z.string().optional() })).default([]),
    }).optional(),
  })).default([]),
  usageMetadata: z.object({
    promptTokenCount: z.number().optional(),
    candidatesTokenCount: z.number().optional(),
  }).optional(),
});

export function createGeminiAdapter(config: GeminiProvider): LLMAdapter {
  const baseUrl = config.baseUrl ?? DEFAULTS.baseUrl;
  const timeout = config.timeout ?? DEFAULTS.timeout;
  const headers = { 'x-goog-api-key': config.apiKey };

  return {
    name: `gemini/${config.model}`,

    async chat(messages, params, signal) {
      const { system, rest } = splitSystem(messages);
      const raw = await postJson(
        `${baseUrl}/models/${encodeURIComponent(params.model)}:generateContent`,
        {
          headers,
          timeout,
          signal,
          body: {
            systemInstruction: system ? { parts: [{ text: system }] } : undefined,
            contents: rest.map(m => ({
              role: m.role === 'assistant' ? 'model' : 'user',
              parts: [{ text: m.content }],
            })),
            generationConfig: {
              maxOutputTokens: params.maxTokens,
              temperature: params.temperature,
              topP: params.topP,
            },
          },
        },
      );

      const data = GenerateSchema.parse(raw);
      const parts = data.candidates[0]?.content?.parts ?? [];
      return {
        content: parts.map(p => p.text ?? '').join(''),
        usage: {
          promptTokens: data.usageMetadata?.promptTokenCount,
          completionTokens: data.usageMetadata?.candidatesTokenCount,
        },
      };
    },

    health() {
      return probe(`${baseUrl}/models`, headers);
    },
  };
}
