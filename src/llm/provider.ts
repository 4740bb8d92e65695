/**
 * LLM provider abstraction.
 *
 * A provider takes a system prompt + user message and returns a
 * response string. Which model and sampling settings to use come with
 * each call, from the process-wide provider selection; credentials and
 * endpoints are bound when the adapter is created.
 *
 * No streaming, no retries. A failed call is the caller's problem.
 */

import type { ModelParams } from '../types/index.js';

export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LLMResponse {
  content: string;
  /** How many tokens were used (if provider reports it) */
  usage?: {
    promptTokens?: number;
    completionTokens?: number;
  };
}

export interface LLMAdapter {
  /** Human-readable name for logs */
  name: string;

  /**
   * Generate a response from a conversation.
   * The first message should be the system prompt.
   */
  chat(messages: LLMMessage[], params: ModelParams, signal?: AbortSignal): Promise<LLMResponse>;

  /** Check if the provider is reachable */
  health(): Promise<boolean>;
}

/** Split the system prompt out for APIs that take it separately */
export function splitSystem(messages: LLMMessage[]): {
  system: string;
  rest: LLMMessage[];
} {
  const system = messages
    .filter(m => m.role === 'system')
    .map(m => m.content)
    .join('\n\n');
  return { system, rest: messages.filter(m => m.role !== 'system') };
}
