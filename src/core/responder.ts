/**
 * The responder — single-turn chat, plus code fixing with its own
 * fixed prompt.
 *
 * Flow:
 *   1. Assemble the request (provider + resolved prompt + input)
 *   2. Look up the adapter for the selected provider
 *   3. Call it, outside of anything that holds state
 *   4. Return the text, or UpstreamUnavailable with details kept for the logs
 */

import type { AdapterTable, LLMMessage } from '../llm/index.js';
import type { ProviderName } from '../types/index.js';
import type { AssembledRequest, Assemble } from './assembler.js';
import { InvalidInput, NotFound, UpstreamUnavailable, describeError } from './errors.js';

export interface ResponderConfig {
  assemble: Assemble;
  adapters: AdapterTable;
  /** Prompt for fixCode; null turns the feature off */
  fixpyPrompt?: string | null;
}

export interface RespondResult {
  /** The response text */
  content: string;
  /** Which backend produced it */
  provider: ProviderName;
  usage?: {
    promptTokens?: number;
    completionTokens?: number;
  };
}

export type Responder = ReturnType<typeof createResponder>;

export function createResponder(config: ResponderConfig) {
  const { assemble, adapters } = config;
  const fixpyPrompt = config.fixpyPrompt ?? null;

  async function send(userId: string, request: AssembledRequest, signal?: AbortSignal): Promise<RespondResult> {
    const adapter = adapters.get(request.provider);
    if (!adapter) {
      throw new UpstreamUnavailable(request.provider, {
        cause: new Error(`No adapter configured for ${request.provider}`),
      });
    }

    const messages: LLMMessage[] = [
      { role: 'system', content: request.promptText },
      { role: 'user', content: request.userInput },
    ];

    try {
      const response = await adapter.chat(messages, request.params, signal);
      return { content: response.content, provider: request.provider, usage: response.usage };
    } catch (error) {
      const wrapped = new UpstreamUnavailable(request.provider, { cause: error });
      console.error(`[chat] ${adapter.name} failed for ${userId}: ${describeError(wrapped)}`);
      throw wrapped;
    }
  }

  return {
    async respond(userId: string, message: string, signal?: AbortSignal): Promise<RespondResult> {
      if (!message.trim()) throw new InvalidInput('Message cannot be empty');
      return send(userId, assemble(userId, message), signal);
    },

    /** Ignores the user's prompt and force mode: always the fixpy prompt. */
    async fixCode(userId: string, code: string, signal?: AbortSignal): Promise<RespondResult> {
      if (fixpyPrompt === null) throw new NotFound();
      if (!code.trim()) throw new InvalidInput('Code cannot be empty');
      return send(userId, assemble(userId, code, { fixedPrompt: fixpyPrompt }), signal);
    },
  };
}
