/**
 * Request assembler — the one place that reads both the provider
 * selection and the resolved prompt, and freezes them into a request.
 *
 * No authorization here: callers have already passed the guard for
 * whatever action they are performing. Errors from either read
 * propagate as they are.
 *
 * A `fixedPrompt` bypasses the resolver entirely, custom and forced
 * modes included. Code fixing uses it.
 */

import type { ModelParams, ProviderName } from '../types/index.js';
import type { ProviderRegistry } from './provider-registry.js';
import type { PromptResolver } from './prompt-resolver.js';

export interface AssembledRequest {
  readonly provider: ProviderName;
  readonly promptText: string;
  readonly userInput: string;
  readonly params: Readonly<ModelParams>;
}

export interface AssemblerConfig {
  registry: ProviderRegistry;
  resolver: Pick<PromptResolver, 'resolve'>;
}

export interface AssembleOptions {
  fixedPrompt?: string;
}

export function createAssembler(config: AssemblerConfig) {
  const { registry, resolver } = config;

  return function assemble(userId: string, input: string, options: AssembleOptions = {}): AssembledRequest {
    const { provider, params } = registry.getActive();
    const promptText = options.fixedPrompt ?? resolver.resolve(userId);
    return Object.freeze({ provider, promptText, userInput: input, params });
  };
}

export type Assemble = ReturnType<typeof createAssembler>;
