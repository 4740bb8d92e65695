/**
 * Provider registry — which backend answers chat requests right now.
 *
 * The selection is one frozen { provider, params } object. Switching
 * builds the new object completely and then swaps the reference, so a
 * reader can never pair one provider's id with another's params.
 */

import type { ModelParams, ProviderName, ProviderSelection } from '../types/index.js';
import { PROVIDER_DISPLAY_NAMES, PROVIDER_NAMES, isProviderName } from '../types/index.js';
import type { AccessGate } from './access.js';
import { UnknownProvider } from './errors.js';

export interface ProviderRegistryConfig {
  /** Params for every registered provider */
  providers: ReadonlyMap<ProviderName, ModelParams>;
  /** Selected at startup */
  initial: ProviderName;
  gate: AccessGate;
}

export type ProviderRegistry = ReturnType<typeof createProviderRegistry>;

export function createProviderRegistry(config: ProviderRegistryConfig) {
  const { gate } = config;
  const providers = new Map(
    [...config.providers].map(
      ([name, params]): [ProviderName, Readonly<ModelParams>] => [name, Object.freeze({ ...params })]
    )
  );

  function select(candidate: string): ProviderSelection {
    if (!isProviderName(candidate)) throw new UnknownProvider(candidate);
    const params = providers.get(candidate);
    if (!params) throw new UnknownProvider(candidate);
    return Object.freeze({ provider: candidate, params });
  }

  let selection = select(config.initial);

  return {
    /** Registered providers, in canonical order */
    listProviders(): ProviderName[] {
      return PROVIDER_NAMES.filter(name => providers.has(name));
    },

    getActive(): ProviderSelection {
      return selection;
    },

    displayName(provider: ProviderName = selection.provider): string {
      return PROVIDER_DISPLAY_NAMES[provider];
    },

    setActive(actor: string, candidate: string): ProviderSelection {
      gate.require(actor, 'admin');
      const next = select(candidate);
      selection = next;
      console.log(`[providers] ${actor} switched provider to ${next.provider}`);
      return next;
    },
  };
}
