/**
 * Inference provider configuration.
 *
 * switchboard is provider-agnostic. One provider is selected
 * process-wide at a time; admins can switch between any of the
 * providers declared in data/config.yaml.
 */

export const PROVIDER_NAMES = ['openai', 'anthropic', 'gemini', 'ollama'] as const;

export type ProviderName = typeof PROVIDER_NAMES[number];

/** Generation parameters every backend understands */
export interface ModelParams {
  model: string;
  maxTokens?: number;
  temperature?: number;
  topP?: number;
}

interface ProviderBase extends ModelParams {
  /** Request timeout in seconds. 0 disables it. */
  timeout?: number;
}

export interface OpenAIProvider extends ProviderBase {
  type: 'openai';
  /** API key (from env) */
  apiKey: string;
  baseUrl?: string;
}

export interface AnthropicProvider extends ProviderBase {
  type: 'anthropic';
  apiKey: string;
  baseUrl?: string;
}

export interface GeminiProvider extends ProviderBase {
  type: 'gemini';
  apiKey: string;
  baseUrl?: string;
}

export interface OllamaProvider extends ProviderBase {
  type: 'ollama';
  /** Ollama API base URL. Default: http://localhost:11434 */
  baseUrl?: string;
}

export type LLMProvider = OpenAIProvider | AnthropicProvider | GeminiProvider | OllamaProvider;

/** The process-wide selection. Always replaced whole, never edited. */
export interface ProviderSelection {
  readonly provider: ProviderName;
  readonly params: Readonly<ModelParams>;
}

export const PROVIDER_DISPLAY_NAMES: Record<ProviderName, string> = {
  openai: 'OpenAI',
  anthropic: 'Anthropic',
  gemini: 'Google Gemini',
  ollama: 'Ollama',
};

export function isProviderName(value: string): value is ProviderName {
  return (PROVIDER_NAMES as readonly string[]).includes(value);
}
