export type {
  PermissionLevel,
  RequiredLevel,
  User,
  DenialReason,
  Authorization,
} from './access.js';

export type {
  PromptRecord,
  PromptHistoryEntry,
  ForceState,
  PromptMode,
  PromptState,
} from './prompt.js';

export type {
  ProviderName,
  ModelParams,
  LLMProvider,
  OpenAIProvider,
  AnthropicProvider,
  GeminiProvider,
  OllamaProvider,
  ProviderSelection,
} from './provider.js';

export { PROVIDER_NAMES, PROVIDER_DISPLAY_NAMES, isProviderName } from './provider.js';
