/**
 * Config loader — reads data/config.yaml and the default prompt file.
 *
 * Secrets never live in the YAML: API keys and the front-end token
 * come from the environment (.env is loaded by the entry point).
 * Anything wrong here is fatal at startup.
 */

import { existsSync, readFileSync } from 'node:fs';
import { extname, isAbsolute, join } from 'node:path';
import { z } from 'zod';
import { parse as parseYaml } from './yaml.js';
import { DEFAULT_HISTORY_LIMIT, DEFAULT_MAX_PROMPT_LENGTH } from './prompt-resolver.js';
import { PROVIDER_NAMES } from '../types/index.js';
import type { LLMProvider, ModelParams, ProviderName } from '../types/index.js';

function providerSchema(maxTemperature: number) {
  return z.object({
    model: z.string().min(1),
    maxTokens: z.number().int().min(1).max(8192).optional(),
    temperature: z.number().min(0).max(maxTemperature).optional(),
    topP: z.number().min(0).max(1).optional(),
    timeout: z.number().min(0).optional(),
    baseUrl: z.string().url().optional(),
  });
}

const ConfigSchema = z.object({
  server: z.object({
    port: z.number().int().min(1).max(65535).default(3000),
    host: z.string().default('0.0.0.0'),
  }).default({}),

  database: z.object({
    path: z.string().default('switchboard.db'),
  }).default({}),

  access: z.object({
    // Unquoted YAML numbers above 2^53 would already have lost digits
    adminIds: z.array(z.string({
      invalid_type_error: 'admin ids must be quoted strings, e.g. "100000000000000001"',
    })).default([]),
    defaultLevel: z.enum(['standard', 'none']).default('standard'),
  }).default({}),

  providers: z.object({
    default: z.enum(PROVIDER_NAMES),
    openai: providerSchema(2).optional(),
    anthropic: providerSchema(1).optional(),
    gemini: providerSchema(1).optional(),
    ollama: providerSchema(2).optional(),
  }).refine(p => p[p.default] !== undefined, {
    message: 'providers.default must name a configured provider',
    path: ['default'],
  }),

  prompts: z.object({
    defaultPath: z.string().default('default-prompt.yaml'),
    maxLength: z.number().int().positive().default(DEFAULT_MAX_PROMPT_LENGTH),
    historyLimit: z.number().int().positive().default(DEFAULT_HISTORY_LIMIT),
    persistForceMode: z.boolean().default(true),
  }).default({}),
});

export type RawConfig = z.infer<typeof ConfigSchema>;

export interface SwitchboardConfig {
  server: RawConfig['server'];
  databasePath: string;
  access: {
    adminIds: string[];
    defaultLevel: 'standard' | 'none';
    frontendToken: string;
  };
  providers: {
    initial: ProviderName;
    /** Full adapter settings, credentials included */
    entries: LLMProvider[];
    /** Generation params per provider, for the registry */
    params: Map<ProviderName, ModelParams>;
  };
  prompts: {
    maxLength: number;
    historyLimit: number;
    persistForceMode: boolean;
    /** Static default, loaded once */
    defaultPrompt: string;
    /** Fixed prompt for code fixing; null when the prompt file has none */
    fixpyPrompt: string | null;
  };
}

type Env = Record<string, string | undefined>;

const API_KEY_VARS = {
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
  gemini: 'GEMINI_API_KEY',
} as const;

/**
 * Load and validate everything under `dataDir`.
 */
export function loadConfig(dataDir: string, env: Env = process.env): SwitchboardConfig {
  const configPath = join(dataDir, 'config.yaml');

  if (!existsSync(configPath)) {
    throw new Error(
      `Config not found at ${configPath}. ` +
      `Copy data.example/ to data/ and customize it.`
    );
  }

  const raw = parseConfig(parseYaml(readFileSync(configPath, 'utf-8'), configPath), configPath);

  const frontendToken = env.SWITCHBOARD_FRONTEND_TOKEN?.trim();
  if (!frontendToken) {
    throw new Error('SWITCHBOARD_FRONTEND_TOKEN must be set');
  }

  const envAdmins = (env.SWITCHBOARD_ADMIN_IDS ?? '')
    .split(',')
    .map(id => id.trim())
    .filter(Boolean);

  const promptPath = isAbsolute(raw.prompts.defaultPath)
    ? raw.prompts.defaultPath
    : join(dataDir, raw.prompts.defaultPath);

  const staticPrompts = loadStaticPrompts(promptPath);

  return {
    server: raw.server,
    databasePath: env.SWITCHBOARD_DB_PATH ?? (
      isAbsolute(raw.database.path) ? raw.database.path : join(dataDir, raw.database.path)
    ),
    access: {
      adminIds: [...new Set([...raw.access.adminIds, ...envAdmins])],
      defaultLevel: raw.access.defaultLevel,
      frontendToken,
    },
    providers: buildProviders(raw.providers, env),
    prompts: {
      maxLength: raw.prompts.maxLength,
      historyLimit: raw.prompts.historyLimit,
      persistForceMode: raw.prompts.persistForceMode,
      defaultPrompt: staticPrompts.chatDefault,
      fixpyPrompt: staticPrompts.fixpy,
    },
  };
}

export function parseConfig(input: unknown, source = 'config'): RawConfig {
  const result = ConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `  ${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid ${source}:\n${issues}`);
  }
  return result.data;
}

function buildProviders(raw: RawConfig['providers'], env: Env): SwitchboardConfig['providers'] {
  const entries: LLMProvider[] = [];
  const params = new Map<ProviderName, ModelParams>();

  for (const name of PROVIDER_NAMES) {
    const settings = raw[name];
    if (!settings) continue;

    const { timeout, baseUrl, ...modelParams } = settings;
    params.set(name, modelParams);

    if (name === 'ollama') {
      entries.push({ type: 'ollama', ...settings });
      continue;
    }

    const apiKey = env[API_KEY_VARS[name]]?.trim();
    if (!apiKey) {
      throw new Error(`${API_KEY_VARS[name]} is required when provider "${name}" is configured`);
    }
    entries.push({ type: name, apiKey, timeout, baseUrl, ...modelParams });
  }

  return { initial: raw.default, entries, params };
}

export interface StaticPrompts {
  chatDefault: string;
  fixpy: string | null;
}

const PromptFileSchema = z.object({
  chat_default: z.string(),
  fixpy: z.string().optional(),
});

/**
 * Read the static prompts. YAML files carry the default under
 * `chat_default` and, optionally, the code-fixing prompt under
 * `fixpy`; anything else is read as plain text and only sets the default.
 */
export function loadStaticPrompts(path: string): StaticPrompts {
  if (!existsSync(path)) {
    throw new Error(`Default system prompt not found at ${path}`);
  }

  const text = readFileSync(path, 'utf-8');
  const ext = extname(path).toLowerCase();

  let chatDefault: string;
  let fixpy: string | null = null;
  if (ext === '.yaml' || ext === '.yml') {
    const parsed = PromptFileSchema.safeParse(parseYaml(text, path));
    if (!parsed.success) {
      throw new Error(`${path} must define a "chat_default" string`);
    }
    chatDefault = parsed.data.chat_default.trim();
    fixpy = parsed.data.fixpy?.trim() || null;
  } else {
    chatDefault = text.trim();
  }

  if (!chatDefault) throw new Error(`Default system prompt at ${path} is empty`);
  return { chatDefault, fixpy };
}
