/**
 * Test wiring: an in-memory database and a fully assembled engine,
 * with stub adapters in place of the network.
 */

import type Database from 'better-sqlite3';
import type { ModelParams, ProviderName } from '../types/index.js';
import type { LLMAdapter, LLMMessage } from '../llm/index.js';
import { openDatabase, createUserStore, createPromptStore, createForceStateStore } from '../db/index.js';
import { createAccessGate } from '../core/access.js';
import { createPermissionService } from '../core/permissions.js';
import { createForceMode } from '../core/force-mode.js';
import { createProviderRegistry } from '../core/provider-registry.js';
import { createPromptResolver } from '../core/prompt-resolver.js';
import { createAssembler } from '../core/assembler.js';
import { createResponder } from '../core/responder.js';
import { createAPI } from '../server/api.js';

export const DEFAULT_PROMPT = 'You are a helpful assistant.';
export const ADMIN = 'admin-1';
export const TOKEN = 'test-token';
export const FIXPY_PROMPT = 'Find and fix the bugs in this code.';

export interface StubAdapter extends LLMAdapter {
  calls: Array<{ messages: LLMMessage[]; params: ModelParams }>;
}

export function createStubAdapter(name: string, reply = `reply from ${name}`): StubAdapter {
  const calls: StubAdapter['calls'] = [];
  return {
    name,
    calls,
    async chat(messages, params) {
      calls.push({ messages, params });
      return { content: reply };
    },
    async health() {
      return true;
    },
  };
}

export interface TestEngineOptions {
  adminIds?: string[];
  db?: Database.Database;
  persistForceMode?: boolean;
  providers?: Array<[ProviderName, ModelParams]>;
  initial?: ProviderName;
  adapters?: Map<ProviderName, LLMAdapter>;
  /** null disables code fixing */
  fixpyPrompt?: string | null;
}

export function createTestEngine(options: TestEngineOptions = {}) {
  const adminIds = options.adminIds ?? [ADMIN];
  const db = options.db ?? openDatabase(':memory:');
  const users = createUserStore(db);
  const prompts = createPromptStore(db);
  users.seedAdmins(adminIds);

  const gate = createAccessGate({ adminIds, findUser: users.find });
  const force = createForceMode(options.persistForceMode === false ? null : createForceStateStore(db));
  const registry = createProviderRegistry({
    providers: new Map<ProviderName, ModelParams>(options.providers ?? [
      ['openai', { model: 'gpt-test', temperature: 0.5 }],
      ['anthropic', { model: 'claude-test', maxTokens: 256 }],
      ['gemini', { model: 'gemini-test' }],
    ]),
    initial: options.initial ?? 'openai',
    gate,
  });

  const permissions = createPermissionService({ users, gate, defaultLevel: 'standard' });
  const resolver = createPromptResolver({ prompts, force, gate, defaultPrompt: DEFAULT_PROMPT });
  const assemble = createAssembler({ registry, resolver });

  const adapters = options.adapters ?? new Map<ProviderName, LLMAdapter>([
    ['openai', createStubAdapter('openai')],
    ['anthropic', createStubAdapter('anthropic')],
    ['gemini', createStubAdapter('gemini')],
  ]);
  const responder = createResponder({
    assemble,
    adapters,
    fixpyPrompt: options.fixpyPrompt === undefined ? FIXPY_PROMPT : options.fixpyPrompt,
  });
  const api = createAPI({
    frontendToken: TOKEN,
    gate,
    permissions,
    registry,
    resolver,
    responder,
    adapters,
  });

  return { db, users, prompts, gate, force, registry, permissions, resolver, assemble, adapters, responder, api };
}

/** Count active rows straight from the table */
export function countActive(db: Database.Database, ownerId: string): number {
  const row = db
    .prepare<[string], { n: number }>('SELECT COUNT(*) AS n FROM prompts WHERE owner_id = ? AND active = 1')
    .get(ownerId);
  return row?.n ?? 0;
}
