/**
 * Prompt resolver — decides which system prompt governs a conversation.
 *
 * Precedence, evaluated fresh on every call:
 *   1. force mode on      → static default
 *   2. user has an active → that record's content
 *   3. otherwise          → static default
 *
 * Force mode masks custom prompts at read time. Nothing is rewritten
 * when it is toggled, so unlocking brings every user's own prompt back
 * at once. Writes to a user's records go through the prompt store,
 * where each one is a single transaction.
 */

import type { PromptHistoryEntry, PromptRecord, PromptState } from '../types/index.js';
import type { PromptStore } from '../db/index.js';
import type { AccessGate } from './access.js';
import type { ForceMode } from './force-mode.js';
import { BlockedByForceMode, InvalidInput, PromptTooLong } from './errors.js';

export const DEFAULT_MAX_PROMPT_LENGTH = 4000;
export const DEFAULT_HISTORY_LIMIT = 25;
const PREVIEW_LENGTH = 50;

export interface PromptResolverConfig {
  prompts: PromptStore;
  force: ForceMode;
  gate: AccessGate;
  /** Loaded once at startup, never changes */
  defaultPrompt: string;
  maxLength?: number;
  historyLimit?: number;
}

export type PromptResolver = ReturnType<typeof createPromptResolver>;

export function createPromptResolver(config: PromptResolverConfig) {
  const { prompts, force, gate, defaultPrompt } = config;
  const maxLength = config.maxLength ?? DEFAULT_MAX_PROMPT_LENGTH;
  const historyLimit = config.historyLimit ?? DEFAULT_HISTORY_LIMIT;

  return {
    resolve(userId: string): string {
      if (force.enabled) return defaultPrompt;
      return prompts.findActive(userId)?.content ?? defaultPrompt;
    },

    describe(userId: string): PromptState {
      const active = prompts.findActive(userId);
      const mode = force.enabled ? 'forced' : active ? 'custom' : 'default';
      return { mode, activeRecordId: active?.id ?? null };
    },

    /**
     * Store `text` as the user's active prompt. Allowed in force mode:
     * the record is kept and shows up once the admin unlocks.
     */
    setPrompt(userId: string, text: string): PromptRecord {
      const length = [...text].length;
      if (length > maxLength) throw new PromptTooLong(length, maxLength);

      const content = text.trim();
      if (!content) throw new InvalidInput('System prompt cannot be empty');

      const record = prompts.create(userId, content);
      console.log(`[prompts] ${userId} set prompt #${record.id}${force.enabled ? ' (masked by force mode)' : ''}`);
      return record;
    },

    resetPrompt(userId: string): PromptRecord | null {
      if (force.enabled) throw new BlockedByForceMode();
      const previous = prompts.deactivate(userId);
      if (previous) console.log(`[prompts] ${userId} reset prompt #${previous.id}`);
      return previous;
    },

    reusePrompt(userId: string, recordId: number): PromptRecord {
      const record = prompts.reactivate(userId, recordId);
      console.log(`[prompts] ${userId} reused prompt #${record.id}`);
      return record;
    },

    listHistory(userId: string): PromptHistoryEntry[] {
      return prompts.history(userId, historyLimit).map(record => ({
        ...record,
        preview: preview(record.content),
      }));
    },

    forceDefault(actor: string) {
      gate.require(actor, 'admin');
      const state = force.enable(actor);
      console.log(`[prompts] force mode on (by ${state.setBy})`);
      return state;
    },

    unlock(actor: string) {
      gate.require(actor, 'admin');
      const state = force.disable(actor);
      console.log(`[prompts] force mode off (by ${actor})`);
      return state;
    },
  };
}

/** One line, at most PREVIEW_LENGTH characters */
export function preview(content: string): string {
  const line = content.replace(/\s+/g, ' ').trim();
  const chars = [...line];
  if (chars.length <= PREVIEW_LENGTH) return line;
  return chars.slice(0, PREVIEW_LENGTH - 1).join('') + '…';
}
