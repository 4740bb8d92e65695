/**
 * System prompt records and force mode.
 *
 * A user can write as many prompts as they like; each one is kept
 * forever so it can be picked again later. At most one of them is
 * active at a time.
 */

export interface PromptRecord {
  id: number;
  ownerId: string;
  content: string;
  createdAt: string;   // ISO 8601
  activatedAt: string | null;
  deactivatedAt: string | null;
  active: boolean;
}

/** A history row as shown to its owner */
export interface PromptHistoryEntry extends PromptRecord {
  /** First line of the prompt, shortened for pickers */
  preview: string;
}

/**
 * Process-wide force mode. While enabled, every user gets the
 * static default prompt no matter what they have set.
 */
export interface ForceState {
  enabled: boolean;
  setBy: string | null;
  setAt: string | null;
}

/** Which text `resolve()` would return right now, and why */
export type PromptMode = 'default' | 'custom' | 'forced';

export interface PromptState {
  mode: PromptMode;
  /** The user's active record, even when masked by force mode */
  activeRecordId: number | null;
}
