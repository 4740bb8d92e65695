import type Database from 'better-sqlite3';
import type { PromptRecord } from '../types/index.js';
import { NotFound } from '../core/errors.js';
import { guard, now } from './util.js';

interface PromptRow {
  id: number;
  owner_id: string;
  content: string;
  created_at: string;
  activated_at: string | null;
  deactivated_at: string | null;
  active: number;
}

export type PromptStore = ReturnType<typeof createPromptStore>;

/**
 * Prompt records. Every write that touches the active flag runs as a
 * single IMMEDIATE transaction: deactivate first, then activate, so
 * the partial unique index never sees two active rows per owner and
 * readers never see zero-then-one.
 */
export function createPromptStore(db: Database.Database) {
  const selectById = db.prepare<[number], PromptRow>('SELECT * FROM prompts WHERE id = ?');

  const selectOwned = db.prepare<[number, string], PromptRow>(
    'SELECT * FROM prompts WHERE id = ? AND owner_id = ?'
  );

  const selectActive = db.prepare<[string], PromptRow>(
    'SELECT * FROM prompts WHERE owner_id = ? AND active = 1'
  );

  const selectHistory = db.prepare<[string, number], PromptRow>(`
    SELECT * FROM prompts
    WHERE owner_id = ?
    ORDER BY created_at DESC, id DESC
    LIMIT ?
  `);

  const deactivateOwner = db.prepare<[string, string]>(`
    UPDATE prompts SET active = 0, deactivated_at = ?
    WHERE owner_id = ? AND active = 1
  `);

  const insertActive = db.prepare<[string, string, string, string]>(`
    INSERT INTO prompts (owner_id, content, created_at, activated_at, active)
    VALUES (?, ?, ?, ?, 1)
  `);

  const activate = db.prepare<[string, number]>(`
    UPDATE prompts SET active = 1, activated_at = ?, deactivated_at = NULL
    WHERE id = ?
  `);

  function readById(id: number | bigint): PromptRecord {
    const row = selectById.get(Number(id));
    if (!row) throw new Error(`Prompt ${id} vanished after write`);
    return rowToPrompt(row);
  }

  const createTx = db.transaction((ownerId: string, content: string): PromptRecord => {
    const ts = now();
    deactivateOwner.run(ts, ownerId);
    const { lastInsertRowid } = insertActive.run(ownerId, content, ts, ts);
    return readById(lastInsertRowid);
  });

  const deactivateTx = db.transaction((ownerId: string): PromptRecord | null => {
    const row = selectActive.get(ownerId);
    if (!row) return null;
    deactivateOwner.run(now(), ownerId);
    return readById(row.id);
  });

  const reactivateTx = db.transaction((ownerId: string, id: number): PromptRecord => {
    const row = selectOwned.get(id, ownerId);
    if (!row) throw new NotFound();
    const ts = now();
    deactivateOwner.run(ts, ownerId);
    activate.run(ts, id);
    return readById(id);
  });

  return {
    /** Insert `content` as the owner's new active prompt. */
    create(ownerId: string, content: string): PromptRecord {
      return guard('prompts.create', () => createTx.immediate(ownerId, content));
    },

    /** Deactivate the owner's active prompt. Returns it, or null if there was none. */
    deactivate(ownerId: string): PromptRecord | null {
      return guard('prompts.deactivate', () => deactivateTx.immediate(ownerId));
    },

    /** Make one of the owner's own records the active one. Throws NotFound otherwise. */
    reactivate(ownerId: string, id: number): PromptRecord {
      return guard('prompts.reactivate', () => reactivateTx.immediate(ownerId, id));
    },

    findActive(ownerId: string): PromptRecord | null {
      return guard('prompts.findActive', () => {
        const row = selectActive.get(ownerId);
        return row ? rowToPrompt(row) : null;
      });
    },

    history(ownerId: string, limit: number): PromptRecord[] {
      return guard('prompts.history', () => selectHistory.all(ownerId, limit).map(rowToPrompt));
    },
  };
}

function rowToPrompt(row: PromptRow): PromptRecord {
  return {
    id: row.id,
    ownerId: row.owner_id,
    content: row.content,
    createdAt: row.created_at,
    activatedAt: row.activated_at,
    deactivatedAt: row.deactivated_at,
    active: row.active === 1,
  };
}
