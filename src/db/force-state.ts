import type Database from 'better-sqlite3';
import type { ForceState } from '../types/index.js';
import { guard } from './util.js';

interface ForceStateRow {
  enabled: number;
  set_by: string | null;
  set_at: string | null;
}

export type ForceStateStore = ReturnType<typeof createForceStateStore>;

export function createForceStateStore(db: Database.Database) {
  const select = db.prepare<[], ForceStateRow>(
    'SELECT enabled, set_by, set_at FROM force_state WHERE id = 1'
  );

  const upsert = db.prepare<[number, string | null, string | null]>(`
    INSERT INTO force_state (id, enabled, set_by, set_at)
    VALUES (1, ?, ?, ?)
    ON CONFLICT(id) DO UPDATE SET
      enabled = excluded.enabled,
      set_by = excluded.set_by,
      set_at = excluded.set_at
  `);

  return {
    load(): ForceState | null {
      return guard('forceState.load', () => {
        const row = select.get();
        if (!row) return null;
        return { enabled: row.enabled === 1, setBy: row.set_by, setAt: row.set_at };
      });
    },

    save(state: ForceState): void {
      guard('forceState.save', () => {
        upsert.run(state.enabled ? 1 : 0, state.setBy, state.setAt);
      });
    },
  };
}
