import type Database from 'better-sqlite3';
import type { PermissionLevel, User } from '../types/index.js';
import { guard, now } from './util.js';

interface UserRow {
  id: string;
  permission_level: PermissionLevel;
  created_at: string;
  updated_at: string;
}

export type UserStore = ReturnType<typeof createUserStore>;

export function createUserStore(db: Database.Database) {
  const select = db.prepare<[string], UserRow>('SELECT * FROM users WHERE id = ?');

  const insertIfMissing = db.prepare<[string, PermissionLevel, string, string]>(`
    INSERT INTO users (id, permission_level, created_at, updated_at)
    VALUES (?, ?, ?, ?)
    ON CONFLICT(id) DO NOTHING
  `);

  const upsertLevel = db.prepare<[string, PermissionLevel, string, string]>(`
    INSERT INTO users (id, permission_level, created_at, updated_at)
    VALUES (?, ?, ?, ?)
    ON CONFLICT(id) DO UPDATE SET
      permission_level = excluded.permission_level,
      updated_at = excluded.updated_at
  `);

  function read(id: string): User | null {
    const row = select.get(id);
    return row ? rowToUser(row) : null;
  }

  function readExisting(id: string): User {
    const user = read(id);
    if (!user) throw new Error(`User ${id} vanished after write`);
    return user;
  }

  // grant never downgrades an admin; everyone else ends up standard
  const grantTx = db.transaction((id: string): User => {
    const current = read(id);
    if (current?.level === 'admin' || current?.level === 'standard') return current;
    const ts = now();
    upsertLevel.run(id, 'standard', ts, ts);
    return readExisting(id);
  });

  const revokeTx = db.transaction((id: string): User => {
    const current = read(id);
    if (current?.level === 'none') return current;
    const ts = now();
    upsertLevel.run(id, 'none', ts, ts);
    return readExisting(id);
  });

  const seedTx = db.transaction((ids: readonly string[]): number => {
    let seeded = 0;
    for (const id of ids) {
      const ts = now();
      seeded += insertIfMissing.run(id, 'admin', ts, ts).changes;
    }
    return seeded;
  });

  return {
    find(id: string): User | null {
      return guard('users.find', () => read(id));
    },

    /** Create the user at `level` on first sight; existing rows are left alone. */
    ensure(id: string, level: PermissionLevel): User {
      return guard('users.ensure', () => {
        const ts = now();
        insertIfMissing.run(id, level, ts, ts);
        return readExisting(id);
      });
    },

    grant(id: string): User {
      return guard('users.grant', () => grantTx.immediate(id));
    },

    revoke(id: string): User {
      return guard('users.revoke', () => revokeTx.immediate(id));
    },

    /** Give allow-listed admins an admin row the first time they appear. */
    seedAdmins(ids: readonly string[]): number {
      return guard('users.seedAdmins', () => seedTx.immediate(ids));
    },
  };
}

function rowToUser(row: UserRow): User {
  return {
    id: row.id,
    level: row.permission_level,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
