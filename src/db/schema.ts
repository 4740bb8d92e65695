/**
 * SQLite schema for switchboard.
 *
 * users and prompts are the source of truth. force_state is a
 * singleton row (id = 1), only written when force mode is persisted.
 */

export const SCHEMA = `
  CREATE TABLE IF NOT EXISTS users (
    id               TEXT PRIMARY KEY,
    permission_level TEXT NOT NULL CHECK (permission_level IN ('none', 'standard', 'admin')),
    created_at       TEXT NOT NULL,
    updated_at       TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS prompts (
    id             INTEGER PRIMARY KEY AUTOINCREMENT,
    owner_id       TEXT NOT NULL,
    content        TEXT NOT NULL,
    created_at     TEXT NOT NULL,
    activated_at   TEXT,
    deactivated_at TEXT,
    active         INTEGER NOT NULL DEFAULT 0 CHECK (active IN (0, 1))
  );

  -- At most one active prompt per owner
  CREATE UNIQUE INDEX IF NOT EXISTS idx_prompts_one_active
    ON prompts(owner_id) WHERE active = 1;

  -- History, newest first
  CREATE INDEX IF NOT EXISTS idx_prompts_owner
    ON prompts(owner_id, created_at DESC);

  CREATE TABLE IF NOT EXISTS force_state (
    id      INTEGER PRIMARY KEY CHECK (id = 1),
    enabled INTEGER NOT NULL DEFAULT 0,
    set_by  TEXT,
    set_at  TEXT
  );
`;
