import Database from 'better-sqlite3';
import { SCHEMA } from './schema.js';

export function openDatabase(path: string = 'switchboard.db'): Database.Database {
  const db = new Database(path);
  db.pragma('journal_mode = WAL');
  db.pragma('busy_timeout = 5000');
  db.exec(SCHEMA);
  return db;
}

export { guard } from './util.js';
export { createUserStore, type UserStore } from './users.js';
export { createPromptStore, type PromptStore } from './prompts.js';
export { createForceStateStore, type ForceStateStore } from './force-state.js';
