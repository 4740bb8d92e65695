import { describe, it, expect, beforeEach } from 'vitest';
import type Database from 'better-sqlite3';
import { openDatabase, createPromptStore } from './index.js';
import type { PromptStore } from './index.js';
import { NotFound, PersistenceError } from '../core/errors.js';
import { countActive } from '../testing/fixtures.js';

describe('prompt store', () => {
  let db: Database.Database;
  let prompts: PromptStore;

  beforeEach(() => {
    db = openDatabase(':memory:');
    prompts = createPromptStore(db);
  });

  it('creates an active record', () => {
    const record = prompts.create('u1', 'be brief');
    expect(record).toMatchObject({ ownerId: 'u1', content: 'be brief', active: true, deactivatedAt: null });
    expect(record.activatedAt).toBe(record.createdAt);
    expect(prompts.findActive('u1')?.id).toBe(record.id);
  });

  it('deactivates the previous record when a new one is created', () => {
    const first = prompts.create('u1', 'first');
    const second = prompts.create('u1', 'second');

    const history = prompts.history('u1', 10);
    expect(history.map(r => [r.id, r.active])).toEqual([
      [second.id, true],
      [first.id, false],
    ]);
    expect(history[1]?.deactivatedAt).not.toBeNull();
    expect(countActive(db, 'u1')).toBe(1);
  });

  it('keeps owners independent', () => {
    prompts.create('u1', 'mine');
    prompts.create('u2', 'theirs');
    expect(prompts.findActive('u1')?.content).toBe('mine');
    expect(prompts.findActive('u2')?.content).toBe('theirs');
  });

  it('deactivate returns the record and leaves it in history', () => {
    const record = prompts.create('u1', 'x');
    const previous = prompts.deactivate('u1');

    expect(previous).toMatchObject({ id: record.id, active: false });
    expect(prompts.findActive('u1')).toBeNull();
    expect(prompts.history('u1', 10)).toHaveLength(1);
  });

  it('deactivate without an active record returns null', () => {
    expect(prompts.deactivate('nobody')).toBeNull();
  });

  it('reactivates an older record and deactivates the current one', () => {
    const p1 = prompts.create('u1', 'one');
    const p2 = prompts.create('u1', 'two');

    const reused = prompts.reactivate('u1', p1.id);

    expect(reused).toMatchObject({ id: p1.id, active: true, deactivatedAt: null });
    const history = prompts.history('u1', 10);
    expect(history.find(r => r.id === p2.id)?.active).toBe(false);
    expect(countActive(db, 'u1')).toBe(1);
  });

  it('reactivating the already-active record keeps it active', () => {
    const p1 = prompts.create('u1', 'one');
    expect(prompts.reactivate('u1', p1.id).active).toBe(true);
    expect(countActive(db, 'u1')).toBe(1);
  });

  it('refuses to reactivate another owner\'s record and changes nothing', () => {
    const mine = prompts.create('u1', 'mine');
    const theirs = prompts.create('u2', 'theirs');

    expect(() => prompts.reactivate('u1', theirs.id)).toThrow(NotFound);
    expect(() => prompts.reactivate('u1', 9999)).toThrow(NotFound);
    expect(prompts.findActive('u1')?.id).toBe(mine.id);
    expect(prompts.findActive('u2')?.id).toBe(theirs.id);
  });

  it('limits history', () => {
    for (let i = 0; i < 5; i++) prompts.create('u1', `p${i}`);
    expect(prompts.history('u1', 3).map(r => r.content)).toEqual(['p4', 'p3', 'p2']);
  });

  it('the schema rejects a second active row for the same owner', () => {
    prompts.create('u1', 'one');
    const insert = db.prepare(
      "INSERT INTO prompts (owner_id, content, created_at, active) VALUES ('u1', 'two', '2024-01-01', 1)"
    );
    expect(() => insert.run()).toThrow(/UNIQUE/);
  });

  it('wraps driver failures in PersistenceError', () => {
    db.close();
    expect(() => prompts.create('u1', 'x')).toThrow(PersistenceError);
  });
});
