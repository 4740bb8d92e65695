import { describe, it, expect, vi } from 'vitest';
import { openDatabase, createForceStateStore } from '../db/index.js';
import type { ForceStateStore } from '../db/index.js';
import { createForceMode } from './force-mode.js';
import { PersistenceError } from './errors.js';

describe('force mode', () => {
  it('starts disabled without a store', () => {
    expect(createForceMode().current()).toEqual({ enabled: false, setBy: null, setAt: null });
  });

  it('records who enabled it', () => {
    const force = createForceMode();
    const state = force.enable('admin-1');
    expect(state.enabled).toBe(true);
    expect(state.setBy).toBe('admin-1');
    expect(state.setAt).not.toBeNull();
  });

  it('enable and disable are idempotent', () => {
    const force = createForceMode();
    const on = force.enable('a');
    expect(force.enable('b')).toBe(on);
    const off = force.disable('a');
    expect(force.disable('b')).toBe(off);
    expect(off.enabled).toBe(false);
  });

  it('survives a restart when persisted', () => {
    const db = openDatabase(':memory:');
    createForceMode(createForceStateStore(db)).enable('admin-1');

    const restarted = createForceMode(createForceStateStore(db));
    expect(restarted.enabled).toBe(true);
    expect(restarted.current().setBy).toBe('admin-1');

    restarted.disable('admin-1');
    expect(createForceMode(createForceStateStore(db)).enabled).toBe(false);
  });

  it('keeps the old state when saving fails', () => {
    const store: ForceStateStore = {
      load: () => null,
      save: vi.fn(() => {
        throw new PersistenceError('forceState.save failed');
      }),
    };
    const force = createForceMode(store);

    expect(() => force.enable('admin-1')).toThrow(PersistenceError);
    expect(force.enabled).toBe(false);
  });
});
