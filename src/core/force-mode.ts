/**
 * Force mode — the admin switch that masks every custom prompt.
 *
 * One instance per process, handed to whoever needs it. The state is
 * a frozen object swapped by reference, so readers always get a whole
 * value. When a store is given, the new state is written before the
 * swap; a failed write leaves the old state in place.
 */

import type { ForceState } from '../types/index.js';
import type { ForceStateStore } from '../db/index.js';

const DISABLED: ForceState = Object.freeze({ enabled: false, setBy: null, setAt: null });

export type ForceMode = ReturnType<typeof createForceMode>;

export function createForceMode(store: ForceStateStore | null = null) {
  const persisted = store?.load();
  let state: Readonly<ForceState> = persisted ? Object.freeze({ ...persisted }) : DISABLED;

  function replace(next: ForceState): Readonly<ForceState> {
    store?.save(next);
    state = Object.freeze(next);
    return state;
  }

  return {
    current(): Readonly<ForceState> {
      return state;
    },

    get enabled(): boolean {
      return state.enabled;
    },

    enable(actor: string): Readonly<ForceState> {
      if (state.enabled) return state;
      return replace({ enabled: true, setBy: actor, setAt: new Date().toISOString() });
    },

    disable(actor: string): Readonly<ForceState> {
      if (!state.enabled) return state;
      return replace({ enabled: false, setBy: actor, setAt: new Date().toISOString() });
    },
  };
}
