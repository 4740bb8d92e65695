/**
 * Access control gate.
 *
 * standard: the user has a row and has not been revoked.
 * admin:    the id is on the static allow-list (checked first, it never
 *           touches the database) AND the stored level is admin.
 *
 * authorize() has no side effects and says nothing about why it said
 * no beyond an opaque reason code for the logs.
 */

import type { Authorization, RequiredLevel, User } from '../types/index.js';
import { PermissionDenied } from './errors.js';

export interface AccessGateConfig {
  /** Static admin allow-list from config / env */
  adminIds: Iterable<string>;
  /** Reads the stored user row */
  findUser: (id: string) => User | null;
}

export type AccessGate = ReturnType<typeof createAccessGate>;

export function createAccessGate(config: AccessGateConfig) {
  const adminIds: ReadonlySet<string> = new Set(config.adminIds);
  const { findUser } = config;

  function authorize(userId: string, required: RequiredLevel): Authorization {
    if (required === 'admin' && !adminIds.has(userId)) {
      return { ok: false, reason: 'not-allowlisted' };
    }

    const user = findUser(userId);
    if (!user) return { ok: false, reason: 'unknown-user' };
    if (user.level === 'none') return { ok: false, reason: 'revoked' };
    if (required === 'admin' && user.level !== 'admin') {
      return { ok: false, reason: 'insufficient-level' };
    }

    return { ok: true };
  }

  return {
    authorize,

    /** Guard form: throws PermissionDenied instead of returning. */
    require(userId: string, required: RequiredLevel): void {
      const result = authorize(userId, required);
      if (!result.ok) {
        console.warn(`[access] denied ${userId} (${required}): ${result.reason}`);
        throw new PermissionDenied();
      }
    },
  };
}
