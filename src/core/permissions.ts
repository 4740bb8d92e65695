/**
 * Permission management: grant, revoke, check.
 *
 * grant/revoke are admin-only. check is self-service for your own id
 * and admin-only for anyone else's. Writes go through the user store,
 * which serializes them per row (last committed wins).
 */

import type { PermissionLevel, User } from '../types/index.js';
import type { UserStore } from '../db/index.js';
import type { AccessGate } from './access.js';

export interface PermissionServiceConfig {
  users: UserStore;
  gate: AccessGate;
  /** Level new users get on first interaction */
  defaultLevel: PermissionLevel;
}

export type PermissionService = ReturnType<typeof createPermissionService>;

export function createPermissionService(config: PermissionServiceConfig) {
  const { users, gate, defaultLevel } = config;

  return {
    /** Called on every interaction before any guard runs */
    ensureUser(id: string): User {
      return users.ensure(id, defaultLevel);
    },

    grant(actor: string, target: string): User {
      gate.require(actor, 'admin');
      const user = users.grant(target);
      console.log(`[access] ${actor} granted access to ${target} (now ${user.level})`);
      return user;
    },

    revoke(actor: string, target: string): User {
      gate.require(actor, 'admin');
      const user = users.revoke(target);
      console.log(`[access] ${actor} revoked access for ${target}`);
      return user;
    },

    /** Unknown users read as `none`; nothing is created. */
    check(actor: string, target: string): PermissionLevel {
      gate.require(actor, actor === target ? 'standard' : 'admin');
      return users.find(target)?.level ?? 'none';
    },
  };
}
