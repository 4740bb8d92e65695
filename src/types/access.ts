/**
 * Access levels.
 *
 * Every user the front-end sends us gets a row the first time they
 * show up. Nobody is ever deleted: revoking access drops the level
 * to `none`, which blocks everything but keeps the history.
 */

export type PermissionLevel = 'none' | 'standard' | 'admin';

/** Levels a guard can ask for. `none` is never a requirement. */
export type RequiredLevel = Exclude<PermissionLevel, 'none'>;

export interface User {
  /** Opaque, stable id supplied by the front-end */
  id: string;
  level: PermissionLevel;
  createdAt: string;
  updatedAt: string;
}

/** Opaque reason codes, for operator logs only */
export type DenialReason =
  | 'unknown-user'
  | 'revoked'
  | 'not-allowlisted'
  | 'insufficient-level';

export type Authorization =
  | { ok: true }
  | { ok: false; reason: DenialReason };
