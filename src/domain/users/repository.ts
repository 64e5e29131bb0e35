import type { User } from './user.js';

/**
 * Outcome of a save. Failures carry a human-readable reason instead of
 * being thrown.
 */
export type SaveResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly error: string };

export const saved = (): SaveResult => ({ ok: true });

export const saveFailed = (error: string): SaveResult => ({ ok: false, error });

/**
 * Storage capability for users.
 * Id assignment, idempotency and duplicate handling are up to each store.
 */
export interface UserRepository {
  /** Returns null when no user has this id. */
  findById(id: bigint): User | null;
  save(user: User): SaveResult;
}
