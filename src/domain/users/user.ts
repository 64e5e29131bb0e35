import { InvalidUserIdError } from './errors.js';

/** Largest id a user can carry (unsigned 64-bit). */
export const MAX_USER_ID = 2n ** 64n - 1n;

/** Id of a user that no store has assigned an id to yet. */
export const UNASSIGNED_USER_ID = 0n;

/**
 * User entity. Immutable: stores that assign ids hand back a new value
 * built with `withId`.
 */
export class User {
  private constructor(
    public readonly id: bigint,
    public readonly name: string,
    public readonly email: string
  ) {}

  /**
   * Create a user that has not been persisted yet.
   * Neither field is validated.
   */
  static create(name: string, email: string): User {
    return new User(UNASSIGNED_USER_ID, name, email);
  }

  /**
   * Loose email check: only looks for an `@`.
   * Not called on creation; callers decide whether to enforce it.
   */
  validateEmail(): boolean {
    return this.email.includes('@');
  }

  withId(id: bigint): User {
    if (id < 0n || id > MAX_USER_ID) {
      throw new InvalidUserIdError(`User id out of range: ${id}`);
    }
    return new User(id, this.name, this.email);
  }

  isPersisted(): boolean {
    return this.id !== UNASSIGNED_USER_ID;
  }
}
