import { MAX_USER_ID, User } from '../../domain/users/user.js';
import { InvalidUserIdError } from '../../domain/users/errors.js';
import { saveFailed, saved } from '../../domain/users/repository.js';
import type { SaveResult, UserRepository } from '../../domain/users/repository.js';

export interface InMemoryUserRepoOptions {
  /** First id handed out to unsaved users, in [1, MAX_USER_ID]. Defaults to 1. */
  firstId?: bigint;
  /** Maximum number of stored users. Unbounded when omitted. */
  capacity?: number;
}

/**
 * Map-backed user store.
 * Unsaved users (id 0) get the next auto-increment id; users that already
 * carry an id are upserted under it.
 */
export class InMemoryUserRepo implements UserRepository {
  private readonly users = new Map<bigint, User>();
  private nextId: bigint;
  private readonly capacity?: number;

  constructor(options: InMemoryUserRepoOptions = {}) {
    const firstId = options.firstId ?? 1n;
    if (firstId < 1n || firstId > MAX_USER_ID) {
      throw new InvalidUserIdError(`First user id out of range: ${firstId}`);
    }
    this.nextId = firstId;
    this.capacity = options.capacity;
  }

  findById(id: bigint): User | null {
    return this.users.get(id) ?? null;
  }

  save(user: User): SaveResult {
    const isNew = !user.isPersisted() || !this.users.has(user.id);
    if (isNew && this.capacity !== undefined && this.users.size >= this.capacity) {
      return saveFailed(`User store is full (capacity ${this.capacity})`);
    }

    if (user.isPersisted()) {
      this.users.set(user.id, user);
      // Keep assigned ids clear of explicitly saved ones
      if (user.id >= this.nextId) {
        this.nextId = user.id + 1n;
      }
      return saved();
    }

    if (this.nextId > MAX_USER_ID) {
      return saveFailed('User id space exhausted');
    }

    const stored = user.withId(this.nextId);
    this.users.set(stored.id, stored);
    this.nextId += 1n;
    return saved();
  }

  count(): number {
    return this.users.size;
  }
}
