import { describe, it, expect } from 'vitest';
import { InMemoryUserRepo, User, UserService, saveFailed, saved } from '../index.js';

describe('package entry', () => {
  it('should expose a working service stack', () => {
    const service = new UserService(new InMemoryUserRepo());

    expect(service.createUser('Alice', 'alice@example.com')).toEqual(saved());
    expect(service.getUser(1n)).toBeInstanceOf(User);
    expect(saveFailed('nope')).toEqual({ ok: false, error: 'nope' });
  });
});
