import { User } from '../../domain/users/user.js';
import type { SaveResult, UserRepository } from '../../domain/users/repository.js';

export class UserService {
  constructor(private readonly repo: UserRepository) {}

  getUser(id: bigint): User | null {
    return this.repo.findById(id);
  }

  /**
   * Build a new user and hand it to the repository.
   * The email is not validated and the repository's result is returned as is.
   */
  createUser(name: string, email: string): SaveResult {
    const user = User.create(name, email);
    return this.repo.save(user);
  }
}
