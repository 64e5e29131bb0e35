export { User, MAX_USER_ID, UNASSIGNED_USER_ID } from './domain/users/user.js';
export { DomainError, InvalidUserIdError } from './domain/users/errors.js';
export { saved, saveFailed } from './domain/users/repository.js';
export type { SaveResult, UserRepository } from './domain/users/repository.js';
export { UserService } from './application/users/userService.js';
export { InMemoryUserRepo } from './infra/store/inMemoryUserRepo.js';
export type { InMemoryUserRepoOptions } from './infra/store/inMemoryUserRepo.js';
export { loadConfig, ConfigError } from './infra/config.js';
export type { AppConfig } from './infra/config.js';
