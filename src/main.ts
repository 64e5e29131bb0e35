import dotenv from 'dotenv';
import { User } from './domain/users/user.js';
import { UserService } from './application/users/userService.js';
import { InMemoryUserRepo } from './infra/store/inMemoryUserRepo.js';
import { loadConfig } from './infra/config.js';

/**
 * Smoke-test path: build the demo user, print it, then save it through the
 * service. Uses `repo` when given, otherwise a store built from the config.
 * Returns the process exit code.
 */
export function main(
  env: NodeJS.ProcessEnv = process.env,
  repo?: InMemoryUserRepo
): number {
  const config = loadConfig(env);

  const user = User.create(config.demoUser.name, config.demoUser.email);
  console.log(`Created user: ${user.name}`);

  const store = repo ?? new InMemoryUserRepo(config.store);
  const service = new UserService(store);
  const result = service.createUser(user.name, user.email);
  if (!result.ok) {
    console.error(`Failed to save user: ${result.error}`);
    return 1;
  }

  console.log(`Users stored: ${store.count()}`);
  return 0;
}

// Run if called directly
if (import.meta.url === `file://${process.argv[1]}` || process.argv[1]?.endsWith('main.ts')) {
  dotenv.config();
  try {
    process.exitCode = main();
  } catch (error) {
    console.error('Fatal error:', error);
    process.exitCode = 1;
  }
}
