import { z } from 'zod';
import { MAX_USER_ID } from '../domain/users/user.js';

const configSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'test', 'production'])
    .default('development'),
  USER_ID_START: z
    .string()
    .regex(/^\d+$/, 'Expected a decimal integer')
    .transform((value) => BigInt(value))
    .refine((id) => id >= 1n && id <= MAX_USER_ID, {
      message: 'Must be between 1 and 2^64 - 1',
    })
    .default('1'),
  // dotenv yields '' for `KEY=`; treat it as unset
  USER_STORE_CAPACITY: z.preprocess(
    (value) => (value === '' ? undefined : value),
    z.coerce.number().int().positive().optional()
  ),
  DEMO_USER_NAME: z.string().default('Alice'),
  DEMO_USER_EMAIL: z.string().default('alice@example.com'),
});

export interface AppConfig {
  env: 'development' | 'test' | 'production';
  store: {
    firstId: bigint;
    capacity?: number;
  };
  demoUser: {
    name: string;
    email: string;
  };
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Read and validate settings from the environment.
 * Error messages name the offending variables but never their values.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.errors
      .map((e) => `${e.path.join('.')}: ${e.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }

  const data = parsed.data;
  return {
    env: data.NODE_ENV,
    store: {
      firstId: data.USER_ID_START,
      capacity: data.USER_STORE_CAPACITY,
    },
    demoUser: {
      name: data.DEMO_USER_NAME,
      email: data.DEMO_USER_EMAIL,
    },
  };
}
