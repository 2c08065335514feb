/**
 * Environment-driven server configuration
 * @module config
 */

import { randomBytes } from 'node:crypto';
import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  LOG_FORMAT: z.enum(['json', 'pretty']).optional(),
  DATABASE_URL: z.string().url().optional(),
  DATABASE_PATH: z.string().min(1).default('focusboard.db'),
  SESSION_SECRET: z.string().min(32, 'SESSION_SECRET must be at least 32 characters').optional(),
  SESSION_MAX_AGE_DAYS: z.coerce.number().int().positive().default(30),
  BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(12),
  CORS_ORIGIN: z.string().default('*'),
  CORS_CREDENTIALS: booleanFlag.default('false'),
  AUTH_RATE_LIMIT: z.coerce.number().int().positive().default(10),
  AUTH_RATE_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
});

/**
 * Database selection: a connection string means PostgreSQL, otherwise a
 * single SQLite file (or `:memory:`).
 */
export type DatabaseConfig =
  | { backend: 'postgres'; url: string }
  | { backend: 'sqlite'; path: string };

/**
 * Resolved server configuration
 */
export interface AppConfig {
  env: 'development' | 'production' | 'test';
  port: number;
  host: string;
  logLevel: string;
  prettyLogs: boolean;
  database: DatabaseConfig;
  session: {
    secret: string;
    maxAgeMs: number;
    secureCookie: boolean;
  };
  bcryptRounds: number;
  cors: {
    origin: string | string[];
    credentials: boolean;
  };
  authRateLimit: {
    max: number;
    windowMs: number;
  };
}

/**
 * Error raised when the environment does not describe a usable configuration
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function defaultLogLevel(env: AppConfig['env']): string {
  switch (env) {
    case 'test':
      return 'silent';
    case 'production':
      return 'info';
    default:
      return 'debug';
  }
}

/**
 * Parse and validate configuration from environment variables
 *
 * @param env - Variables to read, usually `process.env`
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const vars = parsed.data;
  const isProduction = vars.NODE_ENV === 'production';

  if (isProduction && !vars.SESSION_SECRET) {
    throw new ConfigError('Invalid configuration: SESSION_SECRET is required in production');
  }

  // Comma-separated origins become a list
  const origin = vars.CORS_ORIGIN.includes(',')
    ? vars.CORS_ORIGIN.split(',').map((o) => o.trim()).filter(Boolean)
    : vars.CORS_ORIGIN;

  return {
    env: vars.NODE_ENV,
    port: vars.PORT,
    host: vars.HOST,
    logLevel: vars.LOG_LEVEL ?? defaultLogLevel(vars.NODE_ENV),
    prettyLogs: vars.LOG_FORMAT ? vars.LOG_FORMAT === 'pretty' : !isProduction && vars.NODE_ENV !== 'test',
    database: vars.DATABASE_URL
      ? { backend: 'postgres', url: vars.DATABASE_URL }
      : { backend: 'sqlite', path: vars.DATABASE_PATH },
    session: {
      secret: vars.SESSION_SECRET ?? randomBytes(32).toString('hex'),
      maxAgeMs: vars.SESSION_MAX_AGE_DAYS * 24 * 60 * 60 * 1000,
      secureCookie: isProduction,
    },
    bcryptRounds: vars.BCRYPT_ROUNDS,
    cors: {
      origin,
      credentials: vars.CORS_CREDENTIALS,
    },
    authRateLimit: {
      max: vars.AUTH_RATE_LIMIT,
      windowMs: vars.AUTH_RATE_WINDOW_MS,
    },
  };
}
