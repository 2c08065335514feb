/**
 * Auth module - registration, login and session resolution
 * @module auth
 */

import type { FastifyInstance, FastifyPluginOptions, FastifyRequest } from 'fastify';
import bcrypt from 'bcryptjs';
import { z } from 'zod';
import { isUniqueViolation, type Queryable } from '../database/index.js';
import { nowIso, parseBody, type Clock } from '../context/index.js';
import { ConflictError, RateLimitError, UnauthorizedError } from '../errors/index.js';
import { RateLimiter } from './rate-limit.js';

export { RateLimiter } from './rate-limit.js';

/**
 * User as exposed over the API. The hash never leaves this module.
 */
export interface PublicUser {
  id: number;
  username: string;
}

type UserRow = {
  id: number;
  username: string;
  password_hash: string;
};

const REQUIRED = 'Username and password are required';

const loginSchema = z.object(
  {
    username: z.string({ required_error: REQUIRED, invalid_type_error: REQUIRED }).trim().toLowerCase().min(1, REQUIRED),
    password: z.string({ required_error: REQUIRED, invalid_type_error: REQUIRED }).min(1, REQUIRED),
  },
  { invalid_type_error: 'Invalid request body' }
);

const registerSchema = z.object(
  {
    username: z
      .string({ required_error: REQUIRED, invalid_type_error: REQUIRED })
      .trim()
      .toLowerCase()
      .min(1, REQUIRED)
      .regex(/^[a-z0-9_]{3,30}$/, 'Username must be 3-30 characters (letters, numbers, underscore)'),
    password: z
      .string({ required_error: REQUIRED, invalid_type_error: REQUIRED })
      .min(1, REQUIRED)
      .min(6, 'Password must be at least 6 characters')
      .max(128, 'Password is too long'),
  },
  { invalid_type_error: 'Invalid request body' }
);

export type Credentials = z.infer<typeof loginSchema>;

/**
 * Create a user with a salted bcrypt hash
 */
export async function registerUser(
  db: Queryable,
  clock: Clock,
  credentials: Credentials,
  rounds: number
): Promise<PublicUser> {
  const existing = await db.get('SELECT id FROM users WHERE username = ?', [credentials.username]);
  if (existing) {
    throw new ConflictError('Username already taken');
  }

  const hash = await bcrypt.hash(credentials.password, rounds);
  try {
    const id = await db.insert(
      'INSERT INTO users (username, password_hash, created_at) VALUES (?, ?, ?)',
      [credentials.username, hash, nowIso(clock)]
    );
    return { id, username: credentials.username };
  } catch (error) {
    // Another registration took the name while the password was hashing
    if (isUniqueViolation(error)) {
      throw new ConflictError('Username already taken');
    }
    throw error;
  }
}

/**
 * Check a username/password pair. Unknown users and wrong passwords fail
 * with the same error.
 */
export async function verifyCredentials(db: Queryable, credentials: Credentials): Promise<PublicUser> {
  const user = await db.get<UserRow>(
    'SELECT id, username, password_hash FROM users WHERE username = ?',
    [credentials.username]
  );
  const valid = user ? await bcrypt.compare(credentials.password, user.password_hash) : false;
  if (!user || !valid) {
    throw new UnauthorizedError('Invalid credentials');
  }
  return { id: user.id, username: user.username };
}

/**
 * preHandler resolving the session into `request.actor`
 */
export async function authenticate(request: FastifyRequest): Promise<void> {
  const userId = request.session.get('userId');
  if (userId === undefined) {
    throw new UnauthorizedError();
  }

  const user = await request.server.db.get<{ id: number; username: string }>(
    'SELECT id, username FROM users WHERE id = ?',
    [userId]
  );
  if (!user) {
    throw new UnauthorizedError();
  }
  request.actor = { userId: user.id, username: user.username };
}

async function startSession(request: FastifyRequest, user: PublicUser): Promise<void> {
  // New session id on every login to prevent fixation
  await request.session.regenerate();
  request.session.set('userId', user.id);
  request.session.set('username', user.username);
}

export interface AuthRoutesOptions extends FastifyPluginOptions {
  bcryptRounds: number;
  rateLimiter: RateLimiter;
}

/**
 * Register auth routes
 */
export async function registerAuthRoutes(fastify: FastifyInstance, options: AuthRoutesOptions) {
  const { bcryptRounds, rateLimiter } = options;

  const limit = (request: FastifyRequest) => {
    if (!rateLimiter.attempt(`${request.ip}:auth`)) {
      request.log.warn({ ip: request.ip }, 'Auth rate limit hit');
      throw new RateLimitError();
    }
  };

  /**
   * POST /api/register - Create an account and sign in
   */
  fastify.post('/register', async (request, reply) => {
    limit(request);
    const credentials = parseBody(registerSchema, request.body);
    const user = await registerUser(fastify.db, fastify.clock, credentials, bcryptRounds);
    await startSession(request, user);
    fastify.audit.record('REGISTER', { username: user.username, userId: user.id, ip: request.ip });

    reply.code(201);
    return { ok: true, user };
  });

  /**
   * POST /api/login - Sign in
   */
  fastify.post('/login', async (request) => {
    limit(request);
    const credentials = parseBody(loginSchema, request.body);

    let user: PublicUser;
    try {
      user = await verifyCredentials(fastify.db, credentials);
    } catch (error) {
      if (error instanceof UnauthorizedError) {
        fastify.audit.record('LOGIN_FAILED', { username: credentials.username, ip: request.ip });
      }
      throw error;
    }

    await startSession(request, user);
    fastify.audit.record('LOGIN_SUCCESS', { username: user.username, userId: user.id, ip: request.ip });
    return { ok: true, user };
  });

  /**
   * POST /api/logout - End the session
   */
  fastify.post('/logout', async (request) => {
    const username = request.session.get('username');
    await request.session.destroy();
    if (username) {
      fastify.audit.record('LOGOUT', { username, ip: request.ip });
    }
    return { ok: true };
  });

  /**
   * GET /api/me - Who the session belongs to
   */
  fastify.get('/me', async (request) => {
    const userId = request.session.get('userId');
    if (userId === undefined) {
      return { loggedIn: false };
    }
    const user = await fastify.db.get<{ id: number; username: string }>(
      'SELECT id, username FROM users WHERE id = ?',
      [userId]
    );
    if (!user) {
      return { loggedIn: false };
    }
    return { loggedIn: true, user: { id: user.id, username: user.username } };
  });
}
