/**
 * Focusboard Server
 * HTTP API for lists, items, productivity frameworks and everything around them
 */

import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import cookie from '@fastify/cookie';
import session from '@fastify/session';
import { loadConfig, type AppConfig } from './config/index.js';
import { createDatabase, type Database } from './database/index.js';
import { buildLoggerOptions, createAuditLogger } from './logger/index.js';
import { registerErrorHandler } from './errors/index.js';
import { systemClock, type Clock } from './context/index.js';
import { RateLimiter, registerAuthRoutes } from './auth/index.js';
import { registerListRoutes } from './lists/index.js';
import { registerItemRoutes } from './items/index.js';
import { registerFrameworkRoutes } from './frameworks/index.js';
import { registerTagRoutes } from './tags/index.js';
import { registerCommentRoutes } from './comments/index.js';
import { registerShareRoutes } from './shares/index.js';
import { registerTemplateRoutes } from './templates/index.js';
import { registerTransferRoutes } from './transfer/index.js';
import { registerDashboardRoutes } from './dashboard/index.js';

export const BODY_LIMIT_BYTES = 2 * 1024 * 1024;

export const SECURITY_HEADERS = {
  'X-Content-Type-Options': 'nosniff',
  'X-Frame-Options': 'DENY',
  'Referrer-Policy': 'strict-origin-when-cross-origin',
} as const;

export interface ServerOptions {
  config?: AppConfig;
  /**
   * Already migrated database. The server closes it when it shuts down.
   */
  db?: Database;
  clock?: Clock;
}

export async function createServer(options: ServerOptions = {}): Promise<FastifyInstance> {
  const config = options.config ?? loadConfig();
  const clock = options.clock ?? systemClock;
  const db = options.db ?? (await createDatabase(config.database));

  const server = Fastify({
    logger: buildLoggerOptions(config),
    bodyLimit: BODY_LIMIT_BYTES,
  });

  server.decorate('db', db);
  server.decorate('clock', clock);
  server.decorate('audit', createAuditLogger(server.log));
  server.addHook('onClose', async () => {
    await db.close();
  });

  registerErrorHandler(server);

  await server.register(cors, {
    origin: config.cors.origin,
    credentials: config.cors.credentials,
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
    exposedHeaders: ['Content-Disposition'],
  });

  await server.register(cookie);
  await server.register(session, {
    secret: config.session.secret,
    cookieName: 'sessionId',
    saveUninitialized: false,
    cookie: {
      path: '/',
      httpOnly: true,
      sameSite: 'lax',
      secure: config.session.secureCookie,
      maxAge: config.session.maxAgeMs,
    },
  });

  server.addHook('onSend', async (request, reply, payload) => {
    for (const [name, value] of Object.entries(SECURITY_HEADERS)) {
      reply.header(name, value);
    }
    if (request.url.startsWith('/api/')) {
      reply.header('Cache-Control', 'no-store');
    }
    return payload;
  });

  // Health check endpoint
  server.get('/health', async (request, reply) => {
    try {
      await db.ping();
    } catch (err) {
      request.log.error({ err }, 'Health check failed');
      reply.code(503);
      return { status: 'unhealthy', backend: db.backend };
    }
    return { status: 'ok', backend: db.backend, timestamp: clock().toISOString() };
  });

  const rateLimiter = new RateLimiter({ ...config.authRateLimit, clock });

  await server.register(registerAuthRoutes, { prefix: '/api', bcryptRounds: config.bcryptRounds, rateLimiter });
  await server.register(registerListRoutes, { prefix: '/api' });
  await server.register(registerItemRoutes, { prefix: '/api' });
  await server.register(registerFrameworkRoutes, { prefix: '/api' });
  await server.register(registerTagRoutes, { prefix: '/api' });
  await server.register(registerCommentRoutes, { prefix: '/api' });
  await server.register(registerShareRoutes, { prefix: '/api' });
  await server.register(registerTemplateRoutes, { prefix: '/api' });
  await server.register(registerTransferRoutes, { prefix: '/api' });
  await server.register(registerDashboardRoutes, { prefix: '/api' });

  return server;
}

/**
 * Build the server and listen on the configured address
 */
export async function startServer(config: AppConfig = loadConfig()): Promise<FastifyInstance> {
  const server = await createServer({ config });
  await server.listen({ port: config.port, host: config.host });
  return server;
}

export { loadConfig, ConfigError, type AppConfig, type DatabaseConfig } from './config/index.js';
export { createDatabase, migrate, type Database, type Queryable } from './database/index.js';
export { systemClock, type ActorContext, type Clock } from './context/index.js';
export * from './errors/index.js';
