/**
 * Request-scoped context and the server-wide decorations it relies on
 * @module context
 */

import type { FastifyRequest } from 'fastify';
import { z } from 'zod';
import type { Database } from '../database/index.js';
import type { AuditLogger } from '../logger/index.js';
import { UnauthorizedError, ValidationError } from '../errors/index.js';

/**
 * The user a request acts on behalf of, resolved from the session
 */
export interface ActorContext {
  userId: number;
  username: string;
}

/**
 * Source of "now"; injected so date-dependent reads are testable
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

declare module 'fastify' {
  interface FastifyInstance {
    db: Database;
    clock: Clock;
    audit: AuditLogger;
  }

  interface FastifyRequest {
    actor?: ActorContext;
  }

  interface Session {
    userId?: number;
    username?: string;
  }
}

/**
 * Return the acting user or fail with 401
 */
export function requireActor(request: FastifyRequest): ActorContext {
  if (!request.actor) {
    throw new UnauthorizedError();
  }
  return request.actor;
}

/**
 * Current UTC calendar date as `YYYY-MM-DD`
 */
export function todayIso(clock: Clock): string {
  return clock().toISOString().slice(0, 10);
}

/**
 * Current instant as an ISO timestamp
 */
export function nowIso(clock: Clock): string {
  return clock().toISOString();
}

const idSchema = z.coerce.number().int().positive();

/**
 * Parse a positive integer route parameter
 */
export function parseId(value: unknown, label = 'id'): number {
  const result = idSchema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(`Invalid ${label}`);
  }
  return result.data;
}

/**
 * Parse a request body with a zod schema, treating a missing body as `{}`
 */
export function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.output<S> {
  const result = schema.safeParse(body ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ValidationError(issue ? issue.message : 'Invalid request body');
  }
  return result.data;
}
