/**
 * Error taxonomy and the HTTP error boundary
 * @module errors
 */

import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';

/**
 * Stable machine-readable error codes
 */
export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'UNAUTHORIZED'
  | 'FORBIDDEN'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'RATE_LIMITED'
  | 'INTERNAL_ERROR';

/**
 * JSON error payload returned to clients
 */
export interface ErrorBody {
  error: string;
  code: ErrorCode;
}

/**
 * Base class for every error a handler raises on purpose
 */
export abstract class AppError extends Error {
  abstract readonly statusCode: number;
  abstract readonly code: ErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }

  toBody(): ErrorBody {
    return { error: this.message, code: this.code };
  }
}

export class ValidationError extends AppError {
  readonly statusCode = 400;
  readonly code = 'VALIDATION_ERROR' as const;
}

export class UnauthorizedError extends AppError {
  readonly statusCode = 401;
  readonly code = 'UNAUTHORIZED' as const;

  constructor(message = 'Unauthorized') {
    super(message);
  }
}

export class ForbiddenError extends AppError {
  readonly statusCode = 403;
  readonly code = 'FORBIDDEN' as const;

  constructor(message = 'Forbidden') {
    super(message);
  }
}

export class NotFoundError extends AppError {
  readonly statusCode = 404;
  readonly code = 'NOT_FOUND' as const;

  constructor(message = 'Not found') {
    super(message);
  }
}

export class ConflictError extends AppError {
  readonly statusCode = 409;
  readonly code = 'CONFLICT' as const;
}

export class RateLimitError extends AppError {
  readonly statusCode = 429;
  readonly code = 'RATE_LIMITED' as const;

  constructor(message = 'Too many attempts. Try again later.') {
    super(message);
  }
}

/**
 * Convert a ZodError into the first human-readable issue
 */
export function fromZodError(error: ZodError): ValidationError {
  const issue = error.issues[0];
  if (!issue) {
    return new ValidationError('Invalid request');
  }
  return new ValidationError(issue.message);
}

function isClientError(error: unknown): error is FastifyError {
  return (
    error instanceof Error &&
    'statusCode' in error &&
    typeof error.statusCode === 'number' &&
    error.statusCode >= 400 &&
    error.statusCode < 500
  );
}

/**
 * Install the error boundary: domain errors become JSON payloads, anything
 * unexpected is logged and reported as a generic 500.
 */
export function registerErrorHandler(fastify: FastifyInstance): void {
  fastify.setErrorHandler<Error>((error: Error, request: FastifyRequest, reply: FastifyReply) => {
    if (error instanceof AppError) {
      return reply.code(error.statusCode).send(error.toBody());
    }

    if (error instanceof ZodError) {
      return reply.code(400).send(fromZodError(error).toBody());
    }

    // Body parsing, payload size and similar framework-level client errors
    if (isClientError(error)) {
      const body: ErrorBody = { error: error.message, code: 'VALIDATION_ERROR' };
      return reply.code(error.statusCode ?? 400).send(body);
    }

    request.log.error(
      { err: error, method: request.method, url: request.url, userId: request.actor?.userId },
      'Unhandled error while processing request'
    );
    const body: ErrorBody = { error: 'Internal server error', code: 'INTERNAL_ERROR' };
    return reply.code(500).send(body);
  });

  fastify.setNotFoundHandler((_request, reply) => {
    const body: ErrorBody = { error: 'Not found', code: 'NOT_FOUND' };
    return reply.code(404).send(body);
  });
}
