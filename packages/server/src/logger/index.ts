/**
 * Logger setup shared by the HTTP server and the audit trail
 * @module logger
 */

import type { FastifyBaseLogger } from 'fastify';
import pino, { type LoggerOptions } from 'pino';
import type { AppConfig } from '../config/index.js';

/**
 * Paths never written to any log
 */
export const REDACTED_PATHS = [
  'password',
  '*.password',
  'req.headers.cookie',
  'req.headers.authorization',
  'res.headers["set-cookie"]',
  'session.secret',
];

/**
 * Build pino options from the server configuration
 */
export function buildLoggerOptions(config: Pick<AppConfig, 'logLevel' | 'prettyLogs'>): LoggerOptions {
  const options: LoggerOptions = {
    level: config.logLevel,
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: {
      paths: REDACTED_PATHS,
      censor: '[REDACTED]',
    },
  };

  if (config.prettyLogs) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    };
  }

  return options;
}

/**
 * Authentication events recorded by the audit logger
 */
export type AuditEvent = 'REGISTER' | 'LOGIN_SUCCESS' | 'LOGIN_FAILED' | 'LOGOUT';

/**
 * Audit trail for authentication events, kept apart from request logs
 */
export interface AuditLogger {
  record(event: AuditEvent, details: { username: string; ip?: string; userId?: number }): void;
}

/**
 * Create an audit logger writing through a dedicated pino child
 */
export function createAuditLogger(base: FastifyBaseLogger): AuditLogger {
  const audit = base.child({ component: 'audit' });

  return {
    record(event, details) {
      if (event === 'LOGIN_FAILED') {
        audit.warn({ event, ...details }, `${event} user=${details.username}`);
      } else {
        audit.info({ event, ...details }, `${event} user=${details.username}`);
      }
    },
  };
}
