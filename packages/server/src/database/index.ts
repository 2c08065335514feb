/**
 * Relational persistence behind a single query interface
 * @module database
 */

import type { DatabaseConfig } from '../config/index.js';
import { schemaStatements } from './schema.js';
import { SqliteDatabase } from './sqlite.js';
import { PostgresDatabase } from './postgres.js';

/**
 * Values accepted as query parameters
 */
export type SqlValue = string | number | null;

/**
 * A result row keyed by column name
 */
export type Row = Record<string, unknown>;

/**
 * Which engine a connection talks to
 */
export type Backend = 'sqlite' | 'postgres';

/**
 * Outcome of a write statement
 */
export interface RunResult {
  changes: number;
}

/**
 * Query surface shared by a connection and an open transaction.
 *
 * SQL is written once with `?` placeholders; adapters translate it to
 * their own dialect.
 */
export interface Queryable {
  all<T extends Row = Row>(sql: string, params?: readonly SqlValue[]): Promise<T[]>;
  get<T extends Row = Row>(sql: string, params?: readonly SqlValue[]): Promise<T | undefined>;
  run(sql: string, params?: readonly SqlValue[]): Promise<RunResult>;
  /**
   * Execute an INSERT and return the generated `id`
   */
  insert(sql: string, params?: readonly SqlValue[]): Promise<number>;
}

/**
 * An open database connection
 */
export interface Database extends Queryable {
  readonly backend: Backend;
  /**
   * Run `fn` inside one transaction. A thrown error rolls everything back.
   */
  transaction<T>(fn: (tx: Queryable) => Promise<T>): Promise<T>;
  /**
   * Round-trip a trivial query, for health checks
   */
  ping(): Promise<void>;
  close(): Promise<void>;
}

/**
 * Open the connection selected by configuration
 */
export function openDatabase(config: DatabaseConfig): Database {
  if (config.backend === 'postgres') {
    return new PostgresDatabase(config.url);
  }
  return new SqliteDatabase(config.path);
}

/**
 * Create every table and index that does not exist yet
 */
export async function migrate(db: Database): Promise<void> {
  await db.transaction(async (tx) => {
    for (const statement of schemaStatements(db.backend)) {
      await tx.run(statement);
    }
  });
}

/**
 * Open and migrate a database in one step
 */
export async function createDatabase(config: DatabaseConfig): Promise<Database> {
  const db = openDatabase(config);
  try {
    await migrate(db);
  } catch (error) {
    await db.close();
    throw error;
  }
  return db;
}

// better-sqlite3 and pg error codes for a violated UNIQUE constraint
const UNIQUE_VIOLATION_CODES = new Set(['SQLITE_CONSTRAINT_UNIQUE', '23505']);

/**
 * Whether a driver error reports a duplicate key
 */
export function isUniqueViolation(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    UNIQUE_VIOLATION_CODES.has(error.code)
  );
}

/**
 * Convert a nullable 0/1 column into a boolean
 */
export function toBoolean(value: unknown): boolean {
  return value === 1 || value === true || value === '1';
}

/**
 * Read a numeric column that some drivers return as a string
 */
export function toNumber(value: unknown): number {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    return Number(value);
  }
  return 0;
}
