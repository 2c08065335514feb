/**
 * Client/server engine adapter
 * @module database/postgres
 */

import pg from 'pg';
import type { Database, Queryable, Row, RunResult, SqlValue } from './index.js';

/**
 * Rewrite `?` placeholders to PostgreSQL's `$1..$n`, leaving quoted text alone
 */
export function toPostgresPlaceholders(sql: string): string {
  let out = '';
  let index = 0;
  let quote: "'" | '"' | null = null;

  for (const char of sql) {
    if (quote) {
      if (char === quote) {
        quote = null;
      }
      out += char;
      continue;
    }
    if (char === "'" || char === '"') {
      quote = char;
      out += char;
      continue;
    }
    if (char === '?') {
      index += 1;
      out += `$${index}`;
      continue;
    }
    out += char;
  }

  return out;
}

/**
 * The part of a pool or checked-out client used to run statements
 */
interface Executor {
  query<R extends pg.QueryResultRow = Row>(text: string, values?: SqlValue[]): Promise<pg.QueryResult<R>>;
}

/**
 * A checked-out pool client
 */
export interface TransactionClient extends Executor {
  release(error?: Error | boolean): void;
}

function bindQueryable(executor: Executor): Queryable {
  async function all<T extends Row = Row>(sql: string, params: readonly SqlValue[] = []): Promise<T[]> {
    const result = await executor.query<T>(toPostgresPlaceholders(sql), [...params]);
    return result.rows;
  }

  return {
    all,
    async get<T extends Row = Row>(sql: string, params: readonly SqlValue[] = []): Promise<T | undefined> {
      const rows = await all<T>(sql, params);
      return rows[0];
    },
    async run(sql: string, params: readonly SqlValue[] = []): Promise<RunResult> {
      const result = await executor.query(toPostgresPlaceholders(sql), [...params]);
      return { changes: result.rowCount ?? 0 };
    },
    async insert(sql: string, params: readonly SqlValue[] = []): Promise<number> {
      const rows = await all<{ id: number }>(`${sql} RETURNING id`, params);
      const row = rows[0];
      if (!row) {
        throw new Error('INSERT did not return an id');
      }
      return row.id;
    },
  };
}

/**
 * Run `fn` between BEGIN and COMMIT on one client, then hand the client back.
 * A client whose ROLLBACK fails is destroyed instead of returned to the pool;
 * the caller still sees the error that started the rollback.
 */
export async function runInTransaction<T>(client: TransactionClient, fn: (tx: Queryable) => Promise<T>): Promise<T> {
  let result: T;
  try {
    await client.query('BEGIN');
    result = await fn(bindQueryable(client));
    await client.query('COMMIT');
  } catch (error) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      client.release(rollbackError instanceof Error ? rollbackError : true);
      throw error;
    }
    client.release();
    throw error;
  }
  client.release();
  return result;
}

/**
 * PostgreSQL connection pool via node-postgres
 */
export class PostgresDatabase implements Database {
  readonly backend = 'postgres' as const;

  private pool: pg.Pool;
  private direct: Queryable;

  constructor(connectionString: string) {
    this.pool = new pg.Pool({ connectionString });
    this.direct = bindQueryable(this.pool);
  }

  all<T extends Row = Row>(sql: string, params?: readonly SqlValue[]): Promise<T[]> {
    return this.direct.all<T>(sql, params);
  }

  get<T extends Row = Row>(sql: string, params?: readonly SqlValue[]): Promise<T | undefined> {
    return this.direct.get<T>(sql, params);
  }

  run(sql: string, params?: readonly SqlValue[]): Promise<RunResult> {
    return this.direct.run(sql, params);
  }

  insert(sql: string, params?: readonly SqlValue[]): Promise<number> {
    return this.direct.insert(sql, params);
  }

  async transaction<T>(fn: (tx: Queryable) => Promise<T>): Promise<T> {
    return runInTransaction(await this.pool.connect(), fn);
  }

  async ping(): Promise<void> {
    await this.pool.query('SELECT 1');
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
