/**
 * Embedded single-file engine adapter
 * @module database/sqlite
 */

import BetterSqlite3 from 'better-sqlite3';
import type { Database, Queryable, Row, RunResult, SqlValue } from './index.js';

/**
 * SQLite connection via better-sqlite3.
 *
 * The driver is synchronous, so an open transaction would otherwise share the
 * connection with statements from unrelated requests. Every operation is
 * queued behind the previous one to keep transactions isolated.
 */
export class SqliteDatabase implements Database {
  readonly backend = 'sqlite' as const;

  private connection: BetterSqlite3.Database;
  private queue: Promise<unknown> = Promise.resolve();
  private direct: Queryable;

  constructor(path: string) {
    this.connection = new BetterSqlite3(path);
    if (path !== ':memory:') {
      this.connection.pragma('journal_mode = WAL');
    }
    this.connection.pragma('foreign_keys = ON');
    this.direct = this.createQueryable();
  }

  all<T extends Row = Row>(sql: string, params: readonly SqlValue[] = []): Promise<T[]> {
    return this.exclusive(() => this.direct.all<T>(sql, params));
  }

  get<T extends Row = Row>(sql: string, params: readonly SqlValue[] = []): Promise<T | undefined> {
    return this.exclusive(() => this.direct.get<T>(sql, params));
  }

  run(sql: string, params: readonly SqlValue[] = []): Promise<RunResult> {
    return this.exclusive(() => this.direct.run(sql, params));
  }

  insert(sql: string, params: readonly SqlValue[] = []): Promise<number> {
    return this.exclusive(() => this.direct.insert(sql, params));
  }

  transaction<T>(fn: (tx: Queryable) => Promise<T>): Promise<T> {
    return this.exclusive(async () => {
      this.connection.exec('BEGIN IMMEDIATE');
      try {
        const result = await fn(this.direct);
        this.connection.exec('COMMIT');
        return result;
      } catch (error) {
        this.connection.exec('ROLLBACK');
        throw error;
      }
    });
  }

  async ping(): Promise<void> {
    await this.get('SELECT 1 AS ok');
  }

  async close(): Promise<void> {
    await this.queue;
    this.connection.close();
  }

  /**
   * Chain a task after everything already queued
   */
  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const result = this.queue.then(task);
    this.queue = result.catch(() => undefined);
    return result;
  }

  private createQueryable(): Queryable {
    const connection = this.connection;

    return {
      async all<T extends Row = Row>(sql: string, params: readonly SqlValue[] = []): Promise<T[]> {
        return connection.prepare<SqlValue[], T>(sql).all(...params);
      },
      async get<T extends Row = Row>(sql: string, params: readonly SqlValue[] = []): Promise<T | undefined> {
        return connection.prepare<SqlValue[], T>(sql).get(...params);
      },
      async run(sql: string, params: readonly SqlValue[] = []): Promise<RunResult> {
        const info = connection.prepare<SqlValue[]>(sql).run(...params);
        return { changes: info.changes };
      },
      async insert(sql: string, params: readonly SqlValue[] = []): Promise<number> {
        const info = connection.prepare<SqlValue[]>(sql).run(...params);
        return Number(info.lastInsertRowid);
      },
    };
  }
}
