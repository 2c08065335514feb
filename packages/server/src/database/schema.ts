/**
 * Table definitions for both supported engines
 * @module database/schema
 */

import type { Backend } from './index.js';

/**
 * DDL statements in dependency order. Only the surrogate key column differs
 * between engines.
 */
export function schemaStatements(backend: Backend): string[] {
  const id = backend === 'postgres' ? 'id SERIAL PRIMARY KEY' : 'id INTEGER PRIMARY KEY AUTOINCREMENT';

  return [
    `CREATE TABLE IF NOT EXISTS users (
      ${id},
      username TEXT NOT NULL UNIQUE,
      password_hash TEXT NOT NULL,
      created_at TEXT NOT NULL
    )`,
    `CREATE TABLE IF NOT EXISTS lists (
      ${id},
      owner_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      name TEXT NOT NULL,
      description TEXT NOT NULL DEFAULT '',
      created_at TEXT NOT NULL
    )`,
    `CREATE TABLE IF NOT EXISTS items (
      ${id},
      list_id INTEGER NOT NULL REFERENCES lists(id) ON DELETE CASCADE,
      title TEXT NOT NULL,
      description TEXT NOT NULL DEFAULT '',
      priority TEXT NOT NULL DEFAULT 'medium',
      due_date TEXT,
      completed INTEGER NOT NULL DEFAULT 0,
      position INTEGER NOT NULL DEFAULT 0,
      created_at TEXT NOT NULL
    )`,
    `CREATE TABLE IF NOT EXISTS list_frameworks (
      list_id INTEGER NOT NULL REFERENCES lists(id) ON DELETE CASCADE,
      framework_key TEXT NOT NULL,
      attached_at TEXT NOT NULL,
      PRIMARY KEY (list_id, framework_key)
    )`,
    `CREATE TABLE IF NOT EXISTS item_framework_data (
      item_id INTEGER NOT NULL REFERENCES items(id) ON DELETE CASCADE,
      framework_key TEXT NOT NULL,
      data_json TEXT NOT NULL DEFAULT '{}',
      updated_at TEXT NOT NULL,
      PRIMARY KEY (item_id, framework_key)
    )`,
    `CREATE TABLE IF NOT EXISTS tags (
      ${id},
      owner_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      name TEXT NOT NULL,
      color TEXT NOT NULL DEFAULT '#6366f1',
      UNIQUE (owner_id, name)
    )`,
    `CREATE TABLE IF NOT EXISTS item_tags (
      item_id INTEGER NOT NULL REFERENCES items(id) ON DELETE CASCADE,
      tag_id INTEGER NOT NULL REFERENCES tags(id) ON DELETE CASCADE,
      PRIMARY KEY (item_id, tag_id)
    )`,
    `CREATE TABLE IF NOT EXISTS comments (
      ${id},
      item_id INTEGER NOT NULL REFERENCES items(id) ON DELETE CASCADE,
      author_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      content TEXT NOT NULL,
      created_at TEXT NOT NULL
    )`,
    `CREATE TABLE IF NOT EXISTS shares (
      ${id},
      list_id INTEGER NOT NULL REFERENCES lists(id) ON DELETE CASCADE,
      owner_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      grantee_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      permission TEXT NOT NULL DEFAULT 'read',
      created_at TEXT NOT NULL,
      UNIQUE (list_id, grantee_id)
    )`,
    `CREATE TABLE IF NOT EXISTS templates (
      ${id},
      owner_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      name TEXT NOT NULL,
      description TEXT NOT NULL DEFAULT '',
      items_json TEXT NOT NULL DEFAULT '[]',
      created_at TEXT NOT NULL
    )`,
    'CREATE INDEX IF NOT EXISTS idx_lists_owner ON lists(owner_id)',
    'CREATE INDEX IF NOT EXISTS idx_items_list ON items(list_id, position)',
    'CREATE INDEX IF NOT EXISTS idx_comments_item ON comments(item_id)',
    'CREATE INDEX IF NOT EXISTS idx_shares_grantee ON shares(grantee_id)',
    'CREATE INDEX IF NOT EXISTS idx_templates_owner ON templates(owner_id)',
  ];
}
