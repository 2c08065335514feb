/**
 * Frameworks module - catalog, per-list attachment and per-item placement data
 * @module frameworks
 */

import type { FastifyInstance, FastifyPluginOptions } from 'fastify';
import { z } from 'zod';
import type { Database, Queryable } from '../database/index.js';
import { requireList, requireItem } from '../access/index.js';
import { nowIso, parseBody, parseId, requireActor, type ActorContext, type Clock } from '../context/index.js';
import { ValidationError } from '../errors/index.js';
import { authenticate } from '../auth/index.js';
import {
  FRAMEWORK_KEYS,
  FRAMEWORKS,
  isFrameworkKey,
  mergeFrameworkData,
  parseFrameworkKey,
  parseStoredData,
  validateFrameworkData,
  type FrameworkData,
  type FrameworkDefinition,
  type FrameworkKey,
} from './catalog.js';

export * from './catalog.js';

/**
 * Stored placement of one item, with the item's text for rendering
 */
export interface ItemFrameworkEntry {
  data: FrameworkData;
  title: string;
  description: string;
}

/**
 * The catalog in its fixed display order
 */
export function getCatalog(): FrameworkDefinition[] {
  return FRAMEWORK_KEYS.map((key) => FRAMEWORKS[key]);
}

/**
 * Framework keys attached to a list, in catalog order
 */
export async function listFrameworkKeys(db: Queryable, listId: number): Promise<FrameworkKey[]> {
  const rows = await db.all<{ framework_key: string }>(
    'SELECT framework_key FROM list_frameworks WHERE list_id = ?',
    [listId]
  );
  const attached = new Set(rows.map((row) => row.framework_key));
  return FRAMEWORK_KEYS.filter((key) => attached.has(key));
}

export async function attachFramework(
  db: Queryable,
  clock: Clock,
  actor: ActorContext,
  listId: number,
  key: FrameworkKey
): Promise<FrameworkKey[]> {
  await requireList(db, actor, listId, 'write');
  await db.run(
    'INSERT INTO list_frameworks (list_id, framework_key, attached_at) VALUES (?, ?, ?) ON CONFLICT (list_id, framework_key) DO NOTHING',
    [listId, key, nowIso(clock)]
  );
  return listFrameworkKeys(db, listId);
}

/**
 * Remove a framework from a list. Item placements for that framework stay
 * stored, so attaching it again restores them.
 */
export async function detachFramework(
  db: Queryable,
  actor: ActorContext,
  listId: number,
  key: FrameworkKey
): Promise<FrameworkKey[]> {
  await requireList(db, actor, listId, 'write');
  await db.run('DELETE FROM list_frameworks WHERE list_id = ? AND framework_key = ?', [listId, key]);
  return listFrameworkKeys(db, listId);
}

/**
 * Stored data for every item of a list under one framework, keyed by item id
 */
export async function getListFrameworkData(
  db: Queryable,
  actor: ActorContext,
  listId: number,
  key: FrameworkKey
): Promise<Record<string, ItemFrameworkEntry>> {
  await requireList(db, actor, listId, 'read');
  const rows = await db.all<{ item_id: number; data_json: string; title: string; description: string }>(
    `SELECT d.item_id, d.data_json, i.title, i.description
       FROM item_framework_data d
       JOIN items i ON i.id = d.item_id
      WHERE d.framework_key = ? AND i.list_id = ?
      ORDER BY i.position, i.id`,
    [key, listId]
  );

  const result: Record<string, ItemFrameworkEntry> = {};
  for (const row of rows) {
    result[String(row.item_id)] = {
      data: parseStoredData(row.data_json),
      title: row.title,
      description: row.description,
    };
  }
  return result;
}

async function readItemData(tx: Queryable, itemId: number, key: FrameworkKey): Promise<FrameworkData> {
  const row = await tx.get<{ data_json: string }>(
    'SELECT data_json FROM item_framework_data WHERE item_id = ? AND framework_key = ?',
    [itemId, key]
  );
  return row ? parseStoredData(row.data_json) : {};
}

async function writeItemData(
  tx: Queryable,
  clock: Clock,
  itemId: number,
  key: FrameworkKey,
  data: FrameworkData
): Promise<void> {
  await tx.run(
    `INSERT INTO item_framework_data (item_id, framework_key, data_json, updated_at)
     VALUES (?, ?, ?, ?)
     ON CONFLICT (item_id, framework_key)
     DO UPDATE SET data_json = excluded.data_json, updated_at = excluded.updated_at`,
    [itemId, key, JSON.stringify(data), nowIso(clock)]
  );
}

/**
 * Validate a partial payload and merge it field by field into the item's
 * stored data for the framework
 */
export async function setItemFrameworkData(
  db: Database,
  clock: Clock,
  actor: ActorContext,
  itemId: number,
  key: FrameworkKey,
  payload: unknown
): Promise<FrameworkData> {
  await requireItem(db, actor, itemId, 'write');
  const patch = validateFrameworkData(key, payload);

  return db.transaction(async (tx) => {
    const merged = mergeFrameworkData(await readItemData(tx, itemId, key), patch);
    await writeItemData(tx, clock, itemId, key, merged);
    return merged;
  });
}

/**
 * Merge payloads for several items of one list. Every item must belong to
 * the list and every payload must validate, otherwise nothing is written.
 */
export async function batchSetFrameworkData(
  db: Database,
  clock: Clock,
  actor: ActorContext,
  listId: number,
  key: FrameworkKey,
  payloads: Record<string, unknown>
): Promise<Record<string, FrameworkData>> {
  await requireList(db, actor, listId, 'write');

  const patches = new Map<number, FrameworkData>();
  for (const [rawId, payload] of Object.entries(payloads)) {
    patches.set(parseId(rawId, 'item id'), validateFrameworkData(key, payload));
  }

  return db.transaction(async (tx) => {
    const rows = await tx.all<{ id: number }>('SELECT id FROM items WHERE list_id = ?', [listId]);
    const listItemIds = new Set(rows.map((row) => row.id));
    for (const itemId of patches.keys()) {
      if (!listItemIds.has(itemId)) {
        throw new ValidationError(`Item ${itemId} does not belong to this list`);
      }
    }

    const result: Record<string, FrameworkData> = {};
    for (const [itemId, patch] of patches) {
      const merged = mergeFrameworkData(await readItemData(tx, itemId, key), patch);
      await writeItemData(tx, clock, itemId, key, merged);
      result[String(itemId)] = merged;
    }
    return result;
  });
}

const attachSchema = z.object({
  frameworkKey: z.string({ required_error: 'frameworkKey is required' }).refine(isFrameworkKey, 'Invalid framework'),
});

const dataSchema = z.object({
  data: z.record(z.unknown(), {
    required_error: 'data is required',
    invalid_type_error: 'data must be an object',
  }),
});

const batchSchema = z.object({
  items: z.record(z.unknown(), {
    required_error: 'items is required',
    invalid_type_error: 'items must be an object',
  }),
});

/**
 * Register framework routes
 */
export async function registerFrameworkRoutes(fastify: FastifyInstance, _options: FastifyPluginOptions) {
  fastify.addHook('preHandler', authenticate);

  /**
   * GET /api/frameworks - The fixed catalog
   */
  fastify.get('/frameworks', async () => getCatalog());

  /**
   * GET /api/lists/:listId/frameworks - Keys attached to a list
   */
  fastify.get<{ Params: { listId: string } }>('/lists/:listId/frameworks', async (request) => {
    const { listId } = request.params;
    const id = parseId(listId, 'list id');
    await requireList(fastify.db, requireActor(request), id, 'read');
    return listFrameworkKeys(fastify.db, id);
  });

  /**
   * POST /api/lists/:listId/frameworks - Attach a framework
   */
  fastify.post<{ Params: { listId: string } }>('/lists/:listId/frameworks', async (request, reply) => {
    const { listId } = request.params;
    const { frameworkKey } = parseBody(attachSchema, request.body);
    const frameworks = await attachFramework(
      fastify.db,
      fastify.clock,
      requireActor(request),
      parseId(listId, 'list id'),
      parseFrameworkKey(frameworkKey)
    );
    reply.code(201);
    return { ok: true, frameworks };
  });

  /**
   * DELETE /api/lists/:listId/frameworks/:key - Detach a framework
   */
  fastify.delete<{ Params: { listId: string; key: string } }>('/lists/:listId/frameworks/:key', async (request) => {
    const { listId, key } = request.params;
    const frameworks = await detachFramework(
      fastify.db,
      requireActor(request),
      parseId(listId, 'list id'),
      parseFrameworkKey(key)
    );
    return { ok: true, frameworks };
  });

  /**
   * GET /api/lists/:listId/framework-data/:key - Placements for a list
   */
  fastify.get<{ Params: { listId: string; key: string } }>('/lists/:listId/framework-data/:key', async (request) => {
    const { listId, key } = request.params;
    return getListFrameworkData(fastify.db, requireActor(request), parseId(listId, 'list id'), parseFrameworkKey(key));
  });

  /**
   * PUT /api/items/:itemId/framework-data/:key - Merge a partial payload
   */
  fastify.put<{ Params: { itemId: string; key: string } }>('/items/:itemId/framework-data/:key', async (request) => {
    const { itemId, key } = request.params;
    const { data } = parseBody(dataSchema, request.body);
    const merged = await setItemFrameworkData(
      fastify.db,
      fastify.clock,
      requireActor(request),
      parseId(itemId, 'item id'),
      parseFrameworkKey(key),
      data
    );
    return { ok: true, data: merged };
  });

  /**
   * PUT /api/lists/:listId/framework-data/:key/batch - Merge payloads for many items
   */
  fastify.put<{ Params: { listId: string; key: string } }>('/lists/:listId/framework-data/:key/batch', async (request) => {
    const { listId, key } = request.params;
    const { items } = parseBody(batchSchema, request.body);
    const result = await batchSetFrameworkData(
      fastify.db,
      fastify.clock,
      requireActor(request),
      parseId(listId, 'list id'),
      parseFrameworkKey(key),
      items
    );
    return { ok: true, items: result };
  });
}
