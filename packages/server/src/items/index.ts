/**
 * Items module - item CRUD, completion, ordering and bulk operations
 * @module items
 */

import type { FastifyInstance, FastifyPluginOptions } from 'fastify';
import { z } from 'zod';
import { toBoolean, toNumber, type Database, type Queryable } from '../database/index.js';
import { requireItem, requireList } from '../access/index.js';
import { nowIso, parseBody, parseId, requireActor, type ActorContext, type Clock } from '../context/index.js';
import { NotFoundError, ValidationError } from '../errors/index.js';
import { authenticate } from '../auth/index.js';
import {
  descriptionSchema,
  dueDateSchema,
  idListSchema,
  prioritySchema,
  requiredName,
  type Priority,
} from '../validation/index.js';

export interface ItemTag {
  id: number;
  name: string;
  color: string;
}

export interface Item {
  id: number;
  listId: number;
  title: string;
  description: string;
  priority: Priority;
  dueDate: string | null;
  completed: boolean;
  position: number;
  createdAt: string;
  tags: ItemTag[];
}

/**
 * Fields needed to materialise a new item
 */
export interface NewItemFields {
  title: string;
  description?: string;
  priority?: Priority;
  dueDate?: string | null;
  completed?: boolean;
}

export type ItemRow = {
  id: number;
  list_id: number;
  title: string;
  description: string;
  priority: string;
  due_date: string | null;
  completed: unknown;
  position: unknown;
  created_at: string;
};

const ITEM_COLUMNS = 'id, list_id, title, description, priority, due_date, completed, position, created_at';

export function toPriority(value: string): Priority {
  return value === 'high' || value === 'low' ? value : 'medium';
}

/**
 * Map a stored row to its API shape
 */
export function toItem(row: ItemRow, tags: ItemTag[] = []): Item {
  return {
    id: row.id,
    listId: row.list_id,
    title: row.title,
    description: row.description,
    priority: toPriority(row.priority),
    dueDate: row.due_date,
    completed: toBoolean(row.completed),
    position: toNumber(row.position),
    createdAt: row.created_at,
    tags,
  };
}

const createItemSchema = z.object({
  title: requiredName('Title is required'),
  description: descriptionSchema.optional(),
  priority: prioritySchema.optional(),
  dueDate: dueDateSchema.nullable().optional(),
});

const updateItemSchema = z
  .object({
    title: requiredName('Title is required'),
    description: descriptionSchema,
    priority: prioritySchema,
    dueDate: dueDateSchema.nullable(),
  })
  .partial()
  .refine((input) => Object.values(input).some((value) => value !== undefined), 'Nothing to update');

const reorderSchema = z.object({
  order: z.array(z.number({ invalid_type_error: 'Order must contain item ids' }).int('Order must contain item ids'), {
    required_error: 'order is required',
    invalid_type_error: 'order must be an array',
  }),
});

const bulkDeleteSchema = z.object({ ids: idListSchema });

const bulkMoveSchema = z.object({
  ids: idListSchema,
  targetListId: z.number({ required_error: 'targetListId is required' }).int().positive(),
});

export type CreateItemInput = z.infer<typeof createItemSchema>;
export type UpdateItemInput = z.infer<typeof updateItemSchema>;

/**
 * Items of a list in display order, without an access check
 */
export async function loadItems(db: Queryable, listId: number): Promise<Item[]> {
  const rows = await db.all<ItemRow>(
    `SELECT ${ITEM_COLUMNS} FROM items WHERE list_id = ? ORDER BY position, id`,
    [listId]
  );
  const tagRows = await db.all<{ item_id: number; id: number; name: string; color: string }>(
    `SELECT it.item_id, t.id, t.name, t.color
       FROM item_tags it
       JOIN tags t ON t.id = it.tag_id
       JOIN items i ON i.id = it.item_id
      WHERE i.list_id = ?
      ORDER BY t.name`,
    [listId]
  );

  const tagsByItem = new Map<number, ItemTag[]>();
  for (const tag of tagRows) {
    const tags = tagsByItem.get(tag.item_id) ?? [];
    tags.push({ id: tag.id, name: tag.name, color: tag.color });
    tagsByItem.set(tag.item_id, tags);
  }

  return rows.map((row) => toItem(row, tagsByItem.get(row.id) ?? []));
}

/**
 * Next free position at the end of a list
 */
export async function nextPosition(db: Queryable, listId: number): Promise<number> {
  const row = await db.get<{ next: unknown }>(
    'SELECT CAST(COALESCE(MAX(position), -1) + 1 AS INTEGER) AS next FROM items WHERE list_id = ?',
    [listId]
  );
  return row ? toNumber(row.next) : 0;
}

/**
 * Insert an item row at an explicit position
 */
export async function insertItem(
  db: Queryable,
  clock: Clock,
  listId: number,
  fields: NewItemFields,
  position: number
): Promise<number> {
  return db.insert(
    `INSERT INTO items (list_id, title, description, priority, due_date, completed, position, created_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
    [
      listId,
      fields.title,
      fields.description ?? '',
      fields.priority ?? 'medium',
      fields.dueDate ?? null,
      fields.completed ? 1 : 0,
      position,
      nowIso(clock),
    ]
  );
}

export async function listItems(db: Queryable, actor: ActorContext, listId: number): Promise<Item[]> {
  await requireList(db, actor, listId, 'read');
  return loadItems(db, listId);
}

export async function createItem(
  db: Database,
  clock: Clock,
  actor: ActorContext,
  listId: number,
  input: CreateItemInput
): Promise<number> {
  await requireList(db, actor, listId, 'write');
  return db.transaction(async (tx) => insertItem(tx, clock, listId, input, await nextPosition(tx, listId)));
}

export async function getItem(db: Queryable, actor: ActorContext, listId: number, itemId: number): Promise<Item> {
  await requireItem(db, actor, itemId, 'read', listId);
  const items = await loadItems(db, listId);
  const item = items.find((candidate) => candidate.id === itemId);
  if (!item) {
    throw new NotFoundError('Item not found');
  }
  return item;
}

export async function updateItem(
  db: Queryable,
  actor: ActorContext,
  listId: number,
  itemId: number,
  input: UpdateItemInput
): Promise<void> {
  await requireItem(db, actor, itemId, 'write', listId);
  const row = await db.get<ItemRow>(`SELECT ${ITEM_COLUMNS} FROM items WHERE id = ?`, [itemId]);
  if (!row) {
    throw new NotFoundError('Item not found');
  }
  await db.run('UPDATE items SET title = ?, description = ?, priority = ?, due_date = ? WHERE id = ?', [
    input.title ?? row.title,
    input.description ?? row.description,
    input.priority ?? row.priority,
    input.dueDate === undefined ? row.due_date : input.dueDate,
    itemId,
  ]);
}

/**
 * Delete one item; its tags links, comments and framework data cascade
 */
export async function deleteItem(db: Queryable, actor: ActorContext, listId: number, itemId: number): Promise<void> {
  await requireItem(db, actor, itemId, 'write', listId);
  await db.run('DELETE FROM items WHERE id = ?', [itemId]);
}

/**
 * Flip the completed flag and return the new value
 */
export async function toggleItem(
  db: Database,
  actor: ActorContext,
  listId: number,
  itemId: number
): Promise<boolean> {
  await requireItem(db, actor, itemId, 'write', listId);
  return db.transaction(async (tx) => {
    const row = await tx.get<{ completed: unknown }>('SELECT completed FROM items WHERE id = ?', [itemId]);
    const completed = !toBoolean(row?.completed);
    await tx.run('UPDATE items SET completed = ? WHERE id = ?', [completed ? 1 : 0, itemId]);
    return completed;
  });
}

async function listItemIds(tx: Queryable, listId: number): Promise<Set<number>> {
  const rows = await tx.all<{ id: number }>('SELECT id FROM items WHERE list_id = ?', [listId]);
  return new Set(rows.map((row) => row.id));
}

function assertAllInList(ids: readonly number[], current: Set<number>): void {
  const foreign = ids.filter((id) => !current.has(id));
  if (foreign.length > 0) {
    throw new ValidationError(`Items not in this list: ${foreign.join(', ')}`);
  }
}

/**
 * Replace the order of a list. `order` must be a permutation of the list's
 * current item ids; positions become 0..n-1 in that order.
 */
export async function reorderItems(
  db: Database,
  actor: ActorContext,
  listId: number,
  order: readonly number[]
): Promise<void> {
  await requireList(db, actor, listId, 'write');

  await db.transaction(async (tx) => {
    const current = await listItemIds(tx, listId);
    if (new Set(order).size !== order.length) {
      throw new ValidationError('Order contains duplicate ids');
    }
    assertAllInList(order, current);
    if (order.length !== current.size) {
      throw new ValidationError('Order must include every item in the list');
    }

    for (const [position, itemId] of order.entries()) {
      await tx.run('UPDATE items SET position = ? WHERE id = ? AND list_id = ?', [position, itemId, listId]);
    }
  });
}

/**
 * Delete several items at once. All ids must belong to the list, otherwise
 * nothing is deleted.
 */
export async function bulkDeleteItems(
  db: Database,
  actor: ActorContext,
  listId: number,
  ids: readonly number[]
): Promise<number> {
  await requireList(db, actor, listId, 'write');

  return db.transaction(async (tx) => {
    assertAllInList(ids, await listItemIds(tx, listId));
    let deleted = 0;
    for (const itemId of ids) {
      const result = await tx.run('DELETE FROM items WHERE id = ? AND list_id = ?', [itemId, listId]);
      deleted += result.changes;
    }
    return deleted;
  });
}

/**
 * Move several items to the end of another list, in the submitted order.
 * All ids must belong to the source list, otherwise nothing moves.
 */
export async function bulkMoveItems(
  db: Database,
  actor: ActorContext,
  listId: number,
  ids: readonly number[],
  targetListId: number
): Promise<number> {
  if (targetListId === listId) {
    throw new ValidationError('Target list must differ from the source list');
  }
  await requireList(db, actor, listId, 'write');
  await requireList(db, actor, targetListId, 'write');

  return db.transaction(async (tx) => {
    assertAllInList(ids, await listItemIds(tx, listId));
    let position = await nextPosition(tx, targetListId);
    let moved = 0;
    for (const itemId of ids) {
      const result = await tx.run('UPDATE items SET list_id = ?, position = ? WHERE id = ? AND list_id = ?', [
        targetListId,
        position,
        itemId,
        listId,
      ]);
      position += 1;
      moved += result.changes;
    }
    return moved;
  });
}

type ListParams = { Params: { listId: string } };
type ItemParams = { Params: { listId: string; itemId: string } };

/**
 * Register item routes
 */
export async function registerItemRoutes(fastify: FastifyInstance, _options: FastifyPluginOptions) {
  fastify.addHook('preHandler', authenticate);

  /**
   * GET /api/lists/:listId/items - Items in display order
   */
  fastify.get<ListParams>('/lists/:listId/items', async (request) => {
    return listItems(fastify.db, requireActor(request), parseId(request.params.listId, 'list id'));
  });

  /**
   * POST /api/lists/:listId/items - Append an item
   */
  fastify.post<ListParams>('/lists/:listId/items', async (request, reply) => {
    const input = parseBody(createItemSchema, request.body);
    const id = await createItem(
      fastify.db,
      fastify.clock,
      requireActor(request),
      parseId(request.params.listId, 'list id'),
      input
    );
    reply.code(201);
    return { ok: true, id };
  });

  /**
   * PUT /api/lists/:listId/items/reorder - Replace the full order
   */
  fastify.put<ListParams>('/lists/:listId/items/reorder', async (request) => {
    const { order } = parseBody(reorderSchema, request.body);
    await reorderItems(fastify.db, requireActor(request), parseId(request.params.listId, 'list id'), order);
    return { ok: true };
  });

  /**
   * POST /api/lists/:listId/items/bulk-delete - Delete many items, all or nothing
   */
  fastify.post<ListParams>('/lists/:listId/items/bulk-delete', async (request) => {
    const { ids } = parseBody(bulkDeleteSchema, request.body);
    const deleted = await bulkDeleteItems(
      fastify.db,
      requireActor(request),
      parseId(request.params.listId, 'list id'),
      ids
    );
    return { ok: true, deleted };
  });

  /**
   * POST /api/lists/:listId/items/bulk-move - Move many items, all or nothing
   */
  fastify.post<ListParams>('/lists/:listId/items/bulk-move', async (request) => {
    const { ids, targetListId } = parseBody(bulkMoveSchema, request.body);
    const moved = await bulkMoveItems(
      fastify.db,
      requireActor(request),
      parseId(request.params.listId, 'list id'),
      ids,
      targetListId
    );
    return { ok: true, moved };
  });

  /**
   * GET /api/lists/:listId/items/:itemId - One item
   */
  fastify.get<ItemParams>('/lists/:listId/items/:itemId', async (request) => {
    const { listId, itemId } = request.params;
    return getItem(fastify.db, requireActor(request), parseId(listId, 'list id'), parseId(itemId, 'item id'));
  });

  /**
   * PUT /api/lists/:listId/items/:itemId - Partial update
   */
  fastify.put<ItemParams>('/lists/:listId/items/:itemId', async (request) => {
    const { listId, itemId } = request.params;
    const input = parseBody(updateItemSchema, request.body);
    await updateItem(fastify.db, requireActor(request), parseId(listId, 'list id'), parseId(itemId, 'item id'), input);
    return { ok: true };
  });

  /**
   * DELETE /api/lists/:listId/items/:itemId - Delete an item
   */
  fastify.delete<ItemParams>('/lists/:listId/items/:itemId', async (request) => {
    const { listId, itemId } = request.params;
    await deleteItem(fastify.db, requireActor(request), parseId(listId, 'list id'), parseId(itemId, 'item id'));
    return { ok: true };
  });

  /**
   * PUT /api/lists/:listId/items/:itemId/toggle - Flip completion
   */
  fastify.put<ItemParams>('/lists/:listId/items/:itemId/toggle', async (request) => {
    const { listId, itemId } = request.params;
    const completed = await toggleItem(
      fastify.db,
      requireActor(request),
      parseId(listId, 'list id'),
      parseId(itemId, 'item id')
    );
    return { ok: true, completed };
  });
}
