/**
 * Lists module - list CRUD scoped to owners and grantees
 * @module lists
 */

import type { FastifyInstance, FastifyPluginOptions } from 'fastify';
import { z } from 'zod';
import { toNumber, type Queryable } from '../database/index.js';
import { requireList, type ListRole } from '../access/index.js';
import { nowIso, parseBody, parseId, requireActor, type ActorContext, type Clock } from '../context/index.js';
import { ValidationError } from '../errors/index.js';
import { authenticate } from '../auth/index.js';
import { listFrameworkKeys, type FrameworkKey } from '../frameworks/index.js';
import { descriptionSchema, requiredName } from '../validation/index.js';

/**
 * List as shown in the owner's overview
 */
export interface ListSummary {
  id: number;
  name: string;
  description: string;
  createdAt: string;
  itemCount: number;
  completedCount: number;
  frameworks: FrameworkKey[];
  shared: false;
}

/**
 * A single list with the actor's role on it
 */
export interface ListDetail {
  id: number;
  ownerId: number;
  name: string;
  description: string;
  createdAt: string;
  frameworks: FrameworkKey[];
  role: ListRole;
}

type ListCountRow = {
  id: number;
  name: string;
  description: string;
  created_at: string;
  item_count: unknown;
  completed_count: unknown;
};

const createListSchema = z.object({
  name: requiredName('List name is required'),
  description: descriptionSchema.optional(),
});

const updateListSchema = z.object({
  name: requiredName('List name is required').optional(),
  description: descriptionSchema.optional(),
});

export type CreateListInput = z.infer<typeof createListSchema>;
export type UpdateListInput = z.infer<typeof updateListSchema>;

/**
 * Lists owned by the actor, newest first
 */
export async function listOwnedLists(db: Queryable, actor: ActorContext): Promise<ListSummary[]> {
  const rows = await db.all<ListCountRow>(
    `SELECT l.id, l.name, l.description, l.created_at,
            CAST(COUNT(i.id) AS INTEGER) AS item_count,
            CAST(COALESCE(SUM(i.completed), 0) AS INTEGER) AS completed_count
       FROM lists l
       LEFT JOIN items i ON i.list_id = l.id
      WHERE l.owner_id = ?
      GROUP BY l.id, l.name, l.description, l.created_at
      ORDER BY l.created_at DESC, l.id DESC`,
    [actor.userId]
  );

  const result: ListSummary[] = [];
  for (const row of rows) {
    result.push({
      id: row.id,
      name: row.name,
      description: row.description,
      createdAt: row.created_at,
      itemCount: toNumber(row.item_count),
      completedCount: toNumber(row.completed_count),
      frameworks: await listFrameworkKeys(db, row.id),
      shared: false,
    });
  }
  return result;
}

/**
 * Insert a list row owned by the actor and return its id
 */
export async function insertList(
  db: Queryable,
  clock: Clock,
  ownerId: number,
  name: string,
  description: string
): Promise<number> {
  return db.insert(
    'INSERT INTO lists (owner_id, name, description, created_at) VALUES (?, ?, ?, ?)',
    [ownerId, name, description, nowIso(clock)]
  );
}

export async function createList(
  db: Queryable,
  clock: Clock,
  actor: ActorContext,
  input: CreateListInput
): Promise<number> {
  return insertList(db, clock, actor.userId, input.name, input.description ?? '');
}

export async function getList(db: Queryable, actor: ActorContext, listId: number): Promise<ListDetail> {
  const { list, role } = await requireList(db, actor, listId, 'read');
  return {
    id: list.id,
    ownerId: list.owner_id,
    name: list.name,
    description: list.description,
    createdAt: list.created_at,
    frameworks: await listFrameworkKeys(db, list.id),
    role,
  };
}

/**
 * Rename or re-describe a list. Only the owner may do this.
 */
export async function updateList(
  db: Queryable,
  actor: ActorContext,
  listId: number,
  input: UpdateListInput
): Promise<void> {
  const { list } = await requireList(db, actor, listId, 'owner');
  if (input.name === undefined && input.description === undefined) {
    throw new ValidationError('Nothing to update');
  }
  await db.run('UPDATE lists SET name = ?, description = ? WHERE id = ?', [
    input.name ?? list.name,
    input.description ?? list.description,
    listId,
  ]);
}

/**
 * Delete a list; items, shares and framework attachments cascade
 */
export async function deleteList(db: Queryable, actor: ActorContext, listId: number): Promise<void> {
  await requireList(db, actor, listId, 'owner');
  await db.run('DELETE FROM lists WHERE id = ?', [listId]);
}

/**
 * Register list routes
 */
export async function registerListRoutes(fastify: FastifyInstance, _options: FastifyPluginOptions) {
  fastify.addHook('preHandler', authenticate);

  /**
   * GET /api/lists - Lists owned by the current user
   */
  fastify.get('/lists', async (request) => listOwnedLists(fastify.db, requireActor(request)));

  /**
   * POST /api/lists - Create a list
   */
  fastify.post('/lists', async (request, reply) => {
    const input = parseBody(createListSchema, request.body);
    const id = await createList(fastify.db, fastify.clock, requireActor(request), input);
    reply.code(201);
    return { ok: true, id };
  });

  /**
   * GET /api/lists/:listId - A readable list
   */
  fastify.get<{ Params: { listId: string } }>('/lists/:listId', async (request) => {
    return getList(fastify.db, requireActor(request), parseId(request.params.listId, 'list id'));
  });

  /**
   * PUT /api/lists/:listId - Update name and description
   */
  fastify.put<{ Params: { listId: string } }>('/lists/:listId', async (request) => {
    const input = parseBody(updateListSchema, request.body);
    await updateList(fastify.db, requireActor(request), parseId(request.params.listId, 'list id'), input);
    return { ok: true };
  });

  /**
   * DELETE /api/lists/:listId - Delete a list and everything in it
   */
  fastify.delete<{ Params: { listId: string } }>('/lists/:listId', async (request) => {
    await deleteList(fastify.db, requireActor(request), parseId(request.params.listId, 'list id'));
    return { ok: true };
  });
}
