/**
 * Tags module - per-user labels and their links to items
 * @module tags
 */

import type { FastifyInstance, FastifyPluginOptions } from 'fastify';
import { z } from 'zod';
import { isUniqueViolation, type Queryable } from '../database/index.js';
import { requireItem } from '../access/index.js';
import { parseBody, parseId, requireActor, type ActorContext } from '../context/index.js';
import { ConflictError, NotFoundError } from '../errors/index.js';
import { authenticate } from '../auth/index.js';
import { requiredName } from '../validation/index.js';

export const DEFAULT_TAG_COLOR = '#6366f1';

const COLOR_PATTERN = /^#[0-9a-fA-F]{6}$/;

export interface Tag {
  id: number;
  name: string;
  color: string;
}

const createTagSchema = z.object({
  name: requiredName('Tag name is required'),
  color: z.unknown().optional(),
});

/**
 * Normalise a requested colour; anything but `#rrggbb` becomes the default
 */
export function normalizeColor(value: unknown): string {
  return typeof value === 'string' && COLOR_PATTERN.test(value) ? value : DEFAULT_TAG_COLOR;
}

export async function listTags(db: Queryable, actor: ActorContext): Promise<Tag[]> {
  return db.all<{ id: number; name: string; color: string }>(
    'SELECT id, name, color FROM tags WHERE owner_id = ? ORDER BY name, id',
    [actor.userId]
  );
}

export async function createTag(db: Queryable, actor: ActorContext, name: string, color: unknown): Promise<number> {
  const existing = await db.get('SELECT id FROM tags WHERE owner_id = ? AND name = ?', [actor.userId, name]);
  if (existing) {
    throw new ConflictError('Tag already exists');
  }
  try {
    return await db.insert('INSERT INTO tags (owner_id, name, color) VALUES (?, ?, ?)', [
      actor.userId,
      name,
      normalizeColor(color),
    ]);
  } catch (error) {
    if (isUniqueViolation(error)) {
      throw new ConflictError('Tag already exists');
    }
    throw error;
  }
}

/**
 * Delete one of the actor's tags; links to items cascade
 */
export async function deleteTag(db: Queryable, actor: ActorContext, tagId: number): Promise<void> {
  const result = await db.run('DELETE FROM tags WHERE id = ? AND owner_id = ?', [tagId, actor.userId]);
  if (result.changes === 0) {
    throw new NotFoundError('Tag not found');
  }
}

async function requireOwnTag(db: Queryable, actor: ActorContext, tagId: number): Promise<void> {
  const tag = await db.get('SELECT id FROM tags WHERE id = ? AND owner_id = ?', [tagId, actor.userId]);
  if (!tag) {
    throw new NotFoundError('Tag not found');
  }
}

export async function addTagToItem(db: Queryable, actor: ActorContext, itemId: number, tagId: number): Promise<void> {
  await requireItem(db, actor, itemId, 'write');
  await requireOwnTag(db, actor, tagId);
  await db.run('INSERT INTO item_tags (item_id, tag_id) VALUES (?, ?) ON CONFLICT (item_id, tag_id) DO NOTHING', [
    itemId,
    tagId,
  ]);
}

export async function removeTagFromItem(
  db: Queryable,
  actor: ActorContext,
  itemId: number,
  tagId: number
): Promise<void> {
  await requireItem(db, actor, itemId, 'write');
  await requireOwnTag(db, actor, tagId);
  await db.run('DELETE FROM item_tags WHERE item_id = ? AND tag_id = ?', [itemId, tagId]);
}

type ItemTagParams = { Params: { itemId: string; tagId: string } };

/**
 * Register tag routes
 */
export async function registerTagRoutes(fastify: FastifyInstance, _options: FastifyPluginOptions) {
  fastify.addHook('preHandler', authenticate);

  /**
   * GET /api/tags - The actor's tags by name
   */
  fastify.get('/tags', async (request) => listTags(fastify.db, requireActor(request)));

  /**
   * POST /api/tags - Create a tag
   */
  fastify.post('/tags', async (request, reply) => {
    const { name, color } = parseBody(createTagSchema, request.body);
    const id = await createTag(fastify.db, requireActor(request), name, color);
    reply.code(201);
    return { ok: true, id };
  });

  /**
   * DELETE /api/tags/:tagId - Delete a tag
   */
  fastify.delete<{ Params: { tagId: string } }>('/tags/:tagId', async (request) => {
    await deleteTag(fastify.db, requireActor(request), parseId(request.params.tagId, 'tag id'));
    return { ok: true };
  });

  /**
   * POST /api/items/:itemId/tags/:tagId - Link a tag to an item
   */
  fastify.post<ItemTagParams>('/items/:itemId/tags/:tagId', async (request) => {
    const { itemId, tagId } = request.params;
    await addTagToItem(fastify.db, requireActor(request), parseId(itemId, 'item id'), parseId(tagId, 'tag id'));
    return { ok: true };
  });

  /**
   * DELETE /api/items/:itemId/tags/:tagId - Unlink a tag from an item
   */
  fastify.delete<ItemTagParams>('/items/:itemId/tags/:tagId', async (request) => {
    const { itemId, tagId } = request.params;
    await removeTagFromItem(fastify.db, requireActor(request), parseId(itemId, 'item id'), parseId(tagId, 'tag id'));
    return { ok: true };
  });
}
