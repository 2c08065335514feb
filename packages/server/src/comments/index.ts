/**
 * Comments module - discussion threads on items
 * @module comments
 */

import type { FastifyInstance, FastifyPluginOptions } from 'fastify';
import { z } from 'zod';
import type { Queryable } from '../database/index.js';
import { requireItem, resolveListAccess } from '../access/index.js';
import { nowIso, parseBody, parseId, requireActor, type ActorContext, type Clock } from '../context/index.js';
import { ForbiddenError, NotFoundError } from '../errors/index.js';
import { authenticate } from '../auth/index.js';
import { MAX_TEXT_LENGTH } from '../validation/index.js';

export interface Comment {
  id: number;
  itemId: number;
  authorId: number;
  username: string;
  content: string;
  createdAt: string;
}

const createCommentSchema = z.object({
  content: z
    .string({ required_error: 'Comment cannot be empty', invalid_type_error: 'Comment cannot be empty' })
    .trim()
    .min(1, 'Comment cannot be empty')
    .max(MAX_TEXT_LENGTH, `Comment must be at most ${MAX_TEXT_LENGTH} characters`),
});

type CommentRow = {
  id: number;
  item_id: number;
  author_id: number;
  username: string;
  content: string;
  created_at: string;
};

export async function listComments(db: Queryable, actor: ActorContext, itemId: number): Promise<Comment[]> {
  await requireItem(db, actor, itemId, 'read');
  const rows = await db.all<CommentRow>(
    `SELECT c.id, c.item_id, c.author_id, u.username, c.content, c.created_at
       FROM comments c
       JOIN users u ON u.id = c.author_id
      WHERE c.item_id = ?
      ORDER BY c.created_at, c.id`,
    [itemId]
  );
  return rows.map((row) => ({
    id: row.id,
    itemId: row.item_id,
    authorId: row.author_id,
    username: row.username,
    content: row.content,
    createdAt: row.created_at,
  }));
}

/**
 * Add a comment. Read access is enough: grantees with read-only shares may
 * still discuss items.
 */
export async function addComment(
  db: Queryable,
  clock: Clock,
  actor: ActorContext,
  itemId: number,
  content: string
): Promise<number> {
  await requireItem(db, actor, itemId, 'read');
  return db.insert('INSERT INTO comments (item_id, author_id, content, created_at) VALUES (?, ?, ?, ?)', [
    itemId,
    actor.userId,
    content,
    nowIso(clock),
  ]);
}

/**
 * Delete a comment as its author or as the owner of the list it lives in
 */
export async function deleteComment(db: Queryable, actor: ActorContext, commentId: number): Promise<void> {
  const comment = await db.get<{ author_id: number; list_id: number }>(
    `SELECT c.author_id, i.list_id
       FROM comments c
       JOIN items i ON i.id = c.item_id
      WHERE c.id = ?`,
    [commentId]
  );
  if (!comment) {
    throw new NotFoundError('Comment not found');
  }

  let isListOwner: boolean;
  try {
    isListOwner = (await resolveListAccess(db, actor, comment.list_id)).role === 'owner';
  } catch (error) {
    if (error instanceof NotFoundError) {
      throw new NotFoundError('Comment not found');
    }
    throw error;
  }

  if (comment.author_id !== actor.userId && !isListOwner) {
    throw new ForbiddenError('Only the author or the list owner can delete this comment');
  }
  await db.run('DELETE FROM comments WHERE id = ?', [commentId]);
}

/**
 * Register comment routes
 */
export async function registerCommentRoutes(fastify: FastifyInstance, _options: FastifyPluginOptions) {
  fastify.addHook('preHandler', authenticate);

  /**
   * GET /api/items/:itemId/comments - Oldest first
   */
  fastify.get<{ Params: { itemId: string } }>('/items/:itemId/comments', async (request) => {
    return listComments(fastify.db, requireActor(request), parseId(request.params.itemId, 'item id'));
  });

  /**
   * POST /api/items/:itemId/comments - Add a comment
   */
  fastify.post<{ Params: { itemId: string } }>('/items/:itemId/comments', async (request, reply) => {
    const { content } = parseBody(createCommentSchema, request.body);
    const id = await addComment(
      fastify.db,
      fastify.clock,
      requireActor(request),
      parseId(request.params.itemId, 'item id'),
      content
    );
    reply.code(201);
    return { ok: true, id };
  });

  /**
   * DELETE /api/comments/:commentId - Delete a comment
   */
  fastify.delete<{ Params: { commentId: string } }>('/comments/:commentId', async (request) => {
    await deleteComment(fastify.db, requireActor(request), parseId(request.params.commentId, 'comment id'));
    return { ok: true };
  });
}
