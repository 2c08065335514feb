/**
 * Sharing module - per-list grants to other users
 * @module shares
 */

import type { FastifyInstance, FastifyPluginOptions } from 'fastify';
import { z } from 'zod';
import { toNumber, type Database, type Queryable } from '../database/index.js';
import { requireList } from '../access/index.js';
import { nowIso, parseBody, parseId, requireActor, type ActorContext, type Clock } from '../context/index.js';
import { NotFoundError, ValidationError } from '../errors/index.js';
import { authenticate } from '../auth/index.js';
import { listFrameworkKeys, type FrameworkKey } from '../frameworks/index.js';

export const SHARE_PERMISSIONS = ['read', 'write'] as const;
export type SharePermission = (typeof SHARE_PERMISSIONS)[number];

export interface Share {
  id: number;
  listId: number;
  granteeId: number;
  username: string;
  permission: SharePermission;
  createdAt: string;
}

/**
 * A list someone else owns, as seen by a grantee
 */
export interface SharedListSummary {
  id: number;
  name: string;
  description: string;
  createdAt: string;
  ownerName: string;
  permission: SharePermission;
  itemCount: number;
  frameworks: FrameworkKey[];
  shared: true;
}

export interface ShareResult {
  id: number;
  created: boolean;
}

const shareSchema = z.object({
  username: z
    .string({ required_error: 'Username is required', invalid_type_error: 'Username is required' })
    .trim()
    .toLowerCase()
    .min(1, 'Username is required'),
  permission: z
    .enum(SHARE_PERMISSIONS, { errorMap: () => ({ message: 'Permission must be read or write' }) })
    .default('read'),
});

function toPermission(value: string): SharePermission {
  return value === 'write' ? 'write' : 'read';
}

/**
 * Grant a user access to a list, or change the permission of an existing
 * grant in place
 */
export async function shareList(
  db: Database,
  clock: Clock,
  actor: ActorContext,
  listId: number,
  username: string,
  permission: SharePermission
): Promise<ShareResult> {
  await requireList(db, actor, listId, 'owner');

  const grantee = await db.get<{ id: number }>('SELECT id FROM users WHERE username = ?', [username]);
  if (!grantee) {
    throw new NotFoundError('User not found');
  }
  if (grantee.id === actor.userId) {
    throw new ValidationError('Cannot share with yourself');
  }

  return db.transaction(async (tx) => {
    const existing = await tx.get<{ id: number }>('SELECT id FROM shares WHERE list_id = ? AND grantee_id = ?', [
      listId,
      grantee.id,
    ]);
    if (existing) {
      await tx.run('UPDATE shares SET permission = ? WHERE id = ?', [permission, existing.id]);
      return { id: existing.id, created: false };
    }

    const id = await tx.insert(
      'INSERT INTO shares (list_id, owner_id, grantee_id, permission, created_at) VALUES (?, ?, ?, ?, ?)',
      [listId, actor.userId, grantee.id, permission, nowIso(clock)]
    );
    return { id, created: true };
  });
}

export async function listShares(db: Queryable, actor: ActorContext, listId: number): Promise<Share[]> {
  await requireList(db, actor, listId, 'owner');
  const rows = await db.all<{
    id: number;
    list_id: number;
    grantee_id: number;
    username: string;
    permission: string;
    created_at: string;
  }>(
    `SELECT s.id, s.list_id, s.grantee_id, u.username, s.permission, s.created_at
       FROM shares s
       JOIN users u ON u.id = s.grantee_id
      WHERE s.list_id = ?
      ORDER BY u.username`,
    [listId]
  );
  return rows.map((row) => ({
    id: row.id,
    listId: row.list_id,
    granteeId: row.grantee_id,
    username: row.username,
    permission: toPermission(row.permission),
    createdAt: row.created_at,
  }));
}

/**
 * Revoke one grant by its id
 */
export async function revokeShare(db: Queryable, actor: ActorContext, listId: number, shareId: number): Promise<void> {
  await requireList(db, actor, listId, 'owner');
  const result = await db.run('DELETE FROM shares WHERE id = ? AND list_id = ?', [shareId, listId]);
  if (result.changes === 0) {
    throw new NotFoundError('Share not found');
  }
}

/**
 * Every list shared to the actor, newest grant first
 */
export async function listSharedWithMe(db: Queryable, actor: ActorContext): Promise<SharedListSummary[]> {
  const rows = await db.all<{
    id: number;
    name: string;
    description: string;
    created_at: string;
    owner_name: string;
    permission: string;
    item_count: unknown;
  }>(
    `SELECT l.id, l.name, l.description, l.created_at, u.username AS owner_name, s.permission,
            (SELECT CAST(COUNT(*) AS INTEGER) FROM items i WHERE i.list_id = l.id) AS item_count
       FROM shares s
       JOIN lists l ON l.id = s.list_id
       JOIN users u ON u.id = l.owner_id
      WHERE s.grantee_id = ?
      ORDER BY s.created_at DESC, s.id DESC`,
    [actor.userId]
  );

  const result: SharedListSummary[] = [];
  for (const row of rows) {
    result.push({
      id: row.id,
      name: row.name,
      description: row.description,
      createdAt: row.created_at,
      ownerName: row.owner_name,
      permission: toPermission(row.permission),
      itemCount: toNumber(row.item_count),
      frameworks: await listFrameworkKeys(db, row.id),
      shared: true,
    });
  }
  return result;
}

/**
 * Register sharing routes
 */
export async function registerShareRoutes(fastify: FastifyInstance, _options: FastifyPluginOptions) {
  fastify.addHook('preHandler', authenticate);

  /**
   * POST /api/lists/:listId/shares - Grant or update access
   */
  fastify.post<{ Params: { listId: string } }>('/lists/:listId/shares', async (request, reply) => {
    const { username, permission } = parseBody(shareSchema, request.body);
    const result = await shareList(
      fastify.db,
      fastify.clock,
      requireActor(request),
      parseId(request.params.listId, 'list id'),
      username,
      permission
    );
    reply.code(result.created ? 201 : 200);
    return { ok: true, ...result };
  });

  /**
   * GET /api/lists/:listId/shares - Grants on a list
   */
  fastify.get<{ Params: { listId: string } }>('/lists/:listId/shares', async (request) => {
    return listShares(fastify.db, requireActor(request), parseId(request.params.listId, 'list id'));
  });

  /**
   * DELETE /api/lists/:listId/shares/:shareId - Revoke a grant
   */
  fastify.delete<{ Params: { listId: string; shareId: string } }>(
    '/lists/:listId/shares/:shareId',
    async (request) => {
      const { listId, shareId } = request.params;
      await revokeShare(fastify.db, requireActor(request), parseId(listId, 'list id'), parseId(shareId, 'share id'));
      return { ok: true };
    }
  );

  /**
   * GET /api/shared-lists - Lists shared to the current user
   */
  fastify.get('/shared-lists', async (request) => listSharedWithMe(fastify.db, requireActor(request)));
}
