/**
 * Ownership and share-based permission checks
 * @module access
 */

import type { Queryable } from '../database/index.js';
import type { ActorContext } from '../context/index.js';
import { ForbiddenError, NotFoundError } from '../errors/index.js';

/**
 * Stored list row
 */
export type ListRow = {
  id: number;
  owner_id: number;
  name: string;
  description: string;
  created_at: string;
};

/**
 * How the actor relates to a list. A share's permission decides between
 * `read` and `write`.
 */
export type ListRole = 'owner' | 'write' | 'read';

/**
 * Level of access an operation needs
 */
export type AccessMode = 'read' | 'write' | 'owner';

export interface ListAccess {
  list: ListRow;
  role: ListRole;
}

export interface ItemAccess extends ListAccess {
  itemId: number;
}

/**
 * Resolve the actor's role on a list. Lists the actor can neither own nor
 * see through a share are reported as missing.
 */
export async function resolveListAccess(
  db: Queryable,
  actor: ActorContext,
  listId: number
): Promise<ListAccess> {
  const list = await db.get<ListRow>(
    'SELECT id, owner_id, name, description, created_at FROM lists WHERE id = ?',
    [listId]
  );
  if (!list) {
    throw new NotFoundError('List not found');
  }
  if (list.owner_id === actor.userId) {
    return { list, role: 'owner' };
  }

  const share = await db.get<{ permission: string }>(
    'SELECT permission FROM shares WHERE list_id = ? AND grantee_id = ?',
    [listId, actor.userId]
  );
  if (!share) {
    throw new NotFoundError('List not found');
  }
  return { list, role: share.permission === 'write' ? 'write' : 'read' };
}

/**
 * Check that a role satisfies an access mode
 */
export function assertRole(role: ListRole, mode: AccessMode): void {
  if (mode === 'write' && role === 'read') {
    throw new ForbiddenError('You have read-only access to this list');
  }
  if (mode === 'owner' && role !== 'owner') {
    throw new ForbiddenError('Only the list owner can do this');
  }
}

/**
 * Resolve list access and enforce the required mode
 */
export async function requireList(
  db: Queryable,
  actor: ActorContext,
  listId: number,
  mode: AccessMode
): Promise<ListAccess> {
  const access = await resolveListAccess(db, actor, listId);
  assertRole(access.role, mode);
  return access;
}

/**
 * Resolve access to an item through its parent list
 *
 * @param expectedListId - When given, the item must belong to this list
 */
export async function requireItem(
  db: Queryable,
  actor: ActorContext,
  itemId: number,
  mode: AccessMode,
  expectedListId?: number
): Promise<ItemAccess> {
  const item = await db.get<{ list_id: number }>('SELECT list_id FROM items WHERE id = ?', [itemId]);
  if (!item || (expectedListId !== undefined && item.list_id !== expectedListId)) {
    throw new NotFoundError('Item not found');
  }

  let access: ListAccess;
  try {
    access = await resolveListAccess(db, actor, item.list_id);
  } catch (error) {
    if (error instanceof NotFoundError) {
      throw new NotFoundError('Item not found');
    }
    throw error;
  }
  assertRole(access.role, mode);
  return { ...access, itemId };
}
