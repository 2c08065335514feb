/**
 * Items module unit tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import {
  buildTestServer,
  createItemAs,
  createListAs,
  fixedClock,
  requestAs,
  signUp,
  type TestUser,
} from '../../testing/index.js';

describe('Item routes', () => {
  let server: FastifyInstance;
  let alice: TestUser;
  let bob: TestUser;
  let listId: number;

  beforeEach(async () => {
    server = await buildTestServer({ clock: fixedClock('2026-03-15T12:00:00.000Z') });
    alice = await signUp(server, 'alice');
    bob = await signUp(server, 'bob');
    listId = await createListAs(server, alice, 'Errands');
  });

  afterEach(async () => {
    await server.close();
  });

  async function titles(id = listId): Promise<string[]> {
    const response = await requestAs(server, alice, 'GET', `/api/lists/${id}/items`);
    return JSON.parse(response.body).map((item: { title: string }) => item.title);
  }

  describe('POST /api/lists/:listId/items', () => {
    it('should append items with defaults', async () => {
      const id = await createItemAs(server, alice, listId, { title: ' Buy milk ' });
      await createItemAs(server, alice, listId, { title: 'Call dentist', priority: 'high', dueDate: '2026-03-20' });

      const items = JSON.parse((await requestAs(server, alice, 'GET', `/api/lists/${listId}/items`)).body);
      expect(items).toHaveLength(2);
      expect(items[0]).toEqual({
        id,
        listId,
        title: 'Buy milk',
        description: '',
        priority: 'medium',
        dueDate: null,
        completed: false,
        position: 0,
        createdAt: '2026-03-15T12:00:00.000Z',
        tags: [],
      });
      expect(items[1]).toMatchObject({ title: 'Call dentist', priority: 'high', dueDate: '2026-03-20', position: 1 });
    });

    it('should require a title', async () => {
      const response = await requestAs(server, alice, 'POST', `/api/lists/${listId}/items`, { title: '' });

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body)).toEqual({ error: 'Title is required', code: 'VALIDATION_ERROR' });
    });

    it('should reject an unknown priority', async () => {
      const response = await requestAs(server, alice, 'POST', `/api/lists/${listId}/items`, {
        title: 'x',
        priority: 'urgent',
      });

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body).error).toBe('Priority must be one of high, medium, low');
    });

    it('should reject impossible due dates', async () => {
      const response = await requestAs(server, alice, 'POST', `/api/lists/${listId}/items`, {
        title: 'x',
        dueDate: '2026-02-30',
      });

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body).error).toBe('Due date is not a valid calendar date');
    });

    it('should not let strangers add items', async () => {
      const response = await requestAs(server, bob, 'POST', `/api/lists/${listId}/items`, { title: 'Sneaky' });
      expect(response.statusCode).toBe(404);
    });

    it('should not let read-only grantees add items', async () => {
      await requestAs(server, alice, 'POST', `/api/lists/${listId}/shares`, { username: 'bob' });
      const response = await requestAs(server, bob, 'POST', `/api/lists/${listId}/items`, { title: 'Sneaky' });

      expect(response.statusCode).toBe(403);
      expect(JSON.parse(response.body).error).toBe('You have read-only access to this list');
    });
  });

  describe('GET /api/lists/:listId/items/:itemId', () => {
    it('should return one item', async () => {
      const id = await createItemAs(server, alice, listId, { title: 'Only' });
      const response = await requestAs(server, alice, 'GET', `/api/lists/${listId}/items/${id}`);

      expect(JSON.parse(response.body)).toMatchObject({ id, title: 'Only' });
    });

    it('should not find an item through another list', async () => {
      const otherList = await createListAs(server, alice, 'Other');
      const id = await createItemAs(server, alice, listId, { title: 'Here' });
      const response = await requestAs(server, alice, 'GET', `/api/lists/${otherList}/items/${id}`);

      expect(response.statusCode).toBe(404);
      expect(JSON.parse(response.body).error).toBe('Item not found');
    });
  });

  describe('PUT /api/lists/:listId/items/:itemId', () => {
    it('should update given fields and clear the due date with null', async () => {
      const id = await createItemAs(server, alice, listId, { title: 'Draft', dueDate: '2026-04-01' });

      await requestAs(server, alice, 'PUT', `/api/lists/${listId}/items/${id}`, { title: 'Final', dueDate: null });

      const item = JSON.parse((await requestAs(server, alice, 'GET', `/api/lists/${listId}/items/${id}`)).body);
      expect(item).toMatchObject({ title: 'Final', dueDate: null, priority: 'medium' });
    });

    it('should reject an empty update', async () => {
      const id = await createItemAs(server, alice, listId, { title: 'Draft' });
      const response = await requestAs(server, alice, 'PUT', `/api/lists/${listId}/items/${id}`, {});

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body).error).toBe('Nothing to update');
    });

    it('should let write grantees edit', async () => {
      const id = await createItemAs(server, alice, listId, { title: 'Draft' });
      await requestAs(server, alice, 'POST', `/api/lists/${listId}/shares`, { username: 'bob', permission: 'write' });

      const response = await requestAs(server, bob, 'PUT', `/api/lists/${listId}/items/${id}`, { title: 'By Bob' });
      expect(response.statusCode).toBe(200);
      expect(await titles()).toEqual(['By Bob']);
    });
  });

  describe('PUT /api/lists/:listId/items/:itemId/toggle', () => {
    it('should flip completion each time', async () => {
      const id = await createItemAs(server, alice, listId, { title: 'Flip' });

      const first = await requestAs(server, alice, 'PUT', `/api/lists/${listId}/items/${id}/toggle`);
      const second = await requestAs(server, alice, 'PUT', `/api/lists/${listId}/items/${id}/toggle`);

      expect(JSON.parse(first.body)).toEqual({ ok: true, completed: true });
      expect(JSON.parse(second.body)).toEqual({ ok: true, completed: false });
    });
  });

  describe('DELETE /api/lists/:listId/items/:itemId', () => {
    it('should delete the item', async () => {
      const id = await createItemAs(server, alice, listId, { title: 'Gone' });
      await createItemAs(server, alice, listId, { title: 'Stays' });

      const response = await requestAs(server, alice, 'DELETE', `/api/lists/${listId}/items/${id}`);
      expect(JSON.parse(response.body)).toEqual({ ok: true });
      expect(await titles()).toEqual(['Stays']);
    });

    it('should answer 404 for a missing item', async () => {
      const response = await requestAs(server, alice, 'DELETE', `/api/lists/${listId}/items/999`);
      expect(response.statusCode).toBe(404);
    });
  });

  describe('PUT /api/lists/:listId/items/reorder', () => {
    it('should apply a full permutation', async () => {
      const a = await createItemAs(server, alice, listId, { title: 'A' });
      const b = await createItemAs(server, alice, listId, { title: 'B' });
      const c = await createItemAs(server, alice, listId, { title: 'C' });

      const response = await requestAs(server, alice, 'PUT', `/api/lists/${listId}/items/reorder`, {
        order: [c, a, b],
      });

      expect(JSON.parse(response.body)).toEqual({ ok: true });
      expect(await titles()).toEqual(['C', 'A', 'B']);
    });

    it('should reject a partial order and keep the old one', async () => {
      const a = await createItemAs(server, alice, listId, { title: 'A' });
      const b = await createItemAs(server, alice, listId, { title: 'B' });
      await createItemAs(server, alice, listId, { title: 'C' });

      const response = await requestAs(server, alice, 'PUT', `/api/lists/${listId}/items/reorder`, { order: [b, a] });

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body).error).toBe('Order must include every item in the list');
      expect(await titles()).toEqual(['A', 'B', 'C']);
    });

    it('should reject duplicates', async () => {
      const a = await createItemAs(server, alice, listId, { title: 'A' });
      await createItemAs(server, alice, listId, { title: 'B' });

      const response = await requestAs(server, alice, 'PUT', `/api/lists/${listId}/items/reorder`, { order: [a, a] });
      expect(JSON.parse(response.body).error).toBe('Order contains duplicate ids');
    });

    it('should reject ids from another list', async () => {
      const otherList = await createListAs(server, alice, 'Other');
      const a = await createItemAs(server, alice, listId, { title: 'A' });
      const foreign = await createItemAs(server, alice, otherList, { title: 'F' });

      const response = await requestAs(server, alice, 'PUT', `/api/lists/${listId}/items/reorder`, {
        order: [a, foreign],
      });
      expect(JSON.parse(response.body).error).toBe(`Items not in this list: ${foreign}`);
    });
  });

  describe('POST /api/lists/:listId/items/bulk-delete', () => {
    it('should delete every listed item', async () => {
      const a = await createItemAs(server, alice, listId, { title: 'A' });
      const b = await createItemAs(server, alice, listId, { title: 'B' });
      await createItemAs(server, alice, listId, { title: 'C' });

      const response = await requestAs(server, alice, 'POST', `/api/lists/${listId}/items/bulk-delete`, {
        ids: [a, b],
      });

      expect(JSON.parse(response.body)).toEqual({ ok: true, deleted: 2 });
      expect(await titles()).toEqual(['C']);
    });

    it('should delete nothing when one id is foreign', async () => {
      const otherList = await createListAs(server, alice, 'Other');
      const a = await createItemAs(server, alice, listId, { title: 'A' });
      const foreign = await createItemAs(server, alice, otherList, { title: 'F' });

      const response = await requestAs(server, alice, 'POST', `/api/lists/${listId}/items/bulk-delete`, {
        ids: [a, foreign],
      });

      expect(response.statusCode).toBe(400);
      expect(await titles()).toEqual(['A']);
      expect(await titles(otherList)).toEqual(['F']);
    });

    it('should reject an empty id list', async () => {
      const response = await requestAs(server, alice, 'POST', `/api/lists/${listId}/items/bulk-delete`, { ids: [] });

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body).error).toBe('At least one id is required');
    });
  });

  describe('POST /api/lists/:listId/items/bulk-move', () => {
    it('should append moved items to the target in the given order', async () => {
      const target = await createListAs(server, alice, 'Target');
      await createItemAs(server, alice, target, { title: 'Existing' });
      const a = await createItemAs(server, alice, listId, { title: 'A' });
      const b = await createItemAs(server, alice, listId, { title: 'B' });

      const response = await requestAs(server, alice, 'POST', `/api/lists/${listId}/items/bulk-move`, {
        ids: [b, a],
        targetListId: target,
      });

      expect(JSON.parse(response.body)).toEqual({ ok: true, moved: 2 });
      expect(await titles()).toEqual([]);
      expect(await titles(target)).toEqual(['Existing', 'B', 'A']);
    });

    it('should move nothing when one id is not in the list', async () => {
      const target = await createListAs(server, alice, 'Target');
      const a = await createItemAs(server, alice, listId, { title: 'A' });

      const response = await requestAs(server, alice, 'POST', `/api/lists/${listId}/items/bulk-move`, {
        ids: [a, 9999],
        targetListId: target,
      });

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body).error).toBe('Items not in this list: 9999');
      expect(await titles()).toEqual(['A']);
      expect(await titles(target)).toEqual([]);
    });

    it('should refuse to move into the same list', async () => {
      const a = await createItemAs(server, alice, listId, { title: 'A' });
      const response = await requestAs(server, alice, 'POST', `/api/lists/${listId}/items/bulk-move`, {
        ids: [a],
        targetListId: listId,
      });

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body).error).toBe('Target list must differ from the source list');
    });

    it('should need write access to the target', async () => {
      const bobsList = await createListAs(server, bob, 'Bob only');
      const a = await createItemAs(server, alice, listId, { title: 'A' });

      const response = await requestAs(server, alice, 'POST', `/api/lists/${listId}/items/bulk-move`, {
        ids: [a],
        targetListId: bobsList,
      });

      expect(response.statusCode).toBe(404);
      expect(await titles()).toEqual(['A']);
    });
  });
});
