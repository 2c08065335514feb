/**
 * Integration tests for the SDK client against a live server
 *
 * The client's fetch is routed into `server.inject`, so requests, cookies
 * and response validation run end to end without opening a socket.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildTestServer, fixedClock } from '../../packages/server/src/testing/index.js';
import { ApiError, FocusboardClient } from '../../packages/sdk/src/client/index.js';
import { BoardViewModel } from '../../packages/sdk/src/board/index.js';

const METHODS = ['GET', 'POST', 'PUT', 'DELETE'] as const;
type Method = (typeof METHODS)[number];

function toMethod(value: string | undefined): Method {
  const method = METHODS.find((candidate) => candidate === (value ?? 'GET'));
  if (!method) {
    throw new Error(`Unsupported method ${value}`);
  }
  return method;
}

/**
 * A fetch that answers from the server in-process
 */
function injectFetch(server: FastifyInstance): typeof fetch {
  return async (input, init) => {
    const target = new URL(typeof input === 'string' ? input : input instanceof URL ? input.href : input.url);
    const headers: Record<string, string> = {};
    new Headers(init?.headers).forEach((value, name) => {
      headers[name] = value;
    });

    const response = await server.inject({
      method: toMethod(init?.method),
      url: `${target.pathname}${target.search}`,
      headers,
      payload: typeof init?.body === 'string' ? init.body : undefined,
    });

    const responseHeaders = new Headers();
    for (const [name, value] of Object.entries(response.headers)) {
      if (Array.isArray(value)) {
        value.forEach((entry) => responseHeaders.append(name, entry));
      } else if (value !== undefined) {
        responseHeaders.set(name, String(value));
      }
    }
    return new Response(response.body, { status: response.statusCode, headers: responseHeaders });
  };
}

describe('SDK client against the server', () => {
  let server: FastifyInstance;
  let alice: FocusboardClient;
  let bob: FocusboardClient;

  beforeEach(async () => {
    server = await buildTestServer({ clock: fixedClock('2026-03-15T12:00:00.000Z') });
    alice = new FocusboardClient({ baseUrl: 'http://focus.test', fetch: injectFetch(server) });
    bob = new FocusboardClient({ baseUrl: 'http://focus.test', fetch: injectFetch(server) });
  });

  afterEach(async () => {
    await server.close();
  });

  it('should hold a session from register to logout', async () => {
    const user = await alice.register('Alice', 'password123');
    expect(user).toEqual({ id: 1, username: 'alice' });
    expect(await alice.me()).toEqual({ loggedIn: true, user: { id: 1, username: 'alice' } });

    await alice.logout();
    expect(await alice.me()).toEqual({ loggedIn: false });
  });

  it('should surface server errors as ApiError', async () => {
    await alice.register('alice', 'password123');

    const error = await alice.getList(42).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({ status: 404, message: 'List not found', code: 'NOT_FOUND' });
  });

  it('should drive a shared list through both accounts', async () => {
    await alice.register('alice', 'password123');
    await bob.register('bob', 'password123');

    const listId = await alice.createList('Launch');
    const itemId = await alice.createItem(listId, { title: 'Write notes', priority: 'high' });
    await alice.shareList(listId, 'bob', 'write');

    const shared = await bob.getSharedLists();
    expect(shared.map((list) => list.id)).toEqual([listId]);

    await bob.attachFramework(listId, 'kanban');
    await bob.setFrameworkData(itemId, 'kanban', { column: 'review' });
    expect(await bob.toggleItem(listId, itemId)).toBe(true);

    const data = await alice.getFrameworkData(listId, 'kanban');
    expect(data[String(itemId)]?.data).toEqual({ column: 'review' });

    const items = await alice.getItems(listId);
    expect(items.map((item) => [item.title, item.completed])).toEqual([['Write notes', true]]);
  });

  it('should refuse writes from a read grantee', async () => {
    await alice.register('alice', 'password123');
    await bob.register('bob', 'password123');
    const listId = await alice.createList('Read only');
    await alice.shareList(listId, 'bob');

    await expect(bob.createItem(listId, { title: 'Sneaky' })).rejects.toMatchObject({
      status: 403,
      message: 'You have read-only access to this list',
    });
  });

  it('should back a board view-model', async () => {
    await alice.register('alice', 'password123');
    const listId = await alice.createList('Week');
    await alice.createItem(listId, { title: 'Gym' });
    await alice.attachFramework(listId, 'eisenhower');

    const board = new BoardViewModel(alice, { notificationTtlMs: 0 });
    try {
      expect(await board.openList(listId)).toBe(true);
      const [item] = board.state.items;
      if (!item) {
        throw new Error('expected an item');
      }

      expect(await board.moveToZone(item.id, 'schedule')).toBe(true);

      expect(board.zones().get('schedule')?.map((entry) => entry.title)).toEqual(['Gym']);
      expect(board.state.lists.map((list) => list.name)).toEqual(['Week']);
    } finally {
      board.destroy();
    }
  });
});
