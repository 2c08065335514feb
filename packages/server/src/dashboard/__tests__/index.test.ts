/**
 * Dashboard module unit tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { completionRate } from '../index.js';
import {
  buildTestServer,
  createItemAs,
  createListAs,
  fixedClock,
  requestAs,
  signUp,
  type TestUser,
} from '../../testing/index.js';

describe('completionRate', () => {
  it('should be zero for an empty collection', () => {
    expect(completionRate(0, 0)).toBe(0);
  });

  it('should round to one decimal', () => {
    expect(completionRate(1, 3)).toBe(33.3);
    expect(completionRate(2, 3)).toBe(66.7);
    expect(completionRate(4, 4)).toBe(100);
  });
});

describe('Dashboard route', () => {
  let server: FastifyInstance;
  let alice: TestUser;
  let bob: TestUser;

  beforeEach(async () => {
    server = await buildTestServer({ clock: fixedClock('2026-03-15T12:00:00.000Z') });
    alice = await signUp(server, 'alice');
    bob = await signUp(server, 'bob');
  });

  afterEach(async () => {
    await server.close();
  });

  async function dashboard(user: TestUser) {
    return JSON.parse((await requestAs(server, user, 'GET', '/api/dashboard')).body);
  }

  it('should report zeros for a new account', async () => {
    expect(await dashboard(alice)).toEqual({
      totalLists: 0,
      totalItems: 0,
      completedItems: 0,
      completionRate: 0,
      overdueItems: 0,
      highPriority: 0,
      byPriority: { high: 0, medium: 0, low: 0 },
      frameworkUsage: {},
      recentItems: [],
    });
  });

  it('should aggregate over owned lists', async () => {
    const work = await createListAs(server, alice, 'Work');
    const home = await createListAs(server, alice, 'Home');
    const report = await createItemAs(server, alice, work, { title: 'Report', priority: 'high', dueDate: '2026-03-14' });
    await createItemAs(server, alice, work, { title: 'Slides', priority: 'high', dueDate: '2026-03-15' });
    await createItemAs(server, alice, home, { title: 'Dishes', priority: 'low' });
    const done = await createItemAs(server, alice, home, { title: 'Laundry', dueDate: '2026-01-01' });
    await requestAs(server, alice, 'PUT', `/api/lists/${home}/items/${done}/toggle`);
    await requestAs(server, alice, 'POST', `/api/lists/${work}/frameworks`, { frameworkKey: 'pareto' });
    await requestAs(server, alice, 'POST', `/api/lists/${work}/frameworks`, { frameworkKey: 'eisenhower' });
    await requestAs(server, alice, 'POST', `/api/lists/${home}/frameworks`, { frameworkKey: 'eisenhower' });

    const stats = await dashboard(alice);

    expect(stats).toMatchObject({
      totalLists: 2,
      totalItems: 4,
      completedItems: 1,
      completionRate: 25,
      overdueItems: 1,
      highPriority: 2,
      byPriority: { high: 2, medium: 1, low: 1 },
      frameworkUsage: { eisenhower: 2, pareto: 1 },
    });
    expect(Object.keys(stats.frameworkUsage)).toEqual(['eisenhower', 'pareto']);
    expect(stats.recentItems.map((item: { title: string }) => item.title)).toEqual([
      'Laundry',
      'Dishes',
      'Slides',
      'Report',
    ]);
    expect(stats.recentItems[3]).toEqual({
      id: report,
      listId: work,
      title: 'Report',
      description: '',
      priority: 'high',
      dueDate: '2026-03-14',
      completed: false,
      position: 0,
      createdAt: '2026-03-15T12:00:00.000Z',
      listName: 'Work',
    });
  });

  it('should leave shared lists out', async () => {
    const listId = await createListAs(server, alice, 'Shared');
    await createItemAs(server, alice, listId, { title: 'Theirs' });
    await requestAs(server, alice, 'POST', `/api/lists/${listId}/shares`, { username: 'bob', permission: 'write' });

    const stats = await dashboard(bob);
    expect(stats.totalLists).toBe(0);
    expect(stats.totalItems).toBe(0);
  });

  it('should show at most ten recent items', async () => {
    const listId = await createListAs(server, alice, 'Many');
    for (let index = 0; index < 12; index += 1) {
      await createItemAs(server, alice, listId, { title: `Item ${index}` });
    }

    const stats = await dashboard(alice);
    expect(stats.recentItems).toHaveLength(10);
    expect(stats.recentItems[0].title).toBe('Item 11');
  });
});
