/**
 * Dashboard module - read-only aggregates over the actor's own lists
 * @module dashboard
 */

import type { FastifyInstance, FastifyPluginOptions } from 'fastify';
import { toNumber, type Queryable } from '../database/index.js';
import { requireActor, todayIso, type ActorContext, type Clock } from '../context/index.js';
import { authenticate } from '../auth/index.js';
import { FRAMEWORK_KEYS, type FrameworkKey } from '../frameworks/index.js';
import { toItem, type Item, type ItemRow } from '../items/index.js';
import type { Priority } from '../validation/index.js';

export const RECENT_ITEM_LIMIT = 10;

export interface RecentItem extends Omit<Item, 'tags'> {
  listName: string;
}

export interface DashboardStats {
  totalLists: number;
  totalItems: number;
  completedItems: number;
  completionRate: number;
  overdueItems: number;
  highPriority: number;
  byPriority: Record<Priority, number>;
  frameworkUsage: Partial<Record<FrameworkKey, number>>;
  recentItems: RecentItem[];
}

/**
 * Percentage rounded to one decimal; zero when there is nothing to count
 */
export function completionRate(completed: number, total: number): number {
  return total === 0 ? 0 : Math.round((completed / total) * 1000) / 10;
}

type TotalsRow = {
  total_items: unknown;
  completed_items: unknown;
  overdue_items: unknown;
  high_priority: unknown;
  high_items: unknown;
  medium_items: unknown;
  low_items: unknown;
};

/**
 * Compute dashboard figures. Only lists the actor owns are counted; lists
 * shared to the actor are left out.
 */
export async function getDashboard(db: Queryable, clock: Clock, actor: ActorContext): Promise<DashboardStats> {
  const today = todayIso(clock);

  const listCount = await db.get<{ total: unknown }>(
    'SELECT CAST(COUNT(*) AS INTEGER) AS total FROM lists WHERE owner_id = ?',
    [actor.userId]
  );

  const totals = await db.get<TotalsRow>(
    `SELECT CAST(COUNT(i.id) AS INTEGER) AS total_items,
            CAST(COALESCE(SUM(CASE WHEN i.completed = 1 THEN 1 ELSE 0 END), 0) AS INTEGER) AS completed_items,
            CAST(COALESCE(SUM(CASE WHEN i.completed = 0 AND i.due_date IS NOT NULL AND i.due_date < ? THEN 1 ELSE 0 END), 0) AS INTEGER) AS overdue_items,
            CAST(COALESCE(SUM(CASE WHEN i.completed = 0 AND i.priority = 'high' THEN 1 ELSE 0 END), 0) AS INTEGER) AS high_priority,
            CAST(COALESCE(SUM(CASE WHEN i.priority = 'high' THEN 1 ELSE 0 END), 0) AS INTEGER) AS high_items,
            CAST(COALESCE(SUM(CASE WHEN i.priority = 'medium' THEN 1 ELSE 0 END), 0) AS INTEGER) AS medium_items,
            CAST(COALESCE(SUM(CASE WHEN i.priority = 'low' THEN 1 ELSE 0 END), 0) AS INTEGER) AS low_items
       FROM items i
       JOIN lists l ON l.id = i.list_id
      WHERE l.owner_id = ?`,
    [today, actor.userId]
  );

  const usageRows = await db.all<{ framework_key: string; lists: unknown }>(
    `SELECT lf.framework_key, CAST(COUNT(*) AS INTEGER) AS lists
       FROM list_frameworks lf
       JOIN lists l ON l.id = lf.list_id
      WHERE l.owner_id = ?
      GROUP BY lf.framework_key`,
    [actor.userId]
  );

  const recentRows = await db.all<ItemRow & { list_name: string }>(
    `SELECT i.id, i.list_id, i.title, i.description, i.priority, i.due_date, i.completed, i.position, i.created_at,
            l.name AS list_name
       FROM items i
       JOIN lists l ON l.id = i.list_id
      WHERE l.owner_id = ?
      ORDER BY i.created_at DESC, i.id DESC
      LIMIT ${RECENT_ITEM_LIMIT}`,
    [actor.userId]
  );

  const usageByKey = new Map(usageRows.map((row) => [row.framework_key, toNumber(row.lists)]));
  const frameworkUsage: Partial<Record<FrameworkKey, number>> = {};
  for (const key of FRAMEWORK_KEYS) {
    const count = usageByKey.get(key);
    if (count !== undefined) {
      frameworkUsage[key] = count;
    }
  }

  const totalItems = toNumber(totals?.total_items);
  const completedItems = toNumber(totals?.completed_items);

  return {
    totalLists: toNumber(listCount?.total),
    totalItems,
    completedItems,
    completionRate: completionRate(completedItems, totalItems),
    overdueItems: toNumber(totals?.overdue_items),
    highPriority: toNumber(totals?.high_priority),
    byPriority: {
      high: toNumber(totals?.high_items),
      medium: toNumber(totals?.medium_items),
      low: toNumber(totals?.low_items),
    },
    frameworkUsage,
    recentItems: recentRows.map((row) => {
      const { tags: _tags, ...item } = toItem(row);
      return { ...item, listName: row.list_name };
    }),
  };
}

/**
 * Register dashboard routes
 */
export async function registerDashboardRoutes(fastify: FastifyInstance, _options: FastifyPluginOptions) {
  fastify.addHook('preHandler', authenticate);

  /**
   * GET /api/dashboard - Totals for the current user's lists
   */
  fastify.get('/dashboard', async (request) => getDashboard(fastify.db, fastify.clock, requireActor(request)));
}
