/**
 * Response shapes of the Focusboard API, checked on arrival
 * @module client/schemas
 */

import { z } from 'zod';
import { FRAMEWORK_KEYS } from '../frameworks/index.js';

export const frameworkKeySchema = z.enum(FRAMEWORK_KEYS);
export const prioritySchema = z.enum(['high', 'medium', 'low']);
export const rolesSchema = z.enum(['owner', 'write', 'read']);
export const permissionSchema = z.enum(['read', 'write']);
export const frameworkDataSchema = z.record(z.union([z.string(), z.number()]));

export const errorBodySchema = z.object({
  error: z.string(),
  code: z.string().optional(),
});

export const okSchema = z.object({ ok: z.literal(true) });
export const createdSchema = okSchema.extend({ id: z.number() });

export const userSchema = z.object({
  id: z.number(),
  username: z.string(),
});

export const authResultSchema = okSchema.extend({ user: userSchema });

export const meSchema = z.union([
  z.object({ loggedIn: z.literal(true), user: userSchema }),
  z.object({ loggedIn: z.literal(false) }),
]);

export const listSummarySchema = z.object({
  id: z.number(),
  name: z.string(),
  description: z.string(),
  createdAt: z.string(),
  itemCount: z.number(),
  completedCount: z.number(),
  frameworks: z.array(frameworkKeySchema),
  shared: z.literal(false),
});

export const listDetailSchema = z.object({
  id: z.number(),
  ownerId: z.number(),
  name: z.string(),
  description: z.string(),
  createdAt: z.string(),
  frameworks: z.array(frameworkKeySchema),
  role: rolesSchema,
});

export const tagSchema = z.object({
  id: z.number(),
  name: z.string(),
  color: z.string(),
});

export const itemSchema = z.object({
  id: z.number(),
  listId: z.number(),
  title: z.string(),
  description: z.string(),
  priority: prioritySchema,
  dueDate: z.string().nullable(),
  completed: z.boolean(),
  position: z.number(),
  createdAt: z.string(),
  tags: z.array(tagSchema),
});

export const toggleResultSchema = okSchema.extend({ completed: z.boolean() });
export const bulkDeleteResultSchema = okSchema.extend({ deleted: z.number() });
export const bulkMoveResultSchema = okSchema.extend({ moved: z.number() });

export const catalogEntrySchema = z.object({
  key: frameworkKeySchema,
  name: z.string(),
  author: z.string(),
  description: z.string(),
  icon: z.string(),
  color: z.string(),
});

export const frameworksResultSchema = okSchema.extend({ frameworks: z.array(frameworkKeySchema) });

export const frameworkEntrySchema = z.object({
  data: frameworkDataSchema,
  title: z.string(),
  description: z.string(),
});

export const frameworkDataMapSchema = z.record(frameworkEntrySchema);

export const frameworkDataResultSchema = okSchema.extend({ data: frameworkDataSchema });
export const batchResultSchema = okSchema.extend({ items: z.record(frameworkDataSchema) });

export const commentSchema = z.object({
  id: z.number(),
  itemId: z.number(),
  authorId: z.number(),
  username: z.string(),
  content: z.string(),
  createdAt: z.string(),
});

export const shareSchema = z.object({
  id: z.number(),
  listId: z.number(),
  granteeId: z.number(),
  username: z.string(),
  permission: permissionSchema,
  createdAt: z.string(),
});

export const shareResultSchema = createdSchema.extend({ created: z.boolean() });

export const sharedListSchema = z.object({
  id: z.number(),
  name: z.string(),
  description: z.string(),
  createdAt: z.string(),
  ownerName: z.string(),
  permission: permissionSchema,
  itemCount: z.number(),
  frameworks: z.array(frameworkKeySchema),
  shared: z.literal(true),
});

export const templateSchema = z.object({
  id: z.number(),
  name: z.string(),
  description: z.string(),
  createdAt: z.string(),
  items: z.array(
    z.object({
      title: z.string(),
      description: z.string(),
      priority: prioritySchema,
      dueDate: z.string().nullable(),
    })
  ),
});

export const importResultSchema = createdSchema.extend({ itemCount: z.number() });

export const dashboardSchema = z.object({
  totalLists: z.number(),
  totalItems: z.number(),
  completedItems: z.number(),
  completionRate: z.number(),
  overdueItems: z.number(),
  highPriority: z.number(),
  byPriority: z.object({ high: z.number(), medium: z.number(), low: z.number() }),
  frameworkUsage: z.record(z.number()),
  recentItems: z.array(itemSchema.omit({ tags: true }).extend({ listName: z.string() })),
});

export const healthSchema = z.object({
  status: z.enum(['ok', 'unhealthy']),
  backend: z.enum(['sqlite', 'postgres']),
  timestamp: z.string().optional(),
});

export type User = z.infer<typeof userSchema>;
export type Me = z.infer<typeof meSchema>;
export type ListSummary = z.infer<typeof listSummarySchema>;
export type ListDetail = z.infer<typeof listDetailSchema>;
export type Tag = z.infer<typeof tagSchema>;
export type Item = z.infer<typeof itemSchema>;
export type Priority = z.infer<typeof prioritySchema>;
export type SharePermission = z.infer<typeof permissionSchema>;
export type CatalogEntry = z.infer<typeof catalogEntrySchema>;
export type FrameworkEntry = z.infer<typeof frameworkEntrySchema>;
export type Comment = z.infer<typeof commentSchema>;
export type Share = z.infer<typeof shareSchema>;
export type SharedList = z.infer<typeof sharedListSchema>;
export type Template = z.infer<typeof templateSchema>;
export type Dashboard = z.infer<typeof dashboardSchema>;
export type Health = z.infer<typeof healthSchema>;
