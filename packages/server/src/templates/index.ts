/**
 * Templates module - reusable snapshots of a list's items
 * @module templates
 */

import type { FastifyInstance, FastifyPluginOptions } from 'fastify';
import { z } from 'zod';
import type { Database, Queryable } from '../database/index.js';
import { requireList } from '../access/index.js';
import { nowIso, parseBody, parseId, requireActor, type ActorContext, type Clock } from '../context/index.js';
import { NotFoundError } from '../errors/index.js';
import { authenticate } from '../auth/index.js';
import { insertItem, loadItems } from '../items/index.js';
import { insertList } from '../lists/index.js';
import { descriptionSchema, PRIORITIES, requiredName, type Priority } from '../validation/index.js';

/**
 * The item fields a template keeps. Tags, comments, completion and
 * framework placements are not part of a snapshot.
 */
export interface TemplateItem {
  title: string;
  description: string;
  priority: Priority;
  dueDate: string | null;
}

export interface Template {
  id: number;
  name: string;
  description: string;
  createdAt: string;
  items: TemplateItem[];
}

const storedItemsSchema = z.array(
  z.object({
    title: z.string(),
    description: z.string().catch(''),
    priority: z.enum(PRIORITIES).catch('medium'),
    dueDate: z.string().nullable().catch(null),
  })
);

const saveTemplateSchema = z.object({
  name: requiredName('Template name is required'),
  description: descriptionSchema.optional(),
});

const instantiateSchema = z.object({
  name: requiredName('List name is required').optional(),
});

type TemplateRow = {
  id: number;
  name: string;
  description: string;
  items_json: string;
  created_at: string;
};

/**
 * Parse a stored snapshot; a corrupt snapshot reads as empty
 */
export function parseTemplateItems(json: string): TemplateItem[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch {
    return [];
  }
  const result = storedItemsSchema.safeParse(parsed);
  return result.success ? result.data : [];
}

function toTemplate(row: TemplateRow): Template {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    createdAt: row.created_at,
    items: parseTemplateItems(row.items_json),
  };
}

export async function listTemplates(db: Queryable, actor: ActorContext): Promise<Template[]> {
  const rows = await db.all<TemplateRow>(
    'SELECT id, name, description, items_json, created_at FROM templates WHERE owner_id = ? ORDER BY created_at DESC, id DESC',
    [actor.userId]
  );
  return rows.map(toTemplate);
}

/**
 * Snapshot a readable list's items, in display order, into a new template
 */
export async function saveTemplate(
  db: Queryable,
  clock: Clock,
  actor: ActorContext,
  listId: number,
  name: string,
  description?: string
): Promise<number> {
  const { list } = await requireList(db, actor, listId, 'read');
  const items: TemplateItem[] = (await loadItems(db, listId)).map((item) => ({
    title: item.title,
    description: item.description,
    priority: item.priority,
    dueDate: item.dueDate,
  }));

  return db.insert(
    'INSERT INTO templates (owner_id, name, description, items_json, created_at) VALUES (?, ?, ?, ?, ?)',
    [actor.userId, name, description ?? list.description, JSON.stringify(items), nowIso(clock)]
  );
}

async function requireTemplate(db: Queryable, actor: ActorContext, templateId: number): Promise<TemplateRow> {
  const row = await db.get<TemplateRow>(
    'SELECT id, name, description, items_json, created_at FROM templates WHERE id = ? AND owner_id = ?',
    [templateId, actor.userId]
  );
  if (!row) {
    throw new NotFoundError('Template not found');
  }
  return row;
}

/**
 * Materialise a template as a new list owned by the actor
 */
export async function createListFromTemplate(
  db: Database,
  clock: Clock,
  actor: ActorContext,
  templateId: number,
  name?: string
): Promise<number> {
  const template = toTemplate(await requireTemplate(db, actor, templateId));

  return db.transaction(async (tx) => {
    const listId = await insertList(tx, clock, actor.userId, name ?? template.name, template.description);
    for (const [position, item] of template.items.entries()) {
      await insertItem(tx, clock, listId, item, position);
    }
    return listId;
  });
}

export async function deleteTemplate(db: Queryable, actor: ActorContext, templateId: number): Promise<void> {
  const result = await db.run('DELETE FROM templates WHERE id = ? AND owner_id = ?', [templateId, actor.userId]);
  if (result.changes === 0) {
    throw new NotFoundError('Template not found');
  }
}

/**
 * Register template routes
 */
export async function registerTemplateRoutes(fastify: FastifyInstance, _options: FastifyPluginOptions) {
  fastify.addHook('preHandler', authenticate);

  /**
   * GET /api/templates - The actor's templates, newest first
   */
  fastify.get('/templates', async (request) => listTemplates(fastify.db, requireActor(request)));

  /**
   * POST /api/lists/:listId/template - Save a list as a template
   */
  fastify.post<{ Params: { listId: string } }>('/lists/:listId/template', async (request, reply) => {
    const { name, description } = parseBody(saveTemplateSchema, request.body);
    const id = await saveTemplate(
      fastify.db,
      fastify.clock,
      requireActor(request),
      parseId(request.params.listId, 'list id'),
      name,
      description
    );
    reply.code(201);
    return { ok: true, id };
  });

  /**
   * POST /api/templates/:templateId/lists - Create a list from a template
   */
  fastify.post<{ Params: { templateId: string } }>('/templates/:templateId/lists', async (request, reply) => {
    const { name } = parseBody(instantiateSchema, request.body);
    const id = await createListFromTemplate(
      fastify.db,
      fastify.clock,
      requireActor(request),
      parseId(request.params.templateId, 'template id'),
      name
    );
    reply.code(201);
    return { ok: true, id };
  });

  /**
   * DELETE /api/templates/:templateId - Delete a template
   */
  fastify.delete<{ Params: { templateId: string } }>('/templates/:templateId', async (request) => {
    await deleteTemplate(fastify.db, requireActor(request), parseId(request.params.templateId, 'template id'));
    return { ok: true };
  });
}
