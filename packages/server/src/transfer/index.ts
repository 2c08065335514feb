/**
 * Transfer module - list export to JSON/CSV and import from JSON or plain text
 * @module transfer
 */

import type { FastifyInstance, FastifyPluginOptions } from 'fastify';
import { z } from 'zod';
import type { Database, Queryable } from '../database/index.js';
import { requireList } from '../access/index.js';
import { nowIso, requireActor, parseId, type ActorContext, type Clock } from '../context/index.js';
import { ValidationError } from '../errors/index.js';
import { authenticate } from '../auth/index.js';
import { insertItem, loadItems } from '../items/index.js';
import { insertList } from '../lists/index.js';
import { isFrameworkKey, listFrameworkKeys, type FrameworkKey } from '../frameworks/index.js';
import {
  descriptionSchema,
  dueDateSchema,
  MAX_NAME_LENGTH,
  prioritySchema,
  requiredName,
  type Priority,
} from '../validation/index.js';

export const MAX_IMPORT_ITEMS = 1000;
export const DEFAULT_IMPORT_NAME = 'Imported List';
export const CSV_HEADER = ['title', 'description', 'priority', 'due_date', 'completed'] as const;

export type ExportFormat = 'json' | 'csv';

export interface ExportedItem {
  title: string;
  description: string;
  priority: Priority;
  dueDate: string | null;
  completed: boolean;
}

/**
 * Portable form of a list; also the structured import format
 */
export interface ListDocument {
  name: string;
  description: string;
  frameworks: FrameworkKey[];
  items: ExportedItem[];
}

export interface ExportFile {
  filename: string;
  contentType: string;
  body: string;
}

export interface ImportResult {
  id: number;
  itemCount: number;
}

const importNameSchema = z
  .string({ invalid_type_error: 'Name must be a string' })
  .trim()
  .max(MAX_NAME_LENGTH, `Must be at most ${MAX_NAME_LENGTH} characters`)
  .optional()
  .transform((name) => name || DEFAULT_IMPORT_NAME);

const importedItemSchema = z.object({
  title: requiredName('Title is required'),
  description: descriptionSchema.default(''),
  priority: prioritySchema.default('medium'),
  dueDate: dueDateSchema.nullable().default(null),
  completed: z.boolean({ invalid_type_error: 'Completed must be a boolean' }).default(false),
});

const structuredImportSchema = z.object({
  name: importNameSchema,
  description: descriptionSchema.default(''),
  frameworks: z
    .array(
      z.string({ invalid_type_error: 'Frameworks must be strings' }).refine(isFrameworkKey, (value) => ({
        message: `Unknown framework: ${value}`,
      })),
      { invalid_type_error: 'frameworks must be an array' }
    )
    .default([]),
  items: z
    .array(importedItemSchema, { invalid_type_error: 'items must be an array' })
    .max(MAX_IMPORT_ITEMS, `At most ${MAX_IMPORT_ITEMS} items can be imported`)
    .default([]),
});

const textImportSchema = z.object({
  name: importNameSchema,
  text: z.string({ invalid_type_error: 'text must be a string' }),
});

export const exportQuerySchema = z.object({
  format: z.enum(['json', 'csv'], { errorMap: () => ({ message: 'Format must be json or csv' }) }).default('json'),
});

function describeIssue(issue: z.ZodIssue): string {
  const [field, index] = issue.path;
  return field === 'items' && typeof index === 'number' ? `Item ${index + 1}: ${issue.message}` : issue.message;
}

function parseWith<S extends z.ZodTypeAny>(schema: S, value: unknown): z.output<S> {
  const result = schema.safeParse(value ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ValidationError(issue ? describeIssue(issue) : 'Invalid import document');
  }
  return result.data;
}

function toDocument(parsed: z.output<typeof structuredImportSchema>): ListDocument {
  return { ...parsed, frameworks: [...new Set(parsed.frameworks.filter(isFrameworkKey))] };
}

/**
 * Turn plain text into a document with one item per non-empty line
 */
export function documentFromText(name: string, text: string): ListDocument {
  const titles = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  return toDocument(
    parseWith(structuredImportSchema, {
      name,
      items: titles.map((title) => ({ title })),
    })
  );
}

/**
 * Validate an import body as a whole. A body carrying `text` is a plain-text
 * import; anything else is a structured document.
 */
export function parseImportBody(body: unknown): ListDocument {
  if (typeof body === 'object' && body !== null && 'text' in body) {
    const { name, text } = parseWith(textImportSchema, body);
    return documentFromText(name, text);
  }
  return toDocument(parseWith(structuredImportSchema, body));
}

/**
 * Create a list from a validated document in one transaction
 */
export async function importList(
  db: Database,
  clock: Clock,
  actor: ActorContext,
  document: ListDocument
): Promise<ImportResult> {
  return db.transaction(async (tx) => {
    const listId = await insertList(tx, clock, actor.userId, document.name, document.description);
    for (const [position, item] of document.items.entries()) {
      await insertItem(tx, clock, listId, item, position);
    }
    for (const key of document.frameworks) {
      await tx.run('INSERT INTO list_frameworks (list_id, framework_key, attached_at) VALUES (?, ?, ?)', [
        listId,
        key,
        nowIso(clock),
      ]);
    }
    return { id: listId, itemCount: document.items.length };
  });
}

export async function buildListDocument(db: Queryable, actor: ActorContext, listId: number): Promise<ListDocument> {
  const { list } = await requireList(db, actor, listId, 'read');
  const items = await loadItems(db, listId);
  return {
    name: list.name,
    description: list.description,
    frameworks: await listFrameworkKeys(db, listId),
    items: items.map((item) => ({
      title: item.title,
      description: item.description,
      priority: item.priority,
      dueDate: item.dueDate,
      completed: item.completed,
    })),
  };
}

/**
 * Quote a CSV field when it holds a delimiter, quote or line break
 */
export function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/**
 * RFC 4180 CSV of a document's items, CRLF line endings
 */
export function toCsv(document: ListDocument): string {
  const rows = [CSV_HEADER.join(',')];
  for (const item of document.items) {
    rows.push(
      [item.title, item.description, item.priority, item.dueDate ?? '', item.completed ? '1' : '0']
        .map(csvField)
        .join(',')
    );
  }
  return `${rows.join('\r\n')}\r\n`;
}

/**
 * File name stem safe for a Content-Disposition header
 */
export function safeFilename(name: string): string {
  return name.replace(/[^a-zA-Z0-9_\- ]/g, '').trim().slice(0, 50) || 'export';
}

export async function exportList(
  db: Queryable,
  actor: ActorContext,
  listId: number,
  format: ExportFormat
): Promise<ExportFile> {
  const document = await buildListDocument(db, actor, listId);
  const stem = safeFilename(document.name);
  if (format === 'csv') {
    return { filename: `${stem}.csv`, contentType: 'text/csv; charset=utf-8', body: toCsv(document) };
  }
  return {
    filename: `${stem}.json`,
    contentType: 'application/json; charset=utf-8',
    body: JSON.stringify(document, null, 2),
  };
}

/**
 * Register import/export routes
 */
export async function registerTransferRoutes(fastify: FastifyInstance, _options: FastifyPluginOptions) {
  fastify.addHook('preHandler', authenticate);

  /**
   * GET /api/lists/:listId/export?format=json|csv - Download a list
   */
  fastify.get<{ Params: { listId: string }; Querystring: { format?: string } }>(
    '/lists/:listId/export',
    async (request, reply) => {
      const { format } = parseWith(exportQuerySchema, request.query);
      const file = await exportList(
        fastify.db,
        requireActor(request),
        parseId(request.params.listId, 'list id'),
        format
      );
      reply.header('Content-Disposition', `attachment; filename="${file.filename}"`);
      reply.type(file.contentType);
      return file.body;
    }
  );

  /**
   * POST /api/lists/import - Create a list from a document or plain text
   */
  fastify.post('/lists/import', async (request, reply) => {
    const document = parseImportBody(request.body);
    const result = await importList(fastify.db, fastify.clock, requireActor(request), document);
    reply.code(201);
    return { ok: true, ...result };
  });
}
