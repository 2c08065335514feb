/**
 * Client module - typed access to every Focusboard API endpoint
 * @module client
 */

import type { z } from 'zod';
import type { FrameworkData, FrameworkKey } from '../frameworks/index.js';
import {
  authResultSchema,
  batchResultSchema,
  bulkDeleteResultSchema,
  bulkMoveResultSchema,
  catalogEntrySchema,
  commentSchema,
  createdSchema,
  dashboardSchema,
  errorBodySchema,
  frameworkDataResultSchema,
  frameworkDataMapSchema,
  frameworkKeySchema,
  frameworksResultSchema,
  healthSchema,
  importResultSchema,
  itemSchema,
  listDetailSchema,
  listSummarySchema,
  meSchema,
  okSchema,
  shareResultSchema,
  shareSchema,
  sharedListSchema,
  tagSchema,
  templateSchema,
  toggleResultSchema,
  type CatalogEntry,
  type Comment,
  type Dashboard,
  type FrameworkEntry,
  type Health,
  type Item,
  type ListDetail,
  type ListSummary,
  type Me,
  type Priority,
  type Share,
  type SharedList,
  type SharePermission,
  type Tag,
  type Template,
  type User,
} from './schemas.js';

export * from './schemas.js';

/**
 * SDK client configuration
 */
export interface ClientConfig {
  /**
   * Origin of the server, e.g. `http://localhost:3000`. Empty for same-origin.
   */
  baseUrl?: string;
  /**
   * Fetch implementation; defaults to the global one
   */
  fetch?: typeof fetch;
  headers?: Record<string, string>;
}

/**
 * A non-2xx response, or a body that does not match the expected shape
 */
export class ApiError extends Error {
  constructor(
    public readonly status: number,
    message: string,
    public readonly code?: string
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

export interface NewItem {
  title: string;
  description?: string;
  priority?: Priority;
  dueDate?: string | null;
}

export type ItemPatch = Partial<NewItem>;

export interface ListPatch {
  name?: string;
  description?: string;
}

export interface ImportDocument {
  name?: string;
  description?: string;
  frameworks?: FrameworkKey[];
  items: Array<NewItem & { completed?: boolean }>;
}

export interface TextImport {
  name?: string;
  text: string;
}

export type ExportFormat = 'json' | 'csv';

type Method = 'GET' | 'POST' | 'PUT' | 'DELETE';

// Splits a folded Set-Cookie header without breaking on commas inside Expires
const SET_COOKIE_SEPARATOR = /,(?=\s*[^;,=\s]+=)/;

/**
 * Focusboard API client. Keeps the session cookie the server hands out and
 * sends it back on later requests.
 */
export class FocusboardClient {
  private cookies = new Map<string, string>();
  private fetchImpl: typeof fetch;
  private baseUrl: string;
  private headers: Record<string, string>;

  constructor(config: ClientConfig = {}) {
    this.baseUrl = (config.baseUrl ?? '').replace(/\/+$/, '');
    this.fetchImpl = config.fetch ?? ((input, init) => fetch(input, init));
    this.headers = { ...config.headers };
  }

  /**
   * Whether a session cookie is currently held
   */
  get hasSession(): boolean {
    return this.cookies.size > 0;
  }

  // Auth

  async register(username: string, password: string): Promise<User> {
    return (await this.request('POST', '/api/register', authResultSchema, { username, password })).user;
  }

  async login(username: string, password: string): Promise<User> {
    return (await this.request('POST', '/api/login', authResultSchema, { username, password })).user;
  }

  async logout(): Promise<void> {
    await this.request('POST', '/api/logout', okSchema);
    this.cookies.clear();
  }

  async me(): Promise<Me> {
    return this.request('GET', '/api/me', meSchema);
  }

  // Lists

  async getLists(): Promise<ListSummary[]> {
    return this.request('GET', '/api/lists', listSummarySchema.array());
  }

  async createList(name: string, description?: string): Promise<number> {
    return (await this.request('POST', '/api/lists', createdSchema, { name, description })).id;
  }

  async getList(listId: number): Promise<ListDetail> {
    return this.request('GET', `/api/lists/${listId}`, listDetailSchema);
  }

  async updateList(listId: number, patch: ListPatch): Promise<void> {
    await this.request('PUT', `/api/lists/${listId}`, okSchema, patch);
  }

  async deleteList(listId: number): Promise<void> {
    await this.request('DELETE', `/api/lists/${listId}`, okSchema);
  }

  // Items

  async getItems(listId: number): Promise<Item[]> {
    return this.request('GET', `/api/lists/${listId}/items`, itemSchema.array());
  }

  async createItem(listId: number, item: NewItem): Promise<number> {
    return (await this.request('POST', `/api/lists/${listId}/items`, createdSchema, item)).id;
  }

  async updateItem(listId: number, itemId: number, patch: ItemPatch): Promise<void> {
    await this.request('PUT', `/api/lists/${listId}/items/${itemId}`, okSchema, patch);
  }

  async deleteItem(listId: number, itemId: number): Promise<void> {
    await this.request('DELETE', `/api/lists/${listId}/items/${itemId}`, okSchema);
  }

  async toggleItem(listId: number, itemId: number): Promise<boolean> {
    return (await this.request('PUT', `/api/lists/${listId}/items/${itemId}/toggle`, toggleResultSchema)).completed;
  }

  async reorderItems(listId: number, order: number[]): Promise<void> {
    await this.request('PUT', `/api/lists/${listId}/items/reorder`, okSchema, { order });
  }

  async bulkDeleteItems(listId: number, ids: number[]): Promise<number> {
    return (await this.request('POST', `/api/lists/${listId}/items/bulk-delete`, bulkDeleteResultSchema, { ids }))
      .deleted;
  }

  async bulkMoveItems(listId: number, ids: number[], targetListId: number): Promise<number> {
    const result = await this.request('POST', `/api/lists/${listId}/items/bulk-move`, bulkMoveResultSchema, {
      ids,
      targetListId,
    });
    return result.moved;
  }

  // Frameworks

  async getCatalog(): Promise<CatalogEntry[]> {
    return this.request('GET', '/api/frameworks', catalogEntrySchema.array());
  }

  async getListFrameworks(listId: number): Promise<FrameworkKey[]> {
    return this.request('GET', `/api/lists/${listId}/frameworks`, frameworkKeySchema.array());
  }

  async attachFramework(listId: number, frameworkKey: FrameworkKey): Promise<FrameworkKey[]> {
    return (await this.request('POST', `/api/lists/${listId}/frameworks`, frameworksResultSchema, { frameworkKey }))
      .frameworks;
  }

  async detachFramework(listId: number, frameworkKey: FrameworkKey): Promise<FrameworkKey[]> {
    return (await this.request('DELETE', `/api/lists/${listId}/frameworks/${frameworkKey}`, frameworksResultSchema))
      .frameworks;
  }

  async getFrameworkData(listId: number, frameworkKey: FrameworkKey): Promise<Record<string, FrameworkEntry>> {
    return this.request('GET', `/api/lists/${listId}/framework-data/${frameworkKey}`, frameworkDataMapSchema);
  }

  async setFrameworkData(itemId: number, frameworkKey: FrameworkKey, data: FrameworkData): Promise<FrameworkData> {
    return (
      await this.request('PUT', `/api/items/${itemId}/framework-data/${frameworkKey}`, frameworkDataResultSchema, {
        data,
      })
    ).data;
  }

  async batchSetFrameworkData(
    listId: number,
    frameworkKey: FrameworkKey,
    items: Record<string, FrameworkData>
  ): Promise<Record<string, FrameworkData>> {
    const result = await this.request(
      'PUT',
      `/api/lists/${listId}/framework-data/${frameworkKey}/batch`,
      batchResultSchema,
      { items }
    );
    return result.items;
  }

  // Tags

  async getTags(): Promise<Tag[]> {
    return this.request('GET', '/api/tags', tagSchema.array());
  }

  async createTag(name: string, color?: string): Promise<number> {
    return (await this.request('POST', '/api/tags', createdSchema, { name, color })).id;
  }

  async deleteTag(tagId: number): Promise<void> {
    await this.request('DELETE', `/api/tags/${tagId}`, okSchema);
  }

  async tagItem(itemId: number, tagId: number): Promise<void> {
    await this.request('POST', `/api/items/${itemId}/tags/${tagId}`, okSchema);
  }

  async untagItem(itemId: number, tagId: number): Promise<void> {
    await this.request('DELETE', `/api/items/${itemId}/tags/${tagId}`, okSchema);
  }

  // Comments

  async getComments(itemId: number): Promise<Comment[]> {
    return this.request('GET', `/api/items/${itemId}/comments`, commentSchema.array());
  }

  async addComment(itemId: number, content: string): Promise<number> {
    return (await this.request('POST', `/api/items/${itemId}/comments`, createdSchema, { content })).id;
  }

  async deleteComment(commentId: number): Promise<void> {
    await this.request('DELETE', `/api/comments/${commentId}`, okSchema);
  }

  // Sharing

  async shareList(
    listId: number,
    username: string,
    permission: SharePermission = 'read'
  ): Promise<{ id: number; created: boolean }> {
    const { id, created } = await this.request('POST', `/api/lists/${listId}/shares`, shareResultSchema, {
      username,
      permission,
    });
    return { id, created };
  }

  async getShares(listId: number): Promise<Share[]> {
    return this.request('GET', `/api/lists/${listId}/shares`, shareSchema.array());
  }

  async revokeShare(listId: number, shareId: number): Promise<void> {
    await this.request('DELETE', `/api/lists/${listId}/shares/${shareId}`, okSchema);
  }

  async getSharedLists(): Promise<SharedList[]> {
    return this.request('GET', '/api/shared-lists', sharedListSchema.array());
  }

  // Templates

  async getTemplates(): Promise<Template[]> {
    return this.request('GET', '/api/templates', templateSchema.array());
  }

  async saveTemplate(listId: number, name: string, description?: string): Promise<number> {
    return (await this.request('POST', `/api/lists/${listId}/template`, createdSchema, { name, description })).id;
  }

  async createListFromTemplate(templateId: number, name?: string): Promise<number> {
    return (await this.request('POST', `/api/templates/${templateId}/lists`, createdSchema, { name })).id;
  }

  async deleteTemplate(templateId: number): Promise<void> {
    await this.request('DELETE', `/api/templates/${templateId}`, okSchema);
  }

  // Import / export

  /**
   * Download a list as raw JSON or CSV text
   */
  async exportList(listId: number, format: ExportFormat = 'json'): Promise<string> {
    const response = await this.send('GET', `/api/lists/${listId}/export?format=${encodeURIComponent(format)}`);
    return response.text();
  }

  async importList(document: ImportDocument | TextImport): Promise<{ id: number; itemCount: number }> {
    const { id, itemCount } = await this.request('POST', '/api/lists/import', importResultSchema, document);
    return { id, itemCount };
  }

  // Dashboard

  async getDashboard(): Promise<Dashboard> {
    return this.request('GET', '/api/dashboard', dashboardSchema);
  }

  async health(): Promise<Health> {
    return this.request('GET', '/health', healthSchema);
  }

  /**
   * Send a request and check the JSON response against a schema
   */
  private async request<S extends z.ZodTypeAny>(
    method: Method,
    path: string,
    schema: S,
    body?: unknown
  ): Promise<z.output<S>> {
    const response = await this.send(method, path, body);
    const unexpected = () =>
      new ApiError(response.status, `Unexpected response from ${method} ${path}`, 'INVALID_RESPONSE');
    let payload: unknown;
    try {
      payload = await response.json();
    } catch {
      throw unexpected();
    }
    const result = schema.safeParse(payload);
    if (!result.success) {
      throw unexpected();
    }
    return result.data;
  }

  /**
   * Send a request, remember cookies and turn non-2xx responses into ApiError
   */
  private async send(method: Method, path: string, body?: unknown): Promise<Response> {
    const headers: Record<string, string> = { ...this.headers };
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }
    if (this.cookies.size > 0) {
      headers['Cookie'] = [...this.cookies].map(([name, value]) => `${name}=${value}`).join('; ');
    }

    const response = await this.fetchImpl(`${this.baseUrl}${path}`, {
      method,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body),
      credentials: 'include',
    });

    this.storeCookies(response.headers.get('set-cookie'));

    if (!response.ok) {
      throw await this.toApiError(response);
    }
    return response;
  }

  private storeCookies(header: string | null): void {
    if (!header) {
      return;
    }
    for (const cookie of header.split(SET_COOKIE_SEPARATOR)) {
      const [pair = ''] = cookie.split(';');
      const separator = pair.indexOf('=');
      if (separator <= 0) {
        continue;
      }
      const name = pair.slice(0, separator).trim();
      const value = pair.slice(separator + 1).trim();
      if (value) {
        this.cookies.set(name, value);
      } else {
        this.cookies.delete(name);
      }
    }
  }

  private async toApiError(response: Response): Promise<ApiError> {
    const fallback = `Request failed with status ${response.status}`;
    const text = await response.text();
    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch {
      return new ApiError(response.status, fallback);
    }
    const parsed = errorBodySchema.safeParse(payload);
    return parsed.success
      ? new ApiError(response.status, parsed.data.error, parsed.data.code)
      : new ApiError(response.status, fallback);
  }
}
