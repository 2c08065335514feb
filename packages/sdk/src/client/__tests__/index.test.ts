/**
 * Client module unit tests
 */
import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import { ApiError, FocusboardClient } from '../index.js';

function jsonResponse(status: number, body: unknown, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json', ...headers },
  });
}

function headerOf(init: RequestInit | undefined, name: string): string | undefined {
  const headers = new Headers(init?.headers);
  return headers.get(name) ?? undefined;
}

describe('FocusboardClient', () => {
  let fetchMock: Mock<typeof fetch>;
  let client: FocusboardClient;

  beforeEach(() => {
    fetchMock = vi.fn<typeof fetch>();
    client = new FocusboardClient({ baseUrl: 'http://focus.test/', fetch: fetchMock });
  });

  function callAt(index: number): Parameters<typeof fetch> {
    const call = fetchMock.mock.calls[index];
    if (!call) {
      throw new Error(`fetch was not called ${index + 1} times`);
    }
    return call;
  }

  it('should send JSON to the configured origin', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(201, { ok: true, id: 7 }));

    const id = await client.createList('Groceries', 'Weekly');

    expect(id).toBe(7);
    const [url, init] = callAt(0);
    expect(url).toBe('http://focus.test/api/lists');
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe(JSON.stringify({ name: 'Groceries', description: 'Weekly' }));
    expect(headerOf(init, 'content-type')).toBe('application/json');
  });

  it('should not declare a content type without a body', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(200, []));

    await client.getLists();

    const [, init] = callAt(0);
    expect(init?.body).toBeUndefined();
    expect(headerOf(init, 'content-type')).toBeUndefined();
  });

  it('should keep the session cookie and send it back', async () => {
    fetchMock
      .mockResolvedValueOnce(
        jsonResponse(
          201,
          { ok: true, user: { id: 1, username: 'alice' } },
          { 'set-cookie': 'sessionId=abc.def; Path=/; Expires=Wed, 21 Oct 2026 07:28:00 GMT; HttpOnly; SameSite=Lax' }
        )
      )
      .mockResolvedValueOnce(jsonResponse(200, { loggedIn: true, user: { id: 1, username: 'alice' } }));

    const user = await client.register('alice', 'password123');
    expect(user).toEqual({ id: 1, username: 'alice' });
    expect(client.hasSession).toBe(true);

    const me = await client.me();
    expect(me).toEqual({ loggedIn: true, user: { id: 1, username: 'alice' } });
    const [, init] = callAt(1);
    expect(headerOf(init, 'cookie')).toBe('sessionId=abc.def');
  });

  it('should forget cookies on logout', async () => {
    fetchMock
      .mockResolvedValueOnce(
        jsonResponse(200, { ok: true, user: { id: 1, username: 'alice' } }, { 'set-cookie': 'sessionId=abc; Path=/' })
      )
      .mockResolvedValueOnce(jsonResponse(200, { ok: true }))
      .mockResolvedValueOnce(jsonResponse(200, { loggedIn: false }));

    await client.login('alice', 'password123');
    await client.logout();
    await client.me();

    expect(client.hasSession).toBe(false);
    const [, init] = callAt(2);
    expect(headerOf(init, 'cookie')).toBeUndefined();
  });

  it('should turn error bodies into ApiError', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(403, { error: 'You have read-only access to this list', code: 'FORBIDDEN' }));

    const error = await client.deleteList(3).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({
      status: 403,
      message: 'You have read-only access to this list',
      code: 'FORBIDDEN',
    });
  });

  it('should fall back to the status when the error body is not JSON', async () => {
    fetchMock.mockResolvedValueOnce(new Response('Bad Gateway', { status: 502 }));

    await expect(client.getLists()).rejects.toMatchObject({
      status: 502,
      message: 'Request failed with status 502',
    });
  });

  it('should reject responses of the wrong shape', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(200, [{ id: 'not-a-number' }]));

    await expect(client.getLists()).rejects.toMatchObject({
      status: 200,
      code: 'INVALID_RESPONSE',
      message: 'Unexpected response from GET /api/lists',
    });
  });

  it('should reject a success response that is not JSON', async () => {
    fetchMock.mockResolvedValueOnce(new Response('<html>maintenance</html>', { status: 200 }));

    await expect(client.getLists()).rejects.toMatchObject({
      status: 200,
      code: 'INVALID_RESPONSE',
      message: 'Unexpected response from GET /api/lists',
    });
  });

  it('should return export bodies as text', async () => {
    fetchMock.mockResolvedValueOnce(new Response('title,description\r\n', { status: 200 }));

    const csv = await client.exportList(4, 'csv');

    expect(csv).toBe('title,description\r\n');
    expect(callAt(0)[0]).toBe('http://focus.test/api/lists/4/export?format=csv');
  });

  it('should address item routes through their list', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(200, { ok: true, completed: true }));

    const completed = await client.toggleItem(2, 9);

    expect(completed).toBe(true);
    expect(callAt(0)[0]).toBe('http://focus.test/api/lists/2/items/9/toggle');
    expect(callAt(0)[1]?.method).toBe('PUT');
  });

  it('should default shares to read permission', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(201, { ok: true, id: 5, created: true }));

    const result = await client.shareList(1, 'bob');

    expect(result).toEqual({ id: 5, created: true });
    expect(callAt(0)[1]?.body).toBe(JSON.stringify({ username: 'bob', permission: 'read' }));
  });
});
