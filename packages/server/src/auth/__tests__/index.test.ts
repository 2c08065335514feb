/**
 * Auth module unit tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildTestServer, requestAs, signUp, TEST_PASSWORD } from '../../testing/index.js';

describe('Auth routes', () => {
  let server: FastifyInstance;

  beforeEach(async () => {
    server = await buildTestServer();
  });

  afterEach(async () => {
    await server.close();
  });

  describe('POST /api/register', () => {
    it('should create an account and start a session', async () => {
      const response = await server.inject({
        method: 'POST',
        url: '/api/register',
        payload: { username: '  Alice_1 ', password: TEST_PASSWORD },
      });

      expect(response.statusCode).toBe(201);
      expect(JSON.parse(response.body)).toEqual({ ok: true, user: { id: 1, username: 'alice_1' } });
      expect(response.cookies.map((cookie) => cookie.name)).toContain('sessionId');
    });

    it('should never store the plain password', async () => {
      await signUp(server, 'alice');
      const row = await server.db.get<{ password_hash: string }>('SELECT password_hash FROM users WHERE username = ?', [
        'alice',
      ]);

      expect(row?.password_hash).not.toBe(TEST_PASSWORD);
      expect(row?.password_hash.startsWith('$2')).toBe(true);
    });

    it('should reject a taken username with 409', async () => {
      await signUp(server, 'alice');
      const response = await server.inject({
        method: 'POST',
        url: '/api/register',
        payload: { username: 'ALICE', password: TEST_PASSWORD },
      });

      expect(response.statusCode).toBe(409);
      expect(JSON.parse(response.body)).toEqual({ error: 'Username already taken', code: 'CONFLICT' });
    });

    it('should answer 409 to the loser of a simultaneous registration', async () => {
      const register = () =>
        server.inject({ method: 'POST', url: '/api/register', payload: { username: 'dup', password: TEST_PASSWORD } });

      const responses = await Promise.all([register(), register()]);

      expect(responses.map((response) => response.statusCode).sort()).toEqual([201, 409]);
      const loser = responses.find((response) => response.statusCode === 409);
      expect(loser?.json()).toEqual({ error: 'Username already taken', code: 'CONFLICT' });
      const count = await server.db.get<{ n: number }>('SELECT COUNT(*) AS n FROM users WHERE username = ?', ['dup']);
      expect(count?.n).toBe(1);
    });

    it('should require both fields', async () => {
      const response = await server.inject({ method: 'POST', url: '/api/register', payload: { username: 'alice' } });

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body).error).toBe('Username and password are required');
    });

    it('should reject malformed usernames', async () => {
      const response = await server.inject({
        method: 'POST',
        url: '/api/register',
        payload: { username: 'a b', password: TEST_PASSWORD },
      });

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body).error).toBe(
        'Username must be 3-30 characters (letters, numbers, underscore)'
      );
    });

    it('should reject short passwords', async () => {
      const response = await server.inject({
        method: 'POST',
        url: '/api/register',
        payload: { username: 'alice', password: '12345' },
      });

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body).error).toBe('Password must be at least 6 characters');
    });
  });

  describe('POST /api/login', () => {
    it('should sign in with the right password', async () => {
      await signUp(server, 'alice');
      const response = await server.inject({
        method: 'POST',
        url: '/api/login',
        payload: { username: 'alice', password: TEST_PASSWORD },
      });

      expect(response.statusCode).toBe(200);
      expect(JSON.parse(response.body)).toEqual({ ok: true, user: { id: 1, username: 'alice' } });
    });

    it('should fail the same way for unknown users and wrong passwords', async () => {
      await signUp(server, 'alice');
      const wrongPassword = await server.inject({
        method: 'POST',
        url: '/api/login',
        payload: { username: 'alice', password: 'not-the-password' },
      });
      const unknownUser = await server.inject({
        method: 'POST',
        url: '/api/login',
        payload: { username: 'nobody', password: TEST_PASSWORD },
      });

      expect(wrongPassword.statusCode).toBe(401);
      expect(unknownUser.statusCode).toBe(401);
      expect(JSON.parse(wrongPassword.body)).toEqual({ error: 'Invalid credentials', code: 'UNAUTHORIZED' });
      expect(JSON.parse(unknownUser.body)).toEqual(JSON.parse(wrongPassword.body));
    });
  });

  describe('GET /api/me', () => {
    it('should report an anonymous session', async () => {
      const response = await server.inject({ method: 'GET', url: '/api/me' });

      expect(response.statusCode).toBe(200);
      expect(JSON.parse(response.body)).toEqual({ loggedIn: false });
    });

    it('should report the signed-in user', async () => {
      const alice = await signUp(server, 'alice');
      const response = await requestAs(server, alice, 'GET', '/api/me');

      expect(JSON.parse(response.body)).toEqual({ loggedIn: true, user: { id: alice.id, username: 'alice' } });
    });
  });

  describe('POST /api/logout', () => {
    it('should end the session', async () => {
      const alice = await signUp(server, 'alice');

      const logout = await requestAs(server, alice, 'POST', '/api/logout');
      expect(JSON.parse(logout.body)).toEqual({ ok: true });

      const lists = await requestAs(server, alice, 'GET', '/api/lists');
      expect(lists.statusCode).toBe(401);
    });
  });

  describe('protected routes', () => {
    it('should answer 401 without a session', async () => {
      const response = await server.inject({ method: 'GET', url: '/api/lists' });

      expect(response.statusCode).toBe(401);
      expect(JSON.parse(response.body)).toEqual({ error: 'Unauthorized', code: 'UNAUTHORIZED' });
    });

    it('should answer 401 once the user is gone', async () => {
      const alice = await signUp(server, 'alice');
      await server.db.run('DELETE FROM users WHERE id = ?', [alice.id]);

      const response = await requestAs(server, alice, 'GET', '/api/lists');
      expect(response.statusCode).toBe(401);
    });
  });
});

describe('Auth rate limiting', () => {
  let server: FastifyInstance;

  beforeEach(async () => {
    server = await buildTestServer({ env: { AUTH_RATE_LIMIT: '2' } });
  });

  afterEach(async () => {
    await server.close();
  });

  it('should answer 429 once an address exceeds its attempts', async () => {
    const attempt = () =>
      server.inject({ method: 'POST', url: '/api/login', payload: { username: 'alice', password: TEST_PASSWORD } });

    expect((await attempt()).statusCode).toBe(401);
    expect((await attempt()).statusCode).toBe(401);

    const limited = await attempt();
    expect(limited.statusCode).toBe(429);
    expect(JSON.parse(limited.body)).toEqual({
      error: 'Too many attempts. Try again later.',
      code: 'RATE_LIMITED',
    });
  });
});
