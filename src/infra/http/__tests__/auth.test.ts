import { describe, it, expect, beforeEach, vi } from 'vitest';
import request from 'supertest';
import type express from 'express';
import { SessionRegistry } from '../../../domain/auth/sessionRegistry.js';
import { InMemoryUserRepo } from '../../../testing/inMemoryRepos.js';
import { TEST_PASSWORD, buildTestApp, signIn } from '../../../testing/testApp.js';

const HOUR = 60 * 60 * 1000;

function setCookieHeader(res: request.Response): string {
  const header: unknown = res.headers['set-cookie'];
  return Array.isArray(header) ? header.join('\n') : '';
}

describe('Auth API', () => {
  let app: express.Application;
  let sessions: SessionRegistry;
  let userRepo: InMemoryUserRepo;

  beforeEach(() => {
    ({ app, sessions, userRepo } = buildTestApp());
  });

  describe('POST /api/auth/register', () => {
    it('should register a new user', async () => {
      const response = await request(app).post('/api/auth/register').send({
        email: 'newuser@example.com',
        password: TEST_PASSWORD,
        role: 'patient',
      });

      expect(response.status).toBe(201);
      expect(response.body).toEqual({
        userId: 1,
        email: 'newuser@example.com',
        role: 'patient',
      });
    });

    it('should reject invalid email', async () => {
      const response = await request(app).post('/api/auth/register').send({
        email: 'invalid-email',
        password: TEST_PASSWORD,
        role: 'patient',
      });

      expect(response.status).toBe(400);
      expect(response.body).toHaveProperty('code', 'VALIDATION_ERROR');
      expect(response.body.details.issues[0].path).toBe('email');
    });

    it('should reject short password', async () => {
      const response = await request(app).post('/api/auth/register').send({
        email: 'user@example.com',
        password: 'short',
        role: 'doctor',
      });

      expect(response.status).toBe(400);
      expect(response.body.details.issues[0].path).toBe('password');
    });

    it('should reject an unknown role', async () => {
      const response = await request(app).post('/api/auth/register').send({
        email: 'user@example.com',
        password: TEST_PASSWORD,
        role: 'nurse',
      });

      expect(response.status).toBe(400);
      expect(response.body.details.issues[0].path).toBe('role');
    });

    it('should reject duplicate email', async () => {
      const body = { email: 'duplicate@example.com', password: TEST_PASSWORD, role: 'patient' };
      await request(app).post('/api/auth/register').send(body);

      const response = await request(app).post('/api/auth/register').send(body);

      expect(response.status).toBe(409);
      expect(response.body).toEqual({ code: 'CONFLICT', message: 'Email already registered' });
    });

    it('should reject a malformed JSON body', async () => {
      const response = await request(app)
        .post('/api/auth/register')
        .set('Content-Type', 'application/json')
        .send('{"email":');

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        code: 'VALIDATION_ERROR',
        message: 'Malformed request body',
      });
    });
  });

  describe('POST /api/auth/login', () => {
    beforeEach(async () => {
      await request(app).post('/api/auth/register').send({
        email: 'loginuser@example.com',
        password: TEST_PASSWORD,
        role: 'doctor',
      });
    });

    it('should login and set an http-only session cookie', async () => {
      const response = await request(app).post('/api/auth/login').send({
        email: 'loginuser@example.com',
        password: TEST_PASSWORD,
      });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        userId: 1,
        email: 'loginuser@example.com',
        role: 'doctor',
        redirectTo: '/doctor/dashboard',
      });

      const cookie = setCookieHeader(response);
      expect(cookie).toMatch(/^session_token=[A-Za-z0-9_-]{64};/);
      expect(cookie).toContain('Max-Age=86400');
      expect(cookie).toContain('Path=/');
      expect(cookie).toContain('HttpOnly');
      expect(cookie).toContain('SameSite=Lax');
      expect(cookie).not.toContain('Secure');
      expect(sessions.size).toBe(1);
    });

    it('should not put the token in the response body', async () => {
      const response = await request(app).post('/api/auth/login').send({
        email: 'loginuser@example.com',
        password: TEST_PASSWORD,
      });

      expect(response.body).not.toHaveProperty('token');
    });

    it('should reject invalid email', async () => {
      const response = await request(app).post('/api/auth/login').send({
        email: 'nonexistent@example.com',
        password: TEST_PASSWORD,
      });

      expect(response.status).toBe(401);
      expect(response.body).toEqual({
        code: 'UNAUTHORIZED',
        message: 'Invalid email or password',
      });
    });

    it('should reject invalid password', async () => {
      const response = await request(app).post('/api/auth/login').send({
        email: 'loginuser@example.com',
        password: 'wrongpassword',
      });

      expect(response.status).toBe(401);
      expect(response.body).toHaveProperty('message', 'Invalid email or password');
      expect(sessions.size).toBe(0);
    });

    it('should enforce rate limit on login', async () => {
      const statuses: number[] = [];
      for (let i = 0; i < 11; i++) {
        const response = await request(app).post('/api/auth/login').send({
          email: 'nobody@example.com',
          password: 'wrongpassword',
        });
        statuses.push(response.status);
      }

      expect(statuses.slice(0, 10).every((s) => s === 401)).toBe(true);
      expect(statuses[10]).toBe(429);
    });

    it('should hide internal failures behind a generic 500', async () => {
      vi.spyOn(userRepo, 'findByEmail').mockRejectedValue(new Error('connection reset'));

      const response = await request(app).post('/api/auth/login').send({
        email: 'loginuser@example.com',
        password: TEST_PASSWORD,
      });

      expect(response.status).toBe(500);
      expect(response.body).toEqual({
        code: 'INTERNAL_ERROR',
        message: 'Internal server error',
      });
    });
  });

  describe('Session lifecycle', () => {
    it('should identify the caller from the cookie', async () => {
      const { agent, userId } = await signIn(app, 'protected@example.com', 'patient');

      const response = await agent.get('/api/auth/me');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ userId, role: 'patient' });
    });

    it('should reject request without a session cookie', async () => {
      const response = await request(app).get('/api/auth/me');

      expect(response.status).toBe(401);
      expect(response.body).toEqual({
        code: 'UNAUTHORIZED',
        message: 'Authentication required',
      });
    });

    it('should reject and clear an unknown session cookie', async () => {
      const response = await request(app)
        .get('/api/auth/me')
        .set('Cookie', 'session_token=not-a-live-token');

      expect(response.status).toBe(401);
      expect(setCookieHeader(response)).toContain('session_token=;');
    });

    it('should end the session on logout', async () => {
      const { agent } = await signIn(app, 'leaving@example.com', 'doctor');
      expect(sessions.size).toBe(1);

      const logout = await agent.post('/api/auth/logout');

      expect(logout.status).toBe(204);
      expect(setCookieHeader(logout)).toContain('session_token=;');
      expect(sessions.size).toBe(0);

      const me = await agent.get('/api/auth/me');
      expect(me.status).toBe(401);
    });

    it('should accept logout without a session', async () => {
      const response = await request(app).post('/api/auth/logout');
      expect(response.status).toBe(204);
    });

    it('should refuse a session older than 24 hours', async () => {
      let now = Date.UTC(2024, 0, 1);
      const clocked = buildTestApp({ sessions: new SessionRegistry({ clock: () => now }) });
      const { agent } = await signIn(clocked.app, 'sleepy@example.com', 'patient');

      now += 23 * HOUR;
      expect((await agent.get('/api/auth/me')).status).toBe(200);

      now += 2 * HOUR;
      const response = await agent.get('/api/auth/me');

      expect(response.status).toBe(401);
      expect(clocked.sessions.size).toBe(0);
    });
  });
});
