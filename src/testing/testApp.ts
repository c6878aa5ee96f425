import request from 'supertest';
import type express from 'express';
import { AppDeps, createApp } from '../infra/http/app.js';
import { DEFAULT_SESSION_TTL_MS, SessionRegistry } from '../domain/auth/sessionRegistry.js';
import { Role } from '../domain/auth/user.js';
import { makeNoopLogger } from '../infra/logging/logger.js';
import { createInMemoryRepos } from './inMemoryRepos.js';

export const TEST_PASSWORD = 'password123';

/**
 * App wired to in-memory repositories and a fresh session registry.
 */
export function buildTestApp(overrides: Partial<AppDeps> = {}) {
  const repos = createInMemoryRepos();
  const deps: AppDeps = {
    userRepo: repos.userRepo,
    recordRepo: repos.recordRepo,
    sessions: new SessionRegistry(),
    cookie: { secure: false, maxAgeMs: DEFAULT_SESSION_TTL_MS },
    healthCheck: async () => undefined,
    logger: makeNoopLogger(),
    ...overrides,
  };

  return { ...repos, sessions: deps.sessions, app: createApp(deps) };
}

/**
 * Register through the API, log in, and return an agent carrying the
 * session cookie plus the new user's id.
 */
export async function signIn(app: express.Application, email: string, role: Role) {
  const agent = request.agent(app);

  const registered = await agent
    .post('/api/auth/register')
    .send({ email, password: TEST_PASSWORD, role });
  if (registered.status !== 201) {
    throw new Error(`register ${email} failed with ${registered.status}`);
  }

  const loggedIn = await agent.post('/api/auth/login').send({ email, password: TEST_PASSWORD });
  if (loggedIn.status !== 200) {
    throw new Error(`login ${email} failed with ${loggedIn.status}`);
  }

  const userId: unknown = registered.body.userId;
  if (typeof userId !== 'number') {
    throw new Error('register response carried no numeric userId');
  }
  return { agent, userId };
}
