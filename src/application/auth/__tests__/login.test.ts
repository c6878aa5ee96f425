import { describe, it, expect, beforeEach } from 'vitest';
import { LoginUseCase } from '../login.js';
import { UnauthorizedError } from '../../errors.js';
import { Password, legacyDigest } from '../../../domain/auth/password.js';
import { SessionRegistry } from '../../../domain/auth/sessionRegistry.js';
import { makeNoopLogger } from '../../../infra/logging/logger.js';
import { InMemoryStore, InMemoryUserRepo, createInMemoryRepos } from '../../../testing/inMemoryRepos.js';

describe('LoginUseCase', () => {
  let store: InMemoryStore;
  let userRepo: InMemoryUserRepo;
  let sessions: SessionRegistry;
  let useCase: LoginUseCase;

  beforeEach(async () => {
    ({ store, userRepo } = createInMemoryRepos());
    sessions = new SessionRegistry();
    useCase = new LoginUseCase(userRepo, sessions, makeNoopLogger());

    await userRepo.create('doc@example.com', await Password.hash('password123'), 'doctor');
  });

  it('should open a session for valid credentials', async () => {
    const result = await useCase.execute({ email: 'doc@example.com', password: 'password123' });

    expect(result.userId).toBe(1);
    expect(result.email).toBe('doc@example.com');
    expect(result.role).toBe('doctor');
    expect(sessions.get(result.token)).toEqual({ subjectId: 1, role: 'doctor' });
  });

  it('should reject an unknown email', async () => {
    await expect(
      useCase.execute({ email: 'nobody@example.com', password: 'password123' })
    ).rejects.toThrow(UnauthorizedError);
    expect(sessions.size).toBe(0);
  });

  it('should reject a wrong password with the same message', async () => {
    await expect(
      useCase.execute({ email: 'doc@example.com', password: 'wrongpassword' })
    ).rejects.toThrow('Invalid email or password');
    expect(sessions.size).toBe(0);
  });

  it('should upgrade a legacy credential after a successful login', async () => {
    const salt = 'feedface';
    await userRepo.create('old@example.com', `${salt}:${legacyDigest('legacy-pass', salt)}`, 'patient');

    const result = await useCase.execute({ email: 'old@example.com', password: 'legacy-pass' });

    expect(result.role).toBe('patient');
    const upgraded = store.users.find((u) => u.email === 'old@example.com');
    expect(upgraded?.passwordHash.startsWith('$argon2id$')).toBe(true);
    expect(await Password.verify('legacy-pass', upgraded?.passwordHash ?? '')).toBe(true);
  });

  it('should leave a current credential as it is', async () => {
    const before = store.users[0].passwordHash;
    await useCase.execute({ email: 'doc@example.com', password: 'password123' });
    expect(store.users[0].passwordHash).toBe(before);
  });
});
