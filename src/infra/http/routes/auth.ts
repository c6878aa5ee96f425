import { Router } from 'express';
import { z } from 'zod';
import { RegisterUseCase } from '../../../application/auth/register.js';
import { LoginUseCase } from '../../../application/auth/login.js';
import { UserRepository } from '../../../application/ports.js';
import { SessionRegistry } from '../../../domain/auth/sessionRegistry.js';
import { ROLES } from '../../../domain/auth/user.js';
import { Logger } from '../../logging/logger.js';
import {
  SESSION_COOKIE,
  SessionCookieSettings,
  clearSessionCookie,
  principalOf,
  readSessionToken,
  requireAuth,
  sessionCookieOptions,
} from '../middleware/auth.js';
import { createLoginRateLimiter } from '../middleware/rateLimit.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';

/**
 * @openapi
 * /api/auth/register:
 *   post:
 *     tags: [Auth]
 *     summary: Register a doctor or patient
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [email, password, role]
 *             properties:
 *               email: { type: string, format: email }
 *               password: { type: string, minLength: 6 }
 *               role: { type: string, enum: [doctor, patient] }
 *     responses:
 *       201:
 *         description: User created
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *       409:
 *         description: Email already registered
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *
 * /api/auth/login:
 *   post:
 *     tags: [Auth]
 *     summary: Login and receive a session cookie
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [email, password]
 *             properties:
 *               email: { type: string, format: email }
 *               password: { type: string }
 *     responses:
 *       200:
 *         description: Authenticated; sets the session_token cookie
 *       401:
 *         description: Invalid credentials
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *
 * /api/auth/logout:
 *   post:
 *     tags: [Auth]
 *     summary: End the current session
 *     responses:
 *       204:
 *         description: Session deleted and cookie cleared
 *
 * /api/auth/me:
 *   get:
 *     tags: [Auth]
 *     summary: Identity of the current session
 *     security: [{ cookieAuth: [] }]
 *     responses:
 *       200:
 *         description: Current user id and role
 *       401:
 *         description: No live session
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 */

const registerBodySchema = z.object({
  email: z.string().email(),
  password: z.string().min(6),
  role: z.enum(ROLES),
});

const loginBodySchema = z.object({
  email: z.string().email(),
  password: z.string().min(1),
});

export interface AuthRoutesDeps {
  userRepo: UserRepository;
  sessions: SessionRegistry;
  cookie: SessionCookieSettings;
  logger: Logger;
}

export function createAuthRoutes({ userRepo, sessions, cookie, logger }: AuthRoutesDeps) {
  const router = Router();
  const registerUseCase = new RegisterUseCase(userRepo);
  const loginUseCase = new LoginUseCase(userRepo, sessions, logger);

  router.post(
    '/register',
    validate({ body: registerBodySchema }),
    asyncHandler(async (req, res) => {
      const body = registerBodySchema.parse(req.body);
      const result = await registerUseCase.execute(body);
      logger.info({ userId: result.userId, role: result.role }, 'User registered');
      res.status(201).json(result);
    })
  );

  router.post(
    '/login',
    createLoginRateLimiter(),
    validate({ body: loginBodySchema }),
    asyncHandler(async (req, res) => {
      const body = loginBodySchema.parse(req.body);
      const { token, ...user } = await loginUseCase.execute(body);
      res.cookie(SESSION_COOKIE, token, sessionCookieOptions(cookie));
      res.status(200).json({ ...user, redirectTo: `/${user.role}/dashboard` });
    })
  );

  router.post('/logout', (req, res) => {
    const token = readSessionToken(req);
    if (token) {
      sessions.delete(token);
    }
    clearSessionCookie(res, cookie);
    res.status(204).end();
  });

  router.get('/me', requireAuth, (req, res) => {
    const { subjectId, role } = principalOf(req);
    res.json({ userId: subjectId, role });
  });

  return router;
}
