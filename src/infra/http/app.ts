import express from 'express';
import cookieParser from 'cookie-parser';
import { MedicalRecordRepository, UserRepository } from '../../application/ports.js';
import { SessionRegistry } from '../../domain/auth/sessionRegistry.js';
import { Logger, logger as defaultLogger } from '../logging/logger.js';
import { createAuthRoutes } from './routes/auth.js';
import { createDoctorRoutes } from './routes/doctor.js';
import { createPatientRoutes } from './routes/patient.js';
import { createRecordRoutes } from './routes/records.js';
import { createSwaggerRoutes } from './routes/swagger.js';
import { SessionCookieSettings, authenticate } from './middleware/auth.js';
import { errorHandler } from './middleware/errorHandler.js';
import { createApiRateLimiter } from './middleware/rateLimit.js';

export const HEALTH_CHECK_TIMEOUT_MS = 2000;

export interface AppDeps {
  userRepo: UserRepository;
  recordRepo: MedicalRecordRepository;
  sessions: SessionRegistry;
  cookie: SessionCookieSettings;
  /** Resolves when the database answers. */
  healthCheck: () => Promise<unknown>;
  logger?: Logger;
}

/**
 * Helper to add timeout to a promise.
 */
function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<T>((_, reject) => {
    timer = setTimeout(() => reject(new Error('timeout')), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

export function createApp(deps: AppDeps): express.Application {
  const logger = deps.logger ?? defaultLogger;
  const app = express();

  app.use(express.json());
  app.use(cookieParser());

  // Health check endpoint (no auth required)
  app.get('/healthz', (_req, res, next) => {
    withTimeout(deps.healthCheck(), HEALTH_CHECK_TIMEOUT_MS)
      .then(() => {
        res.status(200).json({ status: 'ok' });
      })
      .catch((err: unknown) => {
        logger.warn({ err }, 'Health check failed');
        res.status(500).json({
          code: 'DB_UNAVAILABLE',
          message: 'Database unavailable',
        });
      })
      .catch(next);
  });

  app.use(createSwaggerRoutes());

  app.use('/api', createApiRateLimiter());
  app.use(authenticate(deps.sessions, deps.cookie));

  app.use(
    '/api/auth',
    createAuthRoutes({
      userRepo: deps.userRepo,
      sessions: deps.sessions,
      cookie: deps.cookie,
      logger,
    })
  );
  app.use('/api/doctor', createDoctorRoutes(deps));
  app.use('/api/patient', createPatientRoutes(deps));
  app.use('/api/records', createRecordRoutes(deps));

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}
