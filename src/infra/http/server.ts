import dotenv from 'dotenv';
import { loadConfig } from '../config.js';
import { SessionRegistry } from '../../domain/auth/sessionRegistry.js';
import { pool } from '../db/pool.js';
import { UserRepo } from '../db/userRepo.js';
import { MedicalRecordRepo } from '../db/medicalRecordRepo.js';
import { logger } from '../logging/logger.js';
import { createApp } from './app.js';

dotenv.config();

const config = loadConfig();

// Owned here and handed to the handlers; tests build their own.
const sessions = new SessionRegistry({ ttlMs: config.sessionTtlMs });
const stopReaper = sessions.startReaper(config.sessionSweepIntervalMs, (removed) => {
  if (removed > 0) {
    logger.debug({ removed, live: sessions.size }, 'Swept expired sessions');
  }
});

const app = createApp({
  userRepo: new UserRepo(),
  recordRepo: new MedicalRecordRepo(),
  sessions,
  cookie: { secure: config.cookieSecure, maxAgeMs: config.sessionTtlMs },
  healthCheck: () => pool.query('SELECT 1'),
  logger,
});

const server = app.listen(config.port, () => {
  logger.info({ port: config.port }, `Server running on http://localhost:${config.port}`);
});

function shutdown(signal: string): void {
  logger.info({ signal }, 'Shutting down');
  stopReaper();
  server.close(() => {
    pool
      .end()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error({ err }, 'Failed to close database pool');
        process.exit(1);
      });
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
