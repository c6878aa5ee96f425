import pg from 'pg';
import dotenv from 'dotenv';
import { logger } from '../logging/logger.js';

dotenv.config();

const { Pool } = pg;

// Do not throw at import time - allow unit tests to run without DATABASE_URL
// The pool will fail when actually used if DATABASE_URL is missing
export const pool = new Pool({
  connectionString: process.env.DATABASE_URL,
  max: 20,
  idleTimeoutMillis: 30000,
  connectionTimeoutMillis: 2000,
});

pool.on('connect', () => {
  logger.debug('Database connection established');
});

pool.on('error', (err) => {
  logger.error({ err }, 'Unexpected database error');
});

const UNIQUE_VIOLATION = '23505';

export function isUniqueViolation(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === UNIQUE_VIOLATION
  );
}
