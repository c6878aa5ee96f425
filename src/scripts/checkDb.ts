import dotenv from 'dotenv';
import { pool } from '../infra/db/pool.js';
import { makeLogger } from '../infra/logging/logger.js';

dotenv.config();

export const REQUIRED_TABLES = ['users', 'medical_records'] as const;

export interface DbCheckReport {
  serverVersion: string;
  tables: string[];
  missingTables: string[];
}

export function findMissingTables(tables: readonly string[]): string[] {
  return REQUIRED_TABLES.filter((t) => !tables.includes(t));
}

/**
 * Connect, report the server version, and list which required tables exist.
 */
export async function checkDb(): Promise<DbCheckReport> {
  const client = await pool.connect();
  try {
    const version = await client.query<{ version: string }>('SELECT version() AS version');
    const tables = await client.query<{ table_name: string }>(
      `SELECT table_name
       FROM information_schema.tables
       WHERE table_schema = 'public'
       ORDER BY table_name`
    );

    const names = tables.rows.map((r) => r.table_name);
    return {
      serverVersion: version.rows[0]?.version ?? 'unknown',
      tables: names,
      missingTables: findMissingTables(names),
    };
  } finally {
    client.release();
  }
}

// Run if called directly
if (process.argv[1]?.endsWith('checkDb.ts') || process.argv[1]?.endsWith('checkDb.js')) {
  const log = makeLogger({ script: 'checkDb' });
  checkDb()
    .then(async (report) => {
      log.info(report, 'Database reachable');
      if (report.missingTables.length > 0) {
        log.warn({ missing: report.missingTables }, 'Required tables missing; run `npm run migrate`');
        process.exitCode = 1;
      }
      await pool.end();
    })
    .catch(async (error: unknown) => {
      log.error({ err: error }, 'Database check failed; verify DATABASE_URL in .env');
      await pool.end();
      process.exit(1);
    });
}
