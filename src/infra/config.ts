import { z } from 'zod';

const MAX_SESSION_TTL_HOURS = 24;

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
  SESSION_TTL_HOURS: z.coerce.number().positive().max(MAX_SESSION_TTL_HOURS).default(24),
  SESSION_SWEEP_INTERVAL_MS: z.coerce.number().int().nonnegative().default(10 * 60 * 1000),
  COOKIE_SECURE: z.enum(['true', 'false']).optional(),
});

export interface AppConfig {
  nodeEnv: 'development' | 'test' | 'production';
  port: number;
  databaseUrl: string;
  sessionTtlMs: number;
  /** 0 disables the background sweep; expiry is still enforced on read. */
  sessionSweepIntervalMs: number;
  cookieSecure: boolean;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.errors
      .map((e) => `${e.path.join('.')}: ${e.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }

  const parsed = result.data;
  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL,
    sessionTtlMs: parsed.SESSION_TTL_HOURS * 60 * 60 * 1000,
    sessionSweepIntervalMs: parsed.SESSION_SWEEP_INTERVAL_MS,
    cookieSecure:
      parsed.COOKIE_SECURE === undefined
        ? parsed.NODE_ENV === 'production'
        : parsed.COOKIE_SECURE === 'true',
  };
}
