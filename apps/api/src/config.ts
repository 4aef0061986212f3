import { config as loadEnv } from 'dotenv';
import { existsSync } from 'fs';
import { resolve } from 'path';
import { z } from 'zod';

if (!process.env.DATABASE_URL) {
  const searchPaths = ['.env', '../.env', '../../.env'];
  for (const candidate of searchPaths) {
    const absolute = resolve(process.cwd(), candidate);
    if (!existsSync(absolute)) {
      continue;
    }
    const result = loadEnv({ path: absolute });
    if (result?.parsed?.DATABASE_URL || process.env.DATABASE_URL) {
      break;
    }
  }
}

const envSchema = z.object({
  NODE_ENV: z.string().optional(),
  PORT: z.string().regex(/^\d+$/, 'PORT must be numeric').optional(),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  DATABASE_URL: z.string().url().optional(),
  LEDGER_STORE: z.enum(['postgres', 'memory']).optional(),
  SESSION_IDLE_MINUTES: z.coerce.number().int().positive().optional(),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  throw new Error(`Invalid environment configuration: ${parsed.error.message}`);
}

const env = parsed.data;

export const CONFIG = {
  env: env.NODE_ENV ?? 'development',
  port: env.PORT ? Number(env.PORT) : 3000,
  logLevel: env.LOG_LEVEL ?? 'info',
  databaseUrl: env.DATABASE_URL,
  ledgerStore: env.LEDGER_STORE ?? 'postgres',
  sessionIdleMs: (env.SESSION_IDLE_MINUTES ?? 480) * 60_000,
};

export const SESSION_HEADER = 'x-session-id';
