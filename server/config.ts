import { z } from 'zod';

/**
 * Runtime Configuration
 *
 * Read from the environment (populated from .env by dotenv at start-up):
 * - RNC_DB_PATH - SQLite database file; photos are stored inside it (default: rnc.db)
 * - PORT        - HTTP port for the API (default: 5000)
 * - NODE_ENV    - development | production | test
 * - LOG_LEVEL   - pino level; the logger falls back to its default on an
 *                 invalid value, and start-up then fails here
 */

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export const logLevelSchema = z.enum(LOG_LEVELS);

const configSchema = z.object({
  dbPath: z.string().trim().min(1).default('rnc.db'),
  port: z.coerce.number().int().min(0).max(65535).default(5000),
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  logLevel: logLevelSchema.optional(),
});

export type AppConfig = z.infer<typeof configSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = configSchema.safeParse({
    dbPath: env.RNC_DB_PATH || undefined,
    port: env.PORT || undefined,
    nodeEnv: env.NODE_ENV || undefined,
    logLevel: env.LOG_LEVEL || undefined,
  });

  if (!result.success) {
    const issues = result.error.errors
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }

  return result.data;
}
