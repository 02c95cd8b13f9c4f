import pino from 'pino';
import { logLevelSchema } from '../config';

/**
 * Structured Logger Configuration
 *
 * JSON logging via pino in production, pino-pretty in development,
 * silent under test.
 *
 * Log Levels:
 * - fatal: System is unusable
 * - error: Error conditions
 * - warn: Warning conditions
 * - info: Normal operational messages
 * - debug: Debugging messages
 * - trace: Fine-grained debugging
 */

const isDevelopment = process.env.NODE_ENV !== 'production';
const isTest = process.env.NODE_ENV === 'test';

/**
 * Level from LOG_LEVEL, or the environment default when it is unset or not a
 * pino level. loadConfig reports the invalid value at start-up.
 */
export function resolveLogLevel(value: string | undefined, development: boolean): pino.LevelWithSilent {
  const parsed = logLevelSchema.safeParse(value);
  if (parsed.success) return parsed.data;
  return development ? 'debug' : 'info';
}

const logLevel = resolveLogLevel(process.env.LOG_LEVEL, isDevelopment);

const transport = isDevelopment && !isTest
  ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss.l',
        ignore: 'pid,hostname',
        singleLine: false,
      },
    }
  : undefined;

export const logger = pino({
  level: isTest ? 'silent' : logLevel,
  transport,
  base: {
    env: process.env.NODE_ENV,
  },
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

/**
 * Create a child logger with additional context
 *
 * @example
 * const log = createLogger({ module: 'records' });
 * log.info({ recordId: 12 }, 'Record closed');
 */
export function createLogger(context: Record<string, unknown>) {
  return logger.child(context);
}

export type Logger = ReturnType<typeof createLogger>;

/**
 * Pre-configured loggers for the core modules
 */
export const loggers = {
  db: createLogger({ module: 'db' }),
  schema: createLogger({ module: 'schema' }),
  records: createLogger({ module: 'records' }),
  evidence: createLogger({ module: 'evidence' }),
  export: createLogger({ module: 'export' }),
  api: createLogger({ module: 'api' }),
};

/**
 * Error logging helper with stack trace handling
 */
export function logError(
  loggerInstance: pino.Logger,
  error: unknown,
  message: string,
  context?: Record<string, unknown>
) {
  const err = error instanceof Error ? error : new Error(String(error));
  loggerInstance.error(
    {
      err: {
        message: err.message,
        stack: err.stack,
        name: err.name,
      },
      ...context,
    },
    message
  );
}

/**
 * Performance timing helper
 */
export function logTiming(
  loggerInstance: pino.Logger,
  operation: string,
  startTime: number,
  context?: Record<string, unknown>
) {
  const duration = Date.now() - startTime;
  loggerInstance.debug(
    {
      operation,
      durationMs: duration,
      ...context,
    },
    `${operation} completed in ${duration}ms`
  );
}
