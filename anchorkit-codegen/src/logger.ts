/**
 * Logger
 *
 * Pretty printed through pino-pretty when run by hand, plain JSON in
 * production. Silent under test unless LOG_LEVEL says otherwise.
 */

import pino, { Logger } from 'pino';

// =============================================================================
// Configuration
// =============================================================================

const IS_PRODUCTION = process.env.NODE_ENV === 'production';
const IS_TEST = process.env.NODE_ENV === 'test';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Level to start with before the configuration is validated. An unknown
 * LOG_LEVEL falls back to the default here and fails in parseCodegenConfig.
 */
export function initialLevel(env: NodeJS.ProcessEnv): LogLevel {
  const level = env.LOG_LEVEL;
  if (isLogLevel(level)) return level;
  return env.NODE_ENV === 'test' ? 'silent' : 'info';
}

// =============================================================================
// Logger Instance
// =============================================================================

const baseLogger = pino({
  level: initialLevel(process.env),
  transport:
    !IS_PRODUCTION && !IS_TEST
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
  base: {
    service: 'anchorkit-codegen',
    env: process.env.NODE_ENV || 'development',
  },
  formatters: {
    level: (label) => ({ level: label }),
  },
});

export const logger = baseLogger;

/**
 * Create a child logger for one stage of generation
 */
export function createLogger(component: string): Logger {
  return logger.child({ component });
}

/**
 * Log one written file
 */
export function logFileWritten(path: string, bytes: number): void {
  logger.debug({ path, bytes }, `Wrote ${path}`);
}

export default logger;
