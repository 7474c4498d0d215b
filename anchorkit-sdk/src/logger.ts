/**
 * Logger
 *
 * The SDK runs inside someone else's process: it logs structured JSON to
 * stdout and never installs a transport. Secret keys and keypair file
 * contents are never logged; RPC URLs are logged without their query string.
 */

import pino, { Logger } from 'pino';

// =============================================================================
// Configuration
// =============================================================================

const IS_TEST = process.env.NODE_ENV === 'test';
const ENV_LEVEL = process.env.LOG_LEVEL;
// pino throws on a level it does not know
const LOG_LEVEL =
  ENV_LEVEL && (ENV_LEVEL === 'silent' || ENV_LEVEL in pino.levels.values)
    ? ENV_LEVEL
    : IS_TEST
      ? 'silent'
      : 'info';

// =============================================================================
// Redaction
// =============================================================================

/**
 * Strip the query string, where RPC providers put API keys
 */
export function redactUrl(url: string): string {
  return url.split('?')[0];
}

// =============================================================================
// Logger Instance
// =============================================================================

export const logger: Logger = pino({
  level: LOG_LEVEL,
  base: {
    service: 'anchorkit-sdk',
  },
  formatters: {
    level: (label) => ({ level: label }),
  },
  redact: {
    paths: ['secretKey', 'keypair', '*.secretKey', '*.keypair'],
    censor: '[REDACTED]',
  },
});

/**
 * Create a child logger for one part of the SDK
 */
export function createLogger(component: string): Logger {
  return logger.child({ component });
}

export default logger;
