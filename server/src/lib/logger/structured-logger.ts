/**
 * Structured Logger
 *
 * - JSON output (pino) for machine parsing
 * - Level from LOG_LEVEL, silent under NODE_ENV=test
 * - Sensitive field redaction (tokens, codes, secrets), top level and one level deep
 */

import { pino, type Logger } from 'pino';
import { getLoggingConfig } from '../../config/logging.config.js';

export type { Logger };

function buildRedactPaths(fields: string[]): string[] {
  return fields.flatMap(field => [field, `*.${field}`]);
}

export function createLogger(): Logger {
  const config = getLoggingConfig();

  return pino({
    level: config.level,
    base: { service: 'login-bridge' },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: {
      paths: buildRedactPaths(config.redactFields),
      censor: '[REDACTED]'
    },
    formatters: {
      level: (label) => ({ level: label })
    }
  });
}

/**
 * Singleton logger instance
 * Configure via LOG_LEVEL environment variable
 */
export const logger = createLogger();
