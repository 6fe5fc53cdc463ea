/**
 * Logging Configuration
 * Single source of truth for all logging behavior
 */

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggingConfig {
  level: LogLevel;
  redactFields: string[];
}

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

export function getLoggingConfig(): LoggingConfig {
  const isTest = process.env.NODE_ENV === 'test';
  const requested = (process.env.LOG_LEVEL || '').trim().toLowerCase();

  return {
    level: isLogLevel(requested) ? requested : isTest ? 'silent' : 'info',
    redactFields: (process.env.LOG_REDACT_FIELDS ||
      'authorization,cookie,token,access_token,refresh_token,accessToken,refreshToken,authorizationCode,client_secret,clientSecret,password,secret')
      .split(',').map(f => f.trim()).filter(Boolean),
  };
}
