import pino, { type Logger } from 'pino';
import type { LogLevel } from '../config/index.js';

export type { Logger };

/**
 * Fields that must never reach a log sink in clear text
 */
const REDACTED_PATHS = [
  'token',
  'secret',
  'password',
  'clientSecret',
  'client_secret',
  'access_token',
  'refresh_token',
  'code',
  'code_verifier',
  '*.token',
  '*.secret',
  '*.password',
  '*.clientSecret',
  '*.client_secret',
  '*.access_token',
  '*.refresh_token',
  '*.code_verifier',
  'headers.authorization',
];

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
}

/**
 * Create a structured JSON logger
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? 'oauth2-server',
    level: options.level ?? 'info',
    formatters: {
      level: (label) => ({ level: label }),
    },
    redact: {
      paths: REDACTED_PATHS,
      censor: '[REDACTED]',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}
