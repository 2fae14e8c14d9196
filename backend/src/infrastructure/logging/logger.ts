/**
 * Structured JSON logging with Pino.js
 *
 * Production: JSON lines
 * Development: Pretty-printed for readability
 * Test: silent
 */

import { pino } from 'pino';
import type { Logger as PinoLogger, LoggerOptions } from 'pino';

const isDevelopment = process.env['NODE_ENV'] !== 'production';
const isTest = process.env['NODE_ENV'] === 'test';

// Credential material never reaches the log stream
export const REDACTED_PATHS = [
  'req.headers.authorization',
  'req.headers.cookie',
  'req.headers["x-api-key"]',
  'headers.authorization',
  'headers.cookie',
  'headers["x-api-key"]',
  'password',
  'newPassword',
  'token',
  'key',
  '*.password',
  '*.token',
  '*.key',
];

const loggerOptions: LoggerOptions = {
  level: isTest ? 'silent' : (process.env['LOG_LEVEL'] ?? 'info'),
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: {
    paths: REDACTED_PATHS,
    censor: '[REDACTED]',
  },
  base: {
    env: process.env['NODE_ENV'] ?? 'development',
    service: process.env['SERVICE_NAME'] ?? 'hamco-api',
  },
};

if (isDevelopment && !isTest) {
  loggerOptions.transport = {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
    },
  };
}

const baseLogger = pino(loggerOptions);

export type Logger = PinoLogger;

export function createLogger(module: string): Logger {
  return baseLogger.child({ module });
}

/**
 * Loggable form of an API key: its display prefix only
 */
export function maskSecret(secret: string): string {
  return secret.length > 8 ? `${secret.slice(0, 8)}…` : '[short]';
}
