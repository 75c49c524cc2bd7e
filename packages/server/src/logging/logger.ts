import pino, { type Logger } from 'pino';

export type { Logger } from 'pino';

// Secrets that must never reach a log line
const REDACT_PATHS = [
  'token',
  'password',
  'currentPassword',
  'newPassword',
  'cookie',
  'authorization',
  '*.token',
  '*.password',
  'req.headers.cookie',
  'req.headers.authorization',
];

export interface LoggerOptions {
  level?: string;
}

/**
 * Create the root logger
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    level: options.level ?? 'info',
    base: { service: 'session-warden' },
    redact: { paths: REDACT_PATHS, censor: '[redacted]' },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

/**
 * Logger that discards everything (tests, library use without logging)
 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
