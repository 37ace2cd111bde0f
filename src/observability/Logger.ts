// src/observability/Logger.ts

import winston from 'winston';

export interface LoggerConfig {
  level?: 'debug' | 'info' | 'warn' | 'error';
  format?: 'json' | 'pretty';
}

const REDACTED = '[REDACTED]';

// Keys whose values never reach a log line
const SENSITIVE_KEYS = [
  'accessToken',
  'refreshToken',
  'clientSecret',
  'authorizationCode',
  'codeVerifier',
];

// Nested objects that carry credentials (TokenRecord, AuthorizationState)
const SENSITIVE_CONTAINERS = ['record', 'state'];

/**
 * Copy of `obj` with credential-bearing fields replaced. Recurses into the
 * `record` and `state` containers only.
 */
export function redactSensitive(obj: unknown): unknown {
  if (!obj || typeof obj !== 'object' || Array.isArray(obj) || obj instanceof Error) return obj;

  const redacted: Record<string, unknown> = Object.fromEntries(Object.entries(obj));

  for (const key of SENSITIVE_KEYS) {
    if (key in redacted) redacted[key] = REDACTED;
  }

  for (const key of SENSITIVE_CONTAINERS) {
    const nested = redacted[key];
    if (nested && typeof nested === 'object') {
      redacted[key] = redactSensitive(nested);
    }
  }

  return redacted;
}

export class Logger {
  private logger: winston.Logger;

  constructor(config: LoggerConfig = {}) {
    const format =
      config.format === 'pretty'
        ? winston.format.combine(winston.format.colorize(), winston.format.simple())
        : winston.format.combine(winston.format.timestamp(), winston.format.json());

    this.logger = winston.createLogger({
      level: config.level ?? 'info',
      format,
      defaultMeta: { component: 'integration-broker' },
      transports: [new winston.transports.Console()],
    });
  }

  private write(level: string, message: string, meta?: Record<string, unknown>): void {
    const sanitized = meta ? redactSensitive(meta) : {};
    this.logger.log(level, message, sanitized);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.write('debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.write('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.write('warn', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.write('error', message, meta);
  }
}
