// src/observability/Logger.ts

import winston from 'winston';
import { isRecord } from '../utils/guards';

export interface LoggerConfig {
  level?: 'debug' | 'info' | 'warn' | 'error';
  format?: 'json' | 'pretty';
}

const SENSITIVE_KEYS = [
  'token',
  'accessToken',
  'refreshToken',
  'clientSecret',
  'clientAssertion',
  'privateKey',
  'code',
  'codeVerifier',
  'deviceCode',
];

export class Logger {
  private logger: winston.Logger;

  constructor(config: LoggerConfig = {}) {
    const format =
      config.format === 'pretty'
        ? winston.format.combine(winston.format.colorize(), winston.format.simple())
        : winston.format.json();

    this.logger = winston.createLogger({
      level: config.level ?? 'info',
      format,
      transports: [new winston.transports.Console()],
    });
  }

  private redactSensitive(obj: Record<string, unknown>): Record<string, unknown> {
    const redacted = redactKeys(obj);

    // Nested tokenSet
    if (isRecord(redacted.tokenSet)) {
      redacted.tokenSet = redactKeys(redacted.tokenSet);
    }

    return redacted;
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    const sanitized = meta ? this.redactSensitive(meta) : {};
    this.logger.debug(message, sanitized);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    const sanitized = meta ? this.redactSensitive(meta) : {};
    this.logger.info(message, sanitized);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    const sanitized = meta ? this.redactSensitive(meta) : {};
    this.logger.warn(message, sanitized);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    const sanitized = meta ? this.redactSensitive(meta) : {};
    this.logger.error(message, sanitized);
  }
}

function redactKeys(obj: Record<string, unknown>): Record<string, unknown> {
  const redacted: Record<string, unknown> = { ...obj };
  for (const key of SENSITIVE_KEYS) {
    if (key in redacted) redacted[key] = '[REDACTED]';
  }
  return redacted;
}
