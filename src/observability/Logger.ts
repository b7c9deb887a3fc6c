// src/observability/Logger.ts

import winston from 'winston';

export interface LoggerConfig {
  level?: 'debug' | 'info' | 'warn' | 'error';
  format?: 'json' | 'pretty';
}

const SECRET_KEYS = ['credential', 'token'];

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

  private redactSensitive(obj: unknown): unknown {
    if (!obj || typeof obj !== 'object' || Array.isArray(obj)) return obj;

    const redacted: Record<string, unknown> = { ...obj };

    for (const key of SECRET_KEYS) {
      if (key in redacted) redacted[key] = '[REDACTED]';
    }

    // Request payloads carry the credential one level down
    if ('payload' in redacted && redacted.payload && typeof redacted.payload === 'object') {
      redacted.payload = this.redactSensitive(redacted.payload);
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
