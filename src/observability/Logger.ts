// src/observability/Logger.ts

import winston from 'winston';
import { isRecord } from '../utils/helpers';

export interface LoggerConfig {
  level?: 'debug' | 'info' | 'warn' | 'error';
  format?: 'json' | 'pretty';
  silent?: boolean;
}

const SENSITIVE_KEYS = ['apiKey', 'token', 'authorization', 'password'];

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
      silent: config.silent ?? false,
      transports: [new winston.transports.Console()],
    });
  }

  private redactSensitive(obj: unknown): unknown {
    if (!isRecord(obj)) return obj;

    const redacted: Record<string, unknown> = { ...obj };

    for (const key of SENSITIVE_KEYS) {
      if (key in redacted) redacted[key] = '[REDACTED]';
    }

    // Judge and platform configs nest their credentials one level down
    for (const [key, value] of Object.entries(redacted)) {
      if (isRecord(value) && SENSITIVE_KEYS.some((k) => k in value)) {
        redacted[key] = this.redactSensitive(value);
      }
    }

    return redacted;
  }

  private sanitize(meta?: Record<string, unknown>): Record<string, unknown> {
    if (!meta) return {};
    const sanitized = this.redactSensitive(meta);
    return isRecord(sanitized) ? sanitized : {};
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.logger.debug(message, this.sanitize(meta));
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, this.sanitize(meta));
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, this.sanitize(meta));
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.logger.error(message, this.sanitize(meta));
  }
}
