/**
 * @riskmetrics/utils - Shared utilities for the risk metrics packages
 */

import winston from 'winston';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export type LogMeta = Record<string, unknown>;

export interface LoggerOptions {
  level?: LogLevel;
  transports?: winston.LoggerOptions['transports'];
}

// Logger
export class Logger {
  private readonly logger: winston.Logger;

  constructor(private readonly name: string, private readonly options: LoggerOptions = {}) {
    this.logger = winston.createLogger({
      level: options.level ?? 'info',
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json()
      ),
      defaultMeta: { service: name },
      transports: options.transports ?? [
        new winston.transports.Console({
          format: winston.format.combine(
            winston.format.colorize(),
            winston.format.simple()
          )
        })
      ]
    });
  }

  get level(): string {
    return this.logger.level;
  }

  debug(message: string, meta?: LogMeta): void {
    this.logger.debug(message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.logger.info(message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.logger.warn(message, meta);
  }

  error(message: string, error?: unknown, meta?: LogMeta): void {
    if (error instanceof Error) {
      this.logger.error(message, { error: error.message, stack: error.stack, ...meta });
    } else {
      this.logger.error(message, { error, ...meta });
    }
  }

  /**
   * Derive a logger named `<parent>.<name>` that shares this logger's level and transports.
   */
  child(name: string): Logger {
    return new Logger(`${this.name}.${name}`, this.options);
  }

  // Underlying winston instance, for callers that add their own transports
  getWinstonLogger(): winston.Logger {
    return this.logger;
  }
}
