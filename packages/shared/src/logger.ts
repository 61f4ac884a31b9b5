/**
 * Structured Logger with Winston
 *
 * Features:
 * - Multiple log levels (error, warn, info, debug)
 * - Console output for development
 * - Optional file logging with daily rotation
 * - Structured JSON logs
 * - Context injection (service, runId, positionId, etc)
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import * as path from 'path';
import * as fs from 'fs';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

export interface LoggerConfig {
  /** Service name (engine, run-backtest, ...) */
  service: string;
  /** Log level (default: LOG_LEVEL env var, then 'info') */
  level?: LogLevel;
  /** Enable console output */
  console?: boolean;
  /** Enable file logging */
  file?: boolean;
  /** Log directory */
  logDir?: string;
  /** Suppress all output */
  silent?: boolean;
}

export interface LogContext {
  [key: string]: unknown;
}

/**
 * Resolve a log level from a raw string, falling back to 'info'
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? 'info';
}

/**
 * Logger class with structured logging
 */
export class Logger {
  private logger: winston.Logger;
  private service: string;

  constructor(config: LoggerConfig, instance?: winston.Logger) {
    this.service = config.service;
    this.logger = instance ?? Logger.build(config);
  }

  private static build(config: LoggerConfig): winston.Logger {
    // Define log format
    const logFormat = winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.errors({ stack: true }),
      winston.format.metadata({ fillExcept: ['message', 'level', 'timestamp', 'service'] }),
      winston.format.json()
    );

    // Console format (pretty print for dev)
    const consoleFormat = winston.format.combine(
      winston.format.timestamp({ format: 'HH:mm:ss.SSS' }),
      winston.format.colorize(),
      winston.format.printf(({ timestamp, level, message, service, ...meta }) => {
        const metaStr = Object.keys(meta).length > 0 ? `\n${JSON.stringify(meta, null, 2)}` : '';
        return `${String(timestamp)} [${String(service)}] ${level}: ${String(message)}${metaStr}`;
      })
    );

    const transports: winston.transport[] = [];

    if (config.console !== false) {
      transports.push(
        new winston.transports.Console({
          format: consoleFormat,
        })
      );
    }

    if (config.file === true) {
      const logDir = config.logDir ?? path.join(process.cwd(), 'logs', config.service);
      fs.mkdirSync(logDir, { recursive: true });

      // Combined logs
      transports.push(
        new DailyRotateFile({
          filename: path.join(logDir, `${config.service}-%DATE%.log`),
          datePattern: 'YYYY-MM-DD',
          maxSize: '20m',
          maxFiles: '14d',
          format: logFormat,
        })
      );

      // Error logs (separate file)
      transports.push(
        new DailyRotateFile({
          filename: path.join(logDir, `${config.service}-error-%DATE%.log`),
          datePattern: 'YYYY-MM-DD',
          maxSize: '20m',
          maxFiles: '30d',
          level: 'error',
          format: logFormat,
        })
      );
    }

    return winston.createLogger({
      level: config.level ?? parseLogLevel(process.env.LOG_LEVEL),
      defaultMeta: { service: config.service },
      silent: config.silent ?? transports.length === 0,
      transports,
    });
  }

  /**
   * Log error
   */
  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  /**
   * Log warning
   */
  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  /**
   * Log info
   */
  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  /**
   * Log debug
   */
  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return this.logger.isLevelEnabled(level);
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    this.logger.log(level, message, context);
  }

  /**
   * Create child logger with additional context
   */
  child(context: LogContext): Logger {
    return new Logger({ service: this.service }, this.logger.child(context));
  }

  /**
   * Close logger and flush logs
   */
  async close(): Promise<void> {
    return new Promise((resolve) => {
      this.logger.on('finish', () => resolve());
      this.logger.end();
    });
  }
}

/**
 * Create a logger instance
 */
export function createLogger(config: LoggerConfig): Logger {
  return new Logger(config);
}
