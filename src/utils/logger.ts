import * as winston from 'winston';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

export type LogContext = Record<string, unknown>;

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Level from LOG_LEVEL, falling back to info
 */
export function resolveLogLevel(value: string | undefined = process.env.LOG_LEVEL): LogLevel {
  return value && isLogLevel(value) ? value : 'info';
}

/**
 * Minimal Winston-based logger
 * Supports console + optional file logging
 */
export class Logger {
  private winston: winston.Logger;

  constructor(service: string, logFile?: string, level: LogLevel = resolveLogLevel()) {
    const transports: winston.transport[] = [
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.timestamp({ format: 'HH:mm:ss' }),
          winston.format.colorize(),
          winston.format.printf(({ timestamp, level, message, service, ...meta }) => {
            const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
            return `${timestamp} [${service}] ${level}: ${message}${metaStr}`;
          })
        ),
      }),
    ];

    if (logFile) {
      const fileFormat = winston.format.combine(winston.format.timestamp(), winston.format.json());

      transports.push(
        new winston.transports.File({
          filename: logFile,
          format: fileFormat,
        }),
        new winston.transports.File({
          filename: logFile.replace('.log', '-error.log'),
          level: 'error',
          format: fileFormat,
        })
      );
    }

    this.winston = winston.createLogger({
      level,
      defaultMeta: { service },
      transports,
      exitOnError: false,
    });
  }

  error(message: string, context?: LogContext): void {
    this.winston.error(message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.winston.warn(message, context);
  }

  info(message: string, context?: LogContext): void {
    this.winston.info(message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.winston.debug(message, context);
  }
}

/**
 * @param level - falls back to LOG_LEVEL when omitted
 */
export function createLogger(service: string, logFile?: string, level?: LogLevel): Logger {
  return new Logger(service, logFile, level);
}
