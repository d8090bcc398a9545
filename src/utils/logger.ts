import winston from 'winston';
import path from 'path';
import { errorMessage } from '../types/api';

type LogMeta = Record<string, unknown>;

interface ConsoleInfo {
  level: string;
  message: unknown;
  [key: string]: unknown;
}

// Shown in brackets after the level, in this order
const CONTEXT_KEYS: Array<[key: string, label: string]> = [
  ['operation', 'op'],
  ['filename', 'file'],
  ['sessionId', 'session']
];

/**
 * Render the request context of a log entry as ` [op=ingest file=a.pdf]`, or
 * an empty string when the entry carries none
 */
export function contextTag(meta: Record<string, unknown>): string {
  const parts = CONTEXT_KEYS.filter(([key]) => typeof meta[key] === 'string' && meta[key] !== '').map(
    ([key, label]) => `${label}=${String(meta[key])}`
  );
  return parts.length > 0 ? ` [${parts.join(' ')}]` : '';
}

export function formatConsoleLine(info: ConsoleInfo): string {
  const timestamp = typeof info.timestamp === 'string' ? `${info.timestamp} ` : '';
  const reason = typeof info.error === 'string' ? ` (${info.error})` : '';
  return `${timestamp}${info.level}${contextTag(info)}: ${String(info.message)}${reason}`;
}

export class Logger {
  private static instance: Logger;
  private logger: winston.Logger;

  private constructor() {
    const level = process.env.LOG_LEVEL || 'info';
    const silent = level === 'silent';

    const logFormat = winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json()
    );

    const transports: winston.transport[] = [
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.timestamp({ format: 'HH:mm:ss.SSS' }),
          winston.format.colorize(),
          winston.format.printf(formatConsoleLine)
        )
      })
    ];

    // Add file transport if log file is configured
    if (process.env.LOG_FILE) {
      transports.push(
        new winston.transports.File({
          filename: path.resolve(process.env.LOG_FILE),
          format: logFormat,
          maxsize: parseInt(process.env.LOG_MAX_SIZE || '10485760'), // 10MB
          maxFiles: parseInt(process.env.LOG_MAX_FILES || '5')
        })
      );
    }

    this.logger = winston.createLogger({
      level: silent ? 'error' : level,
      silent,
      format: logFormat,
      transports
    });
  }

  public static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  public info(message: string, meta?: LogMeta): void {
    this.logger.info(message, meta);
  }

  public error(message: string, error?: unknown, meta?: LogMeta): void {
    this.logger.error(message, {
      ...meta,
      error: error === undefined ? undefined : errorMessage(error),
      stack: error instanceof Error ? error.stack : undefined
    });
  }

  public warn(message: string, meta?: LogMeta): void {
    this.logger.warn(message, meta);
  }

  public debug(message: string, meta?: LogMeta): void {
    this.logger.debug(message, meta);
  }

  public performance(operation: string, duration: number, meta?: LogMeta): void {
    this.logger.info(`Performance: ${operation}`, {
      duration: `${duration}ms`,
      ...meta
    });
  }
}

export const logger = Logger.getInstance();
