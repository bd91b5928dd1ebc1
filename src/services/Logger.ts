import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import { ENV } from '../config/environment';

// Define log levels
const levels = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  debug: 4,
};

// Define log colors
const colors = {
  error: 'red',
  warn: 'yellow',
  info: 'green',
  http: 'magenta',
  debug: 'blue',
};

winston.addColors(colors);

export type LogMeta = Record<string, unknown>;

// Define log format
const format = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

// Console format (pretty print)
const consoleFormat = winston.format.combine(
  winston.format.colorize({ all: true }),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.printf(
    (info) => `${String(info.timestamp)} [${info.level}]: ${String(info.message)}${info.stack ? `\n${String(info.stack)}` : ''}`
  )
);

function buildTransports(): winston.transport[] {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: consoleFormat,
      silent: ENV.NODE_ENV === 'test' && ENV.LOG_LEVEL !== 'debug',
    }),
  ];

  if (!ENV.LOG_TO_FILE) {
    return transports;
  }

  transports.push(
    // Error logs - separate file
    new DailyRotateFile({
      filename: path.join(ENV.LOG_DIR, 'error-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      level: 'error',
      maxFiles: '30d',
      maxSize: '20m',
      format,
    }),

    // Combined logs - all levels
    new DailyRotateFile({
      filename: path.join(ENV.LOG_DIR, 'combined-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      maxFiles: '14d',
      maxSize: '20m',
      format,
    }),

    // Moderation audit trail - kept longer than the combined log
    new DailyRotateFile({
      filename: path.join(ENV.LOG_DIR, 'audit-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      level: 'info',
      maxFiles: '90d',
      maxSize: '20m',
      format: winston.format.combine(
        winston.format((info) => (info.audit ? info : false))(),
        format
      ),
    })
  );

  return transports;
}

// Create logger instance
const logger = winston.createLogger({
  level: ENV.LOG_LEVEL,
  levels,
  transports: buildTransports(),
  exitOnError: false,
});

function describeError(error: unknown): LogMeta {
  if (error instanceof Error) {
    return { error: error.message, stack: error.stack, errorName: error.name };
  }
  if (error === undefined) {
    return {};
  }
  return { error: String(error) };
}

// Create specialized loggers
export class Logger {
  private context: string;

  constructor(context: string) {
    this.context = context;
  }

  private log(level: string, message: string, meta?: LogMeta) {
    logger.log(level, `[${this.context}] ${message}`, meta);
  }

  error(message: string, error?: unknown, meta?: LogMeta) {
    this.log('error', message, { ...describeError(error), ...meta });
  }

  warn(message: string, meta?: LogMeta) {
    this.log('warn', message, meta);
  }

  info(message: string, meta?: LogMeta) {
    this.log('info', message, meta);
  }

  debug(message: string, meta?: LogMeta) {
    this.log('debug', message, meta);
  }

  http(message: string, meta?: LogMeta) {
    this.log('http', message, meta);
  }

  // Moderation action logging (lands in the audit file as well)
  moderation(action: string, userId: string, reason: string, meta?: LogMeta) {
    this.log('info', `Moderation: ${action} on ${userId}`, {
      audit: true,
      action,
      userId,
      reason,
      ...meta,
    });
  }
}

export const createLogger = (context: string) => new Logger(context);

export default logger;
