/**
 * Winston-based logger with structured output.
 */

import { createLogger as createWinstonLogger, format, transports, Logger } from 'winston';
import * as path from 'path';
import * as fs from 'fs';

const isTest = process.env.NODE_ENV === 'test';
const logDir = process.env.LOG_DIR || path.join(process.cwd(), 'logs');

// 测试环境不写文件
const useFiles = !isTest;

if (useFiles && !fs.existsSync(logDir)) {
  fs.mkdirSync(logDir, { recursive: true });
}

const logFormat = format.combine(
  format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  format.errors({ stack: true }),
  format.splat(),
  format.json()
);

const consoleFormat = format.combine(
  format.colorize(),
  format.timestamp({ format: 'HH:mm:ss' }),
  format.printf(({ timestamp, level, message, module, ...meta }) => {
    const scope = typeof module === 'string' ? ` [${module}]` : '';
    let msg = `${String(timestamp)} [${level}]${scope}: ${String(message)}`;
    if (Object.keys(meta).length > 0) {
      msg += ` ${JSON.stringify(meta)}`;
    }
    return msg;
  })
);

const MAX_LOG_SIZE = 5 * 1024 * 1024;

const fileTransports = useFiles
  ? [
      new transports.File({
        filename: path.join(logDir, 'error.log'),
        level: 'error',
        maxsize: MAX_LOG_SIZE,
        maxFiles: 5,
      }),
      new transports.File({
        filename: path.join(logDir, 'combined.log'),
        maxsize: MAX_LOG_SIZE,
        maxFiles: 5,
      }),
    ]
  : [];

const exceptionHandlers = useFiles
  ? [
      new transports.File({
        filename: path.join(logDir, 'exceptions.log'),
        maxsize: MAX_LOG_SIZE,
        maxFiles: 3,
      }),
    ]
  : [];

const rejectionHandlers = useFiles
  ? [
      new transports.File({
        filename: path.join(logDir, 'rejections.log'),
        maxsize: MAX_LOG_SIZE,
        maxFiles: 3,
      }),
    ]
  : [];

export const logger: Logger = createWinstonLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: logFormat,
  defaultMeta: { service: 'serp-crawler' },
  transports: [...fileTransports],
  exceptionHandlers,
  rejectionHandlers,
});

if (process.env.NODE_ENV !== 'production') {
  logger.add(
    new transports.Console({
      format: consoleFormat,
      silent: isTest && process.env.LOG_LEVEL !== 'debug',
    })
  );
}

export interface ModuleLogger {
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, error?: Error, meta?: Record<string, unknown>) => void;
  debug: (message: string, meta?: Record<string, unknown>) => void;
}

interface CodedError extends Error {
  code: unknown;
  retryable: unknown;
  context?: unknown;
  originalError?: Error;
}

function isCodedError(error: Error): error is CodedError {
  return 'code' in error && 'retryable' in error;
}

function normalizeErrorMeta(
  error: Error | undefined,
  extraMeta: Record<string, unknown>,
): Record<string, unknown> {
  if (!error) {
    return extraMeta;
  }

  const meta: Record<string, unknown> = { ...extraMeta };

  if (isCodedError(error)) {
    // ScraperError 形状
    meta.errorCode = error.code;
    meta.retryable = error.retryable;
    meta.errorContext = error.context;
    meta.errorMessage = error.message;
    if (error.originalError) {
      meta.originalError = {
        name: error.originalError.name,
        message: error.originalError.message,
      };
    }
  } else {
    meta.errorName = error.name;
    meta.errorMessage = error.message;
  }

  return meta;
}

export function createModuleLogger(module: string): ModuleLogger {
  return {
    info: (message: string, meta: Record<string, unknown> = {}) =>
      logger.info(message, { module, ...meta }),
    warn: (message: string, meta: Record<string, unknown> = {}) =>
      logger.warn(message, { module, ...meta }),
    error: (message: string, error?: Error, meta: Record<string, unknown> = {}) =>
      logger.error(message, normalizeErrorMeta(error, { module, ...meta })),
    debug: (message: string, meta: Record<string, unknown> = {}) =>
      logger.debug(message, { module, ...meta }),
  };
}

export type LogContext = Record<string, unknown>;

/**
 * 增强的模块日志器（集成性能追踪）
 */
export class EnhancedLogger {
  private baseLogger: ModuleLogger;

  constructor(module: string) {
    this.baseLogger = createModuleLogger(module);
  }

  info(message: string, meta?: LogContext): void {
    this.baseLogger.info(message, meta);
  }

  warn(message: string, meta?: LogContext): void {
    this.baseLogger.warn(message, meta);
  }

  error(message: string, error?: Error, meta?: LogContext): void {
    this.baseLogger.error(message, error, meta);
  }

  debug(message: string, meta?: LogContext): void {
    this.baseLogger.debug(message, meta);
  }

  performance(operation: string, duration: number, metadata?: LogContext): void {
    this.baseLogger.info(`[PERF] ${operation}`, {
      ...metadata,
      duration,
      operation,
      type: 'performance',
    });
  }

  startOperation(operation: string, metadata?: LogContext): () => void {
    const startTime = Date.now();
    this.debug(`[START] ${operation}`, metadata);
    return () => {
      const duration = Date.now() - startTime;
      this.performance(operation, duration, metadata);
    };
  }

  async trackAsync<T>(
    operation: string,
    fn: () => Promise<T>,
    metadata?: LogContext
  ): Promise<T> {
    const endOperation = this.startOperation(operation, metadata);
    try {
      const result = await fn();
      endOperation();
      return result;
    } catch (error) {
      endOperation();
      this.error(`[FAILED] ${operation}`, toError(error), metadata);
      throw error;
    }
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function createEnhancedLogger(module: string): EnhancedLogger {
  return new EnhancedLogger(module);
}

export function setLogLevel(level: string): void {
  logger.level = level;
}

export async function closeLogger(): Promise<void> {
  await new Promise<void>((resolve) => {
    logger.on('finish', resolve);
    logger.end();
  });
}
