/**
 * Error handling module
 * Defines error types and codes for the search pipeline
 */

/**
 * Standard error codes for the crawler
 */
export enum ErrorCode {
  TIMEOUT = "TIMEOUT",

  // Rate Limiting
  RATE_LIMIT_EXCEEDED = "RATE_LIMIT_EXCEEDED",

  // Browser/Puppeteer Errors
  SESSION_INIT_FAILED = "SESSION_INIT_FAILED",
  CONTEXT_CREATION_FAILED = "CONTEXT_CREATION_FAILED",
  NAVIGATION_FAILED = "NAVIGATION_FAILED",
  NAVIGATION_TIMEOUT = "NAVIGATION_TIMEOUT",

  // Search Errors
  SEARCH_EXHAUSTED = "SEARCH_EXHAUSTED",
  SEARCH_ABORTED = "SEARCH_ABORTED",

  // Request Errors
  VALIDATION_ERROR = "VALIDATION_ERROR",

  // System Errors
  INTERNAL_ERROR = "INTERNAL_ERROR",
  CONFIG_ERROR = "CONFIG_ERROR",
}

/**
 * Context information for errors
 */
export interface ErrorContext {
  url?: string;
  query?: string;
  operation?: string;
  attempt?: number;
  [key: string]: unknown;
}

export interface ScraperErrorOptions {
  retryable?: boolean;
  context?: ErrorContext;
  originalError?: Error;
  statusCode?: number;
}

/**
 * Custom error class for crawler errors
 */
export class ScraperError extends Error {
  public readonly code: ErrorCode;
  public readonly retryable: boolean;
  public readonly context: ErrorContext;
  public readonly timestamp: Date;
  public readonly originalError?: Error;
  public readonly statusCode?: number;

  constructor(code: ErrorCode, message: string, options: ScraperErrorOptions = {}) {
    super(message);
    this.name = "ScraperError";
    this.code = code;
    this.retryable = options.retryable ?? false;
    this.context = options.context || {};
    this.timestamp = new Date();
    this.originalError = options.originalError;
    this.statusCode = options.statusCode;

    // Capture stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Check if the error is recoverable
   */
  public isRecoverable(): boolean {
    return this.retryable;
  }

  /**
   * Convert error to JSON object
   */
  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      context: this.context,
      timestamp: this.timestamp,
      stack: this.stack,
      originalError: this.originalError
        ? {
            name: this.originalError.name,
            message: this.originalError.message,
            stack: this.originalError.stack,
          }
        : undefined,
    };
  }
}

/**
 * 浏览器进程无法启动或启动后不可用
 */
export class SessionInitError extends ScraperError {
  constructor(message: string, originalError?: Error) {
    super(ErrorCode.SESSION_INIT_FAILED, message, {
      retryable: true,
      originalError,
      context: { operation: "acquireSession" },
    });
    this.name = "SessionInitError";
  }
}

/**
 * 浏览器上下文创建失败
 */
export class ContextCreationError extends ScraperError {
  constructor(message: string, originalError?: Error, context?: ErrorContext) {
    super(ErrorCode.CONTEXT_CREATION_FAILED, message, {
      retryable: true,
      originalError,
      context: { operation: "newContext", ...context },
    });
    this.name = "ContextCreationError";
  }
}

export class NavigationTimeout extends ScraperError {
  public readonly timeoutMs: number;

  constructor(url: string, timeoutMs: number, originalError?: Error) {
    super(ErrorCode.NAVIGATION_TIMEOUT, `Navigation timed out after ${timeoutMs}ms: ${url}`, {
      retryable: true,
      originalError,
      context: { url, operation: "goto" },
    });
    this.name = "NavigationTimeout";
    this.timeoutMs = timeoutMs;
  }
}

/**
 * 所有重试都失败后抛出，携带最后一次的错误
 */
export class SearchExhausted extends ScraperError {
  public readonly attempts: number;
  public readonly lastError: Error;

  constructor(query: string, attempts: number, lastError: Error) {
    super(
      ErrorCode.SEARCH_EXHAUSTED,
      `Search failed after ${attempts} attempt(s): ${lastError.message}`,
      {
        retryable: false,
        originalError: lastError,
        context: { query, attempt: attempts },
      }
    );
    this.name = "SearchExhausted";
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

/**
 * Factory for creating common errors
 */
export const ScraperErrors = {
  TimeoutError: (message: string, context?: ErrorContext) =>
    new ScraperError(ErrorCode.TIMEOUT, message, {
      retryable: true,
      context,
    }),

  invalidConfiguration: (message: string, context?: ErrorContext) =>
    new ScraperError(ErrorCode.CONFIG_ERROR, message, {
      retryable: false,
      context,
    }),

  validationFailed: (message: string, context?: ErrorContext) =>
    new ScraperError(ErrorCode.VALIDATION_ERROR, message, {
      retryable: false,
      statusCode: 400,
      context,
    }),

  searchAborted: (query: string, reason?: string) =>
    new ScraperError(ErrorCode.SEARCH_ABORTED, `Search aborted: ${reason ?? "cancelled"}`, {
      retryable: false,
      context: { query },
    }),

  navigationFailed: (url: string, error?: Error) =>
    new ScraperError(ErrorCode.NAVIGATION_FAILED, `Navigation failed: ${url}`, {
      retryable: true,
      context: { url },
      originalError: error,
    }),
};
