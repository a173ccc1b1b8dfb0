/**
 * 重试工具
 */

import { ErrorCode, ScraperError } from '../core/errors';

export type BackoffStrategy = 'exponential' | 'linear';

export interface RetryOptions {
  /** 首次之外的重试次数 */
  maxRetries?: number;
  baseDelay?: number;
  maxDelay?: number;
  backoff?: BackoffStrategy;
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  onRetry?: (error: unknown, attempt: number, delay: number) => void;
  signal?: AbortSignal;
}

const DEFAULT_RETRY_OPTIONS: Required<Pick<RetryOptions, 'maxRetries' | 'baseDelay' | 'maxDelay' | 'backoff'>> = {
  maxRetries: 3,
  baseDelay: 1000,
  maxDelay: 30000,
  backoff: 'exponential',
};

function abortError(signal: AbortSignal): ScraperError {
  const reason = signal.reason instanceof Error ? signal.reason.message : 'aborted';
  return new ScraperError(ErrorCode.SEARCH_ABORTED, `Operation aborted: ${reason}`, {
    retryable: false,
  });
}

/**
 * 延迟，可被 AbortSignal 打断
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(abortError(signal));
  }
  if (ms <= 0) {
    return Promise.resolve();
  }

  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      if (signal) {
        reject(abortError(signal));
      }
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * 计算第 attempt 次重试前的等待时间（attempt 从 0 开始）
 */
export function computeDelay(
  attempt: number,
  baseDelay: number,
  backoff: BackoffStrategy,
  maxDelay: number = Number.POSITIVE_INFINITY
): number {
  const raw = backoff === 'linear' ? baseDelay * (attempt + 1) : baseDelay * Math.pow(2, attempt);
  return Math.min(raw, maxDelay);
}

/**
 * 带退避的重试
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const maxRetries = options.maxRetries ?? DEFAULT_RETRY_OPTIONS.maxRetries;
  const baseDelay = options.baseDelay ?? DEFAULT_RETRY_OPTIONS.baseDelay;
  const maxDelay = options.maxDelay ?? DEFAULT_RETRY_OPTIONS.maxDelay;
  const backoff = options.backoff ?? DEFAULT_RETRY_OPTIONS.backoff;

  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    if (options.signal?.aborted) {
      throw abortError(options.signal);
    }

    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      const isLast = attempt === maxRetries;
      if (isLast || (options.shouldRetry && !options.shouldRetry(error, attempt))) {
        throw error;
      }

      const delay = computeDelay(attempt, baseDelay, backoff, maxDelay);
      options.onRetry?.(error, attempt + 1, delay);
      await sleep(delay, options.signal);
    }
  }

  throw lastError;
}
