/**
 * SearchCoordinator - 重试协调
 *
 * 每次尝试使用新的浏览上下文，无论成功失败都关闭它。
 * 第 k 次失败（0 起始）后等待 sleepInterval * (k + 1) 秒再重试。
 */

import { createEnhancedLogger, toError } from '../utils/logger';
import { sleep } from '../utils/retry';
import { type ContextProvider, type SearchContext, resolveLocale, withContext } from './context-factory';
import { ScraperError, ScraperErrors, SearchExhausted } from './errors';
import type { PaginationEngine } from './pagination-engine';
import type { ProxyPool } from './proxy-manager';
import { createSearchAttempt, type SearchAttempt, type SearchParams } from './search-attempt';

export interface SearchCoordinatorOptions {
  contextProvider: ContextProvider;
  engine: Pick<PaginationEngine, 'run'>;
  proxyPool?: ProxyPool;
  delay?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/**
 * 不可重试的 ScraperError（配置、校验、取消）直接向上抛
 */
function isFatal(error: unknown): boolean {
  return error instanceof ScraperError && !error.retryable;
}

export class SearchCoordinator {
  private readonly contextProvider: ContextProvider;
  private readonly engine: Pick<PaginationEngine, 'run'>;
  private readonly proxyPool?: ProxyPool;
  private readonly delay: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly logger = createEnhancedLogger('SearchCoordinator');

  constructor(options: SearchCoordinatorOptions) {
    this.contextProvider = options.contextProvider;
    this.engine = options.engine;
    this.proxyPool = options.proxyPool;
    this.delay = options.delay ?? sleep;
  }

  async searchWithRetry(params: SearchParams, retryCount: number, signal?: AbortSignal): Promise<SearchAttempt> {
    const totalAttempts = Math.max(0, retryCount) + 1;
    let lastError: Error = new Error('No attempt was made');

    for (let index = 0; index < totalAttempts; index++) {
      if (signal?.aborted) {
        throw ScraperErrors.searchAborted(params.query, 'signal aborted before attempt');
      }

      const attempt = createSearchAttempt(params, index + 1);
      this.logger.info('Search attempt started', {
        query: params.query,
        attempt: attempt.attemptNumber,
        of: totalAttempts,
      });

      try {
        const result = await this.runAttempt(attempt, signal);
        if (result.block) {
          this.logger.warn('Search blocked, returning partial results', {
            query: params.query,
            attempt: attempt.attemptNumber,
            marker: result.block.marker,
            results: result.results.length,
          });
        }
        return result;
      } catch (error) {
        lastError = toError(error);
        if (isFatal(error) || signal?.aborted) {
          throw error;
        }

        this.logger.error('Search attempt failed', lastError, {
          query: params.query,
          attempt: attempt.attemptNumber,
        });

        if (index < totalAttempts - 1) {
          await this.delay(params.sleepInterval * 1000 * (index + 1), signal);
        }
      }
    }

    throw new SearchExhausted(params.query, totalAttempts, lastError);
  }

  private runAttempt(attempt: SearchAttempt, signal?: AbortSignal): Promise<SearchAttempt> {
    const { params } = attempt;
    const contextOptions = {
      locale: resolveLocale(params.lang),
      timezone: params.timezone,
      useProxy: params.useProxy,
      useStealth: params.useStealth,
    };

    return withContext(this.contextProvider, contextOptions, async (context) => {
      // 超时或取消时立即关闭上下文，正在进行的导航随之失败
      const onAbort = () => {
        context.close().catch((error: unknown) => {
          this.logger.warn('Context close on abort failed', { error: toError(error).message });
        });
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      try {
        const page = await context.newPage();
        const result = await this.engine.run(attempt, page, signal);
        this.reportProxy(context, result.block ? 'blocked' : null);
        return result;
      } catch (error) {
        this.reportProxy(context, toError(error).message);
        throw error;
      } finally {
        signal?.removeEventListener('abort', onAbort);
      }
    });
  }

  /**
   * failure 为 null 表示成功
   */
  private reportProxy(context: SearchContext, failure: string | null): void {
    if (!this.proxyPool || !context.proxy) {
      return;
    }
    if (failure === null) {
      this.proxyPool.markSuccess(context.proxy.server);
    } else {
      this.proxyPool.markFailed(context.proxy.server, failure);
    }
  }
}
