/**
 * SearchService - 请求校验、总超时和结果打包
 */

import { z } from 'zod';
import { MAX_PAGES, MAX_RESULTS_PER_PAGE } from '../config/constants';
import type { SearchConfig } from '../utils/config-manager';
import { createEnhancedLogger, toError } from '../utils/logger';
import { ErrorCode, ScraperError, ScraperErrors } from './errors';
import type { SearchCoordinator } from './search-coordinator';
import { isBlockSignal, type SearchParams, type SearchResultBundle, toResultBundle } from './search-attempt';

const booleanish = z.union([
  z.boolean(),
  z.enum(['true', 'false', '1', '0']).transform((val) => val === 'true' || val === '1'),
]);

export const searchRequestSchema = z.object({
  query: z.string().trim().min(1, 'query must not be empty'),
  lang: z.string().trim().min(2).max(10).optional(),
  resultsPerPage: z.coerce.number().int().min(1).max(MAX_RESULTS_PER_PAGE).optional(),
  maxPages: z.coerce.number().int().min(1).max(MAX_PAGES).optional(),
  sleepInterval: z.coerce.number().min(0).max(60).optional(),
  retryCount: z.coerce.number().int().min(0).max(5).optional(),
  includeScreenshot: booleanish.optional(),
  useStealth: booleanish.optional(),
  useProxy: booleanish.optional(),
});

export type SearchRequestInput = z.input<typeof searchRequestSchema>;

export interface SearchRequest {
  params: SearchParams;
  retryCount: number;
  includeScreenshot: boolean;
}

export interface SearchOutcome {
  bundle: SearchResultBundle;
  blocked: boolean;
  attempts: number;
  elapsedMs: number;
}

export interface SearchServiceOptions {
  coordinator: Pick<SearchCoordinator, 'searchWithRetry'>;
  config: SearchConfig;
  stealthDefault?: boolean;
  proxyDefault?: boolean;
}

export const DEFAULT_RESULTS_PER_PAGE = 5;
export const DEFAULT_MAX_PAGES = 1;
export const DEFAULT_RETRY_COUNT = 2;

export class SearchService {
  private readonly coordinator: Pick<SearchCoordinator, 'searchWithRetry'>;
  private readonly config: SearchConfig;
  private readonly stealthDefault: boolean;
  private readonly proxyDefault: boolean;
  private readonly logger = createEnhancedLogger('SearchService');

  constructor(options: SearchServiceOptions) {
    this.coordinator = options.coordinator;
    this.config = options.config;
    this.stealthDefault = options.stealthDefault ?? true;
    this.proxyDefault = options.proxyDefault ?? false;
  }

  /**
   * 校验并补全默认值；上限受配置约束
   */
  parseRequest(input: unknown): SearchRequest {
    const parsed = searchRequestSchema.safeParse(input);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'request'}: ${issue.message}`);
      throw ScraperErrors.validationFailed(`Invalid search request: ${issues.join('; ')}`, { issues });
    }

    const data = parsed.data;
    const resultsPerPage = data.resultsPerPage ?? Math.min(DEFAULT_RESULTS_PER_PAGE, this.config.maxResults);
    const maxPages = data.maxPages ?? DEFAULT_MAX_PAGES;

    if (resultsPerPage > this.config.maxResults) {
      throw ScraperErrors.validationFailed(`resultsPerPage must be at most ${this.config.maxResults}`, {
        issues: [`resultsPerPage: must be <= ${this.config.maxResults}`],
      });
    }
    if (maxPages > this.config.maxPages) {
      throw ScraperErrors.validationFailed(`maxPages must be at most ${this.config.maxPages}`, {
        issues: [`maxPages: must be <= ${this.config.maxPages}`],
      });
    }

    return {
      params: {
        query: data.query,
        lang: data.lang ?? this.config.defaultLang,
        resultsPerPage,
        maxPages,
        sleepInterval: data.sleepInterval ?? this.config.sleepInterval,
        useStealth: data.useStealth ?? this.stealthDefault,
        useProxy: data.useProxy ?? this.proxyDefault,
        timezone: this.config.defaultTimezone,
      },
      retryCount: data.retryCount ?? DEFAULT_RETRY_COUNT,
      includeScreenshot: data.includeScreenshot ?? false,
    };
  }

  /**
   * 总超时 = timeoutSeconds * maxPages
   */
  timeoutFor(params: SearchParams): number {
    return this.config.timeoutSeconds * 1000 * params.maxPages;
  }

  async search(input: unknown, options: { signal?: AbortSignal } = {}): Promise<SearchOutcome> {
    const request = this.parseRequest(input);
    return this.execute(request, options);
  }

  async execute(request: SearchRequest, options: { signal?: AbortSignal } = {}): Promise<SearchOutcome> {
    const { params } = request;
    const timeoutMs = this.timeoutFor(params);
    const controller = new AbortController();
    const startedAt = Date.now();
    let timedOut = false;

    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort(new Error(`Search timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    const onExternalAbort = () => controller.abort(options.signal?.reason);
    if (options.signal?.aborted) {
      controller.abort(options.signal.reason);
    } else {
      options.signal?.addEventListener('abort', onExternalAbort, { once: true });
    }

    const aborted = new Promise<never>((_, reject) => {
      const rejectWithReason = () => {
        reject(
          timedOut
            ? ScraperErrors.TimeoutError(`Search exceeded ${timeoutMs / 1000}s`, {
                query: params.query,
                timeoutMs,
              })
            : ScraperErrors.searchAborted(params.query, 'request cancelled')
        );
      };
      if (controller.signal.aborted) {
        rejectWithReason();
      } else {
        controller.signal.addEventListener('abort', rejectWithReason, { once: true });
      }
    });

    const run = this.coordinator.searchWithRetry(params, request.retryCount, controller.signal);
    // 超时后 run 的失败不再有人等待
    run.catch((error: unknown) => {
      if (controller.signal.aborted) {
        this.logger.debug('Search settled after abort', { error: toError(error).message });
      }
    });

    this.logger.info('Search started', {
      query: params.query,
      lang: params.lang,
      resultsPerPage: params.resultsPerPage,
      maxPages: params.maxPages,
      retryCount: request.retryCount,
      timeoutMs,
    });

    try {
      const attempt = await Promise.race([run, aborted]);
      const bundle = toResultBundle(attempt, { includeScreenshot: request.includeScreenshot });
      const elapsedMs = Date.now() - startedAt;
      const blocked = isBlockSignal(bundle);

      this.logger.info('Search completed', {
        query: params.query,
        results: bundle.results.length,
        pagesFetched: bundle.pagesFetched,
        blocked,
        elapsedMs,
      });

      return { bundle, blocked, attempts: attempt.attemptNumber, elapsedMs };
    } catch (error) {
      if (timedOut && !(error instanceof ScraperError && error.code === ErrorCode.TIMEOUT)) {
        throw ScraperErrors.TimeoutError(`Search exceeded ${timeoutMs / 1000}s`, {
          query: params.query,
          timeoutMs,
        });
      }
      throw error;
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onExternalAbort);
      // 让 aborted 永远不会在之后变成未处理的拒绝
      aborted.catch(() => undefined);
      if (!controller.signal.aborted) {
        controller.abort(new Error('search finished'));
      }
    }
  }
}
