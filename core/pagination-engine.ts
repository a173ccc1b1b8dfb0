/**
 * PaginationEngine - 逐页抓取
 *
 * 状态：fetching(N) -> extracting -> checking -> fetching(N+1) | done
 * 每页结束后依次检查：拦截、无下一页、结果数达到上限、页数达到上限。
 */

import type { Page } from 'puppeteer-core';
import { createEnhancedLogger, toError } from '../utils/logger';
import { sleep } from '../utils/retry';
import { ScraperErrors } from './errors';
import type { NavigationOutcome, PageNavigator } from './navigation-service';
import type { PageExtraction, ResultExtractor } from './result-extractor';
import { blockSnippet, buildSearchUrl, type EndReason, type SearchAttempt } from './search-attempt';

type LoadedOutcome = Extract<NavigationOutcome, { kind: 'loaded' }>;

type EngineState =
  | { kind: 'fetching'; pageIndex: number }
  | { kind: 'extracting'; pageIndex: number; outcome: LoadedOutcome }
  | { kind: 'checking'; pageIndex: number; extraction: PageExtraction }
  | { kind: 'done'; reason: EndReason };

export interface PaginationEngineOptions {
  navigator: PageNavigator;
  extractor: Pick<ResultExtractor, 'extractFromHtml'>;
  delay?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export class PaginationEngine {
  private readonly navigator: PageNavigator;
  private readonly extractor: Pick<ResultExtractor, 'extractFromHtml'>;
  private readonly delay: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly logger = createEnhancedLogger('PaginationEngine');

  constructor(options: PaginationEngineOptions) {
    this.navigator = options.navigator;
    this.extractor = options.extractor;
    this.delay = options.delay ?? sleep;
  }

  async run(attempt: SearchAttempt, page: Page, signal?: AbortSignal): Promise<SearchAttempt> {
    const { params } = attempt;
    let state: EngineState = { kind: 'fetching', pageIndex: 0 };

    while (state.kind !== 'done') {
      switch (state.kind) {
        case 'fetching':
          state = await this.fetch(attempt, page, state.pageIndex, signal);
          break;
        case 'extracting':
          state = await this.extract(attempt, page, state.pageIndex, state.outcome);
          break;
        case 'checking':
          state = await this.check(attempt, state.pageIndex, state.extraction, signal);
          break;
      }
    }

    attempt.endReason = state.reason;
    this.logger.info('Pagination finished', {
      query: params.query,
      attempt: attempt.attemptNumber,
      pagesFetched: attempt.pagesFetched,
      results: attempt.results.length,
      reason: state.reason,
    });
    return attempt;
  }

  private async fetch(
    attempt: SearchAttempt,
    page: Page,
    pageIndex: number,
    signal?: AbortSignal
  ): Promise<EngineState> {
    const { params } = attempt;
    if (signal?.aborted) {
      throw ScraperErrors.searchAborted(params.query, 'signal aborted before page fetch');
    }

    const url = buildSearchUrl(params.query, params.lang, pageIndex);
    const outcome = await this.logger.trackAsync(
      'fetchPage',
      () =>
        this.navigator.goto(page, url, 'minimal', {
          settleMs: (params.sleepInterval * 1000) / 2,
          humanize: params.humanize,
        }),
      { page: pageIndex + 1 }
    );

    if (outcome.kind === 'blocked') {
      attempt.block = {
        marker: outcome.marker,
        page: pageIndex + 1,
        url: outcome.finalUrl,
        htmlSnippet: blockSnippet(outcome.html),
        screenshotBase64: outcome.screenshotBase64,
      };
      attempt.lastHtml = outcome.html;
      return { kind: 'done', reason: 'blocked' };
    }

    return { kind: 'extracting', pageIndex, outcome };
  }

  private async extract(
    attempt: SearchAttempt,
    page: Page,
    pageIndex: number,
    outcome: LoadedOutcome
  ): Promise<EngineState> {
    const extraction = this.extractor.extractFromHtml(outcome.html, {
      maxResults: attempt.params.resultsPerPage,
      pageNumber: pageIndex + 1,
      seenUrls: attempt.seenUrls,
    });

    for (const item of extraction.items) {
      // 提取器已按 seenUrls 去重，这里再保证一次
      if (attempt.seenUrls.has(item.url)) continue;
      attempt.seenUrls.add(item.url);
      attempt.results.push(item);
    }
    attempt.pagesFetched++;
    attempt.lastHtml = outcome.html;

    if (pageIndex === 0) {
      attempt.statsText = extraction.statsText ?? '';
      attempt.screenshotBase64 = await this.captureViewport(page);
    }

    this.logger.debug('Page processed', {
      page: pageIndex + 1,
      strategy: extraction.strategy,
      found: extraction.items.length,
      total: attempt.results.length,
    });

    return { kind: 'checking', pageIndex, extraction };
  }

  private async check(
    attempt: SearchAttempt,
    pageIndex: number,
    extraction: PageExtraction,
    signal?: AbortSignal
  ): Promise<EngineState> {
    const { params } = attempt;

    if (!extraction.hasNextPage) {
      return { kind: 'done', reason: 'no-next-page' };
    }
    if (attempt.results.length >= params.resultsPerPage * params.maxPages) {
      return { kind: 'done', reason: 'result-cap' };
    }
    if (attempt.pagesFetched >= params.maxPages) {
      return { kind: 'done', reason: 'max-pages' };
    }

    // 页间等待随尝试次数增长
    await this.delay(params.sleepInterval * 1000 * attempt.attemptNumber, signal);
    return { kind: 'fetching', pageIndex: pageIndex + 1 };
  }

  private async captureViewport(page: Page): Promise<string | undefined> {
    try {
      return await page.screenshot({ encoding: 'base64' });
    } catch (error) {
      this.logger.debug('Viewport screenshot failed', { error: toError(error).message });
      return undefined;
    }
  }
}
