/**
 * PaginationEngine 单元测试
 */

import { beforeEach, describe, expect, test, vi } from 'vitest';
import type { Page } from 'puppeteer-core';
import { ErrorCode, ScraperError } from '../../core/errors';
import type { NavigationOutcome, PageNavigator } from '../../core/navigation-service';
import { PaginationEngine } from '../../core/pagination-engine';
import type { PageExtraction, ResultItem } from '../../core/result-extractor';
import { createSearchAttempt, type SearchParams } from '../../core/search-attempt';

const params: SearchParams = {
  query: 'espresso',
  lang: 'it',
  resultsPerPage: 2,
  maxPages: 3,
  sleepInterval: 1,
  useStealth: true,
  useProxy: false,
};

function loaded(url: string, html = '<html>page</html>'): NavigationOutcome {
  return { kind: 'loaded', url, finalUrl: url, html, status: 200 };
}

function item(url: string, page: number): ResultItem {
  return { title: `Title ${url}`, url, description: '', page };
}

function extraction(items: ResultItem[], hasNextPage: boolean, statsText: string | null = null): PageExtraction {
  return { items, strategy: 'containers', containerSelector: 'div.g', hasNextPage, statsText };
}

describe('PaginationEngine', () => {
  let navigator: { goto: ReturnType<typeof vi.fn> };
  let extractor: { extractFromHtml: ReturnType<typeof vi.fn> };
  let delay: ReturnType<typeof vi.fn>;
  let page: { screenshot: ReturnType<typeof vi.fn> };
  let engine: PaginationEngine;

  beforeEach(() => {
    navigator = { goto: vi.fn((_page: Page, url: string) => Promise.resolve(loaded(url))) };
    extractor = { extractFromHtml: vi.fn() };
    delay = vi.fn().mockResolvedValue(undefined);
    page = { screenshot: vi.fn().mockResolvedValue('dmlld3BvcnQ=') };
    engine = new PaginationEngine({
      navigator: navigator as unknown as PageNavigator,
      extractor,
      delay,
    });
  });

  test('should stop after one page when there is no next page', async () => {
    extractor.extractFromHtml.mockReturnValueOnce(
      extraction([item('https://a.example/1', 1)], false, 'About 10 results')
    );
    const attempt = createSearchAttempt(params, 1);

    const result = await engine.run(attempt, page as unknown as Page);

    expect(result.endReason).toBe('no-next-page');
    expect(result.pagesFetched).toBe(1);
    expect(result.results).toEqual([item('https://a.example/1', 1)]);
    expect(result.statsText).toBe('About 10 results');
    expect(result.screenshotBase64).toBe('dmlld3BvcnQ=');
    expect(page.screenshot).toHaveBeenCalledWith({ encoding: 'base64' });
    expect(delay).not.toHaveBeenCalled();
  });

  test('should request successive pages with the start offset and wait between them', async () => {
    extractor.extractFromHtml
      .mockReturnValueOnce(extraction([item('https://a.example/1', 1)], true))
      .mockReturnValueOnce(extraction([item('https://a.example/2', 2)], true))
      .mockReturnValueOnce(extraction([item('https://a.example/3', 3)], true));

    const result = await engine.run(createSearchAttempt(params, 1), page as unknown as Page);

    const urls = navigator.goto.mock.calls.map((call) => String(call[1]));
    expect(urls).toEqual([
      'https://www.google.com/search?q=espresso&hl=it&pws=0&gl=it',
      'https://www.google.com/search?q=espresso&hl=it&pws=0&gl=it&start=10',
      'https://www.google.com/search?q=espresso&hl=it&pws=0&gl=it&start=20',
    ]);
    expect(navigator.goto).toHaveBeenCalledWith(page, urls[0], 'minimal', { settleMs: 500, humanize: undefined });
    expect(delay.mock.calls).toEqual([
      [1000, undefined],
      [1000, undefined],
    ]);
    expect(result.endReason).toBe('max-pages');
    expect(result.pagesFetched).toBe(3);
    expect(result.results.map((r) => r.page)).toEqual([1, 2, 3]);
  });

  test('should end with result-cap when the cap is reached before maxPages', async () => {
    extractor.extractFromHtml
      .mockReturnValueOnce(extraction([item('https://a.example/1', 1), item('https://a.example/2', 1)], true))
      .mockReturnValueOnce(extraction([item('https://a.example/3', 2), item('https://a.example/4', 2)], true));

    const result = await engine.run(
      createSearchAttempt({ ...params, resultsPerPage: 2, maxPages: 2 }, 1),
      page as unknown as Page
    );

    expect(result.endReason).toBe('result-cap');
    expect(result.pagesFetched).toBe(2);
    expect(result.results).toHaveLength(4);
  });

  test('should not add a url twice across pages', async () => {
    extractor.extractFromHtml
      .mockReturnValueOnce(extraction([item('https://a.example/1', 1)], true))
      .mockReturnValueOnce(extraction([item('https://a.example/1', 2), item('https://a.example/2', 2)], false));

    const result = await engine.run(createSearchAttempt(params, 1), page as unknown as Page);

    expect(result.results.map((r) => r.url)).toEqual(['https://a.example/1', 'https://a.example/2']);
    expect(result.seenUrls.size).toBe(2);
  });

  test('should pass per-page options to the extractor', async () => {
    extractor.extractFromHtml.mockReturnValueOnce(extraction([], false));
    const attempt = createSearchAttempt(params, 1);

    await engine.run(attempt, page as unknown as Page);

    expect(extractor.extractFromHtml).toHaveBeenCalledWith('<html>page</html>', {
      maxResults: 2,
      pageNumber: 1,
      seenUrls: attempt.seenUrls,
    });
  });

  test('should keep earlier results and record the block when a later page is blocked', async () => {
    const blockedHtml = `<html>${'x'.repeat(1500)}</html>`;
    navigator.goto
      .mockImplementationOnce((_page: Page, url: string) => Promise.resolve(loaded(url)))
      .mockImplementationOnce((_page: Page, url: string) =>
        Promise.resolve({
          kind: 'blocked',
          url,
          finalUrl: 'https://www.google.com/sorry/index',
          html: blockedHtml,
          status: 429,
          marker: '/sorry/',
          screenshotBase64: 'YmxvY2s=',
        })
      );
    extractor.extractFromHtml.mockReturnValueOnce(extraction([item('https://a.example/1', 1)], true));

    const result = await engine.run(createSearchAttempt(params, 1), page as unknown as Page);

    expect(result.endReason).toBe('blocked');
    expect(result.pagesFetched).toBe(1);
    expect(result.results).toHaveLength(1);
    expect(result.block).toEqual({
      marker: '/sorry/',
      page: 2,
      url: 'https://www.google.com/sorry/index',
      htmlSnippet: blockedHtml.slice(0, 1000),
      screenshotBase64: 'YmxvY2s=',
    });
    expect(extractor.extractFromHtml).toHaveBeenCalledTimes(1);
  });

  test('should scale the page delay with the attempt number', async () => {
    extractor.extractFromHtml
      .mockReturnValueOnce(extraction([item('https://a.example/1', 1)], true))
      .mockReturnValueOnce(extraction([item('https://a.example/2', 2)], false));

    await engine.run(createSearchAttempt({ ...params, sleepInterval: 1.5 }, 2), page as unknown as Page);

    expect(delay).toHaveBeenCalledWith(3000, undefined);
  });

  test('should keep going when the first-page screenshot fails', async () => {
    page.screenshot.mockRejectedValue(new Error('capture failed'));
    extractor.extractFromHtml.mockReturnValueOnce(extraction([item('https://a.example/1', 1)], false));

    const result = await engine.run(createSearchAttempt(params, 1), page as unknown as Page);

    expect(result.screenshotBase64).toBeUndefined();
    expect(result.results).toHaveLength(1);
  });

  test('should refuse to fetch when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    const error = await engine
      .run(createSearchAttempt(params, 1), page as unknown as Page, controller.signal)
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ScraperError);
    if (error instanceof ScraperError) {
      expect(error.code).toBe(ErrorCode.SEARCH_ABORTED);
    }
    expect(navigator.goto).not.toHaveBeenCalled();
  });
});
