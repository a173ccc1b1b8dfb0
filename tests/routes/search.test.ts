/**
 * Search 路由单元测试
 */

import { Hono } from 'hono';
import { beforeEach, describe, expect, test, vi } from 'vitest';
import { ErrorCode, ScraperError, ScraperErrors, SearchExhausted } from '../../core/errors';
import { type RateDecision, SlidingWindowLimiter } from '../../core/rate-window';
import type { SearchOutcome } from '../../core/search-service';
import { createSearchRoutes, mapSearchError } from '../../routes/search';

function outcome(overrides: Partial<SearchOutcome> = {}): SearchOutcome {
  return {
    bundle: {
      query: 'pizza',
      results: [{ title: 'Pizzeria', url: 'https://pizza.example/', description: 'Forno a legna', page: 1 }],
      statsText: 'About 10 results',
      pagesFetched: 1,
      screenshotBase64: undefined,
      htmlSnippet: undefined,
    },
    blocked: false,
    attempts: 1,
    elapsedMs: 1200,
    ...overrides,
  };
}

describe('search routes', () => {
  let search: ReturnType<typeof vi.fn>;
  let check: ReturnType<typeof vi.fn>;
  let app: Hono;

  beforeEach(() => {
    search = vi.fn().mockResolvedValue(outcome());
    check = vi.fn((): RateDecision => ({ allowed: true, retryAfterMs: 0 }));
    app = new Hono();
    app.route('/api/search', createSearchRoutes({ searchService: { search }, limiter: { check } }));
  });

  test('GET should return the success envelope', async () => {
    const res = await app.request('/api/search/google?query=pizza&maxPages=2');

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      success: true,
      message: 'Search completed: pizza (1 results from 1 pages)',
      data: {
        query: 'pizza',
        results: [{ title: 'Pizzeria', url: 'https://pizza.example/', description: 'Forno a legna', page: 1 }],
        stats: 'About 10 results',
        pagesFetched: 1,
        blocked: false,
      },
      meta: { attempts: 1, elapsedMs: 1200 },
    });
    expect(search).toHaveBeenCalledWith({ query: 'pizza', maxPages: '2' }, { signal: expect.any(AbortSignal) });
  });

  test('POST should merge the JSON body over the query string', async () => {
    await app.request('/api/search/google?lang=en&query=url', {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({ query: 'body', resultsPerPage: 10 }),
    });

    expect(search.mock.calls[0][0]).toEqual({ lang: 'en', query: 'body', resultsPerPage: 10 });
  });

  test('POST should reject a malformed JSON body', async () => {
    const res = await app.request('/api/search/google', {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: '{ broken',
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      success: false,
      error: { code: 'VALIDATION_ERROR', message: 'Request body is not valid JSON' },
    });
    expect(search).not.toHaveBeenCalled();
  });

  test('should report a blocked search with debug information', async () => {
    search.mockResolvedValueOnce(
      outcome({
        blocked: true,
        bundle: {
          query: 'pizza',
          results: [],
          statsText: '[BLOCKED] detected unusual traffic',
          pagesFetched: 1,
          screenshotBase64: 'YmxvY2s=',
          htmlSnippet: '<html>captcha</html>',
        },
      })
    );

    const res = await app.request('/api/search/google?query=pizza');
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body.message).toBe('Search blocked: pizza (0 results from 1 pages)');
    expect(body.data.blocked).toBe(true);
    expect(body.data.debugInfo).toEqual({ screenshot: 'YmxvY2s=', htmlSnippet: '<html>captcha</html>' });
  });

  test('should return 429 with Retry-After when the limiter rejects', async () => {
    check.mockReturnValueOnce({ allowed: false, retryAfterMs: 4200, reason: 'cooldown' });

    const res = await app.request('/api/search/google?query=pizza');

    expect(res.status).toBe(429);
    expect(res.headers.get('Retry-After')).toBe('5');
    expect(await res.json()).toEqual({
      success: false,
      error: {
        code: 'RATE_LIMIT_EXCEEDED',
        message: 'Too many requests, retry in 5s',
        details: { retryAfterSeconds: 5, reason: 'cooldown' },
      },
    });
    expect(search).not.toHaveBeenCalled();
  });

  test('should identify clients by token, forwarded address or anonymously', async () => {
    await app.request('/api/search/google?query=a', { headers: { 'x-api-token': 'test-secret' } });
    await app.request('/api/search/google?query=a&api_token=query-token', {
      headers: { 'x-forwarded-for': '203.0.113.9' },
    });
    await app.request('/api/search/google?query=a', { headers: { 'x-forwarded-for': '203.0.113.5, 10.0.0.1' } });
    await app.request('/api/search/google?query=a');

    expect(check.mock.calls.map((call) => call[0])).toEqual([
      'test-secret',
      'query-token',
      '203.0.113.5',
      'anonymous',
    ]);
  });

  test('a query token should be limited whatever forwarded address it sends', async () => {
    const limited = new Hono();
    const limiter = new SlidingWindowLimiter({ maxRequests: 2, windowMs: 60_000, cooldownMs: 60_000 });
    limited.route('/api/search', createSearchRoutes({ searchService: { search }, limiter }));

    const statuses: number[] = [];
    for (let i = 0; i < 4; i++) {
      const res = await limited.request('/api/search/google?query=pizza&api_token=test-secret', {
        headers: { 'x-forwarded-for': `10.0.0.${i}` },
      });
      statuses.push(res.status);
    }

    expect(statuses).toEqual([200, 200, 429, 429]);
    expect(search).toHaveBeenCalledTimes(2);
  });

  test('should map validation failures to 400 with details', async () => {
    search.mockRejectedValueOnce(ScraperErrors.validationFailed('maxPages must be at most 2', { maxPages: 3 }));

    const res = await app.request('/api/search/google?query=pizza&maxPages=3');

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      success: false,
      error: { code: 'VALIDATION_ERROR', message: 'maxPages must be at most 2', details: { maxPages: 3 } },
    });
  });

  test('should map a timeout to 504', async () => {
    search.mockRejectedValueOnce(ScraperErrors.TimeoutError('Search exceeded 90s', { query: 'pizza', timeoutMs: 90000 }));

    const res = await app.request('/api/search/google?query=pizza');

    expect(res.status).toBe(504);
    expect(await res.json()).toEqual({
      success: false,
      error: { code: 'SEARCH_TIMEOUT', message: 'Search exceeded 90s', details: { query: 'pizza', timeoutMs: 90000 } },
    });
  });

  test('should map exhausted retries to 502', async () => {
    search.mockRejectedValueOnce(new SearchExhausted('pizza', 3, new Error('Target closed')));

    const res = await app.request('/api/search/google?query=pizza');
    const body = await res.json();

    expect(res.status).toBe(502);
    expect(body.error).toEqual({
      code: 'SEARCH_ERROR',
      message: 'Search failed after 3 attempt(s): Target closed',
      details: { query: 'pizza', attempt: 3 },
    });
  });
});

describe('mapSearchError', () => {
  test('should map error codes to statuses', () => {
    expect(mapSearchError(ScraperErrors.invalidConfiguration('bad config'))).toEqual({
      status: 500,
      code: 'INTERNAL_ERROR',
      message: 'bad config',
    });
    expect(mapSearchError(new ScraperError(ErrorCode.RATE_LIMIT_EXCEEDED, 'slow down')).status).toBe(429);
    expect(mapSearchError(ScraperErrors.searchAborted('q')).status).toBe(502);
    expect(mapSearchError('string failure')).toEqual({ status: 502, code: 'SEARCH_ERROR', message: 'string failure' });
  });
});
