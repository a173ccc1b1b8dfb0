/**
 * Search API Routes - Hono
 *
 * GET/POST /google 参数相同；POST 可用 JSON body 覆盖查询参数
 */

import { type Context, Hono } from 'hono';
import { ErrorCode, ScraperError } from '../core/errors';
import type { SlidingWindowLimiter } from '../core/rate-window';
import type { SearchOutcome, SearchService } from '../core/search-service';
import { API_TOKEN_HEADER } from '../middleware/api-key';
import { createEnhancedLogger, toError } from '../utils/logger';
import { errorResponse, successResponse } from '../utils/responses';

const logger = createEnhancedLogger('SearchAPI');

export interface SearchRoutesOptions {
  searchService: Pick<SearchService, 'search'>;
  limiter: Pick<SlidingWindowLimiter, 'check'>;
}

type ErrorStatus = 400 | 429 | 500 | 502 | 504;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function clientIdOf(c: Context): string {
  return (
    c.req.header(API_TOKEN_HEADER)?.trim() ||
    c.req.query('api_token')?.trim() ||
    c.req.header('x-forwarded-for')?.split(',')[0].trim() ||
    'anonymous'
  );
}

async function readInput(c: Context): Promise<Record<string, unknown>> {
  const input: Record<string, unknown> = { ...c.req.query() };
  if (c.req.method !== 'POST' || !c.req.header('content-type')?.includes('application/json')) {
    return input;
  }

  let body: unknown;
  try {
    body = await c.req.json();
  } catch (error) {
    throw new ScraperError(ErrorCode.VALIDATION_ERROR, 'Request body is not valid JSON', {
      statusCode: 400,
      originalError: toError(error),
    });
  }
  return isRecord(body) ? { ...input, ...body } : input;
}

function toResponseData(outcome: SearchOutcome) {
  const { bundle } = outcome;
  const debugInfo =
    bundle.screenshotBase64 !== undefined || bundle.htmlSnippet !== undefined
      ? { screenshot: bundle.screenshotBase64, htmlSnippet: bundle.htmlSnippet }
      : undefined;

  return {
    query: bundle.query,
    results: bundle.results,
    stats: bundle.statsText,
    pagesFetched: bundle.pagesFetched,
    blocked: outcome.blocked,
    ...(debugInfo ? { debugInfo } : {}),
  };
}

/**
 * 错误码到 HTTP 状态的映射
 */
export function mapSearchError(error: unknown): { status: ErrorStatus; code: string; message: string } {
  if (error instanceof ScraperError) {
    switch (error.code) {
      case ErrorCode.VALIDATION_ERROR:
        return { status: 400, code: 'VALIDATION_ERROR', message: error.message };
      case ErrorCode.RATE_LIMIT_EXCEEDED:
        return { status: 429, code: 'RATE_LIMIT_EXCEEDED', message: error.message };
      case ErrorCode.TIMEOUT:
        return { status: 504, code: 'SEARCH_TIMEOUT', message: error.message };
      case ErrorCode.CONFIG_ERROR:
      case ErrorCode.INTERNAL_ERROR:
        return { status: 500, code: 'INTERNAL_ERROR', message: error.message };
      default:
        return { status: 502, code: 'SEARCH_ERROR', message: error.message };
    }
  }
  return { status: 502, code: 'SEARCH_ERROR', message: toError(error).message };
}

export function createSearchRoutes(options: SearchRoutesOptions): Hono {
  const routes = new Hono();

  const handle = async (c: Context) => {
    const decision = options.limiter.check(clientIdOf(c));
    if (!decision.allowed) {
      const retryAfterSeconds = Math.ceil(decision.retryAfterMs / 1000);
      c.header('Retry-After', String(retryAfterSeconds));
      return c.json(
        errorResponse('RATE_LIMIT_EXCEEDED', `Too many requests, retry in ${retryAfterSeconds}s`, {
          retryAfterSeconds,
          reason: decision.reason,
        }),
        429
      );
    }

    try {
      const input = await readInput(c);
      const outcome = await options.searchService.search(input, { signal: c.req.raw.signal });
      const data = toResponseData(outcome);
      const prefix = outcome.blocked ? 'Search blocked' : 'Search completed';
      const message = `${prefix}: ${data.query} (${data.results.length} results from ${data.pagesFetched} pages)`;

      return c.json(
        successResponse(data, message, { attempts: outcome.attempts, elapsedMs: outcome.elapsedMs }),
        200
      );
    } catch (error) {
      const mapped = mapSearchError(error);
      if (mapped.status >= 500) {
        logger.error('Search request failed', toError(error), { code: mapped.code });
      } else {
        logger.warn('Search request rejected', { code: mapped.code, message: mapped.message });
      }
      const details =
        error instanceof ScraperError && Object.keys(error.context).length > 0 ? error.context : undefined;
      return c.json(errorResponse(mapped.code, mapped.message, details), mapped.status);
    }
  };

  routes.get('/google', handle);
  routes.post('/google', handle);

  return routes;
}
