/**
 * 一次完整搜索尝试的数据结构与结果打包
 */

import {
  BLOCK_SENTINEL,
  BLOCKED_HTML_LENGTH,
  EMPTY_RESULT_HTML_LENGTH,
  RESULTS_PER_ENGINE_PAGE,
  SEARCH_BASE_URL,
} from '../config/constants';
import type { ResultItem } from './result-extractor';

export interface SearchParams {
  query: string;
  /** 例如 'it' 或 'en-US' */
  lang: string;
  resultsPerPage: number;
  maxPages: number;
  /** 秒 */
  sleepInterval: number;
  useStealth: boolean;
  useProxy: boolean;
  timezone?: string;
  humanize?: boolean;
}

export interface BlockInfo {
  marker: string;
  /** 被拦截的页码，1 起始 */
  page: number;
  url: string;
  htmlSnippet: string;
  screenshotBase64?: string;
}

export type EndReason = 'blocked' | 'no-next-page' | 'result-cap' | 'max-pages';

export interface SearchAttempt {
  params: SearchParams;
  /** 1 起始 */
  attemptNumber: number;
  pagesFetched: number;
  results: ResultItem[];
  seenUrls: Set<string>;
  statsText: string;
  block: BlockInfo | null;
  screenshotBase64?: string;
  lastHtml: string;
  endReason?: EndReason;
}

export interface SearchResultBundle {
  query: string;
  results: ResultItem[];
  statsText: string;
  pagesFetched: number;
  screenshotBase64?: string;
  htmlSnippet?: string;
}

export function createSearchAttempt(params: SearchParams, attemptNumber: number): SearchAttempt {
  return {
    params,
    attemptNumber,
    pagesFetched: 0,
    results: [],
    seenUrls: new Set(),
    statsText: '',
    block: null,
    lastHtml: '',
  };
}

/**
 * 构造结果页 URL，pageIndex 从 0 开始
 */
export function buildSearchUrl(query: string, lang: string, pageIndex: number): string {
  const params = new URLSearchParams({
    q: query,
    hl: lang,
    pws: '0',
    gl: lang.split('-')[0],
  });
  if (pageIndex > 0) {
    params.set('start', String(pageIndex * RESULTS_PER_ENGINE_PAGE));
  }
  return `${SEARCH_BASE_URL}?${params.toString()}`;
}

export function isBlockSignal(bundle: Pick<SearchResultBundle, 'statsText'>): boolean {
  return bundle.statsText.startsWith(BLOCK_SENTINEL);
}

/**
 * 打包对外结果。被拦截时 statsText 以哨兵开头并附带截图和 HTML 片段
 */
export function toResultBundle(
  attempt: SearchAttempt,
  options: { includeScreenshot?: boolean } = {}
): SearchResultBundle {
  const base = {
    query: attempt.params.query,
    results: attempt.results,
    pagesFetched: attempt.pagesFetched,
  };

  if (attempt.block) {
    return {
      ...base,
      statsText: `${BLOCK_SENTINEL} ${attempt.block.marker}`,
      screenshotBase64: attempt.block.screenshotBase64,
      htmlSnippet: attempt.block.htmlSnippet,
    };
  }

  return {
    ...base,
    statsText: attempt.statsText,
    screenshotBase64: options.includeScreenshot ? attempt.screenshotBase64 : undefined,
    htmlSnippet:
      attempt.results.length === 0 ? attempt.lastHtml.slice(0, EMPTY_RESULT_HTML_LENGTH) : undefined,
  };
}

export function blockSnippet(html: string): string {
  return html.slice(0, BLOCKED_HTML_LENGTH);
}
