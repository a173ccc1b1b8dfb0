/**
 * ResultExtractor - 搜索结果提取
 *
 * 在页面 HTML 快照上运行：先按容器选择器链提取，
 * 没有任何容器命中时退回到通用外链扫描。
 */

import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import type { Page } from 'puppeteer-core';
import {
  DESCRIPTION_SELECTORS,
  EXCLUDED_LINK_HOSTS,
  EXCLUDED_LINK_PREFIXES,
  FALLBACK_LINK_SELECTOR,
  LINK_SELECTORS,
  NEXT_PAGE_SELECTORS,
  RESULT_CONTAINER_SELECTORS,
  SEARCH_ENGINE_ORIGIN,
  STATS_SELECTORS,
  TITLE_SELECTORS,
} from '../config/constants';
import { createEnhancedLogger, toError } from '../utils/logger';

const logger = createEnhancedLogger('ResultExtractor');

export interface ResultItem {
  title: string;
  url: string;
  description: string;
  /** 1 起始的页码 */
  page: number;
}

export type ExtractionStrategy = 'containers' | 'fallback';

export interface ExtractOptions {
  maxResults: number;
  pageNumber: number;
  /** 本次尝试中已收集的 URL */
  seenUrls?: ReadonlySet<string>;
}

export interface PageExtraction {
  items: ResultItem[];
  strategy: ExtractionStrategy;
  containerSelector?: string;
  hasNextPage: boolean;
  statsText: string | null;
}

/**
 * 纯函数探针：返回值或 null
 */
export type Probe<C, T> = (scope: C) => T | null | undefined;

/**
 * 依次运行探针，返回第一个非空结果；单个探针抛错视为未命中
 */
export function firstMatch<C, T>(probes: ReadonlyArray<Probe<C, T>>, scope: C): T | null {
  for (const probe of probes) {
    try {
      const value = probe(scope);
      if (value !== null && value !== undefined && value !== '') {
        return value;
      }
    } catch (error) {
      logger.debug('Probe failed', { error: toError(error).message });
    }
  }
  return null;
}

export function cleanText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * 规范化结果链接：解包 /url?q= 跳转，只接受 http(s) 绝对地址
 */
export function normalizeResultUrl(href: string | undefined): string | null {
  if (!href) {
    return null;
  }
  const trimmed = href.trim();

  if (trimmed.startsWith('/url?')) {
    const params = new URL(trimmed, SEARCH_ENGINE_ORIGIN).searchParams;
    const target = params.get('q') ?? params.get('url');
    return target && /^https?:\/\//i.test(target) ? target : null;
  }

  return /^https?:\/\//i.test(trimmed) ? trimmed : null;
}

/**
 * 兜底扫描时排除搜索引擎自身和账号/帮助/地图链接
 */
export function isExcludedLink(href: string): boolean {
  return (
    EXCLUDED_LINK_HOSTS.some((host) => href.includes(host)) ||
    EXCLUDED_LINK_PREFIXES.some((prefix) => href.startsWith(prefix))
  );
}

const textProbes: (selectors: readonly string[]) => Array<Probe<Cheerio<Element>, string>> = (
  selectors
) => selectors.map((selector) => (scope) => cleanText(scope.find(selector).first().text()));

const linkProbes: Array<Probe<Cheerio<Element>, string>> = LINK_SELECTORS.map(
  (selector) => (scope) => {
    // 第一个可用链接，跳过站内相对地址
    for (const element of scope.find(selector).toArray()) {
      const url = normalizeResultUrl(element.attribs.href);
      if (url) {
        return url;
      }
    }
    return null;
  }
);

const titleProbes = textProbes(TITLE_SELECTORS);
const descriptionProbes = textProbes(DESCRIPTION_SELECTORS);

export class ResultExtractor {
  /**
   * 从页面读取 HTML 后提取
   */
  async extract(page: Page, options: ExtractOptions): Promise<PageExtraction> {
    const html = await page.content();
    return this.extractFromHtml(html, options);
  }

  extractFromHtml(html: string, options: ExtractOptions): PageExtraction {
    const $ = cheerio.load(html);
    const found = this.findContainers($);

    let items: ResultItem[];
    let strategy: ExtractionStrategy;
    if (found) {
      strategy = 'containers';
      items = this.extractFromContainers($, found.containers, options);
    } else {
      strategy = 'fallback';
      logger.warn('No result containers matched, using generic link scan', { page: options.pageNumber });
      items = this.extractFallback($, options);
    }

    logger.debug('Page extracted', {
      page: options.pageNumber,
      strategy,
      selector: found?.selector,
      items: items.length,
    });

    return {
      items,
      strategy,
      containerSelector: found?.selector,
      hasNextPage: this.hasNextPage($),
      statsText: this.readStatsText($),
    };
  }

  /**
   * 第一个至少命中一个元素的容器选择器
   */
  findContainers($: CheerioAPI): { selector: string; containers: Element[] } | null {
    for (const selector of RESULT_CONTAINER_SELECTORS) {
      const containers = $(selector).toArray();
      if (containers.length > 0) {
        return { selector, containers };
      }
    }
    return null;
  }

  extractFromContainers($: CheerioAPI, containers: Element[], options: ExtractOptions): ResultItem[] {
    const items: ResultItem[] = [];
    const pageUrls = new Set<string>();

    for (const element of containers) {
      if (items.length >= options.maxResults) {
        break;
      }

      const scope = $(element);
      const url = firstMatch(linkProbes, scope);
      if (!url || options.seenUrls?.has(url) || pageUrls.has(url)) {
        continue;
      }

      pageUrls.add(url);
      items.push({
        title: firstMatch(titleProbes, scope) ?? '',
        url,
        description: firstMatch(descriptionProbes, scope) ?? '',
        page: options.pageNumber,
      });
    }

    return items;
  }

  /**
   * 通用外链扫描，只输出标题非空的条目
   */
  extractFallback($: CheerioAPI, options: ExtractOptions): ResultItem[] {
    const items: ResultItem[] = [];
    const pageUrls = new Set<string>();

    for (const element of $(FALLBACK_LINK_SELECTOR).toArray()) {
      if (items.length >= options.maxResults) {
        break;
      }

      const link = $(element);
      const href = link.attr('href')?.trim();
      if (!href || isExcludedLink(href) || options.seenUrls?.has(href) || pageUrls.has(href)) {
        continue;
      }

      const heading = link.find('h3').first();
      const title = cleanText(heading.length > 0 ? heading.text() : link.text());
      if (!title) {
        continue;
      }

      let description = '';
      try {
        const closest = link.closest('div');
        const surrounding = cleanText(closest.length > 0 ? closest.text() : link.parent().text());
        description = cleanText(surrounding.split(title).join(''));
      } catch (error) {
        logger.debug('Fallback description failed', { url: href, error: toError(error).message });
      }

      pageUrls.add(href);
      items.push({ title, url: href, description, page: options.pageNumber });
    }

    return items;
  }

  hasNextPage($: CheerioAPI): boolean {
    return NEXT_PAGE_SELECTORS.some((selector) => $(selector).length > 0);
  }

  readStatsText($: CheerioAPI): string | null {
    return firstMatch(
      STATS_SELECTORS.map((selector) => (doc: CheerioAPI) => cleanText(doc(selector).first().text())),
      $
    );
  }
}
