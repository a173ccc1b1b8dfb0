/**
 * NavigationService - 页面导航与拦截检测
 */

import { type Page, TimeoutError } from 'puppeteer-core';
import {
  BLOCK_MARKERS,
  BLOCK_URL_MARKERS,
  type BlockMarker,
  DEFAULT_NAVIGATION_TIMEOUT,
  NAVIGATION_WAIT_POLICIES,
  type WaitPolicy,
} from '../config/constants';
import { createEnhancedLogger, toError } from '../utils/logger';
import { sleep } from '../utils/retry';
import { NavigationTimeout, ScraperErrors } from './errors';
import { HumanBehavior } from './human-behavior';

export type NavigationOutcome =
  | { kind: 'loaded'; url: string; finalUrl: string; html: string; status: number | null }
  | {
      kind: 'blocked';
      url: string;
      finalUrl: string;
      html: string;
      status: number | null;
      marker: string;
      screenshotBase64?: string;
    };

export interface NavigationServiceOptions {
  timeoutMs?: number;
  humanize?: boolean;
  humanBehavior?: HumanBehavior;
  blockMarkers?: readonly BlockMarker[];
  delay?: (ms: number) => Promise<void>;
}

export interface GotoOptions {
  /** 加载后的等待时间 */
  settleMs?: number;
  humanize?: boolean;
}

/**
 * 页面导航接口，翻页引擎只依赖它
 */
export interface PageNavigator {
  goto(page: Page, url: string, waitPolicy?: WaitPolicy, options?: GotoOptions): Promise<NavigationOutcome>;
}

/**
 * 在 HTML 和最终 URL 中查找拦截标记，返回命中的标记
 */
export function detectBlockMarker(
  html: string,
  finalUrl: string,
  markers: readonly BlockMarker[] = BLOCK_MARKERS
): string | null {
  for (const marker of BLOCK_URL_MARKERS) {
    if (finalUrl.includes(marker)) {
      return marker;
    }
  }

  const lowerHtml = html.toLowerCase();
  for (const marker of markers) {
    const found = marker.caseSensitive
      ? html.includes(marker.text)
      : lowerHtml.includes(marker.text.toLowerCase());
    if (found) {
      return marker.text;
    }
  }
  return null;
}

export class NavigationService implements PageNavigator {
  private readonly timeoutMs: number;
  private readonly humanize: boolean;
  private readonly humanBehavior: HumanBehavior;
  private readonly blockMarkers: readonly BlockMarker[];
  private readonly delay: (ms: number) => Promise<void>;
  private readonly logger = createEnhancedLogger('NavigationService');

  constructor(options: NavigationServiceOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_NAVIGATION_TIMEOUT;
    this.humanize = options.humanize ?? true;
    this.humanBehavior = options.humanBehavior ?? new HumanBehavior({ delay: options.delay });
    this.blockMarkers = options.blockMarkers ?? BLOCK_MARKERS;
    this.delay = options.delay ?? sleep;
  }

  async goto(
    page: Page,
    url: string,
    waitPolicy: WaitPolicy = 'minimal',
    options: GotoOptions = {}
  ): Promise<NavigationOutcome> {
    const waitUntil = NAVIGATION_WAIT_POLICIES[waitPolicy];
    this.logger.debug('Navigating', { url, waitUntil });

    let status: number | null = null;
    try {
      const response = await page.goto(url, { waitUntil, timeout: this.timeoutMs });
      status = response ? response.status() : null;
    } catch (error) {
      if (error instanceof TimeoutError) {
        this.logger.warn('Navigation timed out', { url, timeoutMs: this.timeoutMs });
        throw new NavigationTimeout(url, this.timeoutMs, error);
      }
      throw ScraperErrors.navigationFailed(url, toError(error));
    }

    if (options.settleMs && options.settleMs > 0) {
      await this.delay(options.settleMs);
    }

    if (options.humanize ?? this.humanize) {
      await this.simulateHuman(page);
    }

    const html = await page.content();
    const finalUrl = page.url();
    const marker = detectBlockMarker(html, finalUrl, this.blockMarkers);

    if (marker) {
      this.logger.warn('Block marker detected', { url, finalUrl, marker });
      const screenshotBase64 = await this.captureFullPage(page);
      return { kind: 'blocked', url, finalUrl, html, status, marker, screenshotBase64 };
    }

    return { kind: 'loaded', url, finalUrl, html, status };
  }

  private async simulateHuman(page: Page): Promise<void> {
    const viewport = page.viewport() ?? { width: 1366, height: 768 };
    try {
      await this.humanBehavior.browse(page, viewport);
    } catch (error) {
      // 模拟失败不影响本页
      this.logger.debug('Human simulation failed', { error: toError(error).message });
    }
  }

  /**
   * 整页截图失败时退回视口截图，两者都失败才返回 undefined
   */
  private async captureFullPage(page: Page): Promise<string | undefined> {
    try {
      return await page.screenshot({ fullPage: true, encoding: 'base64' });
    } catch (error) {
      this.logger.debug('Full-page screenshot failed', { error: toError(error).message });
    }
    try {
      return await page.screenshot({ encoding: 'base64' });
    } catch (error) {
      this.logger.warn('Viewport screenshot failed', { error: toError(error).message });
      return undefined;
    }
  }
}
