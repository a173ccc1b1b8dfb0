/**
 * 浏览器上下文工厂
 * 每次调用生成一组随机指纹，并在上下文的每个页面上应用
 */

import type { BrowserContext, HTTPRequest, Page } from 'puppeteer-core';
import {
  BLOCKED_RESOURCE_TYPES,
  BROWSER_USER_AGENT,
  BROWSER_VIEWPORT,
  COLOR_SCHEMES,
  CONSENT_COOKIE,
  type ColorScheme,
  USER_AGENT_POOL,
  VIEWPORT_POOL,
} from '../config/constants';
import { createEnhancedLogger, toError } from '../utils/logger';
import { ContextCreationError } from './errors';
import type { ProxyPool, ProxyRecord } from './proxy-manager';
import type { Session } from './session-pool';
import { buildStealthScript, DEFAULT_PROMPT_PERMISSIONS, languagesForLocale } from './stealth-script';

const logger = createEnhancedLogger('ContextFactory');

export interface ContextOptions {
  locale?: string;
  timezone?: string;
  useProxy?: boolean;
  useStealth?: boolean;
}

export interface ContextFingerprint {
  userAgent: string;
  viewport: { width: number; height: number };
  deviceScaleFactor: number;
  hasTouch: boolean;
  colorScheme: ColorScheme;
  locale: string;
  timezone: string;
  languages: string[];
}

/**
 * 一次搜索尝试使用的隔离浏览上下文
 */
export interface SearchContext {
  readonly id: number;
  readonly fingerprint: ContextFingerprint;
  readonly proxy: ProxyRecord | null;
  newPage(): Promise<Page>;
  close(): Promise<void>;
  isClosed(): boolean;
}

export interface ContextProvider {
  newContext(options: ContextOptions): Promise<SearchContext>;
}

export interface SessionSource {
  acquireSession(): Promise<Session>;
}

export interface ContextFactoryOptions {
  sessionPool: SessionSource;
  proxyPool?: ProxyPool;
  defaultLocale?: string;
  defaultTimezone?: string;
  blockResources?: boolean;
  random?: () => number;
}

const LOCALE_REGIONS: Record<string, string> = {
  en: 'en-US',
  it: 'it-IT',
  fr: 'fr-FR',
  de: 'de-DE',
  es: 'es-ES',
  pt: 'pt-PT',
  ja: 'ja-JP',
};

/**
 * 'it' -> 'it-IT'，已带区域的直接返回
 */
export function resolveLocale(lang: string): string {
  if (lang.includes('-')) {
    return lang;
  }
  const lower = lang.toLowerCase();
  return LOCALE_REGIONS[lower] ?? `${lower}-${lower.toUpperCase()}`;
}

export function acceptLanguageHeader(languages: string[]): string {
  return languages
    .map((language, index) => (index === 0 ? language : `${language};q=${(1 - index * 0.1).toFixed(1)}`))
    .join(',');
}

function pick<T>(pool: readonly T[], random: () => number): T {
  return pool[Math.min(pool.length - 1, Math.floor(random() * pool.length))];
}

/**
 * 生成随机指纹
 */
export function generateFingerprint(
  locale: string,
  timezone: string,
  random: () => number = Math.random
): ContextFingerprint {
  const viewport = pick(VIEWPORT_POOL, random);
  return {
    userAgent: pick(USER_AGENT_POOL, random),
    viewport: { width: viewport.width, height: viewport.height },
    colorScheme: pick(COLOR_SCHEMES, random),
    deviceScaleFactor: random() > 0.7 ? 2 : 1,
    hasTouch: random() > 0.8,
    locale,
    timezone,
    languages: languagesForLocale(locale),
  };
}

/**
 * 关闭 stealth 时使用的固定指纹
 */
export function defaultFingerprint(locale: string, timezone: string): ContextFingerprint {
  return {
    userAgent: BROWSER_USER_AGENT,
    viewport: { width: BROWSER_VIEWPORT.width, height: BROWSER_VIEWPORT.height },
    colorScheme: 'light',
    deviceScaleFactor: 1,
    hasTouch: false,
    locale,
    timezone,
    languages: languagesForLocale(locale),
  };
}

interface PageSetup {
  fingerprint: ContextFingerprint;
  proxy: ProxyRecord | null;
  stealthScript: string | null;
  blockResources: boolean;
}

async function setupPage(page: Page, setup: PageSetup): Promise<void> {
  const { fingerprint, proxy } = setup;

  if (proxy?.username) {
    await page.authenticate({ username: proxy.username, password: proxy.password ?? '' });
  }

  if (setup.stealthScript) {
    await page.evaluateOnNewDocument(setup.stealthScript);
  }

  await page.setUserAgent(fingerprint.userAgent);
  await page.setViewport({
    width: fingerprint.viewport.width,
    height: fingerprint.viewport.height,
    deviceScaleFactor: fingerprint.deviceScaleFactor,
    hasTouch: fingerprint.hasTouch,
    isMobile: false,
  });
  await page.emulateTimezone(fingerprint.timezone);
  await page.emulateMediaFeatures([{ name: 'prefers-color-scheme', value: fingerprint.colorScheme }]);
  await page.setExtraHTTPHeaders({ 'Accept-Language': acceptLanguageHeader(fingerprint.languages) });
  await page.setCookie({ ...CONSENT_COOKIE });

  if (setup.blockResources) {
    const blocked: readonly string[] = BLOCKED_RESOURCE_TYPES;
    await page.setRequestInterception(true);
    page.on('request', (req: HTTPRequest) => {
      if (req.isInterceptResolutionHandled()) {
        return;
      }
      const action = blocked.includes(req.resourceType()) ? req.abort() : req.continue();
      action.catch((error: unknown) => {
        logger.debug('Request interception failed', { url: req.url(), error: toError(error).message });
      });
    });
  }
}

class BrowserSearchContext implements SearchContext {
  private closed = false;

  constructor(
    readonly id: number,
    private readonly context: BrowserContext,
    readonly fingerprint: ContextFingerprint,
    readonly proxy: ProxyRecord | null,
    private readonly stealthScript: string | null,
    private readonly blockResources: boolean
  ) {}

  async newPage(): Promise<Page> {
    const page = await this.context.newPage();
    await setupPage(page, {
      fingerprint: this.fingerprint,
      proxy: this.proxy,
      stealthScript: this.stealthScript,
      blockResources: this.blockResources,
    });
    return page;
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    try {
      await this.context.close();
      logger.debug('Context closed', { contextId: this.id });
    } catch (error) {
      // 浏览器已断开时 close 会失败，上下文本身已不存在
      logger.warn('Context close failed', { contextId: this.id, error: toError(error).message });
    }
  }

  isClosed(): boolean {
    return this.closed;
  }
}

export class ContextFactory implements ContextProvider {
  private readonly sessionPool: SessionSource;
  private readonly proxyPool?: ProxyPool;
  private readonly defaultLocale: string;
  private readonly defaultTimezone: string;
  private readonly blockResources: boolean;
  private readonly random: () => number;
  private nextId = 1;

  constructor(options: ContextFactoryOptions) {
    this.sessionPool = options.sessionPool;
    this.proxyPool = options.proxyPool;
    this.defaultLocale = options.defaultLocale ?? 'it-IT';
    this.defaultTimezone = options.defaultTimezone ?? 'Europe/Rome';
    this.blockResources = options.blockResources !== false;
    this.random = options.random ?? Math.random;
  }

  async newContext(options: ContextOptions = {}): Promise<SearchContext> {
    const locale = options.locale ?? this.defaultLocale;
    const timezone = options.timezone ?? this.defaultTimezone;
    const useStealth = options.useStealth !== false;

    // SessionInitError 原样向上抛
    const session = await this.sessionPool.acquireSession();

    const proxy = options.useProxy ? this.proxyPool?.next() ?? null : null;
    if (options.useProxy && !proxy) {
      logger.warn('Proxy requested but the proxy pool is empty, continuing without proxy');
    }

    const fingerprint = useStealth
      ? generateFingerprint(locale, timezone, this.random)
      : defaultFingerprint(locale, timezone);

    let context: BrowserContext;
    try {
      context = await session.browser.createBrowserContext(proxy ? { proxyServer: proxy.server } : {});
    } catch (error) {
      const cause = toError(error);
      throw new ContextCreationError(`Failed to create browser context: ${cause.message}`, cause, {
        proxy: proxy?.server,
      });
    }

    const id = this.nextId++;
    const stealthScript = useStealth
      ? buildStealthScript({
          languages: fingerprint.languages,
          canvasNoise: 1,
          permissionsAsPrompt: DEFAULT_PROMPT_PERMISSIONS,
        })
      : null;

    logger.debug('Context created', {
      contextId: id,
      viewport: `${fingerprint.viewport.width}x${fingerprint.viewport.height}`,
      colorScheme: fingerprint.colorScheme,
      proxy: proxy?.server,
      stealth: useStealth,
    });

    return new BrowserSearchContext(id, context, fingerprint, proxy, stealthScript, this.blockResources);
  }
}

/**
 * 作用域内使用上下文，任何退出路径都会关闭
 */
export async function withContext<T>(
  provider: ContextProvider,
  options: ContextOptions,
  body: (context: SearchContext) => Promise<T>
): Promise<T> {
  const context = await provider.newContext(options);
  try {
    return await body(context);
  } finally {
    await context.close();
  }
}
