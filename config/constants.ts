/**
 * Application Constants
 *
 * This file contains ONLY truly immutable constants:
 * - Search engine endpoints and selector chains
 * - Block markers
 * - Browser configuration (args, fingerprint pools)
 *
 * For configurable values (timeouts, delays, limits), see:
 * - core/env.ts
 * - utils/config-manager.ts (ConfigManager)
 */

// ==================== 浏览器配置 ====================

/**
 * Puppeteer 浏览器启动参数
 * `--no-sandbox` 只在配置允许时追加，见 SANDBOX_ARGS
 */
export const BROWSER_ARGS = [
  '--disable-dev-shm-usage',
  '--disable-accelerated-2d-canvas',
  '--disable-gpu',
  '--disable-blink-features=AutomationControlled',
  '--disable-infobars',
  '--lang=en-US',
] as const;

export const SANDBOX_ARGS = ['--no-sandbox', '--disable-setuid-sandbox'] as const;

/**
 * Puppeteer 默认会加上的参数里需要去掉的部分
 */
export const IGNORED_DEFAULT_ARGS = ['--enable-automation'] as const;

/**
 * 关闭 stealth 时使用的固定视口
 */
export const BROWSER_VIEWPORT = {
  width: 1366,
  height: 768,
} as const;

/**
 * 浏览器 User Agent (默认)
 */
export const BROWSER_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

/**
 * User-Agent 池用于指纹随机化
 */
export const USER_AGENT_POOL = [
  // Chrome on Windows
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36',
  // Chrome on macOS
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  // Edge on Windows
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36 Edg/120.0.0.0',
  // Safari on macOS
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.1 Safari/605.1.15',
  // Chrome on Linux
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
] as const;

/**
 * Viewport 池用于指纹随机化
 */
export const VIEWPORT_POOL = [
  { width: 1366, height: 768 },   // 笔记本常见
  { width: 1920, height: 1080 },  // 1080p
  { width: 1440, height: 900 },   // MacBook Air
  { width: 1536, height: 864 },   // 低端笔记本
] as const;

export const COLOR_SCHEMES = ['light', 'dark', 'no-preference'] as const;

export type ColorScheme = (typeof COLOR_SCHEMES)[number];

/**
 * 需要屏蔽的资源类型（Puppeteer resourceType）
 */
export const BLOCKED_RESOURCE_TYPES = ['image', 'media', 'font', 'stylesheet'] as const;

// ==================== 搜索引擎 ====================

export const SEARCH_ENGINE_ORIGIN = 'https://www.google.com';

export const SEARCH_BASE_URL = `${SEARCH_ENGINE_ORIGIN}/search`;

export const RESULTS_PER_ENGINE_PAGE = 10;

/**
 * 单页结果数和最大页数的硬上限
 */
export const MAX_RESULTS_PER_PAGE = 20;
export const MAX_PAGES = 10;

/**
 * 跳过同意弹窗的 cookie
 */
export const CONSENT_COOKIE = {
  name: 'CONSENT',
  value: 'YES+cb.20210328-17-p0.en+FX+410',
  domain: '.google.com',
  path: '/',
} as const;

// ==================== 拦截检测 ====================

export interface BlockMarker {
  text: string;
  caseSensitive: boolean;
}

/**
 * HTML 中出现即视为被拦截
 */
export const BLOCK_MARKERS: readonly BlockMarker[] = [
  { text: 'detected unusual traffic', caseSensitive: false },
  { text: 'unusual traffic from your computer network', caseSensitive: false },
  { text: 'violazione dei Termini di servizio', caseSensitive: true },
  { text: 'solving the above CAPTCHA', caseSensitive: false },
  { text: 'id="captcha-form"', caseSensitive: true },
];

/**
 * 最终 URL 落在这些路径上同样视为被拦截
 */
export const BLOCK_URL_MARKERS = ['/sorry/', 'google.com/sorry'] as const;

/**
 * 被拦截时 statsText 的前缀
 */
export const BLOCK_SENTINEL = '[BLOCKED]';

export const BLOCKED_HTML_LENGTH = 1000;
export const EMPTY_RESULT_HTML_LENGTH = 500;

// ==================== 结果选择器 ====================

/**
 * 结果容器选择器，按优先级排列
 */
export const RESULT_CONTAINER_SELECTORS = [
  'div.g',
  'div.MjjYud',
  "div[data-snf='x']",
  'div.v7W49e',
  'div.Gx5Zad',
  "div[data-sotr='r']",
  'div.tF2Cxc',
  'div.yuRUbf',
  'div[jscontroller]',
] as const;

export const TITLE_SELECTORS = ['h3', 'a h3', 'div h3', 'h3.LC20lb'] as const;

export const LINK_SELECTORS = ['a[href]', 'a[ping]', 'h3 a', 'div > a', 'a.cz88Hc'] as const;

export const DESCRIPTION_SELECTORS = [
  'div.VwiC3b',
  "div[data-sncf='1']",
  "div[role='link'] div",
  'div.yi8zzc',
] as const;

export const STATS_SELECTORS = ['div#result-stats', "div[aria-level='3']", '#result-stats'] as const;

export const NEXT_PAGE_SELECTORS = [
  'a#pnnext',
  "a[aria-label='Pagina successiva']",
  "a[aria-label='Page suivante']",
  "a[aria-label='Next page']",
  "a[aria-label='Next']",
  'a.nBDE1b.G5eFlf',
] as const;

/**
 * 兜底提取：只看外链
 */
export const FALLBACK_LINK_SELECTOR = "a[href^='http']";

export const EXCLUDED_LINK_HOSTS = ['google.com'] as const;

export const EXCLUDED_LINK_PREFIXES = [
  'https://accounts.',
  'https://support.',
  'https://maps.',
] as const;

// ==================== 导航 ====================

export const NAVIGATION_WAIT_POLICIES = {
  minimal: 'domcontentloaded',
  full: 'networkidle2',
} as const;

export type WaitPolicy = keyof typeof NAVIGATION_WAIT_POLICIES;

export const DEFAULT_NAVIGATION_TIMEOUT = 30000;
