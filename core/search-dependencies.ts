/**
 * 搜索依赖组装
 * 将配置转换为各组件实例，便于测试时替换
 */

import type { ConfigManager } from '../utils/config-manager';
import { ContextFactory, resolveLocale } from './context-factory';
import { NavigationService } from './navigation-service';
import { PaginationEngine } from './pagination-engine';
import { ProxyPool } from './proxy-manager';
import { SlidingWindowLimiter } from './rate-window';
import { ResultExtractor } from './result-extractor';
import { SearchCoordinator } from './search-coordinator';
import { SearchService } from './search-service';
import { getSessionPool, type SessionPool } from './session-pool';

export interface SearchDependencies {
  sessionPool: SessionPool;
  proxyPool: ProxyPool;
  limiter: SlidingWindowLimiter;
  searchService: SearchService;
}

export interface SearchOverrides {
  sessionPool?: SessionPool;
  proxyPool?: ProxyPool;
}

/**
 * 创建默认依赖
 */
export function createSearchDependencies(
  configManager: ConfigManager,
  overrides: SearchOverrides = {}
): SearchDependencies {
  const browserConfig = configManager.getBrowserConfig();
  const searchConfig = configManager.getSearchConfig();
  const proxyConfig = configManager.getProxyConfig();
  const rateLimitConfig = configManager.getRateLimitConfig();

  const sessionPool =
    overrides.sessionPool ??
    getSessionPool({
      headless: browserConfig.headless,
      noSandbox: browserConfig.noSandbox,
      executablePath: browserConfig.executablePath,
    });

  // 代理可选：未配置时为空池
  const proxyPool =
    overrides.proxyPool ?? (proxyConfig.enabled ? ProxyPool.fromConfig(proxyConfig) : new ProxyPool());

  const contextFactory = new ContextFactory({
    sessionPool,
    proxyPool,
    defaultLocale: resolveLocale(searchConfig.defaultLang),
    defaultTimezone: searchConfig.defaultTimezone,
  });

  const engine = new PaginationEngine({
    navigator: new NavigationService({ timeoutMs: browserConfig.navigationTimeout }),
    extractor: new ResultExtractor(),
  });

  const coordinator = new SearchCoordinator({ contextProvider: contextFactory, engine, proxyPool });

  return {
    sessionPool,
    proxyPool,
    limiter: new SlidingWindowLimiter({
      maxRequests: rateLimitConfig.maxRequests,
      windowMs: rateLimitConfig.windowMs,
      cooldownMs: rateLimitConfig.cooldownSeconds * 1000,
    }),
    searchService: new SearchService({
      coordinator,
      config: searchConfig,
      stealthDefault: browserConfig.stealth,
      proxyDefault: proxyConfig.enabled,
    }),
  };
}
