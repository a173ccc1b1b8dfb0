/**
 * ConfigManager
 *
 * 配置优先级：环境变量 > 配置文件 > 默认值
 * 默认值来自 core/env.ts 的 schema，配置文件为可选 JSON。
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { type Env, parseEnv } from '../core/env';
import { MAX_PAGES, MAX_RESULTS_PER_PAGE } from '../config/constants';
import { ScraperErrors } from '../core/errors';

const serverSchema = z.object({
  port: z.number().int().min(1).max(65535),
  host: z.string().min(1),
  apiToken: z.string().optional(),
});

const browserSchema = z.object({
  headless: z.boolean(),
  noSandbox: z.boolean(),
  executablePath: z.string().optional(),
  stealth: z.boolean(),
  navigationTimeout: z.number().int().positive(),
});

const searchSchema = z.object({
  defaultLang: z.string().min(2),
  defaultTimezone: z.string().min(1),
  maxResults: z.number().int().min(1).max(MAX_RESULTS_PER_PAGE),
  maxPages: z.number().int().min(1).max(MAX_PAGES),
  sleepInterval: z.number().nonnegative(),
  /** 每页的超时（秒），总超时 = timeoutSeconds * maxPages */
  timeoutSeconds: z.number().positive(),
});

const rateLimitSchema = z.object({
  maxRequests: z.number().int().positive(),
  windowMs: z.number().int().positive(),
  cooldownSeconds: z.number().nonnegative(),
});

const proxySchema = z.object({
  enabled: z.boolean(),
  list: z.string().optional(),
  file: z.string().optional(),
});

const loggingSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']),
});

const appConfigSchema = z.object({
  server: serverSchema,
  browser: browserSchema,
  search: searchSchema,
  rateLimit: rateLimitSchema,
  proxy: proxySchema,
  logging: loggingSchema,
});

const partialConfigSchema = z.object({
  server: serverSchema.partial().optional(),
  browser: browserSchema.partial().optional(),
  search: searchSchema.partial().optional(),
  rateLimit: rateLimitSchema.partial().optional(),
  proxy: proxySchema.partial().optional(),
  logging: loggingSchema.partial().optional(),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
export type PartialAppConfig = z.infer<typeof partialConfigSchema>;
export type ServerConfig = AppConfig['server'];
export type BrowserConfig = AppConfig['browser'];
export type SearchConfig = AppConfig['search'];
export type RateLimitConfig = AppConfig['rateLimit'];
export type ProxyConfig = AppConfig['proxy'];
export type LoggingConfig = AppConfig['logging'];

const RATE_WINDOW_MS = 60_000;

function fromEnv(e: Env): AppConfig {
  return {
    server: { port: e.PORT, host: e.HOST, apiToken: e.API_TOKEN },
    browser: {
      headless: e.BROWSER_HEADLESS,
      noSandbox: e.BROWSER_NO_SANDBOX,
      executablePath: e.BROWSER_EXECUTABLE_PATH,
      stealth: e.BROWSER_STEALTH_MODE,
      navigationTimeout: e.NAVIGATION_TIMEOUT,
    },
    search: {
      defaultLang: e.GOOGLE_DEFAULT_LANG,
      defaultTimezone: e.GOOGLE_DEFAULT_TIMEZONE,
      maxResults: e.GOOGLE_MAX_RESULTS,
      maxPages: e.GOOGLE_MAX_PAGES,
      sleepInterval: e.GOOGLE_SLEEP_INTERVAL,
      timeoutSeconds: e.SEARCH_TIMEOUT,
    },
    rateLimit: {
      maxRequests: e.SEARCH_RATE_LIMIT,
      windowMs: RATE_WINDOW_MS,
      cooldownSeconds: e.SEARCH_COOLDOWN,
    },
    proxy: { enabled: e.USE_PROXIES, list: e.PROXY_LIST, file: e.PROXY_FILE },
    logging: { level: e.LOG_LEVEL },
  };
}

/**
 * 只保留显式设置过的环境变量，避免默认值覆盖配置文件
 */
function envOverrides(source: Record<string, string | undefined>): PartialAppConfig {
  const e = parseEnv(source);
  const has = (key: keyof Env): boolean => source[key] !== undefined && source[key] !== '';

  return {
    server: {
      ...(has('PORT') ? { port: e.PORT } : {}),
      ...(has('HOST') ? { host: e.HOST } : {}),
      ...(has('API_TOKEN') ? { apiToken: e.API_TOKEN } : {}),
    },
    browser: {
      ...(has('BROWSER_HEADLESS') ? { headless: e.BROWSER_HEADLESS } : {}),
      ...(has('BROWSER_NO_SANDBOX') ? { noSandbox: e.BROWSER_NO_SANDBOX } : {}),
      ...(has('BROWSER_EXECUTABLE_PATH') ? { executablePath: e.BROWSER_EXECUTABLE_PATH } : {}),
      ...(has('BROWSER_STEALTH_MODE') ? { stealth: e.BROWSER_STEALTH_MODE } : {}),
      ...(has('NAVIGATION_TIMEOUT') ? { navigationTimeout: e.NAVIGATION_TIMEOUT } : {}),
    },
    search: {
      ...(has('GOOGLE_DEFAULT_LANG') ? { defaultLang: e.GOOGLE_DEFAULT_LANG } : {}),
      ...(has('GOOGLE_DEFAULT_TIMEZONE') ? { defaultTimezone: e.GOOGLE_DEFAULT_TIMEZONE } : {}),
      ...(has('GOOGLE_MAX_RESULTS') ? { maxResults: e.GOOGLE_MAX_RESULTS } : {}),
      ...(has('GOOGLE_MAX_PAGES') ? { maxPages: e.GOOGLE_MAX_PAGES } : {}),
      ...(has('GOOGLE_SLEEP_INTERVAL') ? { sleepInterval: e.GOOGLE_SLEEP_INTERVAL } : {}),
      ...(has('SEARCH_TIMEOUT') ? { timeoutSeconds: e.SEARCH_TIMEOUT } : {}),
    },
    rateLimit: {
      ...(has('SEARCH_RATE_LIMIT') ? { maxRequests: e.SEARCH_RATE_LIMIT } : {}),
      ...(has('SEARCH_COOLDOWN') ? { cooldownSeconds: e.SEARCH_COOLDOWN } : {}),
    },
    proxy: {
      ...(has('USE_PROXIES') ? { enabled: e.USE_PROXIES } : {}),
      ...(has('PROXY_LIST') ? { list: e.PROXY_LIST } : {}),
      ...(has('PROXY_FILE') ? { file: e.PROXY_FILE } : {}),
    },
    logging: {
      ...(has('LOG_LEVEL') ? { level: e.LOG_LEVEL } : {}),
    },
  };
}

function merge(base: AppConfig, patch: PartialAppConfig): AppConfig {
  return appConfigSchema.parse({
    server: { ...base.server, ...patch.server },
    browser: { ...base.browser, ...patch.browser },
    search: { ...base.search, ...patch.search },
    rateLimit: { ...base.rateLimit, ...patch.rateLimit },
    proxy: { ...base.proxy, ...patch.proxy },
    logging: { ...base.logging, ...patch.logging },
  });
}

export class ConfigManager {
  private config: AppConfig;

  constructor(configFile?: string, source: Record<string, string | undefined> = process.env) {
    const defaults = fromEnv(parseEnv({}));
    const fileConfig = this.loadFile(configFile ?? source.CONFIG_FILE);
    this.config = merge(merge(defaults, fileConfig), envOverrides(source));
  }

  private loadFile(configFile: string | undefined): PartialAppConfig {
    if (!configFile) {
      return {};
    }

    const resolved = path.resolve(configFile);
    if (!fs.existsSync(resolved)) {
      return {};
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(resolved, 'utf-8'));
    } catch (error) {
      throw ScraperErrors.invalidConfiguration(`Config file is not valid JSON: ${resolved}`, {
        file: resolved,
        reason: error instanceof Error ? error.message : String(error),
      });
    }

    const parsed = partialConfigSchema.safeParse(raw);
    if (!parsed.success) {
      throw ScraperErrors.invalidConfiguration(`Invalid config file: ${resolved}`, {
        file: resolved,
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }
    return parsed.data;
  }

  getConfig(): AppConfig {
    return this.config;
  }

  getServerConfig(): ServerConfig {
    return this.config.server;
  }

  getBrowserConfig(): BrowserConfig {
    return this.config.browser;
  }

  getSearchConfig(): SearchConfig {
    return this.config.search;
  }

  getRateLimitConfig(): RateLimitConfig {
    return this.config.rateLimit;
  }

  getProxyConfig(): ProxyConfig {
    return this.config.proxy;
  }

  getLoggingConfig(): LoggingConfig {
    return this.config.logging;
  }

  /**
   * 对外暴露的配置（不含密钥）
   */
  /**
   * 对外配置视图：去掉 API token 和代理凭据
   */
  getPublicConfig(): Omit<AppConfig, 'server' | 'proxy'> & {
    server: Omit<ServerConfig, 'apiToken'>;
    proxy: Omit<ProxyConfig, 'list'> & { listConfigured: boolean };
  } {
    const { apiToken: _apiToken, ...server } = this.config.server;
    const { list, ...proxy } = this.config.proxy;
    return { ...this.config, server, proxy: { ...proxy, listConfigured: Boolean(list?.trim()) } };
  }
}

let instance: ConfigManager | null = null;

export function getConfigManager(): ConfigManager {
  if (!instance) {
    instance = new ConfigManager();
  }
  return instance;
}

export function resetConfigManager(): void {
  instance = null;
}
