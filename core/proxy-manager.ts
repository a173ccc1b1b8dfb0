import * as fs from 'fs';
import { z } from 'zod';
import { createEnhancedLogger } from '../utils/logger';

const logger = createEnhancedLogger('ProxyManager');

const proxyRecordSchema = z.object({
  server: z.string().min(1),
  username: z.string().optional(),
  password: z.string().optional(),
});

export type ProxyRecord = z.infer<typeof proxyRecordSchema>;

export interface ProxyStats {
  failures: number;
  successes: number;
  lastFailure?: number;
  lastSuccess?: number;
  isHealthy: boolean;
}

export interface ProxyPoolOptions {
  maxFailuresBeforeUnhealthy?: number;
  failureCooldownMs?: number;
  now?: () => number;
}

/**
 * 规范化代理地址：缺少协议时补 http://
 */
export function normalizeProxyServer(server: string): string {
  const trimmed = server.trim();
  return /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `http://${trimmed}`;
}

/**
 * 解析一行 host:port[:user:pass]
 */
export function parseProxyLine(line: string): ProxyRecord | null {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith('#')) {
    return null;
  }

  const parts = trimmed.split(':');
  if (parts.length < 2) {
    return null;
  }

  const host = parts[0];
  const port = parseInt(parts[1], 10);
  if (!host || Number.isNaN(port)) {
    return null;
  }

  const record: ProxyRecord = { server: `http://${host}:${port}` };
  if (parts.length >= 4) {
    record.username = parts[2];
    // 密码里可能带冒号
    record.password = parts.slice(3).join(':');
  }
  return record;
}

/**
 * 解析代理列表：JSON 数组（字符串或对象）或按行的 host:port[:user:pass]
 */
export function parseProxyList(content: string): ProxyRecord[] {
  const trimmed = content.trim();
  if (!trimmed) {
    return [];
  }

  if (trimmed.startsWith('[')) {
    const parsed = z
      .array(z.union([z.string(), proxyRecordSchema]))
      .parse(JSON.parse(trimmed));
    return parsed.map((entry) =>
      typeof entry === 'string'
        ? { server: normalizeProxyServer(entry) }
        : { ...entry, server: normalizeProxyServer(entry.server) }
    );
  }

  const records: ProxyRecord[] = [];
  for (const line of trimmed.split(/\r?\n/)) {
    const record = parseProxyLine(line);
    if (record) {
      records.push(record);
    } else if (line.trim() && !line.trim().startsWith('#')) {
      logger.warn(`Invalid proxy line format: ${line.trim().substring(0, 50)}`);
    }
  }
  return records;
}

/**
 * 代理池：轮询 + 健康追踪
 *
 * 空池不是错误，取代理时返回 null
 */
export class ProxyPool {
  private proxies: ProxyRecord[];
  private currentIndex = 0;
  private proxyStats: Map<string, ProxyStats> = new Map();
  private readonly maxFailuresBeforeUnhealthy: number;
  private readonly failureCooldownMs: number;
  private readonly now: () => number;

  constructor(proxies: ProxyRecord[] = [], options: ProxyPoolOptions = {}) {
    this.proxies = [...proxies];
    this.maxFailuresBeforeUnhealthy = options.maxFailuresBeforeUnhealthy ?? 3;
    this.failureCooldownMs = options.failureCooldownMs ?? 60000;
    this.now = options.now ?? Date.now;
  }

  static fromFile(filePath: string, options?: ProxyPoolOptions): ProxyPool {
    if (!fs.existsSync(filePath)) {
      logger.warn(`Proxy file not found: ${filePath}`);
      return new ProxyPool([], options);
    }
    const proxies = parseProxyList(fs.readFileSync(filePath, 'utf-8'));
    logger.info(`Loaded ${proxies.length} proxies from ${filePath}`);
    return new ProxyPool(proxies, options);
  }

  static fromConfig(config: { list?: string; file?: string }, options?: ProxyPoolOptions): ProxyPool {
    if (config.list) {
      return new ProxyPool(parseProxyList(config.list), options);
    }
    if (config.file) {
      return ProxyPool.fromFile(config.file, options);
    }
    return new ProxyPool([], options);
  }

  size(): number {
    return this.proxies.length;
  }

  hasProxies(): boolean {
    return this.proxies.length > 0;
  }

  /**
   * 轮询取下一个健康代理；全部不健康时仍返回下一个
   */
  next(): ProxyRecord | null {
    if (!this.hasProxies()) return null;

    let attempts = 0;
    while (attempts < this.proxies.length) {
      const proxy = this.proxies[this.currentIndex];
      const stats = this.proxyStats.get(proxy.server);
      this.currentIndex = (this.currentIndex + 1) % this.proxies.length;

      if (!stats || stats.isHealthy) {
        return proxy;
      }

      // 冷却结束后恢复
      if (stats.lastFailure !== undefined && this.now() - stats.lastFailure > this.failureCooldownMs) {
        stats.isHealthy = true;
        stats.failures = 0;
        return proxy;
      }

      attempts++;
    }

    const proxy = this.proxies[this.currentIndex];
    this.currentIndex = (this.currentIndex + 1) % this.proxies.length;
    return proxy;
  }

  markFailed(server: string, reason?: string): void {
    const stats = this.getStats(server);
    stats.failures++;
    stats.lastFailure = this.now();

    if (stats.isHealthy && stats.failures >= this.maxFailuresBeforeUnhealthy) {
      stats.isHealthy = false;
      logger.warn(`Proxy ${server} marked as unhealthy after ${stats.failures} failures`, {
        proxy: server,
        failures: stats.failures,
        reason,
      });
    }

    this.proxyStats.set(server, stats);
  }

  markSuccess(server: string): void {
    const stats = this.getStats(server);
    stats.successes++;
    stats.lastSuccess = this.now();
    stats.failures = Math.max(0, stats.failures - 1);

    if (!stats.isHealthy && stats.failures < this.maxFailuresBeforeUnhealthy) {
      stats.isHealthy = true;
      logger.info(`Proxy ${server} recovered and marked as healthy`, { proxy: server });
    }

    this.proxyStats.set(server, stats);
  }

  getStats(server: string): ProxyStats {
    const existing = this.proxyStats.get(server);
    return existing ? { ...existing } : { failures: 0, successes: 0, isHealthy: true };
  }

  getSummary(): { total: number; healthy: number; unhealthy: number } {
    const unhealthy = this.proxies.filter((p) => this.proxyStats.get(p.server)?.isHealthy === false).length;
    return {
      total: this.proxies.length,
      healthy: this.proxies.length - unhealthy,
      unhealthy,
    };
  }
}
