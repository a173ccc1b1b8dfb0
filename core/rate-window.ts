/**
 * 滑动窗口限流（进程内，按客户端区分）
 *
 * 窗口内请求数达到上限后进入冷却期，冷却期内所有请求被拒绝。
 */

import { createEnhancedLogger } from '../utils/logger';

const logger = createEnhancedLogger('RateWindow');

export interface SlidingWindowOptions {
  maxRequests: number;
  windowMs: number;
  cooldownMs: number;
}

export interface RateDecision {
  allowed: boolean;
  /** 被拒绝时建议的等待时间 */
  retryAfterMs: number;
  reason?: 'window-full' | 'cooldown';
}

interface ClientWindow {
  timestamps: number[];
  cooldownUntil: number;
}

export class SlidingWindowLimiter {
  private readonly clients = new Map<string, ClientWindow>();
  private lastSweep = 0;

  constructor(private readonly options: SlidingWindowOptions) {}

  check(clientId: string, now: number = Date.now()): RateDecision {
    if (now - this.lastSweep >= this.options.windowMs) {
      this.sweep(now);
    }

    const window = this.clients.get(clientId) ?? { timestamps: [], cooldownUntil: 0 };
    this.clients.set(clientId, window);

    if (now < window.cooldownUntil) {
      return { allowed: false, retryAfterMs: window.cooldownUntil - now, reason: 'cooldown' };
    }

    window.timestamps = window.timestamps.filter((ts) => now - ts < this.options.windowMs);

    if (window.timestamps.length >= this.options.maxRequests) {
      window.cooldownUntil = now + this.options.cooldownMs;
      logger.warn('Rate limit reached, cooldown started', {
        client: clientId,
        requests: window.timestamps.length,
        cooldownMs: this.options.cooldownMs,
      });
      const oldest = window.timestamps[0];
      const windowRemaining = oldest + this.options.windowMs - now;
      return {
        allowed: false,
        retryAfterMs: Math.max(this.options.cooldownMs, windowRemaining),
        reason: 'window-full',
      };
    }

    window.timestamps.push(now);
    return { allowed: true, retryAfterMs: 0 };
  }

  /** 当前跟踪的客户端数 */
  size(): number {
    return this.clients.size;
  }

  /**
   * 清理窗口已空且不在冷却期的客户端
   */
  private sweep(now: number): void {
    this.lastSweep = now;
    for (const [clientId, window] of this.clients) {
      const active = window.timestamps.some((ts) => now - ts < this.options.windowMs);
      if (!active && now >= window.cooldownUntil) {
        this.clients.delete(clientId);
      }
    }
  }

  reset(clientId?: string): void {
    if (clientId === undefined) {
      this.clients.clear();
    } else {
      this.clients.delete(clientId);
    }
  }
}
