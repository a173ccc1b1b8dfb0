/**
 * Health Check API Routes - Hono
 */

import { Hono } from 'hono';
import type { ProxyPool } from '../core/proxy-manager';
import type { SessionPool } from '../core/session-pool';

export interface HealthRoutesOptions {
  sessionPool: Pick<SessionPool, 'getStatus'>;
  proxyPool?: Pick<ProxyPool, 'getSummary'>;
  startedAt?: Date;
}

export function createHealthRoutes(options: HealthRoutesOptions): Hono {
  const routes = new Hono();
  const startedAt = options.startedAt ?? new Date();

  /**
   * GET /health
   * 浏览器未启动也算健康（懒启动），关闭后返回 503
   */
  routes.get('/health', (c) => {
    const session = options.sessionPool.getStatus();
    const status = session.state === 'closed' ? 'down' : 'ok';

    return c.json(
      {
        status,
        timestamp: new Date().toISOString(),
        uptimeSeconds: Math.round((Date.now() - startedAt.getTime()) / 1000),
        browser: {
          state: session.state,
          version: session.version,
          launchedAt: session.launchedAt?.toISOString(),
        },
        proxies: options.proxyPool?.getSummary() ?? { total: 0, healthy: 0, unhealthy: 0 },
      },
      status === 'down' ? 503 : 200
    );
  });

  return routes;
}
