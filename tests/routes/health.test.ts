/**
 * Health 路由单元测试
 */

import { describe, expect, test } from 'vitest';
import { ProxyPool } from '../../core/proxy-manager';
import type { SessionPoolStatus } from '../../core/session-pool';
import { createHealthRoutes } from '../../routes/health';

function sessionPool(status: SessionPoolStatus) {
  return { getStatus: () => status };
}

describe('health routes', () => {
  test('should report ok for a lazily started browser', async () => {
    const app = createHealthRoutes({
      sessionPool: sessionPool({ state: 'uninitialized', launchArgs: [] }),
      startedAt: new Date(Date.now() - 5000),
    });

    const res = await app.request('/health');
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body.status).toBe('ok');
    expect(body.uptimeSeconds).toBe(5);
    expect(body.browser).toEqual({ state: 'uninitialized' });
    expect(body.proxies).toEqual({ total: 0, healthy: 0, unhealthy: 0 });
  });

  test('should include the browser version and proxy summary', async () => {
    const proxyPool = new ProxyPool([{ server: 'http://10.0.0.1:3128' }, { server: 'http://10.0.0.2:3128' }], {
      maxFailuresBeforeUnhealthy: 1,
    });
    proxyPool.markFailed('http://10.0.0.2:3128');
    const app = createHealthRoutes({
      sessionPool: sessionPool({
        state: 'ready',
        launchArgs: [],
        launchedAt: new Date('2026-01-01T00:00:00.000Z'),
        version: 'HeadlessChrome/126.0.0.0',
      }),
      proxyPool,
    });

    const body = await (await app.request('/health')).json();

    expect(body.browser).toEqual({
      state: 'ready',
      version: 'HeadlessChrome/126.0.0.0',
      launchedAt: '2026-01-01T00:00:00.000Z',
    });
    expect(body.proxies).toEqual({ total: 2, healthy: 1, unhealthy: 1 });
  });

  test('should return 503 once the session pool is closed', async () => {
    const app = createHealthRoutes({ sessionPool: sessionPool({ state: 'closed', launchArgs: [] }) });

    const res = await app.request('/health');

    expect(res.status).toBe(503);
    expect((await res.json()).status).toBe('down');
  });
});
