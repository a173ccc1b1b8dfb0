/**
 * Hono 应用组装
 */

import { Hono } from 'hono';
import { logger as requestLogger } from 'hono/logger';
import type { SearchDependencies } from '../core/search-dependencies';
import { createApiKeyMiddleware } from '../middleware/api-key';
import { createHealthRoutes } from '../routes/health';
import { createSearchRoutes } from '../routes/search';
import type { ConfigManager } from '../utils/config-manager';
import { createEnhancedLogger } from '../utils/logger';
import { errorResponse } from '../utils/responses';

const httpLogger = createEnhancedLogger('HTTP');

export interface AppOptions {
  configManager: Pick<ConfigManager, 'getServerConfig' | 'getPublicConfig'>;
  dependencies: Pick<SearchDependencies, 'sessionPool' | 'proxyPool' | 'limiter' | 'searchService'>;
}

export function createApp(options: AppOptions): Hono {
  const { configManager, dependencies } = options;
  const app = new Hono();

  app.use('*', requestLogger((message, ...rest) => httpLogger.debug([message, ...rest].join(' '))));

  // 健康检查不需要鉴权
  app.route('/', createHealthRoutes({ sessionPool: dependencies.sessionPool, proxyPool: dependencies.proxyPool }));

  app.use('/api/*', createApiKeyMiddleware(configManager.getServerConfig().apiToken));

  app.route(
    '/api/search',
    createSearchRoutes({ searchService: dependencies.searchService, limiter: dependencies.limiter })
  );

  app.get('/api/config', (c) => c.json(configManager.getPublicConfig()));

  app.notFound((c) => c.json(errorResponse('NOT_FOUND', `Route not found: ${c.req.method} ${c.req.path}`), 404));

  app.onError((error, c) => {
    httpLogger.error('Unhandled request error', error, { path: c.req.path });
    return c.json(errorResponse('INTERNAL_ERROR', 'Internal server error'), 500);
  });

  return app;
}
