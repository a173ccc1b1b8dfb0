/**
 * SERP Crawler HTTP Server
 */

import { serve } from '@hono/node-server';
import { createSearchDependencies } from '../core/search-dependencies';
import { resetSessionPool } from '../core/session-pool';
import { createApp } from '../server/app';
import { getConfigManager } from '../utils/config-manager';
import { closeLogger, createEnhancedLogger, setLogLevel, toError } from '../utils/logger';

const serverLogger = createEnhancedLogger('Server');

function main(): void {
  const configManager = getConfigManager();
  const serverConfig = configManager.getServerConfig();
  setLogLevel(configManager.getLoggingConfig().level);

  if (!serverConfig.apiToken) {
    serverLogger.warn('API_TOKEN is not set, /api routes are open');
  }

  const dependencies = createSearchDependencies(configManager);
  const app = createApp({ configManager, dependencies });

  const server = serve({ fetch: app.fetch, port: serverConfig.port, hostname: serverConfig.host }, (info) => {
    serverLogger.info(`Server listening on http://${serverConfig.host}:${info.port}`, {
      proxies: dependencies.proxyPool.size(),
    });
  });

  let isShuttingDown = false;
  const shutdown = async (signal: string) => {
    if (isShuttingDown) return;
    isShuttingDown = true;
    serverLogger.info(`Received ${signal}, shutting down`);

    server.close();
    try {
      await resetSessionPool();
    } catch (error) {
      serverLogger.error('Browser shutdown failed', toError(error));
    }
    await closeLogger();
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

main();
