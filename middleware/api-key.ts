/**
 * API Token Middleware for Hono
 */

import { createMiddleware } from 'hono/factory';
import { createEnhancedLogger } from '../utils/logger';
import { errorResponse } from '../utils/responses';

const logger = createEnhancedLogger('ApiToken');

export const API_TOKEN_HEADER = 'x-api-token';

/**
 * 未配置 token 时放行所有请求
 */
export function createApiKeyMiddleware(token: string | undefined) {
  const normalizedToken = token?.trim();
  logger.debug('API token middleware initialized', { configured: Boolean(normalizedToken) });

  return createMiddleware(async (c, next) => {
    if (!normalizedToken) {
      return next();
    }

    const provided = c.req.header(API_TOKEN_HEADER)?.trim() || c.req.query('api_token')?.trim();
    if (provided && provided === normalizedToken) {
      return next();
    }

    logger.warn('Rejected request with missing or invalid API token', { path: c.req.path });
    return c.json(errorResponse('UNAUTHORIZED', 'Missing or invalid API token'), 401);
  });
}
