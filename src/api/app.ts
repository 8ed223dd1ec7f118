/**
 * Main Hono Application
 * HTTP surface next to the socket gateway: health and error envelopes
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger as httpLogger } from 'hono/logger';

import { AppError } from '@/lib/errors.js';
import type { Logger } from '@/lib/logger.js';

import { createRequestIdMiddleware } from './middleware/request-id.js';
import { createHealthRoutes } from './routes/health.js';
import type { ErrorResponse, HealthStats } from './types.js';
import { getErrorStatus } from './types.js';

/**
 * App configuration
 */
interface AppConfig {
  stats: HealthStats;
  logger: Logger;
  allowedOrigins?: string[];
  /** Per-request access log lines */
  accessLog?: boolean;
}

/**
 * Create the main Hono application
 */
export function createApp(config: AppConfig): Hono {
  const { stats, logger, allowedOrigins } = config;
  const app = new Hono();

  // Global middleware
  if (config.accessLog ?? true) {
    app.use('*', httpLogger((message: string) => logger.info(message)));
  }
  app.use(
    '*',
    cors({
      origin: allowedOrigins ?? ['http://localhost:3000'],
      credentials: true,
    })
  );
  app.use('*', createRequestIdMiddleware());

  app.route('/api/v1', createHealthRoutes(stats));

  // 404 handler
  app.notFound((c) => {
    const body: ErrorResponse = {
      error: {
        code: 'NOT_FOUND',
        message: 'Endpoint not found',
        requestId: c.get('requestId') ?? 'unknown',
      },
    };
    return c.json(body, 404);
  });

  // Global error handler
  app.onError((err, c) => {
    const requestId = c.get('requestId') ?? 'unknown';

    if (err instanceof AppError) {
      const body: ErrorResponse = {
        error: { code: err.code, message: err.message, requestId },
      };
      return c.json(body, getErrorStatus(err.code));
    }

    logger.error({ err, requestId }, 'Unhandled error');
    const body: ErrorResponse = {
      error: {
        code: 'INTERNAL_ERROR',
        message: 'An unexpected error occurred',
        requestId,
      },
    };
    return c.json(body, 500);
  });

  return app;
}
