/**
 * Health Route
 * Public endpoint for health checks
 */

import { Hono } from 'hono';

import type { HealthStats } from '../types.js';

/**
 * Create health check routes
 */
export function createHealthRoutes(stats: HealthStats): Hono {
  const app = new Hono();

  /**
   * GET /health
   * Health check with the number of live socket connections
   */
  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: 'v1',
      connections: stats.connections(),
    });
  });

  return app;
}
