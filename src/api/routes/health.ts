/**
 * GET /api/health handler.
 * Returns relay status information.
 */

import { Hono } from 'hono';
import type { SessionStore } from '../../session/store.js';
import type { Config } from '../../config/types.js';

/**
 * Create health routes with injected dependencies.
 * @param sessions - Live session store.
 * @param config - Resolved relay config.
 * @returns Hono app with GET / route for health checks.
 */
export function createHealthRoutes(sessions: SessionStore, config: Config) {
  const app = new Hono();

  app.get('/', (c) => {
    return c.json({
      status: 'ok',
      version: '0.1.0',
      uptime: process.uptime(),
      sessions: sessions.size,
      model: config.model,
    });
  });

  return app;
}
