/**
 * GET /api/config handler.
 * Serves the secret-free view of the relay config to the browser.
 */

import { Hono } from 'hono';
import { publicConfig } from '../../config/loader.js';
import type { Config } from '../../config/types.js';

export function createConfigRoutes(config: Config) {
  const app = new Hono();
  const view = publicConfig(config);

  app.get('/', (c) => c.json(view));

  return app;
}
