/**
 * Hono application factory.
 * Wires routes and the error handler around injected dependencies so the
 * same app runs under the Node server and in tests via app.request().
 */

import { Hono } from 'hono';
import { errorHandler } from './api/middleware/error-handler.js';
import { createHealthRoutes } from './api/routes/health.js';
import { createConfigRoutes } from './api/routes/config.js';
import { createSessionRoutes } from './api/routes/sessions.js';
import { RouteNotFoundError } from './shared/errors.js';
import type { Config } from './config/types.js';
import type { SessionStore } from './session/store.js';

export interface AppDependencies {
  config: Config;
  sessions: SessionStore;
}

export function createApp({ config, sessions }: AppDependencies) {
  const app = new Hono();

  // Global error handler
  app.onError(errorHandler);

  const api = new Hono();
  api.route('/health', createHealthRoutes(sessions, config));
  api.route('/config', createConfigRoutes(config));
  api.route('/sessions', createSessionRoutes(sessions));

  // Unknown API paths answer with JSON instead of falling through to the UI
  api.all('*', (c) => {
    throw new RouteNotFoundError(c.req.method, c.req.path);
  });

  app.route('/api', api);

  return app;
}
