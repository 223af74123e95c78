/**
 * chat-relay application entry point.
 * Bootstraps configuration, the completion client and session store,
 * creates the Hono application with routes, and starts the HTTP server.
 */

import { serve } from '@hono/node-server';
import { serveStatic } from '@hono/node-server/serve-static';
import { logger } from './shared/logger.js';
import { ConfigError } from './shared/errors.js';
import { loadConfig } from './config/loader.js';
import { CompletionClient } from './client/completion-client.js';
import { SessionStore } from './session/store.js';
import { createApp } from './app.js';
import type { Config } from './config/types.js';

// --- Bootstrap ---

logger.info('chat-relay v0.1.0 starting...');

let config: Config;
try {
  config = loadConfig();
} catch (err) {
  if (err instanceof ConfigError) {
    logger.fatal(err.message);
    process.exit(1);
  }
  throw err;
}

// Update logger level from config
logger.level = config.logLevel;

const client = new CompletionClient(config);
const sessions = new SessionStore(client, config);
const app = createApp({ config, sessions });

// Built browser UI (npm run build:ui); API routes are matched first
const uiRoot = process.env['UI_DIST'] ?? './ui/dist';
app.use('/*', serveStatic({ root: uiRoot }));
app.get('*', serveStatic({ path: `${uiRoot}/index.html` }));

// --- Start server ---

const server = serve(
  {
    fetch: app.fetch,
    port: config.port,
  },
  (info) => {
    logger.info({ port: info.port }, `chat-relay listening on port ${info.port}`);
    logger.info(
      {
        model: config.model,
        baseUrl: config.baseUrl,
        maxTokens: config.maxTokens,
        contextWindowTokens: config.contextWindowTokens,
      },
      'Ready',
    );
  },
);

// --- Graceful shutdown ---

const shutdown = () => {
  logger.info('Shutting down...');
  sessions.shutdown();
  server.close(() => {
    logger.info('Server closed');
    process.exit(0);
  });
};

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

// --- Unhandled rejection handler ---

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled rejection');
});
