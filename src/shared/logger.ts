/**
 * Structured JSON logger with API key redaction.
 * Must be imported before any logging occurs to ensure secrets are never leaked.
 */

import { pino } from 'pino';

const logLevel = process.env['LOG_LEVEL'] ?? 'info';

/** Paths censored in every log line. */
export const REDACT_PATHS = [
  'headers.authorization',
  'headers.Authorization',
  'apiKey',
  '*.apiKey',
  '*.api_key',
];

// Determine if pretty logging should be used:
// - Explicit LOG_FORMAT=pretty → use pretty
// - Explicit LOG_FORMAT=json → use JSON
// - Otherwise in development → use pretty
// - Production and test runs → use JSON
const nodeEnv = process.env['NODE_ENV'];
const usePretty =
  process.env['LOG_FORMAT'] === 'pretty' ||
  (nodeEnv !== 'production' && nodeEnv !== 'test' && process.env['LOG_FORMAT'] !== 'json');

export const logger = pino({
  name: 'chat-relay',
  level: logLevel,
  redact: {
    paths: REDACT_PATHS,
    censor: '[REDACTED]',
  },
  ...(usePretty && {
    transport: {
      target: 'pino-pretty',
      options: {
        translateTime: 'HH:MM:ss.l',
        ignore: 'pid,hostname',
        colorize: true,
      },
    },
  }),
});
