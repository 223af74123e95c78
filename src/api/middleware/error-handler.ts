/**
 * Global error handler returning ErrorPayload JSON.
 * Catches all errors from route handlers and converts them to
 * `{ error: ErrorPayload }` with a status matching the error kind.
 */

import type { ErrorHandler } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { logger } from '../../shared/logger.js';
import { describeError } from '../../shared/errors.js';
import type { ErrorKind, ErrorPayload } from '../../shared/errors.js';

/**
 * HTTP status for each error kind.
 * Upstream failures surface as gateway errors; a rate limit keeps its 429.
 */
const STATUS_BY_KIND: Record<ErrorKind, ContentfulStatusCode> = {
  unauthorized: 502,
  rate_limited: 429,
  client_error: 502,
  server_error: 502,
  timeout: 504,
  network_failure: 502,
  malformed_response: 502,
  stream_interrupted: 502,
  config: 500,
  busy: 409,
  cancelled: 409,
  context_overflow: 413,
  conversation_order: 409,
  session_not_found: 404,
  not_found: 404,
  invalid_request: 400,
  internal: 500,
};

export function statusForKind(kind: ErrorKind): ContentfulStatusCode {
  return STATUS_BY_KIND[kind];
}

/** Response body for a failure. */
export function errorBody(payload: ErrorPayload): { error: ErrorPayload } {
  return { error: payload };
}

/**
 * Hono error handler that converts all error types to ErrorPayload responses.
 * Unknown errors are logged in full and reported with a generic message.
 */
export const errorHandler: ErrorHandler = (err, c) => {
  const payload = describeError(err);
  const status = statusForKind(payload.kind);

  if (payload.kind === 'internal' || payload.kind === 'config') {
    logger.error({ err, path: c.req.path }, 'Unhandled error');
  } else {
    logger.debug({ kind: payload.kind, path: c.req.path, status }, payload.message);
  }

  return c.json(errorBody(payload), status);
};
