import { describe, it, expect } from 'vitest';
import {
  ApiError,
  BusyError,
  ConfigError,
  ContextOverflowError,
  ConversationOrderError,
  RequestCancelledError,
  RequestValidationError,
  RouteNotFoundError,
  SessionNotFoundError,
  StreamInterruptedError,
  describeError,
} from '../errors.js';

describe('ConfigError', () => {
  it('creates an error with the correct name and message', () => {
    const err = new ConfigError('Bad config');
    expect(err).toBeInstanceOf(Error);
    expect(err).toBeInstanceOf(ConfigError);
    expect(err.name).toBe('ConfigError');
    expect(err.message).toBe('Bad config');
  });
});

describe('ApiError', () => {
  it('carries kind, status and retry hint', () => {
    const err = new ApiError('rate_limited', 'HTTP 429: slow down', 429, 2000);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('ApiError');
    expect(err.kind).toBe('rate_limited');
    expect(err.statusCode).toBe(429);
    expect(err.retryAfterMs).toBe(2000);
  });

  it('defaults statusCode to null when no response was received', () => {
    const err = new ApiError('network_failure', 'Network failure: connection reset');
    expect(err.statusCode).toBeNull();
    expect(err.retryAfterMs).toBeUndefined();
  });

  it.each([
    ['rate_limited', true],
    ['server_error', true],
    ['timeout', true],
    ['network_failure', true],
    ['unauthorized', false],
    ['client_error', false],
    ['malformed_response', false],
  ] as const)('suggests retry for %s: %s', (kind, expected) => {
    expect(new ApiError(kind, 'x').retrySuggested).toBe(expected);
  });
});

describe('StreamInterruptedError', () => {
  it('keeps the partial text and the underlying failure', () => {
    const failure = new ApiError('network_failure', 'Network failure: socket closed');
    const err = new StreamInterruptedError('Hel', failure);

    expect(err.name).toBe('StreamInterruptedError');
    expect(err.partialText).toBe('Hel');
    expect(err.failure).toBe(failure);
    expect(err.message).toBe('Stream interrupted after 3 characters: Network failure: socket closed');
  });
});

describe('describeError', () => {
  it('describes an ApiError', () => {
    expect(describeError(new ApiError('unauthorized', 'HTTP 401: bad key', 401))).toEqual({
      kind: 'unauthorized',
      message: 'HTTP 401: bad key',
      statusCode: 401,
      retrySuggested: false,
    });
  });

  it('describes an interrupted stream through its failure', () => {
    const failure = new ApiError('server_error', 'Stream error from provider: overloaded');
    expect(describeError(new StreamInterruptedError('partial', failure))).toEqual({
      kind: 'stream_interrupted',
      message: 'Stream interrupted after 7 characters: Stream error from provider: overloaded',
      statusCode: null,
      retrySuggested: true,
      partialText: 'partial',
    });
  });

  it('describes cancellation as retryable', () => {
    expect(describeError(new RequestCancelledError())).toEqual({
      kind: 'cancelled',
      message: 'Request was cancelled',
      statusCode: null,
      retrySuggested: true,
    });
  });

  it.each([
    [new BusyError('s1'), 'busy', 'Session s1 already has a request in flight'],
    [new SessionNotFoundError('s2'), 'session_not_found', 'Session s2 not found'],
    [new ConversationOrderError('out of order'), 'conversation_order', 'out of order'],
    [new RequestValidationError('content is required'), 'invalid_request', 'content is required'],
    [new RouteNotFoundError('GET', '/api/nope'), 'not_found', 'No route for GET /api/nope'],
  ])('describes %s', (error, kind, message) => {
    expect(describeError(error)).toEqual({ kind, message, statusCode: null, retrySuggested: false });
  });

  it('describes context overflow with the numbers involved', () => {
    const payload = describeError(new ContextOverflowError(5000, 4000));
    expect(payload.kind).toBe('context_overflow');
    expect(payload.message).toContain('~5000 tokens');
    expect(payload.message).toContain('budget is 4000');
    expect(payload.retrySuggested).toBe(false);
  });

  it('hides config details', () => {
    expect(describeError(new ConfigError('apiKey: test-secret is wrong')).message).toBe(
      'Internal configuration error',
    );
  });

  it('reports unknown errors as internal with a generic message', () => {
    expect(describeError(new TypeError('x is undefined'))).toEqual({
      kind: 'internal',
      message: 'Internal server error',
      statusCode: null,
      retrySuggested: false,
    });
    expect(describeError('a string').kind).toBe('internal');
  });
});
