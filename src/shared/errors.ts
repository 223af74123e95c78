/**
 * Custom error classes for chat-relay.
 * Every error that can reach the browser converts to an ErrorPayload
 * through describeError().
 */

/** Failure categories of a call to the completion endpoint. */
export type ApiErrorKind =
  | 'unauthorized'
  | 'rate_limited'
  | 'client_error'
  | 'server_error'
  | 'timeout'
  | 'network_failure'
  | 'malformed_response';

/** Every kind an ErrorPayload can carry. */
export type ErrorKind =
  | ApiErrorKind
  | 'config'
  | 'busy'
  | 'cancelled'
  | 'stream_interrupted'
  | 'context_overflow'
  | 'conversation_order'
  | 'session_not_found'
  | 'not_found'
  | 'invalid_request'
  | 'internal';

/** Serializable description of a failure, as rendered by the UI. */
export interface ErrorPayload {
  kind: ErrorKind;
  message: string;
  statusCode: number | null;
  retrySuggested: boolean;
  partialText?: string;
}

const RETRYABLE_KINDS: ReadonlySet<ApiErrorKind> = new Set([
  'rate_limited',
  'server_error',
  'timeout',
  'network_failure',
]);

/** Error thrown when config validation or loading fails. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Failure of a request to the completion endpoint. */
export class ApiError extends Error {
  public readonly kind: ApiErrorKind;
  /** HTTP status from the endpoint, null when no response was received. */
  public readonly statusCode: number | null;
  /** Server-requested wait before retrying, in milliseconds. */
  public readonly retryAfterMs?: number;

  constructor(kind: ApiErrorKind, message: string, statusCode: number | null = null, retryAfterMs?: number) {
    super(message);
    this.name = 'ApiError';
    this.kind = kind;
    this.statusCode = statusCode;
    this.retryAfterMs = retryAfterMs;
  }

  /** Whether the same request may succeed if sent again. */
  get retrySuggested(): boolean {
    return RETRYABLE_KINDS.has(this.kind);
  }
}

/** The caller aborted an in-flight request. */
export class RequestCancelledError extends Error {
  constructor(message = 'Request was cancelled') {
    super(message);
    this.name = 'RequestCancelledError';
  }
}

/** A stream failed after some text had already been received. */
export class StreamInterruptedError extends Error {
  public readonly partialText: string;
  /** The error that ended the stream. */
  public readonly failure: ApiError;

  constructor(partialText: string, failure: ApiError) {
    super(`Stream interrupted after ${partialText.length} characters: ${failure.message}`);
    this.name = 'StreamInterruptedError';
    this.partialText = partialText;
    this.failure = failure;
  }
}

/** A session already has a request in flight. */
export class BusyError extends Error {
  public readonly sessionId: string;

  constructor(sessionId: string) {
    super(`Session ${sessionId} already has a request in flight`);
    this.name = 'BusyError';
    this.sessionId = sessionId;
  }
}

/** Even the newest user turn does not fit the prompt budget. */
export class ContextOverflowError extends Error {
  public readonly estimatedTokens: number;
  public readonly budgetTokens: number;

  constructor(estimatedTokens: number, budgetTokens: number) {
    super(
      `Conversation needs ~${estimatedTokens} tokens but the prompt budget is ${budgetTokens}. Reset the conversation or send a shorter message.`,
    );
    this.name = 'ContextOverflowError';
    this.estimatedTokens = estimatedTokens;
    this.budgetTokens = budgetTokens;
  }
}

/** A conversation operation was called out of turn order. */
export class ConversationOrderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConversationOrderError';
  }
}

/** No session exists with the given id. */
export class SessionNotFoundError extends Error {
  public readonly sessionId: string;

  constructor(sessionId: string) {
    super(`Session ${sessionId} not found`);
    this.name = 'SessionNotFoundError';
    this.sessionId = sessionId;
  }
}

/** No API route matches the request. */
export class RouteNotFoundError extends Error {
  constructor(method: string, path: string) {
    super(`No route for ${method} ${path}`);
    this.name = 'RouteNotFoundError';
  }
}

/** An inbound HTTP request body failed validation. */
export class RequestValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RequestValidationError';
  }
}

/**
 * Convert any thrown value into an ErrorPayload.
 * Unknown errors become `internal` with a generic message.
 */
export function describeError(error: unknown): ErrorPayload {
  if (error instanceof ApiError) {
    return {
      kind: error.kind,
      message: error.message,
      statusCode: error.statusCode,
      retrySuggested: error.retrySuggested,
    };
  }

  if (error instanceof StreamInterruptedError) {
    return {
      kind: 'stream_interrupted',
      message: error.message,
      statusCode: error.failure.statusCode,
      retrySuggested: error.failure.retrySuggested,
      partialText: error.partialText,
    };
  }

  if (error instanceof RequestCancelledError) {
    return { kind: 'cancelled', message: error.message, statusCode: null, retrySuggested: true };
  }

  if (error instanceof BusyError) {
    return { kind: 'busy', message: error.message, statusCode: null, retrySuggested: false };
  }

  if (error instanceof ContextOverflowError) {
    return { kind: 'context_overflow', message: error.message, statusCode: null, retrySuggested: false };
  }

  if (error instanceof ConversationOrderError) {
    return { kind: 'conversation_order', message: error.message, statusCode: null, retrySuggested: false };
  }

  if (error instanceof SessionNotFoundError) {
    return { kind: 'session_not_found', message: error.message, statusCode: null, retrySuggested: false };
  }

  if (error instanceof RouteNotFoundError) {
    return { kind: 'not_found', message: error.message, statusCode: null, retrySuggested: false };
  }

  if (error instanceof RequestValidationError) {
    return { kind: 'invalid_request', message: error.message, statusCode: null, retrySuggested: false };
  }

  if (error instanceof ConfigError) {
    return { kind: 'config', message: 'Internal configuration error', statusCode: null, retrySuggested: false };
  }

  return { kind: 'internal', message: 'Internal server error', statusCode: null, retrySuggested: false };
}
