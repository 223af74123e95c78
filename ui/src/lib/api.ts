import { createSSEParser } from '../../../src/streaming/sse-parser.js';
import type { ErrorPayload } from '../../../src/shared/errors.js';
import type { PublicConfig } from '../../../src/config/types.js';
import type { Conversation, FinishReason, TokenUsage } from '../../../src/shared/types.js';
import type { UiEvent } from '../../../src/session/submission.js';

export type { ErrorPayload, PublicConfig, UiEvent };

export interface SessionView {
  id: string;
  busy: boolean;
  phase: string;
  messages: Conversation;
}

export interface MessageReply {
  text: string;
  finishReason: FinishReason;
  usage: TokenUsage | null;
  truncated: boolean;
  dropped: number;
}

export interface HealthView {
  status: string;
  version: string;
  uptime: number;
  sessions: number;
  model: string;
}

export interface SendOptions {
  keepPartial?: boolean;
  signal?: AbortSignal;
}

/** A non-2xx answer from the relay, carrying its error payload. */
export class RelayError extends Error {
  constructor(
    public readonly payload: ErrorPayload,
    public readonly status: number,
  ) {
    super(payload.message);
    this.name = 'RelayError';
  }
}

const UI_EVENT_TYPES = new Set(['truncated', 'partial', 'completed', 'failed']);

function isUiEvent(value: unknown): value is UiEvent {
  return (
    typeof value === 'object' &&
    value !== null &&
    'type' in value &&
    typeof value.type === 'string' &&
    UI_EVENT_TYPES.has(value.type)
  );
}

function isErrorBody(value: unknown): value is { error: ErrorPayload } {
  return (
    typeof value === 'object' &&
    value !== null &&
    'error' in value &&
    typeof value.error === 'object' &&
    value.error !== null &&
    'message' in value.error
  );
}

async function toRelayError(response: Response): Promise<RelayError> {
  // Bodies that are not JSON fall back to the status text
  const body: unknown = await response.json().catch(() => null);
  if (isErrorBody(body)) {
    return new RelayError(body.error, response.status);
  }

  return new RelayError(
    { kind: 'internal', message: response.statusText || `HTTP ${response.status}`, statusCode: null, retrySuggested: false },
    response.status,
  );
}

async function apiFetch<T>(path: string, options?: RequestInit): Promise<T> {
  const headers: Record<string, string> = {};

  if (options?.method && options.method !== 'GET') {
    headers['Content-Type'] = 'application/json';
  }

  const response = await fetch(path, {
    ...options,
    headers,
  });

  if (!response.ok) {
    throw await toRelayError(response);
  }

  return response.json();
}

async function apiSend(path: string, method: 'POST' | 'DELETE'): Promise<void> {
  const response = await fetch(path, { method });
  if (!response.ok) {
    throw await toRelayError(response);
  }
}

/**
 * Submit a user turn as an event stream.
 * Each named event is handed to onEvent as it arrives.
 */
async function streamMessage(
  sessionId: string,
  content: string,
  onEvent: (event: UiEvent) => void,
  options: SendOptions = {},
): Promise<void> {
  const response = await fetch(`/api/sessions/${sessionId}/messages`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({ content, stream: true, keepPartial: options.keepPartial ?? false }),
    signal: options.signal,
  });

  if (!response.ok) {
    throw await toRelayError(response);
  }
  if (!response.body) {
    throw new Error('Event stream has no body');
  }

  const reader = response.body.getReader();
  const decoder = new TextDecoder();
  const parser = createSSEParser();

  const emit = (data: string) => {
    const event: unknown = JSON.parse(data);
    if (isUiEvent(event)) onEvent(event);
  };

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      for (const event of parser.parse(decoder.decode(value, { stream: true })).events) {
        emit(event.data);
      }
    }
    for (const event of parser.flush().events) {
      emit(event.data);
    }
  } finally {
    reader.releaseLock();
  }
}

export const api = {
  getHealth: () => apiFetch<HealthView>('/api/health'),
  getConfig: () => apiFetch<PublicConfig>('/api/config'),
  createSession: () => apiFetch<{ id: string }>('/api/sessions', { method: 'POST' }),
  getSession: (id: string) => apiFetch<SessionView>(`/api/sessions/${id}`),
  deleteSession: (id: string) => apiSend(`/api/sessions/${id}`, 'DELETE'),
  sendMessage: (id: string, content: string, options: SendOptions = {}) =>
    apiFetch<MessageReply>(`/api/sessions/${id}/messages`, {
      method: 'POST',
      body: JSON.stringify({ content, stream: false, keepPartial: options.keepPartial ?? false }),
      signal: options.signal,
    }),
  streamMessage,
  cancel: (id: string) => apiFetch<{ cancelled: boolean }>(`/api/sessions/${id}/cancel`, { method: 'POST' }),
  resetSession: (id: string) => apiSend(`/api/sessions/${id}/messages`, 'DELETE'),
};
