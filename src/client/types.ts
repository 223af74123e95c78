/**
 * Completion client interface.
 * Sessions work exclusively through CompletionPort, never with the
 * concrete HTTP client, so tests can substitute an in-process fake.
 */

import type { AssembledResponse, CompletionChunk, Conversation } from '../shared/types.js';

export interface RequestOptions {
  /** Aborts the request (and any retries) when fired. */
  signal?: AbortSignal;
}

export interface CompletionPort {
  /**
   * Send the conversation and wait for the whole reply.
   * @throws ApiError when the endpoint fails (after retries for transient failures).
   * @throws RequestCancelledError when the signal aborts.
   */
  complete(messages: Conversation, options?: RequestOptions): Promise<AssembledResponse>;

  /**
   * Open a streaming completion. Resolves once the endpoint has accepted the
   * request; chunks are then read lazily as the caller iterates.
   * The iterable ends with exactly one `isFinal` chunk or throws.
   * @throws ApiError when the stream cannot be opened (after retries).
   * @throws RequestCancelledError when the signal aborts.
   */
  stream(messages: Conversation, options?: RequestOptions): Promise<AsyncIterable<CompletionChunk>>;
}
