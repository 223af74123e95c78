/**
 * HTTP client for an OpenAI-compatible chat completion endpoint.
 * Handles URL construction, headers, per-attempt timeouts, retries with
 * backoff, and translation of every failure into an ApiError.
 */

import { logger } from '../shared/logger.js';
import { ApiError, RequestCancelledError } from '../shared/errors.js';
import { createSSEParser } from '../streaming/sse-parser.js';
import { createAttemptSignal } from './attempt.js';
import { ChunkStream } from './chunk-stream.js';
import { backoffDelayMs, isRetryable, sleep } from './retry.js';
import { apiErrorFromResponse, extractErrorMessage, parseChunkEvent, parseCompletionResponse } from './wire.js';
import type { Config } from '../config/types.js';
import type {
  AssembledResponse,
  ChatCompletionRequest,
  CompletionChunk,
  Conversation,
  FinishReason,
  TokenUsage,
} from '../shared/types.js';
import type { SSEParseResult } from '../streaming/sse-parser.js';
import type { AttemptSignal } from './attempt.js';
import type { RetryPolicy } from './retry.js';
import type { CompletionPort, RequestOptions } from './types.js';

const MAX_PREAMBLE_CHARS = 8192;

/**
 * Error for a stream body that closed before its first frame.
 * Some endpoints answer a streaming request with 200 and a plain JSON error.
 */
function errorBodyInsteadOfStream(preamble: string): ApiError {
  const trimmed = preamble.trim();
  const message = trimmed.startsWith('{') ? extractErrorMessage(trimmed) : undefined;
  if (message) {
    return new ApiError('client_error', `Endpoint answered with an error instead of a stream: ${message}`, 200);
  }
  return new ApiError('network_failure', 'Stream ended before the completion sentinel');
}

export class CompletionClient implements CompletionPort {
  public readonly url: string;
  private readonly retryPolicy: RetryPolicy;

  constructor(private readonly config: Config) {
    this.url = `${config.baseUrl.replace(/\/+$/, '')}/chat/completions`;
    this.retryPolicy = {
      maxRetries: config.maxRetries,
      baseDelayMs: config.retryBaseDelayMs,
      maxDelayMs: config.retryMaxDelayMs,
    };
  }

  /**
   * Build the request body from the conversation and config.
   * Streaming requests ask for usage in the final chunk.
   */
  buildRequest(messages: Conversation, stream: boolean): ChatCompletionRequest {
    const body: ChatCompletionRequest = {
      model: this.config.model,
      messages: messages.map((message) => ({ role: message.role, content: message.content })),
      max_tokens: this.config.maxTokens,
      temperature: this.config.temperature,
      stream,
    };

    if (this.config.topP !== undefined) {
      body.top_p = this.config.topP;
    }
    if (stream) {
      body.stream_options = { include_usage: true };
    }

    return body;
  }

  /**
   * Send a non-streaming chat completion request.
   * Transient failures are retried per the retry policy.
   */
  async complete(messages: Conversation, options: RequestOptions = {}): Promise<AssembledResponse> {
    const body = this.buildRequest(messages, false);

    return this.withRetry('complete', options.signal, async (attempt) => {
      try {
        const start = performance.now();
        const response = await this.post(body, attempt.signal);

        let json: unknown;
        try {
          json = await response.json();
        } catch (error) {
          // Body read aborted: let the caller classify it as timeout/cancel
          if (attempt.signal.aborted) throw error;
          throw new ApiError('malformed_response', 'Completion response is not valid JSON', response.status);
        }

        const result = parseCompletionResponse(json, response.status);

        logger.debug(
          {
            model: this.config.model,
            latencyMs: Math.round(performance.now() - start),
            finishReason: result.finishReason,
            length: result.fullText.length,
          },
          'Chat completion succeeded',
        );

        return result;
      } finally {
        attempt.dispose();
      }
    });
  }

  /**
   * Open a streaming chat completion request.
   * Retries happen only while opening; once the endpoint has answered 200
   * the returned ChunkStream is consumed lazily and never restarted.
   */
  async stream(messages: Conversation, options: RequestOptions = {}): Promise<ChunkStream> {
    const body = this.buildRequest(messages, true);

    return this.withRetry('stream', options.signal, async (attempt) => {
      const response = await this.post(body, attempt.signal);

      if (!response.body) {
        throw new ApiError('malformed_response', 'Streaming response has no body', response.status);
      }

      logger.debug({ model: this.config.model }, 'Stream opened');

      return new ChunkStream(this.readChunks(response.body, attempt, options.signal));
    });
  }

  private async post(body: ChatCompletionRequest, signal: AbortSignal): Promise<Response> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'Authorization': `Bearer ${this.config.apiKey}`,
    };

    logger.debug(
      { model: body.model, url: this.url, messages: body.messages.length, stream: body.stream },
      'Sending chat completion request',
    );

    const start = performance.now();

    const response = await fetch(this.url, {
      method: 'POST',
      headers,
      body: JSON.stringify(body),
      signal,
    });

    if (!response.ok) {
      const errorText = await response.text();
      const latencyMs = Math.round(performance.now() - start);
      const error = apiErrorFromResponse(response.status, response.headers, errorText);

      if (error.kind === 'rate_limited') {
        logger.warn(
          { model: body.model, latencyMs, retryAfterMs: error.retryAfterMs },
          'Endpoint returned 429 rate limit',
        );
      } else {
        logger.error(
          { model: body.model, status: response.status, latencyMs, kind: error.kind },
          'Endpoint returned error',
        );
      }

      throw error;
    }

    return response;
  }

  /**
   * Run one operation with per-attempt timeouts and bounded retries.
   * The operation owns the attempt on success (it must dispose it).
   */
  private async withRetry<T>(
    operation: 'complete' | 'stream',
    signal: AbortSignal | undefined,
    run: (attempt: AttemptSignal) => Promise<T>,
  ): Promise<T> {
    for (let retry = 0; ; retry++) {
      if (signal?.aborted) {
        throw new RequestCancelledError();
      }

      const attempt = createAttemptSignal(this.config.requestTimeoutMs, signal);

      try {
        return await run(attempt);
      } catch (error: unknown) {
        attempt.dispose();
        const failure = this.classify(error, attempt, signal);

        if (failure instanceof RequestCancelledError) {
          logger.debug({ operation, model: this.config.model }, 'Request cancelled by caller');
          throw failure;
        }

        if (!isRetryable(failure) || retry >= this.retryPolicy.maxRetries) {
          logger.warn(
            {
              operation,
              model: this.config.model,
              kind: failure.kind,
              status: failure.statusCode,
              attempts: retry + 1,
            },
            `Chat completion ${operation} failed after ${retry + 1} attempt(s): ${failure.message}`,
          );
          throw failure;
        }

        const delayMs = backoffDelayMs(retry, this.retryPolicy, failure.retryAfterMs);
        logger.info(
          {
            operation,
            model: this.config.model,
            kind: failure.kind,
            status: failure.statusCode,
            attempt: retry + 1,
            delayMs,
          },
          `Chat completion ${operation} failed (${failure.kind}), retrying in ${delayMs}ms`,
        );

        await sleep(delayMs, signal);
      }
    }
  }

  /**
   * Map anything thrown during an attempt onto the error taxonomy.
   * Caller abort wins over timeout, which wins over the raw error.
   */
  private classify(
    error: unknown,
    attempt: AttemptSignal,
    signal: AbortSignal | undefined,
  ): ApiError | RequestCancelledError {
    if (signal?.aborted || error instanceof RequestCancelledError) {
      return new RequestCancelledError();
    }
    if (error instanceof ApiError) {
      return error;
    }
    if (attempt.timedOut) {
      return new ApiError('timeout', `No response within ${this.config.requestTimeoutMs}ms`);
    }

    const message = error instanceof Error ? error.message : String(error);
    const cause = error instanceof Error && error.cause instanceof Error ? ` (${error.cause.message})` : '';
    return new ApiError('network_failure', `Network failure: ${message}${cause}`);
  }

  /**
   * Read SSE frames off the body and yield chunks in arrival order.
   * Ends with one isFinal chunk on [DONE] (or on close after a finish_reason);
   * any other ending throws. The reader is cancelled however iteration stops.
   */
  private async *readChunks(
    body: ReadableStream<Uint8Array>,
    attempt: AttemptSignal,
    signal: AbortSignal | undefined,
  ): AsyncGenerator<CompletionChunk, void, undefined> {
    const reader = body.getReader();
    const decoder = new TextDecoder();
    const parser = createSSEParser();
    let finishReason: FinishReason | undefined;
    let usage: TokenUsage | undefined;
    // Raw text kept until the first frame, for a JSON error sent in place of a stream
    let preamble = '';
    let sawEvent = false;

    try {
      while (true) {
        const read = await reader.read().catch((error: unknown) => {
          throw this.classify(error, attempt, signal);
        });
        attempt.refresh();

        const text = read.done ? decoder.decode() : decoder.decode(read.value, { stream: true });
        if (!sawEvent && preamble.length < MAX_PREAMBLE_CHARS) {
          preamble += text;
        }

        let result: SSEParseResult;
        if (read.done) {
          const tail = parser.parse(text);
          const rest = parser.flush();
          result = { events: [...tail.events, ...rest.events], done: tail.done || rest.done };
        } else {
          result = parser.parse(text);
        }
        if (result.events.length > 0 || result.done) sawEvent = true;

        for (const event of result.events) {
          const chunk = parseChunkEvent(event);
          if (chunk.finishReason) finishReason = chunk.finishReason;
          if (chunk.usage) usage = chunk.usage;
          if (chunk.deltaText) {
            yield { deltaText: chunk.deltaText, isFinal: false };
          }
        }

        if (result.done || (read.done && finishReason)) {
          const final: CompletionChunk = { deltaText: '', isFinal: true, finishReason: finishReason ?? 'stop' };
          if (usage) final.usage = usage;
          logger.debug({ model: this.config.model, finishReason: final.finishReason }, 'Stream completed');
          yield final;
          return;
        }

        if (read.done) {
          throw sawEvent
            ? new ApiError('network_failure', 'Stream ended before the completion sentinel')
            : errorBodyInsteadOfStream(preamble);
        }
      }
    } finally {
      attempt.dispose();
      // No-op on a fully read body; releases the connection otherwise
      try {
        await reader.cancel();
      } catch (error) {
        logger.debug({ error }, 'Stream body already closed');
      }
    }
  }
}
