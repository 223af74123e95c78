/**
 * Validation and translation of completion endpoint payloads.
 * Everything coming off the wire passes through a Zod schema here;
 * anything that does not fit becomes a `malformed_response` ApiError.
 */

import { z } from 'zod';
import { ApiError } from '../shared/errors.js';
import type { AssembledResponse, FinishReason, TokenUsage } from '../shared/types.js';
import type { SSEEvent } from '../streaming/sse-parser.js';

const UsageSchema = z.object({
  prompt_tokens: z.number(),
  completion_tokens: z.number(),
  total_tokens: z.number().optional(),
});

/** Non-streaming response body (the fields the relay reads). */
export const CompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullish() }),
        finish_reason: z.string().nullish(),
      }),
    )
    .min(1, { message: 'response has no choices' }),
  usage: UsageSchema.nullish(),
});

/** One `data:` frame of a streamed response. */
export const CompletionChunkSchema = z.object({
  choices: z
    .array(
      z.object({
        delta: z.object({ content: z.string().nullish() }).nullish(),
        finish_reason: z.string().nullish(),
      }),
    )
    .default([]),
  usage: UsageSchema.nullish(),
});

/** Error envelope used by OpenAI-compatible APIs, in bodies and in-band frames. */
const ErrorBodySchema = z.object({
  error: z.union([z.string(), z.object({ message: z.string() })]),
});

/** Alternative error envelope: `{ "message": "...", "code": ... }`. */
const MessageBodySchema = z.object({ message: z.string().min(1) });

export type CompletionResponseBody = z.infer<typeof CompletionResponseSchema>;
export type CompletionChunkBody = z.infer<typeof CompletionChunkSchema>;

/** A stream frame reduced to what the relay uses. */
export interface ParsedChunk {
  deltaText: string;
  finishReason?: FinishReason;
  usage?: TokenUsage;
}

const KNOWN_FINISH_REASONS: ReadonlySet<string> = new Set(['stop', 'length', 'content_filter', 'tool_calls']);

const MAX_SNIPPET = 200;

function snippet(text: string): string {
  return text.length > MAX_SNIPPET ? `${text.slice(0, MAX_SNIPPET)}...` : text;
}

function isKnownFinishReason(value: string): value is Exclude<FinishReason, 'unknown'> {
  return KNOWN_FINISH_REASONS.has(value);
}

/** Map the API's finish_reason string; unrecognised values become 'unknown'. */
export function toFinishReason(value: string | null | undefined): FinishReason | undefined {
  if (value === null || value === undefined) return undefined;
  return isKnownFinishReason(value) ? value : 'unknown';
}

export function toTokenUsage(usage: z.infer<typeof UsageSchema> | null | undefined): TokenUsage | undefined {
  if (!usage) return undefined;
  return { promptTokens: usage.prompt_tokens, completionTokens: usage.completion_tokens };
}

/**
 * Parse a Retry-After header value (seconds) into milliseconds.
 * Returns undefined for missing or non-numeric values.
 */
export function parseRetryAfterMs(value: string | null): number | undefined {
  if (value === null) return undefined;
  const seconds = parseFloat(value);
  if (isNaN(seconds) || seconds < 0) return undefined;
  return Math.round(seconds * 1000);
}

/** Pull a human-readable message out of an error response body. */
export function extractErrorMessage(body: string): string | undefined {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    return body.trim() ? snippet(body.trim()) : undefined;
  }

  const envelope = ErrorBodySchema.safeParse(json);
  if (envelope.success) {
    const { error } = envelope.data;
    return typeof error === 'string' ? error : error.message;
  }

  const plain = MessageBodySchema.safeParse(json);
  return plain.success ? plain.data.message : undefined;
}

/**
 * Translate a non-OK HTTP response into an ApiError.
 *
 * Status mapping:
 * - 401, 403 -> unauthorized
 * - 429 -> rate_limited (Retry-After captured)
 * - 408 -> timeout
 * - >= 500 -> server_error
 * - other 4xx -> client_error
 */
export function apiErrorFromResponse(status: number, headers: Headers, body: string): ApiError {
  const detail = extractErrorMessage(body);
  const message = detail ? `HTTP ${status}: ${detail}` : `HTTP ${status}`;

  if (status === 401 || status === 403) {
    return new ApiError('unauthorized', message, status);
  }
  if (status === 429) {
    return new ApiError('rate_limited', message, status, parseRetryAfterMs(headers.get('retry-after')));
  }
  if (status === 408) {
    return new ApiError('timeout', message, status);
  }
  if (status >= 500) {
    return new ApiError('server_error', message, status);
  }
  return new ApiError('client_error', message, status);
}

/** Validate a non-streaming response body and reduce it to an AssembledResponse. */
export function parseCompletionResponse(json: unknown, status: number): AssembledResponse {
  const parsed = CompletionResponseSchema.safeParse(json);
  if (!parsed.success) {
    throw new ApiError(
      'malformed_response',
      `Unexpected completion response: ${z.prettifyError(parsed.error)}`,
      status,
    );
  }

  const [choice] = parsed.data.choices;
  const response: AssembledResponse = {
    fullText: choice?.message.content ?? '',
    finishReason: toFinishReason(choice?.finish_reason) ?? 'stop',
  };

  const usage = toTokenUsage(parsed.data.usage);
  if (usage) response.usage = usage;

  return response;
}

/**
 * Parse one SSE event of a streamed completion.
 * @throws ApiError `server_error` for in-band error frames,
 *   `malformed_response` for frames that are not valid chunk JSON.
 */
export function parseChunkEvent(event: SSEEvent): ParsedChunk {
  let json: unknown;
  try {
    json = JSON.parse(event.data);
  } catch {
    throw new ApiError('malformed_response', `Unparsable stream frame: ${snippet(event.data)}`);
  }

  const inBandError = ErrorBodySchema.safeParse(json);
  if (event.event === 'error' || inBandError.success) {
    const detail = inBandError.success
      ? extractErrorMessage(event.data)
      : snippet(event.data);
    throw new ApiError('server_error', `Stream error from provider: ${detail ?? 'unknown error'}`);
  }

  const parsed = CompletionChunkSchema.safeParse(json);
  if (!parsed.success) {
    throw new ApiError('malformed_response', `Unexpected stream frame: ${snippet(event.data)}`);
  }

  const [choice] = parsed.data.choices;
  const chunk: ParsedChunk = { deltaText: choice?.delta?.content ?? '' };

  const finishReason = toFinishReason(choice?.finish_reason);
  if (finishReason) chunk.finishReason = finishReason;

  const usage = toTokenUsage(parsed.data.usage);
  if (usage) chunk.usage = usage;

  return chunk;
}
