/**
 * Conversation and OpenAI-compatible wire type definitions.
 * Wire types mirror the remote API (snake_case); domain types are what
 * the rest of the app passes around.
 */

/** Author of a single conversation turn. */
export type Role = 'system' | 'user' | 'assistant';

/** A single message in a conversation. Never mutated once created. */
export interface Message {
  readonly role: Role;
  readonly content: string;
}

/** Ordered, read-only turn history. */
export type Conversation = readonly Message[];

/** Why the model stopped generating. */
export type FinishReason = 'stop' | 'length' | 'content_filter' | 'tool_calls' | 'unknown';

/** Token usage for one completion. */
export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
}

/** One incremental piece of a streamed completion. */
export interface CompletionChunk {
  deltaText: string;
  isFinal: boolean;
  finishReason?: FinishReason;
  usage?: TokenUsage;
}

/** Final result of one request cycle. */
export interface AssembledResponse {
  fullText: string;
  finishReason: FinishReason;
  usage?: TokenUsage;
}

// --- Wire format ---

/** A message as sent to the completion endpoint. */
export interface ChatMessage {
  role: Role;
  content: string;
}

/** OpenAI-compatible chat completion request body. */
export interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
  max_tokens: number;
  temperature: number;
  top_p?: number;
  stream: boolean;
  stream_options?: { include_usage: boolean };
}
