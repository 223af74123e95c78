/**
 * Response assembly for one request cycle.
 * Turns a complete payload or a chunk sequence into an AssembledResponse,
 * exposing partial text while a stream is in flight and keeping it when
 * the stream fails.
 */

import { ApiError, RequestCancelledError } from '../shared/errors.js';
import type { AssembledResponse, CompletionChunk, FinishReason, TokenUsage } from '../shared/types.js';

/**
 * Phases of one request cycle.
 * idle -> sending -> (streaming)* -> assembling -> completed | failed
 */
export type RequestPhase = 'idle' | 'sending' | 'streaming' | 'assembling' | 'completed' | 'failed';

const TRANSITIONS: Record<RequestPhase, readonly RequestPhase[]> = {
  idle: ['sending', 'failed'],
  sending: ['streaming', 'assembling', 'failed'],
  streaming: ['streaming', 'assembling', 'failed'],
  assembling: ['completed', 'failed'],
  completed: [],
  failed: [],
};

/** Events yielded while assembling a stream. */
export type AssemblyEvent =
  | { type: 'partial'; text: string }
  | { type: 'completed'; response: AssembledResponse }
  | { type: 'interrupted'; partialText: string; error: ApiError | RequestCancelledError };

/** Tracks the phase of a single request cycle and rejects illegal moves. */
export class RequestCycle {
  private current: RequestPhase = 'idle';
  private failure: unknown;

  get phase(): RequestPhase {
    return this.current;
  }

  /** The error carried by the `failed` phase. */
  get error(): unknown {
    return this.failure;
  }

  get isTerminal(): boolean {
    return this.current === 'completed' || this.current === 'failed';
  }

  transition(next: RequestPhase): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Illegal request phase transition ${this.current} -> ${next}`);
    }
    this.current = next;
  }

  fail(error: unknown): void {
    if (this.isTerminal) return;
    this.failure = error;
    this.current = 'failed';
  }
}

export class ResponseAssembler {
  private text = '';
  private finishReason: FinishReason | undefined;
  private usage: TokenUsage | undefined;

  /** Single-shot mode: the client's response is already final. */
  static fromResponse(response: AssembledResponse): AssembledResponse {
    return response;
  }

  /** Text accumulated so far. */
  get partialText(): string {
    return this.text;
  }

  /**
   * Append one chunk.
   * @returns true when the chunk added text (a new partial view exists).
   */
  accept(chunk: CompletionChunk): boolean {
    this.text += chunk.deltaText;
    if (chunk.finishReason) this.finishReason = chunk.finishReason;
    if (chunk.usage) this.usage = chunk.usage;
    return chunk.deltaText.length > 0;
  }

  finalize(): AssembledResponse {
    const response: AssembledResponse = {
      fullText: this.text,
      finishReason: this.finishReason ?? 'stop',
    };
    if (this.usage) response.usage = this.usage;
    return response;
  }

  /**
   * Consume a chunk sequence lazily.
   * Yields a `partial` view after every chunk that adds text, then exactly
   * one `completed` event (on the final chunk) or `interrupted` event (on
   * an error, or when the sequence ends without a final chunk).
   * Errors other than ApiError/RequestCancelledError propagate.
   */
  async *views(chunks: AsyncIterable<CompletionChunk>): AsyncGenerator<AssemblyEvent, void, undefined> {
    let sawFinal = false;

    try {
      for await (const chunk of chunks) {
        if (this.accept(chunk)) {
          yield { type: 'partial', text: this.text };
        }
        if (chunk.isFinal) {
          sawFinal = true;
          break;
        }
      }
    } catch (error: unknown) {
      if (error instanceof ApiError || error instanceof RequestCancelledError) {
        yield { type: 'interrupted', partialText: this.text, error };
        return;
      }
      throw error;
    }

    if (!sawFinal) {
      const error = new ApiError('network_failure', 'Stream ended without a final chunk');
      yield { type: 'interrupted', partialText: this.text, error };
      return;
    }

    yield { type: 'completed', response: this.finalize() };
  }
}
