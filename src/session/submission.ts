/**
 * Handle for one submitted user turn.
 * Iterating it drives the request cycle and yields UI events; cancel()
 * aborts the request whether or not iteration has started.
 */

import type { ErrorPayload } from '../shared/errors.js';
import type { FinishReason, TokenUsage } from '../shared/types.js';

/** Events the presentation layer renders. */
export type UiEvent =
  | { type: 'truncated'; dropped: number; estimatedTokens: number }
  | { type: 'partial'; text: string }
  | { type: 'completed'; text: string; finishReason: FinishReason; usage?: TokenUsage }
  | { type: 'failed'; error: ErrorPayload };

export class Submission implements AsyncIterable<UiEvent> {
  private started = false;

  /**
   * @param events - Lazy event sequence; runs the request when first iterated.
   * @param controller - Aborts the in-flight request.
   * @param discard - Releases the session when the submission is cancelled before iteration.
   */
  constructor(
    private readonly events: AsyncGenerator<UiEvent, void, undefined>,
    private readonly controller: AbortController,
    private readonly discard: () => void,
  ) {}

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  [Symbol.asyncIterator](): AsyncIterator<UiEvent> {
    if (this.started) {
      throw new Error('Submission can only be iterated once');
    }
    this.started = true;
    return this.events;
  }

  /** Abort the request. Safe to call more than once and after completion. */
  async cancel(): Promise<void> {
    this.controller.abort();

    if (!this.started) {
      this.started = true;
      await this.events.return(undefined);
      this.discard();
    }
  }
}
