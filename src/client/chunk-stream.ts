import type { CompletionChunk } from '../shared/types.js';

/**
 * Single-use sequence of streamed completion chunks.
 * Iterating a second time throws instead of silently yielding nothing.
 */
export class ChunkStream implements AsyncIterable<CompletionChunk> {
  private consumed = false;

  constructor(private readonly source: AsyncGenerator<CompletionChunk, void, undefined>) {}

  /** Whether iteration has already started. */
  get isConsumed(): boolean {
    return this.consumed;
  }

  [Symbol.asyncIterator](): AsyncIterator<CompletionChunk> {
    if (this.consumed) {
      throw new Error('ChunkStream can only be iterated once');
    }
    this.consumed = true;
    return this.source;
  }
}
