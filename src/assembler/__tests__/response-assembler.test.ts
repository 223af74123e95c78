import { describe, it, expect } from 'vitest';
import { RequestCycle, ResponseAssembler } from '../response-assembler.js';
import { ApiError, RequestCancelledError } from '../../shared/errors.js';
import type { AssemblyEvent } from '../response-assembler.js';
import type { CompletionChunk } from '../../shared/types.js';

async function* chunksOf(chunks: CompletionChunk[], error?: Error): AsyncGenerator<CompletionChunk> {
  for (const chunk of chunks) yield chunk;
  if (error) throw error;
}

async function collect(events: AsyncIterable<AssemblyEvent>): Promise<AssemblyEvent[]> {
  const out: AssemblyEvent[] = [];
  for await (const event of events) out.push(event);
  return out;
}

describe('ResponseAssembler', () => {
  it('passes a single-shot response through unchanged', () => {
    const response = { fullText: 'Hi there!', finishReason: 'stop' as const };
    expect(ResponseAssembler.fromResponse(response)).toBe(response);
  });

  it('yields a partial per text chunk and one completed event', async () => {
    const events = await collect(
      new ResponseAssembler().views(
        chunksOf([
          { deltaText: 'He', isFinal: false },
          { deltaText: 'llo', isFinal: false },
          { deltaText: '', isFinal: true, finishReason: 'stop', usage: { promptTokens: 4, completionTokens: 2 } },
        ]),
      ),
    );

    expect(events).toEqual([
      { type: 'partial', text: 'He' },
      { type: 'partial', text: 'Hello' },
      {
        type: 'completed',
        response: { fullText: 'Hello', finishReason: 'stop', usage: { promptTokens: 4, completionTokens: 2 } },
      },
    ]);
  });

  it('skips partial events for empty deltas', async () => {
    const events = await collect(
      new ResponseAssembler().views(
        chunksOf([
          { deltaText: '', isFinal: false },
          { deltaText: 'ok', isFinal: false },
          { deltaText: '', isFinal: true, finishReason: 'length' },
        ]),
      ),
    );

    expect(events).toEqual([
      { type: 'partial', text: 'ok' },
      { type: 'completed', response: { fullText: 'ok', finishReason: 'length' } },
    ]);
  });

  it('completes an empty reply', async () => {
    const events = await collect(new ResponseAssembler().views(chunksOf([{ deltaText: '', isFinal: true }])));
    expect(events).toEqual([{ type: 'completed', response: { fullText: '', finishReason: 'stop' } }]);
  });

  it('keeps partial text when the stream fails', async () => {
    const failure = new ApiError('network_failure', 'Network failure: socket hang up');
    const events = await collect(
      new ResponseAssembler().views(chunksOf([{ deltaText: 'Hel', isFinal: false }], failure)),
    );

    expect(events).toEqual([
      { type: 'partial', text: 'Hel' },
      { type: 'interrupted', partialText: 'Hel', error: failure },
    ]);
  });

  it('reports cancellation as an interruption', async () => {
    const cancelled = new RequestCancelledError();
    const events = await collect(new ResponseAssembler().views(chunksOf([], cancelled)));

    expect(events).toEqual([{ type: 'interrupted', partialText: '', error: cancelled }]);
  });

  it('treats a sequence without a final chunk as interrupted', async () => {
    const events = await collect(new ResponseAssembler().views(chunksOf([{ deltaText: 'Hi', isFinal: false }])));
    const last = events[events.length - 1];

    expect(last?.type).toBe('interrupted');
    if (last?.type === 'interrupted') {
      expect(last.partialText).toBe('Hi');
      expect(last.error).toBeInstanceOf(ApiError);
      expect(last.error.message).toBe('Stream ended without a final chunk');
    }
  });

  it('rethrows unexpected errors', async () => {
    await expect(collect(new ResponseAssembler().views(chunksOf([], new TypeError('boom'))))).rejects.toThrow('boom');
  });

  it('stops reading at the final chunk', async () => {
    let pulled = 0;
    async function* source(): AsyncGenerator<CompletionChunk> {
      pulled++;
      yield { deltaText: 'a', isFinal: true };
      pulled++;
      yield { deltaText: 'b', isFinal: false };
    }

    const events = await collect(new ResponseAssembler().views(source()));

    expect(pulled).toBe(1);
    expect(events[events.length - 1]).toEqual({ type: 'completed', response: { fullText: 'a', finishReason: 'stop' } });
  });
});

describe('RequestCycle', () => {
  it('follows the streaming path', () => {
    const cycle = new RequestCycle();
    expect(cycle.phase).toBe('idle');

    cycle.transition('sending');
    cycle.transition('streaming');
    cycle.transition('streaming');
    cycle.transition('assembling');
    cycle.transition('completed');

    expect(cycle.phase).toBe('completed');
    expect(cycle.isTerminal).toBe(true);
  });

  it('rejects illegal transitions', () => {
    const cycle = new RequestCycle();
    expect(() => cycle.transition('streaming')).toThrow('Illegal request phase transition idle -> streaming');

    cycle.transition('sending');
    cycle.transition('assembling');
    cycle.transition('completed');
    expect(() => cycle.transition('sending')).toThrow('Illegal request phase transition completed -> sending');
  });

  it('fails from any open phase and keeps the error', () => {
    const cycle = new RequestCycle();
    const error = new ApiError('timeout', 'No response within 1000ms');
    cycle.transition('sending');

    cycle.fail(error);

    expect(cycle.phase).toBe('failed');
    expect(cycle.error).toBe(error);
  });

  it('ignores fail() once terminal', () => {
    const cycle = new RequestCycle();
    cycle.transition('sending');
    cycle.transition('assembling');
    cycle.transition('completed');

    cycle.fail(new Error('late'));

    expect(cycle.phase).toBe('completed');
    expect(cycle.error).toBeUndefined();
  });
});
