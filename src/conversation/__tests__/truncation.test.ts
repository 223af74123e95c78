import { describe, it, expect } from 'vitest';
import { fitToBudget } from '../truncation.js';
import { ContextOverflowError } from '../../shared/errors.js';
import type { Message } from '../../shared/types.js';

// Every message below costs 5 tokens (4 overhead + 1); the conversation adds 3
const history: Message[] = [
  { role: 'system', content: 'S' },
  { role: 'user', content: 'aaaa' },
  { role: 'assistant', content: 'bbbb' },
  { role: 'user', content: 'cccc' },
];

describe('fitToBudget', () => {
  it('leaves a conversation that fits untouched', () => {
    const result = fitToBudget(history, 23);

    expect(result).toEqual({ messages: history, dropped: 0, estimatedTokens: 23 });
  });

  it('drops the oldest non-system message first', () => {
    const result = fitToBudget(history, 18);

    expect(result.dropped).toBe(1);
    expect(result.estimatedTokens).toBe(18);
    expect(result.messages.map((m) => m.content)).toEqual(['S', 'bbbb', 'cccc']);
  });

  it('keeps dropping until the estimate fits', () => {
    const result = fitToBudget(history, 13);

    expect(result.dropped).toBe(2);
    expect(result.messages.map((m) => m.content)).toEqual(['S', 'cccc']);
  });

  it('never drops system messages or the newest user turn', () => {
    expect(() => fitToBudget(history, 12)).toThrow(ContextOverflowError);
  });

  it('reports the estimate and budget on overflow', () => {
    try {
      fitToBudget([{ role: 'user', content: 'x'.repeat(400) }], 50);
      expect.unreachable('fitToBudget should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(ContextOverflowError);
      if (err instanceof ContextOverflowError) {
        expect(err.estimatedTokens).toBe(3 + 4 + 100);
        expect(err.budgetTokens).toBe(50);
      }
    }
  });

  it('protects the newest user turn even when a reply follows it', () => {
    const result = fitToBudget(
      [
        { role: 'user', content: 'aaaa' },
        { role: 'assistant', content: 'bbbb' },
      ],
      8,
    );

    expect(result.messages).toEqual([{ role: 'user', content: 'aaaa' }]);
  });

  it('does not modify its input', () => {
    fitToBudget(history, 13);
    expect(history).toHaveLength(4);
  });
});
