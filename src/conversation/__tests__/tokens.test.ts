import { describe, it, expect } from 'vitest';
import { estimateConversationTokens, estimateMessageTokens, estimateTextTokens } from '../tokens.js';

describe('estimateTextTokens', () => {
  it('counts about four latin characters per token, rounding up', () => {
    expect(estimateTextTokens('')).toBe(0);
    expect(estimateTextTokens('abc')).toBe(1);
    expect(estimateTextTokens('abcd')).toBe(1);
    expect(estimateTextTokens('abcdefgh')).toBe(2);
    expect(estimateTextTokens('abcdefghi')).toBe(3);
  });

  it('counts each CJK character as one token', () => {
    expect(estimateTextTokens('你好')).toBe(2);
    expect(estimateTextTokens('你好 ab')).toBe(3);
    expect(estimateTextTokens('こんにちは')).toBe(5);
  });
});

describe('estimateMessageTokens', () => {
  it('adds per-message overhead', () => {
    expect(estimateMessageTokens({ role: 'user', content: 'Hello' })).toBe(6);
  });
});

describe('estimateConversationTokens', () => {
  it('adds reply priming to the sum of messages', () => {
    expect(estimateConversationTokens([])).toBe(3);
    expect(
      estimateConversationTokens([
        { role: 'system', content: 'Be brief.' },
        { role: 'user', content: 'Hello' },
      ]),
    ).toBe(3 + 7 + 6);
  });
});
