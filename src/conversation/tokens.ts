/**
 * Token estimation without a tokenizer.
 * CJK and full-width characters are close to one token each; other text
 * averages about four characters per token.
 */

import type { Conversation, Message } from '../shared/types.js';

/** Role/formatting tokens added around every message. */
export const MESSAGE_OVERHEAD_TOKENS = 4;

/** Tokens the API adds to prime the assistant reply. */
export const REPLY_PRIMING_TOKENS = 3;

const WIDE_CHARS = /[\u3000-\u9fff\uac00-\ud7af\uf900-\ufaff\uff00-\uffef]/g;

/**
 * Estimate tokens for a piece of text.
 *
 *   "abcdefgh"  -> 2
 *   "abc"       -> 1
 *   "你好"      -> 2
 *   "你好 ab"   -> 3
 */
export function estimateTextTokens(text: string): number {
  const wide = text.match(WIDE_CHARS)?.length ?? 0;
  const narrow = text.length - wide;
  return wide + Math.ceil(narrow / 4);
}

export function estimateMessageTokens(message: Message): number {
  return MESSAGE_OVERHEAD_TOKENS + estimateTextTokens(message.content);
}

export function estimateConversationTokens(messages: Conversation): number {
  let total = REPLY_PRIMING_TOKENS;
  for (const message of messages) {
    total += estimateMessageTokens(message);
  }
  return total;
}
