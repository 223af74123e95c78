/**
 * Deterministic history truncation.
 * Drops the oldest non-system messages, one at a time, until the estimate
 * fits the budget. System messages and the most recent user message are
 * never dropped.
 */

import { ContextOverflowError } from '../shared/errors.js';
import { estimateConversationTokens, estimateMessageTokens } from './tokens.js';
import type { Conversation, Message } from '../shared/types.js';

export interface TruncationResult {
  /** Messages to send, in original order. */
  messages: Message[];
  /** How many messages were left out. */
  dropped: number;
  /** Estimated prompt tokens of `messages`. */
  estimatedTokens: number;
}

function lastUserIndex(messages: readonly Message[]): number {
  for (let i = messages.length - 1; i >= 0; i--) {
    if (messages[i]?.role === 'user') return i;
  }
  return -1;
}

/**
 * Fit a conversation into `budgetTokens`.
 * @throws ContextOverflowError when only protected messages remain and they still exceed the budget.
 */
export function fitToBudget(messages: Conversation, budgetTokens: number): TruncationResult {
  const kept = [...messages];
  let estimatedTokens = estimateConversationTokens(kept);
  let protectedIndex = lastUserIndex(kept);
  let dropped = 0;

  while (estimatedTokens > budgetTokens) {
    const victim = kept.findIndex((message, i) => message.role !== 'system' && i !== protectedIndex);
    if (victim === -1) {
      throw new ContextOverflowError(estimatedTokens, budgetTokens);
    }

    const [removed] = kept.splice(victim, 1);
    if (removed) {
      estimatedTokens -= estimateMessageTokens(removed);
    }
    if (victim < protectedIndex) {
      protectedIndex--;
    }
    dropped++;
  }

  return { messages: kept, dropped, estimatedTokens };
}
