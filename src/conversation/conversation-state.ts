/**
 * Ordered turn history for one session.
 * Enforces turn order: a request may only start from a trailing user turn,
 * and an assistant turn may only be appended for the request in flight.
 */

import { ConversationOrderError } from '../shared/errors.js';
import { fitToBudget } from './truncation.js';
import type { Conversation, Message } from '../shared/types.js';

/** Messages to send for one request, after truncation. */
export interface PreparedRequest {
  messages: Conversation;
  truncated: boolean;
  dropped: number;
  estimatedTokens: number;
}

export interface AbandonOptions {
  /** Also remove the user turn that opened the request. */
  dropPrompt?: boolean;
}

export class ConversationState {
  private messages: Message[] = [];
  /** Index of the user turn the pending request was built from. */
  private pendingPromptIndex: number | null = null;

  /**
   * @param systemPrompt - Leading system message. Kept across reset().
   */
  constructor(private readonly systemPrompt?: string) {
    this.seed();
  }

  get length(): number {
    return this.messages.length;
  }

  /** True between beginRequest() and appendAssistant()/abandonRequest(). */
  get isPending(): boolean {
    return this.pendingPromptIndex !== null;
  }

  appendUser(text: string): Message {
    if (this.isPending) {
      throw new ConversationOrderError('Cannot add a user turn while a request is pending');
    }
    return this.push({ role: 'user', content: text });
  }

  /**
   * Start a request from the current history.
   * @param budgetTokens - Prompt budget; older turns are left out to fit it.
   * @throws ConversationOrderError unless the last turn is a user turn and nothing is pending.
   * @throws ContextOverflowError when the newest user turn alone exceeds the budget.
   */
  beginRequest(budgetTokens: number): PreparedRequest {
    if (this.isPending) {
      throw new ConversationOrderError('A request is already pending for this conversation');
    }

    const lastIndex = this.messages.length - 1;
    if (this.messages[lastIndex]?.role !== 'user') {
      throw new ConversationOrderError('A request must follow a user turn');
    }

    const fit = fitToBudget(this.messages, budgetTokens);
    this.pendingPromptIndex = lastIndex;

    return {
      messages: Object.freeze(fit.messages),
      truncated: fit.dropped > 0,
      dropped: fit.dropped,
      estimatedTokens: fit.estimatedTokens,
    };
  }

  /** Record the reply to the pending request. */
  appendAssistant(text: string): Message {
    if (!this.isPending) {
      throw new ConversationOrderError('An assistant turn needs a pending request');
    }
    this.pendingPromptIndex = null;
    return this.push({ role: 'assistant', content: text });
  }

  /** Resolve the pending request without a reply. */
  abandonRequest(options: AbandonOptions = {}): void {
    if (this.pendingPromptIndex === null) return;

    if (options.dropPrompt) {
      this.messages.splice(this.pendingPromptIndex, 1);
    }
    this.pendingPromptIndex = null;
  }

  /**
   * Remove a trailing user turn that never started a request
   * (e.g. it was rejected before sending).
   */
  withdrawUser(): void {
    if (this.isPending) {
      throw new ConversationOrderError('Cannot withdraw a user turn while a request is pending');
    }
    if (this.messages[this.messages.length - 1]?.role === 'user') {
      this.messages.pop();
    }
  }

  /** Clear every turn. The system prompt, if any, stays. */
  reset(): void {
    if (this.isPending) {
      throw new ConversationOrderError('Cannot reset while a request is pending');
    }
    this.seed();
  }

  /** Read-only copy of the history. */
  snapshot(): Conversation {
    return Object.freeze([...this.messages]);
  }

  private push(message: Message): Message {
    const frozen = Object.freeze({ ...message });
    this.messages.push(frozen);
    return frozen;
  }

  private seed(): void {
    this.messages = [];
    if (this.systemPrompt) {
      this.push({ role: 'system', content: this.systemPrompt });
    }
  }
}
