/**
 * Session-scoped chat context.
 * Owns one conversation, gates it to a single request in flight, and turns
 * each submitted user turn into a cancellable sequence of UI events.
 */

import { logger } from '../shared/logger.js';
import {
  ApiError,
  BusyError,
  ContextOverflowError,
  RequestCancelledError,
  StreamInterruptedError,
  describeError,
} from '../shared/errors.js';
import { ConversationState } from '../conversation/conversation-state.js';
import { RequestCycle, ResponseAssembler } from '../assembler/response-assembler.js';
import { Submission } from './submission.js';
import type { Logger } from 'pino';
import type { Config } from '../config/types.js';
import type { CompletionPort } from '../client/types.js';
import type { PreparedRequest } from '../conversation/conversation-state.js';
import type { AssemblyEvent, RequestPhase } from '../assembler/response-assembler.js';
import type { AssembledResponse, Conversation } from '../shared/types.js';
import type { UiEvent } from './submission.js';

/** Settings a session reads from the relay config. */
export type SessionSettings = Pick<Config, 'maxTokens' | 'contextWindowTokens' | 'systemPrompt'>;

export interface SubmitOptions {
  /** Request a streamed reply (partial events). Default false. */
  stream?: boolean;
  /** Emit a partial event per streamed chunk. Default true. */
  partials?: boolean;
  /** Keep partial text as the assistant turn when a stream fails or is cancelled. */
  keepPartial?: boolean;
  /** External abort, e.g. the HTTP client disconnecting. */
  signal?: AbortSignal;
}

function completedEvent(response: AssembledResponse): UiEvent {
  const { fullText: text, finishReason, usage } = response;
  return usage ? { type: 'completed', text, finishReason, usage } : { type: 'completed', text, finishReason };
}

export class ChatSession {
  public readonly id: string;
  private readonly conversation: ConversationState;
  private readonly log: Logger;
  private cycle: RequestCycle | null = null;
  private controller: AbortController | null = null;

  constructor(
    id: string,
    private readonly client: CompletionPort,
    private readonly settings: SessionSettings,
  ) {
    this.id = id;
    this.conversation = new ConversationState(settings.systemPrompt);
    this.log = logger.child({ sessionId: id });
  }

  /** True while a request cycle has not reached completed/failed. */
  get busy(): boolean {
    return this.cycle !== null && !this.cycle.isTerminal;
  }

  /** Phase of the current (or last) request cycle. */
  get phase(): RequestPhase {
    return this.cycle?.phase ?? 'idle';
  }

  /** Prompt tokens available once the reply's max_tokens is reserved. */
  get promptBudget(): number {
    return this.settings.contextWindowTokens - this.settings.maxTokens;
  }

  snapshot(): Conversation {
    return this.conversation.snapshot();
  }

  /**
   * Submit a user turn.
   * The user turn is appended immediately; the request runs as the returned
   * Submission is iterated. Iterate it or cancel it, otherwise the session
   * stays busy.
   * @throws BusyError when a request is already in flight (nothing changes).
   */
  submit(text: string, options: SubmitOptions = {}): Submission {
    if (this.busy) {
      throw new BusyError(this.id);
    }

    const controller = new AbortController();
    const cycle = new RequestCycle();
    const onExternalAbort = () => controller.abort();

    if (options.signal?.aborted) {
      controller.abort();
    } else {
      options.signal?.addEventListener('abort', onExternalAbort, { once: true });
    }

    this.conversation.appendUser(text);
    this.cycle = cycle;
    this.controller = controller;

    const detach = () => options.signal?.removeEventListener('abort', onExternalAbort);

    return new Submission(this.run(cycle, controller, options, detach), controller, () => {
      detach();
      this.settleAbandoned(cycle, new RequestCancelledError());
    });
  }

  /**
   * Abort the request in flight, if any.
   * @returns true when there was something to cancel.
   */
  cancel(): boolean {
    if (!this.busy || !this.controller) {
      return false;
    }
    this.controller.abort();
    return true;
  }

  /**
   * Clear the conversation.
   * @throws BusyError when a request is in flight.
   */
  reset(): void {
    if (this.busy) {
      throw new BusyError(this.id);
    }
    this.conversation.reset();
    this.cycle = null;
    this.log.info('Conversation reset');
  }

  private async *run(
    cycle: RequestCycle,
    controller: AbortController,
    options: SubmitOptions,
    detach: () => void,
  ): AsyncGenerator<UiEvent, void, undefined> {
    const start = performance.now();

    try {
      if (controller.signal.aborted) {
        throw new RequestCancelledError();
      }

      const prepared = this.prepare();
      cycle.transition('sending');

      if (prepared.truncated) {
        this.log.info(
          { dropped: prepared.dropped, estimatedTokens: prepared.estimatedTokens, budget: this.promptBudget },
          `Truncated ${prepared.dropped} message(s) to fit the prompt budget`,
        );
        yield { type: 'truncated', dropped: prepared.dropped, estimatedTokens: prepared.estimatedTokens };
      }

      if (options.stream) {
        yield* this.runStream(cycle, prepared, controller.signal, options);
      } else {
        const response = ResponseAssembler.fromResponse(
          await this.client.complete(prepared.messages, { signal: controller.signal }),
        );
        cycle.transition('assembling');
        this.conversation.appendAssistant(response.fullText);
        cycle.transition('completed');
        this.logCompleted(response, start);
        yield completedEvent(response);
      }
    } catch (error: unknown) {
      const cancelled = error instanceof RequestCancelledError;
      if (this.conversation.isPending) {
        this.conversation.abandonRequest({ dropPrompt: cancelled });
      } else if (cancelled) {
        this.conversation.withdrawUser();
      }
      cycle.fail(error);
      this.logFailed(error, start);
      yield { type: 'failed', error: describeError(error) };
    } finally {
      detach();
      // Iteration stopped early (consumer went away): release the request
      if (!cycle.isTerminal) {
        controller.abort();
        this.settleAbandoned(cycle, new RequestCancelledError('Submission was abandoned'));
      }
    }
  }

  /** Start the request, withdrawing the user turn if it cannot fit at all. */
  private prepare(): PreparedRequest {
    try {
      return this.conversation.beginRequest(this.promptBudget);
    } catch (error) {
      if (error instanceof ContextOverflowError) {
        this.conversation.withdrawUser();
      }
      throw error;
    }
  }

  private async *runStream(
    cycle: RequestCycle,
    prepared: PreparedRequest,
    signal: AbortSignal,
    options: SubmitOptions,
  ): AsyncGenerator<UiEvent, void, undefined> {
    const start = performance.now();
    const chunks = await this.client.stream(prepared.messages, { signal });
    const assembler = new ResponseAssembler();

    for await (const event of assembler.views(chunks)) {
      switch (event.type) {
        case 'partial':
          cycle.transition('streaming');
          if (options.partials ?? true) {
            yield { type: 'partial', text: event.text };
          }
          break;

        case 'completed':
          cycle.transition('assembling');
          this.conversation.appendAssistant(event.response.fullText);
          cycle.transition('completed');
          this.logCompleted(event.response, start);
          yield completedEvent(event.response);
          break;

        case 'interrupted':
          yield this.interrupt(cycle, event, options.keepPartial ?? false, start);
          break;
      }
    }
  }

  /**
   * Settle a stream that ended in an error. Partial text is reported with
   * the failure and kept as the assistant turn only when asked to.
   */
  private interrupt(
    cycle: RequestCycle,
    event: Extract<AssemblyEvent, { type: 'interrupted' }>,
    keepPartial: boolean,
    start: number,
  ): UiEvent {
    const { partialText, error } = event;

    if (keepPartial && partialText) {
      this.conversation.appendAssistant(partialText);
    } else {
      this.conversation.abandonRequest({ dropPrompt: error instanceof RequestCancelledError });
    }

    const failure = partialText && error instanceof ApiError ? new StreamInterruptedError(partialText, error) : error;
    cycle.fail(failure);
    this.logFailed(failure, start);

    const payload = describeError(failure);
    if (partialText && payload.partialText === undefined) {
      payload.partialText = partialText;
    }
    return { type: 'failed', error: payload };
  }

  private settleAbandoned(cycle: RequestCycle, reason: RequestCancelledError): void {
    if (cycle.isTerminal) return;
    this.conversation.abandonRequest({ dropPrompt: true });
    if (!this.conversation.isPending && cycle.phase === 'idle') {
      // Never started: the user turn was appended by submit() but not yet sent
      this.conversation.withdrawUser();
    }
    cycle.fail(reason);
    this.log.debug('Submission abandoned');
  }

  private logCompleted(response: AssembledResponse, start: number): void {
    this.log.info(
      {
        finishReason: response.finishReason,
        length: response.fullText.length,
        usage: response.usage,
        latencyMs: Math.round(performance.now() - start),
      },
      'Request cycle completed',
    );
  }

  private logFailed(error: unknown, start: number): void {
    const payload = describeError(error);
    const context = { kind: payload.kind, latencyMs: Math.round(performance.now() - start) };

    if (payload.kind === 'internal') {
      this.log.error({ ...context, err: error }, 'Request cycle failed');
    } else if (payload.kind === 'cancelled') {
      this.log.info(context, 'Request cycle cancelled');
    } else {
      this.log.warn(context, `Request cycle failed: ${payload.message}`);
    }
  }
}
