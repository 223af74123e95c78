/**
 * Per-attempt abort signal.
 * Combines the caller's signal with a timeout that can be re-armed, so a
 * streaming attempt times out when the connection goes quiet rather than
 * after a fixed total duration.
 */

import { setTimeout, clearTimeout } from 'node:timers';

export interface AttemptSignal {
  /** Signal to pass to fetch; aborts on timeout or caller abort. */
  readonly signal: AbortSignal;
  /** True once the timeout (not the caller) aborted the attempt. */
  readonly timedOut: boolean;
  /** Restart the timeout window. No-op once aborted. */
  refresh(): void;
  /** Clear the timer and detach from the caller's signal. */
  dispose(): void;
}

export function createAttemptSignal(timeoutMs: number, parent?: AbortSignal): AttemptSignal {
  const controller = new AbortController();
  let timedOut = false;
  let timer: NodeJS.Timeout | undefined;

  const onParentAbort = () => controller.abort(parent?.reason);

  const arm = () => {
    if (timer !== undefined) clearTimeout(timer);
    timer = setTimeout(() => {
      timedOut = true;
      controller.abort(new DOMException(`Request timed out after ${timeoutMs}ms`, 'TimeoutError'));
    }, timeoutMs);
    // Unref the timer so it doesn't keep the process alive during shutdown
    timer.unref();
  };

  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
    arm();
  }

  return {
    signal: controller.signal,
    get timedOut() {
      return timedOut;
    },
    refresh() {
      if (!controller.signal.aborted) arm();
    },
    dispose() {
      if (timer !== undefined) clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}
