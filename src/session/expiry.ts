/**
 * Idle expiry timers.
 * One timer per session id; touching a session re-arms its timer.
 */

import { clearTimeout, setTimeout } from 'node:timers';

export class ExpiryTimers {
  private timers = new Map<string, NodeJS.Timeout>();

  /**
   * Arm (or re-arm) the timer for a key. An existing timer for the key is
   * cancelled and replaced.
   * @param key - Session id.
   * @param durationMs - Idle time before onExpire runs.
   * @param onExpire - Called once when the timer fires.
   */
  schedule(key: string, durationMs: number, onExpire: () => void): void {
    this.cancel(key);

    const timer = setTimeout(() => {
      this.timers.delete(key);
      onExpire();
    }, durationMs);

    // Never keep the process alive for an idle session
    timer.unref();

    this.timers.set(key, timer);
  }

  cancel(key: string): void {
    const timer = this.timers.get(key);
    if (timer !== undefined) {
      clearTimeout(timer);
      this.timers.delete(key);
    }
  }

  /** Cancel every timer. Used during shutdown. */
  cancelAll(): void {
    for (const timer of this.timers.values()) {
      clearTimeout(timer);
    }
    this.timers.clear();
  }

  get activeCount(): number {
    return this.timers.size;
  }
}
