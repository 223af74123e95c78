/**
 * Session store.
 * Keeps independent chat sessions keyed by id and expires the ones that sit
 * idle longer than the configured TTL.
 */

import { randomUUID } from 'node:crypto';
import { logger } from '../shared/logger.js';
import { SessionNotFoundError } from '../shared/errors.js';
import { ChatSession } from './chat-session.js';
import { ExpiryTimers } from './expiry.js';
import type { CompletionPort } from '../client/types.js';
import type { Config } from '../config/types.js';

export type StoreSettings = Pick<Config, 'maxTokens' | 'contextWindowTokens' | 'systemPrompt' | 'sessionIdleTtlMs'>;

export class SessionStore {
  private sessions = new Map<string, ChatSession>();
  private expiry = new ExpiryTimers();

  /**
   * @param client - Completion port shared by every session.
   * @param settings - Session settings from the relay config.
   * @param generateId - Id source; overridable in tests.
   */
  constructor(
    private readonly client: CompletionPort,
    private readonly settings: StoreSettings,
    private readonly generateId: () => string = randomUUID,
  ) {}

  create(): ChatSession {
    const id = this.generateId();
    const session = new ChatSession(id, this.client, this.settings);
    this.sessions.set(id, session);
    this.touch(id);

    logger.info({ sessionId: id, sessions: this.sessions.size }, 'Session created');
    return session;
  }

  /**
   * Look up a session and re-arm its idle timer.
   * @throws SessionNotFoundError for unknown or expired ids.
   */
  get(id: string): ChatSession {
    const session = this.sessions.get(id);
    if (!session) {
      throw new SessionNotFoundError(id);
    }
    this.touch(id);
    return session;
  }

  has(id: string): boolean {
    return this.sessions.has(id);
  }

  /**
   * Remove a session, cancelling its in-flight request.
   * @returns false when no such session existed.
   */
  delete(id: string): boolean {
    const session = this.sessions.get(id);
    if (!session) return false;

    session.cancel();
    this.sessions.delete(id);
    this.expiry.cancel(id);

    logger.info({ sessionId: id, sessions: this.sessions.size }, 'Session removed');
    return true;
  }

  get size(): number {
    return this.sessions.size;
  }

  /** Drop every session and timer. Used during graceful shutdown. */
  shutdown(): void {
    for (const session of this.sessions.values()) {
      session.cancel();
    }
    this.sessions.clear();
    this.expiry.cancelAll();
  }

  private touch(id: string): void {
    this.expiry.schedule(id, this.settings.sessionIdleTtlMs, () => this.expire(id));
  }

  private expire(id: string): void {
    const session = this.sessions.get(id);
    if (!session) return;

    // A long stream counts as activity
    if (session.busy) {
      this.touch(id);
      return;
    }

    this.sessions.delete(id);
    logger.info({ sessionId: id, sessions: this.sessions.size }, 'Session expired after idle timeout');
  }
}
