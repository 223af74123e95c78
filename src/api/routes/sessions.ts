/**
 * Session routes under /api/sessions.
 * Create, inspect, reset and delete chat sessions, and submit user turns
 * as a JSON request/response or as a server-sent event stream.
 */

import { Hono } from 'hono';
import { streamSSE } from 'hono/streaming';
import { z } from 'zod';
import { logger } from '../../shared/logger.js';
import { RequestValidationError, SessionNotFoundError } from '../../shared/errors.js';
import { errorBody, statusForKind } from '../middleware/error-handler.js';
import type { Context } from 'hono';
import type { SessionStore } from '../../session/store.js';
import type { UiEvent } from '../../session/submission.js';

export const MessageRequestSchema = z.object({
  content: z.string().refine((text) => text.trim().length > 0, 'content must not be blank'),
  stream: z.boolean().default(false),
  keepPartial: z.boolean().default(false),
});

export type MessageRequest = z.infer<typeof MessageRequestSchema>;

async function readMessageRequest(c: Context): Promise<MessageRequest> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new RequestValidationError('Request body must be valid JSON');
  }

  const result = MessageRequestSchema.safeParse(body);
  if (!result.success) {
    throw new RequestValidationError(z.prettifyError(result.error));
  }
  return result.data;
}

/**
 * Create session routes with injected dependencies.
 * @param sessions - Session store shared by every route.
 * @returns Hono app mounted at /api/sessions.
 */
export function createSessionRoutes(sessions: SessionStore) {
  const app = new Hono();

  app.post('/', (c) => {
    const session = sessions.create();
    return c.json({ id: session.id }, 201);
  });

  app.get('/:id', (c) => {
    const session = sessions.get(c.req.param('id'));
    return c.json({
      id: session.id,
      busy: session.busy,
      phase: session.phase,
      messages: session.snapshot(),
    });
  });

  app.delete('/:id', (c) => {
    const id = c.req.param('id');
    if (!sessions.delete(id)) {
      throw new SessionNotFoundError(id);
    }
    return c.body(null, 204);
  });

  app.post('/:id/messages', async (c) => {
    const session = sessions.get(c.req.param('id'));
    const body = await readMessageRequest(c);

    // Busy sessions throw here, before any response is started.
    // The request signal aborts when the client goes away, in either mode.
    const submission = session.submit(body.content, {
      stream: body.stream,
      keepPartial: body.keepPartial,
      signal: c.req.raw.signal,
    });

    logger.info(
      { sessionId: session.id, stream: body.stream, length: body.content.length },
      `User turn submitted${body.stream ? ' (streaming)' : ''}`,
    );

    if (body.stream) {
      return streamSSE(
        c,
        async (stream) => {
          // Client disconnect cancels the request cycle
          stream.onAbort(() => {
            logger.debug({ sessionId: session.id }, 'Client disconnected, cancelling request cycle');
            submission.cancel().catch((err: unknown) => {
              logger.error({ err, sessionId: session.id }, 'Failed to cancel submission');
            });
          });

          for await (const event of submission) {
            await stream.writeSSE({ event: event.type, data: JSON.stringify(event) });
          }
        },
        async (err) => {
          logger.error({ err, sessionId: session.id }, 'Event stream failed');
        },
      );
    }

    let truncated: Extract<UiEvent, { type: 'truncated' }> | null = null;

    for await (const event of submission) {
      switch (event.type) {
        case 'truncated':
          truncated = event;
          break;
        case 'completed':
          return c.json({
            text: event.text,
            finishReason: event.finishReason,
            usage: event.usage ?? null,
            truncated: truncated !== null,
            dropped: truncated?.dropped ?? 0,
          });
        case 'failed':
          return c.json(errorBody(event.error), statusForKind(event.error.kind));
        case 'partial':
          break;
      }
    }

    throw new Error('Submission ended without a completed or failed event');
  });

  app.post('/:id/cancel', (c) => {
    const session = sessions.get(c.req.param('id'));
    return c.json({ cancelled: session.cancel() });
  });

  app.delete('/:id/messages', (c) => {
    const session = sessions.get(c.req.param('id'));
    session.reset();
    return c.body(null, 204);
  });

  return app;
}
