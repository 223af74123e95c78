import { useEffect, useRef, useState } from 'react';
import { useQuery, useQueryClient } from '@tanstack/react-query';
import { api, RelayError } from '../lib/api.js';
import { queryKeys } from '../lib/queryKeys.js';
import type { ErrorPayload, UiEvent } from '../lib/api.js';
import styles from './Chat.module.css';

interface PendingTurn {
  userText: string;
  partialText: string;
}

interface Failure {
  error: ErrorPayload;
  /** User text to resend from the Retry button. */
  retryText: string;
}

function toPayload(err: unknown): ErrorPayload {
  if (err instanceof RelayError) return err.payload;
  const message = err instanceof Error ? err.message : String(err);
  return { kind: 'network_failure', message, statusCode: null, retrySuggested: true };
}

export default function Chat() {
  const queryClient = useQueryClient();
  const [sessionId, setSessionId] = useState<string | null>(null);
  const [sessionError, setSessionError] = useState<string | null>(null);
  const [input, setInput] = useState('');
  const [streaming, setStreaming] = useState(true);
  const [keepPartial, setKeepPartial] = useState(false);
  const [pending, setPending] = useState<PendingTurn | null>(null);
  const [failure, setFailure] = useState<Failure | null>(null);
  const [notice, setNotice] = useState<string | null>(null);
  const creating = useRef(false);

  // One session per page load
  useEffect(() => {
    if (creating.current) return;
    creating.current = true;
    api
      .createSession()
      .then(({ id }) => setSessionId(id))
      .catch((err: unknown) => setSessionError(toPayload(err).message));
  }, []);

  const configQuery = useQuery({
    queryKey: queryKeys.config,
    queryFn: api.getConfig,
    staleTime: Infinity,
  });

  const sessionQuery = useQuery({
    queryKey: queryKeys.session(sessionId ?? ''),
    queryFn: () => api.getSession(sessionId ?? ''),
    enabled: sessionId !== null,
  });

  const refresh = async () => {
    if (sessionId) {
      await queryClient.invalidateQueries({ queryKey: queryKeys.session(sessionId) });
    }
  };

  const handleEvent = (userText: string, event: UiEvent) => {
    switch (event.type) {
      case 'truncated':
        setNotice(`${event.dropped} older message(s) were left out to fit the context window.`);
        break;
      case 'partial':
        setPending({ userText, partialText: event.text });
        break;
      case 'completed':
        if (event.finishReason === 'length') {
          setNotice('The reply was cut off at the token limit.');
        }
        break;
      case 'failed':
        setFailure({ error: event.error, retryText: userText });
        break;
    }
  };

  const send = async (text: string) => {
    if (!sessionId || !text.trim() || pending) return;

    setPending({ userText: text, partialText: '' });
    setFailure(null);
    setNotice(null);
    setInput('');

    try {
      if (streaming) {
        await api.streamMessage(sessionId, text, (event) => handleEvent(text, event), { keepPartial });
      } else {
        const reply = await api.sendMessage(sessionId, text, { keepPartial });
        if (reply.finishReason === 'length') {
          setNotice('The reply was cut off at the token limit.');
        } else if (reply.truncated) {
          setNotice(`${reply.dropped} older message(s) were left out to fit the context window.`);
        }
      }
    } catch (err) {
      setFailure({ error: toPayload(err), retryText: text });
    } finally {
      setPending(null);
      await refresh();
    }
  };

  const stop = async () => {
    if (!sessionId) return;
    try {
      await api.cancel(sessionId);
    } catch (err) {
      setFailure({ error: toPayload(err), retryText: pending?.userText ?? '' });
    }
  };

  const reset = async () => {
    if (!sessionId) return;
    try {
      await api.resetSession(sessionId);
      setFailure(null);
      setNotice(null);
    } catch (err) {
      setFailure({ error: toPayload(err), retryText: '' });
    }
    await refresh();
  };

  if (sessionError) {
    return <div className={styles.errorBanner}>Could not start a chat session: {sessionError}</div>;
  }

  const examplePrompts = configQuery.data?.examplePrompts ?? [];
  const messages = (sessionQuery.data?.messages ?? []).filter((message) => message.role !== 'system');
  // The relay already holds the pending user turn; show it from local state until the cycle ends
  const history = pending ? messages.slice(0, -1) : messages;

  return (
    <div className={styles.container}>
      <h1 className={styles.pageTitle}>Chat</h1>

      <section className={styles.transcript}>
        {history.length === 0 && !pending && <div className={styles.empty}>Say something to start.</div>}
        {history.map((message, index) => (
          <div key={index} className={message.role === 'user' ? styles.userTurn : styles.assistantTurn}>
            <pre>{message.content}</pre>
          </div>
        ))}
        {pending && (
          <>
            <div className={styles.userTurn}>
              <pre>{pending.userText}</pre>
            </div>
            <div className={styles.assistantTurn}>
              <pre>{pending.partialText || 'Thinking...'}</pre>
            </div>
          </>
        )}
      </section>

      {notice && <div className={styles.notice}>{notice}</div>}

      {failure && (
        <div className={styles.errorBanner}>
          <div>
            <strong>{failure.error.kind}</strong>: {failure.error.message}
          </div>
          {failure.error.partialText && (
            <pre className={styles.partialText}>{failure.error.partialText}</pre>
          )}
          {failure.error.retrySuggested && failure.retryText && (
            <button className={styles.retryButton} onClick={() => void send(failure.retryText)}>
              Retry
            </button>
          )}
        </div>
      )}

      <section className={styles.inputSection}>
        <div className={styles.controls}>
          <label className={styles.checkboxLabel}>
            <input
              type="checkbox"
              checked={streaming}
              onChange={(e) => setStreaming(e.target.checked)}
              disabled={pending !== null}
            />
            Stream
          </label>
          <label className={styles.checkboxLabel}>
            <input
              type="checkbox"
              checked={keepPartial}
              onChange={(e) => setKeepPartial(e.target.checked)}
              disabled={pending !== null}
            />
            Keep partial replies
          </label>
        </div>

        {examplePrompts.length > 0 && (
          <div className={styles.examples}>
            <span className={styles.examplesLabel}>Try:</span>
            {examplePrompts.map((prompt) => (
              <button
                key={prompt}
                className={styles.exampleButton}
                onClick={() => setInput(prompt)}
                disabled={pending !== null || sessionId === null}
              >
                {prompt}
              </button>
            ))}
          </div>
        )}

        <textarea
          className={styles.promptInput}
          placeholder="Enter your message..."
          value={input}
          onChange={(e) => setInput(e.target.value)}
          disabled={pending !== null || sessionId === null}
          rows={4}
        />

        <div className={styles.buttons}>
          <button
            className={styles.sendButton}
            onClick={() => void send(input)}
            disabled={pending !== null || sessionId === null || !input.trim()}
          >
            {pending ? 'Sending...' : 'Send'}
          </button>
          <button className={styles.stopButton} onClick={() => void stop()} disabled={pending === null}>
            Stop
          </button>
          <button className={styles.resetButton} onClick={() => void reset()} disabled={pending !== null}>
            Reset
          </button>
        </div>
      </section>
    </div>
  );
}
