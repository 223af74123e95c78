import { describe, it, expect } from 'vitest';
import { pino } from 'pino';
import { logger, REDACT_PATHS } from '../logger.js';

function captureLogger() {
  const chunks: string[] = [];
  const dest = {
    write(chunk: string) {
      chunks.push(chunk);
    },
  };

  // Same redaction config as the app logger, writing to our buffer
  const testLogger = pino(
    {
      level: 'info',
      redact: { paths: REDACT_PATHS, censor: '[REDACTED]' },
    },
    dest,
  );

  return { testLogger, chunks };
}

describe('logger', () => {
  it('is a pino logger instance', () => {
    expect(logger).toBeDefined();
    expect(typeof logger.info).toBe('function');
    expect(typeof logger.error).toBe('function');
    expect(typeof logger.warn).toBe('function');
    expect(typeof logger.child).toBe('function');
  });

  it('takes its level from LOG_LEVEL', () => {
    expect(logger.level).toBe('silent');
  });

  it('redacts API key values from logged objects', () => {
    const { testLogger, chunks } = captureLogger();

    testLogger.info({ headers: { authorization: 'Bearer test-secret' } }, 'outbound request');
    testLogger.info({ apiKey: 'test-secret-1' }, 'top level');
    testLogger.info({ config: { apiKey: 'test-secret-2' } }, 'nested');
    testLogger.info({ upstream: { api_key: 'test-secret-3' } }, 'snake case');

    const lines = chunks.map((chunk) => JSON.parse(chunk));
    expect(lines[0].headers.authorization).toBe('[REDACTED]');
    expect(lines[1].apiKey).toBe('[REDACTED]');
    expect(lines[2].config.apiKey).toBe('[REDACTED]');
    expect(lines[3].upstream.api_key).toBe('[REDACTED]');
  });

  it('outputs structured JSON', () => {
    const { testLogger, chunks } = captureLogger();

    testLogger.info({ sessionId: 'abc' }, 'test message');

    const parsed = JSON.parse(chunks[0] ?? '');
    expect(parsed.sessionId).toBe('abc');
    expect(parsed.msg).toBe('test message');
    expect(parsed.level).toBe(30); // info level
  });
});
