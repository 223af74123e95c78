import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFileSync, mkdtempSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { clearConfigCache, loadConfig, loadSettingsFile, publicConfig, resolveConfig } from '../loader.js';
import { DEFAULT_BASE_URL, DEFAULT_EXAMPLE_PROMPTS, DEFAULT_MODEL } from '../schema.js';
import { ConfigError } from '../../shared/errors.js';

describe('resolveConfig', () => {
  it('fills defaults around the credential', () => {
    const config = resolveConfig({ LLM_API_KEY: 'test-secret' });

    expect(config).toEqual({
      apiKey: 'test-secret',
      baseUrl: DEFAULT_BASE_URL,
      model: DEFAULT_MODEL,
      maxTokens: 4096,
      temperature: 0.7,
      requestTimeoutMs: 60000,
      maxRetries: 3,
      retryBaseDelayMs: 500,
      retryMaxDelayMs: 8000,
      contextWindowTokens: 32768,
      sessionIdleTtlMs: 1_800_000,
      port: 7860,
      logLevel: 'info',
      examplePrompts: DEFAULT_EXAMPLE_PROMPTS,
    });
    expect(config.topP).toBeUndefined();
    expect(config.systemPrompt).toBeUndefined();
  });

  it('returns a frozen config', () => {
    const config = resolveConfig({ LLM_API_KEY: 'test-secret' });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('is deterministic for the same snapshot', () => {
    const env = { LLM_API_KEY: 'test-secret', LLM_MODEL: 'test-model', LLM_TOP_P: '0.9' };
    expect(resolveConfig(env)).toEqual(resolveConfig(env));
  });

  it('coerces numeric environment values', () => {
    const config = resolveConfig({
      LLM_API_KEY: 'test-secret',
      LLM_MAX_TOKENS: '2048',
      LLM_TEMPERATURE: '0.2',
      LLM_TOP_P: '0.95',
      LLM_TIMEOUT_MS: '5000',
      LLM_MAX_RETRIES: '0',
      PORT: '8080',
    });

    expect(config.maxTokens).toBe(2048);
    expect(config.temperature).toBe(0.2);
    expect(config.topP).toBe(0.95);
    expect(config.requestTimeoutMs).toBe(5000);
    expect(config.maxRetries).toBe(0);
    expect(config.port).toBe(8080);
  });

  it('treats empty and blank values as unset', () => {
    const config = resolveConfig({ LLM_API_KEY: 'test-secret', LLM_MODEL: '', LLM_BASE_URL: '   ' });

    expect(config.model).toBe(DEFAULT_MODEL);
    expect(config.baseUrl).toBe(DEFAULT_BASE_URL);
  });

  it('lets the environment override file settings', () => {
    const config = resolveConfig(
      { LLM_MODEL: 'env-model' },
      { apiKey: 'file-secret', model: 'file-model', maxTokens: 1024 },
    );

    expect(config.apiKey).toBe('file-secret');
    expect(config.model).toBe('env-model');
    expect(config.maxTokens).toBe(1024);
  });

  it('reads example prompts as a list from a file', () => {
    const config = resolveConfig({ LLM_API_KEY: 'test-secret' }, { examplePrompts: ['Say hi', 'Tell a joke'] });
    expect(config.examplePrompts).toEqual(['Say hi', 'Tell a joke']);
  });

  it('splits example prompts from the environment on |', () => {
    const config = resolveConfig({ LLM_API_KEY: 'test-secret', LLM_EXAMPLE_PROMPTS: 'Say hi | Tell a joke||' });
    expect(config.examplePrompts).toEqual(['Say hi', 'Tell a joke']);
  });

  it('throws ConfigError when the credential is missing', () => {
    expect(() => resolveConfig({})).toThrow(ConfigError);
    expect(() => resolveConfig({})).toThrow(/apiKey/);
  });

  it('rejects out-of-range values', () => {
    expect(() => resolveConfig({ LLM_API_KEY: 'test-secret', LLM_TEMPERATURE: '3' })).toThrow(/temperature/);
    expect(() => resolveConfig({ LLM_API_KEY: 'test-secret', LLM_MAX_TOKENS: '-1' })).toThrow(/maxTokens/);
    expect(() => resolveConfig({ LLM_API_KEY: 'test-secret', LLM_TOP_P: '0' })).toThrow(/topP/);
    expect(() => resolveConfig({ LLM_API_KEY: 'test-secret', LLM_BASE_URL: 'not a url' })).toThrow(/baseUrl/);
  });

  it('rejects non-numeric numbers', () => {
    expect(() => resolveConfig({ LLM_API_KEY: 'test-secret', LLM_MAX_RETRIES: 'many' })).toThrow(/maxRetries/);
  });

  it('requires maxTokens to leave room in the context window', () => {
    expect(() =>
      resolveConfig({ LLM_API_KEY: 'test-secret', LLM_MAX_TOKENS: '8192', LLM_CONTEXT_TOKENS: '8192' }),
    ).toThrow(/maxTokens must be smaller than contextWindowTokens/);
  });

  it('reports every offending field at once', () => {
    try {
      resolveConfig({ LLM_TEMPERATURE: '9', LLM_MAX_RETRIES: '99' });
      expect.unreachable('resolveConfig should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      const message = err instanceof Error ? err.message : '';
      expect(message).toContain('apiKey');
      expect(message).toContain('temperature');
      expect(message).toContain('maxRetries');
    }
  });
});

describe('settings files', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'chat-relay-config-'));
    clearConfigCache();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    clearConfigCache();
  });

  function writeSettings(content: string): string {
    const path = join(dir, 'settings.yaml');
    writeFileSync(path, content, 'utf-8');
    return path;
  }

  it('reads a YAML mapping', () => {
    const path = writeSettings('model: file-model\nmaxTokens: 1024\n');
    expect(loadSettingsFile(path)).toEqual({ model: 'file-model', maxTokens: 1024 });
  });

  it('returns an empty mapping for an empty file', () => {
    const path = writeSettings('');
    expect(loadSettingsFile(path)).toEqual({});
  });

  it('throws ConfigError for a missing file', () => {
    expect(() => loadSettingsFile(join(dir, 'absent.yaml'))).toThrow(/Failed to read settings file/);
  });

  it('throws ConfigError for invalid YAML', () => {
    const path = writeSettings('model: [unclosed\n');
    expect(() => loadSettingsFile(path)).toThrow(/Failed to parse YAML/);
  });

  it('throws ConfigError when the file is not a mapping', () => {
    const path = writeSettings('- one\n- two\n');
    expect(() => loadSettingsFile(path)).toThrow(/must contain a YAML mapping/);
  });

  it('loadConfig layers the environment over CONFIG_PATH and caches the result', () => {
    const path = writeSettings('model: file-model\ntemperature: 0.1\n');

    const config = loadConfig({ CONFIG_PATH: path, LLM_API_KEY: 'test-secret', LLM_TEMPERATURE: '0.3' });
    expect(config.model).toBe('file-model');
    expect(config.temperature).toBe(0.3);

    const again = loadConfig({ LLM_API_KEY: 'other-secret' });
    expect(again).toBe(config);
  });
});

describe('publicConfig', () => {
  it('omits the credential', () => {
    const view = publicConfig(resolveConfig({ LLM_API_KEY: 'test-secret', LLM_SYSTEM_PROMPT: 'Be brief.' }));

    expect(view).toEqual({
      model: DEFAULT_MODEL,
      baseUrl: DEFAULT_BASE_URL,
      maxTokens: 4096,
      temperature: 0.7,
      topP: null,
      contextWindowTokens: 32768,
      hasSystemPrompt: true,
      examplePrompts: DEFAULT_EXAMPLE_PROMPTS,
    });
    expect(JSON.stringify(view)).not.toContain('test-secret');
  });
});
