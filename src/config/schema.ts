/**
 * Zod schemas for settings validation.
 * These schemas are the single source of truth for config structure.
 * TypeScript types are inferred from these schemas in types.ts.
 */

import { z } from 'zod';

export const DEFAULT_BASE_URL = 'https://api.siliconflow.cn/v1';
export const DEFAULT_MODEL = 'Qwen/Qwen2.5-7B-Instruct';

/** Starter prompts offered by the chat page. */
export const DEFAULT_EXAMPLE_PROMPTS = [
  'Introduce yourself in a few sentences',
  'Explain what machine learning is',
  'Write a short poem about spring',
];

/** Accepts a YAML list, or a `|`-separated string from the environment. */
const PromptListSchema = z.preprocess(
  (value) =>
    typeof value === 'string'
      ? value
          .split('|')
          .map((prompt) => prompt.trim())
          .filter((prompt) => prompt.length > 0)
      : value,
  z.array(z.string().min(1)).max(20),
);

/** Schema for every setting the relay reads. Numbers are coerced from env strings. */
export const SettingsSchema = z
  .object({
    apiKey: z.string().min(1, { message: 'apiKey must not be empty (set LLM_API_KEY)' }),
    baseUrl: z.url({ message: 'baseUrl must be a valid URL' }).default(DEFAULT_BASE_URL),
    model: z.string().min(1, { message: 'model must not be empty' }).default(DEFAULT_MODEL),
    maxTokens: z.coerce.number().int().positive().default(4096),
    temperature: z.coerce.number().min(0).max(2).default(0.7),
    topP: z.coerce.number().gt(0).max(1).optional(),
    requestTimeoutMs: z.coerce.number().int().min(1000).default(60000),
    maxRetries: z.coerce.number().int().min(0).max(10).default(3),
    retryBaseDelayMs: z.coerce.number().int().min(0).default(500),
    retryMaxDelayMs: z.coerce.number().int().min(0).default(8000),
    contextWindowTokens: z.coerce.number().int().positive().default(32768),
    systemPrompt: z.string().min(1).optional(),
    sessionIdleTtlMs: z.coerce.number().int().min(1000).default(1_800_000),
    port: z.coerce.number().int().min(1).max(65535).default(7860),
    logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    examplePrompts: PromptListSchema.default(DEFAULT_EXAMPLE_PROMPTS),
  })
  .refine((settings) => settings.maxTokens < settings.contextWindowTokens, {
    message: 'maxTokens must be smaller than contextWindowTokens',
    path: ['maxTokens'],
  })
  .refine((settings) => settings.retryBaseDelayMs <= settings.retryMaxDelayMs, {
    message: 'retryBaseDelayMs must not exceed retryMaxDelayMs',
    path: ['retryBaseDelayMs'],
  });

/** Environment variable read for each setting. */
export const ENV_KEYS = {
  apiKey: 'LLM_API_KEY',
  baseUrl: 'LLM_BASE_URL',
  model: 'LLM_MODEL',
  maxTokens: 'LLM_MAX_TOKENS',
  temperature: 'LLM_TEMPERATURE',
  topP: 'LLM_TOP_P',
  requestTimeoutMs: 'LLM_TIMEOUT_MS',
  maxRetries: 'LLM_MAX_RETRIES',
  retryBaseDelayMs: 'LLM_RETRY_BASE_MS',
  retryMaxDelayMs: 'LLM_RETRY_MAX_MS',
  contextWindowTokens: 'LLM_CONTEXT_TOKENS',
  systemPrompt: 'LLM_SYSTEM_PROMPT',
  sessionIdleTtlMs: 'SESSION_IDLE_TTL_MS',
  port: 'PORT',
  logLevel: 'LOG_LEVEL',
  examplePrompts: 'LLM_EXAMPLE_PROMPTS',
} as const satisfies Record<keyof z.input<typeof SettingsSchema>, string>;
