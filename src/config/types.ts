/**
 * TypeScript types inferred from Zod schemas.
 * These types are the compile-time companions to the runtime validation schemas.
 */

import { z } from 'zod';
import { SettingsSchema } from './schema.js';

/** Fully validated, frozen relay configuration. */
export type Config = Readonly<z.infer<typeof SettingsSchema>>;

/** Config fields safe to show in the browser. */
export interface PublicConfig {
  model: string;
  baseUrl: string;
  maxTokens: number;
  temperature: number;
  topP: number | null;
  contextWindowTokens: number;
  hasSystemPrompt: boolean;
  examplePrompts: readonly string[];
}

// Re-export schemas for convenience
export { SettingsSchema, ENV_KEYS } from './schema.js';
