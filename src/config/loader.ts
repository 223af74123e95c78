/**
 * Settings resolution and Zod validation.
 * Turns an environment snapshot (optionally layered over a YAML settings
 * file) into a frozen Config, or throws a ConfigError.
 */

import { readFileSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ENV_KEYS, SettingsSchema } from './schema.js';
import { ConfigError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { Config, PublicConfig } from './types.js';

/** Environment snapshot, e.g. process.env. */
export type EnvSnapshot = Readonly<Record<string, string | undefined>>;

let cached: Config | undefined;

/**
 * Resolve settings from an environment snapshot.
 * Pure: the same inputs always yield an equal Config.
 *
 * @param env - Environment variables; empty strings count as unset.
 * @param fileSettings - Values from a settings file. Environment wins on conflict.
 * @throws ConfigError listing every invalid or missing setting.
 */
export function resolveConfig(env: EnvSnapshot, fileSettings: Record<string, unknown> = {}): Config {
  const raw: Record<string, unknown> = { ...fileSettings };

  for (const [field, envKey] of Object.entries(ENV_KEYS)) {
    const value = env[envKey]?.trim();
    if (value) {
      raw[field] = value;
    }
  }

  const result = SettingsSchema.safeParse(raw);

  if (!result.success) {
    throw new ConfigError(`Config validation failed:\n${z.prettifyError(result.error)}`);
  }

  return Object.freeze(result.data);
}

/**
 * Load and parse a YAML settings file.
 *
 * @param path - Absolute or relative path to the YAML file
 * @returns The top-level mapping of the file
 * @throws ConfigError if the file cannot be read, parsed, or is not a mapping
 */
export function loadSettingsFile(path: string): Record<string, unknown> {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Failed to read settings file at "${path}": ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Failed to parse YAML in settings file "${path}": ${message}`);
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }

  const mapping = z.record(z.string(), z.unknown()).safeParse(parsed);
  if (!mapping.success) {
    throw new ConfigError(`Settings file "${path}" must contain a YAML mapping`);
  }

  return mapping.data;
}

/**
 * Resolve the process configuration once and cache it for the process lifetime.
 * Reads CONFIG_PATH (if set) as a YAML settings file under the environment.
 */
export function loadConfig(env: EnvSnapshot = process.env): Config {
  if (cached) {
    return cached;
  }

  const configPath = env['CONFIG_PATH'];
  const fileSettings = configPath ? loadSettingsFile(configPath) : {};
  cached = resolveConfig(env, fileSettings);

  logger.info(
    { configPath: configPath ?? null, model: cached.model, baseUrl: cached.baseUrl },
    'Config loaded successfully',
  );

  return cached;
}

/** Forget the cached configuration (test isolation). */
export function clearConfigCache(): void {
  cached = undefined;
}

/** Strip secrets from a Config for display in the UI. */
export function publicConfig(config: Config): PublicConfig {
  return {
    model: config.model,
    baseUrl: config.baseUrl,
    maxTokens: config.maxTokens,
    temperature: config.temperature,
    topP: config.topP ?? null,
    contextWindowTokens: config.contextWindowTokens,
    hasSystemPrompt: config.systemPrompt !== undefined,
    examplePrompts: config.examplePrompts,
  };
}
