// packages/game-core/src/config.ts
//
// Environment-derived engine configuration.
//
// Sources, lowest precedence first:
//   1. built-in defaults
//   2. an optional .env file (parsed with dotenv, never written into process.env)
//   3. the supplied environment (process.env by default)
//
// Variables:
//   • WORDMASTER_DEBUG      → "true"/"1" lets games reveal their secret word
//   • WORDMASTER_DICTIONARY → path of the word list (.json or .txt)
//   • LOG_LEVEL             → pino level, defaults to "info"

import fs from 'node:fs';
import { parse } from 'dotenv';
import { z } from 'zod';

import { describeZodError, InvalidArgumentError } from './errors.js';
import { logLevelSchema, type LogLevel } from './logger.js';

const envSchema = z.object({
  WORDMASTER_DEBUG: z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((v) => v === 'true' || v === '1'),
  WORDMASTER_DICTIONARY: z.string().min(1).optional(),
  LOG_LEVEL: logLevelSchema.default('info'),
});

export interface EngineConfig {
  /** Games created from this config expose their secret word. */
  debug: boolean;
  /** Word list location; the bundled dictionary is used when absent. */
  dictionaryPath?: string;
  logLevel: LogLevel;
}

export interface LoadConfigOptions {
  env?: Record<string, string | undefined>;
  envFile?: string;
}

function readEnvFile(path: string): Record<string, string> {
  if (!fs.existsSync(path)) {
    throw new InvalidArgumentError('INVALID_CONFIG', `Env file not found: ${path}`);
  }
  return parse(fs.readFileSync(path, 'utf8'));
}

/**
 * Builds an EngineConfig from the environment (and optionally a .env file).
 *
 * @throws InvalidArgumentError (INVALID_CONFIG) on an unreadable env file or
 *         a value that fails validation
 */
export function loadConfig(options: LoadConfigOptions = {}): EngineConfig {
  const { env = process.env, envFile } = options;
  const fromFile = envFile ? readEnvFile(envFile) : {};

  const parsed = envSchema.safeParse({ ...fromFile, ...definedOnly(env) });
  if (!parsed.success) {
    throw new InvalidArgumentError(
      'INVALID_CONFIG',
      `Invalid configuration: ${describeZodError(parsed.error)}`,
    );
  }

  const { WORDMASTER_DEBUG, WORDMASTER_DICTIONARY, LOG_LEVEL } = parsed.data;
  return {
    debug: WORDMASTER_DEBUG,
    dictionaryPath: WORDMASTER_DICTIONARY,
    logLevel: LOG_LEVEL,
  };
}

// Unset keys in `env` must not mask values from the .env file.
function definedOnly(env: Record<string, string | undefined>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}
