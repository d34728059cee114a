// packages/game-core/src/dictionaryLoader.ts
//
// Loads word lists from disk.
//
// Supported formats:
//   • .txt  → one word per line, blank lines ignored
//   • other → JSON array of strings (validated with dictionaryFileSchema)
//
// The bundled list lives in packages/game-core/data/dictionary.json and is
// loaded once, on first use.

import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { dictionaryFileSchema } from '@wordmaster/protocol';

import { WordDictionary } from './dictionary.js';
import { describeZodError, DictionaryError } from './errors.js';
import { log, type Logger } from './logger.js';

export const DEFAULT_DICTIONARY_PATH = fileURLToPath(
  new URL('../data/dictionary.json', import.meta.url),
);

function parseWordList(file: string, raw: string): string[] {
  if (path.extname(file).toLowerCase() === '.txt') {
    return raw.split(/\r?\n/);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new DictionaryError('DICTIONARY_MALFORMED', `Dictionary is not valid JSON: ${file}`, {
      cause: err,
    });
  }

  const parsed = dictionaryFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new DictionaryError(
      'DICTIONARY_MALFORMED',
      `Dictionary has an unexpected shape (${describeZodError(parsed.error)}): ${file}`,
    );
  }
  return parsed.data;
}

/**
 * Reads and validates a word list.
 *
 * @throws DictionaryError (DICTIONARY_NOT_FOUND) if the file does not exist
 * @throws DictionaryError (DICTIONARY_UNREADABLE) if it exists but cannot be
 *         read (a directory, no permission)
 * @throws DictionaryError (DICTIONARY_MALFORMED) if it cannot be parsed or
 *         holds no usable words
 */
export function loadDictionary(file: string, logger: Logger = log): WordDictionary {
  if (!fs.existsSync(file)) {
    throw new DictionaryError('DICTIONARY_NOT_FOUND', `Dictionary file not found: ${file}`);
  }

  let raw: string;
  try {
    raw = fs.readFileSync(file, 'utf8');
  } catch (err) {
    throw new DictionaryError('DICTIONARY_UNREADABLE', `Dictionary file could not be read: ${file}`, {
      cause: err,
    });
  }

  const dictionary = new WordDictionary(parseWordList(file, raw));
  if (dictionary.size === 0) {
    throw new DictionaryError('DICTIONARY_MALFORMED', `Dictionary contains no words: ${file}`);
  }

  logger.info({ path: file, words: dictionary.size }, 'dictionary loaded');
  return dictionary;
}

let defaultDictionary: WordDictionary | null = null;

/** The bundled dictionary, loaded on first call and cached afterwards. */
export function getDefaultDictionary(): WordDictionary {
  defaultDictionary ??= loadDictionary(DEFAULT_DICTIONARY_PATH);
  return defaultDictionary;
}
