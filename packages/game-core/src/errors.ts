// packages/game-core/src/errors.ts
//
// Error taxonomy for the engine. Every failure carries a `code` so callers
// can branch on the case without matching message text.
//
//   • InvalidArgumentError  → bad construction input, bad guess, bad config
//   • InvalidOperationError → attempt not allowed in the current game state
//   • DictionaryError       → word list missing, malformed or exhausted
//   • SecretAccessError     → secret word read outside debug mode

import type { ZodError } from 'zod';

export type WordMasterErrorCode =
  | 'SECRET_WORD_LENGTH'
  | 'SECRET_WORD_NOT_IN_DICTIONARY'
  | 'GUESS_LENGTH_MISMATCH'
  | 'INVALID_REQUEST'
  | 'INVALID_CONFIG'
  | 'ALREADY_SOLVED'
  | 'MAX_ATTEMPTS_REACHED'
  | 'HARD_MODE_VIOLATION'
  | 'DICTIONARY_NOT_FOUND'
  | 'DICTIONARY_UNREADABLE'
  | 'DICTIONARY_MALFORMED'
  | 'DICTIONARY_EXHAUSTED'
  | 'SECRET_WORD_HIDDEN';

export class WordMasterError extends Error {
  readonly code: WordMasterErrorCode;

  constructor(code: WordMasterErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'WordMasterError';
    this.code = code;
  }
}

export class InvalidArgumentError extends WordMasterError {
  constructor(code: WordMasterErrorCode, message: string, options?: ErrorOptions) {
    super(code, message, options);
    this.name = 'InvalidArgumentError';
  }
}

export class InvalidOperationError extends WordMasterError {
  constructor(code: WordMasterErrorCode, message: string, options?: ErrorOptions) {
    super(code, message, options);
    this.name = 'InvalidOperationError';
  }
}

export class DictionaryError extends WordMasterError {
  constructor(code: WordMasterErrorCode, message: string, options?: ErrorOptions) {
    super(code, message, options);
    this.name = 'DictionaryError';
  }
}

export class SecretAccessError extends WordMasterError {
  constructor(message = 'Secret word is only available in debug mode') {
    super('SECRET_WORD_HIDDEN', message);
    this.name = 'SecretAccessError';
  }
}

export function isWordMasterError(error: unknown): error is WordMasterError {
  return error instanceof WordMasterError;
}

/**
 * Flattens zod issues into one line, e.g.
 *   "maxLength: minLength must not exceed maxLength; guess: Required"
 */
export function describeZodError(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}
