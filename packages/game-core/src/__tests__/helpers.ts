// packages/game-core/src/__tests__/helpers.ts
//
// Shared test helpers.

import { fileURLToPath } from 'node:url';

import { isWordMasterError, type WordMasterErrorCode } from '../errors.js';

/** Absolute path of a file under __tests__/fixtures. */
export const fixture = (name: string): string =>
  fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

/**
 * Runs fn and returns the code of the WordMasterError it threw.
 * Rethrows anything else; fails the test if nothing was thrown.
 */
export function errorCode(fn: () => unknown): WordMasterErrorCode {
  try {
    fn();
  } catch (err) {
    if (isWordMasterError(err)) return err.code;
    throw err;
  }
  throw new Error('expected function to throw');
}

/** Random source that replays the given values in order. */
export function sequence(...values: number[]): () => number {
  let i = 0;
  return () => values[i++ % values.length];
}
