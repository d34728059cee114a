// packages/game-core/src/scoring.ts
//
// Per-letter feedback for a guess against the secret word.
//
// For each position i with guessed character c:
//   • letterPresent   = the secret word contains c (anywhere)
//   • positionCorrect = secret[i] === c
//
// Rules:
//   • Both words are upper-cased before comparison.
//   • Lengths must match.
//   • Presence is plain containment: a guess with two E's against a secret
//     with one E marks both as present. There is no per-occurrence counting.

import type { Attempt, LetterResult } from '@wordmaster/protocol';

import { InvalidArgumentError } from './errors.js';

/**
 * evaluateAttempt compares a guess against the secret word.
 *
 * @returns a frozen array with one frozen result per position
 *
 * Example:
 *   secret = "APPLE", guess = "PAPER"
 *   → P(present), A(present), P(present, correct), E(present), R(absent)
 */
export function evaluateAttempt(secret: string, guess: string): Attempt {
  const S = secret.toUpperCase();
  const G = guess.toUpperCase();

  if (S.length !== G.length) {
    throw new InvalidArgumentError(
      'GUESS_LENGTH_MISMATCH',
      'Word length does not match secret word length',
    );
  }

  const results: Readonly<LetterResult>[] = [];
  for (let i = 0; i < G.length; i++) {
    const letter = G[i];
    results.push(
      Object.freeze({
        letter,
        letterPresent: S.includes(letter),
        positionCorrect: S[i] === letter,
      }),
    );
  }
  return Object.freeze(results);
}

/** True when every position is correct. */
export function isSolvedAttempt(attempt: Attempt): boolean {
  return attempt.length > 0 && attempt.every((r) => r.positionCorrect);
}

/**
 * Indexes that are both present and correctly placed in this attempt.
 * These become locked positions in hard mode.
 */
export function lockedIndexes(attempt: Attempt): number[] {
  const locked: number[] = [];
  attempt.forEach((r, i) => {
    if (r.letterPresent && r.positionCorrect) locked.push(i);
  });
  return locked;
}
