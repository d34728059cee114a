// packages/protocol/src/index.ts
//
// Shared protocol definitions for the WordMaster engine and its callers.
// Uses Zod schemas for runtime validation + TypeScript types for compile-time safety.
//
// Defines:
//   - LetterResult: per-letter feedback (letter, letterPresent, positionCorrect).
//   - Attempt:      ordered letter results for one guess.
//   - GameStatus:   "in_progress", "solved", "exhausted".
//   - GameSnapshot: serialisable view of a game.
//   - Request/response shapes for starting a game and submitting attempts.
//   - Dictionary file format (flat list of words).

import { z } from 'zod';

/**
 * LetterResult schema:
 *  - letter          → the guessed character (upper case)
 *  - letterPresent   → the character occurs anywhere in the secret word
 *  - positionCorrect → the character matches the secret word at this index
 */
export const letterResultSchema = z.object({
  letter: z.string().length(1),
  letterPresent: z.boolean(),
  positionCorrect: z.boolean(),
});
export type LetterResult = z.infer<typeof letterResultSchema>;

/** One guess worth of feedback, one entry per position. */
export const attemptSchema = z.array(letterResultSchema).min(1);
export type Attempt = ReadonlyArray<Readonly<LetterResult>>;

/**
 * GameStatus schema:
 *  - "in_progress" → attempts are still accepted
 *  - "solved"      → the secret word was guessed
 *  - "exhausted"   → every attempt was used without solving
 */
export const gameStatusSchema = z.enum(['in_progress', 'solved', 'exhausted']);
export type GameStatus = z.infer<typeof gameStatusSchema>;

/* -------------------------------------------------------------------------- */
/*                                 Snapshots                                  */
/* -------------------------------------------------------------------------- */

/**
 * Snapshot of a game. `secretWord` is only filled in for debug games.
 */
export const gameSnapshotSchema = z.object({
  gameId: z.string(),
  wordLength: z.number().int().min(1),
  hardMode: z.boolean(),
  maxAttempts: z.number().int().min(2),
  currentAttempt: z.number().int().min(0),
  remainingAttempts: z.number().int().min(0),
  status: gameStatusSchema,
  solved: z.boolean(),
  attempts: z.array(attemptSchema),
  lockedPositions: z.array(z.number().int().min(0)),
  secretWord: z.string().optional(),
});
export type GameSnapshot = z.infer<typeof gameSnapshotSchema>;

/* -------------------------------------------------------------------------- */
/*                                  New game                                  */
/* -------------------------------------------------------------------------- */

/**
 * Request to start a new game.
 *  - minLength / maxLength: bounds for the secret word length
 *  - hardMode:              optional, defaults to false
 *  - secretWord:            optional explicit secret word
 *  - seed:                  optional string for deterministic word selection
 */
export const newGameReq = z
  .object({
    minLength: z.number().int().min(1),
    maxLength: z.number().int().min(1),
    hardMode: z.boolean().default(false),
    secretWord: z.string().min(1).optional(),
    seed: z.string().min(1).optional(),
  })
  .refine((req) => req.minLength <= req.maxLength, {
    message: 'minLength must not exceed maxLength',
    path: ['maxLength'],
  });
export type NewGameReq = z.infer<typeof newGameReq>;

/* -------------------------------------------------------------------------- */
/*                                  Attempts                                  */
/* -------------------------------------------------------------------------- */

/**
 * Request to submit an attempt.
 *  - guess: alphabetic characters only (case-insensitive)
 */
export const attemptReq = z.object({
  guess: z.string().regex(/^[A-Za-z]+$/, 'Guess must contain only letters'),
});
export type AttemptReq = z.infer<typeof attemptReq>;

/**
 * Response to an attempt:
 *  - attempt:        per-letter results
 *  - currentAttempt: attempts recorded so far (1-based after the first guess)
 *  - status:         game status after this attempt
 */
export const attemptRes = z.object({
  attempt: attemptSchema,
  currentAttempt: z.number().int().min(1),
  status: gameStatusSchema,
});
export type AttemptRes = z.infer<typeof attemptRes>;

/* -------------------------------------------------------------------------- */
/*                              Dictionary files                              */
/* -------------------------------------------------------------------------- */

/** A dictionary file is a flat JSON array of words. */
export const dictionaryFileSchema = z.array(z.string()).min(1);
export type DictionaryFile = z.infer<typeof dictionaryFileSchema>;
