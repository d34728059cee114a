// packages/game-core/src/game.ts
//
// One game of WordMaster: a secret word, a bounded list of attempts, and
// optional hard mode.
//
// State machine:
//   in_progress --attempt(guess)--> in_progress | solved
//   in_progress becomes exhausted once currentAttempt === maxAttempts
//   without a solving guess. solved and exhausted accept no more attempts.
//
// A WordGame is mutable and meant for a single owner; concurrent attempt()
// calls must be serialised by the caller.

import { nanoid } from 'nanoid';
import type { Attempt, GameSnapshot, GameStatus } from '@wordmaster/protocol';

import { normalizeWord, type WordDictionary } from './dictionary.js';
import { getDefaultDictionary } from './dictionaryLoader.js';
import { InvalidArgumentError, InvalidOperationError, SecretAccessError } from './errors.js';
import { log, type Logger } from './logger.js';
import { createSeededRandom, type RandomSource } from './random.js';
import { evaluateAttempt, isSolvedAttempt, lockedIndexes } from './scoring.js';

export interface GameOptions {
  /** Lower bound for the secret word length (inclusive). */
  minLength: number;
  /** Upper bound for the secret word length (inclusive). */
  maxLength: number;
  /** Previously locked letters must be kept in later guesses. */
  hardMode?: boolean;
  /** Explicit secret word; sampled from the dictionary when omitted. */
  secretWord?: string;
  dictionary?: WordDictionary;
  /** Allows reading `secretWord`. */
  debug?: boolean;
  /** Seed for deterministic word selection. Ignored when `random` is given. */
  seed?: string;
  random?: RandomSource;
  logger?: Logger;
}

/**
 * Attempts allowed for a secret word of the given length:
 * one more than the length, plus one in hard mode.
 */
export function getMaxAttemptsForLength(length: number, hardMode = false): number {
  return length + 1 + (hardMode ? 1 : 0);
}

export class WordGame {
  static getMaxAttemptsForLength = getMaxAttemptsForLength;

  readonly id: string;
  readonly hardMode: boolean;
  readonly maxAttempts: number;

  private readonly secret: string;
  private readonly debug: boolean;
  private readonly logger: Logger;
  private readonly history: Attempt[] = [];
  private readonly locked = new Set<number>();
  private isSolved = false;

  /**
   * @throws InvalidArgumentError (SECRET_WORD_LENGTH) if the secret word is
   *         outside [minLength, maxLength]
   * @throws InvalidArgumentError (SECRET_WORD_NOT_IN_DICTIONARY) if it is not
   *         a dictionary word
   * @throws DictionaryError (DICTIONARY_EXHAUSTED) if no word can be sampled
   */
  constructor(options: GameOptions) {
    const { minLength, maxLength, hardMode = false, debug = false } = options;
    const dictionary = options.dictionary ?? getDefaultDictionary();
    const random = options.random ?? (options.seed ? createSeededRandom(options.seed) : Math.random);

    const secret =
      options.secretWord !== undefined
        ? normalizeWord(options.secretWord)
        : dictionary.getRandomWord(minLength, maxLength, random);

    if (secret.length < minLength || secret.length > maxLength) {
      throw new InvalidArgumentError(
        'SECRET_WORD_LENGTH',
        'Secret word must be between minLength and maxLength',
      );
    }
    if (!dictionary.isWord(secret)) {
      throw new InvalidArgumentError(
        'SECRET_WORD_NOT_IN_DICTIONARY',
        'Secret word must be a valid word in the dictionary',
      );
    }

    this.id = nanoid();
    this.secret = secret;
    this.hardMode = hardMode;
    this.debug = debug;
    this.maxAttempts = getMaxAttemptsForLength(secret.length, hardMode);
    this.logger = (options.logger ?? log).child({ gameId: this.id });

    this.logger.debug(
      {
        wordLength: secret.length,
        hardMode,
        maxAttempts: this.maxAttempts,
        ...(debug ? { secretWord: secret } : {}),
      },
      'game created',
    );
  }

  /** Number of attempts recorded so far. */
  get currentAttempt(): number {
    return this.history.length;
  }

  /** Recorded attempts, oldest first. */
  get attempts(): readonly Attempt[] {
    return [...this.history];
  }

  get solved(): boolean {
    return this.isSolved;
  }

  get status(): GameStatus {
    if (this.isSolved) return 'solved';
    if (this.history.length >= this.maxAttempts) return 'exhausted';
    return 'in_progress';
  }

  get remainingAttempts(): number {
    return this.isSolved ? 0 : this.maxAttempts - this.history.length;
  }

  get wordLength(): number {
    return this.secret.length;
  }

  /** Positions confirmed correct by any earlier attempt, ascending. */
  get lockedPositions(): number[] {
    return [...this.locked].sort((a, b) => a - b);
  }

  /** @throws SecretAccessError unless the game was created in debug mode */
  get secretWord(): string {
    if (!this.debug) throw new SecretAccessError();
    return this.secret;
  }

  /**
   * Scores a guess and records it.
   *
   * Nothing is recorded when this throws.
   *
   * @throws InvalidOperationError (ALREADY_SOLVED, MAX_ATTEMPTS_REACHED,
   *         HARD_MODE_VIOLATION)
   * @throws InvalidArgumentError (GUESS_LENGTH_MISMATCH)
   */
  attempt(guess: string): Attempt {
    if (this.isSolved) {
      throw new InvalidOperationError('ALREADY_SOLVED', 'You have already solved this word!');
    }
    if (this.history.length >= this.maxAttempts) {
      throw new InvalidOperationError(
        'MAX_ATTEMPTS_REACHED',
        'You have reached the maximum number of attempts',
      );
    }
    if (guess.length !== this.secret.length) {
      throw new InvalidArgumentError(
        'GUESS_LENGTH_MISMATCH',
        'Word length does not match secret word length',
      );
    }

    const normalized = guess.toUpperCase();
    const result = evaluateAttempt(this.secret, normalized);

    if (this.hardMode) {
      for (const index of this.locked) {
        if (normalized[index] !== this.secret[index]) {
          throw new InvalidOperationError(
            'HARD_MODE_VIOLATION',
            'You cannot change a letter that is in the correct position',
          );
        }
      }
    }

    if (isSolvedAttempt(result)) this.isSolved = true;

    this.history.push(result);
    for (const index of lockedIndexes(result)) this.locked.add(index);

    this.logger.debug({ attempt: this.history.length, solved: this.isSolved }, 'attempt recorded');
    if (this.status !== 'in_progress') {
      this.logger.info({ status: this.status, attempts: this.history.length }, 'game over');
    }

    return result;
  }

  /** Serialisable view of the game. The secret word is only included in debug mode. */
  toSnapshot(): GameSnapshot {
    return {
      gameId: this.id,
      wordLength: this.secret.length,
      hardMode: this.hardMode,
      maxAttempts: this.maxAttempts,
      currentAttempt: this.history.length,
      remainingAttempts: this.remainingAttempts,
      status: this.status,
      solved: this.isSolved,
      attempts: this.history.map((attempt) => attempt.map((r) => ({ ...r }))),
      lockedPositions: this.lockedPositions,
      ...(this.debug ? { secretWord: this.secret } : {}),
    };
  }
}
