// packages/game-core/src/engine.ts
//
// Binds an EngineConfig to a dictionary and a logger, and accepts untrusted
// request bodies (validated with the @wordmaster/protocol schemas) for
// starting games and submitting attempts.
//
// Example:
//   const engine = createEngine(loadConfig());
//   const game = engine.newGame({ minLength: 5, maxLength: 5 });
//   const res = engine.attempt(game, { guess: 'crane' });

import { attemptReq, attemptRes, newGameReq, type AttemptRes } from '@wordmaster/protocol';

import type { EngineConfig } from './config.js';
import type { WordDictionary } from './dictionary.js';
import { getDefaultDictionary, loadDictionary } from './dictionaryLoader.js';
import { describeZodError, InvalidArgumentError } from './errors.js';
import { WordGame } from './game.js';
import { createLogger, type Logger } from './logger.js';

export interface EngineOverrides {
  dictionary?: WordDictionary;
  logger?: Logger;
}

export interface Engine {
  readonly config: EngineConfig;
  readonly dictionary: WordDictionary;
  readonly logger: Logger;
  /** @throws InvalidArgumentError (INVALID_REQUEST) on a malformed body */
  newGame(body: unknown): WordGame;
  /** @throws InvalidArgumentError (INVALID_REQUEST) on a malformed body */
  attempt(game: WordGame, body: unknown): AttemptRes;
}

export function createEngine(config: EngineConfig, overrides: EngineOverrides = {}): Engine {
  const logger = overrides.logger ?? createLogger(config.logLevel);
  const dictionary =
    overrides.dictionary ??
    (config.dictionaryPath ? loadDictionary(config.dictionaryPath, logger) : getDefaultDictionary());

  return {
    config,
    dictionary,
    logger,

    newGame(body) {
      const parsed = newGameReq.safeParse(body);
      if (!parsed.success) {
        throw new InvalidArgumentError('INVALID_REQUEST', describeZodError(parsed.error));
      }
      const { minLength, maxLength, hardMode, secretWord, seed } = parsed.data;
      return new WordGame({
        minLength,
        maxLength,
        hardMode,
        secretWord,
        seed,
        dictionary,
        debug: config.debug,
        logger,
      });
    },

    attempt(game, body) {
      const parsed = attemptReq.safeParse(body);
      if (!parsed.success) {
        throw new InvalidArgumentError('INVALID_REQUEST', describeZodError(parsed.error));
      }
      const attempt = game.attempt(parsed.data.guess);
      return attemptRes.parse({
        attempt,
        currentAttempt: game.currentAttempt,
        status: game.status,
      });
    },
  };
}
