// packages/game-core/src/index.ts
//
// Entry point for the game-core package.
// Re-exports the engine so consumers can import from one place.
//
// Includes:
//   • dictionary.ts       → WordDictionary (membership, random word by length)
//   • dictionaryLoader.ts → loadDictionary, getDefaultDictionary
//   • scoring.ts          → evaluateAttempt, isSolvedAttempt
//   • game.ts             → WordGame, getMaxAttemptsForLength
//   • engine.ts           → createEngine (config-bound factory)
//   • config.ts           → loadConfig
//   • errors.ts           → error classes and codes
//
// Example usage:
//   import { WordGame, loadDictionary } from '@wordmaster/game-core';

export * from './dictionary.js';
export * from './dictionaryLoader.js';
export * from './scoring.js';
export * from './game.js';
export * from './engine.js';
export * from './config.js';
export * from './errors.js';
export * from './random.js';
export { createLogger, log, logLevelSchema } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
export type { Attempt, GameSnapshot, GameStatus, LetterResult } from '@wordmaster/protocol';
