// packages/protocol/src/__tests__/protocol.test.ts
//
// Unit tests for the shared Zod schemas: defaults, bounds and the
// cross-field refinement on new-game requests.

import {
  attemptReq,
  attemptRes,
  dictionaryFileSchema,
  gameSnapshotSchema,
  letterResultSchema,
  newGameReq,
} from '../index.js';

describe('newGameReq', () => {
  it('defaults hardMode to false', () => {
    expect(newGameReq.parse({ minLength: 5, maxLength: 5 })).toEqual({
      minLength: 5,
      maxLength: 5,
      hardMode: false,
    });
  });

  it('keeps optional fields', () => {
    const req = newGameReq.parse({
      minLength: 3,
      maxLength: 8,
      hardMode: true,
      secretWord: 'crane',
      seed: 'daily',
    });
    expect(req.secretWord).toBe('crane');
    expect(req.seed).toBe('daily');
    expect(req.hardMode).toBe(true);
  });

  it('rejects minLength greater than maxLength', () => {
    const parsed = newGameReq.safeParse({ minLength: 6, maxLength: 5 });
    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      expect(parsed.error.issues[0].path).toEqual(['maxLength']);
      expect(parsed.error.issues[0].message).toBe('minLength must not exceed maxLength');
    }
  });

  it('rejects non-integer and non-positive lengths', () => {
    expect(newGameReq.safeParse({ minLength: 0, maxLength: 5 }).success).toBe(false);
    expect(newGameReq.safeParse({ minLength: 4.5, maxLength: 5 }).success).toBe(false);
  });

  it('rejects an empty secret word', () => {
    expect(newGameReq.safeParse({ minLength: 5, maxLength: 5, secretWord: '' }).success).toBe(
      false,
    );
  });
});

describe('attemptReq', () => {
  it('accepts letters in any case', () => {
    expect(attemptReq.parse({ guess: 'CrAnE' })).toEqual({ guess: 'CrAnE' });
  });

  it('rejects digits, spaces and empty guesses', () => {
    expect(attemptReq.safeParse({ guess: 'cr4ne' }).success).toBe(false);
    expect(attemptReq.safeParse({ guess: 'cr ne' }).success).toBe(false);
    expect(attemptReq.safeParse({ guess: '' }).success).toBe(false);
  });
});

describe('letterResultSchema', () => {
  it('requires a single character', () => {
    const result = { letter: 'A', letterPresent: true, positionCorrect: false };
    expect(letterResultSchema.safeParse(result).success).toBe(true);
    expect(letterResultSchema.safeParse({ ...result, letter: 'AB' }).success).toBe(false);
  });
});

describe('attemptRes', () => {
  it('requires at least one recorded attempt', () => {
    const attempt = [{ letter: 'A', letterPresent: true, positionCorrect: true }];
    expect(attemptRes.safeParse({ attempt, currentAttempt: 1, status: 'solved' }).success).toBe(
      true,
    );
    expect(attemptRes.safeParse({ attempt, currentAttempt: 0, status: 'solved' }).success).toBe(
      false,
    );
  });

  it('rejects unknown statuses', () => {
    const attempt = [{ letter: 'A', letterPresent: false, positionCorrect: false }];
    expect(attemptRes.safeParse({ attempt, currentAttempt: 1, status: 'won' }).success).toBe(
      false,
    );
  });
});

describe('gameSnapshotSchema', () => {
  const snapshot = {
    gameId: 'game-1',
    wordLength: 5,
    hardMode: false,
    maxAttempts: 6,
    currentAttempt: 0,
    remainingAttempts: 6,
    status: 'in_progress',
    solved: false,
    attempts: [],
    lockedPositions: [],
  };

  it('accepts a snapshot without the secret word', () => {
    expect(gameSnapshotSchema.safeParse(snapshot).success).toBe(true);
  });

  it('accepts a snapshot with the secret word', () => {
    expect(gameSnapshotSchema.safeParse({ ...snapshot, secretWord: 'APPLE' }).success).toBe(true);
  });

  it('rejects negative locked positions', () => {
    expect(gameSnapshotSchema.safeParse({ ...snapshot, lockedPositions: [-1] }).success).toBe(
      false,
    );
  });
});

describe('dictionaryFileSchema', () => {
  it('accepts a flat list of words', () => {
    expect(dictionaryFileSchema.parse(['apple', 'crane'])).toEqual(['apple', 'crane']);
  });

  it('rejects empty lists and other shapes', () => {
    expect(dictionaryFileSchema.safeParse([]).success).toBe(false);
    expect(dictionaryFileSchema.safeParse({ words: ['apple'] }).success).toBe(false);
    expect(dictionaryFileSchema.safeParse(['apple', 42]).success).toBe(false);
  });
});
