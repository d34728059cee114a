// packages/game-core/src/dictionary.ts
//
// In-memory word dictionary: the authoritative set of valid words, grouped by
// length so random selection can draw straight from the matching subset.
//
// Words are stored trimmed and upper-cased. Once built, a dictionary never
// changes, so one instance can back any number of games.

import { DictionaryError } from './errors.js';
import { pickIndex, type RandomSource } from './random.js';

/** Canonical form used for storage and comparison. */
export function normalizeWord(word: string): string {
  return word.trim().toUpperCase();
}

export class WordDictionary {
  private readonly words: ReadonlySet<string>;
  private readonly byLength: ReadonlyMap<number, readonly string[]>;

  constructor(words: Iterable<string>) {
    const set = new Set<string>();
    for (const raw of words) {
      const word = normalizeWord(raw);
      if (word) set.add(word);
    }

    const buckets = new Map<number, string[]>();
    for (const word of set) {
      const bucket = buckets.get(word.length);
      if (bucket) bucket.push(word);
      else buckets.set(word.length, [word]);
    }

    const frozen = new Map<number, readonly string[]>();
    for (const [length, bucket] of buckets) frozen.set(length, Object.freeze(bucket));

    this.words = set;
    this.byLength = frozen;
  }

  /** Number of distinct words. */
  get size(): number {
    return this.words.size;
  }

  /** Case-insensitive membership test. Blank input is never a word. */
  isWord(word: string): boolean {
    const normalized = normalizeWord(word);
    return normalized.length > 0 && this.words.has(normalized);
  }

  /** Word lengths present in the dictionary, ascending. */
  lengths(): number[] {
    return [...this.byLength.keys()].sort((a, b) => a - b);
  }

  wordsOfLength(length: number): readonly string[] {
    return this.byLength.get(length) ?? [];
  }

  /**
   * Uniformly selects a word whose length lies in [minLength, maxLength].
   *
   * The matching buckets are treated as one concatenated list and a single
   * index is drawn from it, so every matching word is equally likely.
   *
   * @throws DictionaryError (DICTIONARY_EXHAUSTED) when nothing matches
   */
  getRandomWord(minLength: number, maxLength: number, random: RandomSource = Math.random): string {
    const buckets = this.lengths()
      .filter((length) => length >= minLength && length <= maxLength)
      .map((length) => this.wordsOfLength(length));
    const total = buckets.reduce((sum, bucket) => sum + bucket.length, 0);

    if (total === 0) {
      throw new DictionaryError(
        'DICTIONARY_EXHAUSTED',
        "Dictionary doesn't seem to have any words of the requested parameters",
      );
    }

    let index = pickIndex(total, random);
    for (const bucket of buckets) {
      if (index < bucket.length) return bucket[index];
      index -= bucket.length;
    }
    // Unreachable: index < total by construction.
    throw new DictionaryError('DICTIONARY_EXHAUSTED', 'Random index fell outside the matching words');
  }
}
