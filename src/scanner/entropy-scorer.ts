/**
 * EntropyScorer - cheap randomness proxy for matched substrings.
 *
 * The score is the number of distinct characters, not Shannon entropy.
 * Substrings shorter than `minLength` score 0.
 */

export interface EntropyScorerOptions {
  /** Substrings shorter than this score 0. Default: 16 */
  minLength?: number;
  /** Scores above this are high confidence. Default: 8 */
  threshold?: number;
}

export const DEFAULT_MIN_LENGTH = 16;
export const DEFAULT_ENTROPY_THRESHOLD = 8;

export class EntropyScorer {
  readonly minLength: number;
  readonly threshold: number;

  constructor(options: EntropyScorerOptions = {}) {
    this.minLength = options.minLength ?? DEFAULT_MIN_LENGTH;
    this.threshold = options.threshold ?? DEFAULT_ENTROPY_THRESHOLD;
  }

  score(substring: string): number {
    const chars = Array.from(substring);
    if (chars.length < this.minLength) {
      return 0;
    }
    return new Set(chars).size;
  }

  isHighConfidence(substring: string): boolean {
    return this.score(substring) > this.threshold;
  }
}
