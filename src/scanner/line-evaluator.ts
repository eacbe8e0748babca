/**
 * LineEvaluator - decides whether a single line leaks a secret.
 *
 * Order matters:
 * 1. A line matching any allowlist pattern yields nothing.
 * 2. Secret patterns are tried in catalog order; each match is gated by
 *    its confidence class or its entropy score.
 * 3. The first match that passes the gate is the only finding for the line.
 */

import type { PatternCatalog } from '../catalog/pattern-catalog.js';
import { ConfidenceClass } from '../shared/types.js';
import { EntropyScorer } from './entropy-scorer.js';

/** One suspected secret at a file and line. */
export interface Finding {
  readonly file: string;
  /** 1-based line number. */
  readonly line: number;
  /** Category of the secret pattern that matched. */
  readonly category: string;
  readonly confidence: ConfidenceClass;
  /** Distinct-character score of the full match. */
  readonly score: number;
  /** Matched text, truncated for display. */
  readonly match: string;
  /** Start of the originating line, truncated for display. */
  readonly snippet: string;
}

export interface LineEvaluatorOptions {
  scorer?: EntropyScorer;
  /** Default: 60 */
  maxMatchLength?: number;
  /** Default: 100 */
  maxSnippetLength?: number;
}

export const DEFAULT_MAX_MATCH_LENGTH = 60;
export const DEFAULT_MAX_SNIPPET_LENGTH = 100;

/** Cuts text to `max` code points, marking the cut with `...`. */
export function truncate(text: string, max: number): string {
  const chars = Array.from(text);
  return chars.length > max ? `${chars.slice(0, max).join('')}...` : text;
}

export class LineEvaluator {
  private readonly catalog: PatternCatalog;
  private readonly scorer: EntropyScorer;
  private readonly maxMatchLength: number;
  private readonly maxSnippetLength: number;

  constructor(catalog: PatternCatalog, options: LineEvaluatorOptions = {}) {
    this.catalog = catalog;
    this.scorer = options.scorer ?? new EntropyScorer();
    this.maxMatchLength = options.maxMatchLength ?? DEFAULT_MAX_MATCH_LENGTH;
    this.maxSnippetLength = options.maxSnippetLength ?? DEFAULT_MAX_SNIPPET_LENGTH;
  }

  isAllowlisted(lineText: string): boolean {
    return this.catalog.allowlist.some(entry => entry.regex.test(lineText));
  }

  evaluate(file: string, lineNumber: number, lineText: string): Finding[] {
    if (lineText.length === 0 || this.isAllowlisted(lineText)) {
      return [];
    }

    for (const pattern of this.catalog.secretPatterns) {
      const match = pattern.regex.exec(lineText);
      if (match === null) continue;

      const matchedText = match[0];
      const score = this.scorer.score(matchedText);
      if (pattern.confidence !== ConfidenceClass.ALWAYS_HIGH && score <= this.scorer.threshold) {
        continue;
      }

      return [
        Object.freeze({
          file,
          line: lineNumber,
          category: pattern.category,
          confidence: pattern.confidence,
          score,
          match: truncate(matchedText, this.maxMatchLength),
          snippet: truncate(lineText, this.maxSnippetLength),
        }),
      ];
    }

    return [];
  }
}
