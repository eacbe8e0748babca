/**
 * Scanner Module - Public API
 *
 * The detection engine: file filtering, entropy scoring, line evaluation
 * and scan coordination.
 */

export { ScanCoordinator, default } from './scan-coordinator.js';
export type { ScanCoordinatorOptions, ScanResult, SkippedFile } from './scan-coordinator.js';
export { LineEvaluator, truncate, DEFAULT_MAX_MATCH_LENGTH, DEFAULT_MAX_SNIPPET_LENGTH } from './line-evaluator.js';
export type { Finding, LineEvaluatorOptions } from './line-evaluator.js';
export { EntropyScorer, DEFAULT_MIN_LENGTH, DEFAULT_ENTROPY_THRESHOLD } from './entropy-scorer.js';
export type { EntropyScorerOptions } from './entropy-scorer.js';
export { FileFilter } from './file-filter.js';
export type { FileEligibility } from './file-filter.js';
