/**
 * Shared enums used across the catalog, scanner and reporting layers.
 */

/** How a secret pattern's match is gated before it is reported. */
export enum ConfidenceClass {
  /** Reported on every match, regardless of the match's score. */
  ALWAYS_HIGH = 'ALWAYS_HIGH',
  /** Reported only when the matched text scores above the entropy threshold. */
  ENTROPY_GATED = 'ENTROPY_GATED',
}

/** Final decision of a scan. */
export enum ScanVerdict {
  PASS = 'PASS',
  FAIL = 'FAIL',
}

/** Why a candidate file was not scanned. */
export enum SkipReason {
  EXCLUDED = 'excluded',
  MISSING = 'missing',
  UNREADABLE = 'unreadable',
}

/** Process exit codes of the CLI. */
export enum ExitCode {
  PASS = 0,
  FAIL = 1,
  CONFIGURATION_ERROR = 2,
}
