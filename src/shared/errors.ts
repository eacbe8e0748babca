/**
 * Error taxonomy for leakguard.
 *
 * Configuration errors are fatal and abort before any file is read.
 * File access errors are recovered by the coordinator (the file is skipped).
 * Timeouts fail the scan closed.
 */

export enum ScanErrorCode {
  CONFIGURATION_ERROR = 'SCAN_CONFIGURATION_ERROR',
  FILE_ACCESS_ERROR = 'SCAN_FILE_ACCESS_ERROR',
  TIMEOUT = 'SCAN_TIMEOUT',
}

/** Base error class for all scan operations. */
export class ScanError extends Error {
  public readonly code: ScanErrorCode;
  public readonly details: Record<string, unknown> | undefined;

  constructor(
    code: ScanErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ScanError';
    this.code = code;
    this.details = details;
  }
}

/** A pattern failed to compile, or a configuration source is invalid. */
export class ConfigurationError extends ScanError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ScanErrorCode.CONFIGURATION_ERROR, message, details);
    this.name = 'ConfigurationError';
  }
}

/** A listed file could not be read as text. */
export class FileAccessError extends ScanError {
  public readonly path: string;

  constructor(path: string, message: string, details?: Record<string, unknown>) {
    super(ScanErrorCode.FILE_ACCESS_ERROR, message, { path, ...details });
    this.name = 'FileAccessError';
    this.path = path;
  }
}

/** The scan ran past its wall-clock budget. */
export class ScanTimeoutError extends ScanError {
  public readonly budgetMs: number;

  constructor(budgetMs: number, elapsedMs: number) {
    super(
      ScanErrorCode.TIMEOUT,
      `Scan exceeded its time budget of ${budgetMs}ms (elapsed ${Math.round(elapsedMs)}ms)`,
      { budgetMs, elapsedMs }
    );
    this.name = 'ScanTimeoutError';
    this.budgetMs = budgetMs;
  }
}

/** Extracts a printable message from an unknown thrown value. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
