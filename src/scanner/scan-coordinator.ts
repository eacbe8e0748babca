/**
 * ScanCoordinator - runs the filter and evaluator over a set of changed
 * files and produces the verdict.
 *
 * Findings are reported in input order: file by file, line by line.
 * The result carries no timestamps or identifiers, so the same input always
 * yields an equal result.
 */

import type { PatternCatalog } from '../catalog/pattern-catalog.js';
import { FileAccessError, ScanTimeoutError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { ScanVerdict, SkipReason } from '../shared/types.js';
import { MemoryFileSource, type FileSource, type MemoryFileEntry } from '../sources/file-source.js';
import { EntropyScorer, type EntropyScorerOptions } from './entropy-scorer.js';
import { FileFilter } from './file-filter.js';
import { LineEvaluator, type Finding } from './line-evaluator.js';

const logger = createLogger('scanner');

/** Lines evaluated between two wall-clock checks. */
const DEADLINE_CHECK_INTERVAL = 1000;

// ═══════════════════════════════════════════════════════════════
// INTERFACES
// ═══════════════════════════════════════════════════════════════

export interface ScanCoordinatorOptions {
  /** Entropy scoring settings. */
  entropy?: EntropyScorerOptions;
  /** Display truncation of findings. */
  display?: {
    maxMatchLength?: number;
    maxSnippetLength?: number;
  };
  /** Wall-clock budget for one scan; unbounded when omitted. */
  maxScanTimeMs?: number;
  /** Clock in milliseconds. Default: performance.now */
  now?: () => number;
}

export interface SkippedFile {
  readonly file: string;
  readonly reason: SkipReason;
  readonly detail?: string;
}

/** A file to scan together with the source that holds its content. */
interface ScanCandidate {
  file: string;
  source: FileSource;
}

export interface ScanResult {
  /** Files whose lines were evaluated. */
  filesScanned: number;
  findings: Finding[];
  skipped: SkippedFile[];
  /** FAIL if and only if there is at least one finding. */
  verdict: ScanVerdict;
}

// ═══════════════════════════════════════════════════════════════
// SCAN COORDINATOR
// ═══════════════════════════════════════════════════════════════

export class ScanCoordinator {
  private readonly catalog: PatternCatalog;
  private readonly source: FileSource;
  private readonly filter: FileFilter;
  private readonly evaluator: LineEvaluator;
  private readonly maxScanTimeMs: number | undefined;
  private readonly now: () => number;

  constructor(catalog: PatternCatalog, source: FileSource, options: ScanCoordinatorOptions = {}) {
    this.catalog = catalog;
    this.source = source;
    this.filter = new FileFilter(catalog, source);
    this.evaluator = new LineEvaluator(catalog, {
      scorer: new EntropyScorer(options.entropy),
      maxMatchLength: options.display?.maxMatchLength,
      maxSnippetLength: options.display?.maxSnippetLength,
    });
    this.maxScanTimeMs = options.maxScanTimeMs;
    this.now = options.now ?? (() => performance.now());
  }

  /**
   * Scans in-memory files. Every entry exists, so only exclude rules and
   * binary content cause skips. Entries sharing a path are scanned
   * separately, each with its own content.
   */
  static scanEntries(
    catalog: PatternCatalog,
    entries: MemoryFileEntry[],
    options?: ScanCoordinatorOptions
  ): ScanResult {
    const coordinator = new ScanCoordinator(catalog, new MemoryFileSource(), options);
    return coordinator.scanCandidates(
      entries.map(entry => ({ file: entry.path, source: new MemoryFileSource([entry]) }))
    );
  }

  getCatalog(): PatternCatalog {
    return this.catalog;
  }

  /**
   * Scans the given files in order.
   * @throws ScanTimeoutError when the wall-clock budget runs out
   */
  scan(files: Iterable<string>): ScanResult {
    const candidates: ScanCandidate[] = [];
    for (const file of files) {
      candidates.push({ file, source: this.source });
    }
    return this.scanCandidates(candidates);
  }

  // ════════════════════════════════════════════════════════════
  // PRIVATE METHODS
  // ════════════════════════════════════════════════════════════

  private scanCandidates(candidates: ScanCandidate[]): ScanResult {
    const startTime = this.now();
    const result: ScanResult = {
      filesScanned: 0,
      findings: [],
      skipped: [],
      verdict: ScanVerdict.PASS,
    };

    for (const { file, source } of candidates) {
      this.checkDeadline(startTime);

      const eligibility = this.filter.classify(file, source);
      if (!eligibility.eligible) {
        logger.debug({ file, reason: eligibility.reason }, 'Skipping file');
        result.skipped.push({ file, reason: eligibility.reason });
        continue;
      }

      let lines: string[];
      try {
        lines = source.readLines(file);
      } catch (error) {
        if (!(error instanceof FileAccessError)) throw error;
        logger.warn({ file, error: error.message }, 'Skipping unreadable file');
        result.skipped.push({ file, reason: SkipReason.UNREADABLE, detail: error.message });
        continue;
      }

      result.filesScanned++;
      this.scanLines(file, lines, result.findings, startTime);
    }

    result.verdict = result.findings.length > 0 ? ScanVerdict.FAIL : ScanVerdict.PASS;

    logger.info({
      filesScanned: result.filesScanned,
      filesSkipped: result.skipped.length,
      findings: result.findings.length,
      verdict: result.verdict,
      durationMs: Math.round(this.now() - startTime),
    }, 'Scan complete');

    return result;
  }

  private scanLines(file: string, lines: string[], findings: Finding[], startTime: number): void {
    for (let index = 0; index < lines.length; index++) {
      if (index > 0 && index % DEADLINE_CHECK_INTERVAL === 0) {
        this.checkDeadline(startTime);
      }
      findings.push(...this.evaluator.evaluate(file, index + 1, lines[index]));
    }
  }

  private checkDeadline(startTime: number): void {
    if (this.maxScanTimeMs === undefined) return;

    const elapsed = this.now() - startTime;
    if (elapsed > this.maxScanTimeMs) {
      throw new ScanTimeoutError(this.maxScanTimeMs, elapsed);
    }
  }
}

export default ScanCoordinator;
