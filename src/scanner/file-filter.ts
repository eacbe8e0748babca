/**
 * FileFilter - decides whether a changed file is scanned at all.
 */

import type { PatternCatalog } from '../catalog/pattern-catalog.js';
import type { FileSource } from '../sources/file-source.js';
import { SkipReason } from '../shared/types.js';

export type FileEligibility =
  | { eligible: true }
  | { eligible: false; reason: SkipReason.EXCLUDED | SkipReason.MISSING };

export class FileFilter {
  private readonly catalog: PatternCatalog;
  private readonly source: FileSource;

  constructor(catalog: PatternCatalog, source: FileSource) {
    this.catalog = catalog;
    this.source = source;
  }

  /** True when any exclude rule matches the path. */
  isExcluded(filePath: string): boolean {
    return this.catalog.excludePaths.some(rule => rule.regex.test(filePath));
  }

  /**
   * Exclude rules are checked first, so an excluded path is never touched
   * on disk.
   */
  classify(filePath: string, source: FileSource = this.source): FileEligibility {
    if (this.isExcluded(filePath)) {
      return { eligible: false, reason: SkipReason.EXCLUDED };
    }
    if (!source.isRegularFile(filePath)) {
      return { eligible: false, reason: SkipReason.MISSING };
    }
    return { eligible: true };
  }

  isEligible(filePath: string): boolean {
    return this.classify(filePath).eligible;
  }
}
