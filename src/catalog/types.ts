/**
 * Catalog Module Types
 *
 * Definitions are the serializable form (config file, registry rows).
 * Compiled entries carry ready-to-use regular expressions.
 */

import { ConfidenceClass } from '../shared/types.js';

export { ConfidenceClass };

// Definitions

export interface SecretPatternDefinition {
  pattern: string;
  category: string;
  confidence: ConfidenceClass;
  /** Extra RegExp flags. Secret patterns are case-sensitive by default. */
  flags?: string;
}

export interface AllowlistPatternDefinition {
  pattern: string;
  description?: string;
}

export interface ExcludePathDefinition {
  pattern: string;
}

export interface CatalogDefinition {
  secretPatterns: SecretPatternDefinition[];
  allowlist: AllowlistPatternDefinition[];
  excludePaths: ExcludePathDefinition[];
}

// Compiled entries

export interface SecretPattern {
  readonly regex: RegExp;
  readonly category: string;
  readonly confidence: ConfidenceClass;
}

export interface AllowlistPattern {
  readonly regex: RegExp;
  readonly description: string | null;
}

export interface ExcludePathRule {
  readonly regex: RegExp;
}

export interface CatalogCounts {
  secretPatterns: number;
  allowlist: number;
  excludePaths: number;
}
