/**
 * PatternCatalog - immutable, ordered registry of detection rules.
 *
 * Every regular expression is compiled when the catalog is built. A single
 * malformed expression fails the whole catalog with a ConfigurationError.
 */

import { ConfigurationError, errorMessage } from '../shared/errors.js';
import type {
  AllowlistPattern,
  CatalogCounts,
  CatalogDefinition,
  ExcludePathRule,
  SecretPattern,
} from './types.js';

type RuleKind = 'secretPatterns' | 'allowlist' | 'excludePaths';

interface InvalidRule {
  kind: RuleKind;
  index: number;
  pattern: string;
  reason: string;
}

/**
 * Drops the stateful flags so that `test`/`exec` never depend on a previous
 * call's `lastIndex`.
 */
function statelessFlags(flags: string): string {
  return flags.replace(/[gy]/g, '');
}

export class PatternCatalog {
  readonly secretPatterns: readonly SecretPattern[];
  readonly allowlist: readonly AllowlistPattern[];
  readonly excludePaths: readonly ExcludePathRule[];

  private readonly definition: CatalogDefinition;

  private constructor(
    definition: CatalogDefinition,
    secretPatterns: SecretPattern[],
    allowlist: AllowlistPattern[],
    excludePaths: ExcludePathRule[]
  ) {
    this.definition = definition;
    this.secretPatterns = Object.freeze(secretPatterns);
    this.allowlist = Object.freeze(allowlist);
    this.excludePaths = Object.freeze(excludePaths);
    Object.freeze(this);
  }

  /**
   * Compiles a catalog definition.
   * @throws ConfigurationError listing every pattern that failed to compile
   */
  static compile(definition: CatalogDefinition): PatternCatalog {
    const invalid: InvalidRule[] = [];

    const compileRule = (kind: RuleKind, index: number, pattern: string, flags: string): RegExp | null => {
      try {
        return new RegExp(pattern, statelessFlags(flags));
      } catch (error) {
        invalid.push({ kind, index, pattern, reason: errorMessage(error) });
        return null;
      }
    };

    const secretPatterns: SecretPattern[] = [];
    definition.secretPatterns.forEach((def, index) => {
      const regex = compileRule('secretPatterns', index, def.pattern, def.flags ?? '');
      if (regex) {
        secretPatterns.push(Object.freeze({ regex, category: def.category, confidence: def.confidence }));
      }
    });

    const allowlist: AllowlistPattern[] = [];
    definition.allowlist.forEach((def, index) => {
      // Allowlist matching is always case-insensitive.
      const regex = compileRule('allowlist', index, def.pattern, 'i');
      if (regex) {
        allowlist.push(Object.freeze({ regex, description: def.description ?? null }));
      }
    });

    const excludePaths: ExcludePathRule[] = [];
    definition.excludePaths.forEach((def, index) => {
      const regex = compileRule('excludePaths', index, def.pattern, '');
      if (regex) {
        excludePaths.push(Object.freeze({ regex }));
      }
    });

    if (invalid.length > 0) {
      const summary = invalid
        .map(rule => `${rule.kind}[${rule.index}] /${rule.pattern}/: ${rule.reason}`)
        .join('; ');
      throw new ConfigurationError(`Invalid pattern(s) in catalog: ${summary}`, { invalid });
    }

    return new PatternCatalog(cloneDefinition(definition), secretPatterns, allowlist, excludePaths);
  }

  /** A catalog with no rules at all. */
  static empty(): PatternCatalog {
    return PatternCatalog.compile({ secretPatterns: [], allowlist: [], excludePaths: [] });
  }

  /**
   * Returns a new catalog with the additions appended after the existing
   * entries of each list. This catalog is left untouched.
   */
  extend(additions: Partial<CatalogDefinition>): PatternCatalog {
    return PatternCatalog.compile({
      secretPatterns: [...this.definition.secretPatterns, ...(additions.secretPatterns ?? [])],
      allowlist: [...this.definition.allowlist, ...(additions.allowlist ?? [])],
      excludePaths: [...this.definition.excludePaths, ...(additions.excludePaths ?? [])],
    });
  }

  /** The serializable form this catalog was compiled from. */
  toDefinition(): CatalogDefinition {
    return cloneDefinition(this.definition);
  }

  getCounts(): CatalogCounts {
    return {
      secretPatterns: this.secretPatterns.length,
      allowlist: this.allowlist.length,
      excludePaths: this.excludePaths.length,
    };
  }
}

function cloneDefinition(definition: CatalogDefinition): CatalogDefinition {
  return {
    secretPatterns: definition.secretPatterns.map(def => ({ ...def })),
    allowlist: definition.allowlist.map(def => ({ ...def })),
    excludePaths: definition.excludePaths.map(def => ({ ...def })),
  };
}
