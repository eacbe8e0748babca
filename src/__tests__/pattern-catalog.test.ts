/**
 * Unit tests for PatternCatalog and the built-in catalog
 */

import { describe, it, expect } from 'vitest';
import { PatternCatalog } from '../catalog/pattern-catalog.js';
import type { CatalogDefinition } from '../catalog/types.js';
import { getDefaultCatalog } from '../config/defaults.js';
import { ConfigurationError } from '../shared/errors.js';
import { ConfidenceClass } from '../shared/types.js';

const definition: CatalogDefinition = {
  secretPatterns: [
    { pattern: 'tok_[a-z]+', category: 'first', confidence: ConfidenceClass.ALWAYS_HIGH },
    { pattern: 'key_[0-9]+', category: 'second', confidence: ConfidenceClass.ENTROPY_GATED, flags: 'gi' },
  ],
  allowlist: [{ pattern: 'dummy', description: 'test value' }],
  excludePaths: [{ pattern: 'vendor/' }],
};

describe('PatternCatalog', () => {
  describe('compile', () => {
    it('should compile every list in order', () => {
      const catalog = PatternCatalog.compile(definition);

      expect(catalog.getCounts()).toEqual({ secretPatterns: 2, allowlist: 1, excludePaths: 1 });
      expect(catalog.secretPatterns.map(p => p.category)).toEqual(['first', 'second']);
      expect(catalog.allowlist[0].description).toBe('test value');
    });

    it('should make allowlist patterns case-insensitive', () => {
      const catalog = PatternCatalog.compile(definition);

      expect(catalog.allowlist[0].regex.flags).toBe('i');
      expect(catalog.allowlist[0].regex.test('DUMMY')).toBe(true);
    });

    it('should drop stateful flags from secret patterns', () => {
      const catalog = PatternCatalog.compile(definition);
      const regex = catalog.secretPatterns[1].regex;

      expect(regex.flags).toBe('i');
      expect(regex.test('KEY_1')).toBe(true);
      expect(regex.test('KEY_1')).toBe(true);
    });

    it('should keep secret patterns case-sensitive by default', () => {
      const catalog = PatternCatalog.compile(definition);

      expect(catalog.secretPatterns[0].regex.test('TOK_abc')).toBe(false);
    });

    it('should reject a malformed pattern with a ConfigurationError', () => {
      const broken: CatalogDefinition = {
        ...definition,
        secretPatterns: [
          ...definition.secretPatterns,
          { pattern: '([unclosed', category: 'broken', confidence: ConfidenceClass.ALWAYS_HIGH },
        ],
      };

      expect(() => PatternCatalog.compile(broken)).toThrow(ConfigurationError);
      expect(() => PatternCatalog.compile(broken)).toThrow(/secretPatterns\[2\] \/\(\[unclosed\//);
    });

    it('should reject malformed allowlist and exclude patterns too', () => {
      const broken: CatalogDefinition = {
        secretPatterns: [],
        allowlist: [{ pattern: '*start' }],
        excludePaths: [{ pattern: 'ok/' }, { pattern: 'a{2,1}' }],
      };

      try {
        PatternCatalog.compile(broken);
        expect.unreachable('compile should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigurationError);
        if (error instanceof ConfigurationError) {
          expect(error.details?.['invalid']).toHaveLength(2);
          expect(error.message).toContain('allowlist[0]');
          expect(error.message).toContain('excludePaths[1]');
        }
      }
    });

    it('should reject invalid flags', () => {
      const broken: CatalogDefinition = {
        ...definition,
        secretPatterns: [{ pattern: 'abc', category: 'x', confidence: ConfidenceClass.ALWAYS_HIGH, flags: 'q' }],
      };

      expect(() => PatternCatalog.compile(broken)).toThrow(ConfigurationError);
    });
  });

  describe('immutability', () => {
    it('should freeze the compiled lists', () => {
      const catalog = PatternCatalog.compile(definition);

      expect(Object.isFrozen(catalog.secretPatterns)).toBe(true);
      expect(Object.isFrozen(catalog.allowlist)).toBe(true);
      expect(Object.isFrozen(catalog.excludePaths)).toBe(true);
      expect(Object.isFrozen(catalog.secretPatterns[0])).toBe(true);
    });

    it('should not be affected by later changes to the definition', () => {
      const mutable: CatalogDefinition = {
        secretPatterns: [{ pattern: 'abc', category: 'x', confidence: ConfidenceClass.ALWAYS_HIGH }],
        allowlist: [],
        excludePaths: [],
      };
      const catalog = PatternCatalog.compile(mutable);
      mutable.secretPatterns.push({ pattern: 'def', category: 'y', confidence: ConfidenceClass.ALWAYS_HIGH });

      expect(catalog.getCounts().secretPatterns).toBe(1);
      expect(catalog.toDefinition().secretPatterns).toHaveLength(1);
    });
  });

  describe('extend', () => {
    it('should append additions after existing entries', () => {
      const catalog = PatternCatalog.compile(definition);
      const extended = catalog.extend({
        secretPatterns: [{ pattern: 'zzz', category: 'third', confidence: ConfidenceClass.ENTROPY_GATED }],
        excludePaths: [{ pattern: 'third_party/' }],
      });

      expect(extended.secretPatterns.map(p => p.category)).toEqual(['first', 'second', 'third']);
      expect(extended.getCounts()).toEqual({ secretPatterns: 3, allowlist: 1, excludePaths: 2 });
      expect(catalog.getCounts()).toEqual({ secretPatterns: 2, allowlist: 1, excludePaths: 1 });
    });

    it('should fail the extension when an addition is malformed', () => {
      const catalog = PatternCatalog.compile(definition);

      expect(() => catalog.extend({ allowlist: [{ pattern: '(' }] })).toThrow(ConfigurationError);
    });
  });

  describe('empty', () => {
    it('should contain no rules', () => {
      expect(PatternCatalog.empty().getCounts()).toEqual({ secretPatterns: 0, allowlist: 0, excludePaths: 0 });
    });
  });
});

describe('built-in catalog', () => {
  const catalog = getDefaultCatalog();

  it('should load every rule list', () => {
    expect(catalog.getCounts()).toEqual({ secretPatterns: 19, allowlist: 24, excludePaths: 13 });
  });

  it('should keep vendor patterns ahead of the generic pattern', () => {
    const categories = catalog.secretPatterns.map(p => p.category);

    expect(categories[0]).toBe('Stripe live secret key');
    expect(categories.indexOf('AWS token')).toBe(5);
    expect(categories.indexOf('generic high-entropy')).toBe(14);
    expect(categories.indexOf('private key block')).toBe(16);
  });

  it('should classify private keys and vendor prefixes as always high confidence', () => {
    const alwaysHigh = catalog.secretPatterns
      .filter(p => p.confidence === ConfidenceClass.ALWAYS_HIGH)
      .map(p => p.category);

    expect(alwaysHigh).toEqual([
      'Stripe live secret key',
      'Stripe test secret key',
      'Google API key',
      'AWS token',
      'Slack token',
      'GitHub personal access token',
      'GitHub OAuth token',
      'GitHub user-to-server token',
      'GitHub server-to-server token',
      'GitHub refresh token',
      'AWS temporary token',
      'private key block',
    ]);
  });

  it('should be compiled once per process', () => {
    expect(getDefaultCatalog()).toBe(catalog);
  });
});
