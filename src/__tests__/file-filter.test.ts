/**
 * Unit tests for FileFilter
 */

import { describe, it, expect, vi } from 'vitest';
import { PatternCatalog } from '../catalog/pattern-catalog.js';
import { getDefaultCatalog } from '../config/defaults.js';
import { FileFilter } from '../scanner/file-filter.js';
import { SkipReason } from '../shared/types.js';
import { MemoryFileSource } from '../sources/file-source.js';

describe('FileFilter', () => {
  const source = new MemoryFileSource([
    { path: 'src/app.ts', content: 'const x = 1;\n' },
    { path: 'node_modules/pkg/index.js', content: 'module.exports = {};\n' },
    { path: '.env.example', content: 'TOKEN=\n' },
    { path: 'docs/.env.example.md', content: 'notes\n' },
  ]);
  const filter = new FileFilter(getDefaultCatalog(), source);

  it('should accept an existing file outside excluded directories', () => {
    expect(filter.classify('src/app.ts')).toEqual({ eligible: true });
    expect(filter.isEligible('src/app.ts')).toBe(true);
  });

  it('should exclude vendored and generated directories', () => {
    expect(filter.isExcluded('node_modules/pkg/index.js')).toBe(true);
    expect(filter.isExcluded('packages/web/dist/bundle.js')).toBe(true);
    expect(filter.isExcluded('.venv/lib/site.py')).toBe(true);
    expect(filter.isExcluded('src/__pycache__/mod.pyc')).toBe(true);
  });

  it('should apply unanchored rules anywhere in the path', () => {
    expect(filter.isExcluded('tools/build/out.txt')).toBe(true);
    expect(filter.isExcluded('rebuild/out.txt')).toBe(true);
  });

  it('should honor end anchors in rules', () => {
    expect(filter.isExcluded('.env.example')).toBe(true);
    expect(filter.isExcluded('docs/.env.example.md')).toBe(false);
    expect(filter.isExcluded('.gitignore')).toBe(true);
  });

  it('should match exclude rules case-sensitively', () => {
    expect(filter.isExcluded('Node_Modules/pkg/index.js')).toBe(false);
    expect(filter.isExcluded('DIST/bundle.js')).toBe(false);
  });

  it('should report excluded before checking existence', () => {
    const spy = vi.spyOn(source, 'isRegularFile');

    expect(filter.classify('dist/missing.js')).toEqual({ eligible: false, reason: SkipReason.EXCLUDED });
    expect(spy).not.toHaveBeenCalled();
    spy.mockRestore();
  });

  it('should report missing files', () => {
    expect(filter.classify('src/deleted.ts')).toEqual({ eligible: false, reason: SkipReason.MISSING });
    expect(filter.isEligible('src/deleted.ts')).toBe(false);
  });

  it('should accept everything that exists when there are no rules', () => {
    const open = new FileFilter(PatternCatalog.empty(), source);

    expect(open.isEligible('node_modules/pkg/index.js')).toBe(true);
  });
});
