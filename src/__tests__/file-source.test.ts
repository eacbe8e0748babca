/**
 * Unit tests for file sources
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { FileAccessError } from '../shared/errors.js';
import { DiskFileSource, MemoryFileSource, looksBinary, splitLines } from '../sources/file-source.js';

describe('splitLines', () => {
  it('should not produce a trailing empty line', () => {
    expect(splitLines('a\nb\n')).toEqual(['a', 'b']);
  });

  it('should keep a final line without newline', () => {
    expect(splitLines('a\nb')).toEqual(['a', 'b']);
  });

  it('should handle CRLF line endings', () => {
    expect(splitLines('a\r\nb\r\n')).toEqual(['a', 'b']);
  });

  it('should keep interior blank lines', () => {
    expect(splitLines('a\n\nb\n')).toEqual(['a', '', 'b']);
  });

  it('should return no lines for empty content', () => {
    expect(splitLines('')).toEqual([]);
  });
});

describe('looksBinary', () => {
  it('should detect NUL bytes near the start', () => {
    expect(looksBinary(Buffer.from([0x89, 0x50, 0x00, 0x47]))).toBe(true);
    expect(looksBinary(Buffer.from('plain text', 'utf-8'))).toBe(false);
  });

  it('should only inspect the first 8000 bytes', () => {
    const buffer = Buffer.alloc(9000, 0x61);
    buffer[8500] = 0;

    expect(looksBinary(buffer)).toBe(false);
  });
});

describe('DiskFileSource', () => {
  let root: string;
  let source: DiskFileSource;

  beforeAll(() => {
    root = mkdtempSync(join(tmpdir(), 'leakguard-source-'));
    mkdirSync(join(root, 'src'));
    writeFileSync(join(root, 'src', 'app.ts'), 'line one\nline two\n');
    writeFileSync(join(root, 'logo.png'), Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x00, 0x00]));
    source = new DiskFileSource(root);
  });

  afterAll(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('should read lines relative to the root', () => {
    expect(source.readLines('src/app.ts')).toEqual(['line one', 'line two']);
  });

  it('should report regular files only', () => {
    expect(source.isRegularFile('src/app.ts')).toBe(true);
    expect(source.isRegularFile('src')).toBe(false);
    expect(source.isRegularFile('src/gone.ts')).toBe(false);
  });

  it('should refuse binary files', () => {
    expect(() => source.readLines('logo.png')).toThrow(FileAccessError);
    expect(() => source.readLines('logo.png')).toThrow('logo.png looks like a binary file');
  });

  it('should wrap read failures', () => {
    try {
      source.readLines('src/gone.ts');
      expect.fail('Should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(FileAccessError);
      if (error instanceof FileAccessError) {
        expect(error.path).toBe('src/gone.ts');
        expect(error.message).toMatch(/^Cannot read src\/gone\.ts: /);
      }
    }
  });
});

describe('MemoryFileSource', () => {
  const source = new MemoryFileSource([
    { path: 'a.txt', content: 'one\ntwo\n' },
    { path: 'b.txt', lines: ['x', 'y'] },
    { path: 'c.bin', content: 'GIF\u0000data' },
  ]);

  it('should serve content and lines entries', () => {
    expect(source.readLines('a.txt')).toEqual(['one', 'two']);
    expect(source.readLines('b.txt')).toEqual(['x', 'y']);
  });

  it('should only know the paths it was given', () => {
    expect(source.isRegularFile('a.txt')).toBe(true);
    expect(source.isRegularFile('z.txt')).toBe(false);
    expect(() => source.readLines('z.txt')).toThrow('z.txt is not available');
  });

  it('should treat NUL content as binary', () => {
    expect(source.isRegularFile('c.bin')).toBe(true);
    expect(() => source.readLines('c.bin')).toThrow('c.bin looks like a binary file');
  });

  it('should hand out copies of its lines', () => {
    const lines = source.readLines('b.txt');
    lines.push('z');

    expect(source.readLines('b.txt')).toEqual(['x', 'y']);
  });
});
