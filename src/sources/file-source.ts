/**
 * File sources supply the scanner with file existence and line content.
 *
 * The engine never touches the filesystem directly, so it can run against
 * the working tree, an in-memory set of files, or a request body.
 */

import { readFileSync, statSync } from 'fs';
import { resolve } from 'path';
import { FileAccessError, errorMessage } from '../shared/errors.js';

export interface FileSource {
  /** Whether the path currently exists as a regular file. */
  isRegularFile(filePath: string): boolean;
  /**
   * Reads the file as ordered text lines.
   * @throws FileAccessError if the file cannot be read as text
   */
  readLines(filePath: string): string[];
}

/** How many leading bytes are inspected for NUL when detecting binaries. */
export const BINARY_SNIFF_BYTES = 8000;

/**
 * Splits text into lines. A trailing newline does not produce an extra
 * empty line; a final line without a newline is kept.
 */
export function splitLines(content: string): string[] {
  if (content.length === 0) {
    return [];
  }
  const lines = content.split(/\r?\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

export function looksBinary(buffer: Buffer): boolean {
  return buffer.subarray(0, BINARY_SNIFF_BYTES).includes(0);
}

/** Reads files from disk, relative to a root directory. */
export class DiskFileSource implements FileSource {
  private readonly rootDir: string;

  constructor(rootDir: string = process.cwd()) {
    this.rootDir = rootDir;
  }

  isRegularFile(filePath: string): boolean {
    try {
      return statSync(resolve(this.rootDir, filePath)).isFile();
    } catch {
      return false;
    }
  }

  readLines(filePath: string): string[] {
    let buffer: Buffer;
    try {
      buffer = readFileSync(resolve(this.rootDir, filePath));
    } catch (error) {
      throw new FileAccessError(filePath, `Cannot read ${filePath}: ${errorMessage(error)}`);
    }

    if (looksBinary(buffer)) {
      throw new FileAccessError(filePath, `${filePath} looks like a binary file`, { binary: true });
    }

    return splitLines(buffer.toString('utf-8'));
  }
}

/** An in-memory file, given either as raw content or as lines. */
export type MemoryFileEntry =
  | { path: string; content: string }
  | { path: string; lines: string[] };

/**
 * Serves files from memory. Every entry exists; nothing else does.
 * Content with a NUL character near its start is treated as binary.
 */
export class MemoryFileSource implements FileSource {
  private readonly files = new Map<string, string[] | null>();

  constructor(entries: Iterable<MemoryFileEntry> = []) {
    for (const entry of entries) {
      this.add(entry);
    }
  }

  add(entry: MemoryFileEntry): void {
    if ('lines' in entry) {
      this.files.set(entry.path, [...entry.lines]);
      return;
    }
    const binary = entry.content.slice(0, BINARY_SNIFF_BYTES).includes('\u0000');
    this.files.set(entry.path, binary ? null : splitLines(entry.content));
  }

  isRegularFile(filePath: string): boolean {
    return this.files.has(filePath);
  }

  readLines(filePath: string): string[] {
    const lines = this.files.get(filePath);
    if (lines === undefined) {
      throw new FileAccessError(filePath, `${filePath} is not available`);
    }
    if (lines === null) {
      throw new FileAccessError(filePath, `${filePath} looks like a binary file`, { binary: true });
    }
    return [...lines];
  }
}
