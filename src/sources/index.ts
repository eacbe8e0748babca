/**
 * Sources Module - Public API
 *
 * Suppliers of candidate files and their content.
 */

export { DiskFileSource, MemoryFileSource, splitLines, looksBinary, BINARY_SNIFF_BYTES } from './file-source.js';
export type { FileSource, MemoryFileEntry } from './file-source.js';
export { listStagedFiles, runGit, STAGED_FILES_ARGS } from './git-staged.js';
export type { GitRunner } from './git-staged.js';
