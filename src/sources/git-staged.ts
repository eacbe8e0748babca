/**
 * Lists the files staged for the pending commit.
 *
 * Only added, copied and modified files are considered; deletions have no
 * content left to leak.
 */

import { execFileSync } from 'child_process';
import { errorMessage } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';

const logger = createLogger('git');

/** `-z` keeps paths verbatim: no quoting of unusual names, NUL-terminated. */
export const STAGED_FILES_ARGS = ['diff', '--cached', '--name-only', '--diff-filter=ACM', '-z'] as const;

/** Runs git with the given arguments and returns its stdout. */
export type GitRunner = (args: readonly string[], cwd: string) => string;

export const runGit: GitRunner = (args, cwd) =>
  execFileSync('git', [...args], {
    cwd,
    encoding: 'utf-8',
    stdio: ['ignore', 'pipe', 'ignore'],
    maxBuffer: 16 * 1024 * 1024,
  });

/**
 * Returns the staged file paths, in git's order and exactly as stored in
 * the index. A failing git call (not a repository, git missing) yields an
 * empty list.
 */
export function listStagedFiles(cwd: string = process.cwd(), git: GitRunner = runGit): string[] {
  let output: string;
  try {
    output = git(STAGED_FILES_ARGS, cwd);
  } catch (error) {
    logger.warn({ cwd, error: errorMessage(error) }, 'Could not list staged files');
    return [];
  }

  return output.split('\0').filter(path => path.length > 0);
}
