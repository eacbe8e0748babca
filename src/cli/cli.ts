#!/usr/bin/env node
/**
 * leakguard CLI entry point.
 *
 * Usage as a git pre-commit hook (.git/hooks/pre-commit):
 *   #!/bin/sh
 *   exec npx leakguard
 */

import { runCli } from './run-cli.js';
import { ExitCode } from '../shared/types.js';

try {
  const code = runCli(process.argv.slice(2), {
    stdout: text => console.log(text),
    stderr: text => console.error(text),
    cwd: process.cwd(),
    env: process.env,
  });
  process.exit(code);
} catch (err) {
  // Anything unexpected blocks the commit rather than letting it through.
  console.error('❌ Secret scan failed:', err);
  process.exit(ExitCode.FAIL);
}
