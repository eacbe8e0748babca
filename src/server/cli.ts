#!/usr/bin/env node
/**
 * Scan Server CLI - start the leakguard HTTP service
 *
 * Usage:
 *   npx tsx src/server/cli.ts --port 3848
 *   npx tsx src/server/cli.ts --config ./.leakguard.json --registry ./patterns.db
 *
 * Environment variables:
 *   LEAKGUARD_PORT      - Server port (default: 3848)
 *   LEAKGUARD_HOST      - Bind address (default: 127.0.0.1)
 *   LEAKGUARD_CONFIG    - Configuration file
 *   LEAKGUARD_REGISTRY  - SQLite pattern registry
 *   LOG_LEVEL           - Logging level (debug, info, warn, error)
 */

import { loadConfig } from '../config/loader.js';
import { parsePositiveInteger } from '../cli/run-cli.js';
import { errorMessage } from '../shared/errors.js';
import { ExitCode } from '../shared/types.js';
import { ScanServer, DEFAULT_SERVER_CONFIG } from './scan-server.js';

const args = process.argv.slice(2);

function getArg(name: string): string | undefined {
  const idx = args.indexOf(`--${name}`);
  if (idx === -1) return undefined;
  // A flag without a value reads as empty and fails validation.
  return args[idx + 1] ?? '';
}

function showHelp(): void {
  console.log(`
🛡️  leakguard scan server

Usage:
  leakguard-server [options]

Options:
  --port <number>     Server port (default: ${DEFAULT_SERVER_CONFIG.port})
  --host <address>    Bind address (default: ${DEFAULT_SERVER_CONFIG.host})
  --config <path>     Configuration file
  --registry <path>   SQLite pattern registry
  --max-time <ms>     Per-request scan budget (default: ${DEFAULT_SERVER_CONFIG.maxScanTimeMs})
  --help              Show this help message

Endpoints:
  POST /api/scan      { "files": [{ "path": "...", "content": "..." }] }
  GET  /api/catalog   Loaded rule counts
  GET  /health        Health check
`);
  process.exit(0);
}

if (args.includes('--help') || args.includes('-h')) {
  showHelp();
}

let server: ScanServer;
let host: string;
try {
  const portArg = getArg('port') ?? process.env['LEAKGUARD_PORT'];
  const maxTimeArg = getArg('max-time');
  host = getArg('host') || process.env['LEAKGUARD_HOST'] || DEFAULT_SERVER_CONFIG.host;

  const scanConfig = loadConfig({
    configPath: getArg('config') || process.env['LEAKGUARD_CONFIG'],
    registryPath: getArg('registry') || process.env['LEAKGUARD_REGISTRY'],
  });
  server = new ScanServer(scanConfig, {
    host,
    ...(portArg !== undefined ? { port: parsePort(portArg) } : {}),
    ...(maxTimeArg !== undefined ? { maxScanTimeMs: parsePositiveInteger(maxTimeArg, 'max-time') } : {}),
  });
} catch (err) {
  console.error(`❌ Configuration error: ${errorMessage(err)}`);
  process.exit(ExitCode.CONFIGURATION_ERROR);
}

/** Port 0 is allowed and lets the OS pick one. */
function parsePort(raw: string): number {
  return raw === '0' ? 0 : parsePositiveInteger(raw, 'port');
}

const stopOnSignal = (signal: NodeJS.Signals): void => {
  process.off('SIGINT', stopOnSignal);
  process.off('SIGTERM', stopOnSignal);
  console.log(`\n${signal}: stopping scan server`);
  server.stop().then(
    () => process.exit(ExitCode.PASS),
    (err: unknown) => {
      console.error(`❌ Shutdown failed: ${errorMessage(err)}`);
      process.exit(ExitCode.FAIL);
    }
  );
};

server.start().then(() => {
  console.log(`✅ Scan server running at http://${host}:${server.getPort()}`);
  process.on('SIGINT', stopOnSignal);
  process.on('SIGTERM', stopOnSignal);
}).catch((err: unknown) => {
  console.error(`❌ Failed to start server: ${errorMessage(err)}`);
  process.exit(ExitCode.FAIL);
});
