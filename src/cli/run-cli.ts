/**
 * leakguard CLI - argument handling and wiring.
 *
 * Kept free of `process` access so it can be driven from tests; see cli.ts
 * for the executable entry point.
 */

import { loadConfig, DEFAULT_CONFIG_FILENAME, type ResolvedConfig } from '../config/loader.js';
import { formatJson, formatReport, NO_STAGED_FILES_MESSAGE } from '../report/report-formatter.js';
import { ScanCoordinator, type ScanResult } from '../scanner/scan-coordinator.js';
import { ConfigurationError, ScanTimeoutError } from '../shared/errors.js';
import { ExitCode, ScanVerdict } from '../shared/types.js';
import { DiskFileSource, type FileSource } from '../sources/file-source.js';
import { listStagedFiles } from '../sources/git-staged.js';

export interface CliArgs {
  help: boolean;
  json: boolean;
  configPath?: string;
  registryPath?: string;
  maxTimeMs?: number;
  files: string[];
}

export interface CliEnvironment {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  cwd: string;
  env: Record<string, string | undefined>;
  /** Supplies candidate files when none are given on the command line. */
  listFiles?: (cwd: string) => string[];
  /** Reads candidate files. Default: the working tree under `cwd`. */
  source?: FileSource;
  /** Clock used for the scan budget. */
  now?: () => number;
}

export const USAGE = `
🛡️  leakguard - block commits that leak credentials

Usage:
  leakguard [options] [files...]

Without files, the files staged for commit are scanned.

Options:
  --config <path>     Configuration file (default: ./${DEFAULT_CONFIG_FILENAME} if present)
  --registry <path>   SQLite pattern registry to merge into the catalog
  --max-time <ms>     Wall-clock budget; exceeding it fails the scan
  --json              Print the scan result as JSON
  --help, -h          Show this help message

Environment variables:
  LEAKGUARD_CONFIG    Configuration file
  LEAKGUARD_REGISTRY  SQLite pattern registry
  LOG_LEVEL           Logging level (debug, info, warn, error)

Exit status:
  0  no secrets found (or nothing to scan)
  1  potential secrets found, or the scan was aborted
  2  configuration error
`;

/**
 * Parses the value of a numeric option.
 * @throws ConfigurationError unless the value is a positive integer
 */
export function parsePositiveInteger(raw: string, option: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`Option --${option} expects a positive integer, got "${raw}"`);
  }
  return value;
}

/**
 * Parses command-line arguments.
 * @throws ConfigurationError on unknown options or missing values
 */
export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { help: false, json: false, files: [] };

  const valueOf = (index: number, name: string): string => {
    const value = argv[index + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new ConfigurationError(`Option --${name} requires a value`);
    }
    return value;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--help':
      case '-h':
        args.help = true;
        break;
      case '--json':
        args.json = true;
        break;
      case '--config':
        args.configPath = valueOf(i++, 'config');
        break;
      case '--registry':
        args.registryPath = valueOf(i++, 'registry');
        break;
      case '--max-time':
        args.maxTimeMs = parsePositiveInteger(valueOf(i++, 'max-time'), 'max-time');
        break;
      case '--':
        args.files.push(...argv.slice(i + 1));
        i = argv.length;
        break;
      default:
        if (arg.startsWith('-')) {
          throw new ConfigurationError(`Unknown option: ${arg}`);
        }
        args.files.push(arg);
    }
  }

  return args;
}

/**
 * Runs one scan and returns the process exit code.
 */
export function runCli(argv: string[], environment: CliEnvironment): ExitCode {
  let args: CliArgs;
  let config: ResolvedConfig;
  try {
    args = parseArgs(argv);
    if (args.help) {
      environment.stdout(USAGE);
      return ExitCode.PASS;
    }
    config = loadConfig({
      configPath: args.configPath ?? environment.env['LEAKGUARD_CONFIG'],
      registryPath: args.registryPath ?? environment.env['LEAKGUARD_REGISTRY'],
      cwd: environment.cwd,
    });
  } catch (error) {
    if (error instanceof ConfigurationError) {
      environment.stderr(`❌ Configuration error: ${error.message}`);
      return ExitCode.CONFIGURATION_ERROR;
    }
    throw error;
  }

  const files = args.files.length > 0
    ? args.files
    : (environment.listFiles ?? listStagedFiles)(environment.cwd);

  if (files.length === 0 && !args.json) {
    environment.stdout(NO_STAGED_FILES_MESSAGE);
    return ExitCode.PASS;
  }

  const coordinator = new ScanCoordinator(config.catalog, environment.source ?? new DiskFileSource(environment.cwd), {
    entropy: config.entropy,
    display: config.display,
    maxScanTimeMs: args.maxTimeMs ?? config.maxScanTimeMs,
    now: environment.now,
  });

  let result: ScanResult;
  try {
    result = coordinator.scan(files);
  } catch (error) {
    if (error instanceof ScanTimeoutError) {
      environment.stderr(`❌ ${error.message}; failing the commit`);
      return ExitCode.FAIL;
    }
    throw error;
  }

  environment.stdout(args.json ? formatJson(result) : formatReport(result, {
    configFileName: args.configPath ?? DEFAULT_CONFIG_FILENAME,
  }));

  return result.verdict === ScanVerdict.FAIL ? ExitCode.FAIL : ExitCode.PASS;
}
