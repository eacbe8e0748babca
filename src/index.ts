/**
 * leakguard - Main Entry Point
 *
 * Exports the detection engine and its collaborators for programmatic use.
 */

// Catalog Module
export { PatternCatalog, CatalogRepository } from './catalog/index.js';
export type {
  SecretPatternDefinition,
  AllowlistPatternDefinition,
  ExcludePathDefinition,
  CatalogDefinition,
  SecretPattern,
  AllowlistPattern,
  ExcludePathRule,
  CatalogCounts,
  RegistryTable,
  RegistrySecretPattern,
  RegistryAllowlistPattern,
  RegistryExcludeRule,
} from './catalog/index.js';

// Config Module
export {
  loadConfig,
  resolveConfig,
  readConfigFile,
  parseConfigFile,
  getDefaultCatalog,
  DEFAULT_CONFIG_FILENAME,
} from './config/index.js';
export type { LoadConfigOptions, ResolvedConfig, ConfigFile, ConfigFileInput } from './config/index.js';

// Scanner Module
export { ScanCoordinator, LineEvaluator, EntropyScorer, FileFilter } from './scanner/index.js';
export type {
  ScanCoordinatorOptions,
  ScanResult,
  SkippedFile,
  Finding,
  LineEvaluatorOptions,
  EntropyScorerOptions,
  FileEligibility,
} from './scanner/index.js';

// Sources Module
export { DiskFileSource, MemoryFileSource, listStagedFiles } from './sources/index.js';
export type { FileSource, MemoryFileEntry, GitRunner } from './sources/index.js';

// Report Module
export { formatReport, formatJson, remediationGuidance } from './report/index.js';
export type { ReportOptions } from './report/index.js';

// Server Module
export { ScanServer } from './server/index.js';
export type { ScanServerConfig, ScanRequest } from './server/index.js';

// CLI
export { runCli, parseArgs } from './cli/run-cli.js';
export type { CliArgs, CliEnvironment } from './cli/run-cli.js';

// Shared
export {
  ScanError,
  ScanErrorCode,
  ConfigurationError,
  FileAccessError,
  ScanTimeoutError,
} from './shared/errors.js';
export { ConfidenceClass, ScanVerdict, SkipReason, ExitCode } from './shared/types.js';

// Version
export const VERSION = '0.1.0';
