/**
 * Configuration Loader
 *
 * Resolves the catalog and engine settings for one process:
 * built-in catalog → `.leakguard.json` additions → registry additions.
 * The result is built once and passed explicitly to the scanner.
 */

import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import { CatalogRepository } from '../catalog/catalog-repository.js';
import { PatternCatalog } from '../catalog/pattern-catalog.js';
import type { CatalogDefinition } from '../catalog/types.js';
import { ConfigurationError, errorMessage } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { getDefaultCatalog } from './defaults.js';
import { configFileSchema, type ConfigFile, type DisplaySettings, type EntropySettings } from './schema.js';

const logger = createLogger('config');

export const DEFAULT_CONFIG_FILENAME = '.leakguard.json';

export interface LoadConfigOptions {
  /** Explicit config file, relative to `cwd`; it must exist. */
  configPath?: string;
  /** Directory searched for `.leakguard.json`; relative paths resolve here. */
  cwd?: string;
  /** SQLite pattern registry whose active entries are appended. */
  registryPath?: string;
}

export interface ResolvedConfig {
  catalog: PatternCatalog;
  entropy: EntropySettings;
  display: DisplaySettings;
  maxScanTimeMs: number | undefined;
  /** Where the configuration came from, in layering order. */
  sources: string[];
}

/**
 * Validates a parsed config document.
 * @throws ConfigurationError describing every schema violation
 */
export function parseConfigFile(raw: unknown, origin = 'config'): ConfigFile {
  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration in ${origin}: ${issues}`, {
      origin,
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}

/** Reads and validates a config file. */
export function readConfigFile(filePath: string): ConfigFile {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Failed to read config file ${filePath}: ${errorMessage(error)}`, { filePath });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`Config file ${filePath} is not valid JSON: ${errorMessage(error)}`, { filePath });
  }

  return parseConfigFile(raw, filePath);
}

/** Converts the config file's lists into catalog additions. */
export function toCatalogAdditions(file: ConfigFile): CatalogDefinition {
  return {
    secretPatterns: file.secretPatterns,
    allowlist: file.allowlist.map(entry => (typeof entry === 'string' ? { pattern: entry } : entry)),
    excludePaths: file.excludePaths.map(entry => (typeof entry === 'string' ? { pattern: entry } : entry)),
  };
}

/**
 * Builds a configuration from an already-parsed config document.
 * @throws ConfigurationError if any pattern fails to compile
 */
export function resolveConfig(file: ConfigFile, additions: CatalogDefinition[] = []): Omit<ResolvedConfig, 'sources'> {
  const base = file.useDefaults ? getDefaultCatalog() : PatternCatalog.empty();
  let catalog = base.extend(toCatalogAdditions(file));
  for (const extra of additions) {
    catalog = catalog.extend(extra);
  }

  return {
    catalog,
    entropy: file.entropy,
    display: file.display,
    maxScanTimeMs: file.maxScanTimeMs,
  };
}

/**
 * Loads the full configuration for a scan.
 * @throws ConfigurationError on any invalid source; nothing is scanned then
 */
export function loadConfig(options: LoadConfigOptions = {}): ResolvedConfig {
  const sources: string[] = [];
  let file: ConfigFile;

  const cwd = options.cwd ?? process.cwd();
  const configPath = resolve(cwd, options.configPath || DEFAULT_CONFIG_FILENAME);

  if (options.configPath || existsSync(configPath)) {
    file = readConfigFile(configPath);
    sources.push(configPath);
  } else {
    file = parseConfigFile({}, 'defaults');
  }
  if (file.useDefaults) {
    sources.unshift('built-in catalog');
  }

  const additions: CatalogDefinition[] = [];
  if (options.registryPath) {
    const registryPath = resolve(cwd, options.registryPath);
    const repository = CatalogRepository.open(registryPath, { readonly: true });
    try {
      additions.push(repository.exportAdditions());
    } finally {
      repository.close();
    }
    sources.push(registryPath);
  }

  const resolved = resolveConfig(file, additions);
  logger.debug({ sources, counts: resolved.catalog.getCounts() }, 'Configuration loaded');

  return { ...resolved, sources };
}
