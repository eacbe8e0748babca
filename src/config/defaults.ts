import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { PatternCatalog } from '../catalog/pattern-catalog.js';
import type { CatalogDefinition } from '../catalog/types.js';
import { ConfigurationError, errorMessage } from '../shared/errors.js';
import { catalogFileSchema } from './schema.js';

export const DEFAULT_CATALOG_PATH = fileURLToPath(
  new URL('../../config/default-catalog.json', import.meta.url)
);

let defaultCatalog: PatternCatalog | null = null;

/** Reads and validates a catalog file in the bundled default-catalog format. */
export function readCatalogDefinition(filePath: string = DEFAULT_CATALOG_PATH): CatalogDefinition {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Failed to read catalog ${filePath}: ${errorMessage(error)}`);
  }

  const parsed = catalogFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid catalog ${filePath}`, { issues: parsed.error.issues });
  }

  return {
    secretPatterns: parsed.data.secretPatterns,
    allowlist: parsed.data.allowlist,
    excludePaths: parsed.data.excludePaths.map(pattern => ({ pattern })),
  };
}

/** The built-in catalog, compiled once per process. */
export function getDefaultCatalog(): PatternCatalog {
  if (defaultCatalog === null) {
    defaultCatalog = PatternCatalog.compile(readCatalogDefinition());
  }
  return defaultCatalog;
}
