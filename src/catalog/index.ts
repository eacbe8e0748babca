/**
 * Catalog Module - Public API
 */

export { PatternCatalog } from './pattern-catalog.js';
export { CatalogRepository } from './catalog-repository.js';
export type {
  RegistryTable,
  RegistrySecretPattern,
  RegistryAllowlistPattern,
  RegistryExcludeRule,
  CreateSecretPatternInput,
  CreateAllowlistPatternInput,
  CreateExcludeRuleInput,
  RegistryQueryFilter,
  OpenRegistryOptions,
} from './catalog-repository.js';
export type {
  SecretPatternDefinition,
  AllowlistPatternDefinition,
  ExcludePathDefinition,
  CatalogDefinition,
  SecretPattern,
  AllowlistPattern,
  ExcludePathRule,
  CatalogCounts,
} from './types.js';
export { ConfidenceClass } from './types.js';
