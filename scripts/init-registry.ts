/**
 * Pattern Registry Initialization Script
 *
 * Creates the SQLite pattern registry and optionally imports catalog
 * additions from a config-format JSON file.
 * Usage: npx tsx scripts/init-registry.ts <registry.db> [--import file.json] [--force]
 *
 * Options:
 *   --import <file>  Import secretPatterns/allowlist/excludePaths from a config file
 *   --force          Delete existing registry and recreate
 */

import * as fs from 'fs';
import { CatalogRepository } from '../src/catalog/catalog-repository.js';
import { readConfigFile, toCatalogAdditions } from '../src/config/loader.js';
import { errorMessage } from '../src/shared/errors.js';

function getArg(name: string): string | undefined {
  const args = process.argv.slice(2);
  const idx = args.indexOf(`--${name}`);
  if (idx === -1) return undefined;
  return args[idx + 1];
}

function main(): void {
  const dbPath = process.argv[2];
  const forceRecreate = process.argv.includes('--force');
  const importPath = getArg('import');

  if (!dbPath || dbPath.startsWith('--')) {
    console.error('Usage: npx tsx scripts/init-registry.ts <registry.db> [--import file.json] [--force]');
    process.exit(1);
  }

  console.log('leakguard - Pattern Registry Initialization');
  console.log('===========================================\n');

  if (fs.existsSync(dbPath)) {
    if (forceRecreate) {
      console.log(`Removing existing registry: ${dbPath}`);
      fs.unlinkSync(dbPath);
    } else if (!importPath) {
      console.log(`Registry already exists at: ${dbPath}`);
      console.log('Use --force to recreate, or --import to add entries.\n');
      process.exit(0);
    }
  }

  const repository = CatalogRepository.open(dbPath);

  try {
    repository.ensureSchema();

    if (importPath) {
      console.log(`Importing entries from: ${importPath}`);
      const additions = toCatalogAdditions(readConfigFile(importPath));
      const inserted = repository.importDefinition(additions);
      console.log(`Imported ${inserted} entries`);
    }

    const counts = repository.exportAdditions();
    console.log(`\nActive entries:`);
    console.log(`  - secret patterns:  ${counts.secretPatterns.length}`);
    console.log(`  - allowlist:        ${counts.allowlist.length}`);
    console.log(`  - exclude rules:    ${counts.excludePaths.length}`);

    console.log('\n✓ Registry ready\n');
  } catch (error) {
    console.error(`\n✗ Error initializing registry: ${errorMessage(error)}`);
    process.exit(1);
  } finally {
    repository.close();
  }
}

main();
