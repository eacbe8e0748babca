/**
 * CatalogRepository - SQLite registry of team-shared catalog additions.
 *
 * The registry is only read during a scan; entries are managed through the
 * add/deactivate methods (see scripts/init-registry.ts).
 */

import Database from 'better-sqlite3';
import { ConfigurationError, errorMessage } from '../shared/errors.js';
import { ConfidenceClass } from '../shared/types.js';
import type {
  AllowlistPatternDefinition,
  CatalogDefinition,
  ExcludePathDefinition,
  SecretPatternDefinition,
} from './types.js';

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export type RegistryTable = 'secret_patterns' | 'allowlist_patterns' | 'exclude_rules';

interface RegistryRecord {
  id: number;
  position: number;
  isActive: boolean;
  createdAt: string;
  updatedAt: string;
}

export interface RegistrySecretPattern extends RegistryRecord {
  pattern: string;
  category: string;
  confidence: ConfidenceClass;
  flags: string;
}

export interface RegistryAllowlistPattern extends RegistryRecord {
  pattern: string;
  description: string | null;
}

export interface RegistryExcludeRule extends RegistryRecord {
  pattern: string;
  description: string | null;
}

export interface CreateSecretPatternInput extends SecretPatternDefinition {
  position?: number;
}

export interface CreateAllowlistPatternInput extends AllowlistPatternDefinition {
  position?: number;
}

export interface CreateExcludeRuleInput extends ExcludePathDefinition {
  description?: string;
  position?: number;
}

export interface RegistryQueryFilter {
  isActive?: boolean;
}

export interface OpenRegistryOptions {
  /** Open without write access; the file must already exist. */
  readonly?: boolean;
}

interface RecordRow {
  id: number;
  pattern: string;
  position: number;
  is_active: number;
  created_at: string;
  updated_at: string;
}

interface SecretPatternRow extends RecordRow {
  category: string;
  confidence: string;
  flags: string;
}

interface DescribedRow extends RecordRow {
  description: string | null;
}

const TIMESTAMP_DEFAULT = `(strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))`;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS secret_patterns (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    pattern TEXT NOT NULL,
    category TEXT NOT NULL,
    confidence TEXT NOT NULL CHECK (confidence IN ('ALWAYS_HIGH', 'ENTROPY_GATED')),
    flags TEXT NOT NULL DEFAULT '',
    position INTEGER NOT NULL DEFAULT 0,
    is_active INTEGER NOT NULL DEFAULT 1,
    created_at TEXT NOT NULL DEFAULT ${TIMESTAMP_DEFAULT},
    updated_at TEXT NOT NULL DEFAULT ${TIMESTAMP_DEFAULT},
    UNIQUE(pattern, category)
  );

  CREATE TABLE IF NOT EXISTS allowlist_patterns (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    pattern TEXT NOT NULL UNIQUE,
    description TEXT,
    position INTEGER NOT NULL DEFAULT 0,
    is_active INTEGER NOT NULL DEFAULT 1,
    created_at TEXT NOT NULL DEFAULT ${TIMESTAMP_DEFAULT},
    updated_at TEXT NOT NULL DEFAULT ${TIMESTAMP_DEFAULT}
  );

  CREATE TABLE IF NOT EXISTS exclude_rules (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    pattern TEXT NOT NULL UNIQUE,
    description TEXT,
    position INTEGER NOT NULL DEFAULT 0,
    is_active INTEGER NOT NULL DEFAULT 1,
    created_at TEXT NOT NULL DEFAULT ${TIMESTAMP_DEFAULT},
    updated_at TEXT NOT NULL DEFAULT ${TIMESTAMP_DEFAULT}
  );
`;

// ═══════════════════════════════════════════════════════════════
// REPOSITORY
// ═══════════════════════════════════════════════════════════════

export class CatalogRepository {
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  /**
   * Opens a registry file.
   * @throws ConfigurationError if the database cannot be opened
   */
  static open(dbPath: string, options: OpenRegistryOptions = {}): CatalogRepository {
    const readonly = options.readonly ?? false;
    try {
      const db = new Database(dbPath, { readonly, fileMustExist: readonly });
      db.pragma('busy_timeout = 5000');
      return new CatalogRepository(db);
    } catch (error) {
      throw new ConfigurationError(`Failed to open pattern registry ${dbPath}: ${errorMessage(error)}`, { dbPath });
    }
  }

  /** Creates the registry tables if they do not exist yet. */
  ensureSchema(): void {
    this.run('create registry schema', () => this.db.exec(SCHEMA));
  }

  /**
   * Adds a secret pattern. The expression is compiled first so that a
   * broken pattern never reaches the registry.
   */
  addSecretPattern(input: CreateSecretPatternInput): RegistrySecretPattern {
    assertCompiles(input.pattern, input.flags ?? '');
    const info = this.run('add secret pattern', () =>
      this.db
        .prepare<[string, string, string, string, number]>(`
          INSERT INTO secret_patterns (pattern, category, confidence, flags, position)
          VALUES (?, ?, ?, ?, ?)
        `)
        .run(input.pattern, input.category, input.confidence, input.flags ?? '', input.position ?? 0)
    );
    return this.requireSecretPattern(Number(info.lastInsertRowid));
  }

  addAllowlistPattern(input: CreateAllowlistPatternInput): RegistryAllowlistPattern {
    assertCompiles(input.pattern, 'i');
    const info = this.run('add allowlist pattern', () =>
      this.db
        .prepare<[string, string | null, number]>(
          'INSERT INTO allowlist_patterns (pattern, description, position) VALUES (?, ?, ?)'
        )
        .run(input.pattern, input.description ?? null, input.position ?? 0)
    );
    return this.requireDescribed('allowlist_patterns', Number(info.lastInsertRowid));
  }

  addExcludeRule(input: CreateExcludeRuleInput): RegistryExcludeRule {
    assertCompiles(input.pattern, '');
    const info = this.run('add exclude rule', () =>
      this.db
        .prepare<[string, string | null, number]>(
          'INSERT INTO exclude_rules (pattern, description, position) VALUES (?, ?, ?)'
        )
        .run(input.pattern, input.description ?? null, input.position ?? 0)
    );
    return this.requireDescribed('exclude_rules', Number(info.lastInsertRowid));
  }

  listSecretPatterns(filter?: RegistryQueryFilter): RegistrySecretPattern[] {
    const { where, params } = activeClause(filter);
    const rows = this.run('list secret patterns', () =>
      this.db
        .prepare<number[], SecretPatternRow>(`SELECT * FROM secret_patterns ${where} ORDER BY position, id`)
        .all(...params)
    );
    return rows.map(mapSecretPatternRow);
  }

  listAllowlistPatterns(filter?: RegistryQueryFilter): RegistryAllowlistPattern[] {
    return this.listDescribed('allowlist_patterns', filter);
  }

  listExcludeRules(filter?: RegistryQueryFilter): RegistryExcludeRule[] {
    return this.listDescribed('exclude_rules', filter);
  }

  /**
   * Deactivates an entry. Deactivated entries stay in the registry but are
   * no longer exported to the catalog.
   * @throws ConfigurationError if the entry does not exist
   */
  deactivate(table: RegistryTable, id: number): void {
    const result = this.run(`deactivate ${table} entry`, () =>
      this.db
        .prepare<[number]>(`
          UPDATE ${table} SET is_active = 0, updated_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now') WHERE id = ?
        `)
        .run(id)
    );
    if (result.changes === 0) {
      throw new ConfigurationError(`Registry entry ${table}#${id} not found`, { table, id });
    }
  }

  /** Active entries as catalog additions, in registry order. */
  exportAdditions(): CatalogDefinition {
    const active = { isActive: true };
    return {
      secretPatterns: this.listSecretPatterns(active).map(row => ({
        pattern: row.pattern,
        category: row.category,
        confidence: row.confidence,
        ...(row.flags ? { flags: row.flags } : {}),
      })),
      allowlist: this.listAllowlistPatterns(active).map(row => ({
        pattern: row.pattern,
        ...(row.description !== null ? { description: row.description } : {}),
      })),
      excludePaths: this.listExcludeRules(active).map(row => ({ pattern: row.pattern })),
    };
  }

  /**
   * Imports a catalog definition in a single transaction. Entries keep
   * their order through increasing positions after the current maximum.
   * @returns number of entries inserted
   */
  importDefinition(definition: Partial<CatalogDefinition>): number {
    const importAll = this.db.transaction((def: Partial<CatalogDefinition>) => {
      let inserted = 0;
      let position = this.nextPosition('secret_patterns');
      for (const entry of def.secretPatterns ?? []) {
        this.addSecretPattern({ ...entry, position: position++ });
        inserted++;
      }
      position = this.nextPosition('allowlist_patterns');
      for (const entry of def.allowlist ?? []) {
        this.addAllowlistPattern({ ...entry, position: position++ });
        inserted++;
      }
      position = this.nextPosition('exclude_rules');
      for (const entry of def.excludePaths ?? []) {
        this.addExcludeRule({ ...entry, position: position++ });
        inserted++;
      }
      return inserted;
    });

    return importAll(definition);
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  // ════════════════════════════════════════════════════════════
  // PRIVATE METHODS
  // ════════════════════════════════════════════════════════════

  private listDescribed(table: 'allowlist_patterns' | 'exclude_rules', filter?: RegistryQueryFilter): RegistryAllowlistPattern[] {
    const { where, params } = activeClause(filter);
    const rows = this.run(`list ${table}`, () =>
      this.db
        .prepare<number[], DescribedRow>(`SELECT * FROM ${table} ${where} ORDER BY position, id`)
        .all(...params)
    );
    return rows.map(mapDescribedRow);
  }

  private requireSecretPattern(id: number): RegistrySecretPattern {
    const row = this.run('read secret pattern', () =>
      this.db.prepare<[number], SecretPatternRow>('SELECT * FROM secret_patterns WHERE id = ?').get(id)
    );
    if (!row) {
      throw new ConfigurationError(`Registry entry secret_patterns#${id} not found`, { id });
    }
    return mapSecretPatternRow(row);
  }

  private requireDescribed(table: 'allowlist_patterns' | 'exclude_rules', id: number): RegistryAllowlistPattern {
    const row = this.run(`read ${table} entry`, () =>
      this.db.prepare<[number], DescribedRow>(`SELECT * FROM ${table} WHERE id = ?`).get(id)
    );
    if (!row) {
      throw new ConfigurationError(`Registry entry ${table}#${id} not found`, { table, id });
    }
    return mapDescribedRow(row);
  }

  private nextPosition(table: RegistryTable): number {
    const row = this.run(`read ${table} positions`, () =>
      this.db
        .prepare<[], { maxPosition: number | null }>(`SELECT MAX(position) AS maxPosition FROM ${table}`)
        .get()
    );
    return (row?.maxPosition ?? -1) + 1;
  }

  /** Runs a statement, wrapping driver errors as configuration errors. */
  private run<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof ConfigurationError) throw error;
      throw new ConfigurationError(`Failed to ${operation}: ${errorMessage(error)}`, { operation });
    }
  }
}

// ═══════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════

function activeClause(filter?: RegistryQueryFilter): { where: string; params: number[] } {
  if (filter?.isActive === undefined) {
    return { where: '', params: [] };
  }
  return { where: 'WHERE is_active = ?', params: [filter.isActive ? 1 : 0] };
}

function assertCompiles(pattern: string, flags: string): void {
  try {
    new RegExp(pattern, flags);
  } catch (error) {
    throw new ConfigurationError(`Invalid pattern /${pattern}/: ${errorMessage(error)}`, { pattern });
  }
}

function parseConfidence(value: string): ConfidenceClass {
  switch (value) {
    case ConfidenceClass.ALWAYS_HIGH:
      return ConfidenceClass.ALWAYS_HIGH;
    case ConfidenceClass.ENTROPY_GATED:
      return ConfidenceClass.ENTROPY_GATED;
    default:
      throw new ConfigurationError(`Unknown confidence class in registry: ${value}`);
  }
}

function mapRecord(row: RecordRow): RegistryRecord {
  return {
    id: row.id,
    position: row.position,
    isActive: row.is_active === 1,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function mapSecretPatternRow(row: SecretPatternRow): RegistrySecretPattern {
  return {
    ...mapRecord(row),
    pattern: row.pattern,
    category: row.category,
    confidence: parseConfidence(row.confidence),
    flags: row.flags,
  };
}

function mapDescribedRow(row: DescribedRow): RegistryAllowlistPattern {
  return {
    ...mapRecord(row),
    pattern: row.pattern,
    description: row.description,
  };
}
