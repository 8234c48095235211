/**
 * Backend capability adapter
 *
 * Reports which query features a backend offers and builds the predicate
 * fragments that depend on them. Fragments use `?` placeholders; values
 * always travel in `params`.
 *
 * Feature sets are detected once per backend kind and kept for the life of
 * the process. clearFeatureCache() forces detection to run again. SQLite
 * full-text search also needs the index table in the connection at hand, so
 * that one is checked on every call.
 */

import type Database from 'better-sqlite3';
import { VALUES_TABLE } from '../db/schema.js';
import type { AttributeType, AttributeValue } from '../types/index.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { TYPE_HANDLERS, type SqlValue } from '../validation/types.js';

export type BackendKind = 'sqlite' | 'mysql' | 'pgsql';

export const BACKEND_KINDS: readonly BackendKind[] = ['sqlite', 'mysql', 'pgsql'];

export type Feature =
  | 'json_functions'
  | 'json_extract'
  | 'json_search'
  | 'fulltext_search'
  | 'generated_columns'
  | 'case_sensitive_like'
  | 'json1_extension'
  | 'fts_extension'
  | 'jsonb_support';

export type FeatureSet = Partial<Record<Feature, boolean>>;

export type ComparisonOperator = '=' | '!=' | '<' | '>' | '<=' | '>=';

export const COMPARISON_OPERATORS: readonly ComparisonOperator[] = ['=', '!=', '<', '>', '<=', '>='];

/** SQL text plus its bound values */
export interface SqlFragment {
  sql: string;
  params: SqlValue[];
}

export interface MigrationConfig {
  supports_fulltext: boolean;
  json_column_type: 'json' | 'jsonb' | 'text';
  text_column_type: 'text';
  supports_generated_columns: boolean;
}

export interface CapabilityAdapterOptions {
  /** Live connection, probed for SQLite features */
  db?: Database.Database;
  /** MySQL server version (e.g. "8.0.36") */
  serverVersion?: string;
  logger?: Logger;
}

/** External-content full-text index over the string slot */
export function ftsTableFor(table: string): string {
  return `${table}_fts`;
}

const featureCache = new Map<BackendKind, FeatureSet>();

/**
 * Forget detected features for every backend kind
 */
export function clearFeatureCache(): void {
  featureCache.clear();
}

/**
 * Compare dotted version strings; suffixes such as "-log" are ignored
 */
export function versionAtLeast(version: string, minimum: string): boolean {
  const parse = (v: string) => v.split(/[^0-9.]/)[0].split('.').map(part => Number(part) || 0);
  const actual = parse(version);
  const wanted = parse(minimum);
  for (let i = 0; i < Math.max(actual.length, wanted.length); i++) {
    const a = actual[i] ?? 0;
    const b = wanted[i] ?? 0;
    if (a !== b) return a > b;
  }
  return true;
}

/** Quote a term as a single FTS5 phrase */
function ftsPhrase(term: string): string {
  return `"${term.replace(/"/g, '""')}"`;
}

export class CapabilityAdapter {
  private readonly db?: Database.Database;
  private readonly serverVersion?: string;
  private readonly logger: Logger;

  constructor(readonly kind: BackendKind, options: CapabilityAdapterOptions = {}) {
    this.db = options.db;
    this.serverVersion = options.serverVersion;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Detected features (from the process-wide cache when available)
   */
  features(): FeatureSet {
    const shared = this.sharedFeatures();
    if (this.kind !== 'sqlite') {
      return shared;
    }
    return { ...shared, fulltext_search: shared.fts_extension === true && this.hasFullTextIndex() };
  }

  private sharedFeatures(): FeatureSet {
    const cached = featureCache.get(this.kind);
    if (cached) {
      return cached;
    }

    const detected = this.detect();
    featureCache.set(this.kind, detected);
    this.logger.debug({ event: 'features_detected', backend: this.kind, features: detected });
    return detected;
  }

  /** Whether this connection holds the index table that optimize creates */
  private hasFullTextIndex(): boolean {
    if (!this.db) {
      return false;
    }
    const indexTable = this.db.prepare(`
      SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?
    `).get(ftsTableFor(VALUES_TABLE));
    return indexTable !== undefined;
  }

  supports(feature: Feature): boolean {
    return this.features()[feature] ?? false;
  }

  clearCache(): void {
    featureCache.delete(this.kind);
  }

  // ==================== Detection ====================

  private detect(): FeatureSet {
    switch (this.kind) {
      case 'sqlite':
        return this.detectSqlite();
      case 'mysql':
        return {
          json_functions: true,
          json_extract: true,
          json_search: true,
          fulltext_search: true,
          generated_columns: this.serverVersion !== undefined && versionAtLeast(this.serverVersion, '5.7.0'),
          case_sensitive_like: true,
        };
      case 'pgsql':
        return {
          json_functions: true,
          json_extract: true,
          json_search: true,
          fulltext_search: true,
          generated_columns: true,
          case_sensitive_like: true,
          jsonb_support: true,
        };
    }
  }

  private detectSqlite(): FeatureSet {
    const features: FeatureSet = {
      json_functions: false,
      json_extract: false,
      json_search: false,
      fulltext_search: false,
      generated_columns: false,
      // instr() gives a case-sensitive substring test on every build
      case_sensitive_like: true,
      json1_extension: false,
      fts_extension: false,
    };

    const db = this.db;
    if (!db) {
      return features;
    }

    if (this.probe('json1', () => db.prepare(`SELECT json('{}') AS test`).get())) {
      features.json_functions = true;
      features.json_extract = true;
      features.json1_extension = true;
    }

    if (this.probe('fts5', () => {
      db.exec(`CREATE VIRTUAL TABLE IF NOT EXISTS temp.dynattr_fts_probe USING fts5(content)`);
      db.exec(`DROP TABLE IF EXISTS temp.dynattr_fts_probe`);
    })) {
      features.fts_extension = true;
    }

    return features;
  }

  private probe(name: string, fn: () => unknown): boolean {
    try {
      fn();
      return true;
    } catch (error) {
      this.logger.debug({
        event: 'feature_unavailable',
        backend: this.kind,
        feature: name,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  // ==================== Fragments ====================

  /**
   * Substring match. Case-insensitive unless requested and supported.
   */
  likeFragment(column: string, term: string, caseSensitive = false): SqlFragment {
    const pattern = `%${term}%`;

    if (caseSensitive && this.supports('case_sensitive_like')) {
      switch (this.kind) {
        case 'mysql':
          return { sql: `${column} LIKE BINARY ?`, params: [pattern] };
        case 'pgsql':
          return { sql: `${column} LIKE ?`, params: [pattern] };
        case 'sqlite':
          return { sql: `instr(${column}, ?) > 0`, params: [term] };
      }
    }

    if (this.kind === 'pgsql') {
      return { sql: `${column} ILIKE ?`, params: [pattern] };
    }
    return { sql: `${column} LIKE ?`, params: [pattern] };
  }

  /**
   * Full-text match, or a LIKE match when the backend has no full-text index
   */
  fullTextFragment(column: string, term: string): SqlFragment {
    if (!this.supports('fulltext_search')) {
      return this.likeFragment(column, term);
    }

    switch (this.kind) {
      case 'mysql':
        return { sql: `MATCH(${column}) AGAINST(? IN BOOLEAN MODE)`, params: [term] };
      case 'pgsql':
        return { sql: `to_tsvector(${column}) @@ plainto_tsquery(?)`, params: [term] };
      case 'sqlite': {
        const fts = ftsTableFor(VALUES_TABLE);
        return {
          sql: `id IN (SELECT rowid FROM ${fts} WHERE ${fts} MATCH ?)`,
          params: [ftsPhrase(term)],
        };
      }
    }
  }

  /**
   * Typed comparison; the value is converted through the attribute type
   */
  comparisonFragment(
    type: AttributeType,
    column: string,
    value: AttributeValue,
    operator: ComparisonOperator
  ): SqlFragment {
    if (!COMPARISON_OPERATORS.includes(operator)) {
      throw new Error(`Unsupported comparison operator: ${operator}`);
    }
    return { sql: `${column} ${operator} ?`, params: [TYPE_HANDLERS[type].toSql(value)] };
  }

  /**
   * Extract a top-level key from a JSON column
   */
  jsonExtractFragment(column: string, path: string): SqlFragment {
    switch (this.kind) {
      case 'mysql':
        return { sql: `JSON_EXTRACT(${column}, ?)`, params: [`$.${path}`] };
      case 'pgsql':
        return { sql: `${column}->>?`, params: [path] };
      case 'sqlite':
        return this.supports('json_extract')
          ? { sql: `json_extract(${column}, ?)`, params: [`$.${path}`] }
          : { sql: 'NULL', params: [] };
    }
  }

  // ==================== Schema advice ====================

  /**
   * Advisory index statements for the value table
   */
  indexStatements(table: string = VALUES_TABLE): string[] {
    const statements: string[] = [];

    switch (this.kind) {
      case 'mysql':
        if (this.supports('fulltext_search')) {
          statements.push(`ALTER TABLE ${table} ADD FULLTEXT INDEX ft_string_content (string_value)`);
        }
        if (this.supports('generated_columns')) {
          statements.push(
            `ALTER TABLE ${table} ADD INDEX idx_json_search ((CAST(JSON_EXTRACT(string_value, '$') AS CHAR(255))))`
          );
        }
        break;

      case 'sqlite':
        if (this.supports('fts_extension')) {
          const fts = ftsTableFor(table);
          statements.push(
            `CREATE VIRTUAL TABLE IF NOT EXISTS ${fts} USING fts5(string_value, content='${table}', content_rowid='id')`,
            `CREATE TRIGGER IF NOT EXISTS ${fts}_insert AFTER INSERT ON ${table} BEGIN ` +
              `INSERT INTO ${fts}(rowid, string_value) VALUES (new.id, new.string_value); END`,
            `CREATE TRIGGER IF NOT EXISTS ${fts}_delete AFTER DELETE ON ${table} BEGIN ` +
              `INSERT INTO ${fts}(${fts}, rowid, string_value) VALUES ('delete', old.id, old.string_value); END`,
            `CREATE TRIGGER IF NOT EXISTS ${fts}_update AFTER UPDATE ON ${table} BEGIN ` +
              `INSERT INTO ${fts}(${fts}, rowid, string_value) VALUES ('delete', old.id, old.string_value); ` +
              `INSERT INTO ${fts}(rowid, string_value) VALUES (new.id, new.string_value); END`,
            `INSERT INTO ${fts}(${fts}) VALUES ('rebuild')`
          );
        }
        break;

      case 'pgsql':
        statements.push(
          `CREATE INDEX IF NOT EXISTS idx_${table}_gin_string ON ${table} USING gin(to_tsvector('english', string_value))`,
          `CREATE INDEX IF NOT EXISTS idx_${table}_jsonb ON ${table} USING gin(string_value jsonb_path_ops) WHERE string_value IS NOT NULL`
        );
        break;
    }

    return statements;
  }

  migrationConfig(): MigrationConfig {
    switch (this.kind) {
      case 'mysql':
        return {
          supports_fulltext: true,
          json_column_type: 'json',
          text_column_type: 'text',
          supports_generated_columns: this.supports('generated_columns'),
        };
      case 'sqlite':
        return {
          supports_fulltext: this.supports('fts_extension'),
          json_column_type: 'text',
          text_column_type: 'text',
          supports_generated_columns: false,
        };
      case 'pgsql':
        return {
          supports_fulltext: true,
          json_column_type: 'jsonb',
          text_column_type: 'text',
          supports_generated_columns: true,
        };
    }
  }
}
