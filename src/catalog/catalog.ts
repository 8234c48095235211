/**
 * Attribute catalog - manages attribute definitions
 *
 * Definitions are read through a small in-memory cache; every write
 * through the catalog invalidates it.
 */

import type Database from 'better-sqlite3';
import {
  AttributeNotFoundError,
  DefinitionError,
  DuplicateAttributeError,
  type DefinitionViolation,
} from '../errors.js';
import {
  DEFAULT_DEFINITION_CACHE_TTL_MS,
  type AttributeChanges,
  type AttributeDefinition,
  type AttributeInput,
  type AttributeRow,
  type AttributeType,
  type EntityRef,
} from '../types/index.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { normalizeDefinition, validateDefinition } from './definition.js';

export interface CatalogOptions {
  /** Definition cache lifetime; 0 disables caching */
  cacheTtlMs?: number;
  logger?: Logger;
  /** Clock for cache expiry (tests) */
  now?: () => number;
  /** Runs inside the delete transaction with the entities that lost a value */
  onValuesDeleted?: (entities: EntityRef[]) => void;
}

export interface DeleteResult {
  /** Value records removed with the attribute */
  deleted: number;
  /** Entities that held a value for the attribute */
  entities: EntityRef[];
}

interface CachedDefinition {
  definition: AttributeDefinition;
  expiresAt: number;
}

export class AttributeCatalog {
  private readonly cache = new Map<string, CachedDefinition>();
  private readonly cacheTtlMs: number;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly onValuesDeleted?: (entities: EntityRef[]) => void;

  constructor(private readonly db: Database.Database, options: CatalogOptions = {}) {
    this.cacheTtlMs = options.cacheTtlMs ?? DEFAULT_DEFINITION_CACHE_TTL_MS;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
    this.onValuesDeleted = options.onValuesDeleted;
  }

  /**
   * Create a new attribute definition
   * @throws DefinitionError listing every violation
   * @throws DuplicateAttributeError if the name is taken
   */
  define(input: AttributeInput): AttributeDefinition {
    const violations = validateDefinition(input);
    const normalized = normalizeDefinition(input);
    if (violations.length > 0 || !normalized) {
      throw new DefinitionError(violations, { attribute_name: input.name });
    }

    const existing = this.db.prepare(`SELECT id FROM attributes WHERE name = ?`).get(normalized.name);
    if (existing) {
      throw new DuplicateAttributeError(normalized.name);
    }

    const now = new Date().toISOString();
    const result = this.db.prepare(`
      INSERT INTO attributes (name, label, type, required, options_json, rules_json, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      normalized.name,
      normalized.label,
      normalized.type,
      normalized.required ? 1 : 0,
      normalized.options ? JSON.stringify(normalized.options) : null,
      JSON.stringify(normalized.validationRules),
      now,
      now
    );

    this.invalidate();
    this.logger.info({ event: 'attribute_defined', attribute: normalized.name, type: normalized.type });

    return {
      id: Number(result.lastInsertRowid),
      ...normalized,
      createdAt: now,
      updatedAt: now,
    };
  }

  /**
   * Find a definition by name
   * @returns The definition, or undefined if no attribute has that name
   */
  lookup(name: string): AttributeDefinition | undefined {
    const cached = this.cache.get(name);
    if (cached && cached.expiresAt > this.now()) {
      return cached.definition;
    }

    const row = this.db.prepare(`SELECT * FROM attributes WHERE name = ?`).get(name) as AttributeRow | undefined;
    if (!row) {
      this.cache.delete(name);
      return undefined;
    }

    const definition = this.rowToDefinition(row);
    if (this.cacheTtlMs > 0) {
      this.cache.set(name, { definition, expiresAt: this.now() + this.cacheTtlMs });
    }
    return definition;
  }

  /**
   * Find a definition by name
   * @throws AttributeNotFoundError if no attribute has that name
   */
  require(name: string): AttributeDefinition {
    const definition = this.lookup(name);
    if (!definition) {
      throw new AttributeNotFoundError(name);
    }
    return definition;
  }

  list(options?: { type?: AttributeType }): AttributeDefinition[] {
    let sql = `SELECT * FROM attributes WHERE 1=1`;
    const params: string[] = [];

    if (options?.type) {
      sql += ` AND type = ?`;
      params.push(options.type);
    }

    sql += ` ORDER BY name`;

    const rows = this.db.prepare(sql).all(...params) as AttributeRow[];
    return rows.map(row => this.rowToDefinition(row));
  }

  /**
   * Number of stored values per attribute name
   */
  valueCounts(): Map<string, number> {
    const rows = this.db.prepare(`
      SELECT attribute_name, COUNT(*) AS count FROM attribute_values GROUP BY attribute_name
    `).all() as Array<{ attribute_name: string; count: number }>;
    return new Map(rows.map(row => [row.attribute_name, row.count]));
  }

  /**
   * Change label, required flag, options or rules.
   * Name and type are fixed at creation.
   */
  update(name: string, changes: AttributeChanges): AttributeDefinition {
    const current = this.require(name);

    const fixed: DefinitionViolation[] = [];
    if ('name' in changes) {
      fixed.push({ field: 'name', message: 'Attribute name cannot be changed.' });
    }
    if ('type' in changes) {
      fixed.push({ field: 'type', message: 'Attribute type cannot be changed.' });
    }

    const merged: AttributeInput = {
      name: current.name,
      label: changes.label !== undefined ? changes.label : current.label,
      type: current.type,
      required: changes.required !== undefined ? changes.required : current.required,
      options: changes.options !== undefined ? changes.options : current.options,
      validationRules: changes.validationRules !== undefined ? changes.validationRules : current.validationRules,
    };

    const violations = [...fixed, ...validateDefinition(merged)];
    const normalized = normalizeDefinition(merged);
    if (violations.length > 0 || !normalized) {
      throw new DefinitionError(violations, { attribute_name: name });
    }

    const now = new Date().toISOString();
    this.db.prepare(`
      UPDATE attributes
      SET label = ?, required = ?, options_json = ?, rules_json = ?, updated_at = ?
      WHERE id = ?
    `).run(
      normalized.label,
      normalized.required ? 1 : 0,
      normalized.options ? JSON.stringify(normalized.options) : null,
      JSON.stringify(normalized.validationRules),
      now,
      current.id
    );

    this.invalidate();

    return {
      ...current,
      label: normalized.label,
      required: normalized.required,
      options: normalized.options,
      validationRules: normalized.validationRules,
      updatedAt: now,
    };
  }

  /**
   * Delete an attribute and every value stored for it
   * @throws AttributeNotFoundError if no attribute has that name
   */
  delete(name: string): DeleteResult {
    const definition = this.require(name);

    const run = this.db.transaction((attributeId: number): DeleteResult => {
      const entities = this.db.prepare(`
        SELECT DISTINCT entity_type, entity_id FROM attribute_values
        WHERE attribute_id = ?
        ORDER BY entity_type, entity_id
      `).all(attributeId) as Array<{ entity_type: string; entity_id: string }>;

      // Explicit delete as well as the FK cascade: foreign_keys may be off on a shared connection
      const deleted = this.db.prepare(`DELETE FROM attribute_values WHERE attribute_id = ?`).run(attributeId).changes;
      this.db.prepare(`DELETE FROM attributes WHERE id = ?`).run(attributeId);

      const refs = entities.map(row => ({ type: row.entity_type, id: row.entity_id }));
      this.onValuesDeleted?.(refs);
      return { deleted, entities: refs };
    });

    const result = run(definition.id);
    this.invalidate();
    this.logger.info({ event: 'attribute_deleted', attribute: name, values_deleted: result.deleted });
    return result;
  }

  /** Drop cached definitions */
  invalidate(): void {
    this.cache.clear();
  }

  /**
   * Convert an attributes row to its external form
   */
  private rowToDefinition(row: AttributeRow): AttributeDefinition {
    return {
      id: row.id,
      name: row.name,
      label: row.label,
      type: row.type,
      required: row.required === 1,
      options: row.options_json ? JSON.parse(row.options_json) : null,
      validationRules: row.rules_json ? JSON.parse(row.rules_json) : {},
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}
