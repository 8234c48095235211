/**
 * Search compiler - evaluates filter maps into entity-id sets
 *
 * AND searches start from every entity of the type that has any stored
 * value and intersect with each filter's matches, stopping as soon as the
 * set is empty. OR searches union the per-filter matches.
 *
 * NULL matches entities holding an explicit null for the attribute plus
 * every known entity of the type without a non-null value. An entity with
 * no values at all is unknown here and never matches: the value table has
 * no universe of host ids.
 *
 * Operands are cast through the attribute's type first, so "5" compares
 * as 5 against a number attribute but stays lexicographic against text.
 */

import type Database from 'better-sqlite3';
import type { CapabilityAdapter, ComparisonOperator, SqlFragment } from '../backend/capabilities.js';
import type { AttributeCatalog } from '../catalog/catalog.js';
import { guardStorage } from '../db/guard.js';
import { VALUES_TABLE } from '../db/schema.js';
import { InvalidFilterError } from '../errors.js';
import type { AttributeDefinition, AttributeType, AttributeValue, EntityId } from '../types/index.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { TYPE_HANDLERS, columnFor, type SqlValue } from '../validation/types.js';
import type {
  FilterCriteria,
  FilterMap,
  FilterOperator,
  FilterValue,
  LikeOptions,
  SearchLogic,
  SortDirection,
} from './types.js';

export interface SearchCompilerDeps {
  db: Database.Database;
  catalog: AttributeCatalog;
  adapter: CapabilityAdapter;
  logger?: Logger;
}

type CompiledFilter =
  | { kind: 'null'; definition: AttributeDefinition }
  | { kind: 'match'; definition: AttributeDefinition; fragment: SqlFragment | null };

const OPERATOR_ALIASES: Record<string, FilterOperator> = {
  '==': '=',
  '<>': '!=',
  'ILIKE': 'LIKE',
  'IS NULL': 'NULL',
  'IS NOT NULL': 'NOT NULL',
};

const OPERATORS: readonly FilterOperator[] = [
  '=', '!=', '<', '>', '<=', '>=', 'LIKE', 'IN', 'BETWEEN', 'NULL', 'NOT NULL',
];

function isFilterOperator(value: string): value is FilterOperator {
  return (OPERATORS as readonly string[]).includes(value);
}

/**
 * Canonical operator name, or null when the operator is unknown
 */
export function normalizeOperator(raw: string): FilterOperator | null {
  const upper = raw.trim().toUpperCase().replace(/\s+/g, ' ');
  const canonical = OPERATOR_ALIASES[upper] ?? upper;
  return isFilterOperator(canonical) ? canonical : null;
}

function isCriteria(value: FilterValue): value is FilterCriteria {
  return typeof value === 'object' && value !== null;
}

function intersect(a: Set<string>, b: Set<string>): Set<string> {
  const result = new Set<string>();
  for (const id of a) {
    if (b.has(id)) result.add(id);
  }
  return result;
}

function compareValues(a: AttributeValue, b: AttributeValue): number {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  const left = String(a);
  const right = String(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

export class SearchCompiler {
  private readonly db: Database.Database;
  private readonly catalog: AttributeCatalog;
  private readonly adapter: CapabilityAdapter;
  private readonly logger: Logger;

  constructor(deps: SearchCompilerDeps) {
    this.db = deps.db;
    this.catalog = deps.catalog;
    this.adapter = deps.adapter;
    this.logger = deps.logger ?? silentLogger;
  }

  /**
   * Entities matching every filter
   * @throws AttributeNotFoundError for an unknown attribute name
   * @throws InvalidFilterError for malformed criteria
   */
  search(entityType: string, filters: FilterMap): Set<string> {
    const names = Object.keys(filters);
    if (names.length === 0) {
      return new Set();
    }

    const compiled = names.map(name => this.compile(name, filters[name]));

    return this.guarded(entityType, names, () => {
      let ids = this.universe(entityType);
      for (const filter of compiled) {
        ids = intersect(ids, this.evaluate(entityType, filter));
        if (ids.size === 0) break;
      }
      return ids;
    });
  }

  advancedSearch(entityType: string, filters: FilterMap, logic: SearchLogic = 'AND'): Set<string> {
    if (logic !== 'OR') {
      return this.search(entityType, filters);
    }

    const names = Object.keys(filters);
    const compiled = names.map(name => this.compile(name, filters[name]));

    return this.guarded(entityType, names, () => {
      const ids = new Set<string>();
      for (const filter of compiled) {
        for (const id of this.evaluate(entityType, filter)) {
          ids.add(id);
        }
      }
      return ids;
    });
  }

  // ==================== Typed shortcuts ====================

  /**
   * Substring (or full-text) search on a text attribute.
   * Empty when the attribute is unknown or not text.
   */
  searchText(entityType: string, name: string, term: string, options: LikeOptions = {}): Set<string> {
    return this.typedSearch(entityType, name, 'text', { operator: 'LIKE', value: term, options });
  }

  searchNumberRange(entityType: string, name: string, min: number, max: number): Set<string> {
    return this.typedSearch(entityType, name, 'number', { operator: 'BETWEEN', min, max });
  }

  searchDateRange(entityType: string, name: string, start: unknown, end: unknown): Set<string> {
    return this.typedSearch(entityType, name, 'date', { operator: 'BETWEEN', min: start, max: end });
  }

  searchBoolean(entityType: string, name: string, value: boolean): Set<string> {
    return this.typedSearch(entityType, name, 'boolean', { operator: '=', value });
  }

  /**
   * Order ids by an attribute's value. Entities without a value come last.
   */
  sortByAttribute(
    entityType: string,
    ids: Iterable<EntityId>,
    name: string,
    direction: SortDirection = 'asc'
  ): string[] {
    const definition = this.catalog.require(name);
    const column = columnFor(definition.type);

    const values = this.guarded(entityType, [name], () => {
      const rows = this.db.prepare(`
        SELECT entity_id, ${column} AS value FROM ${VALUES_TABLE}
        WHERE entity_type = ? AND attribute_name = ?
      `).all(entityType, name) as Array<{ entity_id: string; value: SqlValue }>;
      return new Map(rows.map(row => [row.entity_id, row.value]));
    });

    const sign = direction === 'desc' ? -1 : 1;
    const keyed = [...ids].map(id => {
      const entityId = String(id);
      return { id: entityId, value: values.get(entityId) ?? null };
    });

    keyed.sort((a, b) => {
      if (a.value === null && b.value === null) return compareValues(a.id, b.id);
      if (a.value === null) return 1;
      if (b.value === null) return -1;
      return sign * compareValues(a.value, b.value) || compareValues(a.id, b.id);
    });

    return keyed.map(entry => entry.id);
  }

  // ==================== Compilation ====================

  private typedSearch(entityType: string, name: string, type: AttributeType, criteria: FilterCriteria): Set<string> {
    const definition = this.catalog.lookup(name);
    if (!definition || definition.type !== type) {
      return new Set();
    }
    const filter = this.compileCriteria(definition, criteria);
    return this.guarded(entityType, [name], () => this.evaluate(entityType, filter));
  }

  private compile(name: string, criteria: FilterValue): CompiledFilter {
    const definition = this.catalog.require(name);

    if (!isCriteria(criteria)) {
      if (criteria === null) {
        return { kind: 'null', definition };
      }
      return this.comparison(definition, '=', criteria);
    }
    return this.compileCriteria(definition, criteria);
  }

  private compileCriteria(definition: AttributeDefinition, criteria: FilterCriteria): CompiledFilter {
    const rawOperator = criteria.operator ?? '=';
    const operator = normalizeOperator(rawOperator);
    if (!operator) {
      throw new InvalidFilterError(definition.name, `unknown operator '${rawOperator}'`);
    }

    const column = columnFor(definition.type);

    switch (operator) {
      case 'NULL':
        return { kind: 'null', definition };

      case 'NOT NULL':
        return { kind: 'match', definition, fragment: { sql: `${column} IS NOT NULL`, params: [] } };

      case 'LIKE': {
        const value = criteria.value;
        if (typeof value !== 'string' && typeof value !== 'number') {
          throw new InvalidFilterError(definition.name, 'LIKE needs a string value');
        }
        const term = String(value);
        const options = criteria.options ?? {};
        const caseSensitive = options.case_sensitive === true && rawOperator.trim().toUpperCase() !== 'ILIKE';
        const fragment = options.full_text === true && definition.type === 'text'
          ? this.adapter.fullTextFragment(column, term)
          : this.adapter.likeFragment(column, term, caseSensitive);
        return { kind: 'match', definition, fragment };
      }

      case 'IN': {
        if (!Array.isArray(criteria.value)) {
          throw new InvalidFilterError(definition.name, 'IN needs an array of values');
        }
        if (criteria.value.length === 0) {
          return { kind: 'match', definition, fragment: null };
        }
        const params = criteria.value.map((raw: unknown) => this.operand(definition, raw));
        return {
          kind: 'match',
          definition,
          fragment: { sql: `${column} IN (${params.map(() => '?').join(', ')})`, params },
        };
      }

      case 'BETWEEN': {
        if (criteria.min === undefined || criteria.min === null || criteria.max === undefined || criteria.max === null) {
          throw new InvalidFilterError(definition.name, 'BETWEEN needs both min and max');
        }
        const params = [this.operand(definition, criteria.min), this.operand(definition, criteria.max)];
        return { kind: 'match', definition, fragment: { sql: `${column} BETWEEN ? AND ?`, params } };
      }

      default:
        if (criteria.value === null || criteria.value === undefined) {
          throw new InvalidFilterError(definition.name, `${operator} needs a value`);
        }
        return this.comparison(definition, operator, criteria.value);
    }
  }

  private comparison(definition: AttributeDefinition, operator: ComparisonOperator, raw: unknown): CompiledFilter {
    const value = this.castOperand(definition, raw);
    return {
      kind: 'match',
      definition,
      fragment: this.adapter.comparisonFragment(definition.type, columnFor(definition.type), value, operator),
    };
  }

  private castOperand(definition: AttributeDefinition, raw: unknown): AttributeValue {
    const value = TYPE_HANDLERS[definition.type].cast(raw);
    if (value === null) {
      throw new InvalidFilterError(
        definition.name,
        `'${String(raw)}' is not a valid ${definition.type} value`
      );
    }
    return value;
  }

  private operand(definition: AttributeDefinition, raw: unknown): SqlValue {
    return TYPE_HANDLERS[definition.type].toSql(this.castOperand(definition, raw));
  }

  // ==================== Evaluation ====================

  private evaluate(entityType: string, filter: CompiledFilter): Set<string> {
    const name = filter.definition.name;

    if (filter.kind === 'null') {
      const column = columnFor(filter.definition.type);
      const nonNull = this.matching(entityType, name, { sql: `${column} IS NOT NULL`, params: [] });
      const ids = new Set<string>();
      for (const id of this.universe(entityType)) {
        if (!nonNull.has(id)) ids.add(id);
      }
      return ids;
    }

    if (!filter.fragment) {
      return new Set();
    }
    return this.matching(entityType, name, filter.fragment);
  }

  /** Every entity of the type with at least one stored value */
  private universe(entityType: string): Set<string> {
    const rows = this.db.prepare(`
      SELECT DISTINCT entity_id FROM ${VALUES_TABLE} WHERE entity_type = ?
    `).all(entityType) as Array<{ entity_id: string }>;
    return new Set(rows.map(row => row.entity_id));
  }

  private matching(entityType: string, name: string, fragment: SqlFragment): Set<string> {
    const rows = this.db.prepare(`
      SELECT DISTINCT entity_id FROM ${VALUES_TABLE}
      WHERE entity_type = ? AND attribute_name = ? AND (${fragment.sql})
    `).all(entityType, name, ...fragment.params) as Array<{ entity_id: string }>;
    return new Set(rows.map(row => row.entity_id));
  }

  private guarded<T>(entityType: string, attributes: string[], fn: () => T): T {
    return guardStorage(this.logger, 'search', { entityType, attributes }, fn);
  }
}
