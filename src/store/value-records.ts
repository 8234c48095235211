/**
 * Value records - typed (entity, attribute) rows in attribute_values
 */

import type Database from 'better-sqlite3';
import type {
  AttributeDefinition,
  AttributeValue,
  CacheDocument,
  EntityId,
  ValueRecordRow,
} from '../types/index.js';
import { slotValuesFor, valueFromSlots } from '../validation/types.js';

/**
 * Stored form of an entity id, or null when the reference has no identity yet
 */
export function toEntityId(id: EntityId | null | undefined): string | null {
  if (id === null || id === undefined) return null;
  const value = String(id);
  return value === '' ? null : value;
}

export class ValueRecordStore {
  constructor(private readonly db: Database.Database) {}

  /**
   * Insert or replace the value of one attribute for one entity.
   * Only the slot matching the attribute type is populated.
   */
  upsert(entityType: string, entityId: string, definition: AttributeDefinition, value: AttributeValue): void {
    const slots = slotValuesFor(definition.type, value);
    const now = new Date().toISOString();

    this.db.prepare(`
      INSERT INTO attribute_values (
        entity_id, entity_type, attribute_id, attribute_name,
        string_value, number_value, date_value, boolean_value,
        created_at, updated_at
      )
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT (entity_id, entity_type, attribute_id) DO UPDATE SET
        attribute_name = excluded.attribute_name,
        string_value = excluded.string_value,
        number_value = excluded.number_value,
        date_value = excluded.date_value,
        boolean_value = excluded.boolean_value,
        updated_at = excluded.updated_at
    `).run(
      entityId,
      entityType,
      definition.id,
      definition.name,
      slots.string_value,
      slots.number_value,
      slots.date_value,
      slots.boolean_value,
      now,
      now
    );
  }

  /**
   * @returns true if a record was removed
   */
  delete(entityType: string, entityId: string, attributeId: number): boolean {
    const result = this.db.prepare(`
      DELETE FROM attribute_values WHERE entity_type = ? AND entity_id = ? AND attribute_id = ?
    `).run(entityType, entityId, attributeId);
    return result.changes > 0;
  }

  listForEntity(entityType: string, entityId: string): ValueRecordRow[] {
    return this.db.prepare(`
      SELECT * FROM attribute_values
      WHERE entity_type = ? AND entity_id = ?
      ORDER BY attribute_name
    `).all(entityType, entityId) as ValueRecordRow[];
  }

  /**
   * Every current value of an entity, keyed by attribute name
   */
  documentFor(entityType: string, entityId: string): CacheDocument {
    const document: CacheDocument = {};
    for (const row of this.listForEntity(entityType, entityId)) {
      document[row.attribute_name] = valueFromSlots(row);
    }
    return document;
  }

  /**
   * @returns The typed value, or undefined when no record exists
   */
  getValue(entityType: string, entityId: string, attributeName: string): AttributeValue | undefined {
    const row = this.db.prepare(`
      SELECT * FROM attribute_values
      WHERE entity_type = ? AND entity_id = ? AND attribute_name = ?
    `).get(entityType, entityId, attributeName) as ValueRecordRow | undefined;
    return row ? valueFromSlots(row) : undefined;
  }

  /**
   * Ids of every entity of a type with at least one stored value, in id order
   */
  entityIds(entityType: string): string[] {
    const rows = this.db.prepare(`
      SELECT DISTINCT entity_id FROM attribute_values WHERE entity_type = ? ORDER BY entity_id
    `).all(entityType) as Array<{ entity_id: string }>;
    return rows.map(row => row.entity_id);
  }

  /**
   * Entity types that have stored values
   */
  entityTypes(): string[] {
    const rows = this.db.prepare(`
      SELECT DISTINCT entity_type FROM attribute_values ORDER BY entity_type
    `).all() as Array<{ entity_type: string }>;
    return rows.map(row => row.entity_type);
  }
}
