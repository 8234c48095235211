/**
 * Attribute engine types
 */

export type AttributeType = 'text' | 'number' | 'date' | 'boolean' | 'select';

export const ATTRIBUTE_TYPES: readonly AttributeType[] = ['text', 'number', 'date', 'boolean', 'select'];

/** Typed value as stored and returned. Dates are ISO calendar dates (YYYY-MM-DD). */
export type AttributeValue = string | number | boolean | null;

/**
 * Custom rules. Legal keys depend on the attribute type:
 * text: min, max, min_length, max_length
 * number: min, max
 * date: after, before ("today" is resolved when evaluated)
 */
export interface ValidationRules {
  min?: number;
  max?: number;
  min_length?: number;
  max_length?: number;
  after?: string;
  before?: string;
}

export interface AttributeDefinition {
  id: number;
  name: string;
  label: string;
  type: AttributeType;
  required: boolean;
  options: string[] | null;
  validationRules: ValidationRules;
  createdAt: string;
  updatedAt: string;
}

/** Input accepted by the catalog; fields are unknown until validated */
export interface AttributeInput {
  name: unknown;
  label: unknown;
  type: unknown;
  required?: unknown;
  options?: unknown;
  validationRules?: unknown;
}

export interface AttributeChanges {
  label?: unknown;
  required?: unknown;
  options?: unknown;
  validationRules?: unknown;
}

/** Opaque host record id; numbers are stored as their string form */
export type EntityId = string | number;

/** Host record reference: type tag plus id. A null id means "not persisted yet". */
export interface EntityRef {
  type: string;
  id: EntityId | null | undefined;
}

/** Flat attributeName -> value snapshot of one entity */
export type CacheDocument = Record<string, AttributeValue>;

/** Value table row (attribute_values) */
export interface ValueRecordRow {
  id: number;
  entity_id: string;
  entity_type: string;
  attribute_id: number;
  attribute_name: string;
  string_value: string | null;
  number_value: number | null;
  date_value: string | null;
  boolean_value: number | null; // 0 or 1 (SQLite doesn't have boolean)
  created_at: string;
  updated_at: string;
}

/** Attribute table row (attributes) */
export interface AttributeRow {
  id: number;
  name: string;
  label: string;
  type: AttributeType;
  required: number;
  options_json: string | null;
  rules_json: string | null;
  created_at: string;
  updated_at: string;
}
