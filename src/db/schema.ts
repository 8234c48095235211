/**
 * Database schema definitions and migrations
 */

export const ATTRIBUTES_DB_VERSION = 2;

export const VALUES_TABLE = 'attribute_values';

// attributes.db schema (version 2)
export const ATTRIBUTES_DB_SCHEMA = `
-- Attribute catalog
CREATE TABLE IF NOT EXISTS attributes (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  name TEXT NOT NULL UNIQUE,
  label TEXT NOT NULL,
  type TEXT NOT NULL CHECK(type IN ('text', 'number', 'date', 'boolean', 'select')),
  required INTEGER NOT NULL DEFAULT 0,
  options_json TEXT,
  rules_json TEXT,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_attributes_type ON attributes(type);

-- Typed value records (one populated slot per row)
CREATE TABLE IF NOT EXISTS attribute_values (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  entity_id TEXT NOT NULL,
  entity_type TEXT NOT NULL,
  attribute_id INTEGER NOT NULL,
  attribute_name TEXT NOT NULL,
  string_value TEXT,
  number_value REAL,
  date_value TEXT,
  boolean_value INTEGER CHECK(boolean_value IN (0, 1)),
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  UNIQUE (entity_id, entity_type, attribute_id),
  FOREIGN KEY (attribute_id) REFERENCES attributes(id) ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS idx_values_entity ON attribute_values(entity_id, entity_type);
CREATE INDEX IF NOT EXISTS idx_values_string ON attribute_values(entity_type, attribute_name, string_value);
CREATE INDEX IF NOT EXISTS idx_values_number ON attribute_values(entity_type, attribute_name, number_value);
CREATE INDEX IF NOT EXISTS idx_values_date ON attribute_values(entity_type, attribute_name, date_value);
CREATE INDEX IF NOT EXISTS idx_values_boolean ON attribute_values(entity_type, attribute_name, boolean_value);
`;

/**
 * Migration from version 1 to version 2
 * Adds: per-slot search indexes (version 1 only had the entity index)
 */
export const ATTRIBUTES_DB_MIGRATION_1_TO_2 = `
CREATE INDEX IF NOT EXISTS idx_values_string ON attribute_values(entity_type, attribute_name, string_value);
CREATE INDEX IF NOT EXISTS idx_values_number ON attribute_values(entity_type, attribute_name, number_value);
CREATE INDEX IF NOT EXISTS idx_values_date ON attribute_values(entity_type, attribute_name, date_value);
CREATE INDEX IF NOT EXISTS idx_values_boolean ON attribute_values(entity_type, attribute_name, boolean_value);
`;
