/**
 * Shared fixtures for engine tests
 */

import type Database from 'better-sqlite3';
import { mkdirSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { closeAllDbs, openAttributesDb } from '../db/connection.js';
import { createLogger, type LogEntry, type Logger } from '../utils/logger.js';
import type { AttributeDefinition } from '../types/index.js';

export interface TestDb {
  dir: string;
  db: Database.Database;
  cleanup(): void;
}

/**
 * Fresh attributes database in its own temp directory
 */
export function createTestDb(): TestDb {
  const dir = join(tmpdir(), `dynattr-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  mkdirSync(dir, { recursive: true });
  const db = openAttributesDb(join(dir, 'attributes.db'));

  return {
    dir,
    db,
    cleanup() {
      db.close();
      closeAllDbs();
      rmSync(dir, { recursive: true, force: true });
    },
  };
}

/**
 * Host table with a JSON cache column and one row per id
 */
export function createHostTable(db: Database.Database, table: string, ids: number[]): void {
  db.exec(`CREATE TABLE ${table} (id INTEGER PRIMARY KEY, name TEXT, dynamic_attributes TEXT)`);
  const insert = db.prepare(`INSERT INTO ${table} (id, name) VALUES (?, ?)`);
  for (const id of ids) {
    insert.run(id, `${table}-${id}`);
  }
}

/** Raw cache column of one host row */
export function readCacheColumn(db: Database.Database, table: string, id: number): string | null {
  const row = db.prepare(`SELECT dynamic_attributes FROM ${table} WHERE id = ?`).get(id) as
    | { dynamic_attributes: string | null }
    | undefined;
  return row ? row.dynamic_attributes : null;
}

/**
 * Logger that keeps parsed entries in memory
 */
export function createCapturingLogger(): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = createLogger((line) => {
    entries.push(JSON.parse(line) as LogEntry);
  }, 'debug');
  return { logger, entries };
}

/**
 * In-memory definition for validation tests
 */
export function makeDefinition(partial: Partial<AttributeDefinition> & Pick<AttributeDefinition, 'name' | 'type'>): AttributeDefinition {
  return {
    id: 1,
    label: partial.name,
    required: false,
    options: null,
    validationRules: {},
    createdAt: '2024-01-01T00:00:00.000Z',
    updatedAt: '2024-01-01T00:00:00.000Z',
    ...partial,
  };
}
