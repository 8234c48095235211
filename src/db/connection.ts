/**
 * Database connection management
 */

import Database from 'better-sqlite3';
import { dirname, isAbsolute, join } from 'path';
import { mkdirSync } from 'fs';
import { ATTRIBUTES_DB_SCHEMA, ATTRIBUTES_DB_VERSION, ATTRIBUTES_DB_MIGRATION_1_TO_2 } from './schema.js';
import { getDefaultConfigDir } from '../utils/config-path.js';
import { DEFAULT_DB_FILE } from '../types/index.js';

let attributesDb: Database.Database | null = null;
let attributesDbPath: string | null = null;

/**
 * Get the database directory
 */
export function getDbDir(configDir?: string): string {
  return configDir || getDefaultConfigDir();
}

/**
 * Resolve the database file path (relative paths live in the config directory)
 */
export function resolveDbPath(configDir?: string, dbFile: string = DEFAULT_DB_FILE): string {
  if (dbFile === ':memory:' || isAbsolute(dbFile)) {
    return dbFile;
  }
  return join(getDbDir(configDir), dbFile);
}

/**
 * Tell the operator which file failed and how to start over
 */
function printDbError(dbPath: string, err: unknown, operation: 'open' | 'migrate'): void {
  const reason = err instanceof Error ? err.message : String(err);
  console.error(`dynattr: cannot ${operation} attributes database ${dbPath}: ${reason}`);
  console.error(`  Move it aside to start with an empty catalog: mv "${dbPath}" "${dbPath}.bak"`);
}

/**
 * Open an attributes database and bring its schema up to date
 */
export function openAttributesDb(dbPath: string): Database.Database {
  let db: Database.Database;
  try {
    db = new Database(dbPath);
  } catch (err) {
    printDbError(dbPath, err, 'open');
    throw err;
  }

  // Enable foreign keys (value records cascade with their attribute)
  db.pragma('foreign_keys = ON');

  const currentVersion = db.pragma('user_version', { simple: true }) as number;

  try {
    if (currentVersion === 0) {
      // Fresh database - create full schema
      db.exec(ATTRIBUTES_DB_SCHEMA);
      db.pragma(`user_version = ${ATTRIBUTES_DB_VERSION}`);
    } else if (currentVersion < ATTRIBUTES_DB_VERSION) {
      runMigrations(db, currentVersion);
      db.pragma(`user_version = ${ATTRIBUTES_DB_VERSION}`);
    }
  } catch (err) {
    // Close DB before re-throwing
    db.close();
    printDbError(dbPath, err, 'migrate');
    throw err;
  }

  return db;
}

/**
 * Run incremental migrations
 */
function runMigrations(db: Database.Database, fromVersion: number): void {
  // Migration 1 → 2: per-slot search indexes
  if (fromVersion < 2) {
    const migrate = db.transaction(() => {
      const statements = ATTRIBUTES_DB_MIGRATION_1_TO_2
        .split(';')
        .map(s => s.trim())
        .filter(s => s.length > 0 && !s.startsWith('--'));

      for (const stmt of statements) {
        db.exec(stmt + ';');
      }
    });
    migrate();
  }
}

/**
 * Get or create the attributes database connection for a config directory
 */
export function getAttributesDb(configDir?: string, dbFile?: string): Database.Database {
  const dbPath = resolveDbPath(configDir, dbFile);

  if (attributesDb && attributesDbPath === dbPath) {
    return attributesDb;
  }

  if (dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  // Close existing connection if different path
  if (attributesDb) {
    attributesDb.close();
  }

  attributesDbPath = dbPath;
  attributesDb = openAttributesDb(dbPath);
  return attributesDb;
}

/**
 * Close all database connections
 */
export function closeAllDbs(): void {
  if (attributesDb) {
    attributesDb.close();
    attributesDb = null;
  }
  attributesDbPath = null;
}
