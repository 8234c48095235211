/**
 * Configuration types for dynattr
 */

import type { LogLevel } from '../utils/logger.js';

/**
 * Host table that carries a cache document column for one entity type
 */
export interface HostTableConfig {
  /** Table holding the host records */
  table: string;
  /** Primary key column (default: 'id') */
  idColumn?: string;
  /** JSON cache column (default: 'dynamic_attributes') */
  column?: string;
}

export interface DatabaseConfig {
  /** SQLite file, relative to the config directory unless absolute (default: 'attributes.db') */
  path?: string;
  /** MySQL server version, used only when describing the mysql dialect */
  serverVersion?: string;
}

export interface CacheConfig {
  /** entity type -> host table with a cache column */
  hosts?: Record<string, HostTableConfig>;
}

export interface CatalogConfig {
  /** How long attribute definitions stay in memory (default: 5000) */
  definitionCacheTtlMs?: number;
}

export interface SyncConfig {
  /** Entities per transaction during resync (default: 100) */
  batchSize?: number;
}

export interface LoggingConfig {
  level?: LogLevel;
}

export interface Config {
  version: 1;
  database?: DatabaseConfig;
  cache?: CacheConfig;
  catalog?: CatalogConfig;
  sync?: SyncConfig;
  logging?: LoggingConfig;
}

export const DEFAULT_DB_FILE = 'attributes.db';
export const DEFAULT_BATCH_SIZE = 100;
export const DEFAULT_DEFINITION_CACHE_TTL_MS = 5000;

export const DEFAULT_CONFIG: Config = {
  version: 1,
  database: { path: DEFAULT_DB_FILE },
  cache: { hosts: {} },
  catalog: { definitionCacheTtlMs: DEFAULT_DEFINITION_CACHE_TTL_MS },
  sync: { batchSize: DEFAULT_BATCH_SIZE },
  logging: { level: 'info' },
};
