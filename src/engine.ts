/**
 * Engine facade - wires the catalog, validation, storage, cache and search
 * components around one database connection
 */

import type Database from 'better-sqlite3';
import { CapabilityAdapter, type BackendKind, type FeatureSet, type MigrationConfig } from './backend/capabilities.js';
import { CacheDocumentStore } from './cache/documents.js';
import { CacheSynchronizer } from './cache/synchronizer.js';
import { AttributeCatalog, type DeleteResult } from './catalog/catalog.js';
import { guardStorage } from './db/guard.js';
import { VALUES_TABLE } from './db/schema.js';
import { SearchCompiler } from './search/compiler.js';
import { ValueStore } from './store/value-store.js';
import type { HostTableConfig } from './types/index.js';
import { silentLogger, type Logger } from './utils/logger.js';
import { ValidationEngine } from './validation/engine.js';

export interface EngineOptions {
  db: Database.Database;
  /** Dialect used for capability reporting and fragments (default: sqlite) */
  backend?: BackendKind;
  /** MySQL server version, when backend is mysql */
  serverVersion?: string;
  /** Entity types whose host table carries a cache document */
  hosts?: Record<string, HostTableConfig>;
  definitionCacheTtlMs?: number;
  /** Resolves the "today" rule sentinel */
  today?: () => string;
  logger?: Logger;
}

export interface OptimizeOptions {
  /** Only list the statements */
  dryRun?: boolean;
}

export interface OptimizeResult {
  statements: string[];
  applied: string[];
  skipped: Array<{ statement: string; error: string }>;
}

export interface DatabaseInfo {
  backend: BackendKind;
  features: FeatureSet;
  migration: MigrationConfig;
  schemaVersion: number;
}

export interface Engine {
  catalog: AttributeCatalog;
  validator: ValidationEngine;
  values: ValueStore;
  cache: CacheSynchronizer;
  search: SearchCompiler;
  adapter: CapabilityAdapter;
  /** Delete an attribute, its values and the affected cache documents in one transaction */
  deleteAttribute(name: string): DeleteResult;
  optimize(options?: OptimizeOptions): OptimizeResult;
  databaseInfo(): DatabaseInfo;
}

export function createEngine(options: EngineOptions): Engine {
  const { db } = options;
  const logger = options.logger ?? silentLogger;

  const adapter = new CapabilityAdapter(options.backend ?? 'sqlite', {
    db,
    serverVersion: options.serverVersion,
    logger,
  });
  const documents = new CacheDocumentStore(db, adapter, options.hosts, logger);
  const cache = new CacheSynchronizer(db, documents, logger);
  const catalog = new AttributeCatalog(db, {
    cacheTtlMs: options.definitionCacheTtlMs,
    logger,
    onValuesDeleted: entities => {
      for (const ref of entities) {
        cache.refresh(ref);
      }
    },
  });
  const validator = new ValidationEngine({ today: options.today });
  const values = new ValueStore({ db, catalog, validator, cache, logger });
  const search = new SearchCompiler({ db, catalog, adapter, logger });

  const deleteAttribute = (name: string): DeleteResult => {
    return guardStorage(logger, 'deletion', { attributes: [name] }, () => catalog.delete(name));
  };

  const optimize = (optimizeOptions: OptimizeOptions = {}): OptimizeResult => {
    const statements = adapter.indexStatements(VALUES_TABLE);
    const result: OptimizeResult = { statements, applied: [], skipped: [] };
    if (optimizeOptions.dryRun) {
      return result;
    }

    for (const statement of statements) {
      try {
        db.exec(statement);
        result.applied.push(statement);
        logger.info({ event: 'optimization_applied', statement });
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        result.skipped.push({ statement, error: message });
        logger.warn({ event: 'optimization_failed', statement, error: message });
      }
    }

    adapter.clearCache();
    return result;
  };

  const databaseInfo = (): DatabaseInfo => ({
    backend: adapter.kind,
    features: adapter.features(),
    migration: adapter.migrationConfig(),
    schemaVersion: db.pragma('user_version', { simple: true }) as number,
  });

  return { catalog, validator, values, cache, search, adapter, deleteAttribute, optimize, databaseInfo };
}
