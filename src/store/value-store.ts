/**
 * Value store - validate-then-write access to attribute values
 *
 * Every mutation writes the value rows and refreshes the entity's cache
 * document inside one transaction.
 */

import type Database from 'better-sqlite3';
import type { CacheSynchronizer } from '../cache/synchronizer.js';
import type { AttributeCatalog } from '../catalog/catalog.js';
import { guardStorage } from '../db/guard.js';
import { EntityNotPersistedError, ValidationError, type ValidationIssue } from '../errors.js';
import type { AttributeDefinition, AttributeValue, CacheDocument, EntityRef } from '../types/index.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import type { ValidationEngine } from '../validation/engine.js';
import { ValueRecordStore, toEntityId } from './value-records.js';

export interface ValueStoreDeps {
  db: Database.Database;
  catalog: AttributeCatalog;
  validator: ValidationEngine;
  cache: CacheSynchronizer;
  logger?: Logger;
}

interface PreparedValue {
  definition: AttributeDefinition;
  value: AttributeValue;
}

export class ValueStore {
  private readonly db: Database.Database;
  private readonly catalog: AttributeCatalog;
  private readonly validator: ValidationEngine;
  private readonly cache: CacheSynchronizer;
  private readonly records: ValueRecordStore;
  private readonly logger: Logger;

  constructor(deps: ValueStoreDeps) {
    this.db = deps.db;
    this.catalog = deps.catalog;
    this.validator = deps.validator;
    this.cache = deps.cache;
    this.records = new ValueRecordStore(deps.db);
    this.logger = deps.logger ?? silentLogger;
  }

  /**
   * Set one attribute value
   * @returns The cast value that was stored
   * @throws EntityNotPersistedError, AttributeNotFoundError, ValidationError, StorageError
   */
  setOne(ref: EntityRef, name: string, raw: unknown): AttributeValue {
    const entityId = this.requirePersisted(ref);
    const definition = this.catalog.require(name);
    this.validator.assertValid(definition, raw);
    const value = this.validator.cast(definition, raw);

    const context = { entityType: ref.type, entityId, attributes: [name] };
    guardStorage(this.logger, 'update', context, () => {
      this.db.transaction(() => {
        this.records.upsert(ref.type, entityId, definition, value);
        this.cache.refresh(ref);
      })();
    });

    return value;
  }

  /**
   * Set several values at once. Nothing is written unless every entry is valid.
   * @returns The cast values that were stored
   * @throws ValidationError aggregating every failing entry (unknown names included)
   */
  setMany(ref: EntityRef, values: Record<string, unknown>): CacheDocument {
    const entityId = this.requirePersisted(ref);
    const names = Object.keys(values);
    if (names.length === 0) {
      return {};
    }

    // Phase 1: validation only
    const prepared: PreparedValue[] = [];
    const issues: ValidationIssue[] = [];
    for (const name of names) {
      const raw = values[name];
      const definition = this.catalog.lookup(name);
      if (!definition) {
        issues.push({
          attributeName: name,
          label: null,
          type: null,
          messages: [`The attribute '${name}' does not exist.`],
          value: raw,
        });
        continue;
      }
      const issue = this.validator.issueFor(definition, raw);
      if (issue) {
        issues.push(issue);
        continue;
      }
      prepared.push({ definition, value: this.validator.cast(definition, raw) });
    }

    if (issues.length > 0) {
      throw new ValidationError(issues, { entity_type: ref.type, entity_id: entityId });
    }

    // Phase 2: one transaction, one cache refresh
    guardStorage(this.logger, 'update', { entityType: ref.type, entityId, attributes: names }, () => {
      this.db.transaction(() => {
        for (const { definition, value } of prepared) {
          this.records.upsert(ref.type, entityId, definition, value);
        }
        this.cache.refresh(ref);
      })();
    });

    const stored: CacheDocument = {};
    for (const { definition, value } of prepared) {
      stored[definition.name] = value;
    }
    return stored;
  }

  /**
   * Read one value; null when unset or the entity has no identity
   */
  getOne(ref: EntityRef, name: string): AttributeValue {
    const entityId = toEntityId(ref.id);
    if (entityId === null) {
      return null;
    }

    return guardStorage(this.logger, 'read', { entityType: ref.type, entityId, attributes: [name] }, () => {
      const document = this.cache.documents.read(ref.type, entityId);
      if (document) {
        return Object.hasOwn(document, name) ? document[name] : null;
      }
      return this.records.getValue(ref.type, entityId, name) ?? null;
    });
  }

  /**
   * Read every value of an entity; empty when nothing is stored
   */
  getAll(ref: EntityRef): CacheDocument {
    const entityId = toEntityId(ref.id);
    if (entityId === null) {
      return {};
    }

    return guardStorage(this.logger, 'read', { entityType: ref.type, entityId }, () => {
      const document = this.cache.documents.read(ref.type, entityId);
      return document ?? this.records.documentFor(ref.type, entityId);
    });
  }

  /**
   * Remove one value
   * @returns true if a value was stored
   */
  remove(ref: EntityRef, name: string): boolean {
    const entityId = this.requirePersisted(ref);
    const definition = this.catalog.require(name);

    return guardStorage(this.logger, 'removal', { entityType: ref.type, entityId, attributes: [name] }, () =>
      this.db.transaction(() => {
        const removed = this.records.delete(ref.type, entityId, definition.id);
        this.cache.refresh(ref);
        return removed;
      })()
    );
  }

  /**
   * Stored id of a reference that can take values
   * @throws EntityNotPersistedError when the id is missing or the host row does not exist
   */
  private requirePersisted(ref: EntityRef): string {
    const entityId = toEntityId(ref.id);
    if (entityId === null) {
      throw new EntityNotPersistedError(ref);
    }

    const hostMissing = guardStorage(this.logger, 'update', { entityType: ref.type, entityId }, () =>
      this.cache.documents.hasSlot(ref.type) && !this.cache.documents.exists(ref.type, entityId)
    );
    if (hostMissing) {
      throw new EntityNotPersistedError(ref, { reason: 'host record not found' });
    }
    return entityId;
  }
}
