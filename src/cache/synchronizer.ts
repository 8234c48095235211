/**
 * Cache synchronizer
 *
 * Keeps each entity's cache document equal to its rows in attribute_values.
 * Documents are always rewritten in full from the value table.
 */

import type Database from 'better-sqlite3';
import { StorageError } from '../errors.js';
import { ValueRecordStore, toEntityId } from '../store/value-records.js';
import { DEFAULT_BATCH_SIZE, type CacheDocument, type EntityRef } from '../types/index.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import type { CacheDocumentStore } from './documents.js';

export interface ResyncOptions {
  /** Entities per transaction (default: 100) */
  batchSize?: number;
  /** Count what would be rebuilt without writing */
  dryRun?: boolean;
  /** Called after each committed batch with the running total */
  onBatch?: (processed: number, total: number) => void;
}

/** Both documents hold the same keys with identical values */
export function documentsEqual(a: CacheDocument, b: CacheDocument): boolean {
  const keysA = Object.keys(a).sort();
  const keysB = Object.keys(b).sort();
  if (keysA.length !== keysB.length) return false;
  return keysA.every((key, i) => key === keysB[i] && a[key] === b[key]);
}

export class CacheSynchronizer {
  private readonly records: ValueRecordStore;
  private readonly logger: Logger;

  constructor(
    private readonly db: Database.Database,
    readonly documents: CacheDocumentStore,
    logger?: Logger
  ) {
    this.records = new ValueRecordStore(db);
    this.logger = logger ?? silentLogger;
  }

  /**
   * Rebuild one entity's document from the value table.
   * @returns false when the type carries no document or the host row is missing
   */
  refresh(ref: EntityRef): boolean {
    const entityId = toEntityId(ref.id);
    if (entityId === null || !this.documents.hasSlot(ref.type)) {
      return false;
    }
    const document = this.records.documentFor(ref.type, entityId);
    return this.documents.write(ref.type, entityId, document);
  }

  /**
   * Rebuild the documents of every entity of a type that has stored values.
   * Each batch commits on its own; a failing batch rolls back and stops the run.
   * @returns Number of documents rebuilt (or that would be, on a dry run)
   * @throws StorageError carrying the count committed before the failure
   */
  resync(entityType: string, options: ResyncOptions = {}): number {
    if (!this.documents.hasSlot(entityType)) {
      this.logger.warn({ event: 'cache_resync_skipped', entity_type: entityType, reason: 'no cache column' });
      return 0;
    }

    const batchSize = Math.max(1, Math.floor(options.batchSize ?? DEFAULT_BATCH_SIZE));
    const ids = this.records.entityIds(entityType);
    let processed = 0;

    const rebuildBatch = this.db.transaction((batch: string[]): number => {
      let count = 0;
      for (const entityId of batch) {
        if (!this.documents.exists(entityType, entityId)) {
          continue;
        }
        if (!options.dryRun) {
          this.documents.write(entityType, entityId, this.records.documentFor(entityType, entityId));
        }
        count++;
      }
      return count;
    });

    for (let start = 0; start < ids.length; start += batchSize) {
      const batch = ids.slice(start, start + batchSize);
      try {
        processed += rebuildBatch(batch);
      } catch (error) {
        this.logger.error({
          event: 'cache_resync_failed',
          operation: 'resync',
          entity_type: entityType,
          processed,
          batch_start: batch[0],
          error: error instanceof Error ? error.message : String(error),
        });
        throw new StorageError('resync', { entity_type: entityType, processed });
      }
      options.onBatch?.(processed, ids.length);
    }

    this.logger.info({
      event: 'cache_resync_completed',
      entity_type: entityType,
      processed,
      dry_run: options.dryRun === true,
    });
    return processed;
  }

  /**
   * Resync every entity type that has a configured host table
   */
  resyncAll(options: ResyncOptions = {}): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const entityType of this.documents.hostTypes()) {
      counts[entityType] = this.resync(entityType, options);
    }
    return counts;
  }

  /**
   * Whether the stored document matches a direct read of the value table.
   * Types without a document always match.
   */
  documentsMatch(ref: EntityRef): boolean {
    const entityId = toEntityId(ref.id);
    if (entityId === null || !this.documents.hasSlot(ref.type)) {
      return true;
    }
    const stored = this.documents.read(ref.type, entityId) ?? {};
    return documentsEqual(stored, this.records.documentFor(ref.type, entityId));
  }
}
