import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { clearFeatureCache } from '../backend/capabilities.js';
import { createEngine, type Engine } from '../engine.js';
import { StorageError } from '../errors.js';
import { ValueRecordStore } from '../store/value-records.js';
import {
  createCapturingLogger,
  createHostTable,
  createTestDb,
  readCacheColumn,
  type TestDb,
} from '../__tests__/helpers.js';
import { documentsEqual } from './synchronizer.js';

describe('documentsEqual', () => {
  it('ignores key order', () => {
    expect(documentsEqual({ a: 1, b: 'x' }, { b: 'x', a: 1 })).toBe(true);
  });

  it('distinguishes values and missing keys', () => {
    expect(documentsEqual({ a: 1 }, { a: '1' })).toBe(false);
    expect(documentsEqual({ a: null }, {})).toBe(false);
  });
});

describe('CacheSynchronizer', () => {
  let testDb: TestDb;
  let engine: Engine;

  const clearDocuments = () => testDb.db.exec(`UPDATE users SET dynamic_attributes = NULL`);

  beforeEach(() => {
    clearFeatureCache();
    testDb = createTestDb();
    createHostTable(testDb.db, 'users', [1, 2, 3, 4, 5]);
    engine = createEngine({ db: testDb.db, hosts: { user: { table: 'users' } } });
    engine.catalog.define({ name: 'age', label: 'Age', type: 'number' });
    engine.catalog.define({ name: 'city', label: 'City', type: 'text' });
  });

  afterEach(() => {
    testDb.cleanup();
  });

  describe('write-through', () => {
    it('rewrites the full document on every mutation', () => {
      engine.values.setOne({ type: 'user', id: 1 }, 'age', 30);
      testDb.db.prepare(`UPDATE users SET dynamic_attributes = '{"stale":1}' WHERE id = 1`).run();

      engine.values.setOne({ type: 'user', id: 1 }, 'city', 'Oslo');

      expect(JSON.parse(readCacheColumn(testDb.db, 'users', 1) ?? 'null')).toEqual({ age: 30, city: 'Oslo' });
    });

    it('matches a direct read of the value table', () => {
      const ref = { type: 'user', id: 2 };
      engine.values.setMany(ref, { age: '41', city: 'Bergen' });
      engine.values.setOne(ref, 'age', null);
      engine.values.remove(ref, 'city');

      const records = new ValueRecordStore(testDb.db);
      expect(engine.cache.documents.read('user', '2')).toEqual(records.documentFor('user', '2'));
      expect(engine.values.getAll(ref)).toEqual({ age: null });
      expect(engine.cache.documentsMatch(ref)).toBe(true);
    });

    it('leaves other host rows untouched', () => {
      engine.values.setOne({ type: 'user', id: 1 }, 'age', 30);
      expect(readCacheColumn(testDb.db, 'users', 2)).toBeNull();
    });
  });

  describe('reads', () => {
    it('prefers the cache document over the value table', () => {
      const ref = { type: 'user', id: 1 };
      engine.values.setOne(ref, 'age', 30);
      testDb.db.prepare(`UPDATE users SET dynamic_attributes = '{"age":99}' WHERE id = 1`).run();

      expect(engine.values.getOne(ref, 'age')).toBe(99);
      expect(engine.cache.documentsMatch(ref)).toBe(false);

      expect(engine.cache.refresh(ref)).toBe(true);
      expect(engine.values.getOne(ref, 'age')).toBe(30);
      expect(engine.cache.documentsMatch(ref)).toBe(true);
    });

    it('falls back to the value table without a document', () => {
      const ref = { type: 'user', id: 1 };
      engine.values.setOne(ref, 'age', 30);
      clearDocuments();

      expect(engine.values.getOne(ref, 'age')).toBe(30);
      expect(engine.values.getAll(ref)).toEqual({ age: 30 });
    });

    it('ignores a document that is not a flat object', () => {
      const { logger, entries } = createCapturingLogger();
      const logged = createEngine({ db: testDb.db, hosts: { user: { table: 'users' } }, logger });
      logged.values.setOne({ type: 'user', id: 1 }, 'age', 30);
      testDb.db.prepare(`UPDATE users SET dynamic_attributes = '[1,2]' WHERE id = 1`).run();

      expect(logged.values.getOne({ type: 'user', id: 1 }, 'age')).toBe(30);
      expect(entries.some(e => e.event === 'cache_document_invalid')).toBe(true);
    });
  });

  describe('refresh', () => {
    it('returns false for types without a host table', () => {
      expect(engine.cache.refresh({ type: 'product', id: 1 })).toBe(false);
      expect(engine.cache.documentsMatch({ type: 'product', id: 1 })).toBe(true);
    });

    it('returns false for a missing host row', () => {
      expect(engine.cache.refresh({ type: 'user', id: 42 })).toBe(false);
    });
  });

  describe('resync', () => {
    beforeEach(() => {
      for (const id of [1, 2, 3, 4, 5]) {
        engine.values.setOne({ type: 'user', id }, 'age', 20 + id);
      }
      clearDocuments();
    });

    it('rebuilds every document in batches', () => {
      const progress: Array<[number, number]> = [];

      const processed = engine.cache.resync('user', {
        batchSize: 2,
        onBatch: (done, total) => progress.push([done, total]),
      });

      expect(processed).toBe(5);
      expect(progress).toEqual([[2, 5], [4, 5], [5, 5]]);
      for (const id of [1, 2, 3, 4, 5]) {
        expect(JSON.parse(readCacheColumn(testDb.db, 'users', id) ?? 'null')).toEqual({ age: 20 + id });
      }
    });

    it('counts without writing on a dry run', () => {
      expect(engine.cache.resync('user', { dryRun: true })).toBe(5);
      expect(readCacheColumn(testDb.db, 'users', 1)).toBeNull();
    });

    it('skips entities whose host row is gone', () => {
      testDb.db.exec(`DELETE FROM users WHERE id = 3`);
      expect(engine.cache.resync('user')).toBe(4);
    });

    it('stops at a failing batch and keeps earlier batches', () => {
      const { logger, entries } = createCapturingLogger();
      const logged = createEngine({ db: testDb.db, hosts: { user: { table: 'users' } }, logger });
      testDb.db.exec(`
        CREATE TRIGGER fail_user_4 BEFORE UPDATE OF dynamic_attributes ON users
        WHEN NEW.id = 4
        BEGIN SELECT RAISE(ABORT, 'simulated failure'); END
      `);

      let caught: unknown;
      try {
        logged.cache.resync('user', { batchSize: 2 });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(StorageError);
      if (caught instanceof StorageError) {
        expect(caught.context).toEqual({ entity_type: 'user', processed: 2, operation: 'resync' });
      }

      expect(readCacheColumn(testDb.db, 'users', 1)).toBe('{"age":21}');
      expect(readCacheColumn(testDb.db, 'users', 2)).toBe('{"age":22}');
      // batch [3, 4] rolled back, batch [5] never ran
      expect(readCacheColumn(testDb.db, 'users', 3)).toBeNull();
      expect(readCacheColumn(testDb.db, 'users', 5)).toBeNull();

      expect(entries.find(e => e.event === 'cache_resync_failed')).toMatchObject({
        level: 'error',
        entity_type: 'user',
        processed: 2,
        batch_start: '3',
      });
    });

    it('skips types without a cache column', () => {
      testDb.db.exec(`CREATE TABLE products (id INTEGER PRIMARY KEY, name TEXT)`);
      const { logger, entries } = createCapturingLogger();
      const mixed = createEngine({
        db: testDb.db,
        hosts: { user: { table: 'users' }, product: { table: 'products' } },
        logger,
      });

      expect(mixed.cache.resyncAll()).toEqual({ product: 0, user: 5 });
      expect(entries.some(e => e.event === 'cache_slot_missing' && e.entity_type === 'product')).toBe(true);
      expect(entries.some(e => e.event === 'cache_resync_skipped' && e.entity_type === 'product')).toBe(true);
    });
  });
});
