import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { clearFeatureCache } from '../backend/capabilities.js';
import { createEngine, type Engine } from '../engine.js';
import { AttributeNotFoundError, InvalidFilterError } from '../errors.js';
import { createTestDb, type TestDb } from '../__tests__/helpers.js';
import { normalizeOperator } from './compiler.js';

const sorted = (ids: Set<string>) => [...ids].sort();

describe('normalizeOperator', () => {
  it('accepts aliases in any case', () => {
    expect(normalizeOperator('==')).toBe('=');
    expect(normalizeOperator('<>')).toBe('!=');
    expect(normalizeOperator('ilike')).toBe('LIKE');
    expect(normalizeOperator('is  null')).toBe('NULL');
    expect(normalizeOperator('Is Not Null')).toBe('NOT NULL');
    expect(normalizeOperator('between')).toBe('BETWEEN');
  });

  it('returns null for unknown operators', () => {
    expect(normalizeOperator('approx')).toBeNull();
  });
});

describe('SearchCompiler', () => {
  let testDb: TestDb;
  let engine: Engine;

  const set = (id: number, values: Record<string, unknown>) => {
    engine.values.setMany({ type: 'user', id }, values);
  };

  beforeEach(() => {
    clearFeatureCache();
    testDb = createTestDb();
    engine = createEngine({ db: testDb.db });
    engine.catalog.define({ name: 'level', label: 'Level', type: 'number' });
    engine.catalog.define({ name: 'rank', label: 'Rank', type: 'text' });
    engine.catalog.define({ name: 'nickname', label: 'Nickname', type: 'text' });
    engine.catalog.define({ name: 'bio', label: 'Bio', type: 'text' });
    engine.catalog.define({ name: 'active', label: 'Active', type: 'boolean' });
    engine.catalog.define({ name: 'joined', label: 'Joined', type: 'date' });
    engine.catalog.define({ name: 'tier', label: 'Tier', type: 'select', options: ['gold', 'silver'] });
  });

  afterEach(() => {
    testDb.cleanup();
  });

  describe('typed comparisons', () => {
    beforeEach(() => {
      for (let id = 1; id <= 7; id++) {
        set(id, { level: id });
      }
    });

    it('compares numbers numerically', () => {
      expect(engine.search.search('user', { level: { operator: '>', value: 3 } }).size).toBe(4);
      expect(engine.search.search('user', { level: { operator: '>', value: 4 } }).size).toBe(3);
      expect(engine.search.search('user', { level: { operator: '>', value: 5 } }).size).toBe(2);
    });

    it('casts string operands to the attribute type', () => {
      expect(sorted(engine.search.search('user', { level: '5' }))).toEqual(['5']);
      expect(sorted(engine.search.search('user', { level: { operator: '<=', value: '2' } }))).toEqual(['1', '2']);
      expect(sorted(engine.search.search('user', { level: { operator: '!=', value: 1 } }))).toHaveLength(6);
    });

    it('rejects operands that do not cast', () => {
      expect(() => engine.search.search('user', { level: { operator: '>', value: 'abc' } })).toThrow(
        "Invalid filter for 'level': 'abc' is not a valid number value"
      );
    });

    it('compares text lexicographically', () => {
      set(1, { rank: '10' });
      set(2, { rank: '5' });

      expect(sorted(engine.search.search('user', { rank: { operator: '>', value: '4' } }))).toEqual(['2']);
    });

    it('matches booleans and dates', () => {
      set(1, { active: true, joined: '2024-01-15' });
      set(2, { active: 'false', joined: '2024-03-01' });
      set(3, { active: '1', joined: '2023-12-31' });

      expect(sorted(engine.search.search('user', { active: true }))).toEqual(['1', '3']);
      expect(sorted(engine.search.search('user', { joined: { operator: '>=', value: '2024-01-01' } }))).toEqual(['1', '2']);
    });
  });

  describe('AND and OR', () => {
    beforeEach(() => {
      set(1, { level: 1, tier: 'gold' });
      set(2, { level: 5, tier: 'gold' });
      set(3, { level: 9, tier: 'silver' });
    });

    it('intersects filters', () => {
      expect(sorted(engine.search.search('user', { tier: 'gold', level: { operator: '>', value: 2 } }))).toEqual(['2']);
    });

    it('returns nothing once a filter matches nothing', () => {
      expect(engine.search.search('user', { tier: 'bronze', level: { operator: '>', value: 0 } }).size).toBe(0);
    });

    it('unions filters with OR', () => {
      const ids = engine.search.advancedSearch('user', { tier: 'silver', level: { operator: '<', value: 2 } }, 'OR');
      expect(sorted(ids)).toEqual(['1', '3']);
    });

    it('treats AND as the default logic', () => {
      const ids = engine.search.advancedSearch('user', { tier: 'gold', level: 5 });
      expect(sorted(ids)).toEqual(['2']);
    });

    it('returns an empty set for an empty filter map', () => {
      expect(engine.search.search('user', {}).size).toBe(0);
      expect(engine.search.advancedSearch('user', {}, 'OR').size).toBe(0);
    });

    it('only sees the requested entity type', () => {
      engine.values.setOne({ type: 'product', id: 1 }, 'tier', 'gold');
      expect(sorted(engine.search.search('product', { tier: 'gold' }))).toEqual(['1']);
    });
  });

  describe('NULL', () => {
    beforeEach(() => {
      set(1, { nickname: 'ace', level: 1 });
      set(2, { nickname: null, level: 2 });
      set(3, { level: 3 });
    });

    it('matches explicit nulls and entities without the attribute', () => {
      expect(sorted(engine.search.search('user', { nickname: null }))).toEqual(['2', '3']);
      expect(sorted(engine.search.search('user', { nickname: { operator: 'IS NULL' } }))).toEqual(['2', '3']);
    });

    it('matches stored non-null values with NOT NULL', () => {
      expect(sorted(engine.search.search('user', { nickname: { operator: 'NOT NULL' } }))).toEqual(['1']);
    });

    it('combines with other filters', () => {
      expect(sorted(engine.search.search('user', { nickname: null, level: { operator: '>', value: 2 } }))).toEqual(['3']);
    });
  });

  describe('IN and BETWEEN', () => {
    beforeEach(() => {
      for (let id = 1; id <= 5; id++) {
        set(id, { level: id * 10 });
      }
    });

    it('matches listed values', () => {
      expect(sorted(engine.search.search('user', { level: { operator: 'IN', value: [10, '30', 90] } }))).toEqual(['1', '3']);
    });

    it('matches nothing for an empty list', () => {
      expect(engine.search.search('user', { level: { operator: 'IN', value: [] } }).size).toBe(0);
    });

    it('needs an array for IN', () => {
      expect(() => engine.search.search('user', { level: { operator: 'IN', value: 10 } })).toThrow(InvalidFilterError);
    });

    it('includes both bounds', () => {
      expect(sorted(engine.search.search('user', { level: { operator: 'BETWEEN', min: 20, max: 40 } }))).toEqual([
        '2',
        '3',
        '4',
      ]);
    });

    it('needs min and max for BETWEEN', () => {
      expect(() => engine.search.search('user', { level: { operator: 'BETWEEN', min: 20 } })).toThrow(
        "Invalid filter for 'level': BETWEEN needs both min and max"
      );
    });
  });

  describe('LIKE', () => {
    beforeEach(() => {
      set(1, { bio: 'Plays Chess' });
      set(2, { bio: 'chess club member' });
      set(3, { bio: 'Go player' });
    });

    it('matches substrings case-insensitively', () => {
      expect(sorted(engine.search.search('user', { bio: { operator: 'LIKE', value: 'chess' } }))).toEqual(['1', '2']);
    });

    it('honours case_sensitive', () => {
      const filters = { bio: { operator: 'like', value: 'chess', options: { case_sensitive: true } } };
      expect(sorted(engine.search.search('user', filters))).toEqual(['2']);
    });

    it('keeps ILIKE case-insensitive', () => {
      const filters = { bio: { operator: 'ILIKE', value: 'CHESS', options: { case_sensitive: true } } };
      expect(sorted(engine.search.search('user', filters))).toEqual(['1', '2']);
    });

    it('needs a string value', () => {
      expect(() => engine.search.search('user', { bio: { operator: 'LIKE', value: ['chess'] } })).toThrow(InvalidFilterError);
    });

    it('uses the full-text index once it exists', () => {
      engine.optimize();
      set(4, { bio: 'Weekly CHESS evenings' });

      const ids = engine.search.searchText('user', 'bio', 'chess', { full_text: true });
      expect(sorted(ids)).toEqual(['1', '2', '4']);
      expect(engine.search.searchText('user', 'bio', 'poker', { full_text: true }).size).toBe(0);
    });

    it('falls back to LIKE without a full-text index', () => {
      expect(sorted(engine.search.searchText('user', 'bio', 'play', { full_text: true }))).toEqual(['1', '3']);
    });
  });

  describe('invalid filters', () => {
    it('throws for an unknown attribute', () => {
      expect(() => engine.search.search('user', { missing: 1 })).toThrow(AttributeNotFoundError);
    });

    it('throws for an unknown operator', () => {
      expect(() => engine.search.search('user', { level: { operator: 'approx', value: 1 } })).toThrow(
        "Invalid filter for 'level': unknown operator 'approx'"
      );
    });

    it('needs a value for comparisons', () => {
      expect(() => engine.search.search('user', { level: { operator: '>' } })).toThrow(
        "Invalid filter for 'level': > needs a value"
      );
    });
  });

  describe('typed shortcuts', () => {
    beforeEach(() => {
      set(1, { level: 10, active: true, joined: '2024-01-10', bio: 'likes hiking' });
      set(2, { level: 20, active: false, joined: '2024-02-10', bio: 'likes chess' });
      set(3, { level: 30, active: true, joined: '2024-03-10' });
    });

    it('searches number ranges', () => {
      expect(sorted(engine.search.searchNumberRange('user', 'level', 15, 30))).toEqual(['2', '3']);
    });

    it('searches date ranges', () => {
      expect(sorted(engine.search.searchDateRange('user', 'joined', '2024-01-01', '2024-02-28'))).toEqual(['1', '2']);
    });

    it('searches booleans', () => {
      expect(sorted(engine.search.searchBoolean('user', 'active', false))).toEqual(['2']);
    });

    it('searches text', () => {
      expect(sorted(engine.search.searchText('user', 'bio', 'likes'))).toEqual(['1', '2']);
    });

    it('returns nothing for an unknown attribute or another type', () => {
      expect(engine.search.searchText('user', 'missing', 'x').size).toBe(0);
      expect(engine.search.searchText('user', 'level', '1').size).toBe(0);
      expect(engine.search.searchBoolean('user', 'level', true).size).toBe(0);
    });
  });

  describe('sortByAttribute', () => {
    beforeEach(() => {
      set(1, { level: 30 });
      set(2, { level: 10 });
      set(3, { nickname: 'no level' });
      set(4, { level: 20 });
    });

    it('orders ascending with missing values last', () => {
      expect(engine.search.sortByAttribute('user', ['1', '2', '3', '4'], 'level')).toEqual(['2', '4', '1', '3']);
    });

    it('orders descending with missing values still last', () => {
      expect(engine.search.sortByAttribute('user', [3, 1, 2, 4], 'level', 'desc')).toEqual(['1', '4', '2', '3']);
    });

    it('sorts search results', () => {
      const ids = engine.search.search('user', { level: { operator: 'NOT NULL' } });
      expect(engine.search.sortByAttribute('user', ids, 'level')).toEqual(['2', '4', '1']);
    });

    it('throws for an unknown attribute', () => {
      expect(() => engine.search.sortByAttribute('user', ['1'], 'missing')).toThrow(AttributeNotFoundError);
    });
  });
});
