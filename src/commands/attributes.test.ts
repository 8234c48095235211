import { describe, it, expect } from 'vitest';
import { collectRule, parseOptionList } from './attributes.js';

describe('collectRule', () => {
  it('accumulates repeated rules', () => {
    const first = collectRule('min=0');
    expect(collectRule('max=120', first)).toEqual({ min: 0, max: 120 });
  });

  it('keeps non-numeric values as strings', () => {
    expect(collectRule('after=today')).toEqual({ after: 'today' });
    expect(collectRule('before = 2025-01-01')).toEqual({ before: '2025-01-01' });
  });

  it('lets a later rule replace an earlier one', () => {
    expect(collectRule('min=5', { min: 1 })).toEqual({ min: 5 });
  });

  it('rejects input without a key', () => {
    expect(() => collectRule('=5')).toThrow('Rule must be key=value: =5');
    expect(() => collectRule('min')).toThrow('Rule must be key=value: min');
  });
});

describe('parseOptionList', () => {
  it('splits and trims options', () => {
    expect(parseOptionList('gold, silver ,bronze')).toEqual(['gold', 'silver', 'bronze']);
  });

  it('drops empty entries', () => {
    expect(parseOptionList('gold,,')).toEqual(['gold']);
  });
});
