import { describe, it, expect } from 'vitest';
import { ValidationError } from '../errors.js';
import { makeDefinition } from '../__tests__/helpers.js';
import { ValidationEngine } from './engine.js';

const engine = new ValidationEngine({ today: () => '2024-06-01' });

describe('ValidationEngine.check', () => {
  describe('required and empty values', () => {
    it('reports a missing required value by label', () => {
      const def = makeDefinition({ name: 'nickname', label: 'Nickname', type: 'text', required: true });
      expect(engine.check(def, '')).toEqual(['The Nickname field is required.']);
      expect(engine.check(def, null)).toEqual(['The Nickname field is required.']);
      expect(engine.check(def, undefined)).toEqual(['The Nickname field is required.']);
    });

    it('lets optional values be empty', () => {
      expect(engine.check(makeDefinition({ name: 'age', type: 'number' }), '')).toEqual([]);
      expect(engine.check(makeDefinition({ name: 'age', type: 'number' }), null)).toEqual([]);
      expect(engine.check(makeDefinition({ name: 'born', type: 'date' }), undefined)).toEqual([]);
    });

    it('treats an empty select choice as unselected', () => {
      const def = makeDefinition({ name: 'color', label: 'Color', type: 'select', options: ['red', 'green'] });
      expect(engine.check(def, '')).toEqual(['The Color must have a value selected.']);
      expect(engine.check(def, null)).toEqual([]);
    });

    it('does not treat zero or false as empty', () => {
      expect(engine.check(makeDefinition({ name: 'count', type: 'number', required: true }), 0)).toEqual([]);
      expect(engine.check(makeDefinition({ name: 'active', type: 'boolean', required: true }), false)).toEqual([]);
    });
  });

  describe('type checks', () => {
    it('rejects non-numeric numbers', () => {
      const def = makeDefinition({ name: 'age', label: 'Age', type: 'number' });
      expect(engine.check(def, 'not a number')).toEqual(['The Age must be a number.']);
      expect(engine.check(def, '42')).toEqual([]);
    });

    it('accepts numeric scalars as text', () => {
      const def = makeDefinition({ name: 'code', label: 'Code', type: 'text' });
      expect(engine.check(def, 42)).toEqual([]);
      expect(engine.check(def, true)).toEqual(['The Code must be text.']);
    });

    it('checks boolean spellings', () => {
      const def = makeDefinition({ name: 'active', label: 'Active', type: 'boolean' });
      expect(engine.check(def, 'TRUE')).toEqual([]);
      expect(engine.check(def, 'yes')).toEqual(['The Active must be true or false.']);
    });

    it('checks dates', () => {
      const def = makeDefinition({ name: 'start', label: 'Start', type: 'date' });
      expect(engine.check(def, 'garbage')).toEqual(['The Start must be a valid date.']);
    });

    it('lists select options', () => {
      const def = makeDefinition({ name: 'color', label: 'Color', type: 'select', options: ['red', 'green'] });
      expect(engine.check(def, 'blue')).toEqual(['The Color must be one of: red, green.']);
      expect(engine.check(def, 'red')).toEqual([]);
    });

    it('skips rules when the type check fails', () => {
      const def = makeDefinition({ name: 'age', label: 'Age', type: 'number', validationRules: { min: 0 } });
      expect(engine.check(def, 'abc')).toEqual(['The Age must be a number.']);
    });
  });

  describe('rules', () => {
    it('applies text length rules', () => {
      const def = makeDefinition({
        name: 'code',
        label: 'Code',
        type: 'text',
        validationRules: { min_length: 3, max_length: 5 },
      });
      expect(engine.check(def, 'ab')).toEqual(['The Code must be at least 3 characters.']);
      expect(engine.check(def, 'abcdef')).toEqual(['The Code may not be greater than 5 characters.']);
      expect(engine.check(def, 'abcd')).toEqual([]);
    });

    it('reports every failing rule in rule order', () => {
      const def = makeDefinition({
        name: 'code',
        label: 'Code',
        type: 'text',
        validationRules: { min: 5, min_length: 4 },
      });
      expect(engine.check(def, 'abc')).toEqual([
        'The Code must be at least 5 characters.',
        'The Code must be at least 4 characters.',
      ]);
    });

    it('applies numeric bounds', () => {
      const def = makeDefinition({ name: 'age', label: 'Age', type: 'number', validationRules: { min: 0, max: 120 } });
      expect(engine.check(def, 150)).toEqual(['The Age may not be greater than 120.']);
      expect(engine.check(def, '-1')).toEqual(['The Age must be at least 0.']);
      expect(engine.check(def, 120)).toEqual([]);
    });

    it('resolves the today sentinel when evaluated', () => {
      const def = makeDefinition({ name: 'start', label: 'Start', type: 'date', validationRules: { after: 'today' } });
      expect(engine.check(def, '2024-05-01')).toEqual(['The Start must be after today.']);
      expect(engine.check(def, '2024-06-01')).toEqual(['The Start must be after today.']);
      expect(engine.check(def, '2024-06-02')).toEqual([]);

      const later = new ValidationEngine({ today: () => '2024-07-01' });
      expect(later.check(def, '2024-06-02')).toEqual(['The Start must be after today.']);
    });

    it('compares before strictly', () => {
      const def = makeDefinition({ name: 'end', label: 'End', type: 'date', validationRules: { before: '2024-01-01' } });
      expect(engine.check(def, '2024-01-01')).toEqual(['The End must be before 2024-01-01.']);
      expect(engine.check(def, '2023-12-31')).toEqual([]);
    });
  });
});

describe('ValidationEngine.validate', () => {
  it('returns ok for a valid value', () => {
    const def = makeDefinition({ name: 'age', type: 'number' });
    expect(engine.validate(def, 30)).toEqual({ ok: true });
  });

  it('returns a ValidationError carrying the issue', () => {
    const def = makeDefinition({ name: 'age', label: 'Age', type: 'number' });
    const result = engine.validate(def, 'old');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(ValidationError);
      expect(result.error.issues).toEqual([
        { attributeName: 'age', label: 'Age', type: 'number', messages: ['The Age must be a number.'], value: 'old' },
      ]);
      expect(result.error.userMessage).toBe('Validation failed for Age: The Age must be a number.');
    }
  });

  it('throws from assertValid', () => {
    const def = makeDefinition({ name: 'age', label: 'Age', type: 'number' });
    expect(() => engine.assertValid(def, 'old')).toThrow(ValidationError);
    expect(() => engine.assertValid(def, '31')).not.toThrow();
  });
});

describe('ValidationEngine.cast', () => {
  it('converts raw values to their typed form', () => {
    expect(engine.cast(makeDefinition({ name: 'age', type: 'number' }), '25')).toBe(25);
    expect(engine.cast(makeDefinition({ name: 'active', type: 'boolean' }), 'true')).toBe(true);
    expect(engine.cast(makeDefinition({ name: 'active', type: 'boolean' }), '0')).toBe(false);
    expect(engine.cast(makeDefinition({ name: 'code', type: 'text' }), 5)).toBe('5');
    expect(engine.cast(makeDefinition({ name: 'start', type: 'date' }), '2024-03-05T08:30:00')).toBe('2024-03-05');
  });

  it('maps empty strings to null except for text', () => {
    expect(engine.cast(makeDefinition({ name: 'age', type: 'number' }), '')).toBeNull();
    expect(engine.cast(makeDefinition({ name: 'start', type: 'date' }), '')).toBeNull();
    expect(engine.cast(makeDefinition({ name: 'active', type: 'boolean' }), '')).toBeNull();
    expect(engine.cast(makeDefinition({ name: 'code', type: 'text' }), '')).toBe('');
  });

  it('casts an unparsable date to null', () => {
    expect(engine.cast(makeDefinition({ name: 'start', type: 'date' }), 'not a date')).toBeNull();
  });

  it('produces values that validate again', () => {
    const cases = [
      { def: makeDefinition({ name: 'age', type: 'number', validationRules: { min: 0 } }), raw: ' 42 ' },
      { def: makeDefinition({ name: 'code', type: 'text', validationRules: { max_length: 4 } }), raw: 1234 },
      { def: makeDefinition({ name: 'start', type: 'date', validationRules: { after: 'today' } }), raw: '2024-12-24T09:00:00' },
      { def: makeDefinition({ name: 'active', type: 'boolean', required: true }), raw: '0' },
      { def: makeDefinition({ name: 'color', type: 'select', options: ['red'] }), raw: 'red' },
    ];

    for (const { def, raw } of cases) {
      expect(engine.check(def, raw)).toEqual([]);
      expect(engine.check(def, engine.cast(def, raw))).toEqual([]);
    }
  });
});
