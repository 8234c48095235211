import { describe, it, expect } from 'vitest';
import { normalizeDefinition, validateDefinition } from './definition.js';

const fields = (input: Parameters<typeof validateDefinition>[0]) => validateDefinition(input).map(v => v.field);

describe('validateDefinition', () => {
  it('accepts a minimal definition', () => {
    expect(validateDefinition({ name: 'age', label: 'Age', type: 'number' })).toEqual([]);
  });

  it('reports every violation at once', () => {
    expect(validateDefinition({ name: '1bad', label: '', type: 'colour' })).toEqual([
      {
        field: 'name',
        message: 'Attribute name must start with a letter and contain only letters, numbers, and underscores.',
      },
      { field: 'label', message: 'Attribute label is required.' },
      { field: 'type', message: 'Attribute type must be one of: text, number, date, boolean, select' },
    ]);
  });

  it('requires name and type', () => {
    expect(validateDefinition({ name: '', label: 'X', type: undefined })).toEqual([
      { field: 'name', message: 'Attribute name is required.' },
      { field: 'type', message: 'Attribute type is required.' },
    ]);
  });

  it('requires a boolean required flag', () => {
    expect(validateDefinition({ name: 'age', label: 'Age', type: 'number', required: 'yes' })).toEqual([
      { field: 'required', message: 'required must be true or false.' },
    ]);
  });

  describe('options', () => {
    it('requires options for select', () => {
      expect(validateDefinition({ name: 'tier', label: 'Tier', type: 'select' })).toEqual([
        { field: 'options', message: 'Select attributes must have at least one option.' },
      ]);
      expect(fields({ name: 'tier', label: 'Tier', type: 'select', options: [] })).toEqual(['options']);
    });

    it('points at blank options by index', () => {
      expect(validateDefinition({ name: 'tier', label: 'Tier', type: 'select', options: ['gold', ' '] })).toEqual([
        { field: 'options[1]', message: 'Option at index 1 must be a non-empty string.' },
      ]);
    });

    it('rejects options on other types', () => {
      expect(validateDefinition({ name: 'age', label: 'Age', type: 'number', options: ['a'] })).toEqual([
        { field: 'options', message: 'Options are only supported for select attributes.' },
      ]);
      expect(validateDefinition({ name: 'age', label: 'Age', type: 'number', options: [] })).toEqual([]);
    });
  });

  describe('validation rules', () => {
    it('requires an object', () => {
      expect(fields({ name: 'age', label: 'Age', type: 'number', validationRules: ['min'] })).toEqual(['validationRules']);
    });

    it('checks rule values per type', () => {
      expect(
        validateDefinition({ name: 'age', label: 'Age', type: 'number', validationRules: { min: 'abc', max: 5, length: 3 } })
      ).toEqual([
        { field: 'validationRules.min', message: 'Number min value must be numeric.' },
        { field: 'validationRules.length', message: 'Unknown validation rule: length' },
      ]);

      expect(
        validateDefinition({ name: 'code', label: 'Code', type: 'text', validationRules: { min: -1 } })
      ).toEqual([{ field: 'validationRules.min', message: 'Text min length must be a non-negative integer.' }]);
    });

    it('rejects rules that do not apply to the type', () => {
      expect(validateDefinition({ name: 'flag', label: 'Flag', type: 'boolean', validationRules: { min: 1 } })).toEqual([
        { field: 'validationRules.min', message: 'min validation is only supported for text and number attributes.' },
      ]);
      expect(fields({ name: 'age', label: 'Age', type: 'number', validationRules: { max_length: 3 } })).toEqual([
        'validationRules.max_length',
      ]);
      expect(fields({ name: 'age', label: 'Age', type: 'number', validationRules: { after: 'today' } })).toEqual([
        'validationRules.after',
      ]);
    });

    it('checks date bounds', () => {
      expect(validateDefinition({ name: 'start', label: 'Start', type: 'date', validationRules: { after: 'today' } })).toEqual([]);
      expect(
        validateDefinition({ name: 'start', label: 'Start', type: 'date', validationRules: { before: 'tomorrowish' } })
      ).toEqual([{ field: 'validationRules.before', message: "before must be 'today' or a valid date string." }]);
    });

    it('rejects inverted bounds', () => {
      expect(validateDefinition({ name: 'age', label: 'Age', type: 'number', validationRules: { min: 10, max: 1 } })).toEqual([
        { field: 'validationRules.min', message: 'Minimum value cannot be greater than maximum value.' },
      ]);
      expect(
        validateDefinition({ name: 'code', label: 'Code', type: 'text', validationRules: { min_length: 5, max_length: 2 } })
      ).toEqual([{ field: 'validationRules.min_length', message: 'Minimum length cannot be greater than maximum length.' }]);
    });
  });
});

describe('normalizeDefinition', () => {
  it('fills defaults and trims the label', () => {
    expect(normalizeDefinition({ name: 'age', label: '  Age ', type: 'number', validationRules: { min: '0' } })).toEqual({
      name: 'age',
      label: 'Age',
      type: 'number',
      required: false,
      options: null,
      validationRules: { min: 0 },
    });
  });

  it('keeps select options', () => {
    expect(normalizeDefinition({ name: 'tier', label: 'Tier', type: 'select', options: ['gold', 'silver'], required: true }))
      .toEqual({
        name: 'tier',
        label: 'Tier',
        type: 'select',
        required: true,
        options: ['gold', 'silver'],
        validationRules: {},
      });
  });

  it('returns null for an invalid input', () => {
    expect(normalizeDefinition({ name: 'age', label: 'Age', type: 'nope' })).toBeNull();
  });
});
