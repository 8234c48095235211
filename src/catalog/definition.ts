/**
 * Attribute definition validation
 *
 * Every violated constraint is reported; validation never stops at the first.
 */

import type { DefinitionViolation } from '../errors.js';
import {
  ATTRIBUTE_TYPES,
  type AttributeInput,
  type AttributeType,
  type ValidationRules,
} from '../types/index.js';
import { isNumeric, parseCalendarDate } from '../validation/types.js';

export const NAME_PATTERN = /^[a-zA-Z][a-zA-Z0-9_]*$/;

/** Rule keys accepted per attribute type */
export const RULES_BY_TYPE: Record<AttributeType, readonly (keyof ValidationRules)[]> = {
  text: ['min', 'max', 'min_length', 'max_length'],
  number: ['min', 'max'],
  date: ['after', 'before'],
  boolean: [],
  select: [],
};

/** Definition fields after validation */
export interface NormalizedDefinition {
  name: string;
  label: string;
  type: AttributeType;
  required: boolean;
  options: string[] | null;
  validationRules: ValidationRules;
}

function isAttributeType(value: unknown): value is AttributeType {
  return typeof value === 'string' && (ATTRIBUTE_TYPES as readonly string[]).includes(value);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMissing(value: unknown): boolean {
  return value === undefined || value === null || value === '';
}

function isNonNegativeInteger(value: unknown): boolean {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

function validateOptions(type: AttributeType | null, options: unknown): DefinitionViolation[] {
  const errors: DefinitionViolation[] = [];

  if (type === 'select') {
    if (!Array.isArray(options) || options.length === 0) {
      errors.push({ field: 'options', message: 'Select attributes must have at least one option.' });
      return errors;
    }
    options.forEach((option: unknown, index) => {
      if (typeof option !== 'string' || option.trim() === '') {
        errors.push({ field: `options[${index}]`, message: `Option at index ${index} must be a non-empty string.` });
      }
    });
    return errors;
  }

  if (type !== null && !isMissing(options) && !(Array.isArray(options) && options.length === 0)) {
    errors.push({ field: 'options', message: 'Options are only supported for select attributes.' });
  }

  return errors;
}

function validateRules(rules: Record<string, unknown>, type: AttributeType | null): DefinitionViolation[] {
  const errors: DefinitionViolation[] = [];
  const field = (rule: string) => `validationRules.${rule}`;

  for (const [rule, value] of Object.entries(rules)) {
    switch (rule) {
      case 'min':
      case 'max':
        if (type === 'text') {
          if (!isNonNegativeInteger(value)) {
            errors.push({ field: field(rule), message: `Text ${rule} length must be a non-negative integer.` });
          }
        } else if (type === 'number') {
          if (!isNumeric(value)) {
            errors.push({ field: field(rule), message: `Number ${rule} value must be numeric.` });
          }
        } else {
          errors.push({ field: field(rule), message: `${rule} validation is only supported for text and number attributes.` });
        }
        break;

      case 'min_length':
      case 'max_length':
        if (type !== 'text') {
          errors.push({ field: field(rule), message: `${rule} validation is only supported for text attributes.` });
        } else if (!isNonNegativeInteger(value)) {
          errors.push({ field: field(rule), message: `${rule} must be a non-negative integer.` });
        }
        break;

      case 'after':
      case 'before':
        if (type !== 'date') {
          errors.push({ field: field(rule), message: `${rule} validation is only supported for date attributes.` });
        } else if (typeof value !== 'string' || (value !== 'today' && parseCalendarDate(value) === null)) {
          errors.push({ field: field(rule), message: `${rule} must be 'today' or a valid date string.` });
        }
        break;

      default:
        errors.push({ field: field(rule), message: `Unknown validation rule: ${rule}` });
        break;
    }
  }

  if (isNumeric(rules.min) && isNumeric(rules.max) && Number(rules.min) > Number(rules.max)) {
    errors.push({ field: field('min'), message: 'Minimum value cannot be greater than maximum value.' });
  }

  if (isNumeric(rules.min_length) && isNumeric(rules.max_length) && Number(rules.min_length) > Number(rules.max_length)) {
    errors.push({ field: field('min_length'), message: 'Minimum length cannot be greater than maximum length.' });
  }

  return errors;
}

/**
 * Validate a definition input, returning every violation
 */
export function validateDefinition(input: AttributeInput): DefinitionViolation[] {
  const errors: DefinitionViolation[] = [];

  if (isMissing(input.name)) {
    errors.push({ field: 'name', message: 'Attribute name is required.' });
  } else if (typeof input.name !== 'string' || !NAME_PATTERN.test(input.name)) {
    errors.push({
      field: 'name',
      message: 'Attribute name must start with a letter and contain only letters, numbers, and underscores.',
    });
  }

  if (typeof input.label !== 'string' || input.label.trim() === '') {
    errors.push({ field: 'label', message: 'Attribute label is required.' });
  }

  let type: AttributeType | null = null;
  if (isMissing(input.type)) {
    errors.push({ field: 'type', message: 'Attribute type is required.' });
  } else if (!isAttributeType(input.type)) {
    errors.push({ field: 'type', message: `Attribute type must be one of: ${ATTRIBUTE_TYPES.join(', ')}` });
  } else {
    type = input.type;
  }

  if (input.required !== undefined && typeof input.required !== 'boolean') {
    errors.push({ field: 'required', message: 'required must be true or false.' });
  }

  errors.push(...validateOptions(type, input.options));

  if (!isMissing(input.validationRules)) {
    if (!isPlainObject(input.validationRules)) {
      errors.push({ field: 'validationRules', message: 'Validation rules must be an object.' });
    } else {
      errors.push(...validateRules(input.validationRules, type));
    }
  }

  return errors;
}

/**
 * Convert a validated input into stored fields.
 * Returns null if the input has violations; callers validate first.
 */
export function normalizeDefinition(input: AttributeInput): NormalizedDefinition | null {
  if (validateDefinition(input).length > 0) {
    return null;
  }
  if (typeof input.name !== 'string' || typeof input.label !== 'string' || !isAttributeType(input.type)) {
    return null;
  }

  const rules: ValidationRules = {};
  if (isPlainObject(input.validationRules)) {
    const raw = input.validationRules;
    if (isNumeric(raw.min)) rules.min = Number(raw.min);
    if (isNumeric(raw.max)) rules.max = Number(raw.max);
    if (isNumeric(raw.min_length)) rules.min_length = Number(raw.min_length);
    if (isNumeric(raw.max_length)) rules.max_length = Number(raw.max_length);
    if (typeof raw.after === 'string') rules.after = raw.after;
    if (typeof raw.before === 'string') rules.before = raw.before;
  }

  const options = input.type === 'select' && Array.isArray(input.options)
    ? input.options.filter((o): o is string => typeof o === 'string')
    : null;

  return {
    name: input.name,
    label: input.label.trim(),
    type: input.type,
    required: input.required === true,
    options,
    validationRules: rules,
  };
}
