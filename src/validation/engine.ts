/**
 * Type & validation engine
 *
 * Order of checks for a raw value:
 *   1. required and null/empty -> "required"
 *   2. optional and null/empty -> pass (except '' for select)
 *   3. type check
 *   4. custom rules, only once the type check has passed
 */

import { ValidationError, type ValidationIssue } from '../errors.js';
import type { AttributeDefinition, AttributeValue, ValidationRules } from '../types/index.js';
import { TYPE_HANDLERS, parseCalendarDate, todayIsoDate } from './types.js';

export type ValidationResult =
  | { ok: true }
  | { ok: false; error: ValidationError };

export interface ValidationEngineOptions {
  /** Resolves the "today" sentinel (default: local calendar date) */
  today?: () => string;
}

export class ValidationEngine {
  private readonly today: () => string;

  constructor(options: ValidationEngineOptions = {}) {
    this.today = options.today ?? todayIsoDate;
  }

  /**
   * Collect every message for a raw value (empty when valid)
   */
  check(definition: AttributeDefinition, value: unknown): string[] {
    const empty = value === null || value === undefined || value === '';

    if (definition.required && empty) {
      return [`The ${definition.label} field is required.`];
    }

    if (!definition.required && empty && !(definition.type === 'select' && value === '')) {
      return [];
    }

    const typeError = TYPE_HANDLERS[definition.type].check(value, definition);
    if (typeError) {
      return [typeError];
    }

    return this.checkRules(definition, value, definition.validationRules);
  }

  /**
   * Build the issue entry for a failing value, or null when it is valid
   */
  issueFor(definition: AttributeDefinition, value: unknown): ValidationIssue | null {
    const messages = this.check(definition, value);
    if (messages.length === 0) {
      return null;
    }
    return {
      attributeName: definition.name,
      label: definition.label,
      type: definition.type,
      messages,
      value,
    };
  }

  validate(definition: AttributeDefinition, value: unknown): ValidationResult {
    const issue = this.issueFor(definition, value);
    if (!issue) {
      return { ok: true };
    }
    return { ok: false, error: new ValidationError([issue], { attribute_label: definition.label }) };
  }

  assertValid(definition: AttributeDefinition, value: unknown): void {
    const result = this.validate(definition, value);
    if (!result.ok) {
      throw result.error;
    }
  }

  /**
   * Cast a raw value to the attribute's typed form.
   * Unparsable dates cast to null without an error; validate first.
   */
  cast(definition: AttributeDefinition, value: unknown): AttributeValue {
    if (value === '' && definition.type !== 'text' && definition.type !== 'select') {
      return null;
    }
    return TYPE_HANDLERS[definition.type].cast(value);
  }

  private checkRules(definition: AttributeDefinition, value: unknown, rules: ValidationRules): string[] {
    const errors: string[] = [];
    const { label, type } = definition;
    const length = String(value).length;

    for (const [rule, constraint] of Object.entries(rules)) {
      if (constraint === undefined || constraint === null) continue;

      switch (rule) {
        case 'min':
          if (type === 'text' && length < Number(constraint)) {
            errors.push(`The ${label} must be at least ${constraint} characters.`);
          } else if (type === 'number' && Number(value) < Number(constraint)) {
            errors.push(`The ${label} must be at least ${constraint}.`);
          }
          break;

        case 'max':
          if (type === 'text' && length > Number(constraint)) {
            errors.push(`The ${label} may not be greater than ${constraint} characters.`);
          } else if (type === 'number' && Number(value) > Number(constraint)) {
            errors.push(`The ${label} may not be greater than ${constraint}.`);
          }
          break;

        case 'min_length':
          if (length < Number(constraint)) {
            errors.push(`The ${label} must be at least ${constraint} characters.`);
          }
          break;

        case 'max_length':
          if (length > Number(constraint)) {
            errors.push(`The ${label} may not be greater than ${constraint} characters.`);
          }
          break;

        case 'after':
          if (!this.compareDate(value, String(constraint), (a, b) => a > b)) {
            errors.push(`The ${label} must be after ${constraint}.`);
          }
          break;

        case 'before':
          if (!this.compareDate(value, String(constraint), (a, b) => a < b)) {
            errors.push(`The ${label} must be before ${constraint}.`);
          }
          break;
      }
    }

    return errors;
  }

  /** ISO calendar dates order lexicographically */
  private compareDate(value: unknown, constraint: string, cmp: (a: string, b: string) => boolean): boolean {
    const date = parseCalendarDate(value);
    const bound = constraint === 'today' ? this.today() : parseCalendarDate(constraint);
    if (date === null || bound === null) {
      return false;
    }
    return cmp(date, bound);
  }
}
