/**
 * Type-tagged dispatch for attribute values
 *
 * Each attribute type has exactly one entry holding its four arms:
 * type check, cast, storage slot and value column. Adding a type means
 * adding one entry here (the Record key type makes it exhaustive).
 */

import type { AttributeDefinition, AttributeType, AttributeValue } from '../types/index.js';

export type SlotColumn = 'string_value' | 'number_value' | 'date_value' | 'boolean_value';

export const SLOT_COLUMNS: readonly SlotColumn[] = ['string_value', 'number_value', 'date_value', 'boolean_value'];

/** Value as bound to a SQLite statement */
export type SqlValue = string | number | null;

export type SlotValues = Record<SlotColumn, SqlValue>;

interface TypeHandler {
  /** Returns an error message (label substituted) or null when the value has the right type */
  check(value: unknown, definition: AttributeDefinition): string | null;
  /** Convert a raw value to its typed form; null when it cannot be represented */
  cast(value: unknown): AttributeValue;
  /** Column holding this type's values */
  column: SlotColumn;
  /** Typed value -> bound SQL value */
  toSql(value: AttributeValue): SqlValue;
}

const NUMERIC_PATTERN = /^\s*[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?\s*$/;
const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(?:[T ](.+))?$/;

export function isNumeric(value: unknown): boolean {
  if (typeof value === 'number') {
    return Number.isFinite(value);
  }
  return typeof value === 'string' && NUMERIC_PATTERN.test(value);
}

export function isBooleanLike(value: unknown): boolean {
  if (typeof value === 'boolean') return true;
  if (value === 1 || value === 0) return true;
  if (typeof value === 'string') {
    const lower = value.toLowerCase();
    return lower === '1' || lower === '0' || lower === 'true' || lower === 'false';
  }
  return false;
}

export function castBoolean(value: unknown): boolean {
  if (typeof value === 'boolean') return value;
  if (value === 1) return true;
  if (typeof value === 'string') {
    const lower = value.toLowerCase();
    return lower === '1' || lower === 'true';
  }
  return false;
}

function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0');
}

function formatLocalDate(date: Date): string {
  return `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/** Current local calendar date as YYYY-MM-DD */
export function todayIsoDate(): string {
  return formatLocalDate(new Date());
}

/**
 * Parse anything calendar-parsable into YYYY-MM-DD.
 * ISO strings keep their written date (no timezone shift); other strings
 * must contain a digit and be accepted by Date.parse.
 */
export function parseCalendarDate(value: unknown): string | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : formatLocalDate(value);
  }

  if (typeof value !== 'string') {
    return null;
  }

  const trimmed = value.trim();
  const iso = ISO_DATE_PATTERN.exec(trimmed);
  if (iso) {
    const [, y, m, d, time] = iso;
    const year = Number(y);
    const month = Number(m);
    const day = Number(d);
    const probe = new Date(Date.UTC(year, month - 1, day));
    if (probe.getUTCFullYear() !== year || probe.getUTCMonth() !== month - 1 || probe.getUTCDate() !== day) {
      return null;
    }
    if (time !== undefined && Number.isNaN(Date.parse(trimmed))) {
      return null;
    }
    return `${y}-${m}-${d}`;
  }

  if (!/\d/.test(trimmed)) {
    return null;
  }

  const ms = Date.parse(trimmed);
  return Number.isNaN(ms) ? null : formatLocalDate(new Date(ms));
}

function isBlank(value: unknown): boolean {
  return value === null || value === undefined || value === '';
}

const stringSql = (value: AttributeValue): SqlValue => (value === null ? null : String(value));

export const TYPE_HANDLERS: Record<AttributeType, TypeHandler> = {
  text: {
    check: (value, def) =>
      typeof value === 'string' || (typeof value === 'number' && Number.isFinite(value))
        ? null
        : `The ${def.label} must be text.`,
    cast: (value) => (value === null || value === undefined ? null : String(value)),
    column: 'string_value',
    toSql: stringSql,
  },
  number: {
    check: (value, def) => (isNumeric(value) ? null : `The ${def.label} must be a number.`),
    cast: (value) => (isNumeric(value) ? Number(typeof value === 'string' ? value.trim() : value) : null),
    column: 'number_value',
    toSql: (value) => (typeof value === 'number' ? value : null),
  },
  date: {
    check: (value, def) => (parseCalendarDate(value) !== null ? null : `The ${def.label} must be a valid date.`),
    cast: (value) => parseCalendarDate(value),
    column: 'date_value',
    toSql: stringSql,
  },
  boolean: {
    check: (value, def) => (isBooleanLike(value) ? null : `The ${def.label} must be true or false.`),
    cast: (value) => (isBlank(value) ? null : castBoolean(value)),
    column: 'boolean_value',
    toSql: (value) => (value === null ? null : value === true ? 1 : 0),
  },
  select: {
    check: (value, def) => {
      if (isBlank(value)) {
        return `The ${def.label} must have a value selected.`;
      }
      const options = def.options ?? [];
      if (typeof value !== 'string' || !options.includes(value)) {
        return `The ${def.label} must be one of: ${options.join(', ')}.`;
      }
      return null;
    },
    cast: (value) => (value === null || value === undefined ? null : String(value)),
    column: 'string_value',
    toSql: stringSql,
  },
};

/** Column holding values of the given type */
export function columnFor(type: AttributeType): SlotColumn {
  return TYPE_HANDLERS[type].column;
}

/**
 * All four slot columns for storing a typed value: the type's own column
 * carries the value and the other three are null.
 */
export function slotValuesFor(type: AttributeType, value: AttributeValue): SlotValues {
  const slots: SlotValues = {
    string_value: null,
    number_value: null,
    date_value: null,
    boolean_value: null,
  };
  const handler = TYPE_HANDLERS[type];
  slots[handler.column] = handler.toSql(value);
  return slots;
}

/**
 * Read the typed value back from a row's slots
 */
export function valueFromSlots(row: SlotValues): AttributeValue {
  if (row.string_value !== null) return String(row.string_value);
  if (row.number_value !== null) return Number(row.number_value);
  if (row.date_value !== null) return String(row.date_value);
  if (row.boolean_value !== null) return row.boolean_value === 1;
  return null;
}

/** Convert a filter operand through the attribute's type */
export function toSqlOperand(type: AttributeType, raw: unknown): SqlValue {
  const handler = TYPE_HANDLERS[type];
  return handler.toSql(handler.cast(raw));
}
