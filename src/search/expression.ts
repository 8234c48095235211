/**
 * One-line search expressions
 *
 * Grammar:
 *   expression = condition ( condition )*
 *   condition  = name operator value
 *   name       = letter ( letter | digit | '_' )*
 *   operator   = '==' | '!=' | '>=' | '<=' | '>' | '<' | '~='
 *   value      = string_literal | bare_value
 *
 * String literals: "value" or 'value' (backslash escapes the quote)
 * Bare values run to the next whitespace and stay strings; the word null
 * becomes null. The search compiler casts them through the attribute type,
 * so `age > 18` compares numbers while `code == 007` keeps the leading zeros.
 *
 * `name == null` searches NULL, `name != null` NOT NULL, `~=` is LIKE.
 */

import { NAME_PATTERN } from '../catalog/definition.js';
import type { FilterMap, FilterValue } from './types.js';

export type ExpressionOperator = '==' | '!=' | '>=' | '<=' | '>' | '<' | '~=';

/** Longest first so '>=' wins over '>' */
const OPERATORS: ExpressionOperator[] = ['==', '!=', '>=', '<=', '~=', '>', '<'];

export interface ExpressionCondition {
  name: string;
  operator: ExpressionOperator;
  value: string | null;
  /** 0-based offset of the condition in the input */
  position: number;
}

export type ExpressionResult =
  | { ok: true; conditions: ExpressionCondition[]; filters: FilterMap }
  | { ok: false; error: string; position?: number };

type Step<T> = { ok: true; value: T; pos: number } | { ok: false; error: string; position: number };

/**
 * Parse an expression into conditions and the equivalent filter map
 */
export function parseExpression(input: string): ExpressionResult {
  const conditions: ExpressionCondition[] = [];
  let pos = 0;

  while (pos < input.length) {
    pos = skipWhitespace(input, pos);
    if (pos >= input.length) break;
    const start = pos;

    const name = parseName(input, pos);
    if (!name.ok) return { ok: false, error: name.error, position: name.position };
    pos = skipWhitespace(input, name.pos);

    const operator = parseOperator(input, pos);
    if (!operator.ok) return { ok: false, error: operator.error, position: operator.position };
    pos = skipWhitespace(input, operator.pos);

    const value = parseValue(input, pos);
    if (!value.ok) return { ok: false, error: value.error, position: value.position };
    pos = value.pos;

    conditions.push({ name: name.value, operator: operator.value, value: value.value, position: start });
  }

  if (conditions.length === 0) {
    return { ok: false, error: 'Expected at least one condition', position: 0 };
  }

  const filters: FilterMap = {};
  for (const condition of conditions) {
    if (Object.hasOwn(filters, condition.name)) {
      return {
        ok: false,
        error: `Attribute '${condition.name}' appears more than once at char ${condition.position + 1}`,
        position: condition.position,
      };
    }
    const filter = toFilter(condition);
    if (!filter.ok) return { ok: false, error: filter.error, position: filter.position };
    filters[condition.name] = filter.value;
  }

  return { ok: true, conditions, filters };
}

function toFilter(condition: ExpressionCondition): Step<FilterValue> {
  const { operator, value, position } = condition;
  const done = (filter: FilterValue): Step<FilterValue> => ({ ok: true, value: filter, pos: position });

  if (value === null) {
    if (operator === '==') return done(null);
    if (operator === '!=') return done({ operator: 'NOT NULL' });
    return {
      ok: false,
      error: `Operator '${operator}' cannot compare with null at char ${position + 1}`,
      position,
    };
  }

  switch (operator) {
    case '==':
      return done({ operator: '=', value });
    case '~=':
      return done({ operator: 'LIKE', value });
    default:
      return done({ operator, value });
  }
}

function skipWhitespace(input: string, pos: number): number {
  while (pos < input.length && /\s/.test(input[pos])) {
    pos++;
  }
  return pos;
}

function parseName(input: string, pos: number): Step<string> {
  const start = pos;

  while (pos < input.length && /[a-zA-Z0-9_]/.test(input[pos])) {
    pos++;
  }

  if (pos === start) {
    return { ok: false, error: `Expected attribute name at char ${start + 1}`, position: start };
  }

  const name = input.slice(start, pos);
  if (!NAME_PATTERN.test(name)) {
    return { ok: false, error: `Invalid attribute name '${name}' at char ${start + 1}`, position: start };
  }

  return { ok: true, value: name, pos };
}

function parseOperator(input: string, pos: number): Step<ExpressionOperator> {
  for (const op of OPERATORS) {
    if (input.slice(pos, pos + op.length) === op) {
      return { ok: true, value: op, pos: pos + op.length };
    }
  }

  return {
    ok: false,
    error: `Expected operator (${OPERATORS.join(', ')}) at char ${pos + 1}`,
    position: pos,
  };
}

function parseValue(input: string, pos: number): Step<string | null> {
  if (pos >= input.length) {
    return { ok: false, error: `Expected value at char ${pos + 1}`, position: pos };
  }

  const char = input[pos];
  if (char === '"' || char === "'") {
    return parseStringLiteral(input, pos, char);
  }

  return parseBareValue(input, pos);
}

function parseStringLiteral(input: string, pos: number, quote: '"' | "'"): Step<string> {
  const start = pos;
  pos++;

  let value = '';
  while (pos < input.length) {
    const char = input[pos];

    if (char === quote) {
      return { ok: true, value, pos: pos + 1 };
    }

    if (char === '\\' && pos + 1 < input.length) {
      const next = input[pos + 1];
      if (next === quote || next === '\\') {
        value += next;
        pos += 2;
        continue;
      }
    }

    value += char;
    pos++;
  }

  return { ok: false, error: `Unterminated string starting at char ${start + 1}`, position: start };
}

function parseBareValue(input: string, pos: number): Step<string | null> {
  const start = pos;

  while (pos < input.length && !/\s/.test(input[pos])) {
    pos++;
  }

  const text = input.slice(start, pos);
  if (/["']/.test(text)) {
    return { ok: false, error: `Unexpected quote in value at char ${start + 1}`, position: start };
  }
  if (text === 'null') {
    return { ok: true, value: null, pos };
  }
  return { ok: true, value: text, pos };
}
