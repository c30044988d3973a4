/**
 * Value coercion for field writes.
 *
 * Values arrive as query strings; the control app expects numbers for
 * numeric fields and booleans for checkboxes. Unknown field types are sent
 * as the original string.
 */

import type { FieldMeta, JsonValue } from '../../adapters/singular/types.js';

const NUMERIC_TYPES = new Set(['number', 'range', 'slider']);
const BOOLEAN_TYPES = new Set(['checkbox', 'toggle', 'bool', 'boolean']);
const TRUTHY = new Set(['1', 'true', 'yes', 'on']);

const INTEGER_REGEX = /^\s*[-+]?\d+\s*$/;
const DECIMAL_REGEX = /^\s*[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?\s*$/;

/**
 * Convert a string value according to the field's declared type.
 *
 * Numeric types: a value containing "." is read as a decimal, anything else
 * as an integer; unparseable input is kept as the string.
 */
export function coerceValue(field: Pick<FieldMeta, 'type'>, value: string, asString = false): JsonValue {
  if (asString) {
    return value;
  }

  const type = field.type.toLowerCase();

  if (NUMERIC_TYPES.has(type)) {
    const pattern = value.includes('.') ? DECIMAL_REGEX : INTEGER_REGEX;
    if (!pattern.test(value)) {
      return value;
    }
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : value;
  }

  if (BOOLEAN_TYPES.has(type)) {
    return TRUTHY.has(value.toLowerCase());
  }

  return value;
}

/**
 * Parse a query-style boolean ("1", "true", "yes", "on").
 */
export function parseFlag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') {
    return fallback;
  }
  return TRUTHY.has(value.toLowerCase());
}
