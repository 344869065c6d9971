import type { FieldSchema } from '../model/FieldSchema.js';
import type { CoercionResult, ValidationError, ValidationErrorReason } from '../model/ValidationResult.js';
import { coerced, rejected } from '../model/ValidationResult.js';
import { compileDateFormat } from './DateFormat.js';

const INTEGER_PATTERN = /^-?\d+$/;

function failure(
  field: FieldSchema,
  rawValue: string,
  rowIndex: number,
  reason: ValidationErrorReason,
  message: string,
): CoercionResult {
  const error: ValidationError = { rowIndex, fieldName: field.name, rawValue, reason, message };
  return rejected(error);
}

/**
 * Convert one raw text cell to the field's declared type.
 *
 * An empty cell is a missing value: strings accept it as `''`, nullable fields
 * yield `{ type: 'missing' }`, every other type fails with `TypeMismatch`.
 */
export function coerce(rawValue: string, field: FieldSchema, rowIndex = 0): CoercionResult {
  if (field.type === 'string') {
    return coerced({ type: 'string', value: rawValue });
  }

  if (rawValue === '') {
    if (field.nullable) return coerced({ type: 'missing' });
    return failure(field, rawValue, rowIndex, 'TypeMismatch', `Field '${field.name}' is empty`);
  }

  switch (field.type) {
    case 'integer':
      return coerceInteger(rawValue, field, rowIndex);
    case 'date':
      return coerceDate(rawValue, field, rowIndex);
  }
}

function coerceInteger(rawValue: string, field: FieldSchema, rowIndex: number): CoercionResult {
  if (!INTEGER_PATTERN.test(rawValue)) {
    return failure(field, rawValue, rowIndex, 'TypeMismatch', `Field '${field.name}' must be an integer`);
  }
  return coerced({ type: 'integer', value: BigInt(rawValue) });
}

function coerceDate(rawValue: string, field: FieldSchema, rowIndex: number): CoercionResult {
  const format = compileDateFormat(field.dateFormat ?? '');
  if (typeof format === 'string') {
    // Schemas are checked at load time; reaching this means the caller skipped that step.
    return failure(field, rawValue, rowIndex, 'FormatMismatch', `Field '${field.name}': ${format}`);
  }

  const date = format.parse(rawValue);
  if (!date) {
    return failure(
      field,
      rawValue,
      rowIndex,
      'FormatMismatch',
      `Field '${field.name}' must be a valid date matching '${format.pattern}'`,
    );
  }
  return coerced({ type: 'date', value: date });
}
