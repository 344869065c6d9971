import type { ResourceSchema } from '../model/ResourceSchema.js';
import type { Row } from '../model/Row.js';
import { readCell } from '../model/Row.js';
import type { TypedValue } from '../model/TypedValue.js';
import type { ValidationError } from '../model/ValidationResult.js';
import { coerce } from './TypeCoercer.js';

export interface CoercedRow {
  /** Successfully coerced values, keyed by field name. Failed fields are absent. */
  readonly values: ReadonlyMap<string, TypedValue>;
  readonly errors: readonly ValidationError[];
}

/**
 * Coerce every schema field of a row in column order, collecting all errors.
 * Columns the schema does not declare are ignored.
 */
export function coerceRow(row: Row, schema: ResourceSchema, rowIndex: number): CoercedRow {
  const values = new Map<string, TypedValue>();
  const errors: ValidationError[] = [];

  for (const field of schema.fields) {
    const raw = readCell(row, field.name);

    if (raw === undefined) {
      errors.push({
        rowIndex,
        fieldName: field.name,
        rawValue: '',
        reason: 'TypeMismatch',
        message: `Field '${field.name}' is missing from the row`,
      });
      continue;
    }

    const result = coerce(raw, field, rowIndex);
    if (result.ok) {
      values.set(field.name, result.value);
    } else {
      errors.push(result.error);
    }
  }

  return { values, errors };
}

export function validateRow(row: Row, schema: ResourceSchema, rowIndex: number): ValidationError[] {
  return [...coerceRow(row, schema, rowIndex).errors];
}
