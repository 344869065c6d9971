import type { ResourceSchema, ForeignKeyDecl } from '../model/ResourceSchema.js';
import { findField } from '../model/ResourceSchema.js';
import type { Row } from '../model/Row.js';
import { readCell } from '../model/Row.js';
import type { TypedValue } from '../model/TypedValue.js';
import { canonicalForm } from '../model/TypedValue.js';
import type { ValidationError } from '../model/ValidationResult.js';
import { SchemaConfigurationError } from '../errors/SchemaConfigurationError.js';
import { coerce } from './TypeCoercer.js';

/** A read-only set of canonical key values taken from the referenced resource. */
export type ReferenceKeySet = ReadonlySet<string>;

const snapshots = new WeakSet<ReadonlySet<string>>();

/**
 * Freeze a key collection for a validation run. The returned set is a private copy,
 * so later changes to the caller's collection cannot reach rows still being checked.
 */
export function snapshotKeys(keys: Iterable<string>): ReferenceKeySet {
  if (keys instanceof Set && snapshots.has(keys)) return keys;
  const snapshot: ReadonlySet<string> = new Set(keys);
  snapshots.add(snapshot);
  return snapshot;
}

/**
 * Look up an already-coerced local key value. Missing values (nullable empty cells)
 * are not looked up.
 */
export function checkCoercedKey(
  value: TypedValue,
  rawValue: string,
  fk: ForeignKeyDecl,
  referencedKeys: ReferenceKeySet,
  rowIndex: number,
): ValidationError | undefined {
  const key = canonicalForm(value);
  if (key === undefined || referencedKeys.has(key)) return undefined;

  return {
    rowIndex,
    fieldName: fk.localField,
    rawValue,
    reason: 'ForeignKeyViolation',
    message: `Value '${rawValue}' of '${fk.localField}' not found in ${fk.referencedResource}.${fk.referencedField}`,
  };
}

/**
 * Confirm the row's local key is a member of the referenced key set. Rows whose
 * key is absent or fails coercion yield nothing here; the row validator reports those.
 */
export function checkForeignKey(
  row: Row,
  fk: ForeignKeyDecl,
  referencedKeys: ReferenceKeySet,
  schema: ResourceSchema,
  rowIndex = 0,
): ValidationError | undefined {
  const field = findField(schema, fk.localField);
  if (!field) {
    throw new SchemaConfigurationError([`foreign key field '${fk.localField}' is not a schema field`]);
  }

  const raw = readCell(row, fk.localField);
  if (raw === undefined) return undefined;

  const result = coerce(raw, field, rowIndex);
  if (!result.ok) return undefined;

  return checkCoercedKey(result.value, raw, fk, referencedKeys, rowIndex);
}
