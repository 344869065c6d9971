import type { FieldSchema } from '../../domain/model/FieldSchema.js';
import type { Row } from '../../domain/model/Row.js';
import { readCell } from '../../domain/model/Row.js';
import { canonicalForm } from '../../domain/model/TypedValue.js';
import type { DataSource } from '../../domain/ports/DataSource.js';
import type { SourceParser } from '../../domain/ports/SourceParser.js';
import type { ReferenceKeySet } from '../../domain/services/ForeignKeyChecker.js';
import { snapshotKeys } from '../../domain/services/ForeignKeyChecker.js';
import { coerce } from '../../domain/services/TypeCoercer.js';

export interface ReferenceKeys {
  readonly keys: ReferenceKeySet;
  /** Rows whose key cell was absent, empty or failed coercion. */
  readonly skipped: number;
}

/**
 * Materialize the key column of a referenced resource as canonical strings, so the
 * values compare equal to coerced local keys (`"0012"` and `"12"` are the same integer).
 */
export async function loadReferenceKeys(
  rows: AsyncIterable<Row> | Iterable<Row>,
  keyField: FieldSchema,
): Promise<ReferenceKeys> {
  const keys = new Set<string>();
  let skipped = 0;

  for await (const row of rows) {
    const raw = readCell(row, keyField.name);
    const result = raw === undefined ? undefined : coerce(raw, keyField);
    const key = result?.ok ? canonicalForm(result.value) : undefined;

    if (key === undefined) {
      skipped++;
    } else {
      keys.add(key);
    }
  }

  return { keys: snapshotKeys(keys), skipped };
}

/** Read a referenced resource from a source and collect its key column. */
export function loadReferenceKeysFrom(
  source: DataSource,
  parser: SourceParser,
  keyField: FieldSchema,
): Promise<ReferenceKeys> {
  return loadReferenceKeys(parser.stream(source.read()), keyField);
}
