import type { ResourceSchema } from '../model/ResourceSchema.js';
import type { Row } from '../model/Row.js';
import { readCell } from '../model/Row.js';
import type { ValidationError } from '../model/ValidationResult.js';
import type { ValidationReport } from '../model/ValidationReport.js';
import { createReport } from '../model/ValidationReport.js';
import { ValidationAbortedError } from '../errors/ValidationAbortedError.js';
import { coerceRow } from './RowValidator.js';
import type { ReferenceKeySet } from './ForeignKeyChecker.js';
import { checkCoercedKey, snapshotKeys } from './ForeignKeyChecker.js';
import { PrimaryKeyTracker } from './PrimaryKeyTracker.js';
import { assertValidSchema } from './SchemaRules.js';

/** Receives each row's errors as soon as the row has been checked. */
export type RowObserver = (rowIndex: number, errors: readonly ValidationError[]) => void;

export interface ValidateOptions {
  /** Checked between rows. Aborting throws `ValidationAbortedError`; no partial report is returned. */
  readonly signal?: AbortSignal;
  readonly onRow?: RowObserver;
}

/**
 * Accumulates errors for one run: not started, accumulating, complete.
 * Rows must be accepted in arrival order. A schema that breaks an invariant throws
 * `SchemaConfigurationError` before any row is accepted.
 */
export class ReportAccumulator {
  private readonly errors: ValidationError[] = [];
  private readonly referencedKeys: ReferenceKeySet | undefined;
  private readonly primaryKeys: PrimaryKeyTracker | undefined;
  private rowCount = 0;
  private completed = false;

  constructor(
    private readonly schema: ResourceSchema,
    referencedKeys?: Iterable<string>,
  ) {
    assertValidSchema(schema);
    this.referencedKeys = referencedKeys && schema.foreignKey ? snapshotKeys(referencedKeys) : undefined;
    this.primaryKeys = schema.primaryKey ? new PrimaryKeyTracker(schema.primaryKey) : undefined;
  }

  get rowsChecked(): number {
    return this.rowCount;
  }

  get errorCount(): number {
    return this.errors.length;
  }

  /** Validate the next row and return its errors in field order. */
  accept(row: Row): readonly ValidationError[] {
    if (this.completed) {
      throw new Error('Cannot accept rows after the report has been completed');
    }

    const rowIndex = this.rowCount++;
    const { values, errors } = coerceRow(row, this.schema, rowIndex);
    const rowErrors = [...errors];

    const fk = this.schema.foreignKey;
    if (fk && this.referencedKeys) {
      const value = values.get(fk.localField);
      if (value) {
        const fkError = checkCoercedKey(value, readCell(row, fk.localField) ?? '', fk, this.referencedKeys, rowIndex);
        if (fkError) rowErrors.push(fkError);
      }
    }

    const pkField = this.schema.primaryKey;
    if (pkField && this.primaryKeys) {
      const value = values.get(pkField);
      if (value) {
        const pkError = this.primaryKeys.check(value, readCell(row, pkField) ?? '', rowIndex);
        if (pkError) rowErrors.push(pkError);
      }
    }

    this.errors.push(...this.sortByField(rowErrors));
    return rowErrors;
  }

  complete(): ValidationReport {
    this.completed = true;
    return createReport(this.errors, this.rowCount);
  }

  private sortByField(errors: ValidationError[]): ValidationError[] {
    if (errors.length < 2) return errors;
    const order = new Map(this.schema.fields.map((f, i) => [f.name, i]));
    // Stable sort keeps coercion errors ahead of key errors on the same field.
    return errors.sort((a, b) => (order.get(a.fieldName) ?? 0) - (order.get(b.fieldName) ?? 0));
  }
}

function throwIfAborted(signal: AbortSignal | undefined, rowsChecked: number): void {
  if (signal?.aborted) throw new ValidationAbortedError(rowsChecked);
}

/**
 * Validate every row of a finite row sequence against the schema. Never stops at the
 * first defect; errors come back in row-then-field order. The sequence is consumed once.
 *
 * When the schema declares a foreign key and `referencedKeys` is given, each row's key
 * is looked up in a snapshot of those keys taken before the first row.
 */
export function validate(
  rows: Iterable<Row>,
  schema: ResourceSchema,
  referencedKeys?: Iterable<string>,
  options?: ValidateOptions,
): ValidationReport {
  const accumulator = new ReportAccumulator(schema, referencedKeys);

  for (const row of rows) {
    throwIfAborted(options?.signal, accumulator.rowsChecked);
    const rowIndex = accumulator.rowsChecked;
    const errors = accumulator.accept(row);
    options?.onRow?.(rowIndex, errors);
  }

  return accumulator.complete();
}

/** `validate` for row sequences that arrive asynchronously, such as a streamed file. */
export async function validateAsync(
  rows: AsyncIterable<Row> | Iterable<Row>,
  schema: ResourceSchema,
  referencedKeys?: Iterable<string>,
  options?: ValidateOptions,
): Promise<ValidationReport> {
  const accumulator = new ReportAccumulator(schema, referencedKeys);

  for await (const row of rows) {
    throwIfAborted(options?.signal, accumulator.rowsChecked);
    const rowIndex = accumulator.rowsChecked;
    const errors = accumulator.accept(row);
    options?.onRow?.(rowIndex, errors);
  }

  return accumulator.complete();
}
