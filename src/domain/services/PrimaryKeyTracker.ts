import type { TypedValue } from '../model/TypedValue.js';
import { canonicalForm } from '../model/TypedValue.js';
import type { ValidationError } from '../model/ValidationResult.js';

/** Tracks primary key values seen during one run. The first occurrence of a key wins. */
export class PrimaryKeyTracker {
  private readonly seen = new Map<string, number>();

  constructor(private readonly fieldName: string) {}

  check(value: TypedValue, rawValue: string, rowIndex: number): ValidationError | undefined {
    const key = canonicalForm(value);
    if (key === undefined) return undefined;

    const firstRow = this.seen.get(key);
    if (firstRow === undefined) {
      this.seen.set(key, rowIndex);
      return undefined;
    }

    return {
      rowIndex,
      fieldName: this.fieldName,
      rawValue,
      reason: 'PrimaryKeyViolation',
      message: `Duplicate value '${rawValue}' for primary key '${this.fieldName}' (first seen in row ${String(firstRow)})`,
    };
  }
}
