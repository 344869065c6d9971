/**
 * One data row keyed by field name. Every value is raw text as read from the source.
 * A key that is not present means the column was absent for this row, which is
 * distinct from an empty cell (`''`).
 */
export interface Row {
  readonly [fieldName: string]: string;
}

/** Read a cell, returning `undefined` when the row has no such column. */
export function readCell(row: Row, fieldName: string): string | undefined {
  return Object.hasOwn(row, fieldName) ? row[fieldName] : undefined;
}
