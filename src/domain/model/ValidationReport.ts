import type { ValidationError, ValidationErrorReason } from './ValidationResult.js';

export interface ValidationReport {
  /** Row-then-field order. */
  readonly errors: readonly ValidationError[];
  readonly rowCount: number;
  readonly invalidRowCount: number;
  readonly isValid: boolean;
}

/** Serializable shape of a single report entry. */
export interface ReportRecord {
  readonly row: number;
  readonly field: string;
  readonly value: string;
  readonly reason: ValidationErrorReason;
}

export function createReport(errors: readonly ValidationError[], rowCount: number): ValidationReport {
  const invalidRows = new Set(errors.map((e) => e.rowIndex));
  return Object.freeze({
    errors: Object.freeze([...errors]),
    rowCount,
    invalidRowCount: invalidRows.size,
    isValid: errors.length === 0,
  });
}

export function toReportRecords(report: ValidationReport): ReportRecord[] {
  return report.errors.map((e) => ({
    row: e.rowIndex,
    field: e.fieldName,
    value: e.rawValue,
    reason: e.reason,
  }));
}

export function serializeReport(report: ValidationReport, space?: number): string {
  return JSON.stringify(toReportRecords(report), null, space);
}
