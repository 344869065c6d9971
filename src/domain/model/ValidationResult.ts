import type { TypedValue } from './TypedValue.js';

export type ValidationErrorReason = 'TypeMismatch' | 'FormatMismatch' | 'ForeignKeyViolation' | 'PrimaryKeyViolation';

export interface ValidationError {
  readonly rowIndex: number;
  readonly fieldName: string;
  readonly rawValue: string;
  readonly reason: ValidationErrorReason;
  readonly message: string;
}

export type CoercionResult =
  | { readonly ok: true; readonly value: TypedValue }
  | { readonly ok: false; readonly error: ValidationError };

export function coerced(value: TypedValue): CoercionResult {
  return { ok: true, value };
}

export function rejected(error: ValidationError): CoercionResult {
  return { ok: false, error };
}
