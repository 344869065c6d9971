export type FieldType = 'string' | 'integer' | 'date';

export const FIELD_TYPES: readonly FieldType[] = ['string', 'integer', 'date'];

export interface FieldSchema {
  readonly name: string;
  readonly type: FieldType;
  /** strftime-style pattern such as `%m/%d/%Y`. Required when `type` is `'date'`. */
  readonly dateFormat?: string;
  /** When `true`, an empty cell is accepted as a missing value instead of a `TypeMismatch`. Default: `false`. */
  readonly nullable?: boolean;
  readonly description?: string;
}

export function isFieldType(value: unknown): value is FieldType {
  return FIELD_TYPES.some((type) => type === value);
}
