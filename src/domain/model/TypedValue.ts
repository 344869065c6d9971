export interface CalendarDate {
  readonly year: number;
  readonly month: number;
  readonly day: number;
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
  /** Whether the source pattern carried time-of-day directives. */
  readonly hasTime: boolean;
}

export type TypedValue =
  | { readonly type: 'string'; readonly value: string }
  | { readonly type: 'integer'; readonly value: bigint }
  | { readonly type: 'date'; readonly value: CalendarDate }
  | { readonly type: 'missing' };

function pad(n: number, width: number): string {
  return String(n).padStart(width, '0');
}

/**
 * Canonical string form used for key comparisons. Integers drop leading zeros,
 * dates render as ISO-8601. Missing values have no canonical form.
 */
export function canonicalForm(value: TypedValue): string | undefined {
  switch (value.type) {
    case 'string':
      return value.value;
    case 'integer':
      return value.value.toString();
    case 'date': {
      const d = value.value;
      const date = `${pad(d.year, 4)}-${pad(d.month, 2)}-${pad(d.day, 2)}`;
      return d.hasTime ? `${date}T${pad(d.hour, 2)}:${pad(d.minute, 2)}:${pad(d.second, 2)}` : date;
    }
    case 'missing':
      return undefined;
  }
}
