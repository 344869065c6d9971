import type { CalendarDate } from '../model/TypedValue.js';

type Directive = 'Y' | 'y' | 'm' | 'd' | 'H' | 'M' | 'S' | 'b' | 'B';

const MONTH_NAMES = [
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december',
];

const DIRECTIVE_PATTERNS: Record<Directive, string> = {
  Y: '(\\d{4})',
  y: '(\\d{2})',
  m: '(\\d{2})',
  d: '(\\d{2})',
  H: '(\\d{2})',
  M: '(\\d{2})',
  S: '(\\d{2})',
  b: `(${MONTH_NAMES.map((n) => n.slice(0, 3)).join('|')})`,
  B: `(${MONTH_NAMES.join('|')})`,
};

const TIME_DIRECTIVES: ReadonlySet<Directive> = new Set<Directive>(['H', 'M', 'S']);

function isDirective(char: string): char is Directive {
  return Object.hasOwn(DIRECTIVE_PATTERNS, char);
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

/**
 * A compiled strftime-style date pattern. Matching is exact: the whole value must
 * match, numeric directives take a fixed number of digits, and the result must be
 * a real calendar date.
 */
export class DateFormat {
  private readonly regex: RegExp;
  private readonly directives: readonly Directive[];
  private readonly hasTime: boolean;

  private constructor(readonly pattern: string, source: string, directives: Directive[]) {
    this.regex = new RegExp(`^${source}$`, 'i');
    this.directives = directives;
    this.hasTime = directives.some((d) => TIME_DIRECTIVES.has(d));
  }

  /** Compile a pattern, or return a description of why it cannot be compiled. */
  static compile(pattern: string): DateFormat | string {
    if (pattern.trim() === '') return 'date format is empty';

    let source = '';
    const directives: Directive[] = [];

    for (let i = 0; i < pattern.length; i++) {
      const char = pattern.charAt(i);
      if (char !== '%') {
        source += escapeRegExp(char);
        continue;
      }

      const next = pattern.charAt(i + 1);
      i++;
      if (next === '%') {
        source += '%';
      } else if (isDirective(next)) {
        source += DIRECTIVE_PATTERNS[next];
        directives.push(next);
      } else {
        return next === ''
          ? `date format '${pattern}' ends with a bare '%'`
          : `date format '${pattern}' uses unsupported directive '%${next}'`;
      }
    }

    if (directives.length === 0) return `date format '${pattern}' has no date directives`;

    return new DateFormat(pattern, source, directives);
  }

  parse(value: string): CalendarDate | null {
    const match = this.regex.exec(value);
    if (!match) return null;

    let year = 1900;
    let month = 1;
    let day = 1;
    let hour = 0;
    let minute = 0;
    let second = 0;

    for (let i = 0; i < this.directives.length; i++) {
      const text = match[i + 1] ?? '';
      switch (this.directives[i]) {
        case 'Y':
          year = Number(text);
          break;
        case 'y': {
          const short = Number(text);
          year = short < 69 ? 2000 + short : 1900 + short;
          break;
        }
        case 'm':
          month = Number(text);
          break;
        case 'b':
        case 'B':
          month = MONTH_NAMES.findIndex((n) => n.startsWith(text.toLowerCase())) + 1;
          break;
        case 'd':
          day = Number(text);
          break;
        case 'H':
          hour = Number(text);
          break;
        case 'M':
          minute = Number(text);
          break;
        case 'S':
          second = Number(text);
          break;
      }
    }

    if (year < 1) return null;
    if (month < 1 || month > 12) return null;
    if (day < 1 || day > daysInMonth(year, month)) return null;
    if (hour > 23 || minute > 59 || second > 59) return null;

    return { year, month, day, hour, minute, second, hasTime: this.hasTime };
  }
}

const compiled = new Map<string, DateFormat | string>();

/** Compile with memoization; patterns are shared across fields and runs. */
export function compileDateFormat(pattern: string): DateFormat | string {
  let entry = compiled.get(pattern);
  if (entry === undefined) {
    entry = DateFormat.compile(pattern);
    compiled.set(pattern, entry);
  }
  return entry;
}
