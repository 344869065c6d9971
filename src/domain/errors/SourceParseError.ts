/** Thrown when the delimited text itself is malformed, such as a quoted cell that never closes. */
export class SourceParseError extends Error {
  readonly code: string;
  /** 0-based record number, header included. */
  readonly record: number;

  constructor(code: string, record: number, detail: string) {
    super(`Malformed delimited text at record ${String(record)}: ${detail}`);
    this.name = 'SourceParseError';
    this.code = code;
    this.record = record;
  }
}
