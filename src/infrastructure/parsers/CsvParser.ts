import Papa from 'papaparse';
import type { SourceParser, ParserOptions } from '../../domain/ports/SourceParser.js';
import type { Row } from '../../domain/model/Row.js';
import { SourceParseError } from '../../domain/errors/SourceParseError.js';

const BOM = '\uFEFF';

function toText(data: string | Buffer): string {
  return typeof data === 'string' ? data : data.toString('utf-8');
}

/**
 * Index of the last line break that ends a record, or `-1`. A `"` opens a quoted
 * cell only at the start of a field; elsewhere it is literal text.
 */
export function lastRecordBoundary(text: string, delimiter = ','): number {
  let inQuotes = false;
  let fieldStart = true;
  let boundary = -1;

  for (let i = 0; i < text.length; i++) {
    const char = text.charAt(i);

    if (inQuotes) {
      if (char === '"') {
        if (text.charAt(i + 1) === '"') i++;
        else inQuotes = false;
      }
      continue;
    }

    if (char === '"' && fieldStart) {
      inQuotes = true;
      fieldStart = false;
    } else if (char === '\n') {
      boundary = i;
      fieldStart = true;
    } else if (text.startsWith(delimiter, i)) {
      i += delimiter.length - 1;
      fieldStart = true;
    } else {
      fieldStart = false;
    }
  }

  return boundary;
}

/** Turns cell arrays into rows keyed by column name. The first record becomes the header unless columns are given. */
class RowAssembler {
  private header: readonly string[] | undefined;
  /** Records seen so far, header included. */
  records = 0;

  constructor(columns?: readonly string[]) {
    this.header = columns;
  }

  assemble(cells: readonly string[]): Row | undefined {
    this.records++;
    if (!this.header) {
      this.header = cells.map((c) => c.trim());
      return undefined;
    }

    const row: Record<string, string> = {};
    const width = Math.min(cells.length, this.header.length);
    for (let i = 0; i < width; i++) {
      const name = this.header[i];
      const cell = cells[i];
      if (name !== undefined && cell !== undefined) row[name] = cell;
    }
    return row;
  }
}

/**
 * Delimited-text parser backed by papaparse. Cells stay raw text; short records
 * leave their trailing columns absent and extra cells are dropped.
 */
export class CsvParser implements SourceParser {
  private readonly delimiter: string;
  private readonly columns: readonly string[] | undefined;

  constructor(options?: ParserOptions) {
    this.delimiter = options?.delimiter ?? ',';
    this.columns = options?.columns;
  }

  *parse(data: string | Buffer): Iterable<Row> {
    const assembler = new RowAssembler(this.columns);
    yield* this.rows(this.stripBom(toText(data)), assembler);
  }

  async *stream(chunks: AsyncIterable<string | Buffer>): AsyncIterable<Row> {
    const assembler = new RowAssembler(this.columns);
    let pending = '';
    let first = true;

    for await (const chunk of chunks) {
      let text = toText(chunk);
      if (first) {
        text = this.stripBom(text);
        first = false;
      }

      pending += text;
      const boundary = lastRecordBoundary(pending, this.delimiter);
      if (boundary < 0) continue;

      const complete = pending.slice(0, boundary + 1);
      pending = pending.slice(boundary + 1);
      yield* this.rows(complete, assembler);
    }

    if (pending !== '') {
      yield* this.rows(pending, assembler);
    }
  }

  private *rows(text: string, assembler: RowAssembler): Iterable<Row> {
    const result = Papa.parse<string[]>(text, {
      delimiter: this.delimiter,
      header: false,
      skipEmptyLines: true,
      dynamicTyping: false,
    });

    const error = result.errors[0];
    if (error) {
      throw new SourceParseError(error.code, assembler.records + (error.row ?? 0), error.message);
    }

    for (const cells of result.data) {
      const row = assembler.assemble(cells);
      if (row) yield row;
    }
  }

  private stripBom(text: string): string {
    return text.startsWith(BOM) ? text.slice(BOM.length) : text;
  }
}
