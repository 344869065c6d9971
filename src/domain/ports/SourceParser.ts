import type { Row } from '../model/Row.js';

export interface ParserOptions {
  /** Cell delimiter. Default: `','`. */
  readonly delimiter?: string;
  /** Column names for sources without a header record. When set, the first record is data. */
  readonly columns?: readonly string[];
}

export interface SourceParser {
  /** Parse a complete document. */
  parse(data: string | Buffer): Iterable<Row>;
  /** Parse a document delivered in chunks. Records may span chunk boundaries. */
  stream(chunks: AsyncIterable<string | Buffer>): AsyncIterable<Row>;
}
