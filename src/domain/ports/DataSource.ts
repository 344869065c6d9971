/** Text encodings both `Buffer` and `TextDecoder` read. */
export type SourceEncoding = 'utf-8' | 'utf-16le' | 'latin1';

/** Where the delimited text of a resource comes from. */
export interface DataSource {
  /** Yield the content in order. Sources backed by a one-shot stream can only be read once. */
  read(): AsyncIterable<string>;
}
