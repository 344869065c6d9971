import { createReadStream } from 'node:fs';
import type { DataSource, SourceEncoding } from '../../domain/ports/DataSource.js';

export interface FilePathSourceOptions {
  /** Encoding for reading the file. Default: 'utf-8'. */
  readonly encoding?: SourceEncoding;
  /** Chunk size in bytes for streaming reads. Default: 65536 (64KB). */
  readonly highWaterMark?: number;
}

/** Data source that streams a local file with `createReadStream`. */
export class FilePathSource implements DataSource {
  private readonly encoding: SourceEncoding;
  private readonly highWaterMark: number;

  constructor(
    private readonly filePath: string,
    options?: FilePathSourceOptions,
  ) {
    this.encoding = options?.encoding ?? 'utf-8';
    this.highWaterMark = options?.highWaterMark ?? 65536;
  }

  async *read(): AsyncIterable<string> {
    const stream = createReadStream(this.filePath, {
      encoding: this.encoding,
      highWaterMark: this.highWaterMark,
    });

    for await (const chunk of stream) {
      yield String(chunk);
    }
  }
}
