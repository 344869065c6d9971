import type { DataSource, SourceEncoding } from '../../domain/ports/DataSource.js';

export interface StreamSourceOptions {
  /** Encoding of byte chunks. Default: 'utf-8'. */
  readonly encoding?: SourceEncoding;
}

/** Wraps an `AsyncIterable` or web `ReadableStream`, such as an upload body or a decompressed entry. Read once. */
export class StreamSource implements DataSource {
  private readonly encoding: SourceEncoding;
  private consumed = false;

  constructor(
    private readonly stream: AsyncIterable<string | Uint8Array> | ReadableStream<string | Uint8Array>,
    options?: StreamSourceOptions,
  ) {
    this.encoding = options?.encoding ?? 'utf-8';
  }

  async *read(): AsyncIterable<string> {
    if (this.consumed) {
      throw new Error('StreamSource: stream has already been consumed. Streams can only be read once.');
    }
    this.consumed = true;

    const iterable = isReadableStream(this.stream) ? fromReadableStream(this.stream) : this.stream;
    // Multi-byte characters may straddle chunk boundaries.
    const decoder = new TextDecoder(this.encoding);

    for await (const chunk of iterable) {
      yield typeof chunk === 'string' ? chunk : decoder.decode(chunk, { stream: true });
    }

    const rest = decoder.decode();
    if (rest !== '') yield rest;
  }
}

function isReadableStream<T>(stream: AsyncIterable<T> | ReadableStream<T>): stream is ReadableStream<T> {
  return 'getReader' in stream && typeof stream.getReader === 'function';
}

async function* fromReadableStream<T>(stream: ReadableStream<T>): AsyncIterable<T> {
  const reader = stream.getReader();
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      yield value;
    }
  } finally {
    reader.releaseLock();
  }
}
