import type { DataSource } from '../../domain/ports/DataSource.js';

/** In-memory source for content that is already loaded. Can be read any number of times. */
export class BufferSource implements DataSource {
  private readonly content: string;

  constructor(data: string | Buffer) {
    this.content = typeof data === 'string' ? data : data.toString('utf-8');
  }

  async *read(): AsyncIterable<string> {
    yield await Promise.resolve(this.content);
  }
}
