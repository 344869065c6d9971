import { describe, it, expect } from 'vitest';
import { StreamSource } from '../../../src/infrastructure/sources/StreamSource.js';

function createAsyncIterable<T>(items: T[]): AsyncIterable<T> {
  return {
    [Symbol.asyncIterator]() {
      let i = 0;
      return {
        next() {
          const value = items[i++];
          if (value === undefined) return Promise.resolve({ done: true as const, value: undefined });
          return Promise.resolve({ done: false as const, value });
        },
      };
    },
  };
}

async function readAll(source: StreamSource): Promise<string[]> {
  const chunks: string[] = [];
  for await (const chunk of source.read()) {
    chunks.push(chunk);
  }
  return chunks;
}

describe('StreamSource', () => {
  describe('read()', () => {
    it('should yield string chunks from an AsyncIterable', async () => {
      const source = new StreamSource(createAsyncIterable(['MINE_ID\n', '0100003\n']));
      expect(await readAll(source)).toEqual(['MINE_ID\n', '0100003\n']);
    });

    it('should decode Buffer chunks', async () => {
      const source = new StreamSource(createAsyncIterable([Buffer.from('MINE_ID\n'), Buffer.from('0100003\n')]));
      expect((await readAll(source)).join('')).toBe('MINE_ID\n0100003\n');
    });

    it('should decode a multi-byte character split across chunks', async () => {
      const bytes = Buffer.from('Peñasco', 'utf-8');
      const source = new StreamSource(createAsyncIterable([bytes.subarray(0, 3), bytes.subarray(3)]));
      expect((await readAll(source)).join('')).toBe('Peñasco');
    });

    it('should throw when read twice', async () => {
      const source = new StreamSource(createAsyncIterable(['data']));
      await readAll(source);

      await expect(readAll(source)).rejects.toThrow('already been consumed');
    });
  });

  describe('encoding', () => {
    it('should decode utf-16le byte chunks split mid-character', async () => {
      const bytes = Buffer.from('MINE_ID\n0100003\n', 'utf16le');
      const source = new StreamSource(createAsyncIterable([bytes.subarray(0, 5), bytes.subarray(5)]), {
        encoding: 'utf-16le',
      });

      expect((await readAll(source)).join('')).toBe('MINE_ID\n0100003\n');
    });
  });

  describe('ReadableStream input', () => {
    it('should yield chunks from a ReadableStream', async () => {
      const readable = new ReadableStream<string | Uint8Array>({
        start(controller) {
          controller.enqueue('chunk1');
          controller.enqueue(Buffer.from('chunk2'));
          controller.close();
        },
      });

      expect(await readAll(new StreamSource(readable))).toEqual(['chunk1', 'chunk2']);
    });
  });
});
