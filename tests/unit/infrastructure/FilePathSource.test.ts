import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { writeFileSync, mkdirSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { FilePathSource } from '../../../src/infrastructure/sources/FilePathSource.js';
import { CsvParser } from '../../../src/infrastructure/parsers/CsvParser.js';
import type { Row } from '../../../src/domain/model/Row.js';

const TEST_DIR = join(tmpdir(), 'tabular-resource-validator-test-filepathsource');

beforeAll(() => {
  mkdirSync(TEST_DIR, { recursive: true });
});

afterAll(() => {
  rmSync(TEST_DIR, { recursive: true, force: true });
});

function writeTempFile(name: string, content: string): string {
  const filePath = join(TEST_DIR, name);
  writeFileSync(filePath, content, 'utf-8');
  return filePath;
}

describe('FilePathSource', () => {
  describe('read()', () => {
    it('should stream file content as chunks', async () => {
      const content = 'MINE_ID,NAME\n0100003,Alpha Mine\n';
      const source = new FilePathSource(writeTempFile('read-basic.csv', content));

      const chunks: string[] = [];
      for await (const chunk of source.read()) {
        chunks.push(chunk);
      }

      expect(chunks.join('')).toBe(content);
    });

    it('should stream large content in multiple chunks', async () => {
      const content = 'MINE_ID,NAME,START\n' + '0100003,Alpha Mine,01/15/1995\n'.repeat(5000);
      // Small highWaterMark forces multiple chunks
      const source = new FilePathSource(writeTempFile('read-large.csv', content), { highWaterMark: 256 });

      const chunks: string[] = [];
      for await (const chunk of source.read()) {
        chunks.push(chunk);
      }

      expect(chunks.length).toBeGreaterThan(1);
      expect(chunks.join('')).toBe(content);
    });

    it('should feed the parser whole rows across chunk boundaries', async () => {
      const content = 'MINE_ID,NAME\n' + '0100003,"Alpha, Mine"\n'.repeat(200);
      const source = new FilePathSource(writeTempFile('read-rows.csv', content), { highWaterMark: 64 });

      const rows: Row[] = [];
      for await (const row of new CsvParser().stream(source.read())) {
        rows.push(row);
      }

      expect(rows).toHaveLength(200);
      expect(rows.every((r) => r['NAME'] === 'Alpha, Mine' && r['MINE_ID'] === '0100003')).toBe(true);
    });
  });

  describe('encoding', () => {
    it('should decode a file written in latin1', async () => {
      const filePath = join(TEST_DIR, 'latin1.csv');
      writeFileSync(filePath, 'NAME\nPeñasco\n', 'latin1');

      const chunks: string[] = [];
      for await (const chunk of new FilePathSource(filePath, { encoding: 'latin1' }).read()) {
        chunks.push(chunk);
      }

      expect(chunks.join('')).toBe('NAME\nPeñasco\n');
    });
  });
});
