import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { writeFileSync, mkdirSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { gzipSync } from 'node:zlib';
import { FilePathSource } from '../../../src/infrastructure/sources/FilePathSource.js';
import { detectCompression, resolveCompression } from '../../../src/infrastructure/detectCompression.js';

const TEST_DIR = join(tmpdir(), 'tablecheck-test-filepathsource');

beforeAll(() => {
  mkdirSync(TEST_DIR, { recursive: true });
});

afterAll(() => {
  rmSync(TEST_DIR, { recursive: true, force: true });
});

function writeTempFile(name: string, content: string | Buffer): string {
  const filePath = join(TEST_DIR, name);
  writeFileSync(filePath, content);
  return filePath;
}

async function readText(source: FilePathSource): Promise<{ text: string; chunks: number }> {
  const chunks: Buffer[] = [];
  for await (const chunk of source.read()) {
    chunks.push(Buffer.from(chunk));
  }
  return { text: Buffer.concat(chunks).toString('utf8'), chunks: chunks.length };
}

describe('FilePathSource', () => {
  describe('read()', () => {
    it('should stream file content', async () => {
      const filePath = writeTempFile('read-basic.csv', '"email","name"\n"alice@test.com","Alice"\n');
      const { text } = await readText(new FilePathSource(filePath));

      expect(text).toBe('"email","name"\n"alice@test.com","Alice"\n');
    });

    it('should stream large content in multiple chunks', async () => {
      const content = '"email","name","age"\n' + '"user@test.com","Test User","30"\n'.repeat(5000);
      const filePath = writeTempFile('read-large.csv', content);

      // Small highWaterMark to force multiple chunks
      const { text, chunks } = await readText(new FilePathSource(filePath, { highWaterMark: 256 }));

      expect(chunks).toBeGreaterThan(1);
      expect(text).toBe(content);
    });

    it('should decompress gzip files by extension', async () => {
      const content = '"id"\n"1"\n';
      const filePath = writeTempFile('people.csv.gz', gzipSync(content));

      expect((await readText(new FilePathSource(filePath))).text).toBe(content);
    });

    it('should decompress gzip when asked explicitly', async () => {
      const content = '"id"\n"2"\n';
      const filePath = writeTempFile('people.data', gzipSync(content));

      expect((await readText(new FilePathSource(filePath, { compression: 'gzip' }))).text).toBe(content);
    });

    it('should reject a missing file when read', async () => {
      const source = new FilePathSource(join(TEST_DIR, 'missing.csv'));
      await expect(readText(source)).rejects.toThrow('ENOENT');
    });
  });

  describe('compression', () => {
    it('should reject bzip2', () => {
      expect(() => new FilePathSource('people.csv.bz2')).toThrow(
        'bzip2 compression is not supported; decompress the file first',
      );
    });

    it('should reject unknown methods', () => {
      expect(() => new FilePathSource('people.csv', { compression: 'zip' })).toThrow("Unknown compression type 'zip'");
    });

    it('should detect compression from the extension', () => {
      expect(detectCompression('a.csv.gz')).toBe('gzip');
      expect(detectCompression('a.GZIP')).toBe('gzip');
      expect(detectCompression('a.bz2')).toBe('bzip2');
      expect(detectCompression('a.csv')).toBe('none');
    });

    it('should prefer the requested method over the extension', () => {
      expect(resolveCompression('none', 'a.csv.gz')).toBe('none');
      expect(resolveCompression(undefined, 'a.csv.gz')).toBe('gzip');
      expect(resolveCompression('', 'a.csv')).toBe('none');
    });
  });

  describe('metadata()', () => {
    it('should return file name, size and compression', () => {
      const content = '"email","name"\n';
      const filePath = writeTempFile('meta.csv', content);

      expect(new FilePathSource(filePath).metadata()).toEqual({
        fileName: 'meta.csv',
        fileSize: Buffer.byteLength(content),
        compression: 'none',
      });
    });
  });
});
