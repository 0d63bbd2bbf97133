import { createReadStream, statSync } from 'node:fs';
import { basename } from 'node:path';
import { createGunzip } from 'node:zlib';
import type { Readable } from 'node:stream';
import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';
import type { Compression } from '../detectCompression.js';
import { resolveCompression } from '../detectCompression.js';

export interface FilePathSourceOptions {
  /** Chunk size in bytes for streaming reads. Default: 65536 (64KB). */
  readonly highWaterMark?: number;
  /** `'gzip'` or `'none'`. Default: inferred from the extension (`.gz`, `.gzip`). */
  readonly compression?: string;
}

/** Data source that streams raw bytes from a local file, decompressing gzip on the fly. Node.js only. */
export class FilePathSource implements DataSource {
  private readonly filePath: string;
  private readonly highWaterMark: number;
  private readonly compression: Compression;

  constructor(filePath: string, options?: FilePathSourceOptions) {
    this.filePath = filePath;
    this.highWaterMark = options?.highWaterMark ?? 65536;
    this.compression = resolveCompression(options?.compression, filePath);
  }

  async *read(): AsyncIterable<Buffer> {
    const file = createReadStream(this.filePath, { highWaterMark: this.highWaterMark });
    const gunzip = this.compression === 'gzip' ? createGunzip() : undefined;
    let stream: Readable = file;

    if (gunzip) {
      file.on('error', (error) => gunzip.destroy(error));
      stream = file.pipe(gunzip);
    }

    try {
      for await (const chunk of stream) {
        yield Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk), 'utf8');
      }
    } finally {
      gunzip?.destroy();
      file.destroy();
    }
  }

  metadata(): SourceMetadata {
    const stats = statSync(this.filePath);
    return {
      fileName: basename(this.filePath),
      fileSize: stats.size,
      compression: this.compression,
    };
  }
}
