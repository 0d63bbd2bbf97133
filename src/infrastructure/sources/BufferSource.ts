import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';

export interface BufferSourceOptions {
  /** File name for metadata. Default: `'buffer-input'`. */
  readonly fileName?: string;
  /** Yield the content in pieces of this many bytes. Default: the whole content in one chunk. */
  readonly chunkSize?: number;
}

/** Data source over in-memory content. Strings are encoded as UTF-8. */
export class BufferSource implements DataSource {
  private readonly content: Buffer;
  private readonly meta: SourceMetadata;
  private readonly chunkSize: number;

  constructor(data: string | Uint8Array, options?: BufferSourceOptions) {
    this.content = typeof data === 'string' ? Buffer.from(data, 'utf8') : Buffer.from(data);
    this.chunkSize = options?.chunkSize && options.chunkSize > 0 ? options.chunkSize : this.content.length;
    this.meta = {
      fileName: options?.fileName ?? 'buffer-input',
      fileSize: this.content.length,
    };
  }

  async *read(): AsyncIterable<Buffer> {
    for (let start = 0; start < this.content.length; start += this.chunkSize) {
      yield await Promise.resolve(this.content.subarray(start, start + this.chunkSize));
    }
  }

  metadata(): SourceMetadata {
    return this.meta;
  }
}
