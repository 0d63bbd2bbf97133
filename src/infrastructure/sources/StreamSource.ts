import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';

type ChunkStream = AsyncIterable<string | Uint8Array> | ReadableStream<string | Uint8Array>;

export interface StreamSourceOptions {
  /** File name for metadata. Default: `'stream-input'`. */
  readonly fileName?: string;
  /** File size in bytes for metadata (if known). */
  readonly fileSize?: number;
}

/** Data source that wraps an `AsyncIterable` or `ReadableStream`, such as `process.stdin` or an upload. */
export class StreamSource implements DataSource {
  private readonly stream: ChunkStream;
  private readonly meta: SourceMetadata;
  private consumed = false;

  constructor(stream: ChunkStream, options?: StreamSourceOptions) {
    this.stream = stream;
    this.meta = {
      fileName: options?.fileName ?? 'stream-input',
      fileSize: options?.fileSize,
    };
  }

  async *read(): AsyncIterable<Buffer> {
    if (this.consumed) {
      throw new Error('StreamSource: stream has already been consumed. Streams can only be read once.');
    }
    this.consumed = true;

    const iterable = this.isReadableStream(this.stream) ? this.fromReadableStream(this.stream) : this.stream;

    for await (const chunk of iterable) {
      yield typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
    }
  }

  metadata(): SourceMetadata {
    return this.meta;
  }

  private isReadableStream(stream: ChunkStream): stream is ReadableStream<string | Uint8Array> {
    return 'getReader' in stream && typeof stream.getReader === 'function';
  }

  private async *fromReadableStream(stream: ReadableStream<string | Uint8Array>): AsyncIterable<string | Uint8Array> {
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
}
