export interface SourceMetadata {
  readonly fileName?: string;
  readonly fileSize?: number;
  readonly compression?: string;
}

/** Sequential byte input. Chunks are yielded in order; a rejected read is a fatal I/O error. */
export interface DataSource {
  read(): AsyncIterable<Uint8Array>;
  metadata(): SourceMetadata;
}
