export type Compression = 'gzip' | 'none';

/** Guess the compression of a file from its extension. `bzip2` is recognized so it can be rejected by name. */
export function detectCompression(fileNameOrPath: string): string {
  const ext = fileNameOrPath.split('.').pop()?.toLowerCase();
  switch (ext) {
    case 'gz':
    case 'gzip':
      return 'gzip';
    case 'bz2':
    case 'bzip2':
      return 'bzip2';
    default:
      return 'none';
  }
}

/** Validate a requested compression method, falling back to the file extension when none is given. */
export function resolveCompression(requested: string | undefined, fileNameOrPath: string): Compression {
  const method = requested === undefined || requested === '' ? detectCompression(fileNameOrPath) : requested;

  switch (method) {
    case 'gzip':
    case 'none':
      return method;
    case 'bzip2':
      throw new Error('bzip2 compression is not supported; decompress the file first');
    default:
      throw new Error(`Unknown compression type '${method}'`);
  }
}
