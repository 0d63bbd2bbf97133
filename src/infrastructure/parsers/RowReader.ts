import type { LexicalErrorKind } from '../../domain/model/ErrorKind.js';
import type { ValidationError } from '../../domain/model/ValidationError.js';
import type { ScanFailure, ScannerOptions } from './QuotedCsvScanner.js';
import { ErrorKind } from '../../domain/model/ErrorKind.js';
import { QuotedCsvScanner } from './QuotedCsvScanner.js';

const LF = 0x0a;
const CR = 0x0d;
const MIN_CAPACITY = 64 * 1024;

export interface ScannedRow {
  readonly type: 'row';
  /** Line the record starts on. */
  readonly line: number;
  readonly values: readonly Buffer[];
  /** Raw bytes of the record without its terminator. */
  readonly raw: Buffer;
}

export interface MalformedRow {
  readonly type: 'error';
  readonly error: ValidationError;
}

export type RowReadResult = ScannedRow | MalformedRow | { readonly type: 'end' };

function stripTerminator(bytes: Buffer): Buffer {
  let end = bytes.length;
  if (end > 0 && bytes[end - 1] === LF) end--;
  if (end > 0 && bytes[end - 1] === CR) end--;
  return bytes.subarray(0, end);
}

/**
 * Reads whole records from a chunked byte stream.
 *
 * A malformed record never ends the stream: it is reported as one line-level
 * error carrying the raw line, and the input is skipped to the start of the
 * next line so the following records stay readable.
 *
 * A line holding only its terminator is a record with one empty value.
 * Only comment lines are discarded.
 */
export class RowReader {
  private readonly scanner: QuotedCsvScanner;
  private readonly chunks: AsyncIterator<Uint8Array>;

  // Unread bytes live in storage[head, tail). Bytes below tail are never
  // overwritten, since returned values are views into them.
  private storage: Buffer = Buffer.alloc(0);
  private head = 0;
  private tail = 0;
  private offset = 0;
  private atEOF = false;
  private closed = false;

  constructor(source: AsyncIterable<Uint8Array>, options?: ScannerOptions) {
    this.scanner = new QuotedCsvScanner(options);
    this.chunks = source[Symbol.asyncIterator]();
  }

  get lineNumber(): number {
    return this.scanner.lineNumber;
  }

  /** Release the source. Safe to call more than once and after the end of input. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.atEOF = true;
    await this.chunks.return?.();
  }

  private get buffer(): Buffer {
    return this.storage.subarray(this.head, this.tail);
  }

  /**
   * Read the next record. With a finite `width`, a record holding more fields
   * is reported as a row width mismatch and the rest of it is discarded.
   */
  async read(width = Number.POSITIVE_INFINITY): Promise<RowReadResult> {
    this.compact();

    let recordStart = this.offset;
    let recordLine = this.scanner.lineNumber;
    const values: Buffer[] = [];

    for (;;) {
      const step = this.scanner.scan(this.buffer.subarray(this.offset), this.atEOF);

      if (step.type === 'incomplete') {
        await this.fill();
        continue;
      }
      if (step.type === 'end') {
        return { type: 'end' };
      }
      if (step.type === 'error') {
        return this.recover(step, recordStart);
      }

      this.offset += step.consumed;

      if (step.type === 'comment') {
        recordStart = this.offset;
        recordLine = this.scanner.lineNumber;
        continue;
      }

      if (values.length >= width) {
        return this.discardRecord(recordStart, recordLine, width);
      }

      values.push(step.value);

      if (this.scanner.atEndOfRecord) {
        return {
          type: 'row',
          line: recordLine,
          values,
          raw: stripTerminator(this.buffer.subarray(recordStart, this.offset)),
        };
      }
    }
  }

  private async recover(failure: ScanFailure, recordStart: number): Promise<MalformedRow> {
    const lineEnd = await this.skipToNextLine(this.offset + failure.offset);
    return this.lineError(failure.kind, failure.line, failure.column, recordStart, lineEnd);
  }

  /** The record has a field past `width`: consume the rest of it and report the extra columns. */
  private async discardRecord(recordStart: number, line: number, width: number): Promise<MalformedRow> {
    const column = this.scanner.columnNumber;

    while (!this.scanner.atEndOfRecord) {
      const step = this.scanner.scan(this.buffer.subarray(this.offset), this.atEOF);

      if (step.type === 'incomplete') {
        await this.fill();
      } else if (step.type === 'field') {
        this.offset += step.consumed;
      } else if (step.type === 'error') {
        await this.skipToNextLine(this.offset + step.offset);
      } else {
        // Comments and end of input are only seen between records.
        this.scanner.endRecord();
      }
    }

    return this.lineError(ErrorKind.TOO_MANY_COLUMNS, line, column, recordStart, this.offset, width);
  }

  /** Line-level error for a lexical failure. Extra columns are reported as a row width mismatch. */
  private lineError(
    kind: LexicalErrorKind,
    line: number,
    column: number,
    recordStart: number,
    recordEnd: number,
    expected?: number,
  ): MalformedRow {
    const value = stripTerminator(this.buffer.subarray(recordStart, recordEnd)).toString('utf8');

    if (kind === ErrorKind.TOO_MANY_COLUMNS) {
      return {
        type: 'error',
        error: { kind: ErrorKind.ROW_WIDTH_MISMATCH, line, value, context: { expected: expected ?? 0, column } },
      };
    }

    return { type: 'error', error: { kind, line, value, context: { column } } };
  }

  /** Advance past the next line break at or after `from`. Returns the index just past the skipped line. */
  private async skipToNextLine(from: number): Promise<number> {
    let searchFrom = from;

    for (;;) {
      const lineBreak = this.buffer.indexOf(LF, searchFrom);

      if (lineBreak >= 0) {
        this.offset = lineBreak + 1;
        this.scanner.skipLine(true);
        return this.offset;
      }

      if (this.atEOF) {
        this.offset = this.buffer.length;
        this.scanner.skipLine(false);
        return this.offset;
      }

      searchFrom = Math.max(searchFrom, this.buffer.length);
      await this.fill();
    }
  }

  private async fill(): Promise<void> {
    if (this.closed) {
      this.atEOF = true;
      return;
    }

    const next = await this.chunks.next();

    if (next.done) {
      this.atEOF = true;
      return;
    }

    this.append(Buffer.from(next.value.buffer, next.value.byteOffset, next.value.byteLength));
  }

  /** Add a chunk after the unread bytes, growing storage geometrically. */
  private append(chunk: Buffer): void {
    const unread = this.tail - this.head;

    if (unread === 0) {
      this.storage = chunk;
      this.head = 0;
      this.tail = chunk.length;
      return;
    }

    if (this.tail + chunk.length > this.storage.length) {
      const grown = Buffer.allocUnsafe(Math.max(MIN_CAPACITY, 2 * (unread + chunk.length)));
      this.storage.copy(grown, 0, this.head, this.tail);
      this.storage = grown;
      this.head = 0;
      this.tail = unread;
    }

    this.tail += chunk.copy(this.storage, this.tail);
  }

  private compact(): void {
    if (this.offset === 0) return;
    this.head += this.offset;
    this.offset = 0;
  }
}
