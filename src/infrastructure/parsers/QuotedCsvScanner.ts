import type { LexicalErrorKind } from '../../domain/model/ErrorKind.js';
import { ErrorKind } from '../../domain/model/ErrorKind.js';

const QUOTE = 0x22;
const LF = 0x0a;
const CR = 0x0d;
const EMPTY = Buffer.alloc(0);

export interface ScannerOptions {
  /** Single-byte field separator. Default: `','`. */
  readonly separator?: string;
  /** Single-byte marker of a comment line. Default: none. */
  readonly comment?: string;
}

export interface ScannedField {
  readonly type: 'field';
  readonly value: Buffer;
  readonly consumed: number;
}

export interface ScannedComment {
  readonly type: 'comment';
  readonly consumed: number;
}

export interface ScanFailure {
  readonly type: 'error';
  readonly kind: LexicalErrorKind;
  readonly line: number;
  readonly column: number;
  /** Where skipping to the next line starts, relative to the scanned data. */
  readonly offset: number;
}

export type ScanStep =
  | ScannedField
  | ScannedComment
  | ScanFailure
  | { readonly type: 'incomplete' }
  | { readonly type: 'end' };

/** Progress through a quoted field that ran past the end of the data. */
interface PartialQuoted {
  readonly next: number;
  readonly escaped: number;
  readonly newlines: number;
}

const INCOMPLETE: ScanStep = { type: 'incomplete' };
const END: ScanStep = { type: 'end' };

function singleByte(name: string, value: string): number {
  const bytes = Buffer.from(value, 'utf8');
  const byte = bytes[0];
  if (bytes.length !== 1 || byte === undefined) {
    throw new Error(`${name} must be a single byte, got '${value}'`);
  }
  if (byte === QUOTE || byte === LF || byte === CR) {
    throw new Error(`${name} cannot be a quote or a line break`);
  }
  return byte;
}

/** Collapse each `""` into one `"`. `count` is the number of pairs, known from the scan. */
function unescapeQuotes(raw: Buffer, count: number): Buffer {
  if (count === 0) return raw;

  const out = Buffer.allocUnsafe(raw.length - count);
  let from = 0;
  let written = 0;

  for (;;) {
    const quote = raw.indexOf(QUOTE, from);
    if (quote < 0) {
      written += raw.copy(out, written, from);
      break;
    }
    written += raw.copy(out, written, from, quote + 1);
    from = quote + 2;
  }

  return out.subarray(0, written);
}

/**
 * Incremental tokenizer for strictly quoted CSV.
 *
 * Each call to {@link scan} looks at the unread bytes and produces at most
 * one field. Only empty fields and `"`-quoted fields are legal. When the
 * bytes end in the middle of a field the step is `incomplete` and nothing is
 * committed, so the caller can append more input and scan the same field
 * again. The next call must pass the same bytes with more appended: a
 * quoted field resumes where the previous call stopped.
 */
export class QuotedCsvScanner {
  private readonly separator: number;
  private readonly comment: number | undefined;

  private line = 1;
  private column = 0;
  private endOfRecord = true;
  private partial: PartialQuoted | undefined;

  constructor(options?: ScannerOptions) {
    this.separator = singleByte('separator', options?.separator ?? ',');
    this.comment = options?.comment ? singleByte('comment', options.comment) : undefined;

    if (this.comment === this.separator) {
      throw new Error('comment marker and separator must differ');
    }
  }

  /** Current line, 1-based. Counts line breaks, including those inside quoted values. */
  get lineNumber(): number {
    return this.line;
  }

  /** Column of the most recent field, 1-based. */
  get columnNumber(): number {
    return this.column;
  }

  /** Whether the most recent field was terminated by a line break rather than a separator. */
  get atEndOfRecord(): boolean {
    return this.endOfRecord;
  }

  scan(data: Buffer, atEOF: boolean): ScanStep {
    if (this.endOfRecord && data.length === 0) {
      return atEOF ? END : INCOMPLETE;
    }

    const column = this.endOfRecord ? 1 : this.column + 1;

    if (data.length === 0) {
      // Trailing separator right before the end of input.
      if (!atEOF) return INCOMPLETE;
      return this.emit(EMPTY, 0, column, 0, true);
    }

    if (this.endOfRecord && this.comment !== undefined && data[0] === this.comment) {
      return this.scanComment(data, atEOF);
    }

    return data[0] === QUOTE ? this.scanQuoted(data, atEOF, column) : this.scanEmpty(data, atEOF, column);
  }

  /**
   * Mark the rest of the current line as skipped after an error.
   * `sawLineBreak` is `false` when the skip ran into the end of input.
   */
  skipLine(sawLineBreak: boolean): void {
    if (sawLineBreak) this.line++;
    this.endOfRecord = true;
    this.partial = undefined;
  }

  /** Close the current record without consuming input. */
  endRecord(): void {
    this.endOfRecord = true;
    this.partial = undefined;
  }

  private scanComment(data: Buffer, atEOF: boolean): ScanStep {
    const lineBreak = data.indexOf(LF);

    if (lineBreak >= 0) {
      this.line++;
      return { type: 'comment', consumed: lineBreak + 1 };
    }

    return atEOF ? { type: 'comment', consumed: data.length } : INCOMPLETE;
  }

  private scanEmpty(data: Buffer, atEOF: boolean, column: number): ScanStep {
    const c = data[0];

    if (c === this.separator) return this.emit(EMPTY, 1, column, 0, false);
    if (c === LF) return this.emit(EMPTY, 1, column, 1, true);

    if (c === CR) {
      if (data.length === 1) {
        return atEOF ? this.emit(EMPTY, 1, column, 0, true) : INCOMPLETE;
      }
      if (data[1] === LF) return this.emit(EMPTY, 2, column, 1, true);
    }

    return this.fail(ErrorKind.UNQUOTED_FIELD, this.line, column, 0);
  }

  private scanQuoted(data: Buffer, atEOF: boolean, column: number): ScanStep {
    const startLine = this.line;
    let newlines = this.partial?.newlines ?? 0;
    let escaped = this.partial?.escaped ?? 0;
    let i = this.partial?.next ?? 1;
    this.partial = undefined;

    const suspend = (next: number): ScanStep => {
      this.partial = { next, escaped, newlines };
      return INCOMPLETE;
    };

    while (i < data.length) {
      const c = data[i];

      if (c === LF) {
        newlines++;
        i++;
        continue;
      }
      if (c !== QUOTE) {
        i++;
        continue;
      }

      if (i + 1 >= data.length) {
        if (!atEOF) return suspend(i);
        return this.emit(unescapeQuotes(data.subarray(1, i), escaped), i + 1, column, newlines, true);
      }

      const next = data[i + 1];

      if (next === QUOTE) {
        escaped++;
        i += 2;
        continue;
      }

      const value = (): Buffer => unescapeQuotes(data.subarray(1, i), escaped);

      if (next === this.separator) return this.emit(value(), i + 2, column, newlines, false);
      if (next === LF) return this.emit(value(), i + 2, column, newlines + 1, true);

      if (next === CR) {
        if (i + 2 >= data.length) {
          if (!atEOF) return suspend(i);
          return this.emit(value(), i + 2, column, newlines, true);
        }
        if (data[i + 2] === LF) return this.emit(value(), i + 3, column, newlines + 1, true);
      }

      return this.fail(ErrorKind.BARE_QUOTE, startLine + newlines, column, i);
    }

    if (!atEOF) return suspend(i);

    // Reported where the field started; recovery resumes on the following line.
    return this.fail(ErrorKind.UNTERMINATED_FIELD, startLine, column, 0);
  }

  private emit(value: Buffer, consumed: number, column: number, newlines: number, endOfRecord: boolean): ScanStep {
    this.column = column;
    this.line += newlines;
    this.endOfRecord = endOfRecord;
    return { type: 'field', value, consumed };
  }

  private fail(kind: LexicalErrorKind, line: number, column: number, offset: number): ScanStep {
    this.column = column;
    this.line = line;
    return { type: 'error', kind, line, column, offset };
  }
}
