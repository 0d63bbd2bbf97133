import Papa from 'papaparse';

export interface CsvFormatterOptions {
  /** Field separator. Default: `','`. */
  readonly delimiter?: string;
  /** Record terminator. Default: `'\n'`. */
  readonly newline?: string;
}

/**
 * Writes records in the strictly quoted form the scanner accepts: every value
 * is wrapped in quotes and embedded quotes are doubled.
 */
export class CsvFormatter {
  private readonly delimiter: string;
  private readonly newline: string;

  constructor(options?: CsvFormatterOptions) {
    this.delimiter = options?.delimiter ?? ',';
    this.newline = options?.newline ?? '\n';
  }

  /** One record, without a terminator. */
  formatRecord(values: readonly string[]): string {
    return this.format([values]);
  }

  /** Several records joined by the configured newline, without a trailing one. */
  format(records: readonly (readonly string[])[]): string {
    return Papa.unparse(
      records.map((r) => [...r]),
      {
        quotes: true,
        quoteChar: '"',
        escapeChar: '"',
        delimiter: this.delimiter,
        newline: this.newline,
        header: false,
      },
    );
  }
}
