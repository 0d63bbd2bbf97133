/**
 * Closed set of problems the scanner and the validators can report.
 *
 * Codes are grouped by origin:
 *   - 1xx: encoding
 *   - 2xx: file structure (header, row shape, lexical)
 *   - 3xx: field values
 */
export const ErrorKind = {
  BAD_ENCODING: 'BAD_ENCODING',
  BAD_HEADER: 'BAD_HEADER',
  ROW_WIDTH_MISMATCH: 'ROW_WIDTH_MISMATCH',
  BARE_QUOTE: 'BARE_QUOTE',
  UNQUOTED_FIELD: 'UNQUOTED_FIELD',
  UNTERMINATED_FIELD: 'UNTERMINATED_FIELD',
  TOO_MANY_COLUMNS: 'TOO_MANY_COLUMNS',
  REQUIRED_VALUE: 'REQUIRED_VALUE',
  LENGTH_EXCEEDED: 'LENGTH_EXCEEDED',
  TYPE_MISMATCH_INT: 'TYPE_MISMATCH_INT',
  TYPE_MISMATCH_NUM: 'TYPE_MISMATCH_NUM',
  TYPE_MISMATCH_DATE: 'TYPE_MISMATCH_DATE',
  TYPE_MISMATCH_DATETIME: 'TYPE_MISMATCH_DATETIME',
} as const;

export type ErrorKind = (typeof ErrorKind)[keyof typeof ErrorKind];

/** Kinds the scanner raises while tokenizing a record. */
export type LexicalErrorKind =
  | typeof ErrorKind.BARE_QUOTE
  | typeof ErrorKind.UNQUOTED_FIELD
  | typeof ErrorKind.UNTERMINATED_FIELD
  | typeof ErrorKind.TOO_MANY_COLUMNS;

export interface ErrorDescriptor {
  readonly code: number;
  readonly description: string;
}

const DESCRIPTORS: Record<ErrorKind, ErrorDescriptor> = {
  [ErrorKind.BAD_ENCODING]: { code: 100, description: 'UTF-8 encoding required' },
  [ErrorKind.BAD_HEADER]: { code: 201, description: 'Header does not contain the correct set of fields' },
  [ErrorKind.ROW_WIDTH_MISMATCH]: { code: 202, description: 'Extra or missing columns were detected in line' },
  [ErrorKind.BARE_QUOTE]: { code: 203, description: 'Value contains bare double quotes (")' },
  [ErrorKind.UNQUOTED_FIELD]: { code: 204, description: 'Non-empty value is not quoted' },
  [ErrorKind.UNTERMINATED_FIELD]: { code: 205, description: 'Quoted value is never closed' },
  [ErrorKind.TOO_MANY_COLUMNS]: { code: 206, description: 'More columns than expected' },
  [ErrorKind.REQUIRED_VALUE]: { code: 300, description: 'Value is required' },
  [ErrorKind.LENGTH_EXCEEDED]: { code: 302, description: 'Value exceeds the maximum length' },
  [ErrorKind.TYPE_MISMATCH_INT]: { code: 305, description: 'Value is not an integer' },
  [ErrorKind.TYPE_MISMATCH_NUM]: { code: 306, description: 'Value is not a number (float32)' },
  [ErrorKind.TYPE_MISMATCH_DATE]: { code: 307, description: 'Value is not a date (YYYY-MM-DD)' },
  [ErrorKind.TYPE_MISMATCH_DATETIME]: { code: 308, description: 'Value is not a datetime (YYYY-MM-DD HH:MM:SS)' },
};

export function describeError(kind: ErrorKind): ErrorDescriptor {
  return DESCRIPTORS[kind];
}

/** Reverse lookup by numeric code. */
export function errorKindFromCode(code: number): ErrorKind | undefined {
  return Object.values(ErrorKind).find((kind) => DESCRIPTORS[kind].code === code);
}
