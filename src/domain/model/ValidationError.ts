import type { ErrorKind } from './ErrorKind.js';
import { describeError } from './ErrorKind.js';

export type ContextValue = string | number | readonly string[] | readonly number[];

/** Structured details attached to an error, e.g. `{ expected: 3, actual: 4 }`. */
export type ErrorContext = Readonly<Record<string, ContextValue>>;

/**
 * One problem found in the input.
 *
 * `field` is set for field-level errors (a value under one schema field) and
 * absent for line-level errors (header, row shape, lexical problems).
 */
export interface ValidationError {
  readonly kind: ErrorKind;
  readonly line: number;
  readonly field?: string;
  readonly value: string;
  readonly context: ErrorContext;
}

function isEmptyContextValue(value: ContextValue): boolean {
  return typeof value === 'number' ? value === 0 : value.length === 0;
}

/** Render context as `{key = value, ...}`, omitting empty entries. */
export function formatContext(context: ErrorContext): string {
  const parts = Object.entries(context)
    .filter(([, value]) => !isEmptyContextValue(value))
    .map(([key, value]) => `${key} = ${typeof value === 'object' ? `[${value.join(' ')}]` : String(value)}`);

  return `{${parts.join(', ')}}`;
}

/** Single-line description, e.g. `line 4, field age: [code: 305] Value is not an integer`. */
export function formatValidationError(error: ValidationError): string {
  const location = error.field === undefined ? `line ${error.line}` : `line ${error.line}, field ${error.field}`;
  const { code, description } = describeError(error.kind);
  const base = `${location}: [code: ${code}] ${description}`;

  return Object.keys(error.context).length > 0 ? `${base} ${formatContext(error.context)}` : base;
}
