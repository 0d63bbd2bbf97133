import type { ErrorKind } from '../model/ErrorKind.js';
import type { ValidationError } from '../model/ValidationError.js';
import type { ValidationResult } from '../model/ValidationResult.js';
import { describeError } from '../model/ErrorKind.js';

export const DEFAULT_SAMPLE_SIZE = 5;

export interface SampleOptions {
  /** Draw indices independently, so one error may fill several slots. Default: `false`. */
  readonly withReplacement?: boolean;
  /** Source of uniform numbers in `[0, 1)`. Default: `Math.random`. */
  readonly random?: () => number;
}

export interface SummaryOptions extends SampleOptions {
  /** Maximum number of example errors per group. Default: `5`. */
  readonly sampleSize?: number;
}

/** One row of the report: every occurrence of one kind, optionally under one field. */
export interface ErrorGroupSummary {
  readonly field?: string;
  readonly kind: ErrorKind;
  readonly code: number;
  readonly description: string;
  readonly occurrences: number;
  /** Line numbers compressed into ranges, e.g. `['2-4', '9']`. */
  readonly lines: readonly string[];
  readonly samples: readonly ValidationError[];
}

export interface ResultSummary {
  readonly passed: boolean;
  readonly lineIssues: readonly ErrorGroupSummary[];
  readonly fieldIssues: readonly ErrorGroupSummary[];
}

/** Collapse ascending line numbers into `start-end` ranges. Repeated lines fold into the current range. */
export function compressLineRanges(lines: Iterable<number>): string[] {
  const steps: string[] = [];
  let start: number | undefined;
  let end = 0;

  const flush = (): void => {
    if (start === undefined) return;
    steps.push(start === end ? String(start) : `${start}-${end}`);
  };

  for (const line of lines) {
    if (start !== undefined && (line === end || line === end + 1)) {
      end = line;
      continue;
    }

    flush();
    start = line;
    end = line;
  }

  flush();
  return steps;
}

/**
 * Pick up to `size` items. When there are no more than `size` items they are
 * all returned in order; otherwise a random sample is drawn, kept in input
 * order when drawn without replacement.
 */
export function sampleErrors<T>(items: readonly T[], size: number, options?: SampleOptions): T[] {
  if (items.length <= size) return [...items];

  const random = options?.random ?? Math.random;
  const pick = (bound: number): number => Math.min(bound - 1, Math.floor(random() * bound));

  if (options?.withReplacement) {
    const sample: T[] = [];
    for (let i = 0; i < size; i++) {
      const item = items[pick(items.length)];
      if (item !== undefined) sample.push(item);
    }
    return sample;
  }

  const indices = items.map((_, i) => i);
  for (let i = 0; i < size; i++) {
    const j = i + pick(indices.length - i);
    const chosen = indices[j] ?? i;
    indices[j] = indices[i] ?? j;
    indices[i] = chosen;
  }

  return indices
    .slice(0, size)
    .sort((a, b) => a - b)
    .flatMap((i) => {
      const item = items[i];
      return item === undefined ? [] : [item];
    });
}

function summarizeGroup(
  kind: ErrorKind,
  errors: readonly ValidationError[],
  field: string | undefined,
  sampleSize: number,
  options: SampleOptions,
): ErrorGroupSummary {
  const { code, description } = describeError(kind);
  const base = {
    kind,
    code,
    description,
    occurrences: errors.length,
    lines: compressLineRanges(errors.map((e) => e.line)),
    samples: sampleErrors(errors, sampleSize, options),
  };

  return field === undefined ? base : { field, ...base };
}

/** Group a result for presentation. Field groups follow `header` order. */
export function summarizeResult(
  result: ValidationResult,
  header: readonly string[],
  options?: SummaryOptions,
): ResultSummary {
  const sampleSize = options?.sampleSize ?? DEFAULT_SAMPLE_SIZE;
  const sampleOptions: SampleOptions = { withReplacement: options?.withReplacement, random: options?.random };

  const lineIssues: ErrorGroupSummary[] = [];
  for (const [kind, errors] of result.lineErrors()) {
    lineIssues.push(summarizeGroup(kind, errors, undefined, sampleSize, sampleOptions));
  }

  const fieldIssues: ErrorGroupSummary[] = [];
  for (const field of header) {
    for (const [kind, errors] of result.fieldErrors(field)) {
      fieldIssues.push(summarizeGroup(kind, errors, field, sampleSize, sampleOptions));
    }
  }

  return { passed: !result.hasErrors(), lineIssues, fieldIssues };
}
