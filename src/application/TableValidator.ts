import type { Field } from '../domain/model/Field.js';
import type { Plan } from '../domain/model/Plan.js';
import type { Table } from '../domain/model/Table.js';
import type { ValidationError } from '../domain/model/ValidationError.js';
import type { RuleRegistry } from '../domain/services/FieldRules.js';
import type { EventBus } from './EventBus.js';
import type { RowReadResult, ScannedRow } from '../infrastructure/parsers/RowReader.js';
import { ErrorKind } from '../domain/model/ErrorKind.js';
import { ValidationResult } from '../domain/model/ValidationResult.js';
import { ValidatorStatus, canTransition } from '../domain/model/ValidatorStatus.js';
import { formatValidationError } from '../domain/model/ValidationError.js';
import { DEFAULT_RULE_REGISTRY } from '../domain/services/FieldRules.js';
import { compilePlan } from '../domain/services/PlanCompiler.js';
import { RowReader } from '../infrastructure/parsers/RowReader.js';

/** Raised by `init()` when the header cannot be matched to the table. Carries a single `BAD_HEADER` error. */
export class HeaderError extends Error {
  constructor(readonly error: ValidationError) {
    super(formatValidationError(error));
    this.name = 'HeaderError';
  }
}

export interface TableValidatorOptions {
  /** Field separator. Default: `','`. */
  readonly delimiter?: string;
  /** Comment line marker, or `null` to disable. Default: `'#'`. */
  readonly comment?: string | null;
  /** Type tag to rule lookup used to compile the plan. Default: {@link DEFAULT_RULE_REGISTRY}. */
  readonly ruleRegistry?: RuleRegistry;
  /** Receives `header:checked`, `plan:unsupported-type` and `error:logged` events. */
  readonly eventBus?: EventBus;
  /** Identifier stamped on emitted events. Default: a random UUID. */
  readonly runId?: string;
}

/**
 * Checks one delimited input against a table.
 *
 * `init()` reads and matches the header, then `next()` validates one record
 * at a time. Problems in records are appended to the result; only a bad
 * header or an I/O error stops the run.
 */
export class TableValidator {
  private readonly table: Table;
  private readonly reader: RowReader;
  private readonly registry: RuleRegistry;
  private readonly eventBus: EventBus | undefined;
  private readonly runId: string;
  private readonly result = new ValidationResult();

  private status: ValidatorStatus = ValidatorStatus.UNINITIALIZED;
  private header: string[] = [];
  private positions = new Map<number, Field>();
  private plan: Plan | null = null;
  private rowsRead = 0;

  constructor(source: AsyncIterable<Uint8Array>, table: Table, options?: TableValidatorOptions) {
    const comment = options?.comment === undefined ? '#' : options.comment;

    this.table = table;
    this.reader = new RowReader(source, {
      separator: options?.delimiter ?? ',',
      comment: comment ?? undefined,
    });
    this.registry = options?.ruleRegistry ?? DEFAULT_RULE_REGISTRY;
    this.eventBus = options?.eventBus;
    this.runId = options?.runId ?? crypto.randomUUID();
  }

  /** Read the header, match it against the table and compile the plan. */
  async init(): Promise<void> {
    this.assertStatus(ValidatorStatus.UNINITIALIZED, 'init');

    let read: RowReadResult;
    try {
      read = await this.reader.read();
    } catch (error) {
      await this.fail();
      throw error;
    }

    if (read.type === 'error') {
      await this.fail();
      throw new HeaderError(read.error);
    }

    const names = read.type === 'row' ? read.values.map((v) => v.toString('utf8').toLowerCase()) : [];
    this.header = names;

    const matched = new Set<string>();
    const unknown: string[] = [];
    const positions = new Map<number, Field>();

    names.forEach((name, i) => {
      const field = this.table.get(name);
      if (field) {
        matched.add(field.name);
        positions.set(i, field);
      } else {
        unknown.push(name);
      }
    });

    const missing = this.table
      .list()
      .filter((f) => !matched.has(f.name))
      .map((f) => f.name);

    // Kept even on failure so callers can inspect the best-effort mapping.
    this.positions = positions;

    if (names.length !== this.table.length || unknown.length > 0 || missing.length > 0) {
      await this.fail();
      throw new HeaderError({
        kind: ErrorKind.BAD_HEADER,
        line: read.type === 'row' ? read.line : this.reader.lineNumber,
        value: read.type === 'row' ? read.raw.toString('utf8') : '',
        context: {
          expectedLength: this.table.length,
          actualLength: names.length,
          unknownFields: unknown,
          missingFields: missing,
        },
      });
    }

    this.plan = compilePlan(positions.values(), this.registry);
    this.transitionTo(ValidatorStatus.HEADER_CHECKED);

    for (const gap of this.plan.unsupportedTypes) {
      this.eventBus?.emit({
        type: 'plan:unsupported-type',
        runId: this.runId,
        field: gap.field,
        fieldType: gap.type,
        timestamp: Date.now(),
      });
    }

    this.eventBus?.emit({
      type: 'header:checked',
      runId: this.runId,
      header: [...this.header],
      timestamp: Date.now(),
    });
  }

  /** Validate the next record. Resolves `false` at the end of input. */
  async next(): Promise<boolean> {
    if (this.status === ValidatorStatus.HEADER_CHECKED) {
      this.transitionTo(ValidatorStatus.STREAMING);
    }
    this.assertStatus(ValidatorStatus.STREAMING, 'next');

    let read: RowReadResult;
    try {
      read = await this.reader.read(this.table.length);
    } catch (error) {
      await this.fail();
      throw error;
    }

    if (read.type === 'end') {
      this.transitionTo(ValidatorStatus.DONE);
      return false;
    }

    this.rowsRead++;

    if (read.type === 'error') {
      this.logError(read.error);
    } else {
      this.validateRow(read);
    }

    return true;
  }

  /** Initialize when needed, then validate every remaining record. */
  async run(): Promise<ValidationResult> {
    if (this.status === ValidatorStatus.UNINITIALIZED) {
      await this.init();
    }

    while (await this.next()) {
      // next() logs into the result
    }

    return this.result;
  }

  getResult(): ValidationResult {
    return this.result;
  }

  getStatus(): ValidatorStatus {
    return this.status;
  }

  /** Header names as read, lower-cased. */
  getHeader(): readonly string[] {
    return this.header;
  }

  /** Schema field names in header order, for positions that matched. */
  getMatchedFields(): string[] {
    return [...this.positions.entries()].sort(([a], [b]) => a - b).map(([, field]) => field.name);
  }

  getPlan(): Plan | null {
    return this.plan;
  }

  get rowCount(): number {
    return this.rowsRead;
  }

  private validateRow(row: ScannedRow): void {
    const plan = this.plan;
    if (!plan) return;

    // Positions cannot be trusted when the width is wrong.
    if (row.values.length !== this.table.length) {
      this.logError({
        kind: ErrorKind.ROW_WIDTH_MISMATCH,
        line: row.line,
        value: row.raw.toString('utf8'),
        context: { expected: this.table.length, actual: row.values.length },
      });
      return;
    }

    row.values.forEach((value, i) => {
      const field = this.positions.get(i);
      if (!field) return;

      for (const rule of plan.rules.get(field.name) ?? []) {
        if (rule.requiresValue && value.length === 0) continue;

        const failure = rule.validate(value);
        if (failure) {
          this.logError({
            kind: failure.kind,
            line: row.line,
            field: field.name,
            value: value.toString('utf8'),
            context: failure.context ?? {},
          });
          break;
        }
      }
    });
  }

  private logError(error: ValidationError): void {
    this.result.logError(error);
    this.eventBus?.emit({ type: 'error:logged', runId: this.runId, error, timestamp: Date.now() });
  }

  private assertStatus(expected: ValidatorStatus, operation: string): void {
    if (this.status !== expected) {
      throw new Error(`Cannot ${operation} from status '${this.status}'`);
    }
  }

  /** Stop the run and release the source. */
  private async fail(): Promise<void> {
    this.transitionTo(ValidatorStatus.FAILED);
    await this.reader.close();
  }

  private transitionTo(next: ValidatorStatus): void {
    if (!canTransition(this.status, next)) {
      throw new Error(`Invalid status transition from '${this.status}' to '${next}'`);
    }
    this.status = next;
  }
}
