import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';
import { TableCheck } from '../../src/TableCheck.js';
import { HeaderError } from '../../src/application/TableValidator.js';
import { Table } from '../../src/domain/model/Table.js';
import { ErrorKind } from '../../src/domain/model/ErrorKind.js';
import { summarizeResult } from '../../src/domain/services/ErrorSummary.js';
import { readTableDefinitionFile } from '../../src/infrastructure/schema/JsonTableLoader.js';
import { BufferSource } from '../../src/infrastructure/sources/BufferSource.js';
import { FilePathSource } from '../../src/infrastructure/sources/FilePathSource.js';
import type { EventType } from '../../src/domain/events/DomainEvents.js';

// --- Helpers ---

const fixture = (name: string): string => fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url));

const account = new Table('account', [
  { name: 'id', type: 'integer', required: true },
  { name: 'name', type: 'string', required: false, maxLength: 8 },
]);

function check(csv: string, table: Table = account) {
  return new TableCheck({ table }).from(new BufferSource(csv)).run();
}

// ============================================================
// Header
// ============================================================
describe('Table check: header', () => {
  it('should fail once with the unknown and missing fields', async () => {
    const failures: string[] = [];
    const run = new TableCheck({ table: account })
      .from(new BufferSource('"id","nickname"\n"1","x"\n'))
      .on('validation:failed', (e) => failures.push(e.error))
      .run();

    const error = await run.catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HeaderError);
    expect(error instanceof HeaderError ? error.error : undefined).toEqual({
      kind: ErrorKind.BAD_HEADER,
      line: 1,
      value: '"id","nickname"',
      context: { expectedLength: 2, actualLength: 2, unknownFields: ['nickname'], missingFields: ['name'] },
    });
    expect(failures).toEqual([
      'line 1: [code: 201] Header does not contain the correct set of fields ' +
        '{expectedLength = 2, actualLength = 2, unknownFields = [nickname], missingFields = [name]}',
    ]);
  });

  it('should match header names regardless of case and order', async () => {
    const report = await check('"NAME","Id"\n"ann","7"\n');

    expect(report.summary.passed).toBe(true);
    expect(report.header).toEqual(['name', 'id']);
    expect(report.fields).toEqual(['name', 'id']);
  });
});

// ============================================================
// Values
// ============================================================
describe('Table check: values', () => {
  it('should report an empty required value once and skip its type check', async () => {
    const report = await check('"id","name"\n"","ann"\n');

    const errors = report.result.fieldErrors('id');
    expect([...errors.keys()]).toEqual([ErrorKind.REQUIRED_VALUE]);
    expect(errors.get(ErrorKind.REQUIRED_VALUE)).toEqual([
      { kind: ErrorKind.REQUIRED_VALUE, line: 2, field: 'id', value: '', context: {} },
    ]);
    expect(report.result.errorCount).toBe(1);
  });

  it('should report a blank line in a one-column table as a missing required value', async () => {
    const ids = new Table('ids', [{ name: 'id', type: 'integer', required: true }]);
    const report = await check('"id"\n"1"\n\n"2"\n', ids);

    expect(report.summary.rowsRead).toBe(3);
    expect(report.result.fieldErrors('id').get(ErrorKind.REQUIRED_VALUE)?.map((e) => e.line)).toEqual([3]);
    expect(report.summary.passed).toBe(false);
  });

  it('should accept an empty optional value', async () => {
    const report = await check('"id","name"\n"1",""\n');

    expect(report.summary.passed).toBe(true);
  });

  it('should reject integers outside the 32-bit range', async () => {
    const report = await check('"id","name"\n"99999999999999","big"\n"42","small"\n');

    expect(report.result.fieldErrors('id').get(ErrorKind.TYPE_MISMATCH_INT)?.map((e) => e.value)).toEqual([
      '99999999999999',
    ]);
    expect(report.result.errorCount).toBe(1);
  });

  it('should report a value longer than the limit', async () => {
    const report = await check('"id","name"\n"1","alexandria"\n');

    expect(report.result.fieldErrors('name').get(ErrorKind.LENGTH_EXCEEDED)).toEqual([
      { kind: ErrorKind.LENGTH_EXCEEDED, line: 2, field: 'name', value: 'alexandria', context: { maxLength: 8 } },
    ]);
  });
});

// ============================================================
// Row width
// ============================================================
describe('Table check: row width', () => {
  it('should flag only the wide row and validate its neighbours', async () => {
    const report = await check('"id","name"\n"x","a"\n"2","b","c"\n"y","d"\n');

    expect(report.summary.rowsRead).toBe(3);
    expect(report.result.lineErrors().get(ErrorKind.ROW_WIDTH_MISMATCH)).toEqual([
      { kind: ErrorKind.ROW_WIDTH_MISMATCH, line: 3, value: '"2","b","c"', context: { expected: 2, column: 3 } },
    ]);
    expect(report.result.fieldErrors('id').get(ErrorKind.TYPE_MISMATCH_INT)?.map((e) => e.line)).toEqual([2, 4]);
    expect(report.result.errorCount).toBe(3);
  });

  it('should flag a short row without checking its values', async () => {
    const report = await check('"id","name"\n"x"\n');

    expect(report.result.lineErrors().get(ErrorKind.ROW_WIDTH_MISMATCH)).toEqual([
      { kind: ErrorKind.ROW_WIDTH_MISMATCH, line: 2, value: '"x"', context: { expected: 2, actual: 1 } },
    ]);
    expect(report.result.fieldErrorCount).toBe(0);
  });
});

// ============================================================
// Repeat runs
// ============================================================
describe('Table check: repeat runs', () => {
  it('should give the same errors when run twice over the same input', async () => {
    const tableCheck = new TableCheck({ table: account }).from(
      new BufferSource('"id","name"\n"x","a"\n"2","b","c"\n"","toolongname"\n'),
    );

    const first = await tableCheck.run();
    const second = await tableCheck.run();

    expect(second.summary.runId).not.toBe(first.summary.runId);
    expect(second.summary.errorCount).toBe(first.summary.errorCount);
    expect([...second.result.lineErrors()]).toEqual([...first.result.lineErrors()]);
    expect([...second.result.fieldErrors('id')]).toEqual([...first.result.fieldErrors('id')]);
    expect([...second.result.fieldErrors('name')]).toEqual([...first.result.fieldErrors('name')]);
  });
});

// ============================================================
// Files on disk
// ============================================================
describe('Table check: person fixture', () => {
  it('should find every problem in the file', async () => {
    const table = await readTableDefinitionFile(fixture('clinic-model.json'), 'person');
    const events: EventType[] = [];

    const tableCheck = new TableCheck({ table, progressInterval: 2 }).from(new FilePathSource(fixture('person.csv')));
    for (const type of [
      'validation:started',
      'header:checked',
      'validation:progress',
      'validation:completed',
    ] as const) {
      tableCheck.on(type, (e) => events.push(e.type));
    }

    const report = await tableCheck.run();

    expect(report.summary).toMatchObject({
      table: 'person',
      source: 'person.csv',
      passed: false,
      rowsRead: 5,
      errorCount: 5,
      lineErrorCount: 2,
      fieldErrorCount: 3,
    });
    expect(events).toEqual([
      'validation:started',
      'header:checked',
      'validation:progress',
      'validation:progress',
      'validation:completed',
    ]);

    const summary = summarizeResult(report.result, report.fields);
    expect(summary.lineIssues.map((g) => [g.kind, g.lines])).toEqual([
      [ErrorKind.UNQUOTED_FIELD, ['5']],
      [ErrorKind.ROW_WIDTH_MISMATCH, ['6']],
    ]);
    expect(summary.fieldIssues.map((g) => [g.field, g.kind, g.lines])).toEqual([
      ['person_id', ErrorKind.REQUIRED_VALUE, ['4']],
      ['gender', ErrorKind.LENGTH_EXCEEDED, ['3']],
      ['birth_date', ErrorKind.TYPE_MISMATCH_DATE, ['3']],
    ]);
  });
});
