import { describe, it, expect } from 'vitest';
import { Table, TableDefinitionError } from '../../../src/domain/model/Table.js';
import { DataModel } from '../../../src/domain/model/DataModel.js';

describe('Table', () => {
  const table = new Table('person', [
    { name: 'person_id', type: 'integer', required: true },
    { name: 'Gender', type: 'string', required: false, maxLength: 1 },
  ]);

  it('should keep field order', () => {
    expect(table.names()).toEqual(['person_id', 'Gender']);
    expect(table.length).toBe(2);
  });

  it('should look fields up case-insensitively', () => {
    expect(table.get('gender')?.name).toBe('Gender');
    expect(table.get('PERSON_ID')?.type).toBe('integer');
    expect(table.get('age')).toBeUndefined();
  });

  it('should reject duplicate names', () => {
    expect(
      () =>
        new Table('t', [
          { name: 'id', type: 'integer', required: true },
          { name: 'Id', type: 'string', required: false },
        ]),
    ).toThrow("Duplicate field 'Id' in table 't'");
  });
});

describe('DataModel', () => {
  it('should look tables up case-insensitively', () => {
    const person = new Table('Person', [{ name: 'id', type: 'integer', required: true }]);
    const model = new DataModel('clinic', '1.0.0', [person]);

    expect(model.getTable('person')).toBe(person);
    expect(model.getTable('visit')).toBeUndefined();
  });

  it('should reject duplicate table names', () => {
    const a = new Table('a', [{ name: 'id', type: 'integer', required: true }]);
    expect(() => new DataModel('m', '1', [a, a])).toThrow(TableDefinitionError);
  });
});
