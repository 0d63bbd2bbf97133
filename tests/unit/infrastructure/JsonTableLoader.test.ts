import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';
import {
  loadModelDefinition,
  loadTableDefinition,
  parseModelDefinition,
  parseTableDefinition,
  readModelDefinitionFile,
  readTableDefinitionFile,
} from '../../../src/infrastructure/schema/JsonTableLoader.js';
import { TableDefinitionError } from '../../../src/domain/model/Table.js';

const MODEL_PATH = fileURLToPath(new URL('../../fixtures/clinic-model.json', import.meta.url));

describe('JsonTableLoader', () => {
  describe('parseTableDefinition()', () => {
    it('should build a table with defaults for optional keys', () => {
      const table = parseTableDefinition({
        name: 'person',
        fields: [
          { name: 'id', type: 'integer', required: true },
          { name: 'nick', type: 'string', maxLength: 8 },
        ],
      });

      expect(table.name).toBe('person');
      expect(table.list()).toEqual([
        { name: 'id', type: 'integer', required: true },
        { name: 'nick', type: 'string', required: false, maxLength: 8 },
      ]);
    });

    it('should name the offending path', () => {
      expect(() => parseTableDefinition({ name: 'person', fields: [{ name: 'id' }] })).toThrow(
        '$.fields[0].type must be a non-empty string',
      );
      expect(() => parseTableDefinition({ name: 'person', fields: [{ name: 'id', type: 'integer', maxLength: -1 }] })).toThrow(
        '$.fields[0].maxLength must be a non-negative integer',
      );
      expect(() => parseTableDefinition({ name: 'person', fields: [{ name: 'id', type: 'x', required: 'yes' }] })).toThrow(
        '$.fields[0].required must be a boolean',
      );
      expect(() => parseTableDefinition({ name: 'person', fields: [] })).toThrow('$.fields must be a non-empty array');
      expect(() => parseTableDefinition([])).toThrow('$ must be an object');
    });

    it('should reject duplicate field names', () => {
      expect(() =>
        parseTableDefinition({
          name: 'person',
          fields: [
            { name: 'id', type: 'integer' },
            { name: 'ID', type: 'string' },
          ],
        }),
      ).toThrow(TableDefinitionError);
    });
  });

  describe('parseModelDefinition()', () => {
    it('should wrap a single table in a model', () => {
      const model = parseModelDefinition({ name: 'person', fields: [{ name: 'id', type: 'integer' }] });

      expect(model.name).toBe('person');
      expect(model.version).toBe('');
      expect(model.tableNames()).toEqual(['person']);
    });

    it('should accept a numeric version', () => {
      const model = parseModelDefinition({
        name: 'm',
        version: 5,
        tables: [{ name: 't', fields: [{ name: 'id', type: 'integer' }] }],
      });
      expect(model.version).toBe('5');
    });

    it('should name the offending table', () => {
      expect(() => parseModelDefinition({ name: 'm', tables: [{ name: 't', fields: 'id' }] })).toThrow(
        '$.tables[0].fields must be a non-empty array',
      );
    });
  });

  describe('loadTableDefinition()', () => {
    it('should reject invalid JSON', () => {
      expect(() => loadModelDefinition('{')).toThrow(TableDefinitionError);
    });

    it('should require a table name when the model has several tables', () => {
      const json = JSON.stringify({
        name: 'm',
        tables: [
          { name: 'a', fields: [{ name: 'id', type: 'integer' }] },
          { name: 'b', fields: [{ name: 'id', type: 'integer' }] },
        ],
      });

      expect(() => loadTableDefinition(json)).toThrow("Model 'm' has 2 tables; name one of: a, b");
      expect(loadTableDefinition(json, 'B').name).toBe('b');
      expect(() => loadTableDefinition(json, 'c')).toThrow("Table 'c' not found in model 'm'");
    });
  });

  describe('files', () => {
    it('should read a model file', async () => {
      const model = await readModelDefinitionFile(MODEL_PATH);

      expect(model.name).toBe('clinic');
      expect(model.version).toBe('1.2.0');
      expect(model.tableNames()).toEqual(['person', 'visit']);
      expect(model.getTable('VISIT')?.get('cost')).toEqual({ name: 'cost', type: 'decimal', required: false });
    });

    it('should read one table from a model file', async () => {
      const table = await readTableDefinitionFile(MODEL_PATH, 'person');
      expect(table.names()).toEqual(['person_id', 'gender', 'birth_date']);
    });
  });
});
