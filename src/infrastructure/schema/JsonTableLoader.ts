import { readFile } from 'node:fs/promises';
import type { Field } from '../../domain/model/Field.js';
import { DataModel } from '../../domain/model/DataModel.js';
import { Table, TableDefinitionError } from '../../domain/model/Table.js';

type JsonObject = { readonly [key: string]: unknown };

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(obj: JsonObject, key: string, path: string): string {
  const value = obj[key];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new TableDefinitionError(`${path}.${key} must be a non-empty string`);
  }
  return value;
}

function parseField(value: unknown, path: string): Field {
  if (!isObject(value)) {
    throw new TableDefinitionError(`${path} must be an object`);
  }

  const name = requireString(value, 'name', path);
  const type = requireString(value, 'type', path);

  const required = value['required'] ?? false;
  if (typeof required !== 'boolean') {
    throw new TableDefinitionError(`${path}.required must be a boolean`);
  }

  const maxLength = value['maxLength'];
  if (maxLength === undefined || maxLength === null) {
    return { name, type, required };
  }
  if (typeof maxLength !== 'number' || !Number.isInteger(maxLength) || maxLength < 0) {
    throw new TableDefinitionError(`${path}.maxLength must be a non-negative integer`);
  }

  return { name, type, required, maxLength };
}

/** Build a table from a parsed `{ name, fields: [...] }` object. */
export function parseTableDefinition(value: unknown, path = '$'): Table {
  if (!isObject(value)) {
    throw new TableDefinitionError(`${path} must be an object`);
  }

  const name = requireString(value, 'name', path);
  const fields = value['fields'];
  if (!Array.isArray(fields) || fields.length === 0) {
    throw new TableDefinitionError(`${path}.fields must be a non-empty array`);
  }

  return new Table(
    name,
    fields.map((f: unknown, i) => parseField(f, `${path}.fields[${String(i)}]`)),
  );
}

/**
 * Build a model from a parsed definition. Accepts either a model
 * `{ name, version, tables: [...] }` or a single table, which becomes a
 * model of one table named after it.
 */
export function parseModelDefinition(value: unknown): DataModel {
  if (!isObject(value)) {
    throw new TableDefinitionError('$ must be an object');
  }

  if (!('tables' in value)) {
    const table = parseTableDefinition(value);
    return new DataModel(table.name, '', [table]);
  }

  const name = requireString(value, 'name', '$');
  const version = value['version'] ?? '';
  if (typeof version !== 'string' && typeof version !== 'number') {
    throw new TableDefinitionError('$.version must be a string or a number');
  }

  const tables = value['tables'];
  if (!Array.isArray(tables) || tables.length === 0) {
    throw new TableDefinitionError('$.tables must be a non-empty array');
  }

  return new DataModel(
    name,
    String(version),
    tables.map((t: unknown, i) => parseTableDefinition(t, `$.tables[${String(i)}]`)),
  );
}

/** Parse definition JSON text into a model. */
export function loadModelDefinition(json: string): DataModel {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    throw new TableDefinitionError(`Invalid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseModelDefinition(parsed);
}

/**
 * Parse definition JSON text and pick one table. Without `tableName` the
 * definition must hold exactly one table.
 */
export function loadTableDefinition(json: string, tableName?: string): Table {
  return pickTable(loadModelDefinition(json), tableName);
}

export async function readModelDefinitionFile(path: string): Promise<DataModel> {
  return loadModelDefinition(await readFile(path, 'utf8'));
}

export async function readTableDefinitionFile(path: string, tableName?: string): Promise<Table> {
  return pickTable(await readModelDefinitionFile(path), tableName);
}

function pickTable(model: DataModel, tableName: string | undefined): Table {
  if (tableName === undefined) {
    const [only, ...rest] = model.tables;
    if (!only || rest.length > 0) {
      throw new TableDefinitionError(
        `Model '${model.name}' has ${String(model.tables.length)} tables; name one of: ${model.tableNames().join(', ')}`,
      );
    }
    return only;
  }

  const table = model.getTable(tableName);
  if (!table) {
    throw new TableDefinitionError(`Table '${tableName}' not found in model '${model.name}'`);
  }
  return table;
}
