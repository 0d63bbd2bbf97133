import type { Field } from './Field.js';

/** Raised when a table definition is malformed (duplicate names, bad JSON shape). */
export class TableDefinitionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TableDefinitionError';
  }
}

/**
 * Ordered, name-unique set of fields a data file is checked against.
 *
 * Lookup is case-insensitive: header names are lower-cased before matching,
 * so schema names are indexed the same way.
 */
export class Table {
  private readonly fields: readonly Field[];
  private readonly byName: ReadonlyMap<string, Field>;

  constructor(
    readonly name: string,
    fields: readonly Field[],
  ) {
    const byName = new Map<string, Field>();

    for (const field of fields) {
      const key = field.name.toLowerCase();
      if (byName.has(key)) {
        throw new TableDefinitionError(`Duplicate field '${field.name}' in table '${name}'`);
      }
      byName.set(key, field);
    }

    this.fields = [...fields];
    this.byName = byName;
  }

  get(name: string): Field | undefined {
    return this.byName.get(name.toLowerCase());
  }

  list(): readonly Field[] {
    return this.fields;
  }

  names(): string[] {
    return this.fields.map((f) => f.name);
  }

  get length(): number {
    return this.fields.length;
  }
}
