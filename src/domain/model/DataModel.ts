import type { Table } from './Table.js';
import { TableDefinitionError } from './Table.js';

/** A named, versioned set of tables, as loaded from a definition file. */
export class DataModel {
  private readonly byName: ReadonlyMap<string, Table>;

  constructor(
    readonly name: string,
    readonly version: string,
    readonly tables: readonly Table[],
  ) {
    const byName = new Map<string, Table>();
    for (const table of tables) {
      const key = table.name.toLowerCase();
      if (byName.has(key)) {
        throw new TableDefinitionError(`Duplicate table '${table.name}' in model '${name}'`);
      }
      byName.set(key, table);
    }
    this.byName = byName;
  }

  /** Case-insensitive lookup. */
  getTable(name: string): Table | undefined {
    return this.byName.get(name.toLowerCase());
  }

  tableNames(): string[] {
    return this.tables.map((t) => t.name);
  }
}
