import type { Field } from './domain/model/Field.js';
import type { Table } from './domain/model/Table.js';
import type { ValidationResult } from './domain/model/ValidationResult.js';
import type { ValidationSummary } from './domain/model/ValidationSummary.js';
import type { DataSource } from './domain/ports/DataSource.js';
import type { EventType, EventPayload } from './domain/events/DomainEvents.js';
import type { RuleRegistry } from './domain/services/FieldRules.js';
import type { HandlerErrorFn } from './application/EventBus.js';
import { EventBus } from './application/EventBus.js';
import { TableValidator } from './application/TableValidator.js';
import { CsvFormatter } from './infrastructure/parsers/CsvFormatter.js';

/** Options for `TableCheck.generateTemplate()`. */
export interface GenerateTemplateOptions {
  /** Number of example rows that pass the table's rules. Default: `0` (header only). */
  readonly exampleRows?: number;
  /** Field separator. Default: `','`. */
  readonly delimiter?: string;
}

/** Configuration for checking data files against one table. */
export interface TableCheckConfig {
  /** Table the header and every row are checked against. */
  readonly table: Table;
  /** Field separator. Default: `','`. */
  readonly delimiter?: string;
  /** Comment line marker, or `null` to disable. Default: `'#'`. */
  readonly comment?: string | null;
  /** Emit `validation:progress` every this many rows. Default: `1000`. */
  readonly progressInterval?: number;
  /** Type tag to rule lookup. Default: the built-in registry. */
  readonly ruleRegistry?: RuleRegistry;
  /** Receives errors thrown by event handlers. Default: they are dropped. */
  readonly onHandlerError?: HandlerErrorFn;
}

/** Everything a run produced. */
export interface TableCheckReport {
  readonly summary: ValidationSummary;
  readonly result: ValidationResult;
  /** Header names as read, lower-cased. */
  readonly header: readonly string[];
  /** Schema field names matched to the header, in header order. */
  readonly fields: readonly string[];
}

/** Longest prefix of whole code points that fits in `maxBytes` of UTF-8. */
function truncateUtf8(value: string, maxBytes: number): string {
  let bytes = 0;
  let end = 0;

  for (const char of value) {
    bytes += Buffer.byteLength(char, 'utf8');
    if (bytes > maxBytes) break;
    end += char.length;
  }

  return value.slice(0, end);
}

/**
 * Facade for validating delimited files against a table.
 *
 * Usage:
 * ```ts
 * const report = await new TableCheck({ table })
 *   .from(new FilePathSource('users.csv'))
 *   .on('error:logged', (e) => console.log(e.error))
 *   .run();
 * ```
 *
 * Each `run()` reads the source from the start with fresh state, so running
 * twice over the same bytes gives the same result.
 */
export class TableCheck {
  private readonly config: TableCheckConfig;
  private readonly progressInterval: number;
  private readonly eventBus: EventBus;

  private source: DataSource | null = null;

  constructor(config: TableCheckConfig) {
    this.config = config;
    this.progressInterval = config.progressInterval ?? 1000;
    this.eventBus = new EventBus(config.onHandlerError);
  }

  /**
   * Generate a strictly quoted CSV template from a table.
   *
   * Example rows hold values that pass each field's type and length rules.
   */
  static generateTemplate(table: Table, options?: GenerateTemplateOptions): string {
    const formatter = new CsvFormatter({ delimiter: options?.delimiter });
    const fields = table.list();
    const records: string[][] = [fields.map((f) => f.name)];
    const rowCount = options?.exampleRows ?? 0;

    for (let i = 1; i <= rowCount; i++) {
      records.push(fields.map((f) => TableCheck.generateExampleValue(f, i)));
    }

    return formatter.format(records);
  }

  private static generateExampleValue(field: Field, rowIndex: number): string {
    const day = String(((rowIndex - 1) % 28) + 1).padStart(2, '0');

    switch (field.type.toLowerCase()) {
      case 'integer':
      case 'biginteger':
        return String(rowIndex * 100);
      case 'number':
      case 'float':
      case 'decimal':
        return `${String(rowIndex)}.5`;
      case 'date':
        return `2024-01-${day}`;
      case 'datetime':
      case 'timestamp':
        return `2024-01-${day} 12:00:00`;
      default: {
        const value = `${field.name}_${String(rowIndex)}`;
        return field.maxLength !== undefined && field.maxLength > 0 ? truncateUtf8(value, field.maxLength) : value;
      }
    }
  }

  /** Set the data source. Returns `this` for chaining. */
  from(source: DataSource): this {
    this.source = source;
    return this;
  }

  /** Subscribe to a lifecycle event. Returns `this` for chaining. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.eventBus.on(type, handler);
    return this;
  }

  /** Unsubscribe a handler registered with `on()`. Returns `this` for chaining. */
  off<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.eventBus.off(type, handler);
    return this;
  }

  /**
   * Read the whole source and check it.
   *
   * Row problems end up in the report. A bad header or an I/O error emits
   * `validation:failed` and is rethrown.
   */
  async run(): Promise<TableCheckReport> {
    const source = this.source;
    if (!source) {
      throw new Error('Source must be configured. Call .from(source) first.');
    }

    const runId = crypto.randomUUID();
    const table = this.config.table;
    const sourceName = source.metadata().fileName ?? 'unknown';
    const startedAt = Date.now();

    const validator = new TableValidator(source.read(), table, {
      delimiter: this.config.delimiter,
      comment: this.config.comment,
      ruleRegistry: this.config.ruleRegistry,
      eventBus: this.eventBus,
      runId,
    });

    this.eventBus.emit({
      type: 'validation:started',
      runId,
      table: table.name,
      source: sourceName,
      timestamp: startedAt,
    });

    try {
      await validator.init();

      while (await validator.next()) {
        if (this.progressInterval > 0 && validator.rowCount % this.progressInterval === 0) {
          this.eventBus.emit({
            type: 'validation:progress',
            runId,
            rowsRead: validator.rowCount,
            errorCount: validator.getResult().errorCount,
            timestamp: Date.now(),
          });
        }
      }
    } catch (error) {
      this.eventBus.emit({
        type: 'validation:failed',
        runId,
        error: error instanceof Error ? error.message : String(error),
        timestamp: Date.now(),
      });
      throw error;
    }

    const result = validator.getResult();
    const summary: ValidationSummary = {
      runId,
      table: table.name,
      source: sourceName,
      passed: !result.hasErrors(),
      rowsRead: validator.rowCount,
      errorCount: result.errorCount,
      lineErrorCount: result.lineErrorCount,
      fieldErrorCount: result.fieldErrorCount,
      durationMs: Date.now() - startedAt,
    };

    this.eventBus.emit({ type: 'validation:completed', runId, summary, timestamp: Date.now() });

    return {
      summary,
      result,
      header: validator.getHeader(),
      fields: validator.getMatchedFields(),
    };
  }
}
