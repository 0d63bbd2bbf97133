import type { ErrorKind } from './ErrorKind.js';
import type { ValidationError } from './ValidationError.js';

/**
 * Append-only index of the errors found in one run.
 *
 * Line-level errors are grouped by kind, field-level errors by field then
 * kind. Insertion order is kept at every level so a replayed input yields the
 * same iteration order.
 */
export class ValidationResult {
  private readonly lineIndex = new Map<ErrorKind, ValidationError[]>();
  private readonly fieldIndex = new Map<string, Map<ErrorKind, ValidationError[]>>();
  private count = 0;

  logError(error: ValidationError): void {
    this.count++;

    if (error.field === undefined) {
      const existing = this.lineIndex.get(error.kind);
      if (existing) {
        existing.push(error);
      } else {
        this.lineIndex.set(error.kind, [error]);
      }
      return;
    }

    let byKind = this.fieldIndex.get(error.field);
    if (!byKind) {
      byKind = new Map();
      this.fieldIndex.set(error.field, byKind);
    }

    const existing = byKind.get(error.kind);
    if (existing) {
      existing.push(error);
    } else {
      byKind.set(error.kind, [error]);
    }
  }

  lineErrors(): ReadonlyMap<ErrorKind, readonly ValidationError[]> {
    return this.lineIndex;
  }

  /** Errors for one field grouped by kind. Empty when the field has none. */
  fieldErrors(field: string): ReadonlyMap<ErrorKind, readonly ValidationError[]> {
    return this.fieldIndex.get(field) ?? new Map<ErrorKind, readonly ValidationError[]>();
  }

  /** Fields with at least one error, in order of first occurrence. */
  fieldsWithErrors(): string[] {
    return [...this.fieldIndex.keys()];
  }

  hasErrors(): boolean {
    return this.count > 0;
  }

  get errorCount(): number {
    return this.count;
  }

  get lineErrorCount(): number {
    let total = 0;
    for (const errors of this.lineIndex.values()) total += errors.length;
    return total;
  }

  get fieldErrorCount(): number {
    return this.count - this.lineErrorCount;
  }
}
