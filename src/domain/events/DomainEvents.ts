import type { ValidationError } from '../model/ValidationError.js';
import type { ValidationSummary } from '../model/ValidationSummary.js';

/** Emitted when `run()` is called, before the header is read. */
export interface ValidationStartedEvent {
  readonly type: 'validation:started';
  readonly runId: string;
  readonly table: string;
  readonly source: string;
  readonly timestamp: number;
}

/** Emitted once the header matched the table and the plan is compiled. */
export interface HeaderCheckedEvent {
  readonly type: 'header:checked';
  readonly runId: string;
  readonly header: readonly string[];
  readonly timestamp: number;
}

/** Emitted for each field whose declared type has no rule. Its values are still checked for encoding and presence. */
export interface UnsupportedTypeEvent {
  readonly type: 'plan:unsupported-type';
  readonly runId: string;
  readonly field: string;
  readonly fieldType: string;
  readonly timestamp: number;
}

/** Emitted for every error appended to the result. */
export interface ErrorLoggedEvent {
  readonly type: 'error:logged';
  readonly runId: string;
  readonly error: ValidationError;
  readonly timestamp: number;
}

/** Emitted every `progressInterval` rows. */
export interface ValidationProgressEvent {
  readonly type: 'validation:progress';
  readonly runId: string;
  readonly rowsRead: number;
  readonly errorCount: number;
  readonly timestamp: number;
}

/** Emitted when the whole input was read, whether or not errors were found. */
export interface ValidationCompletedEvent {
  readonly type: 'validation:completed';
  readonly runId: string;
  readonly summary: ValidationSummary;
  readonly timestamp: number;
}

/** Emitted when the run stops early: a bad header or an I/O error. */
export interface ValidationFailedEvent {
  readonly type: 'validation:failed';
  readonly runId: string;
  readonly error: string;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent =
  | ValidationStartedEvent
  | HeaderCheckedEvent
  | UnsupportedTypeEvent
  | ErrorLoggedEvent
  | ValidationProgressEvent
  | ValidationCompletedEvent
  | ValidationFailedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
