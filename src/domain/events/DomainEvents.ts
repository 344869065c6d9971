import type { ValidationError } from '../model/ValidationResult.js';

export interface ValidationSummary {
  readonly rowCount: number;
  readonly invalidRowCount: number;
  readonly errorCount: number;
  readonly durationMs: number;
}

/** Emitted when `start()` begins reading rows. */
export interface ValidationStartedEvent {
  readonly type: 'validation:started';
  readonly runId: string;
  readonly resource: string;
  readonly timestamp: number;
}

/** Emitted once for every row with at least one error. */
export interface RowInvalidEvent {
  readonly type: 'row:invalid';
  readonly runId: string;
  readonly rowIndex: number;
  readonly errors: readonly ValidationError[];
  readonly timestamp: number;
}

/** Emitted every `progressInterval` rows. */
export interface ValidationProgressEvent {
  readonly type: 'validation:progress';
  readonly runId: string;
  readonly rowsChecked: number;
  readonly errorCount: number;
  readonly timestamp: number;
}

/** Emitted when every row has been checked. */
export interface ValidationCompletedEvent {
  readonly type: 'validation:completed';
  readonly runId: string;
  readonly summary: ValidationSummary;
  readonly timestamp: number;
}

/** Emitted when the run is aborted between rows. */
export interface ValidationAbortedEvent {
  readonly type: 'validation:aborted';
  readonly runId: string;
  readonly rowsChecked: number;
  readonly timestamp: number;
}

/** Emitted when reading or parsing the source fails. Data defects never trigger this. */
export interface ValidationFailedEvent {
  readonly type: 'validation:failed';
  readonly runId: string;
  readonly error: string;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent =
  | ValidationStartedEvent
  | RowInvalidEvent
  | ValidationProgressEvent
  | ValidationCompletedEvent
  | ValidationAbortedEvent
  | ValidationFailedEvent;

export type EventType = DomainEvent['type'];

/** Extract the payload type for a given event type string. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
