import type { ResourceSchema } from '../domain/model/ResourceSchema.js';
import type { ValidationStatus } from '../domain/model/ValidationStatus.js';
import { canTransition } from '../domain/model/ValidationStatus.js';
import type { ValidationReport } from '../domain/model/ValidationReport.js';
import type { DataSource } from '../domain/ports/DataSource.js';
import type { SourceParser } from '../domain/ports/SourceParser.js';
import { randomUUID } from 'node:crypto';
import { EventBus } from './EventBus.js';

/**
 * State shared by the use cases of a single validation run. Internal; the facade
 * owns one instance per run.
 */
export class ValidationRunContext {
  readonly eventBus = new EventBus();
  readonly runId: string = randomUUID();

  source: DataSource | null = null;
  parser: SourceParser | null = null;

  status: ValidationStatus = 'CREATED';
  rowsChecked = 0;
  errorCount = 0;
  startedAt?: number;
  report: ValidationReport | null = null;
  abortController: AbortController | null = null;

  constructor(
    readonly schema: ResourceSchema,
    readonly resourceName: string,
    readonly referencedKeys: Iterable<string> | undefined,
    readonly progressInterval: number,
    readonly externalSignal: AbortSignal | undefined,
  ) {}

  transitionTo(newStatus: ValidationStatus): void {
    if (!canTransition(this.status, newStatus)) {
      throw new Error(`Invalid state transition: ${this.status} → ${newStatus}`);
    }
    this.status = newStatus;
  }

  elapsedMs(): number {
    return this.startedAt ? Date.now() - this.startedAt : 0;
  }
}
