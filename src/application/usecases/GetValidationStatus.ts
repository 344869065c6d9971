import type { ValidationStatus } from '../../domain/model/ValidationStatus.js';
import type { ValidationReport } from '../../domain/model/ValidationReport.js';
import type { ValidationRunContext } from '../ValidationRunContext.js';

export interface ValidationStatusResult {
  readonly runId: string;
  readonly status: ValidationStatus;
  readonly rowsChecked: number;
  readonly errorCount: number;
  readonly elapsedMs: number;
  /** Present once the run has completed. */
  readonly report: ValidationReport | null;
}

/** Use case: query the current state and counters of a run. */
export class GetValidationStatus {
  constructor(private readonly ctx: ValidationRunContext) {}

  execute(): ValidationStatusResult {
    return {
      runId: this.ctx.runId,
      status: this.ctx.status,
      rowsChecked: this.ctx.rowsChecked,
      errorCount: this.ctx.errorCount,
      elapsedMs: this.ctx.elapsedMs(),
      report: this.ctx.report,
    };
  }
}
