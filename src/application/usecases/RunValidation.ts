import type { ValidationError } from '../../domain/model/ValidationResult.js';
import type { ValidationReport } from '../../domain/model/ValidationReport.js';
import { ValidationAbortedError } from '../../domain/errors/ValidationAbortedError.js';
import { validateAsync } from '../../domain/services/ResourceValidator.js';
import type { ValidationRunContext } from '../ValidationRunContext.js';

/** Use case: stream every row of the source through the validator and build the report. */
export class RunValidation {
  constructor(private readonly ctx: ValidationRunContext) {}

  async execute(): Promise<ValidationReport> {
    const { source, parser } = this.ctx;
    if (!source || !parser) {
      throw new Error('Source and parser must be configured. Call .from(source, parser) first.');
    }
    if (this.ctx.status !== 'CREATED') {
      throw new Error(`Cannot start validation from status '${this.ctx.status}'`);
    }

    const controller = new AbortController();
    this.ctx.abortController = controller;
    const external = this.ctx.externalSignal;
    const forwardAbort = (): void => controller.abort();
    if (external?.aborted) controller.abort();
    external?.addEventListener('abort', forwardAbort, { once: true });

    this.ctx.transitionTo('VALIDATING');
    this.ctx.startedAt = Date.now();
    this.ctx.eventBus.emit({
      type: 'validation:started',
      runId: this.ctx.runId,
      resource: this.ctx.resourceName,
      timestamp: Date.now(),
    });

    try {
      const report = await validateAsync(parser.stream(source.read()), this.ctx.schema, this.ctx.referencedKeys, {
        signal: controller.signal,
        onRow: (rowIndex, errors) => this.onRow(rowIndex, errors),
      });

      this.complete(report);
      return report;
    } catch (error) {
      this.fail(error);
      throw error;
    } finally {
      external?.removeEventListener('abort', forwardAbort);
    }
  }

  private onRow(rowIndex: number, errors: readonly ValidationError[]): void {
    this.ctx.rowsChecked = rowIndex + 1;
    this.ctx.errorCount += errors.length;

    if (errors.length > 0) {
      this.ctx.eventBus.emit({
        type: 'row:invalid',
        runId: this.ctx.runId,
        rowIndex,
        errors,
        timestamp: Date.now(),
      });
    }

    const interval = this.ctx.progressInterval;
    if (interval > 0 && this.ctx.rowsChecked % interval === 0) {
      this.ctx.eventBus.emit({
        type: 'validation:progress',
        runId: this.ctx.runId,
        rowsChecked: this.ctx.rowsChecked,
        errorCount: this.ctx.errorCount,
        timestamp: Date.now(),
      });
    }
  }

  private complete(report: ValidationReport): void {
    this.ctx.report = report;
    this.ctx.transitionTo('COMPLETED');
    this.ctx.eventBus.emit({
      type: 'validation:completed',
      runId: this.ctx.runId,
      summary: {
        rowCount: report.rowCount,
        invalidRowCount: report.invalidRowCount,
        errorCount: report.errors.length,
        durationMs: this.ctx.elapsedMs(),
      },
      timestamp: Date.now(),
    });
  }

  private fail(error: unknown): void {
    if (error instanceof ValidationAbortedError) {
      this.ctx.transitionTo('ABORTED');
      this.ctx.eventBus.emit({
        type: 'validation:aborted',
        runId: this.ctx.runId,
        rowsChecked: error.rowsChecked,
        timestamp: Date.now(),
      });
      return;
    }

    this.ctx.transitionTo('FAILED');
    this.ctx.eventBus.emit({
      type: 'validation:failed',
      runId: this.ctx.runId,
      error: error instanceof Error ? error.message : String(error),
      timestamp: Date.now(),
    });
  }
}
