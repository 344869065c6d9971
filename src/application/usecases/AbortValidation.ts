import type { ValidationRunContext } from '../ValidationRunContext.js';

/**
 * Use case: request cancellation. The run stops before the next row, ends in
 * `ABORTED` and rejects with `ValidationAbortedError`.
 */
export class AbortValidation {
  constructor(private readonly ctx: ValidationRunContext) {}

  execute(): void {
    if (this.ctx.status !== 'VALIDATING') {
      throw new Error(`Cannot abort validation from status '${this.ctx.status}'`);
    }
    this.ctx.abortController?.abort();
  }
}
