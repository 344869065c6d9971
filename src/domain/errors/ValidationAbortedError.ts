export class ValidationAbortedError extends Error {
  readonly rowsChecked: number;

  constructor(rowsChecked: number) {
    super(`Validation aborted after ${String(rowsChecked)} rows`);
    this.name = 'ValidationAbortedError';
    this.rowsChecked = rowsChecked;
  }
}
