/** Thrown at schema load time when a descriptor breaks a schema invariant. Lists every problem found. */
export class SchemaConfigurationError extends Error {
  readonly problems: readonly string[];

  constructor(problems: readonly string[], source?: string) {
    const where = source ? ` in ${source}` : '';
    super(`Invalid resource schema${where}: ${problems.join('; ')}`);
    this.name = 'SchemaConfigurationError';
    this.problems = problems;
  }
}
