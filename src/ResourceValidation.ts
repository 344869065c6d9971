import type { ResourceSchema } from './domain/model/ResourceSchema.js';
import type { ValidationReport } from './domain/model/ValidationReport.js';
import type { DataSource } from './domain/ports/DataSource.js';
import type { SourceParser } from './domain/ports/SourceParser.js';
import type { DomainEvent, EventType, EventPayload } from './domain/events/DomainEvents.js';
import { ValidationRunContext } from './application/ValidationRunContext.js';
import { RunValidation } from './application/usecases/RunValidation.js';
import { AbortValidation } from './application/usecases/AbortValidation.js';
import type { ValidationStatusResult } from './application/usecases/GetValidationStatus.js';
import { GetValidationStatus } from './application/usecases/GetValidationStatus.js';
import type { ResourceDescriptor } from './infrastructure/descriptor/ResourceDescriptor.js';
import { assertValidSchema } from './domain/services/SchemaRules.js';
import { loadResourceDescriptor } from './infrastructure/descriptor/parseResourceDescriptor.js';
import { CsvParser } from './infrastructure/parsers/CsvParser.js';
import { FilePathSource } from './infrastructure/sources/FilePathSource.js';

/** Configuration for one validation run. */
export interface ResourceValidationConfig {
  /** Field types, date formats and key declarations the rows are checked against. */
  readonly schema: ResourceSchema;
  /**
   * Canonical key values of the resource named by `schema.foreignKey`. A snapshot is
   * taken when the run starts. Without it, foreign keys are not checked.
   */
  readonly referencedKeys?: Iterable<string>;
  /** Emit `validation:progress` every this many rows. `0` disables. Default: `1000`. */
  readonly progressInterval?: number;
  /** External cancellation. Aborting stops the run before the next row. */
  readonly signal?: AbortSignal;
  /** Name reported in `validation:started`. Default: `'resource'`. */
  readonly resourceName?: string;
  /** Delimiter used by `fromFile()`. Default: `','`. */
  readonly delimiter?: string;
}

/** Options for building a run from a descriptor; the descriptor supplies schema, name and delimiter. */
export type DescriptorValidationOptions = Omit<ResourceValidationConfig, 'schema' | 'resourceName' | 'delimiter'>;

/**
 * Facade over a single validation run: source → parser → row validation → report.
 * The schema is checked on construction, so a malformed schema never starts a run.
 *
 * @example
 * ```typescript
 * const descriptor = await loadResourceDescriptor('controller_operator_history.json');
 * const run = ResourceValidation.fromDescriptor(descriptor, { referencedKeys: mineIds });
 * run.on('row:invalid', (e) => console.warn(e.rowIndex, e.errors));
 * const report = await run.fromFile('controller_operator_history.csv').start();
 * ```
 */
export class ResourceValidation {
  private readonly ctx: ValidationRunContext;
  private readonly delimiter: string;
  private readonly runUseCase: RunValidation;
  private readonly abortUseCase: AbortValidation;
  private readonly statusUseCase: GetValidationStatus;

  constructor(config: ResourceValidationConfig) {
    assertValidSchema(config.schema, config.resourceName);

    this.ctx = new ValidationRunContext(
      config.schema,
      config.resourceName ?? 'resource',
      config.referencedKeys,
      config.progressInterval ?? 1000,
      config.signal,
    );
    this.delimiter = config.delimiter ?? ',';
    this.runUseCase = new RunValidation(this.ctx);
    this.abortUseCase = new AbortValidation(this.ctx);
    this.statusUseCase = new GetValidationStatus(this.ctx);
  }

  static fromDescriptor(descriptor: ResourceDescriptor, options?: DescriptorValidationOptions): ResourceValidation {
    return new ResourceValidation({
      ...options,
      schema: descriptor.schema,
      resourceName: descriptor.name,
      delimiter: descriptor.delimiter,
    });
  }

  /** Load a descriptor file and build a run from it. Throws `SchemaConfigurationError` for a malformed descriptor. */
  static async fromDescriptorFile(filePath: string, options?: DescriptorValidationOptions): Promise<ResourceValidation> {
    const descriptor = await loadResourceDescriptor(filePath);
    return ResourceValidation.fromDescriptor(descriptor, options);
  }

  from(source: DataSource, parser: SourceParser): this {
    this.ctx.source = source;
    this.ctx.parser = parser;
    return this;
  }

  /** Read a delimited file from disk with the configured delimiter. */
  fromFile(filePath: string): this {
    return this.from(new FilePathSource(filePath), new CsvParser({ delimiter: this.delimiter }));
  }

  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.on(type, handler);
    return this;
  }

  onAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.onAny(handler);
    return this;
  }

  off<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.off(type, handler);
    return this;
  }

  /**
   * Validate every row. Resolves with the full report; rejects with
   * `ValidationAbortedError` when aborted, or with the source's error when reading fails.
   */
  start(): Promise<ValidationReport> {
    return this.runUseCase.execute();
  }

  abort(): void {
    this.abortUseCase.execute();
  }

  getStatus(): ValidationStatusResult {
    return this.statusUseCase.execute();
  }

  get runId(): string {
    return this.ctx.runId;
  }
}
