import type { ResourceSchema } from '../../domain/model/ResourceSchema.js';

export interface SourceInfo {
  readonly title?: string;
  readonly path?: string;
}

export interface LicenseInfo {
  readonly name?: string;
  readonly title?: string;
  readonly path?: string;
}

/**
 * A data-package resource after parsing. Provenance is kept as inert metadata;
 * only `schema` and `delimiter` affect validation.
 */
export interface ResourceDescriptor {
  readonly name: string;
  readonly title?: string;
  readonly description?: string;
  readonly path?: string;
  readonly format?: string;
  readonly delimiter: string;
  readonly schema: ResourceSchema;
  readonly sources: readonly SourceInfo[];
  readonly licenses: readonly LicenseInfo[];
}
