import type { FieldSchema } from './FieldSchema.js';

export interface ForeignKeyDecl {
  readonly localField: string;
  readonly referencedResource: string;
  readonly referencedField: string;
}

export interface ResourceSchema {
  /** Column order. */
  readonly fields: readonly FieldSchema[];
  readonly foreignKey?: ForeignKeyDecl;
  /** Field whose values must be unique across the resource. */
  readonly primaryKey?: string;
}

export function findField(schema: ResourceSchema, name: string): FieldSchema | undefined {
  return schema.fields.find((f) => f.name === name);
}
