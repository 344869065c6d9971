import type { ResourceSchema } from '../model/ResourceSchema.js';
import { SchemaConfigurationError } from '../errors/SchemaConfigurationError.js';
import { compileDateFormat } from './DateFormat.js';

/** Collect every invariant violation of a resource schema. */
export function schemaProblems(schema: ResourceSchema): string[] {
  const problems: string[] = [];
  const names = new Set<string>();

  if (schema.fields.length === 0) problems.push('schema declares no fields');

  for (const field of schema.fields) {
    if (names.has(field.name)) problems.push(`duplicate field name '${field.name}'`);
    names.add(field.name);

    if (field.type === 'date') {
      if (!field.dateFormat || field.dateFormat.trim() === '') {
        problems.push(`field '${field.name}': date fields require a format`);
      } else {
        const compiled = compileDateFormat(field.dateFormat);
        if (typeof compiled === 'string') problems.push(`field '${field.name}': ${compiled}`);
      }
    }
  }

  if (schema.foreignKey && !names.has(schema.foreignKey.localField)) {
    problems.push(`foreign key field '${schema.foreignKey.localField}' is not a schema field`);
  }
  if (schema.primaryKey !== undefined && !names.has(schema.primaryKey)) {
    problems.push(`primary key field '${schema.primaryKey}' is not a schema field`);
  }

  return problems;
}

/** Throw `SchemaConfigurationError` unless the schema satisfies every invariant. */
export function assertValidSchema(schema: ResourceSchema, source?: string): void {
  const problems = schemaProblems(schema);
  if (problems.length > 0) throw new SchemaConfigurationError(problems, source);
}
