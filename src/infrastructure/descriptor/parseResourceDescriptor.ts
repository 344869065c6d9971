import { readFile } from 'node:fs/promises';
import type { FieldSchema } from '../../domain/model/FieldSchema.js';
import { isFieldType } from '../../domain/model/FieldSchema.js';
import type { ForeignKeyDecl, ResourceSchema } from '../../domain/model/ResourceSchema.js';
import { SchemaConfigurationError } from '../../domain/errors/SchemaConfigurationError.js';
import { schemaProblems } from '../../domain/services/SchemaRules.js';
import { compileDateFormat } from '../../domain/services/DateFormat.js';
import type { LicenseInfo, ResourceDescriptor, SourceInfo } from './ResourceDescriptor.js';

type JsonObject = { readonly [key: string]: unknown };

const DEFAULT_DATE_FORMAT = '%Y-%m-%d';

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(obj: JsonObject, key: string): string | undefined {
  const value = obj[key];
  return typeof value === 'string' ? value : undefined;
}

/** Accept `"A"` or `["A"]`. Composite keys are not supported. */
function singleFieldName(value: unknown, path: string, problems: string[]): string | undefined {
  if (typeof value === 'string' && value !== '') return value;
  if (Array.isArray(value) && value.length === 1 && typeof value[0] === 'string' && value[0] !== '') {
    return value[0];
  }
  if (Array.isArray(value) && value.length > 1) {
    problems.push(`${path}: composite keys are not supported`);
  } else {
    problems.push(`${path} must name exactly one field`);
  }
  return undefined;
}

function normalizeDateFormat(format: string): string {
  const stripped = format.startsWith('fmt:') ? format.slice(4) : format;
  return stripped === 'default' ? DEFAULT_DATE_FORMAT : stripped;
}

function parseField(raw: unknown, index: number, problems: string[]): FieldSchema | undefined {
  const path = `schema.fields[${String(index)}]`;
  if (!isObject(raw)) {
    problems.push(`${path} must be an object`);
    return undefined;
  }

  const name = optionalString(raw, 'name');
  if (!name) {
    problems.push(`${path}.name must be a non-empty string`);
    return undefined;
  }

  const type = raw['type'] ?? 'string';
  if (!isFieldType(type)) {
    problems.push(`field '${name}': unsupported type '${String(type)}'`);
    return undefined;
  }

  const constraints = raw['constraints'];
  const nullable = raw['nullable'] === true || (isObject(constraints) && constraints['required'] === false);
  const description = optionalString(raw, 'description');

  if (type !== 'date') {
    return { name, type, nullable, description };
  }

  const format = optionalString(raw, 'format');
  if (!format || format.trim() === '') {
    problems.push(`field '${name}': date fields require a format`);
    return undefined;
  }

  const dateFormat = normalizeDateFormat(format);
  const compiled = compileDateFormat(dateFormat);
  if (typeof compiled === 'string') {
    problems.push(`field '${name}': ${compiled}`);
    return undefined;
  }

  return { name, type, dateFormat, nullable, description };
}

function parseForeignKey(raw: unknown, problems: string[]): ForeignKeyDecl | undefined {
  if (!isObject(raw)) {
    problems.push('foreign key must be an object');
    return undefined;
  }

  const localField = singleFieldName(raw['fields'], 'foreignKey.fields', problems);
  const reference = raw['reference'];
  if (!isObject(reference)) {
    problems.push('foreignKey.reference must be an object');
    return undefined;
  }

  const referencedResource = optionalString(reference, 'resource');
  if (!referencedResource) {
    problems.push('foreignKey.reference.resource must be a non-empty string');
  }
  const referencedField = singleFieldName(reference['fields'], 'foreignKey.reference.fields', problems);

  if (!localField || !referencedResource || !referencedField) return undefined;
  return { localField, referencedResource, referencedField };
}

function parseSchema(raw: unknown, problems: string[]): ResourceSchema | undefined {
  if (!isObject(raw)) {
    problems.push('schema must be an object');
    return undefined;
  }

  const rawFields = raw['fields'];
  if (!Array.isArray(rawFields)) {
    problems.push('schema.fields must be an array');
    return undefined;
  }

  const fields: FieldSchema[] = [];
  rawFields.forEach((f: unknown, i) => {
    const field = parseField(f, i, problems);
    if (field) fields.push(field);
  });

  let foreignKey: ForeignKeyDecl | undefined;
  const foreignKeys = raw['foreignKeys'];
  if (Array.isArray(foreignKeys)) {
    if (foreignKeys.length > 1) problems.push('only one foreign key per resource is supported');
    if (foreignKeys.length > 0) foreignKey = parseForeignKey(foreignKeys[0], problems);
  } else if (foreignKeys !== undefined) {
    problems.push('schema.foreignKeys must be an array');
  } else if (raw['foreignKey'] !== undefined) {
    foreignKey = parseForeignKey(raw['foreignKey'], problems);
  }

  const primaryKey =
    raw['primaryKey'] === undefined ? undefined : singleFieldName(raw['primaryKey'], 'schema.primaryKey', problems);

  return { fields, foreignKey, primaryKey };
}

function parseList<T>(raw: unknown, pick: (entry: JsonObject) => T): T[] {
  return Array.isArray(raw) ? raw.filter(isObject).map(pick) : [];
}

/**
 * Parse a data-package resource descriptor. Every problem found is reported together
 * in one `SchemaConfigurationError`; a descriptor that parses is safe to validate with.
 */
export function parseResourceDescriptor(input: unknown, source?: string): ResourceDescriptor {
  const problems: string[] = [];

  if (!isObject(input)) {
    throw new SchemaConfigurationError(['descriptor must be a JSON object'], source);
  }

  const name = optionalString(input, 'name');
  if (!name) problems.push('name must be a non-empty string');

  const dialect = input['dialect'];
  const delimiter = (isObject(dialect) ? optionalString(dialect, 'delimiter') : undefined) ?? ',';
  if (delimiter.length !== 1) problems.push('dialect.delimiter must be a single character');

  const schema = parseSchema(input['schema'], problems);
  if (schema) problems.push(...schemaProblems(schema));

  if (problems.length > 0 || !schema || !name) {
    throw new SchemaConfigurationError(problems, source);
  }

  const sources = parseList<SourceInfo>(input['sources'], (s) => ({
    title: optionalString(s, 'title'),
    path: optionalString(s, 'path'),
  }));
  const licenses = parseList<LicenseInfo>(input['licenses'], (l) => ({
    name: optionalString(l, 'name'),
    title: optionalString(l, 'title'),
    path: optionalString(l, 'path'),
  }));

  return {
    name,
    title: optionalString(input, 'title'),
    description: optionalString(input, 'description'),
    path: optionalString(input, 'path'),
    format: optionalString(input, 'format'),
    delimiter,
    schema,
    sources,
    licenses,
  };
}

/** Read and parse a descriptor file (UTF-8 JSON). */
export async function loadResourceDescriptor(filePath: string): Promise<ResourceDescriptor> {
  const text = await readFile(filePath, 'utf-8');

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SchemaConfigurationError([`descriptor is not valid JSON: ${reason}`], filePath);
  }

  return parseResourceDescriptor(json, filePath);
}
