import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  loadResourceDescriptor,
  parseResourceDescriptor,
} from '../../../src/infrastructure/descriptor/parseResourceDescriptor.js';
import { assertValidSchema } from '../../../src/domain/services/SchemaRules.js';
import { SchemaConfigurationError } from '../../../src/domain/errors/SchemaConfigurationError.js';

const fixture = (name: string): string => fileURLToPath(new URL(`../../fixtures/${name}`, import.meta.url));

const TEST_DIR = join(tmpdir(), 'tabular-resource-validator-test-descriptor');

beforeAll(() => {
  mkdirSync(TEST_DIR, { recursive: true });
});

afterAll(() => {
  rmSync(TEST_DIR, { recursive: true, force: true });
});

function problemsOf(fn: () => unknown): readonly string[] {
  try {
    fn();
  } catch (error) {
    if (error instanceof SchemaConfigurationError) return error.problems;
    throw error;
  }
  throw new Error('expected a SchemaConfigurationError');
}

function descriptor(schema: unknown, extra: Record<string, unknown> = {}): unknown {
  return { name: 'history', schema, ...extra };
}

describe('loadResourceDescriptor', () => {
  it('should parse the controller/operator history descriptor', async () => {
    const parsed = await loadResourceDescriptor(fixture('controller_operator_history.json'));

    expect(parsed.name).toBe('controller_operator_history');
    expect(parsed.path).toBe('controller_operator_history.csv');
    expect(parsed.format).toBe('csv');
    expect(parsed.delimiter).toBe(',');
    expect(parsed.schema.fields.map((f) => f.name)).toEqual([
      'MINE_ID',
      'COAL_METAL_IND',
      'CONTROLLER_ID',
      'CONTROLLER_NAME',
      'CONTROLLER_START_DT',
      'CONTROLLER_END_DT',
      'OPERATOR_ID',
      'OPERATOR_NAME',
      'OPERATOR_START_DT',
      'OPERATOR_END_DT',
    ]);
    expect(parsed.schema.fields[0]).toEqual({
      name: 'MINE_ID',
      type: 'integer',
      nullable: false,
      description: 'Identification number assigned to the mine',
    });
    expect(parsed.schema.fields[4]).toEqual({
      name: 'CONTROLLER_START_DT',
      type: 'date',
      dateFormat: '%m/%d/%Y',
      nullable: false,
    });
    expect(parsed.schema.foreignKey).toEqual({
      localField: 'MINE_ID',
      referencedResource: 'mines',
      referencedField: 'MINE_ID',
    });
    expect(parsed.schema.primaryKey).toBeUndefined();
    expect(parsed.licenses[0]?.name).toBe('CC0-1.0');
    expect(parsed.sources[0]?.title).toBe('Sample mine registry export');
  });

  it('should report every problem of a malformed descriptor at once', async () => {
    const path = fixture('malformed_descriptor.json');
    const error = await loadResourceDescriptor(path).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SchemaConfigurationError);
    expect(error instanceof SchemaConfigurationError ? error.problems : []).toEqual([
      "field 'CONTROLLER_START_DT': date fields require a format",
      "field 'LATITUDE': unsupported type 'number'",
      "foreign key field 'MINE_NUMBER' is not a schema field",
    ]);
  });

  it('should reject a file that is not JSON', async () => {
    const path = join(TEST_DIR, 'broken.json');
    writeFileSync(path, '{ "name": ', 'utf-8');

    const error = await loadResourceDescriptor(path).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(SchemaConfigurationError);
    expect(error instanceof SchemaConfigurationError ? error.problems[0] : '').toMatch(
      /^descriptor is not valid JSON: /,
    );
  });
});

describe('parseResourceDescriptor', () => {
  it('should reject a non-object descriptor', () => {
    expect(problemsOf(() => parseResourceDescriptor(null))).toEqual(['descriptor must be a JSON object']);
    expect(problemsOf(() => parseResourceDescriptor([]))).toEqual(['descriptor must be a JSON object']);
  });

  it('should require a name and a field list', () => {
    expect(problemsOf(() => parseResourceDescriptor({ schema: { fields: 'MINE_ID' } }))).toEqual([
      'name must be a non-empty string',
      'schema.fields must be an array',
    ]);
  });

  it('should default an omitted type to string', () => {
    const parsed = parseResourceDescriptor(descriptor({ fields: [{ name: 'NOTE' }] }));
    expect(parsed.schema.fields[0]?.type).toBe('string');
  });

  it('should normalize fmt: prefixes and the default date format', () => {
    const parsed = parseResourceDescriptor(
      descriptor({
        fields: [
          { name: 'D', type: 'date', format: 'fmt:%d/%m/%Y' },
          { name: 'E', type: 'date', format: 'default' },
        ],
      }),
    );
    expect(parsed.schema.fields.map((f) => f.dateFormat)).toEqual(['%d/%m/%Y', '%Y-%m-%d']);
  });

  it('should reject date formats that cannot be compiled', () => {
    expect(problemsOf(() => parseResourceDescriptor(descriptor({ fields: [{ name: 'D', type: 'date', format: '%Q' }] })))).toEqual([
      "field 'D': date format '%Q' uses unsupported directive '%Q'",
      'schema declares no fields',
    ]);
  });

  it('should mark fields with required: false as nullable', () => {
    const parsed = parseResourceDescriptor(
      descriptor({
        fields: [
          { name: 'OPERATOR_END_DT', type: 'date', format: '%m/%d/%Y', constraints: { required: false } },
          { name: 'CONTROLLER_END_DT', type: 'date', format: '%m/%d/%Y', constraints: { required: true } },
        ],
      }),
    );
    expect(parsed.schema.fields.map((f) => f.nullable)).toEqual([true, false]);
  });

  it('should accept single-field keys as a string or a one-element array', () => {
    const parsed = parseResourceDescriptor(
      descriptor({
        fields: [{ name: 'MINE_ID', type: 'integer' }],
        primaryKey: ['MINE_ID'],
        foreignKeys: [{ fields: ['MINE_ID'], reference: { resource: 'mines', fields: 'ID' } }],
      }),
    );
    expect(parsed.schema.primaryKey).toBe('MINE_ID');
    expect(parsed.schema.foreignKey).toEqual({ localField: 'MINE_ID', referencedResource: 'mines', referencedField: 'ID' });
  });

  it('should accept a singular foreignKey object', () => {
    const parsed = parseResourceDescriptor(
      descriptor({
        fields: [{ name: 'MINE_ID', type: 'integer' }],
        foreignKey: { fields: 'MINE_ID', reference: { resource: 'mines', fields: 'MINE_ID' } },
      }),
    );
    expect(parsed.schema.foreignKey?.referencedResource).toBe('mines');
  });

  it('should reject composite and repeated keys', () => {
    expect(
      problemsOf(() =>
        parseResourceDescriptor(
          descriptor({
            fields: [
              { name: 'A', type: 'string' },
              { name: 'B', type: 'string' },
            ],
            primaryKey: ['A', 'B'],
            foreignKeys: [
              { fields: 'A', reference: { resource: 'x', fields: 'A' } },
              { fields: 'B', reference: { resource: 'y', fields: 'B' } },
            ],
          }),
        ),
      ),
    ).toEqual(['only one foreign key per resource is supported', 'schema.primaryKey: composite keys are not supported']);
  });

  it('should reject a foreign key without a referenced resource', () => {
    expect(
      problemsOf(() =>
        parseResourceDescriptor(
          descriptor({
            fields: [{ name: 'A', type: 'string' }],
            foreignKeys: [{ fields: 'A', reference: { fields: 'A' } }],
          }),
        ),
      ),
    ).toEqual(['foreignKey.reference.resource must be a non-empty string']);
  });

  it('should reject duplicate field names', () => {
    expect(
      problemsOf(() =>
        parseResourceDescriptor(
          descriptor({
            fields: [
              { name: 'A', type: 'string' },
              { name: 'A', type: 'integer' },
            ],
          }),
        ),
      ),
    ).toEqual(["duplicate field name 'A'"]);
  });

  it('should read the delimiter from the dialect', () => {
    const fields = [{ name: 'A', type: 'string' }];
    expect(parseResourceDescriptor(descriptor({ fields }, { dialect: { delimiter: ';' } })).delimiter).toBe(';');
    expect(problemsOf(() => parseResourceDescriptor(descriptor({ fields }, { dialect: { delimiter: '||' } })))).toEqual([
      'dialect.delimiter must be a single character',
    ]);
  });
});

describe('assertValidSchema', () => {
  it('should accept a consistent schema', () => {
    expect(() =>
      assertValidSchema({
        fields: [{ name: 'MINE_ID', type: 'integer' }],
        foreignKey: { localField: 'MINE_ID', referencedResource: 'mines', referencedField: 'MINE_ID' },
        primaryKey: 'MINE_ID',
      }),
    ).not.toThrow();
  });

  it('should list every broken invariant of a programmatic schema', () => {
    expect(
      problemsOf(() =>
        assertValidSchema({
          fields: [{ name: 'D', type: 'date' }],
          foreignKey: { localField: 'X', referencedResource: 'mines', referencedField: 'MINE_ID' },
          primaryKey: 'Y',
        }),
      ),
    ).toEqual([
      "field 'D': date fields require a format",
      "foreign key field 'X' is not a schema field",
      "primary key field 'Y' is not a schema field",
    ]);
  });

  it('should reject a schema without fields', () => {
    expect(problemsOf(() => assertValidSchema({ fields: [] }))).toEqual(['schema declares no fields']);
  });

  it('should name the source in the error message', () => {
    expect(() => assertValidSchema({ fields: [] }, 'history.json')).toThrow(
      'Invalid resource schema in history.json: schema declares no fields',
    );
  });
});
