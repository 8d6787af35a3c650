import { describe, it, expect } from 'vitest';

import { ErrorCode } from '../../errors/codes.js';
import { ident } from '../../syntax/ast.js';
import { formatNode } from '../../syntax/print.js';
import { ConfigurationError, ErrorList, FeatureError, RefResolutionError } from '../../types/errors.js';
import type { ExtractOptions } from '../../types/options.js';
import { ok } from '../../types/result.js';
import { Extract } from '../extract.js';

function extract(data: unknown, options?: ExtractOptions): string {
  const out = Extract(data, options);
  if (out.isErr()) {
    throw out.error;
  }
  return formatNode(out.value);
}

function extractError(data: unknown, options?: ExtractOptions): ErrorList {
  const out = Extract(data, options);
  if (out.isOk()) {
    throw new Error('expected Extract to fail');
  }
  return out.error;
}

describe('Extract', () => {
  it('combines string length bounds', () => {
    expect(extract({ type: 'string', minLength: 2, maxLength: 5 })).toBe(
      'import "strings"\n\nstrings.MinRunes(2) & strings.MaxRunes(5)\n'
    );
  });

  it('spells out the allowed types when nothing else constrains them', () => {
    expect(extract({ type: ['string', 'null'] })).toBe('null | string\n');
    expect(extract({ type: 'number' })).toBe('number\n');
    expect(extract({})).toBe('_\n');
  });

  it('defines $defs entries once and refers to them', () => {
    const schema = { $ref: '#/$defs/foo', $defs: { foo: { type: 'integer' } } };

    const text = extract(schema);

    expect(text).toBe('#foo\n#foo: int\n');
    expect(extract(schema)).toBe(text);
  });

  it('binds a reference to the root to the whole document', () => {
    const text = extract({ properties: { next: { $ref: '#' } } });

    expect(text).toBe(
      [
        '_schema',
        '_schema: null | bool | number | string | [...] | {',
        '\tnext?: _schema',
        '\t...',
        '}',
        '',
      ].join('\n')
    );
  });

  it('closes objects with additionalProperties false and marks required fields', () => {
    const schema = {
      type: 'object',
      properties: { a: { type: 'string' }, b: { type: 'number' } },
      required: ['a'],
      additionalProperties: false,
    };

    expect(extract(schema)).toBe('close({\n\ta!: string\n\tb?: number\n})\n');
  });

  it('leaves objects open only when asked to be explicit', () => {
    const schema = { type: 'object', properties: { a: { type: 'string' } } };

    expect(extract(schema)).toBe('{\n\ta?: string\n\t...\n}\n');
    expect(extract(schema, { openOnlyWhenExplicit: true })).toBe('{\n\ta?: string\n}\n');
  });

  it('turns additionalProperties into a pattern constraint', () => {
    const schema = { type: 'object', additionalProperties: { type: 'integer' } };

    expect(extract(schema)).toBe('{\n\t[string]: int\n}\n');
  });

  it('keeps a oneOf of distinct constants exclusive', () => {
    expect(extract({ oneOf: [{ const: 'a' }, { const: 'b' }] })).toBe(
      'matchN(1, ["a", "b"])\n'
    );
  });

  it('keeps anyOf members that can match as matchN(>=1, …)', () => {
    const schema = { anyOf: [{ type: 'string' }, { type: 'integer', minimum: 1 }] };

    expect(extract(schema)).toBe('matchN(>=1, [string, int & >=1])\n');
  });

  it('requires every constrained allOf member', () => {
    const schema = { type: 'integer', allOf: [{ minimum: 1 }, { maximum: 9 }] };

    expect(extract(schema)).toBe('matchN(2, [>=1, <=9]) & int\n');
  });

  it('translates not as matchN(0, …)', () => {
    expect(extract({ not: { type: 'string' } })).toBe('matchN(0, [string])\n');
  });

  it('joins if, then and else in one matchIf', () => {
    const schema = { if: { type: 'string' }, then: { minLength: 1 }, else: { type: 'number' } };

    expect(extract(schema)).toBe(
      'import "strings"\n\nmatchIf(string, strings.MinRunes(1), number)\n'
    );
  });

  it('uses items as the tail after prefixItems', () => {
    const prefix = { type: 'array', prefixItems: [{ type: 'string' }, { type: 'integer' }] };

    expect(extract(prefix)).toBe('[string, int, ...]\n');
    expect(extract({ ...prefix, items: false })).toBe('[string, int]\n');
    expect(extract({ ...prefix, items: { type: 'boolean' } })).toBe('[string, int, ...bool]\n');
  });

  it('counts contains matches with minContains and maxContains', () => {
    const schema = { type: 'array', contains: { type: 'string' }, minContains: 2, maxContains: 3 };

    expect(extract(schema)).toBe('import "list"\n\nlist.MatchN(>=2 & <=3, string)\n');
  });

  it('reports contains bounds that are not counts', () => {
    const error = extractError({ type: 'array', contains: {}, minContains: -1, maxContains: 1.5 });

    expect(error.errors.map((e) => e.describe())).toEqual([
      '#/minContains: -1 is out of bounds',
      '#/maxContains: 1.5 is not a whole number',
    ]);
  });

  it('translates uniqueItems except in Kubernetes schemas', () => {
    expect(extract({ type: 'array', uniqueItems: true })).toBe(
      'import "list"\n\nlist.UniqueItems()\n'
    );

    const error = extractError(
      { type: 'array', items: {}, uniqueItems: true },
      { defaultVersion: 'k8sAPI' }
    );
    expect(error.message).toBe(
      '#/uniqueItems: cannot set uniqueItems to true in a Kubernetes schema'
    );
  });

  it('excludes named fields from patternProperties and additionalProperties', () => {
    const schema = {
      type: 'object',
      properties: { a: { type: 'string' } },
      patternProperties: { '^x': { type: 'integer' } },
      additionalProperties: { type: 'boolean' },
    };

    expect(extract(schema)).toBe(
      [
        '{',
        '\ta?: string',
        '\t[=~"^x" & !~"^(a)$"]: int',
        '\t[!~"^x" & !~"^(a)$"]: bool',
        '}',
        '',
      ].join('\n')
    );
  });

  it('constrains field names with propertyNames', () => {
    const schema = { type: 'object', propertyNames: { pattern: '^[a-z]+$' } };

    expect(extract(schema)).toBe('{\n\t[=~"^[a-z]+$"]: _\n}\n');
  });

  it('bounds the number of fields', () => {
    expect(extract({ type: 'object', minProperties: 1, maxProperties: 3 })).toBe(
      'import "struct"\n\nstruct.MinFields(1) & struct.MaxFields(3)\n'
    );
  });

  it('translates multipleOf and rejects a non-positive divisor', () => {
    expect(extract({ type: 'number', multipleOf: 0.5 })).toBe(
      'import "math"\n\nmath.MultipleOf(0.5)\n'
    );

    const error = extractError({ multipleOf: 0 });
    expect(error.message).toBe('#/multipleOf: "multipleOf" must be strictly greater than 0');
  });

  it('adds null for OpenAPI nullable', () => {
    expect(extract({ type: 'string', nullable: true }, { defaultVersion: 'openapi' })).toBe(
      'null | string\n'
    );
  });

  it('describes a Kubernetes custom resource', () => {
    const schema = {
      type: 'object',
      'x-kubernetes-group-version-kind': [{ group: 'example.com', version: 'v1', kind: 'Widget' }],
      properties: {
        spec: { 'x-kubernetes-int-or-string': true },
        status: { type: 'object', 'x-kubernetes-preserve-unknown-fields': true },
      },
    };

    expect(extract(schema, { defaultVersion: 'k8sCRD', openOnlyWhenExplicit: true })).toBe(
      [
        '{',
        '\tspec?: int | string',
        '\tstatus?: {...}',
        '\tapiVersion!: "example.com/v1"',
        '\tkind!: "Widget"',
        '\tmetadata?: {...}',
        '}',
        '',
      ].join('\n')
    );
  });

  it('refers to a definition from inside itself', () => {
    const schema = {
      $defs: { n: { type: 'object', properties: { next: { $ref: '#/$defs/n' } } } },
      $ref: '#/$defs/n',
    };

    expect(extract(schema)).toBe(['#n', '#n: {', '\tnext?: #n', '\t...', '}', ''].join('\n'));
  });

  it('translates enum as a disjunction of literals', () => {
    expect(extract({ enum: ['a', 'b'] })).toBe('"a" | "b"\n');
  });

  it('records $schema and honors draft-04 exclusive bounds', () => {
    const schema = {
      $schema: 'http://json-schema.org/draft-04/schema#',
      type: 'number',
      minimum: 0,
      exclusiveMinimum: true,
    };

    expect(extract(schema)).toBe(
      '@jsonschema(schema="http://json-schema.org/draft-04/schema#")\n\n>0\n'
    );
  });

  it('accepts formats outside their version unless strict', () => {
    const schema = { $schema: 'http://json-schema.org/draft-04/schema#', format: 'date' };

    expect(extract(schema)).toBe(
      '@jsonschema(schema="http://json-schema.org/draft-04/schema#")\n\n_\n'
    );

    const error = extractError(schema, { strictKeywords: true });
    expect(error.errors).toHaveLength(1);
    expect(error.errors[0]).toBeInstanceOf(FeatureError);
    expect(error.errorCode).toBe(ErrorCode.UNKNOWN_FORMAT);
    expect(error.message).toBe(
      '#/format: format "date" is not recognized in schema version draft-04'
    );
  });

  it('translates date-time under draft-04', () => {
    const schema = {
      $schema: 'http://json-schema.org/draft-04/schema#',
      type: 'string',
      format: 'date-time',
    };

    expect(extract(schema, { strict: true })).toBe(
      'import "time"\n\n@jsonschema(schema="http://json-schema.org/draft-04/schema#")\n\ntime.Time\n'
    );
  });

  it('reports unknown keywords only in strict mode', () => {
    expect(extract({ foo: 1, 'x-bar': true })).toBe('_\n');

    const error = extractError({ foo: 1, 'x-bar': true }, { strictKeywords: true });
    expect(error.message).toBe('#/foo: unknown keyword "foo"');
    expect(error.errorCode).toBe(ErrorCode.UNKNOWN_KEYWORD);
  });

  it('skips look-around patterns unless strictFeatures is set', () => {
    expect(extract({ type: 'string', pattern: '(?=a)' })).toBe('string\n');

    const error = extractError({ type: 'string', pattern: '(?=a)' }, { strictFeatures: true });
    expect(error.message).toBe(
      '#/pattern: unsupported Perl regexp syntax in "(?=a)": look-around assertion'
    );
  });

  it('reports every problem with its location', () => {
    const error = extractError({ minLength: -1, maxLength: 'x' });

    expect(error.message).toBe(
      [
        '#/minLength: invalid uint',
        '#/maxLength: invalid uint',
      ].join('\n')
    );
    expect(error.errorCode).toBe(ErrorCode.INVALID_KEYWORD_VALUE);
  });

  it('reports references that do not resolve', () => {
    const error = extractError({ $ref: '#/$defs/missing' });

    expect(error.errors[0]).toBeInstanceOf(RefResolutionError);
    expect(error.message).toBe('#/$ref: JSON Pointer reference "/$defs/missing" not found');
    expect(error.errorCode).toBe(ErrorCode.UNRESOLVED_REFERENCE);
  });

  it('rejects an id that is not an absolute URI', () => {
    const error = extractError({}, { id: 'not a uri' });

    expect(error.errors[0]).toBeInstanceOf(ConfigurationError);
    expect(error.message).toBe('invalid id value "not a uri": not an absolute URI');
    expect(error.getExitCode()).toBe(50);
  });

  it('decodes every schema below root as a definition', () => {
    const doc = {
      components: { schemas: { Pet: { type: 'string' }, Age: { type: 'integer' } } },
    };
    const options: ExtractOptions = {
      root: '#/components/schemas',
      map: (tokens) => ok([ident(`#${tokens[tokens.length - 1] ?? ''}`)]),
    };

    expect(extract(doc, options)).toBe('#Age: int\n#Pet: string\n');
  });

  it('decodes the value at root as one schema with singleRoot', () => {
    const doc = { definitions: { main: { type: 'boolean' } } };

    expect(extract(doc, { root: '#/definitions/main', singleRoot: true })).toBe('bool\n');
  });

  it('requires the root to exist unless allowed', () => {
    const error = extractError({}, { root: '#/components/schemas' });
    expect(error.message).toBe('#: root value at path #/components/schemas does not exist');

    expect(extract({}, { root: '#/components/schemas', allowNonExistentRoot: true })).toBe('\n');
  });

  it('writes a package clause', () => {
    expect(extract({ type: 'null' }, { pkgName: 'schemas' })).toBe('package schemas\n\nnull\n');
  });

  it('traces passes to the debug sink', () => {
    const lines: string[] = [];

    extract({ $ref: '#/$defs/a', $defs: { a: {} } }, { debug: (line) => lines.push(line) });

    expect(lines[0]).toBe('[typebridge] extract: pass 0');
    expect(lines).toContain('[typebridge] extract: pass 1');
  });
});
