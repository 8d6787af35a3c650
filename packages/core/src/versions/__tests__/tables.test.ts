import { describe, it, expect } from 'vitest';

import { KEYWORDS, lookupFormat, lookupKeyword } from '../tables.js';
import {
  VERSIONS,
  isIn,
  parseVersion,
  parseVersionSpec,
  schemaURI,
  versionFromName,
  vfrom,
  vset,
  vto,
} from '../version.js';

describe('version sets', () => {
  it('selects draft ranges', () => {
    expect(isIn('draft-07', vfrom('draft-07'))).toBe(true);
    expect(isIn('draft-06', vfrom('draft-07'))).toBe(false);
    expect(isIn('openapi', vfrom('draft-04'))).toBe(false);
    expect(isIn('2019-09', vto('2019-09'))).toBe(true);
    expect(isIn('2020-12', vto('2019-09'))).toBe(false);
  });

  it('parses table specs', () => {
    expect(parseVersionSpec('>=2019-09')).toBe(vset('2019-09', '2020-12'));
    expect(parseVersionSpec('k8s')).toBe(vset('k8sAPI', 'k8sCRD'));
    expect(parseVersionSpec('draft-04')).toBe(vset('draft-04'));
    expect(() => parseVersionSpec('>=openapi')).toThrow('invalid version range ">=openapi"');
  });
});

describe('parseVersion', () => {
  it('recognizes $schema URIs with either scheme and an optional empty fragment', () => {
    expect(parseVersion('http://json-schema.org/draft-07/schema#')).toMatchObject({
      value: 'draft-07',
    });
    expect(parseVersion('https://json-schema.org/draft-07/schema')).toMatchObject({
      value: 'draft-07',
    });
    expect(parseVersion('https://json-schema.org/draft/2020-12/schema')).toMatchObject({
      value: '2020-12',
    });
  });

  it('rejects unknown URIs', () => {
    expect(parseVersion('https://example.com/schema')).toMatchObject({
      error: 'unknown $schema version "https://example.com/schema"',
    });
  });

  it('maps drafts back to their URIs', () => {
    expect(schemaURI('2019-09')).toBe('https://json-schema.org/draft/2019-09/schema');
    expect(schemaURI('openapi')).toBeUndefined();
  });

  it('accepts version names from configuration', () => {
    expect(versionFromName('k8sCRD')).toMatchObject({ value: 'k8sCRD' });
    expect(versionFromName('draft-3').isErr()).toBe(true);
    expect(VERSIONS).toContain('2020-12');
  });
});

describe('keyword table', () => {
  it('orders $schema and $id before the other keywords', () => {
    expect(lookupKeyword('$schema')?.phase).toBe(0);
    expect(lookupKeyword('$id')?.phase).toBe(0);
    expect(lookupKeyword('type')?.phase).toBe(1);
    expect(lookupKeyword('required')?.phase).toBe(2);
    expect(lookupKeyword('additionalProperties')?.phase).toBe(3);
  });

  it('records the versions each keyword belongs to', () => {
    const prefixItems = lookupKeyword('prefixItems');
    const nullable = lookupKeyword('nullable');

    expect(prefixItems !== undefined && isIn('2020-12', prefixItems.versions)).toBe(true);
    expect(prefixItems !== undefined && isIn('2019-09', prefixItems.versions)).toBe(false);
    expect(nullable !== undefined && isIn('openapi', nullable.versions)).toBe(true);
    expect(nullable !== undefined && isIn('2020-12', nullable.versions)).toBe(false);
  });

  it('marks recognized keywords without a translation', () => {
    expect(lookupKeyword('unevaluatedProperties')?.status).toBe('todo');
    expect(lookupKeyword('readOnly')?.status).toBe('annotation');
    expect(lookupKeyword('minLength')?.status).toBe('implemented');
    expect(lookupKeyword('nope')).toBeUndefined();
  });

  it('gives every keyword a phase from 0 to 3', () => {
    for (const info of KEYWORDS.values()) {
      expect([0, 1, 2, 3]).toContain(info.phase);
    }
  });
});

describe('format table', () => {
  it('knows which formats translate', () => {
    expect(lookupFormat('date-time')?.handler).toBe('dateTime');
    expect(lookupFormat('date')?.handler).toBe('date');
    expect(lookupFormat('email')?.handler).toBeUndefined();
    expect(lookupFormat('nope')).toBeUndefined();
  });

  it('limits date to draft-07 onwards', () => {
    const date = lookupFormat('date');

    expect(date !== undefined && isIn('draft-04', date.versions)).toBe(false);
    expect(date !== undefined && isIn('draft-07', date.versions)).toBe(true);
  });
});
