/**
 * Schema versions and version sets.
 *
 * A version set is a bitset over {@link VERSIONS}; keyword and format
 * applicability tables are expressed with these sets.
 */
import { err, ok, type Result } from '../types/result.js';

export const VERSIONS = [
  'draft-04',
  'draft-06',
  'draft-07',
  '2019-09',
  '2020-12',
  'openapi',
  'k8sAPI',
  'k8sCRD',
] as const;

export type Version = (typeof VERSIONS)[number];

export type VersionSet = number;

/** Versions selected by a `$schema` URI, in release order. */
const DRAFTS = ['draft-04', 'draft-06', 'draft-07', '2019-09', '2020-12'] as const;

export type Draft = (typeof DRAFTS)[number];

export const DEFAULT_VERSION: Version = '2020-12';

const SCHEMA_URIS: Record<Draft, string> = {
  'draft-04': 'http://json-schema.org/draft-04/schema#',
  'draft-06': 'http://json-schema.org/draft-06/schema#',
  'draft-07': 'http://json-schema.org/draft-07/schema#',
  '2019-09': 'https://json-schema.org/draft/2019-09/schema',
  '2020-12': 'https://json-schema.org/draft/2020-12/schema',
};

const DESCRIPTIONS: Record<Version, string> = {
  'draft-04': 'JSON Schema draft 4',
  'draft-06': 'JSON Schema draft 6',
  'draft-07': 'JSON Schema draft 7',
  '2019-09': 'JSON Schema 2019-09',
  '2020-12': 'JSON Schema 2020-12',
  openapi: 'OpenAPI 3.0 schema objects',
  k8sAPI: 'Kubernetes API schemas',
  k8sCRD: 'Kubernetes custom resource definitions',
};

export function versionBit(v: Version): VersionSet {
  return 1 << VERSIONS.indexOf(v);
}

export function vset(...vs: Version[]): VersionSet {
  return vs.reduce((set, v) => set | versionBit(v), 0);
}

/** Drafts from `v` onwards. */
export function vfrom(v: Draft): VersionSet {
  return vset(...DRAFTS.slice(DRAFTS.indexOf(v)));
}

/** Drafts up to and including `v`. */
export function vto(v: Draft): VersionSet {
  return vset(...DRAFTS.slice(0, DRAFTS.indexOf(v) + 1));
}

export function vbetween(from: Draft, to: Draft): VersionSet {
  return vfrom(from) & vto(to);
}

export const allVersions: VersionSet = vset(...DRAFTS);
export const openAPI: VersionSet = vset('openapi');
export const k8s: VersionSet = vset('k8sAPI', 'k8sCRD');
export const openAPILike: VersionSet = openAPI | k8s;

export function isIn(v: Version, set: VersionSet): boolean {
  return (versionBit(v) & set) !== 0;
}

export function isDraft(v: Version): v is Draft {
  return (DRAFTS as readonly string[]).includes(v);
}

/** The `$schema` URI of a draft, undefined for vocabulary flavors. */
export function schemaURI(v: Version): string | undefined {
  return isDraft(v) ? SCHEMA_URIS[v] : undefined;
}

export function describeVersion(v: Version): string {
  return DESCRIPTIONS[v];
}

function normalizeURI(uri: string): string {
  let out = uri.trim();
  if (out.endsWith('#')) out = out.slice(0, -1);
  return out.replace(/^https:\/\//, 'http://');
}

/**
 * Version for a `$schema` URI. http and https are equivalent and a
 * trailing empty fragment is ignored.
 */
export function parseVersion(uri: string): Result<Version, string> {
  const want = normalizeURI(uri);
  for (const d of DRAFTS) {
    if (normalizeURI(SCHEMA_URIS[d]) === want) {
      return ok(d);
    }
  }
  return err(`unknown $schema version ${JSON.stringify(uri)}`);
}

/** Version by name, as accepted in configuration. */
export function versionFromName(name: string): Result<Version, string> {
  const found = VERSIONS.find((v) => v === name);
  return found === undefined
    ? err(`unknown schema version ${JSON.stringify(name)} (want one of ${VERSIONS.join(', ')})`)
    : ok(found);
}

/**
 * Parses a version set spec from the data tables: `all`, `openapi`,
 * `k8s`, a version name, or `>=v` / `<=v` for a range of drafts.
 */
export function parseVersionSpec(spec: string): VersionSet {
  switch (spec) {
    case 'all':
      return allVersions;
    case 'openapi':
      return openAPI;
    case 'k8s':
      return k8s;
  }
  const range = /^(>=|<=)(.+)$/.exec(spec);
  if (range !== null) {
    const [, op, name] = range;
    const d = DRAFTS.find((x) => x === name);
    if (d === undefined) {
      throw new Error(`invalid version range ${JSON.stringify(spec)}`);
    }
    return op === '>=' ? vfrom(d) : vto(d);
  }
  const v = VERSIONS.find((x) => x === spec);
  if (v === undefined) {
    throw new Error(`invalid version spec ${JSON.stringify(spec)}`);
  }
  return versionBit(v);
}

export function parseVersionSpecs(specs: readonly string[]): VersionSet {
  return specs.reduce((set, s) => set | parseVersionSpec(s), 0);
}
