/**
 * URI handling for `$id` and `$ref`, and the default mapping from schema
 * locations to output locations.
 */
import { posix } from 'node:path';
import { ident, str, type BasicLit, type Ident } from '../syntax/ast.js';
import {
  isValidIdent,
  pathConcat,
  pathToJSONPointer,
  selectorForLabel,
  stringSel,
  type Path,
  type Selector,
} from '../syntax/path.js';
import { err, ok, type Result } from '../types/result.js';
import type {
  MapFunc,
  MappedLocation,
  MapRefFunc,
  MapURLFunc,
  SchemaLoc,
} from '../types/options.js';
import { jsonPointerFromTokens, jsonPointerTokens } from '../util/json-pointer.js';

/** Top-level name for definitions whose names are not identifiers. */
export const ROOT_DEFS = '#';

/** Hidden namespace for schemas that are referenced but not under `$defs`. */
export const INTERNAL_DEFS = '_#defs';

/** The decoded fragment of a URL, without the leading `#`. */
export function urlFragment(u: URL): string {
  const hash = u.hash.startsWith('#') ? u.hash.slice(1) : u.hash;
  try {
    return decodeURIComponent(hash);
  } catch {
    return hash;
  }
}

/** The URL without its fragment, as used to compare schema roots. */
export function urlWithoutFragment(u: URL): string {
  const copy = new URL(u.href);
  copy.hash = '';
  const href = copy.href;
  // `https://h` and `https://h/` name the same document.
  return copy.pathname === '/' && copy.search === '' ? href.slice(0, -1) : href;
}

export function withFragment(u: URL, fragment: string): URL {
  const copy = new URL(u.href);
  copy.hash = fragment === '' ? '' : fragment;
  return copy;
}

/** `scheme:opaque` URIs have no authority and no absolute path. */
function opaquePart(u: URL): string | undefined {
  if (u.host !== '' || u.pathname.startsWith('/')) {
    return undefined;
  }
  return u.pathname;
}

// WHATWG URLs give `https://h` the path "/"; treat it as empty.
function urlPath(u: URL): string {
  return u.pathname === '/' ? '' : u.pathname;
}

/**
 * JSON Pointer tokens for a URL fragment. Non-pointer fragments are
 * anchors, which have no translation.
 */
export function splitFragment(u: URL): Result<string[], string> {
  const fragment = urlFragment(u);
  if (fragment !== '' && !fragment.startsWith('/')) {
    return err(`anchors (${fragment}) not supported`);
  }
  return jsonPointerTokens(fragment);
}

/**
 * Parses the `root` option: a fragment-only reference such as
 * `#/components/schemas`. A trailing `/` is ignored.
 */
export function parseRootRef(ref: string): Result<Path, string> {
  let u: URL;
  try {
    u = new URL(ref, 'root:');
  } catch (cause) {
    return err(`invalid JSON reference: ${cause instanceof Error ? cause.message : String(cause)}`);
  }
  if (u.protocol !== 'root:' || u.pathname !== '' || u.search !== '') {
    return err(`external references (${ref}) not supported in root`);
  }
  let fragment = urlFragment(u);
  if (fragment.endsWith('/')) {
    fragment = fragment.slice(0, -1);
  }
  const tokens = jsonPointerTokens(fragment);
  if (tokens.isErr()) return tokens;
  return ok(tokens.value.map(stringSel));
}

/**
 * The default location mapping:
 *
 *	#                    the root
 *	#/definitions/foo    #foo, or #: "foo" when foo is not an identifier
 *	#/$defs/foo          likewise
 *	anything else        _#defs: "<pointer>"
 */
export function defaultMap(tokens: readonly string[]): Result<Array<Ident | BasicLit>, string> {
  if (tokens.length === 0) {
    return ok([]);
  }
  const [section, name] = tokens;
  if (tokens.length !== 2 || name === undefined || (section !== 'definitions' && section !== '$defs')) {
    return ok([ident(INTERNAL_DEFS), str(jsonPointerFromTokens(tokens))]);
  }
  if (isValidIdent(name) && !name.startsWith('#') && !name.startsWith('_')) {
    return ok([ident(`#${name}`)]);
  }
  return ok([ident(ROOT_DEFS), str(name)]);
}

/**
 * Import path for an external schema URL: host and path, with a
 * `:qualifier` suffix when the last path element is not an identifier.
 * Opaque URIs are base64url encoded.
 */
export function defaultMapURL(u: URL): Result<MappedLocation, string> {
  let p = urlPath(u);
  const opaque = opaquePart(u);
  let base = posix.basename(p) || '.';
  if (!isValidIdent(base)) {
    base = base.replace(/\.json$/, '');
    if (!isValidIdent(base)) {
      base = 'schema';
    }
    p += `:${base}`;
  }
  if (opaque !== undefined) {
    return ok({ importPath: Buffer.from(opaque).toString('base64url'), path: [] });
  }
  return ok({ importPath: `${u.host}${p}`, path: [] });
}

export function labelsToPath(labels: ReadonlyArray<Ident | BasicLit>): Result<Path, string> {
  const path: Selector[] = [];
  for (const label of labels) {
    const sel = selectorForLabel(label);
    if (sel.isErr()) return sel;
    path.push(sel.value);
  }
  return ok(path);
}

/** A `mapRef` built from `map` and `mapURL`, each defaulted. */
export function makeMapRef(map: MapFunc = defaultMap, mapURL: MapURLFunc = defaultMapURL): MapRefFunc {
  return (loc: SchemaLoc) => {
    let fragment: string;
    let importPath = '';
    let basePath: Path = [];
    if (loc.isLocal) {
      const pointer = pathToJSONPointer(loc.path);
      if (pointer.isErr()) return pointer;
      fragment = pointer.value;
    } else {
      fragment = urlFragment(loc.id);
      const mapped = mapURL(withFragment(loc.id, ''));
      if (mapped.isErr()) return mapped;
      importPath = mapped.value.importPath;
      basePath = mapped.value.path;
    }
    if (fragment !== '' && !fragment.startsWith('/')) {
      return err(`anchors (${fragment}) not supported`);
    }
    const tokens = jsonPointerTokens(fragment);
    if (tokens.isErr()) return tokens;
    const labels = map(tokens.value);
    if (labels.isErr()) return labels;
    const rel = labelsToPath(labels.value);
    if (rel.isErr()) return rel;
    return ok({ importPath, path: pathConcat(basePath, rel.value) });
  };
}

/** mapRef with every default. */
export const defaultMapRef: MapRefFunc = makeMapRef();
