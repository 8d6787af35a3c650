import { top, type Expr } from '../../syntax/ast.js';
import { ErrorCode } from '../../errors/codes.js';
import { Kind, kindString } from '../../host/kind.js';
import { DEFAULT_ROOT_ID_HOST } from '../../types/options.js';
import { splitFragment, urlFragment, urlWithoutFragment } from '../ref.js';
import type { DefinedSchema } from '../decoder.js';
import type { SchemaNode } from '../schema-node.js';
import type { SchemaState } from '../state.js';

// $id, $ref and definitions.

/**
 * The absolute URI for a `$id` or `$ref` value, resolved against the
 * nearest enclosing base URI.
 */
export function resolveURI(n: SchemaNode, s: SchemaState): URL | undefined {
  const text = s.decoder.strValue(n);
  if (text === undefined) {
    return undefined;
  }
  let u: URL;
  try {
    u = new URL(text);
  } catch {
    try {
      return new URL(text, s.schemaRoot().id);
    } catch (cause) {
      s.refErrf(n, `invalid JSON reference ${JSON.stringify(text)}: ${cause instanceof Error ? cause.message : String(cause)}`);
      return undefined;
    }
  }
  if (u.hostname === DEFAULT_ROOT_ID_HOST) {
    s.refErrf(n, `invalid use of default root ID host (${DEFAULT_ROOT_ID_HOST}) in URI`);
    return undefined;
  }
  return u;
}

export function constraintID(_key: string, n: SchemaNode, s: SchemaState): void {
  const u = resolveURI(n, s);
  if (u === undefined) {
    return;
  }
  if (u.hash !== '') {
    // Plain-name fragments were anchors before 2019-09.
    if (s.decoder.cfg.strictFeatures) {
      s.decoder.featureErrf(n, '$id URI may not contain a fragment', ErrorCode.UNSUPPORTED_FEATURE);
    }
    return;
  }
  s.id = u;
  s.decoder.idNodes.set(urlWithoutFragment(u), s.pos);
}

export function constraintRef(_key: string, n: SchemaNode, s: SchemaState): void {
  const u = resolveURI(n, s);
  if (u === undefined) {
    return;
  }
  const tokens = splitFragment(u);
  if (tokens.isErr()) {
    s.refErrf(n, tokens.error);
    return;
  }
  const expr = makeRef(n, u, tokens.value, s);
  if (expr !== undefined) {
    s.all.add(n, expr);
  }
}

function makeRef(n: SchemaNode, u: URL, tokens: readonly string[], s: SchemaState): Expr | undefined {
  const d = s.decoder;
  const docRoot = d.idNodes.get(urlWithoutFragment(u));
  if (docRoot !== undefined) {
    const target = docRoot.lookup(tokens);
    if (target === undefined) {
      d.refErrf(n, `JSON Pointer reference ${JSON.stringify(urlFragment(u))} not found`, ErrorCode.UNRESOLVED_REFERENCE);
      return undefined;
    }
    const def = d.defForValue.get(target.pointer);
    if (def === undefined) {
      // The target has no definition yet; a later pass fills this in.
      d.ensureDefinition(target);
      return top();
    }
    if (def === null) {
      return top();
    }
    return s.refExpr(n, def.importPath, def.path);
  }

  d.externalRefSeen = true;
  let def: DefinedSchema | undefined = d.defs.get(u.href);
  if (def === undefined) {
    const mapped = d.cfg.mapRef({ id: u, isLocal: false, path: [] });
    if (mapped.isErr()) {
      d.refErrf(n, `cannot determine import path for ${u.href}: ${mapped.error}`, ErrorCode.EXTERNAL_REFERENCE);
      return undefined;
    }
    def = { importPath: mapped.value.importPath, path: mapped.value.path };
    d.defs.set(u.href, def);
  }
  return s.refExpr(n, def.importPath, def.path);
}

/** `$defs` and `definitions`: every entry becomes a definition. */
export function constraintAddDefinitions(key: string, n: SchemaNode, s: SchemaState): void {
  if (!n.is(Kind.Struct)) {
    s.errf(n, `${JSON.stringify(key)} expected an object, found ${kindString(n.kind())}`);
    return;
  }
  for (const [, value] of n.fields()) {
    s.decoder.ensureDefinition(value);
    s.schema(value);
  }
}
