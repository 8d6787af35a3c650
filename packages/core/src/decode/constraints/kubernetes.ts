import { ident } from '../../syntax/ast.js';
import { Kind } from '../../host/kind.js';
import { CoreType } from '../core-types.js';
import type { SchemaNode } from '../schema-node.js';
import type { SchemaState } from '../state.js';

// Kubernetes OpenAPI extensions.

/**
 * Records the apiVersion and kind a resource schema requires. A list of
 * several group-version-kinds leaves both unconstrained.
 */
export function constraintGroupVersionKind(key: string, n: SchemaNode, s: SchemaState): void {
  const items = s.listItems(key, n, false);
  const [gvk] = items;
  if (gvk === undefined || items.length !== 1) {
    return;
  }
  if (!gvk.is(Kind.Struct)) {
    s.errf(gvk, `value of ${JSON.stringify(key)} must be a list of objects`);
    return;
  }
  const text = (name: string): string => {
    const f = gvk.field(name);
    return f === undefined ? '' : (s.decoder.strValue(f) ?? '');
  };
  const group = text('group');
  const version = text('version');
  const kind = text('kind');
  if (version === '' || kind === '') {
    s.errf(gvk, `${JSON.stringify(key)} requires a version and a kind`);
    return;
  }
  s.k8sAPIVersion = group === '' ? version : `${group}/${version}`;
  s.k8sResourceKind = kind;
}

export function constraintEmbeddedResource(_key: string, n: SchemaNode, s: SchemaState): void {
  if (s.decoder.boolValue(n) === true) {
    s.embeddedResource = true;
  }
}

export function constraintIntOrString(_key: string, n: SchemaNode, s: SchemaState): void {
  if (s.decoder.boolValue(n) !== true) {
    return;
  }
  s.allowedTypes &= Kind.Int | Kind.String;
  s.add(CoreType.Number, n, ident('int'));
}

export function constraintPreserveUnknownFields(_key: string, n: SchemaNode, s: SchemaState): void {
  if (s.schemaVersion === 'k8sCRD' && s.decoder.boolValue(n) === true) {
    s.preserveUnknownFields = true;
  }
}
