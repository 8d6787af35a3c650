import {
  binary,
  call,
  ellipsis,
  isErrorCall,
  isTop,
  list,
  num,
  selector,
  unary,
  type Ellipsis,
  type Expr,
} from '../../syntax/ast.js';
import { Kind } from '../../host/kind.js';
import { isIn, k8s, vfrom, vto } from '../../versions/version.js';
import { CoreType } from '../core-types.js';
import type { SchemaNode } from '../schema-node.js';
import type { SchemaState } from '../state.js';

/** The open tail of a list whose further elements match `elem`. */
function tail(elem: Expr): Ellipsis | undefined {
  if (isErrorCall(elem)) {
    return undefined;
  }
  return isTop(elem) ? ellipsis() : ellipsis(elem);
}

export function constraintItems(key: string, n: SchemaNode, s: SchemaState): void {
  if (n.is(Kind.List)) {
    if (!isIn(s.schemaVersion, vto('2019-09'))) {
      s.errf(n, 'from version 2020-12 onwards, the value of "items" must be an object or a boolean');
      return;
    }
    s.listItemsIsArray = true;
    s.hasItems = true;
    constraintPrefixItems(key, n, s);
    return;
  }
  s.hasItems = true;
  if (isIn(s.schemaVersion, vfrom('2020-12')) && s.pos.field('prefixItems') !== undefined) {
    // Applies after the prefix; prefixItems takes it as the tail.
    return;
  }
  const t = tail(s.schema(n));
  s.add(CoreType.Array, n, t === undefined ? list() : list(t));
}

export function constraintPrefixItems(key: string, n: SchemaNode, s: SchemaState): void {
  const elts: Array<Expr | Ellipsis> = s.listItems(key, n, true).map((item) => s.schema(item));
  const rest = isIn(s.schemaVersion, vfrom('2020-12')) ? s.pos.field('items') : undefined;
  if (rest === undefined) {
    elts.push(ellipsis());
  } else {
    const t = tail(s.schema(rest));
    if (t !== undefined) {
      elts.push(t);
    }
  }
  s.list = list(...elts);
  s.add(CoreType.Array, n, s.list);
}

/** Governs the elements after an array-valued `items`. */
export function constraintAdditionalItems(_key: string, n: SchemaNode, s: SchemaState): void {
  const l = s.list;
  if (l === undefined || !s.listItemsIsArray) {
    return;
  }
  const last = l.elts[l.elts.length - 1];
  if (last !== undefined && last.kind === 'ellipsis') {
    l.elts.pop();
  }
  if (n.is(Kind.Bool)) {
    if (s.decoder.boolValue(n) === true) {
      l.elts.push(ellipsis());
    }
    return;
  }
  const t = tail(s.schema(n));
  if (t !== undefined) {
    l.elts.push(t);
  }
}

export function constraintContains(_key: string, n: SchemaNode, s: SchemaState): void {
  const elem = s.schema(n);
  let count: Expr = unary('>=', num(s.minContains ?? 1));
  if (s.maxContains !== undefined) {
    count = binary('&', count, unary('<=', num(s.maxContains)));
  }
  const pkg = s.decoder.addImport('list');
  s.add(CoreType.Array, n, call(selector(pkg, 'MatchN'), count, elem));
}

export function constraintMinContains(_key: string, n: SchemaNode, s: SchemaState): void {
  const value = s.decoder.uintValue(n);
  if (value !== undefined) {
    s.minContains = value;
  }
}

export function constraintMaxContains(_key: string, n: SchemaNode, s: SchemaState): void {
  const value = s.decoder.uintValue(n);
  if (value !== undefined) {
    s.maxContains = value;
  }
}

export function constraintMinItems(_key: string, n: SchemaNode, s: SchemaState): void {
  const pkg = s.decoder.addImport('list');
  s.add(CoreType.Array, n, call(selector(pkg, 'MinItems'), s.decoder.uint(n)));
}

export function constraintMaxItems(_key: string, n: SchemaNode, s: SchemaState): void {
  const pkg = s.decoder.addImport('list');
  s.add(CoreType.Array, n, call(selector(pkg, 'MaxItems'), s.decoder.uint(n)));
}

export function constraintUniqueItems(_key: string, n: SchemaNode, s: SchemaState): void {
  if (s.decoder.boolValue(n) !== true) {
    return;
  }
  if (isIn(s.schemaVersion, k8s)) {
    s.errf(n, 'cannot set uniqueItems to true in a Kubernetes schema');
    return;
  }
  const pkg = s.decoder.addImport('list');
  s.add(CoreType.Array, n, call(selector(pkg, 'UniqueItems')));
}
