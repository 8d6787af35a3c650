import { call, ident, list, num, unary, type Expr } from '../../syntax/ast.js';
import { Kind, type KindSet } from '../../host/kind.js';
import type { SchemaNode } from '../schema-node.js';
import type { SchemaState } from '../state.js';

// Constraint combinators.

function matchN(count: Expr, members: Expr[]): Expr {
  return call(ident('matchN'), count, list(...members));
}

function members(key: string, n: SchemaNode, s: SchemaState): SchemaNode[] {
  const items = s.listItems(key, n, true);
  if (n.is(Kind.List) && items.length === 0) {
    s.errf(n, `${key} requires at least one subschema`);
  }
  return items;
}

export function constraintAllOf(key: string, n: SchemaNode, s: SchemaState): void {
  let knownTypes: KindSet = Kind.Bottom;
  const a: Expr[] = [];
  for (const item of members(key, n, s)) {
    const sub = s.schemaState(item, s.allowedTypes);
    s.allowedTypes &= sub.info.allowedTypes;
    if (sub.info.hasConstraints) {
      // knownTypes only serves to drop redundant type disjuncts, so the
      // union over constrained members is enough.
      knownTypes |= sub.info.knownTypes;
      a.push(sub.expr);
    }
  }
  const [only] = a;
  if (only === undefined) {
    return;
  }
  s.knownTypes &= knownTypes;
  s.all.add(n, a.length === 1 ? only : matchN(num(a.length), a));
}

export function constraintAnyOf(key: string, n: SchemaNode, s: SchemaState): void {
  let types: KindSet = Kind.Bottom;
  let knownTypes: KindSet = Kind.Bottom;
  const items = members(key, n, s);
  if (items.length === 0) {
    return;
  }
  const a: Expr[] = [];
  for (const item of items) {
    const sub = s.schemaState(item, s.allowedTypes);
    if (sub.info.allowedTypes === Kind.Bottom) {
      continue;
    }
    types |= sub.info.allowedTypes;
    knownTypes |= sub.info.knownTypes;
    a.push(sub.expr);
  }
  const [only] = a;
  if (only === undefined) {
    s.allowedTypes = Kind.Bottom;
    return;
  }
  if (a.length === 1) {
    s.all.add(n, only);
    return;
  }
  s.allowedTypes &= types;
  s.knownTypes &= knownTypes;
  s.all.add(n, matchN(unary('>=', num(1)), a));
}

export function constraintOneOf(key: string, n: SchemaNode, s: SchemaState): void {
  let types: KindSet = Kind.Bottom;
  let knownTypes: KindSet = Kind.Bottom;
  let needsConstraint = false;
  const items = members(key, n, s);
  if (items.length === 0) {
    return;
  }
  const a: Expr[] = [];
  for (const item of items) {
    const sub = s.schemaState(item, s.allowedTypes);
    if (sub.info.allowedTypes === Kind.Bottom) {
      continue;
    }
    // Unconstrained members that share a type still need matchN to keep
    // them mutually exclusive.
    if (sub.info.hasConstraints || (types & sub.info.allowedTypes) !== 0) {
      needsConstraint = true;
    }
    types |= sub.info.allowedTypes;
    knownTypes |= sub.info.knownTypes;
    a.push(sub.expr);
  }
  s.allowedTypes &= types;
  const [only] = a;
  if (only === undefined || !needsConstraint) {
    return;
  }
  s.knownTypes &= knownTypes;
  s.all.add(n, a.length === 1 ? only : matchN(num(1), a));
}

export function constraintNot(_key: string, n: SchemaNode, s: SchemaState): void {
  s.all.add(n, matchN(num(0), [s.schema(n)]));
}

// if, then and else are applied together once every keyword has run.

export function constraintIf(_key: string, n: SchemaNode, s: SchemaState): void {
  s.ifConstraint = n;
}

export function constraintThen(_key: string, n: SchemaNode, s: SchemaState): void {
  s.thenConstraint = n;
}

export function constraintElse(_key: string, n: SchemaNode, s: SchemaState): void {
  s.elseConstraint = n;
}
