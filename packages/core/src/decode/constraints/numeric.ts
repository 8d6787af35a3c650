import { call, selector, unary } from '../../syntax/ast.js';
import { Kind } from '../../host/kind.js';
import { describeVersion, isIn, openAPILike, vset } from '../../versions/version.js';
import { CoreType } from '../core-types.js';
import type { SchemaNode } from '../schema-node.js';
import type { SchemaState } from '../state.js';

// Draft 4 and OpenAPI write exclusive bounds as booleans beside minimum
// and maximum; later drafts give the bound itself.
const booleanExclusive = vset('draft-04') | openAPILike;

export function constraintMinimum(_key: string, n: SchemaNode, s: SchemaState): void {
  s.add(CoreType.Number, n, unary(s.exclusiveMin ? '>' : '>=', s.decoder.number(n)));
}

export function constraintMaximum(_key: string, n: SchemaNode, s: SchemaState): void {
  s.add(CoreType.Number, n, unary(s.exclusiveMax ? '<' : '<=', s.decoder.number(n)));
}

export function constraintExclusiveMinimum(key: string, n: SchemaNode, s: SchemaState): void {
  if (!checkExclusiveForm(key, n, s)) {
    return;
  }
  if (n.is(Kind.Bool)) {
    s.exclusiveMin = s.decoder.boolValue(n) === true;
    return;
  }
  s.add(CoreType.Number, n, unary('>', s.decoder.number(n)));
}

export function constraintExclusiveMaximum(key: string, n: SchemaNode, s: SchemaState): void {
  if (!checkExclusiveForm(key, n, s)) {
    return;
  }
  if (n.is(Kind.Bool)) {
    s.exclusiveMax = s.decoder.boolValue(n) === true;
    return;
  }
  s.add(CoreType.Number, n, unary('<', s.decoder.number(n)));
}

function checkExclusiveForm(key: string, n: SchemaNode, s: SchemaState): boolean {
  const wantBool = isIn(s.schemaVersion, booleanExclusive);
  if (wantBool && !n.is(Kind.Bool)) {
    s.errf(n, `value of ${JSON.stringify(key)} must be a boolean in ${describeVersion(s.schemaVersion)}`);
    return false;
  }
  if (!wantBool && n.is(Kind.Bool)) {
    s.errf(n, `value of ${JSON.stringify(key)} must be a number in ${describeVersion(s.schemaVersion)}`);
    return false;
  }
  return true;
}

export function constraintMultipleOf(_key: string, n: SchemaNode, s: SchemaState): void {
  const value = s.decoder.numberValue(n);
  if (value === undefined) {
    return;
  }
  if (value <= 0) {
    s.errf(n, '"multipleOf" must be strictly greater than 0');
    return;
  }
  const math = s.decoder.addImport('math');
  s.add(CoreType.Number, n, call(selector(math, 'MultipleOf'), s.decoder.number(n)));
}
