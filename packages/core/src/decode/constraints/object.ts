import {
  attr,
  binary,
  call,
  field,
  ident,
  isTop,
  labelName,
  list,
  selector,
  str,
  struct,
  top,
  unary,
  type BasicLit,
  type Decl,
  type Expr,
  type Field,
  type Ident,
} from '../../syntax/ast.js';
import { labelForSelector, stringSel } from '../../syntax/path.js';
import { Kind, TopKind, kindString } from '../../host/kind.js';
import { CoreType } from '../core-types.js';
import { schemaComment, type SchemaState } from '../state.js';
import type { SchemaNode } from '../schema-node.js';

// Object constraints.

/** A bare identifier where the name allows one, a quoted string otherwise. */
export function fieldLabel(name: string): Ident | BasicLit {
  const label = labelForSelector(stringSel(name));
  return label.isOk() ? label.value : str(name);
}

function quoteMeta(s: string): string {
  return s.replace(/[\\.+*?()|[\]{}^$]/g, '\\$&');
}

/**
 * `!~"^(a|b)$"`, excluding the named fields of `decls` from a pattern
 * constraint. Undefined when there are no named fields.
 */
export function excludeFields(decls: readonly Decl[]): Expr | undefined {
  const names: string[] = [];
  for (const d of decls) {
    if (d.kind !== 'field') continue;
    const name = labelName(d.label);
    if (name !== undefined && name !== '') {
      names.push(quoteMeta(name));
    }
  }
  if (names.length === 0) {
    return undefined;
  }
  return unary('!~', str(`^(${names.join('|')})$`));
}

export function constraintProperties(key: string, n: SchemaNode, s: SchemaState): void {
  const obj = s.object(n);
  if (!n.is(Kind.Struct)) {
    s.errf(n, `${JSON.stringify(key)} expected an object, found ${kindString(n.kind())}`);
    return;
  }
  s.hasProperties = true;
  for (const [name, value] of n.fields()) {
    const sub = s.schemaState(value, TopKind, (ss) => {
      ss.preserveUnknownFields = false;
    });
    const f = field(fieldLabel(name), sub.expr, 'optional');
    const doc = schemaComment(sub.info);
    if (doc !== undefined) {
      f.doc = doc;
    }
    if (sub.info.deprecated) {
      f.attrs = [attr('@deprecated()')];
    }
    obj.elts.push(f);
  }
}

export function constraintRequired(key: string, n: SchemaNode, s: SchemaState): void {
  if (!n.is(Kind.List)) {
    s.errf(n, `value of "required" must be list of strings, found ${kindString(n.kind())}`);
    return;
  }
  const obj = s.object(n);
  const fields = new Map<string, Field>();
  for (const d of obj.elts) {
    if (d.kind !== 'field') continue;
    const name = labelName(d.label);
    if (name !== undefined) {
      fields.set(name, d);
    }
  }
  for (const item of s.listItems(key, n, true)) {
    const name = s.decoder.strValue(item);
    if (name === undefined) {
      continue;
    }
    const f = fields.get(name);
    if (f === undefined) {
      const added = field(fieldLabel(name), top(), 'required');
      fields.set(name, added);
      obj.elts.push(added);
      continue;
    }
    if (f.constraint !== 'optional') {
      s.errf(item, `duplicate required field ${JSON.stringify(name)}`);
    }
    f.constraint = 'required';
  }
}

export function constraintPatternProperties(key: string, n: SchemaNode, s: SchemaState): void {
  if (!n.is(Kind.Struct)) {
    s.errf(n, `value of ${JSON.stringify(key)} must be an object, found ${kindString(n.kind())}`);
    return;
  }
  const obj = s.object(n);
  const existing = excludeFields(obj.elts);
  for (const [pattern, value] of n.fields()) {
    if (!s.decoder.checkRegexp(value, pattern)) {
      continue;
    }
    // Recorded for additionalProperties, which runs later.
    s.patterns.push(unary('!~', str(pattern)));
    const match = unary('=~', str(pattern));
    const label = existing === undefined ? match : binary('&', match, existing);
    obj.elts.push(field(list(label), s.schema(value)));
  }
}

export function constraintAdditionalProperties(key: string, n: SchemaNode, s: SchemaState): void {
  s.hasAdditionalProperties = true;
  if (n.is(Kind.Bool)) {
    s.openness = s.decoder.boolValue(n) === true ? 'explicitlyOpen' : 'explicitlyClosed';
    s.object(n);
    return;
  }
  if (!n.is(Kind.Struct)) {
    s.errf(n, `value of ${JSON.stringify(key)} must be an object or boolean`);
    return;
  }
  const obj = s.object(n);
  const value = s.schemaState(n, TopKind, (ss) => {
    ss.preserveUnknownFields = false;
  }).expr;
  s.openness = 'allFieldsCovered';
  const excluded = excludeFields(obj.elts);
  const parts = excluded === undefined ? [...s.patterns] : [...s.patterns, excluded];
  const [first, ...rest] = parts;
  const label = first === undefined ? ident('string') : binary('&', first, ...rest);
  obj.elts.push(field(list(label), value));
}

export function constraintPropertyNames(_key: string, n: SchemaNode, s: SchemaState): void {
  const names = s.schemaState(n, Kind.String).expr;
  if (!isTop(names)) {
    s.add(CoreType.Object, n, struct(field(list(names), top())));
  }
}

export function constraintMinProperties(_key: string, n: SchemaNode, s: SchemaState): void {
  const pkg = s.decoder.addImport('struct');
  s.add(CoreType.Object, n, call(selector(pkg, 'MinFields'), s.decoder.uint(n)));
}

export function constraintMaxProperties(_key: string, n: SchemaNode, s: SchemaState): void {
  const pkg = s.decoder.addImport('struct');
  s.add(CoreType.Object, n, call(selector(pkg, 'MaxFields'), s.decoder.uint(n)));
}
