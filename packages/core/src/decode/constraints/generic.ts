import { binary, ident, nullLit, type Expr } from '../../syntax/ast.js';
import { ErrorCode } from '../../errors/codes.js';
import { Kind, NumberKind, kindString, type KindSet } from '../../host/kind.js';
import { isIn, parseVersion, vfrom } from '../../versions/version.js';
import { CoreType } from '../core-types.js';
import type { SchemaNode } from '../schema-node.js';
import type { SchemaState } from '../state.js';

// Generic constraints: types, values and documentation.

export function constraintSchema(_key: string, n: SchemaNode, s: SchemaState): void {
  if (!s.isRoot && !isIn(s.schemaVersion, vfrom('2019-09'))) {
    s.errf(n, `$schema can only appear at the root in JSON Schema version ${s.schemaVersion}`);
    return;
  }
  const uri = s.decoder.strValue(n);
  if (uri === undefined) {
    return;
  }
  const version = parseVersion(uri);
  if (version.isErr()) {
    s.decoder.featureErrf(n, version.error, ErrorCode.UNKNOWN_SCHEMA_VERSION);
    return;
  }
  s.schemaVersion = version.value;
  s.schemaVersionPresent = true;
}

export function constraintType(_key: string, n: SchemaNode, s: SchemaState): void {
  let types: KindSet = Kind.Bottom;
  const set = (item: SchemaNode): void => {
    const name = s.decoder.strValue(item);
    if (name === undefined) {
      return;
    }
    switch (name) {
      case 'null':
        types |= Kind.Null;
        break;
      case 'boolean':
        types |= Kind.Bool;
        break;
      case 'string':
        types |= Kind.String;
        break;
      case 'number':
        types |= NumberKind;
        break;
      case 'integer':
        types |= Kind.Int;
        break;
      case 'array':
        types |= Kind.List;
        s.isArray = true;
        break;
      case 'object':
        types |= Kind.Struct;
        break;
      default:
        s.errf(item, `unknown type ${JSON.stringify(name)}`);
    }
  };

  if (n.is(Kind.String)) {
    set(n);
  } else if (n.is(Kind.List)) {
    n.items().forEach(set);
  } else {
    s.errf(n, 'value of "type" must be a string or list of strings');
  }
  // "integer" alongside "number" adds nothing.
  if ((types & NumberKind) === Kind.Int) {
    s.add(CoreType.Number, n, ident('int'));
  }
  s.allowedTypes &= types;
}

export function constraintEnum(key: string, n: SchemaNode, s: SchemaState): void {
  const values: Expr[] = [];
  let types: KindSet = Kind.Bottom;
  for (const item of s.listItems(key, n, true)) {
    const k = item.kind();
    if ((s.allowedTypes & k) === 0) {
      // Outside the allowed types: can never match.
      continue;
    }
    values.push(s.decoder.constValue(item));
    types |= k;
  }
  s.knownTypes &= types;
  s.allowedTypes &= types;
  const [first, ...rest] = values;
  if (first !== undefined) {
    s.all.add(n, binary('|', first, ...rest));
  }
}

export function constraintConst(_key: string, n: SchemaNode, s: SchemaState): void {
  s.all.add(n, s.decoder.constValue(n));
  s.allowedTypes &= n.kind();
  s.knownTypes &= n.kind();
}

export function constraintNullable(_key: string, n: SchemaNode, s: SchemaState): void {
  if (s.decoder.boolValue(n) === true) {
    s.nullable = nullLit();
  }
}

export function constraintTitle(_key: string, n: SchemaNode, s: SchemaState): void {
  const title = s.decoder.strValue(n);
  if (title !== undefined) {
    s.title = title;
  }
}

export function constraintDescription(_key: string, n: SchemaNode, s: SchemaState): void {
  const description = s.decoder.strValue(n);
  if (description !== undefined) {
    s.description = description;
  }
}

export function constraintDeprecated(_key: string, n: SchemaNode, s: SchemaState): void {
  if (s.decoder.boolValue(n) === true) {
    s.deprecated = true;
  }
}

/** Accepts any value; defaults carry no constraint. */
export function constraintDefault(): void {
  return;
}

export function constraintExamples(_key: string, n: SchemaNode, s: SchemaState): void {
  if (!n.is(Kind.List)) {
    s.errf(n, `value of "examples" must be an array, found ${kindString(n.kind())}`);
  }
}

/** contentEncoding and contentMediaType: checked, not translated. */
export function constraintContent(_key: string, n: SchemaNode, s: SchemaState): void {
  s.decoder.strValue(n);
}
