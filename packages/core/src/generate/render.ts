/**
 * Rendering of items as JSON-Schema-shaped struct literals.
 */
import {
  bool,
  field,
  labelName,
  list,
  num,
  str,
  struct,
  type Expr,
  type Field,
  type StructLit,
} from '../syntax/ast.js';
import { jsonToExpr } from '../syntax/json.js';
import type { Item } from './items.js';
import type { Handle } from './store.js';

/**
 * Keywords that affect each other's meaning. Keywords of one group must
 * come from the same schema object.
 */
export const KEYWORD_GROUPS: ReadonlyArray<readonly string[]> = [
  ['properties', 'patternProperties', 'additionalProperties'],
  ['contains', 'maxContains', 'minContains'],
  ['items', 'additionalItems', 'prefixItems'],
  ['if', 'then', 'else'],
];

const KEYWORD_INTERACTIONS: ReadonlyMap<string, readonly string[]> = new Map(
  KEYWORD_GROUPS.flatMap((group) =>
    group.map((name) => [name, group.filter((other) => other !== name)] as const)
  )
);

const LABEL_PRIORITY: ReadonlyMap<string, number> = new Map([
  ['$schema', 0],
  ['$defs', 1],
  ['type', 2],
  ...KEYWORD_GROUPS.flatMap((group, i) => group.map((name) => [name, 3 + i + 1] as const)),
]);

function labelPriority(name: string): number {
  return LABEL_PRIORITY.get(name) ?? 1000;
}

function fieldName(f: Field): string {
  return labelName(f.label) ?? '';
}

export function compareSchemaLabels(a: string, b: string): number {
  const byPriority = labelPriority(a) - labelPriority(b);
  if (byPriority !== 0) {
    return byPriority;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

/** A schema object with its keywords in presentation order. */
export function schemaStruct(...fields: Field[]): StructLit {
  const sorted = [...fields].sort((a, b) => compareSchemaLabels(fieldName(a), fieldName(b)));
  return struct(...sorted);
}

function keyword(name: string, value: Expr): StructLit {
  return struct(field(name, value));
}

// A JSON Pointer token written inside a URI fragment.
function fragmentToken(s: string): string {
  return s
    .replace(/~/g, '~0')
    .replace(/\//g, '~1')
    .replace(/[^\w\-.~!$&'()*+,;=:@]/gu, (c) => encodeURIComponent(c));
}

const BOUNDS_KEYWORDS = {
  '<': 'exclusiveMaximum',
  '<=': 'maximum',
  '>': 'exclusiveMinimum',
  '>=': 'minimum',
} as const;

const COUNT_KEYWORDS = {
  lengthBounds: { '<=': 'maxLength', '>=': 'minLength' },
  itemsBounds: { '<=': 'maxItems', '>=': 'minItems' },
  propertyBounds: { '<=': 'maxProperties', '>=': 'minProperties' },
} as const;

/**
 * Renders `h` as a schema: `true`, `false` or a struct literal.
 */
export function renderItem(h: Handle): Expr {
  const item: Item = h.item;
  switch (item.kind) {
    case 'true':
      return bool(true);
    case 'false':
      return bool(false);
    case 'type': {
      const [only] = item.types;
      return keyword(
        'type',
        item.types.length === 1 && only !== undefined ? str(only) : list(...item.types.map(str))
      );
    }
    case 'bounds':
      return keyword(BOUNDS_KEYWORDS[item.op], num(item.n));
    case 'multipleOf':
      return keyword('multipleOf', num(item.n));
    case 'lengthBounds':
    case 'itemsBounds':
    case 'propertyBounds':
      return keyword(COUNT_KEYWORDS[item.kind][item.op], num(item.n));
    case 'pattern':
      return keyword('pattern', str(item.regexp));
    case 'format':
      return keyword('format', str(item.format));
    case 'const':
      return keyword('const', jsonToExpr(item.value));
    case 'enum':
      return keyword('enum', list(...item.values.map(jsonToExpr)));
    case 'allOf':
      return renderAllOf(item.elems);
    case 'anyOf':
    case 'oneOf':
      return keyword(item.kind, list(...item.elems.map(renderItem)));
    case 'not':
      return keyword('not', renderItem(item.elem));
    case 'ref':
      return keyword('$ref', str(`#/$defs/${fragmentToken(item.defName)}`));
    case 'properties': {
      const fields: Field[] = [];
      if (item.properties.length > 0) {
        const props = item.properties.map((p) => field(p.name, renderItem(p.elem)));
        fields.push(field('properties', struct(...props)));
      }
      if (item.required.length > 0) {
        fields.push(field('required', list(...item.required.map(str))));
      }
      if (item.additionalProperties !== undefined) {
        fields.push(field('additionalProperties', renderItem(item.additionalProperties)));
      }
      if (item.patternProperties.length > 0) {
        fields.push(
          field(
            'patternProperties',
            struct(...item.patternProperties.map((p) => field(p.regexp, renderItem(p.elem))))
          )
        );
      }
      return schemaStruct(...fields);
    }
    case 'items': {
      const fields: Field[] = [];
      if (item.prefix.length > 0) {
        fields.push(field('prefixItems', list(...item.prefix.map(renderItem))));
      }
      if (item.rest !== undefined) {
        fields.push(field('items', renderItem(item.rest)));
      }
      return schemaStruct(...fields);
    }
    case 'contains': {
      const fields = [field('contains', renderItem(item.elem))];
      if (item.min !== undefined) {
        fields.push(field('minContains', num(item.min)));
      }
      if (item.max !== undefined) {
        fields.push(field('maxContains', num(item.max)));
      }
      return schemaStruct(...fields);
    }
    case 'uniqueItems':
      return keyword('uniqueItems', bool(true));
    case 'ifThenElse': {
      const fields = [field('if', renderItem(item.ifElem))];
      if (item.thenElem !== undefined) {
        fields.push(field('then', renderItem(item.thenElem)));
      }
      if (item.elseElem !== undefined) {
        fields.push(field('else', renderItem(item.elseElem)));
      }
      return schemaStruct(...fields);
    }
  }
}

/**
 * A schema object is itself a conjunction, so the members of an allOf
 * are merged into one object where their keywords neither repeat nor
 * interact. The rest stay in an `allOf` list.
 */
function renderAllOf(elems: readonly Handle[]): Expr {
  const merged: Field[] = [];
  // allOf is reserved for the members that could not be merged.
  const names = new Set<string>(['allOf']);
  const unmerged: Expr[] = [];
  for (const e of elems) {
    const expr = renderItem(e);
    if (expr.kind === 'lit') {
      if (expr.value === 'false') {
        return expr;
      }
      continue;
    }
    if (expr.kind !== 'struct') {
      unmerged.push(expr);
      continue;
    }
    const fields = expr.elts.filter((d): d is Field => d.kind === 'field');
    const clash = fields.some((f) => {
      const name = fieldName(f);
      const interacting = KEYWORD_INTERACTIONS.get(name) ?? [];
      return names.has(name) || interacting.some((other) => names.has(other));
    });
    if (clash) {
      unmerged.push(expr);
      continue;
    }
    for (const f of fields) {
      names.add(fieldName(f));
      merged.push(f);
    }
  }
  if (unmerged.length === 0) {
    return schemaStruct(...merged);
  }
  if (merged.length > 0) {
    unmerged.push(schemaStruct(...merged));
  }
  return keyword('allOf', list(...unmerged));
}
