/**
 * Intermediate representation for Generate.
 *
 * Items are JSON-Schema-shaped constraints. They only ever exist behind a
 * {@link Handle} obtained from an {@link ItemStore}, so two structurally
 * equal items are the same handle.
 */
import type { JsonValue } from '../util/json.js';
import type { Handle } from './store.js';

export type BoundsOp = '<' | '<=' | '>' | '>=';

export type CountOp = '<=' | '>=';

export interface Property {
  readonly name: string;
  readonly elem: Handle;
}

export interface PatternProperty {
  readonly regexp: string;
  readonly elem: Handle;
}

export type Item =
  | { readonly kind: 'true' }
  | { readonly kind: 'false' }
  | { readonly kind: 'type'; readonly types: readonly string[] }
  | { readonly kind: 'bounds'; readonly op: BoundsOp; readonly n: number }
  | { readonly kind: 'multipleOf'; readonly n: number }
  | {
      readonly kind: 'lengthBounds' | 'itemsBounds' | 'propertyBounds';
      readonly op: CountOp;
      readonly n: number;
    }
  | { readonly kind: 'pattern'; readonly regexp: string }
  | { readonly kind: 'format'; readonly format: string }
  | { readonly kind: 'const'; readonly value: JsonValue }
  | { readonly kind: 'enum'; readonly values: readonly JsonValue[] }
  | { readonly kind: 'allOf' | 'anyOf' | 'oneOf'; readonly elems: readonly Handle[] }
  | { readonly kind: 'not'; readonly elem: Handle }
  | { readonly kind: 'ref'; readonly defName: string }
  | {
      readonly kind: 'properties';
      /** Sorted by name. */
      readonly properties: readonly Property[];
      /** Sorted by regexp. */
      readonly patternProperties: readonly PatternProperty[];
      readonly additionalProperties?: Handle;
      readonly required: readonly string[];
    }
  | { readonly kind: 'items'; readonly prefix: readonly Handle[]; readonly rest?: Handle }
  | {
      readonly kind: 'contains';
      readonly elem: Handle;
      readonly min?: number;
      readonly max?: number;
    }
  | { readonly kind: 'uniqueItems' }
  | {
      readonly kind: 'ifThenElse';
      readonly ifElem: Handle;
      readonly thenElem?: Handle;
      readonly elseElem?: Handle;
    };

export type ItemKind = Item['kind'];

export type ItemOf<K extends ItemKind> = Extract<Item, { kind: K }>;

function mapList(hs: readonly Handle[], f: (h: Handle) => Handle): readonly Handle[] {
  let out: Handle[] | undefined;
  for (const [i, h] of hs.entries()) {
    const h1 = f(h);
    if (h1 === h) continue;
    out ??= [...hs];
    out[i] = h1;
  }
  return out ?? hs;
}

function mapOptional(h: Handle | undefined, f: (h: Handle) => Handle): Handle | undefined {
  return h === undefined ? undefined : f(h);
}

/**
 * Rebuilds `item` with `f` applied to each direct child. Returns `item`
 * itself when no child changed.
 */
export function mapChildren(item: Item, f: (h: Handle) => Handle): Item {
  switch (item.kind) {
    case 'true':
    case 'false':
    case 'type':
    case 'bounds':
    case 'multipleOf':
    case 'lengthBounds':
    case 'itemsBounds':
    case 'propertyBounds':
    case 'pattern':
    case 'format':
    case 'const':
    case 'enum':
    case 'ref':
    case 'uniqueItems':
      return item;
    case 'allOf':
    case 'anyOf':
    case 'oneOf': {
      const elems = mapList(item.elems, f);
      return elems === item.elems ? item : { kind: item.kind, elems };
    }
    case 'not': {
      const elem = f(item.elem);
      return elem === item.elem ? item : { kind: 'not', elem };
    }
    case 'properties': {
      let changed = false;
      const properties = item.properties.map((p) => {
        const elem = f(p.elem);
        if (elem === p.elem) return p;
        changed = true;
        return { name: p.name, elem };
      });
      const patternProperties = item.patternProperties.map((p) => {
        const elem = f(p.elem);
        if (elem === p.elem) return p;
        changed = true;
        return { regexp: p.regexp, elem };
      });
      const additionalProperties = mapOptional(item.additionalProperties, f);
      if (!changed && additionalProperties === item.additionalProperties) {
        return item;
      }
      return {
        kind: 'properties',
        properties,
        patternProperties,
        required: item.required,
        ...(additionalProperties !== undefined ? { additionalProperties } : {}),
      };
    }
    case 'items': {
      const prefix = mapList(item.prefix, f);
      const rest = mapOptional(item.rest, f);
      if (prefix === item.prefix && rest === item.rest) {
        return item;
      }
      return { kind: 'items', prefix, ...(rest !== undefined ? { rest } : {}) };
    }
    case 'contains': {
      const elem = f(item.elem);
      return elem === item.elem ? item : { ...item, elem };
    }
    case 'ifThenElse': {
      const ifElem = f(item.ifElem);
      const thenElem = mapOptional(item.thenElem, f);
      const elseElem = mapOptional(item.elseElem, f);
      if (ifElem === item.ifElem && thenElem === item.thenElem && elseElem === item.elseElem) {
        return item;
      }
      return {
        kind: 'ifThenElse',
        ifElem,
        ...(thenElem !== undefined ? { thenElem } : {}),
        ...(elseElem !== undefined ? { elseElem } : {}),
      };
    }
  }
}

/** The direct children of `item`, in rendering order. */
export function children(item: Item): Handle[] {
  const out: Handle[] = [];
  mapChildren(item, (h) => {
    out.push(h);
    return h;
  });
  return out;
}
