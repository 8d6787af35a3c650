import { canonicalJSON, type JsonValue } from '../util/json.js';
import type { Item } from './items.js';

/**
 * An interned item. Handles from the same store are equal exactly when
 * their items are structurally equal, so they compare with `===`.
 */
export interface Handle {
  readonly id: number;
  readonly item: Item;
}

function ref(h: Handle | undefined): string {
  return h === undefined ? '-' : `#${h.id}`;
}

function refs(hs: readonly Handle[]): string {
  return hs.map(ref).join(',');
}

// Children are already interned, so their ids stand in for their content.
function itemKey(item: Item): string {
  switch (item.kind) {
    case 'true':
    case 'false':
    case 'uniqueItems':
      return item.kind;
    case 'type':
      return `type:${JSON.stringify(item.types)}`;
    case 'bounds':
    case 'lengthBounds':
    case 'itemsBounds':
    case 'propertyBounds':
      return `${item.kind}:${item.op}:${canonicalJSON(item.n)}`;
    case 'multipleOf':
      return `multipleOf:${canonicalJSON(item.n)}`;
    case 'pattern':
      return `pattern:${JSON.stringify(item.regexp)}`;
    case 'format':
      return `format:${JSON.stringify(item.format)}`;
    case 'const':
      return `const:${canonicalJSON(item.value)}`;
    case 'enum':
      return `enum:${canonicalJSON([...item.values])}`;
    case 'allOf':
    case 'anyOf':
    case 'oneOf':
      return `${item.kind}:[${refs(item.elems)}]`;
    case 'not':
      return `not:${ref(item.elem)}`;
    case 'ref':
      return `ref:${JSON.stringify(item.defName)}`;
    case 'properties': {
      const props = item.properties.map((p) => `${JSON.stringify(p.name)}=${ref(p.elem)}`);
      const patterns = item.patternProperties.map(
        (p) => `${JSON.stringify(p.regexp)}=${ref(p.elem)}`
      );
      return [
        'properties',
        `{${props.join(',')}}`,
        `{${patterns.join(',')}}`,
        ref(item.additionalProperties),
        JSON.stringify(item.required),
      ].join(':');
    }
    case 'items':
      return `items:[${refs(item.prefix)}]:${ref(item.rest)}`;
    case 'contains':
      return `contains:${ref(item.elem)}:${item.min ?? '-'}:${item.max ?? '-'}`;
    case 'ifThenElse':
      return `ifThenElse:${ref(item.ifElem)}:${ref(item.thenElem)}:${ref(item.elseElem)}`;
  }
}

function freezeJSON(value: JsonValue): void {
  if (value !== null && typeof value === 'object') {
    Object.freeze(value);
    for (const v of Object.values(value)) {
      freezeJSON(v);
    }
  }
}

function freezeItem(item: Item): Item {
  switch (item.kind) {
    case 'type':
      Object.freeze(item.types);
      break;
    case 'const':
      freezeJSON(item.value);
      break;
    case 'enum':
      item.values.forEach(freezeJSON);
      Object.freeze(item.values);
      break;
    case 'allOf':
    case 'anyOf':
    case 'oneOf':
      Object.freeze(item.elems);
      break;
    case 'properties':
      item.properties.forEach((p) => Object.freeze(p));
      item.patternProperties.forEach((p) => Object.freeze(p));
      Object.freeze(item.properties);
      Object.freeze(item.patternProperties);
      Object.freeze(item.required);
      break;
    case 'items':
      Object.freeze(item.prefix);
      break;
    default:
      break;
  }
  return Object.freeze(item);
}

/**
 * Hash-consing table for items. One store belongs to one Generate call.
 */
export class ItemStore {
  private readonly handles = new Map<string, Handle>();

  intern(item: Item): Handle {
    const key = itemKey(item);
    const existing = this.handles.get(key);
    if (existing !== undefined) {
      return existing;
    }
    const handle: Handle = Object.freeze({ id: this.handles.size, item: freezeItem(item) });
    this.handles.set(key, handle);
    return handle;
  }

  get size(): number {
    return this.handles.size;
  }

  // Shorthands for the leaf items the generator builds most often.

  true(): Handle {
    return this.intern({ kind: 'true' });
  }

  false(): Handle {
    return this.intern({ kind: 'false' });
  }

  type(...types: string[]): Handle {
    return this.intern({ kind: 'type', types });
  }

  allOf(...elems: Handle[]): Handle {
    return this.intern({ kind: 'allOf', elems });
  }
}
