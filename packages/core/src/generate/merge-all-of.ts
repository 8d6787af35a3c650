import { mapChildren } from './items.js';
import type { Handle, ItemStore } from './store.js';

function* conjuncts(h: Handle): Generator<Handle> {
  if (h.item.kind !== 'allOf') {
    yield h;
    return;
  }
  for (const e of h.item.elems) {
    yield* conjuncts(e);
  }
}

function hasType(types: readonly string[], t: string): boolean {
  return types.includes(t) || (t === 'integer' && types.includes('number'));
}

/** Types admitted by both lists; `integer` is a subset of `number`. */
function intersectTypes(a: readonly string[], b: readonly string[]): string[] {
  const out = a.filter((t) => hasType(b, t));
  if (b.includes('integer') && a.includes('number') && !out.includes('integer')) {
    out.push('integer');
  }
  return out;
}

/**
 * Flattens nested allOf items into one, dropping duplicate conjuncts and
 * folding type conjuncts into one. An allOf left with a single conjunct
 * becomes that conjunct; one left with none becomes `true`; one whose
 * types do not intersect becomes `false`.
 */
export function mergeAllOf(root: Handle, store: ItemStore): Handle {
  const done = new Map<Handle, Handle>();
  const merge = (h: Handle): Handle => {
    let out = done.get(h);
    if (out === undefined) {
      out = mergeOne(h);
      done.set(h, out);
    }
    return out;
  };
  const mergeOne = (h: Handle): Handle => {
    const item = h.item;
    if (item.kind !== 'allOf') {
      return store.intern(mapChildren(item, merge));
    }
    const elems: Handle[] = [];
    let typeAt = -1;
    for (const e of conjuncts(h)) {
      const merged = merge(e);
      if (elems.includes(merged)) {
        continue;
      }
      const prev = elems[typeAt];
      if (merged.item.kind === 'type' && prev !== undefined && prev.item.kind === 'type') {
        const types = intersectTypes(prev.item.types, merged.item.types);
        if (types.length === 0) {
          return store.false();
        }
        elems[typeAt] = store.type(...types);
        continue;
      }
      if (merged.item.kind === 'type') {
        typeAt = elems.length;
      }
      elems.push(merged);
    }
    const [first, second] = elems;
    if (first === undefined) {
      return store.true();
    }
    if (second === undefined) {
      return first;
    }
    return store.intern({ kind: 'allOf', elems });
  };
  return merge(root);
}
