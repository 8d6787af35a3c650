import type { JsonValue } from '../util/json.js';
import { mapChildren } from './items.js';
import type { Handle, ItemStore } from './store.js';

function constValues(elems: readonly Handle[]): JsonValue[] | undefined {
  const values: JsonValue[] = [];
  for (const e of elems) {
    if (e.item.kind !== 'const') {
      return undefined;
    }
    values.push(e.item.value);
  }
  return values;
}

/**
 * Replaces disjunctions of constants with enum items:
 *
 *   anyOf(const("a"), const("b")) -> enum("a", "b")
 *
 * A oneOf of constants qualifies too when the constants are distinct,
 * since then at most one of them can match.
 */
export function enumFromConst(root: Handle, store: ItemStore): Handle {
  const done = new Map<Handle, Handle>();
  const rewrite = (h: Handle): Handle => {
    const cached = done.get(h);
    if (cached !== undefined) {
      return cached;
    }
    const item = h.item;
    let out: Handle | undefined;
    const distinct = item.kind === 'oneOf' && new Set(item.elems).size === item.elems.length;
    if (item.kind === 'anyOf' || distinct) {
      const values = constValues(item.elems);
      if (values !== undefined && values.length > 0) {
        out = store.intern({ kind: 'enum', values });
      }
    }
    out ??= store.intern(mapChildren(item, rewrite));
    done.set(h, out);
    return out;
  };
  return rewrite(root);
}
