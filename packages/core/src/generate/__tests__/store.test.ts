import { describe, it, expect } from 'vitest';

import { children, mapChildren, type Item } from '../items.js';
import { ItemStore } from '../store.js';

describe('ItemStore', () => {
  it('returns one handle for structurally equal items', () => {
    const store = new ItemStore();
    const a = store.intern({ kind: 'type', types: ['string'] });
    const b = store.type('string');

    expect(a).toBe(b);
    expect(store.size).toBe(1);
  });

  it('distinguishes items that differ in any attribute', () => {
    const store = new ItemStore();
    const min = store.intern({ kind: 'lengthBounds', op: '>=', n: 2 });
    const max = store.intern({ kind: 'lengthBounds', op: '<=', n: 2 });
    const items = store.intern({ kind: 'itemsBounds', op: '>=', n: 2 });

    expect(new Set([min, max, items]).size).toBe(3);
  });

  it('ignores object key order in constants', () => {
    const store = new ItemStore();
    const a = store.intern({ kind: 'const', value: { x: 1, y: [true, null] } });
    const b = store.intern({ kind: 'const', value: { y: [true, null], x: 1 } });

    expect(a).toBe(b);
  });

  it('compares composite items by their children', () => {
    const store = new ItemStore();
    const s = store.type('string');
    const p = store.intern({ kind: 'pattern', regexp: '^a' });

    expect(store.allOf(s, p)).toBe(store.allOf(store.type('string'), p));
    expect(store.allOf(s, p)).not.toBe(store.allOf(p, s));
  });

  it('freezes interned items', () => {
    const store = new ItemStore();
    const h = store.intern({ kind: 'enum', values: ['a', { b: 1 }] });

    expect(Object.isFrozen(h)).toBe(true);
    expect(Object.isFrozen(h.item)).toBe(true);
    expect(h.item.kind === 'enum' && Object.isFrozen(h.item.values)).toBe(true);
  });
});

describe('mapChildren', () => {
  it('returns the same item when no child changes', () => {
    const store = new ItemStore();
    const item: Item = {
      kind: 'ifThenElse',
      ifElem: store.type('object'),
      thenElem: store.true(),
    };

    expect(mapChildren(item, (h) => h)).toBe(item);
  });

  it('rebuilds only the changed children', () => {
    const store = new ItemStore();
    const s = store.type('string');
    const n = store.type('number');
    const item: Item = { kind: 'anyOf', elems: [s, n] };

    const out = mapChildren(item, (h) => (h === s ? store.false() : h));

    expect(out).toEqual({ kind: 'anyOf', elems: [store.false(), n] });
    expect(item.elems).toEqual([s, n]);
  });

  it('visits properties, pattern properties and additional properties in order', () => {
    const store = new ItemStore();
    const a = store.type('string');
    const p = store.type('integer');
    const rest = store.false();
    const item: Item = {
      kind: 'properties',
      properties: [{ name: 'a', elem: a }],
      patternProperties: [{ regexp: '^x', elem: p }],
      additionalProperties: rest,
      required: ['a'],
    };

    expect(children(item)).toEqual([a, p, rest]);
  });

  it('has no children for leaf items', () => {
    expect(children({ kind: 'const', value: 'x' })).toEqual([]);
    expect(children({ kind: 'ref', defName: 'Node' })).toEqual([]);
  });
});
