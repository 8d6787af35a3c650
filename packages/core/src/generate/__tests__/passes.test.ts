import { describe, it, expect } from 'vitest';
import fc, { type Arbitrary, type Memo } from 'fast-check';

import { enumFromConst } from '../enum-from-const.js';
import { children } from '../items.js';
import { mergeAllOf } from '../merge-all-of.js';
import { ItemStore, type Handle } from '../store.js';

const NUM_RUNS = Number(process.env.FC_NUM_RUNS ?? '100');

type Tree =
  | { t: 'leaf'; n: number }
  | { t: 'allOf' | 'anyOf' | 'oneOf'; kids: Tree[] }
  | { t: 'not'; kid: Tree };

const leaf: Arbitrary<Tree> = fc
  .integer({ min: 0, max: 5 })
  .map((n): Tree => ({ t: 'leaf', n }));

const tree: Memo<Tree> = fc.memo((depth) =>
  depth <= 1
    ? leaf
    : fc.oneof(
        leaf,
        fc
          .record({
            t: fc.constantFrom('allOf' as const, 'anyOf' as const, 'oneOf' as const),
            kids: fc.array(tree(depth - 1), { maxLength: 3 }),
          })
          .map((x): Tree => x),
        tree(depth - 1).map((kid): Tree => ({ t: 'not', kid }))
      )
);

function build(store: ItemStore, t: Tree): Handle {
  switch (t.t) {
    case 'leaf':
      switch (t.n) {
        case 0:
          return store.true();
        case 1:
          return store.intern({ kind: 'const', value: 'a' });
        case 2:
          return store.intern({ kind: 'const', value: 'b' });
        case 3:
          return store.type('string');
        case 4:
          return store.intern({ kind: 'pattern', regexp: '^x' });
        default:
          return store.false();
      }
    case 'not':
      return store.intern({ kind: 'not', elem: build(store, t.kid) });
    default:
      return store.intern({ kind: t.t, elems: t.kids.map((k) => build(store, k)) });
  }
}

function reachable(root: Handle): Handle[] {
  const seen = new Set<Handle>();
  const visit = (h: Handle): void => {
    if (seen.has(h)) return;
    seen.add(h);
    children(h.item).forEach(visit);
  };
  visit(root);
  return [...seen];
}

describe('mergeAllOf', () => {
  it('flattens nested allOf and drops duplicates', () => {
    const store = new ItemStore();
    const s = store.type('string');
    const p = store.intern({ kind: 'pattern', regexp: '^a' });

    const out = mergeAllOf(store.allOf(s, store.allOf(p, s)), store);

    expect(out).toBe(store.allOf(s, p));
  });

  it('collapses an allOf with one distinct conjunct to that conjunct', () => {
    const store = new ItemStore();
    const s = store.type('string');

    expect(mergeAllOf(store.allOf(s, store.allOf(s)), store)).toBe(s);
  });

  it('turns an empty allOf into true', () => {
    const store = new ItemStore();

    expect(mergeAllOf(store.allOf(), store)).toBe(store.true());
  });

  it('folds type conjuncts into their intersection', () => {
    const store = new ItemStore();
    const bound = store.intern({ kind: 'bounds', op: '>', n: 0 });

    const out = mergeAllOf(
      store.allOf(store.type('number'), store.allOf(store.type('integer'), bound)),
      store
    );

    expect(out).toBe(store.allOf(store.type('integer'), bound));
    expect(mergeAllOf(store.allOf(store.type('null', 'string'), store.type('string')), store)).toBe(
      store.type('string')
    );
  });

  it('turns disjoint type conjuncts into false', () => {
    const store = new ItemStore();

    expect(mergeAllOf(store.allOf(store.type('string'), store.type('null')), store)).toBe(
      store.false()
    );
  });

  it('rewrites allOf below other items', () => {
    const store = new ItemStore();
    const s = store.type('string');
    const root = store.intern({ kind: 'not', elem: store.allOf(store.allOf(s)) });

    expect(mergeAllOf(root, store)).toBe(store.intern({ kind: 'not', elem: s }));
  });

  it('leaves no allOf directly inside another', () => {
    fc.assert(
      fc.property(tree(4), (t) => {
        const store = new ItemStore();
        const out = mergeAllOf(build(store, t), store);
        for (const h of reachable(out)) {
          if (h.item.kind === 'allOf') {
            expect(h.item.elems.length).toBeGreaterThan(1);
            expect(h.item.elems.some((e) => e.item.kind === 'allOf')).toBe(false);
          }
        }
      }),
      { numRuns: NUM_RUNS }
    );
  });

  it('is idempotent', () => {
    fc.assert(
      fc.property(tree(4), (t) => {
        const store = new ItemStore();
        const once = mergeAllOf(build(store, t), store);
        expect(mergeAllOf(once, store)).toBe(once);
      }),
      { numRuns: NUM_RUNS }
    );
  });
});

describe('enumFromConst', () => {
  it('turns an anyOf of constants into an enum', () => {
    const store = new ItemStore();
    const root = store.intern({
      kind: 'anyOf',
      elems: [
        store.intern({ kind: 'const', value: 'a' }),
        store.intern({ kind: 'const', value: 1 }),
      ],
    });

    expect(enumFromConst(root, store).item).toEqual({ kind: 'enum', values: ['a', 1] });
  });

  it('turns a oneOf of distinct constants into an enum', () => {
    const store = new ItemStore();
    const root = store.intern({
      kind: 'oneOf',
      elems: [
        store.intern({ kind: 'const', value: 'a' }),
        store.intern({ kind: 'const', value: 'b' }),
      ],
    });

    expect(enumFromConst(root, store).item).toEqual({ kind: 'enum', values: ['a', 'b'] });
  });

  it('keeps a oneOf that repeats a constant', () => {
    const store = new ItemStore();
    const a = store.intern({ kind: 'const', value: 'a' });
    const root = store.intern({ kind: 'oneOf', elems: [a, a] });

    expect(enumFromConst(root, store)).toBe(root);
  });

  it('keeps an anyOf with a non-constant member', () => {
    const store = new ItemStore();
    const root = store.intern({
      kind: 'anyOf',
      elems: [store.intern({ kind: 'const', value: 'a' }), store.type('number')],
    });

    expect(enumFromConst(root, store)).toBe(root);
  });

  it('rewrites nested disjunctions', () => {
    const store = new ItemStore();
    const consts = store.intern({
      kind: 'anyOf',
      elems: [
        store.intern({ kind: 'const', value: true }),
        store.intern({ kind: 'const', value: null }),
      ],
    });
    const root = store.allOf(store.type('string'), store.intern({ kind: 'not', elem: consts }));

    const out = enumFromConst(root, store);

    expect(out).toBe(
      store.allOf(
        store.type('string'),
        store.intern({ kind: 'not', elem: store.intern({ kind: 'enum', values: [true, null] }) })
      )
    );
  });

  it('is idempotent', () => {
    fc.assert(
      fc.property(tree(4), (t) => {
        const store = new ItemStore();
        const once = enumFromConst(build(store, t), store);
        expect(enumFromConst(once, store)).toBe(once);
      }),
      { numRuns: NUM_RUNS }
    );
  });
});
