import { describe, it, expect } from 'vitest';

import { schemaToJSON } from '../../syntax/json.js';
import type { JsonValue } from '../../util/json.js';
import { compareSchemaLabels, renderItem } from '../render.js';
import { ItemStore, type Handle } from '../store.js';

function json(h: Handle): JsonValue {
  const out = schemaToJSON(renderItem(h));
  if (out.isErr()) {
    throw new Error(out.error);
  }
  return out.value;
}

describe('renderItem', () => {
  it('renders boolean schemas', () => {
    const store = new ItemStore();

    expect(json(store.true())).toBe(true);
    expect(json(store.false())).toBe(false);
  });

  it('renders a single type as a string and several as a list', () => {
    const store = new ItemStore();

    expect(json(store.type('string'))).toEqual({ type: 'string' });
    expect(json(store.type('null', 'string'))).toEqual({ type: ['null', 'string'] });
  });

  it('maps bounds to their keywords', () => {
    const store = new ItemStore();

    expect(json(store.intern({ kind: 'bounds', op: '<', n: 1 }))).toEqual({
      exclusiveMaximum: 1,
    });
    expect(json(store.intern({ kind: 'bounds', op: '>=', n: 0.5 }))).toEqual({ minimum: 0.5 });
    expect(json(store.intern({ kind: 'propertyBounds', op: '<=', n: 3 }))).toEqual({
      maxProperties: 3,
    });
  });

  it('escapes definition names in references', () => {
    const store = new ItemStore();

    expect(json(store.intern({ kind: 'ref', defName: 'a/b~c' }))).toEqual({
      $ref: '#/$defs/a~1b~0c',
    });
    expect(json(store.intern({ kind: 'ref', defName: '#Node' }))).toEqual({
      $ref: '#/$defs/%23Node',
    });
  });

  it('renders object constraints', () => {
    const store = new ItemStore();
    const h = store.intern({
      kind: 'properties',
      properties: [{ name: 'id', elem: store.type('integer') }],
      patternProperties: [{ regexp: '^x-', elem: store.true() }],
      additionalProperties: store.false(),
      required: ['id'],
    });

    expect(json(h)).toEqual({
      properties: { id: { type: 'integer' } },
      patternProperties: { '^x-': true },
      additionalProperties: false,
      required: ['id'],
    });
  });

  it('merges allOf members whose keywords do not interact', () => {
    const store = new ItemStore();
    const h = store.allOf(
      store.type('string'),
      store.intern({ kind: 'pattern', regexp: '^a' }),
      store.intern({ kind: 'lengthBounds', op: '>=', n: 2 })
    );

    expect(json(h)).toEqual({ type: 'string', pattern: '^a', minLength: 2 });
  });

  it('keeps repeated keywords in separate allOf members', () => {
    const store = new ItemStore();
    const h = store.allOf(
      store.intern({ kind: 'pattern', regexp: '^a' }),
      store.intern({ kind: 'pattern', regexp: 'z$' })
    );

    expect(json(h)).toEqual({ allOf: [{ pattern: 'z$' }, { pattern: '^a' }] });
  });

  it('does not merge properties with patternProperties of another member', () => {
    const store = new ItemStore();
    const h = store.allOf(
      store.intern({
        kind: 'properties',
        properties: [{ name: 'a', elem: store.type('integer') }],
        patternProperties: [],
        required: [],
      }),
      store.intern({
        kind: 'properties',
        properties: [],
        patternProperties: [{ regexp: '^x', elem: store.type('string') }],
        required: [],
      })
    );

    expect(json(h)).toEqual({
      allOf: [
        { patternProperties: { '^x': { type: 'string' } } },
        { properties: { a: { type: 'integer' } } },
      ],
    });
  });

  it('does not merge contains with minContains of another member', () => {
    const store = new ItemStore();
    const h = store.allOf(
      store.intern({ kind: 'contains', elem: store.type('string') }),
      store.intern({ kind: 'contains', elem: store.type('integer'), min: 2 })
    );

    expect(json(h)).toEqual({
      allOf: [{ contains: { type: 'integer' }, minContains: 2 }, { contains: { type: 'string' } }],
    });
  });

  it('drops true members and collapses to false on a false member', () => {
    const store = new ItemStore();

    expect(json(store.allOf(store.true(), store.type('null')))).toEqual({ type: 'null' });
    expect(json(store.allOf(store.type('null'), store.false()))).toBe(false);
  });

  it('renders list constraints', () => {
    const store = new ItemStore();
    const h = store.allOf(
      store.type('array'),
      store.intern({ kind: 'items', prefix: [store.type('string')], rest: store.false() }),
      store.intern({ kind: 'uniqueItems' })
    );

    expect(json(h)).toEqual({
      type: 'array',
      prefixItems: [{ type: 'string' }],
      items: false,
      uniqueItems: true,
    });
  });

  it('renders conditionals without the missing branches', () => {
    const store = new ItemStore();
    const h = store.intern({
      kind: 'ifThenElse',
      ifElem: store.type('string'),
      elseElem: store.type('number'),
    });

    expect(json(h)).toEqual({ if: { type: 'string' }, else: { type: 'number' } });
  });

  it('orders keywords by group and then by name', () => {
    const store = new ItemStore();
    const h = store.allOf(
      store.intern({ kind: 'lengthBounds', op: '<=', n: 4 }),
      store.type('string'),
      store.intern({ kind: 'format', format: 'email' })
    );
    const expr = renderItem(h);

    const labels =
      expr.kind === 'struct'
        ? expr.elts.map((d) => (d.kind === 'field' && d.label.kind === 'lit' ? d.label.value : ''))
        : [];
    expect(labels).toEqual(['"type"', '"format"', '"maxLength"']);
  });
});

describe('compareSchemaLabels', () => {
  it('sorts the fixed keywords first and groups interacting keywords', () => {
    const labels = ['required', 'if', 'items', 'properties', 'type', '$defs', 'contains', '$schema'];

    expect([...labels].sort(compareSchemaLabels)).toEqual([
      '$schema',
      '$defs',
      'type',
      'properties',
      'contains',
      'items',
      'if',
      'required',
    ]);
  });
});
