import { describe, it, expect } from 'vitest';

import { stringSel } from '../../syntax/path.js';
import { Kind, NumberKind, TopKind, kindString, kindToJSONSchemaTypes } from '../kind.js';
import { hv, labelMatches } from '../model.js';
import type { HostValue } from '../types.js';

describe('hv', () => {
  it('reports kinds of basic values', () => {
    expect(hv.string().incompleteKind()).toBe(Kind.String);
    expect(hv.string().kind()).toBe(Kind.Bottom);
    expect(hv.lit(1.5).kind()).toBe(Kind.Float);
    expect(hv.lit(2).kind()).toBe(Kind.Int);
    expect(hv.gte(0).incompleteKind()).toBe(NumberKind);
    expect(hv.matches('^a').incompleteKind()).toBe(Kind.String);
    expect(hv.or(hv.lit('a'), hv.null()).incompleteKind()).toBe(Kind.String | Kind.Null);
    expect(hv.and(hv.number(), hv.lt(3)).incompleteKind()).toBe(NumberKind);
  });

  it('exposes operators through expr', () => {
    const value = hv.and(hv.string(), hv.matches('^a'));

    const e = value.expr();

    expect(e.op).toBe('and');
    expect(hv.lit('x').expr()).toEqual({ op: 'none' });
    expect(hv.call('strings.MinRunes', hv.lit(1)).expr()).toMatchObject({
      op: 'call',
      fn: 'strings.MinRunes',
    });
  });

  it('converts concrete values to JSON', () => {
    const value = hv.json({ a: [1, 'x', null], b: { c: true } });

    expect(value.isConcrete()).toBe(true);
    const out = value.concrete();
    expect(out.isOk() && out.value).toEqual({ a: [1, 'x', null], b: { c: true } });
  });

  it('leaves optional fields out of concrete structs', () => {
    const value = hv.struct({ a: hv.lit(1), b: hv.optional(hv.string()) });

    expect(value.isConcrete()).toBe(true);
    const out = value.concrete();
    expect(out.isOk() && out.value).toEqual({ a: 1 });
  });

  it('treats open lists and required fields as incomplete', () => {
    expect(hv.listOf(hv.int()).isConcrete()).toBe(false);
    expect(hv.struct({ a: hv.required(hv.lit(1)) }).isConcrete()).toBe(false);
    expect(hv.listOf(hv.int()).concrete().isErr()).toBe(true);
  });

  it('collects validation errors from nested values', () => {
    const value = hv.struct({
      a: hv.bottom('a is wrong'),
      b: hv.list([hv.int(), hv.bottom('b.1 is wrong')]),
    });

    expect(value.validate()).toEqual(['a is wrong', 'b.1 is wrong']);
    expect(hv.struct({ a: hv.int() }).validate()).toEqual([]);
  });

  it('accepts disjunctions and optional fields that keep a valid value', () => {
    expect(hv.or(hv.bottom('x'), hv.int()).validate()).toEqual([]);
    expect(hv.or(hv.bottom('x'), hv.bottom('y')).validate()).toEqual(['x', 'y']);
    expect(hv.struct({ a: hv.optional(hv.bottom('x')) }).validate()).toEqual([]);
  });

  it('unifies pattern constraints into matching fields', () => {
    const value = hv.struct({ xa: hv.string(), b: hv.int() }, {
      patterns: [[hv.matches('^x'), hv.matches('a$')]],
    });

    const [xa, b] = value.fields();

    expect(xa?.value.expr().op).toBe('and');
    expect(b?.value.expr()).toEqual({ op: 'none' });
  });

  it('follows references lazily', () => {
    const root = hv.struct({});
    const node: HostValue = hv.struct({ next: hv.optional(hv.ref(root, [stringSel('n')], () => node)) });

    const next = node.fields()[0]?.value;

    expect(next?.referencePath()?.path).toEqual([stringSel('n')]);
    expect(next?.eval()).toBe(node);
    expect(next?.incompleteKind()).toBe(Kind.Struct);
    expect(next?.fields().map((f) => f.name)).toEqual(['next']);
  });

  it('describes list shapes', () => {
    const shape = hv.list([hv.int()], hv.string()).listShape();

    expect(shape.prefix).toHaveLength(1);
    expect(shape.rest?.incompleteKind()).toBe(Kind.String);
    expect(hv.list([]).listShape()).toEqual({ prefix: [] });
  });

  it('marks close() structs as explicitly closed', () => {
    expect(hv.close({}).structOpenness()).toBe('explicitlyClosed');
    expect(hv.struct({}).structOpenness()).toBe('open');
  });
});

describe('labelMatches', () => {
  it('matches regular expression labels', () => {
    expect(labelMatches(hv.matches('^x-'), 'x-a')).toBe(true);
    expect(labelMatches(hv.matches('^x-'), 'a')).toBe(false);
    expect(labelMatches(hv.notMatches('^x-'), 'a')).toBe(true);
  });

  it('matches every name with string and one name with a literal', () => {
    expect(labelMatches(hv.string(), 'anything')).toBe(true);
    expect(labelMatches(hv.int(), 'anything')).toBe(false);
    expect(labelMatches(hv.lit('a'), 'a')).toBe(true);
    expect(labelMatches(hv.lit('a'), 'b')).toBe(false);
  });

  it('combines conjunctions and disjunctions', () => {
    const label = hv.and(hv.matches('^x'), hv.notMatches('y$'));

    expect(labelMatches(label, 'xa')).toBe(true);
    expect(labelMatches(label, 'xy')).toBe(false);
    expect(labelMatches(hv.or(hv.lit('a'), hv.lit('b')), 'b')).toBe(true);
  });
});

describe('kinds', () => {
  it('names kind sets', () => {
    expect(kindString(TopKind)).toBe('_');
    expect(kindString(Kind.Bottom)).toBe('_|_');
    expect(kindString(Kind.Int | Kind.String)).toBe('int|string');
  });

  it('maps kinds to JSON Schema types with number absorbing integer', () => {
    expect(kindToJSONSchemaTypes(NumberKind | Kind.Null)).toEqual(['number', 'null']);
    expect(kindToJSONSchemaTypes(Kind.Int | Kind.Struct)).toEqual(['integer', 'object']);
  });
});
