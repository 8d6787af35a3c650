import { describe, it, expect } from 'vitest';

import { ident, str } from '../ast.js';
import { formatNode } from '../print.js';
import {
  cmpSelector,
  defSel,
  exprAtPath,
  hiddenSel,
  indexSel,
  isValidIdent,
  labelForSelector,
  pathRefSyntax,
  pathString,
  pathToJSONPointer,
  selectorForLabel,
  stringSel,
} from '../path.js';

describe('selectors', () => {
  it('normalizes definition and hidden names', () => {
    expect(defSel('Node')).toEqual({ type: 'definition', name: '#Node' });
    expect(defSel('#Node')).toEqual({ type: 'definition', name: '#Node' });
    expect(hiddenSel('x')).toEqual({ type: 'hidden', name: '_x' });
    expect(hiddenSel('_#x')).toEqual({ type: 'hiddenDefinition', name: '_#x' });
  });

  it('quotes string selectors that are not identifiers', () => {
    expect(pathString([stringSel('a'), stringSel('b-c'), indexSel(2), defSel('D')])).toBe(
      'a."b-c".2.#D'
    );
  });

  it('orders regular fields before definitions and hidden fields', () => {
    const sels = [hiddenSel('z'), defSel('B'), stringSel('b'), defSel('A'), stringSel('a')];

    expect([...sels].sort(cmpSelector).map((s) => (s.type === 'index' ? s.index : s.name))).toEqual([
      'a',
      'b',
      '#A',
      '#B',
      '_z',
    ]);
  });
});

describe('isValidIdent', () => {
  it('accepts letters, digits after the first character, _ and $', () => {
    expect(isValidIdent('abc1')).toBe(true);
    expect(isValidIdent('$x')).toBe(true);
    expect(isValidIdent('1abc')).toBe(false);
    expect(isValidIdent('#1abc')).toBe(true);
    expect(isValidIdent('a-b')).toBe(false);
    expect(isValidIdent('')).toBe(false);
  });
});

describe('labels', () => {
  it('converts between labels and selectors', () => {
    expect(labelForSelector(stringSel('a'))).toMatchObject({ value: ident('a') });
    expect(labelForSelector(stringSel('a b'))).toMatchObject({ value: str('a b') });
    expect(labelForSelector(indexSel(0)).isErr()).toBe(true);
    expect(selectorForLabel(ident('#A'))).toMatchObject({ value: defSel('A') });
    expect(selectorForLabel(ident('_#A'))).toMatchObject({ value: hiddenSel('_#A') });
    expect(selectorForLabel(str('a b'))).toMatchObject({ value: stringSel('a b') });
  });
});

describe('path syntax', () => {
  it('builds reference expressions', () => {
    const ref = pathRefSyntax([stringSel('b'), stringSel('c d')], ident('#a'));

    expect(ref.isOk() && formatNode(ref.value)).toBe('#a.b."c d"');
  });

  it('nests a value under a path', () => {
    const expr = exprAtPath([defSel('a'), stringSel('b')], ident('int'));

    expect(expr.isOk() && formatNode(expr.value)).toBe('#a: b: int');
  });

  it('converts string and index paths to JSON Pointers', () => {
    const pointer = pathToJSONPointer([stringSel('a/b'), indexSel(1), stringSel('~')]);

    expect(pointer.isOk() && pointer.value).toBe('/a~1b/1/~0');
    expect(pathToJSONPointer([defSel('x')]).isErr()).toBe(true);
  });
});
