/**
 * Paths into type-language values: sequences of selectors, and the
 * conversions between selectors, labels and reference expressions.
 */
import {
  field,
  ident,
  selector as selectorExpr,
  str,
  struct,
  unquote,
  type BasicLit,
  type Expr,
  type Ident,
  type Label,
} from './ast.js';
import { err, ok, type Result } from '../types/result.js';

// Ordering of selector types when sorting sibling nodes.
const SELECTOR_TYPE_ORDER = {
  string: 0,
  index: 1,
  definition: 2,
  hidden: 3,
  hiddenDefinition: 4,
} as const;

export type SelectorType = keyof typeof SELECTOR_TYPE_ORDER;

export type Selector =
  | { readonly type: 'index'; readonly index: number }
  | {
      readonly type: Exclude<SelectorType, 'index'>;
      readonly name: string;
    };

export type Path = readonly Selector[];

export function stringSel(name: string): Selector {
  return { type: 'string', name };
}

export function defSel(name: string): Selector {
  return { type: 'definition', name: name.startsWith('#') ? name : `#${name}` };
}

export function hiddenSel(name: string): Selector {
  return name.startsWith('_#')
    ? { type: 'hiddenDefinition', name }
    : { type: 'hidden', name: name.startsWith('_') ? name : `_${name}` };
}

export function indexSel(index: number): Selector {
  return { type: 'index', index };
}

/**
 * Reports whether `name` can be written as a bare identifier.
 * `_` and `#` prefixes allow a leading digit.
 */
export function isValidIdent(name: string): boolean {
  if (name === '') return false;
  let rest = name;
  let prefixed = false;
  if (rest.startsWith('_')) {
    rest = rest.slice(1);
    prefixed = true;
    if (rest === '') return true;
  }
  if (rest.startsWith('#')) {
    rest = rest.slice(1);
    prefixed = true;
  }
  if (!prefixed && /^\p{Nd}/u.test(rest)) {
    return false;
  }
  return /^[\p{L}\p{Nd}_$]*$/u.test(rest);
}

/** Text form of a selector as it would appear in a path. */
export function selectorString(sel: Selector): string {
  switch (sel.type) {
    case 'index':
      return String(sel.index);
    case 'string':
      return isPlainIdent(sel.name) ? sel.name : JSON.stringify(sel.name);
    default:
      return sel.name;
  }
}

function isPlainIdent(name: string): boolean {
  return isValidIdent(name) && !name.startsWith('#') && !name.startsWith('_');
}

/** Map key identifying a selector. */
export function selectorKey(sel: Selector): string {
  return sel.type === 'index' ? `index:${sel.index}` : `${sel.type}:${sel.name}`;
}

export function cmpSelector(a: Selector, b: Selector): number {
  const ta = SELECTOR_TYPE_ORDER[a.type];
  const tb = SELECTOR_TYPE_ORDER[b.type];
  if (ta !== tb) return ta - tb;
  const sa = selectorString(a);
  const sb = selectorString(b);
  return sa < sb ? -1 : sa > sb ? 1 : 0;
}

export function pathString(path: Path): string {
  return path.map(selectorString).join('.');
}

export function pathConcat(...paths: Path[]): Path {
  return paths.flat();
}

export function selectorForLabel(label: Label): Result<Selector, string> {
  switch (label.kind) {
    case 'ident':
      if (label.name.startsWith('_#')) {
        return ok({ type: 'hiddenDefinition', name: label.name });
      }
      if (label.name.startsWith('_')) {
        return ok({ type: 'hidden', name: label.name });
      }
      if (label.name.startsWith('#')) {
        return ok({ type: 'definition', name: label.name });
      }
      return ok(stringSel(label.name));
    case 'lit': {
      const name = label.type === 'string' ? unquote(label.value) : undefined;
      return name === undefined
        ? err(`cannot use ${label.value} as a label`)
        : ok(stringSel(name));
    }
    case 'list':
      return err('pattern constraints have no selector');
  }
}

export function labelForSelector(sel: Selector): Result<Ident | BasicLit, string> {
  switch (sel.type) {
    case 'index':
      return err(`cannot use index selector ${sel.index} as a label`);
    case 'string':
      return ok(isPlainIdent(sel.name) ? ident(sel.name) : str(sel.name));
    default:
      return ok(ident(sel.name));
  }
}

/**
 * Selector expression for `path` rooted at `root`.
 */
export function pathRefSyntax(path: Path, root: Expr): Result<Expr, string> {
  let expr = root;
  for (const sel of path) {
    const label = labelForSelector(sel);
    if (label.isErr()) return label;
    expr = selectorExpr(expr, label.value);
  }
  return ok(expr);
}

/**
 * `expr` nested under `path`: `a: b: expr`. Returns `expr` itself for
 * the empty path.
 */
export function exprAtPath(path: Path, expr: Expr): Result<Expr, string> {
  let out = expr;
  for (let i = path.length - 1; i >= 0; i--) {
    const sel = path[i];
    if (sel === undefined) continue;
    const label = labelForSelector(sel);
    if (label.isErr()) return label;
    const s = struct(field(label.value, out));
    s.inline = true;
    out = s;
  }
  return ok(out);
}

/**
 * JSON Pointer for a path of string and index selectors.
 */
export function pathToJSONPointer(path: Path): Result<string, string> {
  let out = '';
  for (const sel of path) {
    switch (sel.type) {
      case 'string':
        out += `/${sel.name.replace(/~/g, '~0').replace(/\//g, '~1')}`;
        break;
      case 'index':
        out += `/${sel.index}`;
        break;
      default:
        return err(`cannot convert selector ${sel.name} to a JSON pointer`);
    }
  }
  return ok(out);
}
