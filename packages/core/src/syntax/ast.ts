/**
 * Output syntax tree for the type language.
 *
 * Extract builds these nodes directly; Generate builds JSON-Schema-shaped
 * struct literals with the same node set. Nodes are plain objects tagged by
 * `kind` so that consumers can switch exhaustively.
 */

export type UnaryOp = '<' | '<=' | '>' | '>=' | '!=' | '=~' | '!~' | '-' | '!';

export type BinaryOp = '&' | '|';

/** Marks a field as optional (`?`) or required (`!`). */
export type FieldConstraint = 'optional' | 'required';

export interface ImportSpec {
  readonly kind: 'importSpec';
  readonly path: string;
}

export interface Ident {
  readonly kind: 'ident';
  readonly name: string;
  /**
   * The node this identifier resolves to: an import for package
   * qualifiers, or the referenced expression once references are bound.
   */
  node?: Expr | ImportSpec;
}

export type LiteralType = 'string' | 'number' | 'bool' | 'null';

export interface BasicLit {
  readonly kind: 'lit';
  readonly type: LiteralType;
  /** Source text of the literal, already quoted for strings. */
  readonly value: string;
}

export interface ListLit {
  readonly kind: 'list';
  readonly elts: Array<Expr | Ellipsis>;
}

export interface Ellipsis {
  readonly kind: 'ellipsis';
  readonly type?: Expr;
}

export interface StructLit {
  readonly kind: 'struct';
  elts: Decl[];
  /**
   * Print a single-field struct as `label: value` without braces, as used
   * for nested paths such as `#: "a-b": x`.
   */
  inline?: boolean;
}

export interface UnaryExpr {
  readonly kind: 'unary';
  readonly op: UnaryOp;
  readonly x: Expr;
}

/** An n-ary chain of `&` or `|`. Always holds at least two operands. */
export interface BinaryExpr {
  readonly kind: 'binary';
  readonly op: BinaryOp;
  readonly operands: readonly Expr[];
}

export interface CallExpr {
  readonly kind: 'call';
  readonly fun: Expr;
  readonly args: readonly Expr[];
}

export interface SelectorExpr {
  readonly kind: 'selector';
  readonly x: Expr;
  readonly sel: Ident | BasicLit;
}

export interface IndexExpr {
  readonly kind: 'index';
  readonly x: Expr;
  readonly index: Expr;
}

/** Placeholder emitted where translation of a sub-expression failed. */
export interface BadExpr {
  readonly kind: 'bad';
  readonly pointer?: string;
}

export type Expr =
  | Ident
  | BasicLit
  | ListLit
  | StructLit
  | UnaryExpr
  | BinaryExpr
  | CallExpr
  | SelectorExpr
  | IndexExpr
  | BadExpr;

/** Field labels: identifiers, quoted strings or `[pattern]` constraints. */
export type Label = Ident | BasicLit | ListLit;

export interface Attribute {
  readonly kind: 'attr';
  /** Full text including the leading `@`. */
  readonly text: string;
}

export interface Field {
  readonly kind: 'field';
  readonly label: Label;
  value: Expr;
  constraint?: FieldConstraint;
  attrs?: Attribute[];
  doc?: string;
}

export interface EmbedDecl {
  readonly kind: 'embed';
  readonly expr: Expr;
  doc?: string;
}

export interface PackageClause {
  readonly kind: 'package';
  readonly name: string;
}

export interface ImportDecl {
  readonly kind: 'import';
  readonly specs: readonly ImportSpec[];
}

export type Decl =
  | Field
  | EmbedDecl
  | Ellipsis
  | Attribute
  | PackageClause
  | ImportDecl;

export interface File {
  readonly kind: 'file';
  decls: Decl[];
  doc?: string;
}

export function ident(name: string, node?: Expr | ImportSpec): Ident {
  return node === undefined ? { kind: 'ident', name } : { kind: 'ident', name, node };
}

export function str(value: string): BasicLit {
  return { kind: 'lit', type: 'string', value: JSON.stringify(value) };
}

export function num(value: number): BasicLit {
  return { kind: 'lit', type: 'number', value: formatNumber(value) };
}

export function bool(value: boolean): BasicLit {
  return { kind: 'lit', type: 'bool', value: String(value) };
}

export function nullLit(): BasicLit {
  return { kind: 'lit', type: 'null', value: 'null' };
}

export function list(...elts: Array<Expr | Ellipsis>): ListLit {
  return { kind: 'list', elts };
}

export function ellipsis(type?: Expr): Ellipsis {
  return type === undefined ? { kind: 'ellipsis' } : { kind: 'ellipsis', type };
}

export function struct(...elts: Decl[]): StructLit {
  return { kind: 'struct', elts };
}

export function unary(op: UnaryOp, x: Expr): UnaryExpr {
  return { kind: 'unary', op, x };
}

/**
 * Joins expressions with `op`, flattening nested chains of the same
 * operator. A single operand is returned unchanged.
 */
export function binary(op: BinaryOp, first: Expr, ...rest: Expr[]): Expr {
  if (rest.length === 0) {
    return first;
  }
  const operands: Expr[] = [];
  for (const x of [first, ...rest]) {
    if (x.kind === 'binary' && x.op === op) {
      operands.push(...x.operands);
    } else {
      operands.push(x);
    }
  }
  return { kind: 'binary', op, operands };
}

export function call(fun: Expr, ...args: Expr[]): CallExpr {
  return { kind: 'call', fun, args };
}

export function selector(x: Expr, sel: Ident | BasicLit | string): SelectorExpr {
  return { kind: 'selector', x, sel: typeof sel === 'string' ? ident(sel) : sel };
}

export function index(x: Expr, i: number): IndexExpr {
  return { kind: 'index', x, index: num(i) };
}

export function field(
  label: Label | string,
  value: Expr,
  constraint?: FieldConstraint
): Field {
  const f: Field = {
    kind: 'field',
    label: typeof label === 'string' ? str(label) : label,
    value,
  };
  if (constraint !== undefined) {
    f.constraint = constraint;
  }
  return f;
}

export function embed(expr: Expr): EmbedDecl {
  return { kind: 'embed', expr };
}

export function attr(text: string): Attribute {
  return { kind: 'attr', text };
}

export function importSpec(path: string): ImportSpec {
  return { kind: 'importSpec', path };
}

export function top(): Ident {
  return ident('_');
}

export function isTop(x: Expr): boolean {
  return x.kind === 'ident' && x.name === '_';
}

/** `error("disallowed")`, the expression for a schema that allows nothing. */
export function errorDisallowed(): CallExpr {
  return call(ident('error'), str('disallowed'));
}

export function isErrorCall(x: Expr): boolean {
  return x.kind === 'call' && x.fun.kind === 'ident' && x.fun.name === 'error';
}

/** The unquoted name of a string or identifier label. */
export function labelName(label: Label): string | undefined {
  switch (label.kind) {
    case 'ident':
      return label.name;
    case 'lit':
      if (label.type !== 'string') return undefined;
      return unquote(label.value);
    case 'list':
      return undefined;
  }
}

export function unquote(quoted: string): string | undefined {
  try {
    const value: unknown = JSON.parse(quoted);
    return typeof value === 'string' ? value : undefined;
  } catch {
    return undefined;
  }
}

export function formatNumber(n: number): string {
  if (Object.is(n, -0)) return '0';
  return String(n);
}
