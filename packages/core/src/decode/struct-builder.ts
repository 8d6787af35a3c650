import {
  embed,
  field,
  ident,
  struct,
  type Decl,
  type Expr,
  type File,
  type Ident,
} from '../syntax/ast.js';
import {
  cmpSelector,
  exprAtPath,
  labelForSelector,
  pathRefSyntax,
  pathString,
  selectorForLabel,
  selectorKey,
  type Path,
  type Selector,
} from '../syntax/path.js';
import { err, ok, type Result } from '../types/result.js';

/** Name of the field that holds the root value when something refers to it. */
export const ROOT_IDENT_NAME = '_schema';

interface BuilderNode {
  /**
   * Set once `put` targets this node. Nodes on the way to one, or only
   * touched by `getRef`, have none.
   */
  value?: Expr;
  doc?: string;
  readonly entries: Map<string, { sel: Selector; node: BuilderNode }>;
}

function newNode(): BuilderNode {
  return { entries: new Map() };
}

/** Whether `put` targeted the node or anything beneath it. */
function isPresent(n: BuilderNode): boolean {
  return n.value !== undefined || [...n.entries.values()].some((c) => isPresent(c.node));
}

/**
 * Assembles the output file from values placed at paths, and binds the
 * identifiers of references to those paths once the final syntax exists.
 */
export class StructBuilder {
  private readonly root: BuilderNode = newNode();
  // Identifiers referring to top-level entries, keyed by selector.
  private readonly refIdents = new Map<string, Ident[]>();
  private readonly rootRefIdents: Ident[] = [];

  /**
   * Places `value` at `path`. Returns false when the path already holds a
   * value; the existing value is kept.
   */
  put(path: Path, value: Expr, doc?: string): boolean {
    const n = this.entryForPath(path);
    if (n.value !== undefined) {
      return false;
    }
    n.value = value;
    if (doc !== undefined) {
      n.doc = doc;
    }
    return true;
  }

  /**
   * A reference expression for `path`; the empty path refers to the root.
   * The node at `path` is touched but stays absent from the output until
   * a `put` targets it.
   */
  getRef(path: Path): Result<Expr, string> {
    const [first, ...rest] = path;
    if (first === undefined) {
      const ref = ident(ROOT_IDENT_NAME);
      this.rootRefIdents.push(ref);
      return ok(ref);
    }
    const base = labelForSelector(first);
    if (base.isErr()) return base;
    if (base.value.kind !== 'ident') {
      return err(
        `initial element of path ${JSON.stringify(pathString(path))} must be expressed as an identifier`
      );
    }
    this.entryForPath(path);
    const key = selectorKey(first);
    const idents = this.refIdents.get(key) ?? [];
    idents.push(base.value);
    this.refIdents.set(key, idents);
    return pathRefSyntax(rest, base.value);
  }

  syntax(): Result<File, string> {
    const decls: Decl[] = [];
    const built = this.appendDecls(this.root, decls, []);
    if (built.isErr()) return built;

    for (const decl of decls) {
      if (decl.kind !== 'field') continue;
      const sel = selectorForLabel(decl.label);
      if (sel.isErr()) continue;
      for (const id of this.refIdents.get(selectorKey(sel.value)) ?? []) {
        id.node = decl.value;
      }
    }

    const file: File = { kind: 'file', decls };
    if (this.rootRefIdents.length > 0) {
      const rootExpr = exprFromDecls(decls);
      for (const id of this.rootRefIdents) {
        id.node = rootExpr;
      }
      file.decls = [
        embed(ident(ROOT_IDENT_NAME, rootExpr)),
        field(ident(ROOT_IDENT_NAME), rootExpr),
      ];
    }
    if (this.root.doc !== undefined) {
      file.doc = this.root.doc;
    }
    return ok(file);
  }

  private entryForPath(path: Path): BuilderNode {
    let n = this.root;
    for (const sel of path) {
      const key = selectorKey(sel);
      let child = n.entries.get(key);
      if (child === undefined) {
        child = { sel, node: newNode() };
        n.entries.set(key, child);
      }
      n = child.node;
    }
    return n;
  }

  private appendDecls(n: BuilderNode, decls: Decl[], path: Selector[]): Result<void, string> {
    const children = [...n.entries.values()]
      .filter((c) => isPresent(c.node))
      .sort((a, b) => cmpSelector(a.sel, b.sel));
    if (n.value !== undefined && children.length > 0) {
      // A value with entries beneath it: `#x: string` and `#x: #y: bool`
      // cannot both be written, so nest everything in one struct literal.
      const inner: Decl[] = [];
      const own = appendField(inner, [], n.value, undefined);
      if (own.isErr()) return own;
      for (const child of children) {
        const r = this.appendDecls(child.node, inner, [child.sel]);
        if (r.isErr()) return r;
      }
      return appendField(decls, path, exprFromDecls(inner), n.doc);
    }
    if (n.value !== undefined) {
      // The root doc comment is attached to the file by the caller.
      const r = appendField(decls, path, n.value, path.length > 0 ? n.doc : undefined);
      if (r.isErr()) return r;
    }
    for (const child of children) {
      const r = this.appendDecls(child.node, decls, [...path, child.sel]);
      if (r.isErr()) return r;
    }
    return ok(undefined);
  }
}

function exprFromDecls(decls: Decl[]): Expr {
  const only = decls[0];
  if (decls.length === 1 && only !== undefined && only.kind === 'embed') {
    return only.expr;
  }
  return struct(...decls);
}

function appendDeclsExpr(decls: Decl[], expr: Expr): void {
  if (expr.kind === 'struct' && expr.inline !== true) {
    decls.push(...expr.elts);
  } else {
    decls.push(embed(expr));
  }
}

function appendField(
  decls: Decl[],
  path: Path,
  value: Expr,
  doc: string | undefined
): Result<void, string> {
  if (path.length === 0) {
    appendDeclsExpr(decls, value);
    return ok(undefined);
  }
  const expr = exprAtPath(path, value);
  if (expr.isErr()) return expr;
  // A non-empty path always yields a single-field struct.
  const elt = expr.value.kind === 'struct' ? expr.value.elts[0] : undefined;
  if (elt === undefined || elt.kind !== 'field') {
    return err(`cannot place value at ${pathString(path)}`);
  }
  if (doc !== undefined) {
    elt.doc = doc;
  }
  decls.push(elt);
  return ok(undefined);
}
