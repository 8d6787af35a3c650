import { importSpec, type Decl, type Expr, type File, type ImportSpec } from './ast.js';
import { isValidIdent } from './path.js';

export interface ImportPathInfo {
  /** Path without the qualifier suffix. */
  path: string;
  /** Package name used to refer to the import; empty when none can be derived. */
  qualifier: string;
  explicitQualifier: boolean;
}

/**
 * Splits `host/path/elem:qualifier`. Without an explicit qualifier the
 * last path element is used, minus any `@version` suffix.
 */
export function parseImportPath(importPath: string): ImportPathInfo {
  const colon = importPath.lastIndexOf(':');
  const slash = importPath.lastIndexOf('/');
  if (colon > slash) {
    const qualifier = importPath.slice(colon + 1);
    return {
      path: importPath.slice(0, colon),
      qualifier: isValidIdent(qualifier) ? qualifier : '',
      explicitQualifier: true,
    };
  }
  let last = importPath.slice(slash + 1);
  const at = last.indexOf('@');
  if (at >= 0) {
    last = last.slice(0, at);
  }
  return {
    path: importPath,
    qualifier: isValidIdent(last) && !last.startsWith('#') && !last.startsWith('_') ? last : '',
    explicitQualifier: false,
  };
}

/** Calls `fn` for every expression in the tree, parents first. */
export function walkExprs(node: File | Decl | Expr, fn: (x: Expr) => void): void {
  switch (node.kind) {
    case 'file':
      node.decls.forEach((d) => walkExprs(d, fn));
      return;
    case 'field':
      if (node.label.kind === 'list') walkExprs(node.label, fn);
      walkExprs(node.value, fn);
      return;
    case 'embed':
      walkExprs(node.expr, fn);
      return;
    case 'ellipsis':
      if (node.type !== undefined) walkExprs(node.type, fn);
      return;
    case 'attr':
    case 'package':
    case 'import':
      return;
  }
  fn(node);
  switch (node.kind) {
    case 'list':
      for (const e of node.elts) {
        if (e.kind === 'ellipsis') {
          if (e.type !== undefined) walkExprs(e.type, fn);
        } else {
          walkExprs(e, fn);
        }
      }
      return;
    case 'struct':
      node.elts.forEach((d) => walkExprs(d, fn));
      return;
    case 'unary':
      walkExprs(node.x, fn);
      return;
    case 'binary':
      node.operands.forEach((x) => walkExprs(x, fn));
      return;
    case 'call':
      walkExprs(node.fun, fn);
      node.args.forEach((x) => walkExprs(x, fn));
      return;
    case 'selector':
      walkExprs(node.x, fn);
      return;
    case 'index':
      walkExprs(node.x, fn);
      walkExprs(node.index, fn);
      return;
    default:
      return;
  }
}

/**
 * Adds one import declaration, after the package clause, for every
 * package that an identifier in the file is bound to. Paths are sorted.
 */
export function addImports(file: File): void {
  const paths = new Set<string>();
  walkExprs(file, (x) => {
    if (x.kind === 'ident' && x.node?.kind === 'importSpec') {
      paths.add(x.node.path);
    }
  });
  if (paths.size === 0) {
    return;
  }
  const specs: ImportSpec[] = [...paths].sort().map(importSpec);
  const at = file.decls.findIndex((d) => d.kind === 'package') + 1;
  file.decls.splice(at, 0, { kind: 'import', specs });
}
