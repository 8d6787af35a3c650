import type {
  Decl,
  Ellipsis,
  Expr,
  Field,
  File,
  ImportDecl,
  Label,
} from './ast.js';

const INDENT = '\t';

/**
 * Renders syntax nodes as type-language source text.
 * Output is deterministic: the same tree always prints byte-identically.
 */
export function formatNode(node: File | Expr | Decl): string {
  switch (node.kind) {
    case 'file':
      return formatFile(node);
    case 'field':
    case 'embed':
    case 'ellipsis':
    case 'attr':
    case 'package':
    case 'import':
      return printDecl(node, 0);
    default:
      return printExpr(node, 0);
  }
}

function formatFile(file: File): string {
  const lines: string[] = [];
  if (file.doc !== undefined) {
    lines.push(...docLines(file.doc, 0), '');
  }
  file.decls.forEach((decl, i) => {
    lines.push(printDecl(decl, 0));
    const next = file.decls[i + 1];
    if (next !== undefined && needsBlankLine(decl, next)) {
      lines.push('');
    }
  });
  return `${lines.join('\n')}\n`;
}

function needsBlankLine(decl: Decl, next: Decl): boolean {
  if (decl.kind === 'package' || decl.kind === 'import') {
    return true;
  }
  return decl.kind === 'attr' && next.kind !== 'attr';
}

function printDecl(decl: Decl, depth: number): string {
  switch (decl.kind) {
    case 'field':
      return printField(decl, depth);
    case 'embed':
      return withDoc(decl.doc, depth, printExpr(decl.expr, depth));
    case 'ellipsis':
      return printEllipsis(decl, depth);
    case 'attr':
      return decl.text;
    case 'package':
      return `package ${decl.name}`;
    case 'import':
      return printImport(decl);
  }
}

function printField(f: Field, depth: number): string {
  let text = printLabel(f.label, depth);
  if (f.constraint === 'optional') {
    text += '?';
  } else if (f.constraint === 'required') {
    text += '!';
  }
  text += `: ${printExpr(f.value, depth)}`;
  for (const a of f.attrs ?? []) {
    text += ` ${a.text}`;
  }
  return withDoc(f.doc, depth, text);
}

function withDoc(doc: string | undefined, depth: number, text: string): string {
  if (doc === undefined) {
    return text;
  }
  const pad = INDENT.repeat(depth);
  return [...docLines(doc, depth), `${pad}${text}`].join('\n').slice(pad.length);
}

function docLines(doc: string, depth: number): string[] {
  const pad = INDENT.repeat(depth);
  return doc.split('\n').map((line) => (line === '' ? `${pad}//` : `${pad}// ${line}`));
}

function printLabel(label: Label, depth: number): string {
  switch (label.kind) {
    case 'ident':
      return label.name;
    case 'lit':
      return label.value;
    case 'list':
      return printList(label.elts, depth);
  }
}

function printImport(decl: ImportDecl): string {
  const first = decl.specs[0];
  if (decl.specs.length === 1 && first !== undefined) {
    return `import ${JSON.stringify(first.path)}`;
  }
  const body = decl.specs.map((s) => `${INDENT}${JSON.stringify(s.path)}`);
  return ['import (', ...body, ')'].join('\n');
}

function printEllipsis(e: Ellipsis, depth: number): string {
  return e.type === undefined ? '...' : `...${printExpr(e.type, depth)}`;
}

function printList(elts: ReadonlyArray<Expr | Ellipsis>, depth: number): string {
  const parts = elts.map((e) =>
    e.kind === 'ellipsis' ? printEllipsis(e, depth) : printExpr(e, depth)
  );
  return `[${parts.join(', ')}]`;
}

function printExpr(x: Expr, depth: number): string {
  switch (x.kind) {
    case 'ident':
      return x.name;
    case 'lit':
      return x.value;
    case 'list':
      return printList(x.elts, depth);
    case 'struct': {
      const only = x.elts[0];
      if (x.inline === true && x.elts.length === 1 && only !== undefined && only.kind === 'field') {
        return printField(only, depth);
      }
      if (x.elts.length === 0) {
        return '{}';
      }
      if (x.elts.length === 1 && only !== undefined && only.kind === 'ellipsis') {
        return `{${printEllipsis(only, depth)}}`;
      }
      const pad = INDENT.repeat(depth + 1);
      const body = x.elts.map((d) => `${pad}${printDecl(d, depth + 1)}`);
      return ['{', ...body, `${INDENT.repeat(depth)}}`].join('\n');
    }
    case 'unary': {
      const operand = printExpr(x.x, depth);
      return x.x.kind === 'binary' ? `${x.op}(${operand})` : `${x.op}${operand}`;
    }
    case 'binary':
      return x.operands
        .map((operand) => {
          const text = printExpr(operand, depth);
          return operand.kind === 'binary' && operand.op !== x.op ? `(${text})` : text;
        })
        .join(` ${x.op} `);
    case 'call':
      return `${printExpr(x.fun, depth)}(${x.args.map((a) => printExpr(a, depth)).join(', ')})`;
    case 'selector':
      return `${printExpr(x.x, depth)}.${printLabel(x.sel, depth)}`;
    case 'index':
      return `${printExpr(x.x, depth)}[${printExpr(x.index, depth)}]`;
    case 'bad':
      return '_|_';
  }
}
