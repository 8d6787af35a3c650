import { call, selector, unary } from '../../syntax/ast.js';
import { CoreType } from '../core-types.js';
import type { SchemaNode } from '../schema-node.js';
import type { SchemaState } from '../state.js';

export function constraintMinLength(_key: string, n: SchemaNode, s: SchemaState): void {
  const strings = s.decoder.addImport('strings');
  s.add(CoreType.String, n, call(selector(strings, 'MinRunes'), s.decoder.uint(n)));
}

export function constraintMaxLength(_key: string, n: SchemaNode, s: SchemaState): void {
  const strings = s.decoder.addImport('strings');
  s.add(CoreType.String, n, call(selector(strings, 'MaxRunes'), s.decoder.uint(n)));
}

export function constraintPattern(_key: string, n: SchemaNode, s: SchemaState): void {
  const re = s.decoder.regexpValue(n);
  if (re !== undefined) {
    s.add(CoreType.String, n, unary('=~', re));
  }
}
