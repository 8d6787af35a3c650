import type { SchemaNode } from '../schema-node.js';
import type { SchemaState } from '../state.js';

/**
 * Translates one keyword of the schema object decoded by `s`. `n` is the
 * keyword's value.
 */
export type KeywordHandler = (key: string, n: SchemaNode, s: SchemaState) => void;
