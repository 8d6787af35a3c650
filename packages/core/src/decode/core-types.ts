import { Kind, NumberKind, type KindSet } from '../host/kind.js';

/** JSON Schema's core types, indexing the per-type constraint lists. */
export const CoreType = {
  Null: 0,
  Bool: 1,
  Number: 2,
  String: 3,
  Array: 4,
  Object: 5,
} as const;

export type CoreType = (typeof CoreType)[keyof typeof CoreType];

export const CORE_TYPES: readonly CoreType[] = [0, 1, 2, 3, 4, 5];

// Number covers both int and float.
export const CORE_KINDS: Readonly<Record<CoreType, KindSet>> = {
  0: Kind.Null,
  1: Kind.Bool,
  2: NumberKind,
  3: Kind.String,
  4: Kind.List,
  5: Kind.Struct,
};

export const CORE_TYPE_NAMES: Readonly<Record<CoreType, string>> = {
  0: 'null',
  1: 'bool',
  2: 'number',
  3: 'string',
  4: 'array',
  5: 'object',
};
