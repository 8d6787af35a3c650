/**
 * Kind bitsets shared by the decoder and the host value model.
 */
export const Kind = {
  Bottom: 0,
  Null: 1 << 0,
  Bool: 1 << 1,
  Int: 1 << 2,
  Float: 1 << 3,
  String: 1 << 4,
  List: 1 << 5,
  Struct: 1 << 6,
} as const;

export type KindSet = number;

export const NumberKind: KindSet = Kind.Int | Kind.Float;

export const TopKind: KindSet =
  Kind.Null | Kind.Bool | NumberKind | Kind.String | Kind.List | Kind.Struct;

const KIND_NAMES: ReadonlyArray<readonly [KindSet, string]> = [
  [Kind.Null, 'null'],
  [Kind.Bool, 'bool'],
  [Kind.Int, 'int'],
  [Kind.Float, 'float'],
  [Kind.String, 'string'],
  [Kind.List, 'list'],
  [Kind.Struct, 'struct'],
];

export function kindCount(k: KindSet): number {
  let n = 0;
  for (const [bit] of KIND_NAMES) {
    if ((k & bit) !== 0) n++;
  }
  return n;
}

export function kindString(k: KindSet): string {
  if (k === TopKind) return '_';
  if (k === Kind.Bottom) return '_|_';
  return KIND_NAMES.filter(([bit]) => (k & bit) !== 0)
    .map(([, name]) => name)
    .join('|');
}

/** JSON Schema `type` names for a kind set, `number` absorbing `integer`. */
export function kindToJSONSchemaTypes(k: KindSet): string[] {
  const types: string[] = [];
  let kind = k;
  if ((kind & Kind.Float) !== 0) {
    kind &= ~NumberKind;
    types.push('number');
  }
  const names: ReadonlyArray<readonly [KindSet, string]> = [
    [Kind.Null, 'null'],
    [Kind.Bool, 'boolean'],
    [Kind.Int, 'integer'],
    [Kind.String, 'string'],
    [Kind.List, 'array'],
    [Kind.Struct, 'object'],
  ];
  for (const [bit, name] of names) {
    if ((kind & bit) !== 0) types.push(name);
  }
  return types;
}

export function jsonKind(value: unknown): KindSet {
  if (value === null) return Kind.Null;
  switch (typeof value) {
    case 'boolean':
      return Kind.Bool;
    case 'number':
      return Number.isInteger(value) ? Kind.Int : Kind.Float;
    case 'string':
      return Kind.String;
    case 'object':
      return Array.isArray(value) ? Kind.List : Kind.Struct;
    default:
      return Kind.Bottom;
  }
}
