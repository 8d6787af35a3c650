/**
 * The view of type-language values that Generate needs.
 *
 * An evaluator exposes its values through this interface; {@link hv} in
 * `model.ts` provides an in-memory implementation.
 */
import type { Path } from '../syntax/path.js';
import type { Result } from '../types/result.js';
import type { JsonValue } from '../util/json.js';
import type { KindSet } from './kind.js';

export type CompareOp = '<' | '<=' | '>' | '>=';

export type HostExpr =
  /** No further decomposition: a basic type, literal, struct or list. */
  | { readonly op: 'none' }
  | { readonly op: 'and' | 'or'; readonly args: readonly HostValue[] }
  | { readonly op: CompareOp | '==' | '!=' | '=~' | '!~'; readonly args: readonly HostValue[] }
  | { readonly op: 'call'; readonly fn: string; readonly args: readonly HostValue[] };

export type FieldKind = 'regular' | 'optional' | 'required';

export interface HostField {
  readonly name: string;
  readonly kind: FieldKind;
  readonly value: HostValue;
}

export interface HostPattern {
  /** The label constraint, such as `=~"^x-"` or `string`. */
  readonly label: HostValue;
  readonly value: HostValue;
}

/**
 * `explicitlyClosed` comes from `close()`; `closed` from definitions;
 * `explicitlyOpen` from a trailing `...`.
 */
export type StructOpenness = 'open' | 'explicitlyOpen' | 'closed' | 'explicitlyClosed';

export interface ListShape {
  readonly prefix: readonly HostValue[];
  /** Element type beyond the prefix; absent for closed lists. */
  readonly rest?: HostValue;
}

export interface ReferencePath {
  readonly root: HostValue;
  readonly path: Path;
}

export interface HostValue {
  expr(): HostExpr;
  /** Set when the value is a reference to another value. */
  referencePath(): ReferencePath | undefined;
  /** The value with references resolved. */
  eval(): HostValue;
  /** Kind of a concrete value; Bottom when not concrete. */
  kind(): KindSet;
  /** Every kind the value could take. */
  incompleteKind(): KindSet;
  isConcrete(): boolean;
  /** Errors in the value, empty when it is valid. */
  validate(): string[];
  fields(): readonly HostField[];
  patterns(): readonly HostPattern[];
  structOpenness(): StructOpenness;
  listShape(): ListShape;
  concrete(): Result<JsonValue, string>;
}
