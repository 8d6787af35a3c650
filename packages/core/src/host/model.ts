/**
 * In-memory, already evaluated host values.
 *
 * Structs unify pattern constraints into matching fields the way an
 * evaluator would, so a field matching `[=~"^a"]: int` carries both its
 * own value and `int`.
 */
import { collect, err, ok, type Result } from '../types/result.js';
import type { Path } from '../syntax/path.js';
import { isJsonObject, type JsonValue } from '../util/json.js';
import { Kind, NumberKind, TopKind, jsonKind, type KindSet } from './kind.js';
import type {
  CompareOp,
  FieldKind,
  HostExpr,
  HostField,
  HostPattern,
  HostValue,
  ListShape,
  ReferencePath,
  StructOpenness,
} from './types.js';

type Scalar = string | number | boolean | null;

type Form =
  | { readonly type: 'top' }
  | { readonly type: 'bottom'; readonly message: string }
  | { readonly type: 'kind'; readonly kind: KindSet }
  | { readonly type: 'scalar'; readonly value: Scalar }
  | {
      readonly type: 'struct';
      readonly fields: readonly HostField[];
      readonly patterns: readonly HostPattern[];
      readonly openness: StructOpenness;
    }
  | { readonly type: 'list'; readonly prefix: readonly HostValue[]; readonly rest?: HostValue }
  | {
      readonly type: 'unary';
      readonly op: CompareOp | '==' | '!=' | '=~' | '!~';
      readonly arg: HostValue;
    }
  | { readonly type: 'and' | 'or'; readonly args: readonly HostValue[] }
  | { readonly type: 'call'; readonly fn: string; readonly args: readonly HostValue[]; readonly kind: KindSet }
  | { readonly type: 'ref'; readonly root: HostValue; readonly path: Path; readonly target: () => HostValue };

class ModelValue implements HostValue {
  constructor(private readonly form: Form) {}

  expr(): HostExpr {
    const f = this.form;
    switch (f.type) {
      case 'unary':
        return { op: f.op, args: [f.arg] };
      case 'and':
      case 'or':
        return { op: f.type, args: f.args };
      case 'call':
        return { op: 'call', fn: f.fn, args: f.args };
      default:
        return { op: 'none' };
    }
  }

  referencePath(): ReferencePath | undefined {
    return this.form.type === 'ref' ? { root: this.form.root, path: this.form.path } : undefined;
  }

  eval(): HostValue {
    return this.form.type === 'ref' ? this.form.target().eval() : this;
  }

  kind(): KindSet {
    if (!this.isConcrete()) return Kind.Bottom;
    return this.incompleteKind();
  }

  incompleteKind(): KindSet {
    const f = this.form;
    switch (f.type) {
      case 'top':
        return TopKind;
      case 'bottom':
        return Kind.Bottom;
      case 'kind':
        return f.kind;
      case 'scalar':
        return jsonKind(f.value);
      case 'struct':
        return Kind.Struct;
      case 'list':
        return Kind.List;
      case 'unary':
        switch (f.op) {
          case '=~':
          case '!~':
            return Kind.String;
          case '==':
            return f.arg.incompleteKind();
          case '!=':
            return TopKind;
          default:
            return f.arg.incompleteKind() & Kind.String ? Kind.String : NumberKind;
        }
      case 'and':
        return f.args.reduce<KindSet>((k, a) => k & a.incompleteKind(), TopKind);
      case 'or':
        return f.args.reduce<KindSet>((k, a) => k | a.incompleteKind(), Kind.Bottom);
      case 'call':
        return f.kind;
      case 'ref':
        return f.target().incompleteKind();
    }
  }

  isConcrete(): boolean {
    const f = this.form;
    switch (f.type) {
      case 'scalar':
        return true;
      case 'struct':
        return f.fields.every((x) => x.kind !== 'regular' || x.value.isConcrete())
          && f.fields.every((x) => x.kind !== 'required');
      case 'list':
        return f.rest === undefined && f.prefix.every((x) => x.isConcrete());
      case 'and':
        return f.args.some((a) => a.isConcrete());
      case 'ref':
        return f.target().isConcrete();
      default:
        return false;
    }
  }

  validate(): string[] {
    const f = this.form;
    switch (f.type) {
      case 'bottom':
        return [f.message];
      case 'struct':
        // An optional field with an invalid value is only disallowed.
        return [
          ...f.fields.flatMap((x) => (x.kind === 'optional' ? [] : x.value.validate())),
          ...f.patterns.flatMap((p) => p.value.validate()),
        ];
      case 'list':
        return [...f.prefix.flatMap((x) => x.validate()), ...(f.rest?.validate() ?? [])];
      case 'or': {
        const problems = f.args.map((a) => a.validate());
        return problems.some((p) => p.length === 0) ? [] : problems.flat();
      }
      case 'and':
      case 'call':
        return f.args.flatMap((a) => a.validate());
      case 'unary':
        return f.arg.validate();
      default:
        return [];
    }
  }

  fields(): readonly HostField[] {
    const v = this.eval();
    if (v !== this) return v.fields();
    return this.form.type === 'struct' ? this.form.fields : [];
  }

  patterns(): readonly HostPattern[] {
    const v = this.eval();
    if (v !== this) return v.patterns();
    return this.form.type === 'struct' ? this.form.patterns : [];
  }

  structOpenness(): StructOpenness {
    const v = this.eval();
    if (v !== this) return v.structOpenness();
    return this.form.type === 'struct' ? this.form.openness : 'open';
  }

  listShape(): ListShape {
    const v = this.eval();
    if (v !== this) return v.listShape();
    if (this.form.type !== 'list') return { prefix: [] };
    return this.form.rest === undefined
      ? { prefix: this.form.prefix }
      : { prefix: this.form.prefix, rest: this.form.rest };
  }

  concrete(): Result<JsonValue, string> {
    const f = this.form;
    switch (f.type) {
      case 'scalar':
        return ok(f.value);
      case 'list': {
        if (f.rest !== undefined) return err('open list is not concrete');
        return collect(f.prefix, (x) => x.concrete());
      }
      case 'struct': {
        const out: { [key: string]: JsonValue } = {};
        for (const x of f.fields) {
          if (x.kind === 'optional') continue;
          const v = x.value.concrete();
          if (v.isErr()) return v;
          out[x.name] = v.value;
        }
        return ok(out);
      }
      case 'and': {
        const c = f.args.find((a) => a.isConcrete());
        return c === undefined ? err('value is not concrete') : c.concrete();
      }
      case 'ref':
        return f.target().concrete();
      default:
        return err('value is not concrete');
    }
  }
}

function make(form: Form): HostValue {
  return new ModelValue(form);
}

/** A field with a non-regular constraint. */
export interface FieldSpec {
  readonly kind: FieldKind;
  readonly value: HostValue;
}

export interface StructOptions {
  openness?: StructOpenness;
  patterns?: ReadonlyArray<readonly [HostValue, HostValue]>;
}

function isFieldSpec(x: HostValue | FieldSpec): x is FieldSpec {
  return typeof x.kind === 'string';
}

/**
 * Reports whether a label constraint accepts `name`.
 */
export function labelMatches(label: HostValue, name: string): boolean {
  const e = label.expr();
  switch (e.op) {
    case '=~':
    case '!~': {
      const re = e.args[0]?.concrete();
      if (re === undefined || re.isErr() || typeof re.value !== 'string') return false;
      const hit = new RegExp(re.value, 'u').test(name);
      return e.op === '=~' ? hit : !hit;
    }
    case '==': {
      const v = e.args[0]?.concrete();
      return v !== undefined && v.isOk() && v.value === name;
    }
    case 'and':
      return e.args.every((a) => labelMatches(a, name));
    case 'or':
      return e.args.some((a) => labelMatches(a, name));
    case 'none': {
      if (label.isConcrete()) {
        const v = label.concrete();
        return v.isOk() && v.value === name;
      }
      return (label.incompleteKind() & Kind.String) !== 0;
    }
    default:
      return false;
  }
}

function unify(a: HostValue, b: HostValue): HostValue {
  const args = [a, b].flatMap((x) => {
    const e = x.expr();
    return e.op === 'and' && x.referencePath() === undefined ? [...e.args] : [x];
  });
  return make({ type: 'and', args });
}

export const hv = {
  top: (): HostValue => make({ type: 'top' }),
  bottom: (message = 'conflicting values'): HostValue => make({ type: 'bottom', message }),
  null: (): HostValue => make({ type: 'scalar', value: null }),
  boolean: (): HostValue => make({ type: 'kind', kind: Kind.Bool }),
  int: (): HostValue => make({ type: 'kind', kind: Kind.Int }),
  float: (): HostValue => make({ type: 'kind', kind: Kind.Float }),
  number: (): HostValue => make({ type: 'kind', kind: NumberKind }),
  string: (): HostValue => make({ type: 'kind', kind: Kind.String }),
  kind: (kind: KindSet): HostValue => make({ type: 'kind', kind }),

  lit: (value: Scalar): HostValue => make({ type: 'scalar', value }),

  /** A concrete value; objects become structs of regular fields. */
  json: (value: JsonValue): HostValue => {
    if (Array.isArray(value)) {
      return make({ type: 'list', prefix: value.map((v) => hv.json(v)) });
    }
    if (isJsonObject(value)) {
      return make({
        type: 'struct',
        fields: Object.entries(value).map(([name, v]) => ({
          name,
          kind: 'regular' as const,
          value: hv.json(v),
        })),
        patterns: [],
        openness: 'open',
      });
    }
    return hv.lit(value);
  },

  and: (...args: HostValue[]): HostValue => {
    const [first, ...rest] = args;
    if (first === undefined) return hv.top();
    return rest.length === 0 ? first : make({ type: 'and', args });
  },
  or: (...args: HostValue[]): HostValue => {
    const [first, ...rest] = args;
    if (first === undefined) return hv.bottom('empty disjunction');
    return rest.length === 0 ? first : make({ type: 'or', args });
  },

  lt: (n: number): HostValue => make({ type: 'unary', op: '<', arg: hv.lit(n) }),
  lte: (n: number): HostValue => make({ type: 'unary', op: '<=', arg: hv.lit(n) }),
  gt: (n: number): HostValue => make({ type: 'unary', op: '>', arg: hv.lit(n) }),
  gte: (n: number): HostValue => make({ type: 'unary', op: '>=', arg: hv.lit(n) }),
  /** `<"m"` and friends on strings. */
  compare: (op: CompareOp, arg: HostValue): HostValue => make({ type: 'unary', op, arg }),
  eq: (arg: HostValue): HostValue => make({ type: 'unary', op: '==', arg }),
  neq: (arg: HostValue): HostValue => make({ type: 'unary', op: '!=', arg }),
  matches: (re: string): HostValue => make({ type: 'unary', op: '=~', arg: hv.lit(re) }),
  notMatches: (re: string): HostValue => make({ type: 'unary', op: '!~', arg: hv.lit(re) }),

  call: (fn: string, ...args: HostValue[]): HostValue => make({ type: 'call', fn, args, kind: TopKind }),

  optional: (value: HostValue): FieldSpec => ({ kind: 'optional', value }),
  required: (value: HostValue): FieldSpec => ({ kind: 'required', value }),

  struct: (
    fields: Record<string, HostValue | FieldSpec>,
    options: StructOptions = {}
  ): HostValue => {
    const patterns: HostPattern[] = (options.patterns ?? []).map(([label, value]) => ({
      label,
      value,
    }));
    const out: HostField[] = Object.entries(fields).map(([name, spec]) => {
      const base: FieldSpec = isFieldSpec(spec) ? spec : { kind: 'regular', value: spec };
      let value = base.value;
      for (const p of patterns) {
        if (labelMatches(p.label, name)) {
          value = unify(value, p.value);
        }
      }
      return { name, kind: base.kind, value };
    });
    return make({
      type: 'struct',
      fields: out,
      patterns,
      openness: options.openness ?? 'open',
    });
  },
  /** `close(s)`: the struct with its openness set to explicitly closed. */
  close: (fields: Record<string, HostValue | FieldSpec>, options: StructOptions = {}): HostValue =>
    hv.struct(fields, { ...options, openness: 'explicitlyClosed' }),

  list: (prefix: HostValue[], rest?: HostValue): HostValue =>
    rest === undefined
      ? make({ type: 'list', prefix })
      : make({ type: 'list', prefix, rest }),
  /** `[...elem]` */
  listOf: (elem: HostValue): HostValue => make({ type: 'list', prefix: [], rest: elem }),

  /**
   * A reference to the value at `path` within `root`. `target` may be a
   * thunk so that cyclic values can be built.
   */
  ref: (root: HostValue, path: Path, target: HostValue | (() => HostValue)): HostValue =>
    make({
      type: 'ref',
      root,
      path,
      target: typeof target === 'function' ? target : () => target,
    }),
};
