import { Kind, NumberKind, TopKind, kindToJSONSchemaTypes } from '../host/kind.js';
import type { HostField, HostPattern, HostValue, StructOpenness } from '../host/types.js';
import { pathString } from '../syntax/path.js';
import { GenerationError } from '../types/errors.js';
import type { NameFunc, ResolvedGenerateOptions } from '../types/options.js';
import { createDebugLogger, type DebugLogger } from '../util/debug.js';
import type { BoundsOp, CountOp, Item, PatternProperty, Property } from './items.js';
import { ItemStore, type Handle } from './store.js';

/** Selectors of the reference path joined with dots, as in `#Defs.name`. */
export const defaultNameFunc: NameFunc = (_root, path) => pathString(path);

// Layouts of time.Format with a JSON Schema format of their own.
const TIME_FORMATS: ReadonlyMap<string, string> = new Map([
  ['2006-01-02T15:04:05Z07:00', 'date-time'],
  ['2006-01-02T15:04:05.999999999Z07:00', 'date-time'],
  ['2006-01-02', 'date'],
  ['15:04:05', 'time'],
]);

// Validators that only carry a string format.
const FORMAT_VALIDATORS: ReadonlyMap<string, string> = new Map([
  ['time.Time', 'date-time'],
  ['net.AbsURL', 'uri'],
  ['net.URL', 'uri-reference'],
  ['regexp.Valid', 'regex'],
]);

interface CountCall {
  readonly type: string;
  readonly kind: 'lengthBounds' | 'itemsBounds' | 'propertyBounds';
  readonly op: CountOp;
}

const COUNT_CALLS: ReadonlyMap<string, CountCall> = new Map<string, CountCall>([
  ['strings.MinRunes', { type: 'string', kind: 'lengthBounds', op: '>=' }],
  ['strings.MaxRunes', { type: 'string', kind: 'lengthBounds', op: '<=' }],
  ['list.MinItems', { type: 'array', kind: 'itemsBounds', op: '>=' }],
  ['list.MaxItems', { type: 'array', kind: 'itemsBounds', op: '<=' }],
  ['struct.MinFields', { type: 'object', kind: 'propertyBounds', op: '>=' }],
  ['struct.MaxFields', { type: 'object', kind: 'propertyBounds', op: '<=' }],
]);

interface Bounds {
  min?: number;
  max?: number;
}

function escapeToken(s: string): string {
  return s.replace(/~/g, '~0').replace(/\//g, '~1');
}

function regexpMatches(re: string, name: string): boolean {
  try {
    return new RegExp(re, 'u').test(name);
  } catch {
    return false;
  }
}

interface PatternLabel {
  regexp?: string;
  exclusions: readonly string[];
}

/**
 * Names listed by an exclusion of the form `^(a|b)$`, unescaped.
 * Undefined for any other regexp.
 */
function excludedNames(re: string): string[] | undefined {
  const m = /^\^\((.*)\)\$$/su.exec(re);
  const body = m?.[1];
  if (body === undefined) return undefined;
  const names: string[] = [];
  let cur = '';
  for (let i = 0; i < body.length; i++) {
    const c = body.charAt(i);
    if (c === '\\') {
      const next = body.charAt(i + 1);
      if (!/[\\.+*?()|[\]{}^$]/u.test(next)) return undefined;
      cur += next;
      i++;
    } else if (c === '|') {
      names.push(cur);
      cur = '';
    } else if (/[.+*?()[\]{}^$]/u.test(c)) {
      return undefined;
    } else {
      cur += c;
    }
  }
  names.push(cur);
  return names;
}

/**
 * One JSON Schema regexp for `=~re & !~e1 & ...`. An exclusion that only
 * lists field names none of which `re` matches changes nothing and is
 * dropped; the rest become negative lookaheads.
 */
function patternRegexp(label: PatternLabel): string {
  const { regexp } = label;
  const kept = label.exclusions.filter((e) => {
    if (regexp === undefined) return true;
    const names = excludedNames(e);
    return names === undefined || names.some((n) => regexpMatches(regexp, n));
  });
  if (kept.length === 0) {
    return regexp ?? '.*';
  }
  const lookaheads = kept.map((e) => `(?![\\s\\S]*?(?:${e}))`).join('');
  return regexp === undefined ? `^${lookaheads}` : `^${lookaheads}[\\s\\S]*?(?:${regexp})`;
}

/**
 * Whether a catch-all label excluding `exclusions` applies to exactly the
 * names JSON Schema leaves to additionalProperties: those that are not
 * fields and match none of the pattern regexps.
 */
function coversOthers(
  exclusions: readonly string[],
  fieldNames: readonly string[],
  regexps: readonly string[]
): boolean {
  const listed = new Set<string>();
  for (const e of exclusions) {
    if (regexps.includes(e)) continue;
    const names = excludedNames(e);
    if (names === undefined || names.some((n) => !fieldNames.includes(n))) {
      return false;
    }
    names.forEach((n) => listed.add(n));
  }
  return (
    regexps.every((re) => exclusions.includes(re)) &&
    fieldNames.every((n) => listed.has(n) || regexps.some((re) => regexpMatches(re, n)))
  );
}

function flatConjuncts(h: Handle): Handle[] {
  return h.item.kind === 'allOf' ? h.item.elems.flatMap(flatConjuncts) : [h];
}

/**
 * Builds the item tree for a host value. One generator serves one
 * Generate call; it owns the item store and the `$defs` table.
 */
export class Generator {
  readonly store = new ItemStore();
  /** Definitions by `$defs` name; undefined while the body is being built. */
  readonly defs = new Map<string, Handle | undefined>();
  readonly errors: GenerationError[] = [];
  private readonly log: DebugLogger;
  // Field names leading to the value being translated.
  private readonly at: string[] = [];

  constructor(private readonly cfg: ResolvedGenerateOptions) {
    this.log = createDebugLogger(cfg.debug, 'generate');
  }

  errorf(message: string): Handle {
    const pointer = this.at.map((name) => `/${escapeToken(name)}`).join('');
    this.errors.push(new GenerationError({ message, context: { pointer } }));
    return this.store.false();
  }

  makeItem(v: HostValue): Handle {
    const ref = v.referencePath();
    if (ref !== undefined) {
      const name = this.cfg.nameFunc(ref.root, ref.path);
      if (name !== '') {
        return this.makeRef(name, v);
      }
    }
    const e = v.expr();
    switch (e.op) {
      case 'and':
        return this.store.allOf(...e.args.map((a) => this.makeItem(a)));
      case 'or': {
        const valid = e.args.filter((a) => a.validate().length === 0);
        const [only, second] = valid;
        if (only === undefined) {
          return this.store.false();
        }
        return second === undefined
          ? this.makeItem(only)
          : this.store.intern({ kind: 'anyOf', elems: valid.map((a) => this.makeItem(a)) });
      }
      case '=~':
      case '!~':
        return this.makeRegexpItem(e.op, e.args);
      case '==':
      case '!=':
        return this.makeEqualItem(e.op, e.args);
      case '<':
      case '<=':
      case '>':
      case '>=':
        return this.makeBoundsItem(e.op, e.args);
      case 'call':
        return this.makeCallItem(e.fn, e.args);
      case 'none':
        return this.makeBasicItem(v);
    }
  }

  private makeRef(name: string, v: HostValue): Handle {
    const ref = this.store.intern({ kind: 'ref', defName: name });
    if (this.defs.has(name)) {
      return ref;
    }
    this.log(`define ${JSON.stringify(name)}`);
    // Reserve the name first so that cycles end at the reference above.
    this.defs.set(name, undefined);
    const saved = this.at.splice(0);
    this.defs.set(name, this.makeItem(v.eval()));
    this.at.push(...saved);
    return ref;
  }

  private makeRegexpItem(op: '=~' | '!~', args: readonly HostValue[]): Handle {
    const re = this.stringArg(args[0], op);
    if (re === undefined) {
      return this.store.false();
    }
    const pattern = this.store.intern({ kind: 'pattern', regexp: re });
    const match = op === '=~' ? pattern : this.store.intern({ kind: 'not', elem: pattern });
    return this.store.allOf(this.store.type('string'), match);
  }

  private makeEqualItem(op: '==' | '!=', args: readonly HostValue[]): Handle {
    const [arg, ...rest] = args;
    if (arg === undefined || rest.length > 0) {
      // Binary comparisons have no JSON Schema equivalent.
      return this.store.true();
    }
    if (!arg.isConcrete()) {
      return this.store.true();
    }
    const value = arg.concrete();
    if (value.isErr()) {
      return this.errorf(value.error);
    }
    const c = this.store.intern({ kind: 'const', value: value.value });
    return op === '==' ? c : this.store.intern({ kind: 'not', elem: c });
  }

  private makeBoundsItem(op: BoundsOp, args: readonly HostValue[]): Handle {
    const [arg, ...rest] = args;
    if (arg === undefined || rest.length > 0) {
      return this.store.true();
    }
    const kind = arg.kind();
    if (kind === Kind.Int || kind === Kind.Float) {
      const n = this.numberOf(arg);
      if (n === undefined) {
        return this.store.true();
      }
      return this.typed('number', { kind: 'bounds', op, n });
    }
    if (kind === Kind.String || arg.incompleteKind() === Kind.String) {
      // Bounds on strings have no JSON Schema equivalent.
      return this.store.type('string');
    }
    if ((arg.incompleteKind() & NumberKind) !== 0 && !arg.isConcrete()) {
      return this.store.true();
    }
    return this.errorf('bad argument to unary comparison');
  }

  private makeBasicItem(v: HostValue): Handle {
    if (v.isConcrete() && (v.kind() & (Kind.Struct | Kind.List)) === 0) {
      const value = v.concrete();
      if (value.isErr()) {
        return this.errorf(value.error);
      }
      return this.store.intern({ kind: 'const', value: value.value });
    }
    const kind = v.incompleteKind();
    if (kind === TopKind) {
      return this.store.true();
    }
    if (kind === Kind.Bottom) {
      return this.store.false();
    }
    const elems: Handle[] = [];
    const types = kindToJSONSchemaTypes(kind);
    if (types.length > 0) {
      elems.push(this.store.type(...types));
    }
    if (kind === Kind.Struct) {
      elems.push(this.makeStructItem(v, v.structOpenness()));
    } else if (kind === Kind.List) {
      elems.push(...this.makeListItems(v));
    }
    return this.conjunction(elems);
  }

  private conjunction(elems: Handle[]): Handle {
    const kept = elems.filter((e) => e.item.kind !== 'true');
    const [first, second] = kept;
    if (first === undefined) {
      return this.store.true();
    }
    return second === undefined ? first : this.store.allOf(...kept);
  }

  private isRequired(f: HostField): boolean {
    switch (f.kind) {
      case 'required':
        return true;
      case 'optional':
        return false;
      case 'regular':
        // A concrete regular field is a fixed value the instance may omit.
        return !f.value.isConcrete();
    }
  }

  private makeStructItem(v: HostValue, openness: StructOpenness): Handle {
    const fieldNames = v.fields().map((f) => f.name);
    const labels: Array<{ label: PatternLabel; value: HostValue }> = [];
    for (const p of v.patterns()) {
      const label = this.patternLabel(p);
      if (label === undefined) {
        this.log('skipping a pattern constraint with an unsupported label');
        continue;
      }
      labels.push({ label, value: p.value });
    }
    const patternProperties: PatternProperty[] = [];
    let additionalProperties: Handle | undefined;
    const regexps = labels.flatMap(({ label }) =>
      label.regexp === undefined ? [] : [patternRegexp(label)]
    );
    for (const { label, value } of labels) {
      const elem = this.makeItem(value);
      if (label.regexp === undefined && coversOthers(label.exclusions, fieldNames, regexps)) {
        additionalProperties = elem;
      } else {
        patternProperties.push({ regexp: patternRegexp(label), elem });
      }
    }
    patternProperties.sort((a, b) => (a.regexp < b.regexp ? -1 : a.regexp > b.regexp ? 1 : 0));

    const required: string[] = [];
    const properties: Property[] = [];
    for (const f of v.fields()) {
      if (this.isRequired(f)) {
        required.push(f.name);
      }
      if (f.kind === 'optional' && f.value.validate().length > 0) {
        properties.push({ name: f.name, elem: this.store.false() });
        continue;
      }
      this.at.push(f.name);
      const elem = this.stripPatternConstraints(f.name, this.makeItem(f.value), patternProperties);
      this.at.pop();
      properties.push({ name: f.name, elem });
    }
    properties.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    if (additionalProperties === undefined) {
      const closed =
        openness === 'explicitlyClosed' || (openness === 'closed' && !this.cfg.explicitOpen);
      if (closed) {
        additionalProperties = this.store.false();
      } else if (openness === 'explicitlyOpen' && this.cfg.explicitOpen) {
        additionalProperties = this.store.true();
      }
    }
    if (
      properties.length === 0 &&
      required.length === 0 &&
      patternProperties.length === 0 &&
      additionalProperties === undefined
    ) {
      return this.store.true();
    }
    return this.store.intern({
      kind: 'properties',
      properties,
      patternProperties,
      required,
      ...(additionalProperties !== undefined ? { additionalProperties } : {}),
    });
  }

  /**
   * Splits a label into its `=~` regexp and its `!~` exclusions. A bare
   * `string` conjunct matches every name.
   */
  private patternLabel(p: HostPattern): PatternLabel | undefined {
    const conjuncts: HostValue[] = [];
    const walk = (x: HostValue): void => {
      const e = x.expr();
      if (e.op === 'and') {
        e.args.forEach(walk);
      } else {
        conjuncts.push(x);
      }
    };
    walk(p.label);
    let regexp: string | undefined;
    const exclusions: string[] = [];
    for (const c of conjuncts) {
      const e = c.expr();
      if (e.op === '=~' && regexp === undefined) {
        regexp = this.stringArg(e.args[0], e.op);
        if (regexp === undefined) return undefined;
        continue;
      }
      if (e.op === '!~') {
        const excl = this.stringArg(e.args[0], e.op);
        if (excl === undefined) return undefined;
        exclusions.push(excl);
        continue;
      }
      if (e.op === 'none' && !c.isConcrete() && c.incompleteKind() === Kind.String) {
        continue;
      }
      return undefined;
    }
    return regexp === undefined ? { exclusions } : { regexp, exclusions };
  }

  /**
   * Drops from a property the conjuncts that a matching pattern property
   * already contributes.
   */
  private stripPatternConstraints(
    name: string,
    elem: Handle,
    patterns: readonly PatternProperty[]
  ): Handle {
    const all = flatConjuncts(elem);
    let conjuncts = all;
    for (const p of patterns) {
      if (!regexpMatches(p.regexp, name)) continue;
      const implied = flatConjuncts(p.elem);
      if (implied.every((x) => conjuncts.includes(x))) {
        conjuncts = conjuncts.filter((x) => !implied.includes(x));
      }
    }
    return conjuncts === all ? elem : this.conjunction(conjuncts);
  }

  private makeListItems(v: HostValue): Handle[] {
    const shape = v.listShape();
    const prefix = shape.prefix.map((x, i) => {
      this.at.push(String(i));
      const h = this.makeItem(x);
      this.at.pop();
      return h;
    });
    let rest: Handle | undefined =
      shape.rest === undefined ? this.store.false() : this.makeItem(shape.rest);
    if (rest.item.kind === 'true') {
      rest = undefined;
    }
    const out: Handle[] = [];
    if (prefix.length > 0 || rest !== undefined) {
      out.push(
        this.store.intern({ kind: 'items', prefix, ...(rest !== undefined ? { rest } : {}) })
      );
    }
    if (prefix.length > 0) {
      out.push(this.store.intern({ kind: 'itemsBounds', op: '>=', n: prefix.length }));
    }
    return out;
  }

  /** `type` together with one more constraint. */
  private typed(type: string, item: Item): Handle {
    return this.store.allOf(this.store.type(type), this.store.intern(item));
  }

  private makeCallItem(fn: string, args: readonly HostValue[]): Handle {
    const format = FORMAT_VALIDATORS.get(fn);
    if (format !== undefined) {
      return this.typed('string', { kind: 'format', format });
    }
    const count = COUNT_CALLS.get(fn);
    if (count !== undefined) {
      return this.countItem(fn, args, count);
    }
    switch (fn) {
      case 'math.MultipleOf': {
        const [arg] = this.callArgs(fn, args, 1);
        const n = arg === undefined ? undefined : this.numberArg(fn, arg);
        if (n === undefined) return this.store.false();
        return this.typed('number', { kind: 'multipleOf', n });
      }
      case 'time.Format': {
        const [arg] = this.callArgs(fn, args, 1);
        const layout = arg === undefined ? undefined : this.stringArg(arg, fn);
        if (layout === undefined) return this.store.false();
        const f = TIME_FORMATS.get(layout);
        if (f === undefined) {
          // Other layouts are still strings.
          return this.store.type('string');
        }
        return this.typed('string', { kind: 'format', format: f });
      }
      case 'list.UniqueItems':
        return this.typed('array', { kind: 'uniqueItems' });
      case 'list.MatchN':
        return this.makeContainsItem(fn, args);
      case 'matchN':
        return this.makeMatchNItem(fn, args);
      case 'matchIf':
        return this.makeMatchIfItem(fn, args);
      case 'close': {
        const [arg] = this.callArgs(fn, args, 1);
        if (arg === undefined) return this.store.false();
        const obj = this.makeStructItem(arg, 'explicitlyClosed');
        return this.conjunction([this.store.type('object'), obj]);
      }
      case 'error':
        return this.store.false();
      default:
        this.log(`accepting any value for unknown call ${fn}`);
        return this.store.true();
    }
  }

  private callArgs(fn: string, args: readonly HostValue[], want: number): readonly HostValue[] {
    if (args.length !== want) {
      this.errorf(`${fn} expects ${want} argument${want === 1 ? '' : 's'}, got ${args.length}`);
      return [];
    }
    return args;
  }

  private countItem(fn: string, args: readonly HostValue[], count: CountCall): Handle {
    const [arg] = this.callArgs(fn, args, 1);
    const n = arg === undefined ? undefined : this.numberArg(fn, arg);
    if (n === undefined) {
      return this.store.false();
    }
    if (!Number.isInteger(n) || n < 0) {
      return this.errorf(`${fn} expects a non-negative integer, got ${n}`);
    }
    return this.typed(count.type, { kind: count.kind, op: count.op, n });
  }

  private makeContainsItem(fn: string, args: readonly HostValue[]): Handle {
    const [count, elem] = this.callArgs(fn, args, 2);
    if (count === undefined || elem === undefined) {
      return this.store.false();
    }
    const bounds = this.countBounds(count);
    if (bounds === undefined) {
      return this.errorf(`${fn}: unsupported count constraint`);
    }
    return this.store.allOf(
      this.store.type('array'),
      this.store.intern({
        kind: 'contains',
        elem: this.makeItem(elem),
        // At least one is what contains means on its own.
        ...(bounds.min !== undefined && bounds.min !== 1 ? { min: bounds.min } : {}),
        ...(bounds.max !== undefined ? { max: bounds.max } : {}),
      })
    );
  }

  /** Bounds of a count: a number, `>=n`, `<=n` or a conjunction of those. */
  private countBounds(count: HostValue): Bounds | undefined {
    const e = count.expr();
    switch (e.op) {
      case 'none': {
        const n = this.numberOf(count);
        return n === undefined ? undefined : { min: n, max: n };
      }
      case '>=':
      case '<=': {
        const [arg] = e.args;
        const n = arg === undefined ? undefined : this.numberOf(arg);
        if (n === undefined) return undefined;
        return e.op === '>=' ? { min: n } : { max: n };
      }
      case 'and': {
        const out: Bounds = {};
        for (const a of e.args) {
          const b = this.countBounds(a);
          if (b === undefined) return undefined;
          if (b.min !== undefined) out.min = b.min;
          if (b.max !== undefined) out.max = b.max;
        }
        return out;
      }
      default:
        return undefined;
    }
  }

  private makeMatchNItem(fn: string, args: readonly HostValue[]): Handle {
    const [count, list] = this.callArgs(fn, args, 2);
    if (count === undefined || list === undefined) {
      return this.store.false();
    }
    const members = list.listShape().prefix.map((m) => this.makeItem(m));
    const bounds = this.countBounds(count);
    const [only] = members;
    if (bounds === undefined || only === undefined) {
      return this.errorf(`${fn}: unsupported arguments`);
    }
    const { min, max } = bounds;
    if (min === members.length && (max === undefined || max === min)) {
      return this.store.allOf(...members);
    }
    if (min === 1 && max === undefined) {
      return this.store.intern({ kind: 'anyOf', elems: members });
    }
    if (min === 1 && max === 1) {
      return this.store.intern({ kind: 'oneOf', elems: members });
    }
    if (min === 0 && max === 0) {
      const elem =
        members.length === 1 ? only : this.store.intern({ kind: 'anyOf', elems: members });
      return this.store.intern({ kind: 'not', elem });
    }
    this.log(`accepting any value for ${fn} with an inexpressible count`);
    return this.store.true();
  }

  private makeMatchIfItem(fn: string, args: readonly HostValue[]): Handle {
    const [cond, then, otherwise] = this.callArgs(fn, args, 3);
    if (cond === undefined || then === undefined || otherwise === undefined) {
      return this.store.false();
    }
    const ifElem = this.makeItem(cond);
    const thenElem = this.makeItem(then);
    const elseElem = this.makeItem(otherwise);
    return this.store.intern({
      kind: 'ifThenElse',
      ifElem,
      ...(thenElem.item.kind !== 'true' ? { thenElem } : {}),
      ...(elseElem.item.kind !== 'true' ? { elseElem } : {}),
    });
  }

  private numberOf(v: HostValue): number | undefined {
    const c = v.concrete();
    return c.isOk() && typeof c.value === 'number' ? c.value : undefined;
  }

  private numberArg(fn: string, v: HostValue): number | undefined {
    const n = this.numberOf(v);
    if (n === undefined) {
      this.errorf(`${fn} expects a number argument`);
    }
    return n;
  }

  private stringArg(v: HostValue | undefined, fn: string): string | undefined {
    const c = v?.concrete();
    if (c === undefined || c.isErr() || typeof c.value !== 'string') {
      this.errorf(`${fn} expects a string argument`);
      return undefined;
    }
    return c.value;
  }
}
