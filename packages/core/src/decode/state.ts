/* eslint-disable max-lines, complexity */
/**
 * Per-node decoding state.
 *
 * A state collects the constraints produced by the keywords of one schema
 * object, split by the JSON type they apply to, and combines them into a
 * single expression once every keyword has run.
 */
import {
  attr,
  binary,
  call,
  ellipsis,
  embed,
  errorDisallowed,
  field,
  ident,
  isTop,
  labelName,
  str,
  struct,
  top,
  type BadExpr,
  type Expr,
  type ListLit,
  type StructLit,
} from '../syntax/ast.js';
import { pathRefSyntax, pathString, pathToJSONPointer, type Path } from '../syntax/path.js';
import { ErrorCode } from '../errors/codes.js';
import { Kind, TopKind, kindString, type KindSet } from '../host/kind.js';
import { PHASES, lookupKeyword } from '../versions/tables.js';
import {
  describeVersion,
  isIn,
  openAPILike,
  vfrom,
  type Version,
} from '../versions/version.js';
import type { SchemaLoc } from '../types/options.js';
import { parseImportPath } from '../syntax/imports.js';
import { CORE_KINDS, CORE_TYPES, CORE_TYPE_NAMES, CoreType } from './core-types.js';
import { HANDLERS } from './constraints/index.js';
import { urlWithoutFragment, withFragment } from './ref.js';
import type { SchemaNode } from './schema-node.js';
import type { Decoder, DefinedSchema } from './decoder.js';

/**
 * How a decoded object treats fields it does not mention.
 *
 * - implicitlyOpen: nothing said; open unless `openOnlyWhenExplicit`
 * - explicitlyOpen: `additionalProperties: true`
 * - explicitlyClosed: `additionalProperties: false`
 * - allFieldsCovered: a pattern constraint already accounts for every other field
 */
export type Openness = 'implicitlyOpen' | 'explicitlyOpen' | 'explicitlyClosed' | 'allFieldsCovered';

/** What a parent needs to know about a decoded subschema. */
export interface SchemaInfo {
  allowedTypes: KindSet;
  knownTypes: KindSet;
  title?: string;
  description?: string;
  id?: URL;
  deprecated: boolean;
  schemaVersion: Version;
  schemaVersionPresent: boolean;
  hasConstraints: boolean;
}

export interface DecodedSchema {
  expr: Expr;
  info: SchemaInfo;
}

/** Title and description joined by a blank line. */
export function schemaComment(info: Pick<SchemaInfo, 'title' | 'description'>): string | undefined {
  const parts = [info.title, info.description].filter(
    (p): p is string => p !== undefined && p !== ''
  );
  return parts.length === 0 ? undefined : parts.join('\n\n');
}

interface Constraint {
  readonly expr: Expr;
  readonly at: SchemaNode;
}

class ConstraintSet {
  readonly entries: Constraint[] = [];

  add(at: SchemaNode, expr: Expr): void {
    if (!isTop(expr)) {
      this.entries.push({ expr, at });
    }
  }

  exprs(): Expr[] {
    return this.entries.map((c) => c.expr);
  }
}

function literalsLast(a: Constraint, b: Constraint): number {
  const rank = (c: Constraint): number =>
    c.expr.kind === 'struct' || c.expr.kind === 'list' ? 1 : 0;
  return rank(a) - rank(b);
}

export class SchemaState {
  readonly types: Record<CoreType, ConstraintSet> = {
    0: new ConstraintSet(),
    1: new ConstraintSet(),
    2: new ConstraintSet(),
    3: new ConstraintSet(),
    4: new ConstraintSet(),
    5: new ConstraintSet(),
  };
  readonly all = new ConstraintSet();

  /** `null` when `nullable: true` applies. */
  nullable?: Expr;
  exclusiveMin = false;
  exclusiveMax = false;
  isRoot = false;

  minContains?: number;
  maxContains?: number;

  ifConstraint?: SchemaNode;
  thenConstraint?: SchemaNode;
  elseConstraint?: SchemaNode;

  obj?: StructLit;
  private objN?: SchemaNode;
  /** Negated patterns of `patternProperties`, for `additionalProperties`. */
  readonly patterns: Expr[] = [];
  list?: ListLit;
  listItemsIsArray = false;

  hasProperties = false;
  hasAdditionalProperties = false;
  hasItems = false;
  isArray = false;
  hasRefKeyword = false;
  preserveUnknownFields = false;
  embeddedResource = false;

  k8sResourceKind = '';
  k8sAPIVersion = '';

  openness: Openness = 'implicitlyOpen';

  allowedTypes: KindSet;
  knownTypes: KindSet = TopKind;
  title?: string;
  description?: string;
  id?: URL;
  deprecated = false;
  schemaVersion: Version;
  schemaVersionPresent = false;
  hasConstraints = false;

  constructor(
    readonly decoder: Decoder,
    readonly pos: SchemaNode,
    readonly up: SchemaState | undefined,
    types: KindSet
  ) {
    this.allowedTypes = types;
    this.schemaVersion = up?.schemaVersion ?? decoder.cfg.defaultVersion;
    this.isRoot = up !== undefined && up.isRoot && pos.same(up.pos);
    // Preserved recursively until properties or additionalProperties reset it.
    this.preserveUnknownFields = up?.preserveUnknownFields ?? false;
  }

  info(): SchemaInfo {
    const info: SchemaInfo = {
      allowedTypes: this.allowedTypes,
      knownTypes: this.knownTypes,
      deprecated: this.deprecated,
      schemaVersion: this.schemaVersion,
      schemaVersionPresent: this.schemaVersionPresent,
      hasConstraints: this.hasConstraints,
    };
    if (this.title !== undefined) info.title = this.title;
    if (this.description !== undefined) info.description = this.description;
    if (this.id !== undefined) info.id = this.id;
    return info;
  }

  errf(n: SchemaNode | undefined, message: string, code?: ErrorCode): BadExpr {
    return this.decoder.errf(n, message, code);
  }

  refErrf(n: SchemaNode, message: string): BadExpr {
    return this.decoder.refErrf(n, message);
  }

  add(t: CoreType, at: SchemaNode, x: Expr): void {
    this.types[t].add(at, x);
  }

  /**
   * The object literal for this schema, created on first use. It joins
   * the object constraints when the state is finalized.
   */
  object(n: SchemaNode): StructLit {
    if (this.obj === undefined) {
      this.obj = struct();
      this.objN = n;
    }
    return this.obj;
  }

  /** Elements of an array-valued keyword. */
  listItems(name: string, n: SchemaNode, allowEmpty: boolean): SchemaNode[] {
    if (!n.is(Kind.List)) {
      this.errf(n, `value of ${JSON.stringify(name)} must be an array, found ${kindString(n.kind())}`);
      return [];
    }
    const items = n.items();
    if (!allowEmpty && items.length === 0) {
      this.errf(n, `array for ${JSON.stringify(name)} must be non-empty`);
    }
    return items;
  }

  /** Decodes a subschema with no type restriction. */
  schema(n: SchemaNode): Expr {
    return this.schemaState(n, TopKind).expr;
  }

  /**
   * Decodes the subschema at `n`, allowing only `types`. When the node is
   * a definition target, the definition is registered and a reference to
   * it returned instead of the expression.
   */
  schemaState(n: SchemaNode, types: KindSet, init?: (s: SchemaState) => void): DecodedSchema {
    const s = new SchemaState(this.decoder, n, this, types);
    init?.(s);
    const expr = s.decodeNode();
    const info = s.info();
    return { expr: s.maybeDefine(expr, info), info };
  }

  private decodeNode(): Expr {
    const n = this.pos;
    if (n.is(Kind.Bool)) {
      if (!isIn(this.schemaVersion, vfrom('draft-06'))) {
        return this.errf(n, `boolean schemas not supported in ${describeVersion(this.schemaVersion)}`);
      }
      return n.value === true ? top() : errorDisallowed();
    }
    if (!n.is(Kind.Struct)) {
      return this.errf(n, `schema expects mapping node, found ${kindString(n.kind())}`);
    }

    this.hasRefKeyword = n.field('$ref') !== undefined;
    // `$schema` decides which keywords apply, so it runs before its siblings.
    const fields = n.fields().sort(([a], [b]) => Number(b === '$schema') - Number(a === '$schema'));
    for (const phase of PHASES) {
      if (phase === 1 && this.isRoot && this.schemaVersion === 'k8sCRD') {
        // A CRD's root schema describes a whole resource.
        this.embeddedResource = true;
      }
      for (const [key, value] of fields) {
        this.processKeyword(phase, key, value);
      }
    }

    if (this.id !== undefined) {
      this.decoder.ensureDefinition(n);
    }
    this.applyIfThenElse();
    if (this.schemaVersion === 'k8sCRD' && this.hasProperties && this.hasAdditionalProperties) {
      this.errf(n, `additionalProperties may not be combined with properties in ${describeVersion(this.schemaVersion)}`);
    }
    if (isIn(this.schemaVersion, openAPILike) && this.isArray && !this.hasItems) {
      this.errf(n, `"items" must be present when the "type" is "array" in ${describeVersion(this.schemaVersion)}`);
    }
    const expr = this.finalize();
    this.hasConstraints = this.computeHasConstraints();
    return expr;
  }

  private processKeyword(phase: number, key: string, value: SchemaNode): void {
    const info = lookupKeyword(key);
    if (info === undefined) {
      // x- keywords are extensions, never mistakes.
      if (phase === 0 && !key.startsWith('x-')) {
        this.warnUnrecognizedKeyword(key, value, `unknown keyword ${JSON.stringify(key)}`, ErrorCode.UNKNOWN_KEYWORD);
      }
      return;
    }
    if (info.phase !== phase) {
      return;
    }
    if (!isIn(this.schemaVersion, info.versions)) {
      this.warnUnrecognizedKeyword(
        key,
        value,
        `keyword ${JSON.stringify(key)} is not supported in JSON schema version ${this.schemaVersion}`,
        ErrorCode.KEYWORD_VERSION_MISMATCH
      );
      return;
    }
    // Before 2019-09 `$ref` overrides its siblings. Phase 0 is exempt so
    // that `$schema` can still select the version.
    if (phase > 0 && this.hasRefKeyword && key !== '$ref' && !isIn(this.schemaVersion, vfrom('2019-09'))) {
      this.warnUnrecognizedKeyword(
        key,
        value,
        `ignoring keyword ${JSON.stringify(key)} alongside $ref`,
        ErrorCode.KEYWORD_VERSION_MISMATCH
      );
      return;
    }
    switch (info.status) {
      case 'annotation':
        return;
      case 'todo':
        if (this.decoder.cfg.strictFeatures) {
          this.decoder.featureErrf(
            value,
            `keyword ${JSON.stringify(key)} not yet implemented`,
            ErrorCode.UNSUPPORTED_FEATURE
          );
        }
        return;
      case 'implemented': {
        const handler = HANDLERS[key];
        if (handler === undefined) {
          throw new Error(`internal error: no handler for keyword ${JSON.stringify(key)}`);
        }
        handler(key, value, this);
        return;
      }
    }
  }

  private warnUnrecognizedKeyword(key: string, n: SchemaNode, message: string, code: ErrorCode): void {
    if (!this.decoder.cfg.strictKeywords) {
      return;
    }
    if (key.startsWith('x-') && isIn(this.schemaVersion, openAPILike)) {
      return;
    }
    this.decoder.featureErrf(n, message, code);
  }

  private applyIfThenElse(): void {
    if (this.ifConstraint === undefined || (this.thenConstraint === undefined && this.elseConstraint === undefined)) {
      return;
    }
    const cond = this.schemaState(this.ifConstraint, this.allowedTypes);
    // "then" applies only where "if" held, so its types narrow further.
    const then =
      this.thenConstraint === undefined
        ? top()
        : this.schemaState(this.thenConstraint, this.allowedTypes & cond.info.allowedTypes).expr;
    const otherwise =
      this.elseConstraint === undefined
        ? top()
        : this.schemaState(this.elseConstraint, this.allowedTypes).expr;
    this.all.add(this.ifConstraint, call(ident('matchIf'), cond.expr, then, otherwise));
  }

  private computeHasConstraints(): boolean {
    if (this.all.entries.length > 0 || this.patterns.length > 0) {
      return true;
    }
    if (CORE_TYPES.some((t) => this.types[t].entries.length > 0)) {
      return true;
    }
    return (
      (this.title ?? '') !== '' ||
      (this.description ?? '') !== '' ||
      this.obj !== undefined ||
      this.id !== undefined
    );
  }

  private finalizeObject(): void {
    if (this.embeddedResource) {
      this.addResourceFields();
    }
    if (
      this.obj === undefined &&
      this.schemaVersion === 'k8sCRD' &&
      (this.allowedTypes & Kind.Struct) !== 0 &&
      this.preserveUnknownFields
    ) {
      // Preserved fields need an explicit ellipsis.
      this.object(this.pos);
    }
    const obj = this.obj;
    if (obj === undefined) {
      return;
    }
    if (this.preserveUnknownFields) {
      this.openness = 'explicitlyOpen';
    }
    let e: Expr = obj;
    switch (this.openness) {
      case 'implicitlyOpen':
        if (!this.decoder.cfg.openOnlyWhenExplicit) {
          obj.elts.push(ellipsis());
        }
        break;
      case 'explicitlyOpen':
        obj.elts.push(ellipsis());
        break;
      case 'explicitlyClosed':
        e = call(ident('close'), obj);
        break;
      case 'allFieldsCovered':
        break;
    }
    this.add(CoreType.Object, this.objN ?? this.pos, e);
  }

  // apiVersion and kind identify the resource; metadata is left open.
  private addResourceFields(): void {
    const obj = this.object(this.pos);
    const has = (name: string): boolean =>
      obj.elts.some((d) => d.kind === 'field' && labelName(d.label) === name);
    const stringOr = (literal: string): Expr => (literal === '' ? ident('string') : str(literal));
    const fields = [
      { name: 'apiVersion', value: stringOr(this.k8sAPIVersion) },
      { name: 'kind', value: stringOr(this.k8sResourceKind) },
    ];
    for (const f of fields) {
      if (!has(f.name)) {
        obj.elts.push(field(ident(f.name), f.value, 'required'));
      }
    }
    if (!has('metadata')) {
      obj.elts.push(field(ident('metadata'), struct(ellipsis()), 'optional'));
    }
  }

  private finalize(): Expr {
    if (this.allowedTypes === Kind.Bottom) {
      // Nothing is possible; legitimate inside anyOf and oneOf.
      return errorDisallowed();
    }
    this.finalizeObject();

    for (const t of CORE_TYPES) {
      this.types[t].entries.sort(literalsLast);
    }
    this.all.entries.sort(literalsLast);

    const conjuncts: Expr[] = [];
    const disjuncts: Expr[] = [];
    const excluded: Array<{ at: SchemaNode; type: CoreType }> = [];

    let needsTypeDisjunction = this.allowedTypes !== this.knownTypes;
    if (!needsTypeDisjunction) {
      needsTypeDisjunction = CORE_TYPES.some(
        (t) => this.types[t].entries.length > 0 && (this.allowedTypes & CORE_KINDS[t]) !== 0
      );
    }
    if (needsTypeDisjunction) {
      let possible = 0;
      let nexcluded = 0;
      for (const t of CORE_TYPES) {
        const set = this.types[t];
        const k = CORE_KINDS[t];
        const allowed = (this.allowedTypes & k) !== 0;
        if (set.entries.length > 0) {
          possible++;
          if (!allowed) {
            nexcluded++;
            excluded.push(...set.entries.map((c) => ({ at: c.at, type: t })));
            continue;
          }
          const [first, ...rest] = set.exprs();
          if (first !== undefined) {
            disjuncts.push(binary('&', first, ...rest));
          }
        } else if (allowed) {
          possible++;
          if ((this.knownTypes & k) !== 0) {
            disjuncts.push(this.kindToAST(this.allowedTypes & k));
          }
        }
      }
      if (possible > 0 && nexcluded === possible) {
        for (const e of excluded) {
          this.errf(e.at, `constraint not allowed because type ${CORE_TYPE_NAMES[e.type]} is excluded`);
        }
      }
    }

    conjuncts.push(...this.all.exprs());
    const [firstDisjunct, ...moreDisjuncts] = disjuncts;
    if (firstDisjunct !== undefined) {
      conjuncts.push(binary('|', firstDisjunct, ...moreDisjuncts));
    }
    const [first, ...rest] = conjuncts;
    let e: Expr = first === undefined ? top() : binary('&', first, ...rest);
    if (this.nullable !== undefined) {
      e = binary('|', this.nullable, e);
    }
    if (this.id !== undefined) {
      e = this.withIDAttr(e, this.id);
    }
    // Every allowed type is now explicit in the syntax.
    this.knownTypes = this.allowedTypes;
    return e;
  }

  private withIDAttr(e: Expr, id: URL): Expr {
    const a = attr(`@jsonschema(id=${JSON.stringify(urlWithoutFragment(id))})`);
    if (e.kind === 'struct' && e.inline !== true) {
      e.elts.unshift(a);
      return e;
    }
    return struct(a, embed(e));
  }

  /** Syntax for a bare kind: `int`, `string`, `[...]`, `{...}` and so on. */
  kindToAST(k: KindSet): Expr {
    switch (k) {
      case Kind.Null:
        return ident('null');
      case Kind.Bool:
        return ident('bool');
      case Kind.Int | Kind.Float:
        return ident('number');
      case Kind.Int:
        return ident('int');
      case Kind.Float:
        return ident('float');
      case Kind.String:
        return ident('string');
      case Kind.List:
        return { kind: 'list', elts: [ellipsis()] };
      case Kind.Struct:
        return this.decoder.cfg.openOnlyWhenExplicit ? struct() : struct(ellipsis());
      default:
        throw new Error(`internal error: no syntax for kind ${kindString(k)}`);
    }
  }

  /** The nearest enclosing state that carries a base URI. */
  schemaRoot(): { state: SchemaState; id: URL } {
    for (let s: SchemaState | undefined = this; s !== undefined; s = s.up) {
      if (s.id !== undefined) {
        return { state: s, id: s.id };
      }
    }
    throw new Error('internal error: no schema root');
  }

  private maybeDefine(e: Expr, info: SchemaInfo): Expr {
    const def = this.definedSchemaForNode(this.pos);
    if (def === undefined || def.path.length === 0) {
      return e;
    }
    def.schema = e;
    const doc = schemaComment(info);
    if (doc !== undefined) {
      def.doc = doc;
    }
    if (def.importPath === '' && !this.decoder.builder.put(def.path, e, doc)) {
      this.errf(this.pos, `redefinition of schema path ${pathString(def.path)}`, ErrorCode.DUPLICATE_DEFINITION);
    }
    return this.refExpr(this.pos, def.importPath, def.path) ?? e;
  }

  private definedSchemaForNode(n: SchemaNode): DefinedSchema | undefined {
    const d = this.decoder;
    const known = d.defForValue.get(n.pointer);
    if (known === undefined) {
      return undefined;
    }
    if (known !== null) {
      return known;
    }
    // A referenced node reached for the first time: register it, and
    // decode again so that earlier placeholders resolve.
    const def = this.addDefinition(n);
    if (def === undefined) {
      return undefined;
    }
    d.defForValue.set(n.pointer, def);
    d.danglingRefs--;
    d.needAnotherPass = true;
    return def;
  }

  private addDefinition(n: SchemaNode): DefinedSchema | undefined {
    const d = this.decoder;
    const root = this.schemaRoot();
    const fragment = pathToJSONPointer(n.relPath(root.state.pos));
    if (fragment.isErr()) {
      this.errf(n, `cannot determine fragment: ${fragment.error}`);
      return undefined;
    }
    const id = withFragment(root.id, fragment.value);
    const existing = d.defs.get(id.href);
    if (existing !== undefined) {
      return existing;
    }
    const loc: SchemaLoc = { id, isLocal: true, path: n.relPath(d.root) };
    const mapped = d.cfg.mapRef(loc);
    if (mapped.isErr()) {
      this.errf(n, `cannot get reference for ${id.href}: ${mapped.error}`);
      return undefined;
    }
    const def: DefinedSchema = { importPath: mapped.value.importPath, path: mapped.value.path };
    d.defs.set(id.href, def);
    return def;
  }

  /**
   * A reference to `path`, inside the output when `importPath` is empty
   * and inside the imported package otherwise.
   */
  refExpr(n: SchemaNode, importPath: string, path: Path): Expr | undefined {
    if (importPath === '') {
      const ref = this.decoder.builder.getRef(path);
      if (ref.isErr()) {
        this.errf(n, `cannot generate reference: ${ref.error}`);
        return undefined;
      }
      return ref.value;
    }
    const info = parseImportPath(importPath);
    if (info.qualifier === '') {
      this.refErrf(n, `cannot determine package name from import path ${JSON.stringify(importPath)}`);
      return undefined;
    }
    const ref = pathRefSyntax(path, this.decoder.addImport(importPath, info.qualifier));
    if (ref.isErr()) {
      this.errf(n, `cannot determine path: ${ref.error}`);
      return undefined;
    }
    return ref.value;
  }
}
