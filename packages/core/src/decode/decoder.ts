/**
 * The Extract decoder: walks a JSON Schema document in passes until every
 * reference has a target, then assembles the output file.
 */
import {
  attr,
  bool,
  call,
  field,
  ident,
  importSpec,
  list,
  nullLit,
  num,
  str,
  struct,
  type BadExpr,
  type Decl,
  type Expr,
  type File,
  type Ident,
} from '../syntax/ast.js';
import { addImports, parseImportPath } from '../syntax/imports.js';
import type { Path } from '../syntax/path.js';
import { Kind, TopKind, kindString } from '../host/kind.js';
import { ErrorCode } from '../errors/codes.js';
import {
  ConfigurationError,
  FeatureError,
  RefResolutionError,
  SchemaError,
  type TranslationError,
} from '../types/errors.js';
import type { ResolvedExtractOptions } from '../types/options.js';
import { checkRegex } from '../regex/check.js';
import { schemaURI } from '../versions/version.js';
import { createDebugLogger, type DebugLogger } from '../util/debug.js';
import { jsonPointerTokens } from '../util/json-pointer.js';
import { constraintAddDefinitions } from './constraints/reference.js';
import { parseRootRef, urlWithoutFragment } from './ref.js';
import { SchemaNode } from './schema-node.js';
import { SchemaState, schemaComment, type SchemaInfo } from './state.js';
import { StructBuilder } from './struct-builder.js';

// More than two or three passes only happens for pathological documents.
const MAX_PASSES = 10;

/** A schema with a location in the output, or referred to as if it had one. */
export interface DefinedSchema {
  /** Empty for schemas inside the output itself. */
  importPath: string;
  path: Path;
  /** Unset when only references to the schema have been seen. */
  schema?: Expr;
  doc?: string;
}

export class Decoder {
  readonly errors: TranslationError[] = [];
  readonly log: DebugLogger;

  /** Named schemas by canonical URI, external ones included. */
  readonly defs = new Map<string, DefinedSchema>();
  /**
   * Nodes that map to a defined schema, by JSON Pointer. `null` marks a
   * node that is referred to but not yet reached.
   */
  readonly defForValue = new Map<string, DefinedSchema | null>();
  /** Count of `null` entries in `defForValue`. */
  danglingRefs = 0;
  needAnotherPass = false;
  /** Schema roots by `$id`, without fragment. Kept across passes. */
  readonly idNodes = new Map<string, SchemaNode>();
  externalRefSeen = false;

  builder = new StructBuilder();
  readonly root: SchemaNode;
  readonly rootID: URL;

  constructor(
    readonly cfg: ResolvedExtractOptions,
    data: unknown
  ) {
    this.root = new SchemaNode(data);
    this.rootID = new URL(cfg.id);
    this.idNodes.set(urlWithoutFragment(this.rootID), this.root);
    this.log = createDebugLogger(cfg.debug, 'extract');
  }

  decode(): File | undefined {
    const target = this.schemaTarget();
    if (target === undefined) {
      return undefined;
    }
    const { v, defsRoot } = target;

    let rootInfo: SchemaInfo | undefined;
    // Referenced nodes outside the regular traversal.
    const extraSchemas: SchemaNode[] = [];
    let basePass = 0;

    for (let pass = 0; ; pass++) {
      if (pass > MAX_PASSES) {
        this.errf(v, 'internal error: too many passes without resolution', ErrorCode.INTERNAL_ERROR);
        return undefined;
      }
      this.log(`pass ${pass}`);
      const idsBefore = this.idNodes.size;
      this.externalRefSeen = false;

      const top = new SchemaState(this, this.root, undefined, TopKind);
      top.isRoot = true;
      top.id = this.rootID;

      if (defsRoot !== undefined) {
        constraintAddDefinitions('schemas', defsRoot, top);
      } else {
        const { expr, info } = top.schemaState(v, TopKind, (s) => {
          // The schema root may sit below the document root.
          s.isRoot = true;
        });
        if (info.allowedTypes === Kind.Bottom) {
          this.errf(v, 'constraints are not possible to satisfy', ErrorCode.UNSATISFIABLE_SCHEMA);
          return undefined;
        }
        if (!this.builder.put([], expr, schemaComment(info))) {
          this.errf(v, 'duplicate definition at root', ErrorCode.DUPLICATE_DEFINITION);
          return undefined;
        }
        rootInfo = info;
      }

      if (this.danglingRefs > 0 && pass === basePass + 1) {
        // Still dangling after a full pass: the references point at nodes
        // that are not schemas in the normal traversal.
        for (const [pointer, def] of this.defForValue) {
          if (def !== null) continue;
          const n = this.lookupPointer(pointer);
          if (n === undefined) {
            throw new Error(`internal error: no node for dangling reference ${pointer}`);
          }
          extraSchemas.push(n);
          basePass = pass;
        }
      }
      for (const n of extraSchemas) {
        top.schema(n);
      }

      if (this.externalRefSeen && this.idNodes.size > idsBefore) {
        // A reference may have been mapped outside before its $id was seen.
        this.needAnotherPass = true;
      }
      this.log(
        `pass ${pass} done: dangling=${this.danglingRefs} again=${String(this.needAnotherPass)} ids=${this.idNodes.size}`
      );
      if (!this.needAnotherPass && this.danglingRefs === 0) {
        break;
      }
      this.builder = new StructBuilder();
      for (const def of this.defs.values()) {
        delete def.schema;
      }
      this.needAnotherPass = false;
    }

    const defineSchema = this.cfg.defineSchema;
    if (defineSchema !== undefined) {
      for (const def of this.defs.values()) {
        if (def.schema !== undefined && def.importPath !== '') {
          defineSchema(def.importPath, def.path, def.schema, def.doc);
        }
      }
    }

    const built = this.builder.syntax();
    if (built.isErr()) {
      this.errf(v, `cannot build final syntax: ${built.error}`, ErrorCode.INTERNAL_ERROR);
      return undefined;
    }
    const file = built.value;
    const preamble: Decl[] = [];
    if (this.cfg.pkgName !== '') {
      preamble.push({ kind: 'package', name: this.cfg.pkgName });
    }
    if (rootInfo?.schemaVersionPresent === true) {
      const uri = schemaURI(rootInfo.schemaVersion) ?? rootInfo.schemaVersion;
      preamble.push(attr(`@jsonschema(schema=${JSON.stringify(uri)})`));
    }
    if (rootInfo?.deprecated === true) {
      preamble.push(attr('@deprecated()'));
    }
    file.decls = [...preamble, ...file.decls];
    addImports(file);
    return file;
  }

  /** The value to decode and, in definitions mode, the struct holding them. */
  private schemaTarget(): { v: SchemaNode; defsRoot?: SchemaNode } | undefined {
    if (this.cfg.root === '') {
      return { v: this.root };
    }
    const path = parseRootRef(this.cfg.root);
    if (path.isErr()) {
      this.errors.push(
        new ConfigurationError({
          message: `invalid root value ${JSON.stringify(this.cfg.root)}: ${path.error}`,
          context: { value: this.cfg.root },
        })
      );
      return undefined;
    }
    const tokens = path.value.map((sel) => (sel.type === 'index' ? String(sel.index) : sel.name));
    const found = this.root.lookup(tokens);
    if (found === undefined && !this.cfg.allowNonExistentRoot) {
      this.errf(this.root, `root value at path ${this.cfg.root} does not exist`);
      return undefined;
    }
    if (this.cfg.singleRoot) {
      if (found === undefined) {
        // Nothing to decode: an empty schema allows anything.
        return { v: new SchemaNode({}, tokens) };
      }
      return { v: found };
    }
    const defsRoot = found ?? new SchemaNode({}, tokens);
    if (!defsRoot.is(Kind.Struct)) {
      this.errf(
        defsRoot,
        `value at path ${this.cfg.root} must be struct containing definitions but is actually ${kindString(defsRoot.kind())}`
      );
      return undefined;
    }
    return { v: this.root, defsRoot };
  }

  private lookupPointer(pointer: string): SchemaNode | undefined {
    const tokens = jsonPointerTokens(pointer);
    return tokens.isErr() ? undefined : this.root.lookup(tokens.value);
  }

  /** Makes `n` a defined schema, to be registered when it is decoded. */
  ensureDefinition(n: SchemaNode): void {
    if (!this.defForValue.has(n.pointer)) {
      this.defForValue.set(n.pointer, null);
      this.danglingRefs++;
    }
  }

  /** An identifier bound to the import of `importPath`. */
  addImport(importPath: string, qualifier?: string): Ident {
    return ident(qualifier ?? parseImportPath(importPath).qualifier, importSpec(importPath));
  }

  errf(n: SchemaNode | undefined, message: string, code?: ErrorCode): BadExpr {
    this.errors.push(
      new SchemaError({
        message,
        ...(code !== undefined ? { errorCode: code } : {}),
        ...(n !== undefined ? { context: { pointer: n.pointer } } : {}),
      })
    );
    return badExpr(n);
  }

  refErrf(n: SchemaNode, message: string, code?: ErrorCode): BadExpr {
    const ref = typeof n.value === 'string' ? n.value : undefined;
    this.errors.push(
      new RefResolutionError({
        message,
        ...(code !== undefined ? { errorCode: code } : {}),
        context: ref === undefined ? { pointer: n.pointer } : { pointer: n.pointer, ref },
      })
    );
    return badExpr(n);
  }

  featureErrf(n: SchemaNode, message: string, code: ErrorCode): BadExpr {
    this.errors.push(new FeatureError({ message, errorCode: code, context: { pointer: n.pointer } }));
    return badExpr(n);
  }

  strValue(n: SchemaNode): string | undefined {
    if (typeof n.value !== 'string') {
      this.errf(n, 'invalid string');
      return undefined;
    }
    return n.value;
  }

  boolValue(n: SchemaNode): boolean | undefined {
    if (typeof n.value !== 'boolean') {
      this.errf(n, 'invalid bool');
      return undefined;
    }
    return n.value;
  }

  numberValue(n: SchemaNode): number | undefined {
    if (typeof n.value !== 'number' || !Number.isFinite(n.value)) {
      this.errf(n, 'invalid number');
      return undefined;
    }
    return n.value;
  }

  number(n: SchemaNode): Expr {
    const value = this.numberValue(n);
    return value === undefined ? badExpr(n) : num(value);
  }

  /** A non-negative integer no larger than 2^53 - 1, or why it is not one. */
  private readUint(n: SchemaNode): { value: number } | { reason: string } {
    const value = n.value;
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      return { reason: 'invalid number' };
    }
    if (!Number.isInteger(value)) {
      return { reason: `${value} is not a whole number` };
    }
    if (value < 0 || value > Number.MAX_SAFE_INTEGER) {
      return { reason: `${value} is out of bounds` };
    }
    return { value };
  }

  uintValue(n: SchemaNode): number | undefined {
    const r = this.readUint(n);
    if ('reason' in r) {
      this.errf(n, r.reason);
      return undefined;
    }
    return r.value;
  }

  /** Reports one `invalid uint` error for any bad value. */
  uint(n: SchemaNode): Expr {
    const r = this.readUint(n);
    return 'reason' in r ? this.errf(n, 'invalid uint') : num(r.value);
  }

  regexpValue(n: SchemaNode): Expr | undefined {
    const source = this.strValue(n);
    if (source === undefined || !this.checkRegexp(n, source)) {
      return undefined;
    }
    return str(source);
  }

  /**
   * Reports whether `source` can be used as a pattern. Syntax with no
   * translation is reported only under strictFeatures.
   */
  checkRegexp(n: SchemaNode, source: string): boolean {
    const check = checkRegex(source);
    if (check.ok) {
      return true;
    }
    if (check.unsupported) {
      if (this.cfg.strictFeatures) {
        this.featureErrf(n, check.message, ErrorCode.UNSUPPORTED_FEATURE);
      }
      return false;
    }
    this.errf(n, check.message, ErrorCode.INVALID_REGEX);
    return false;
  }

  /** A JSON value as a concrete expression; objects are closed. */
  constValue(n: SchemaNode): Expr {
    const value = n.value;
    if (n.is(Kind.List)) {
      return list(...n.items().map((item) => this.constValue(item)));
    }
    if (n.is(Kind.Struct)) {
      const fields = n.fields().map(([k, item]) => field(str(k), this.constValue(item), 'required'));
      return call(ident('close'), struct(...fields));
    }
    if (value === null) return nullLit();
    if (typeof value === 'boolean') return bool(value);
    if (typeof value === 'string') return str(value);
    if (typeof value === 'number' && Number.isFinite(value)) return num(value);
    return this.errf(n, 'invalid non-concrete value', ErrorCode.INVALID_VALUE);
  }
}

function badExpr(n: SchemaNode | undefined): BadExpr {
  return n === undefined ? { kind: 'bad' } : { kind: 'bad', pointer: n.pointer };
}
