/**
 * Configuration for Extract and Generate.
 *
 * All options are optional. `resolveExtractOptions` and
 * `resolveGenerateOptions` apply the defaults and the implications
 * between options, and reject values that cannot work.
 */
import type { Expr, Ident, BasicLit } from '../syntax/ast.js';
import type { Path } from '../syntax/path.js';
import type { HostValue } from '../host/types.js';
import type { Result } from './result.js';
import { DEFAULT_VERSION, type Version } from '../versions/version.js';
import { ConfigurationError } from './errors.js';

/** `true` writes trace lines to stderr; a function receives them instead. */
export type DebugOption = boolean | ((line: string) => void);

/**
 * Where a schema lives: its canonical URI and, for schemas inside the
 * document being extracted, its path from the document root.
 */
export interface SchemaLoc {
  id: URL;
  isLocal: boolean;
  path: Path;
}

/** A type-language location: a package import path and a path inside it. */
export interface MappedLocation {
  /** Empty for locations inside the output itself. */
  importPath: string;
  path: Path;
}

/** Maps JSON Pointer tokens of a schema location to output labels. */
export type MapFunc = (tokens: readonly string[]) => Result<Array<Ident | BasicLit>, string>;

/** Maps an external schema URL (without fragment) to a package. */
export type MapURLFunc = (url: URL) => Result<MappedLocation, string>;

export type MapRefFunc = (loc: SchemaLoc) => Result<MappedLocation, string>;

export type DefineSchemaFunc = (
  importPath: string,
  path: Path,
  schema: Expr,
  doc: string | undefined
) => void;

export interface ExtractOptions {
  /** Package clause for the output (default: none) */
  pkgName?: string;
  /** Base URI when the document declares no `$id` (default: DEFAULT_ROOT_ID) */
  id?: string;
  /**
   * URI fragment of the location holding the schemas, such as
   * `#/components/schemas` (default: '', the whole document is one schema)
   */
  root?: string;
  /** Accept a `root` that does not exist in the document (default: false) */
  allowNonExistentRoot?: boolean;
  /** Treat the value at `root` as a single schema rather than a map of them (default: false) */
  singleRoot?: boolean;
  /** Label mapping for definition locations (default: `#name` for `$defs`/`definitions` entries) */
  map?: MapFunc;
  /** Import path mapping for external URLs (default: defaultMapURL) */
  mapURL?: MapURLFunc;
  /** Full location mapping; supersedes `map` and `mapURL` (default: built from them) */
  mapRef?: MapRefFunc;
  /** Receives schemas defined in the document but mapped to another package (default: none) */
  defineSchema?: DefineSchemaFunc;
  /** Shorthand for both strict modes (default: false) */
  strict?: boolean;
  /** Report known but unsupported features (default: false) */
  strictFeatures?: boolean;
  /** Report unknown keywords and keywords outside the version (default: false) */
  strictKeywords?: boolean;
  /** Version used when the document has no `$schema` (default: '2020-12') */
  defaultVersion?: Version;
  /** Leave structs open unless the schema closes them explicitly (default: false) */
  openOnlyWhenExplicit?: boolean;
  /** Trace decoder passes (default: false) */
  debug?: DebugOption;
}

export interface ResolvedExtractOptions {
  pkgName: string;
  id: string;
  root: string;
  allowNonExistentRoot: boolean;
  singleRoot: boolean;
  mapRef: MapRefFunc;
  defineSchema?: DefineSchemaFunc;
  strictFeatures: boolean;
  strictKeywords: boolean;
  defaultVersion: Version;
  openOnlyWhenExplicit: boolean;
  debug: DebugOption;
}

/** Host of the base URI assumed for documents without an `$id`. */
export const DEFAULT_ROOT_ID_HOST = 'jsonschema.invalid';

export const DEFAULT_ROOT_ID = `https://${DEFAULT_ROOT_ID_HOST}`;

export const DEFAULT_EXTRACT_OPTIONS = {
  pkgName: '',
  id: DEFAULT_ROOT_ID,
  root: '',
  allowNonExistentRoot: false,
  singleRoot: false,
  strict: false,
  strictFeatures: false,
  strictKeywords: false,
  defaultVersion: DEFAULT_VERSION,
  openOnlyWhenExplicit: false,
  debug: false,
} as const satisfies Omit<Required<ExtractOptions>, 'map' | 'mapURL' | 'mapRef' | 'defineSchema'>;

/**
 * Applies defaults. `strict` turns on both strict modes. The mapping
 * functions are combined into one `mapRef`, built by `makeMapRef` from
 * `map` and `mapURL` unless `mapRef` is given.
 *
 * @throws {ConfigurationError} When `id` is not an absolute URI
 */
export function resolveExtractOptions(
  userOptions: ExtractOptions = {},
  makeMapRef: (map?: MapFunc, mapURL?: MapURLFunc) => MapRefFunc
): ResolvedExtractOptions {
  const strict = userOptions.strict ?? DEFAULT_EXTRACT_OPTIONS.strict;
  const id = userOptions.id === undefined || userOptions.id === '' ? DEFAULT_ROOT_ID : userOptions.id;
  validateRootID(id);

  const resolved: ResolvedExtractOptions = {
    pkgName: userOptions.pkgName ?? DEFAULT_EXTRACT_OPTIONS.pkgName,
    id,
    root: userOptions.root ?? DEFAULT_EXTRACT_OPTIONS.root,
    allowNonExistentRoot:
      userOptions.allowNonExistentRoot ?? DEFAULT_EXTRACT_OPTIONS.allowNonExistentRoot,
    singleRoot: userOptions.singleRoot ?? DEFAULT_EXTRACT_OPTIONS.singleRoot,
    mapRef: userOptions.mapRef ?? makeMapRef(userOptions.map, userOptions.mapURL),
    strictFeatures: strict || (userOptions.strictFeatures ?? DEFAULT_EXTRACT_OPTIONS.strictFeatures),
    strictKeywords: strict || (userOptions.strictKeywords ?? DEFAULT_EXTRACT_OPTIONS.strictKeywords),
    defaultVersion: userOptions.defaultVersion ?? DEFAULT_EXTRACT_OPTIONS.defaultVersion,
    openOnlyWhenExplicit:
      userOptions.openOnlyWhenExplicit ?? DEFAULT_EXTRACT_OPTIONS.openOnlyWhenExplicit,
    debug: userOptions.debug ?? DEFAULT_EXTRACT_OPTIONS.debug,
  };
  if (userOptions.defineSchema !== undefined) {
    resolved.defineSchema = userOptions.defineSchema;
  }
  return resolved;
}

// WHATWG URLs only parse without a base when they are absolute.
function validateRootID(id: string): void {
  try {
    new URL(id);
  } catch (cause) {
    throw new ConfigurationError({
      message: `invalid id value ${JSON.stringify(id)}: not an absolute URI`,
      context: { value: id },
      ...(cause instanceof Error ? { cause } : {}),
    });
  }
}

/** Name of the `$defs` entry for a reference to `path` inside `root`. */
export type NameFunc = (root: HostValue, path: Path) => string;

export interface GenerateOptions {
  /** Target version; only '2020-12' is supported (default: '2020-12') */
  version?: Version;
  /** `$defs` naming for references (default: selectors joined with '.') */
  nameFunc?: NameFunc;
  /**
   * Never emit `additionalProperties: false` for implicitly closed
   * structs, and emit `additionalProperties: true` for explicitly open
   * ones (default: false)
   */
  explicitOpen?: boolean;
  /** Trace the generation stages (default: false) */
  debug?: DebugOption;
}

export interface ResolvedGenerateOptions {
  version: Version;
  nameFunc: NameFunc;
  explicitOpen: boolean;
  debug: DebugOption;
}

export function resolveGenerateOptions(
  userOptions: GenerateOptions = {},
  defaultNameFunc: NameFunc
): ResolvedGenerateOptions {
  return {
    version: userOptions.version ?? DEFAULT_VERSION,
    nameFunc: userOptions.nameFunc ?? defaultNameFunc,
    explicitOpen: userOptions.explicitOpen ?? false,
    debug: userOptions.debug ?? false,
  };
}
