// @typebridge/core entry point
//
// - Extract: JSON Schema document -> type-language syntax tree.
// - Generate: type-language value -> JSON Schema 2020-12 syntax tree.
// - extractSource/generateSchema in ./api.js wrap both for text and JSON output.
// - The syntax layer, the host value interface and its in-memory model,
//   the version tables and the error types are exported for callers that
//   drive the two directions themselves.

export * from './api.js';

export { Extract } from './decode/extract.js';
export { Generate } from './generate/generate.js';
export { defaultNameFunc } from './generate/generator.js';

// IR and rewrite passes
export {
  mapChildren,
  children,
  type Item,
  type ItemKind,
  type ItemOf,
  type BoundsOp,
  type CountOp,
  type Property,
  type PatternProperty,
} from './generate/items.js';
export { ItemStore, type Handle } from './generate/store.js';
export { mergeAllOf } from './generate/merge-all-of.js';
export { enumFromConst } from './generate/enum-from-const.js';
export {
  renderItem,
  schemaStruct,
  compareSchemaLabels,
  KEYWORD_GROUPS,
} from './generate/render.js';

// Definition tree
export { StructBuilder, ROOT_IDENT_NAME } from './decode/struct-builder.js';
export { defaultMap, defaultMapURL, defaultMapRef, makeMapRef } from './decode/ref.js';

// Syntax
export * from './syntax/ast.js';
export { formatNode } from './syntax/print.js';
export { jsonToExpr, schemaToJSON } from './syntax/json.js';
export {
  stringSel,
  defSel,
  hiddenSel,
  indexSel,
  selectorString,
  pathString,
  pathToJSONPointer,
  type Path,
  type Selector,
  type SelectorType,
} from './syntax/path.js';

// Host values
export * from './host/types.js';
export { hv, labelMatches, type FieldSpec, type StructOptions } from './host/model.js';
export { Kind, NumberKind, TopKind, kindString, type KindSet } from './host/kind.js';

// Versions and tables
export {
  VERSIONS,
  DEFAULT_VERSION,
  describeVersion,
  parseVersion,
  schemaURI,
  versionFromName,
  type Version,
} from './versions/version.js';
export { KEYWORDS, FORMATS, lookupKeyword, lookupFormat } from './versions/tables.js';

// Options, results and errors
export * from './types/options.js';
export * from './types/result.js';
export * from './types/errors.js';
export { ErrorCode, EXIT_CODES, getExitCode, type Severity } from './errors/codes.js';
export { toJsonValue, type JsonValue } from './util/json.js';
export type { DebugLogger } from './util/debug.js';
