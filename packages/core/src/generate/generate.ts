import type { HostValue } from '../host/types.js';
import { field, str, struct, type Expr, type StructLit } from '../syntax/ast.js';
import { ErrorCode } from '../errors/codes.js';
import { ErrorList, GenerationError, type TranslationError } from '../types/errors.js';
import { resolveGenerateOptions, type GenerateOptions } from '../types/options.js';
import { err, ok, type Result } from '../types/result.js';
import { createDebugLogger } from '../util/debug.js';
import { schemaURI } from '../versions/version.js';
import { enumFromConst } from './enum-from-const.js';
import { Generator, defaultNameFunc } from './generator.js';
import { mergeAllOf } from './merge-all-of.js';
import { renderItem, schemaStruct } from './render.js';
import type { Handle, ItemStore } from './store.js';

function rewrite(h: Handle, store: ItemStore): Handle {
  return enumFromConst(mergeAllOf(h, store), store);
}

/**
 * Generates a JSON Schema 2020-12 document for `value`. The result is a
 * struct literal shaped like the JSON document; {@link schemaToJSON}
 * turns it into plain data.
 */
export function Generate(
  value: HostValue,
  options: GenerateOptions = {}
): Result<StructLit, TranslationError> {
  const cfg = resolveGenerateOptions(options, defaultNameFunc);
  if (cfg.version !== '2020-12') {
    return err(
      new GenerationError({
        message: `only version 2020-12 is supported for generating JSON Schema, not ${cfg.version}`,
        errorCode: ErrorCode.UNSUPPORTED_TARGET_VERSION,
      })
    );
  }
  const problems = value.validate();
  if (problems.length > 0) {
    return err(
      new ErrorList(
        problems.map(
          (message) => new GenerationError({ message, errorCode: ErrorCode.INVALID_VALUE })
        )
      )
    );
  }
  const log = createDebugLogger(cfg.debug, 'generate');

  const g = new Generator(cfg);
  const root = rewrite(g.makeItem(value), g.store);
  log(`${g.store.size} distinct items, ${g.defs.size} definitions`);

  let expr: Expr = renderItem(root);
  if (expr.kind === 'lit') {
    if (expr.value === 'false') {
      if (g.errors.length === 0) {
        g.errors.push(
          new GenerationError({
            message: 'schema cannot be satisfied',
            errorCode: ErrorCode.UNSATISFIABLE_SCHEMA,
          })
        );
      }
      return err(new ErrorList(g.errors));
    }
    // true accepts everything, as does the empty schema.
    expr = struct();
  }
  if (expr.kind !== 'struct') {
    return err(
      new GenerationError({
        message: `expected a schema object, got ${expr.kind}`,
        errorCode: ErrorCode.INTERNAL_ERROR,
      })
    );
  }

  const fields = [field('$schema', str(schemaURI(cfg.version) ?? ''))];
  if (g.defs.size > 0) {
    const names = [...g.defs.keys()].sort();
    const defs = names.map((name) => {
      const def = g.defs.get(name);
      return field(name, def === undefined ? struct() : renderItem(rewrite(def, g.store)));
    });
    fields.push(field('$defs', struct(...defs)));
  }
  for (const d of expr.elts) {
    if (d.kind === 'field') fields.push(d);
  }
  if (g.errors.length > 0) {
    return err(new ErrorList(g.errors));
  }
  return ok(schemaStruct(...fields));
}
