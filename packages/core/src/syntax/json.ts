import {
  bool,
  field,
  labelName,
  list,
  nullLit,
  num,
  str,
  struct,
  type Expr,
} from './ast.js';
import { collect, err, ok, type Result } from '../types/result.js';
import type { JsonValue } from '../util/json.js';

/** Literal syntax for a JSON value. Object labels are always quoted. */
export function jsonToExpr(value: JsonValue): Expr {
  if (value === null) return nullLit();
  if (typeof value === 'boolean') return bool(value);
  if (typeof value === 'number') return num(value);
  if (typeof value === 'string') return str(value);
  if (Array.isArray(value)) return list(...value.map(jsonToExpr));
  return struct(...Object.entries(value).map(([k, v]) => field(str(k), jsonToExpr(v))));
}

/**
 * Converts literal syntax back to JSON. Fails on anything that is not a
 * literal, list or struct of plain fields.
 */
export function schemaToJSON(expr: Expr): Result<JsonValue, string> {
  switch (expr.kind) {
    case 'lit': {
      const parsed: unknown = JSON.parse(expr.value);
      if (
        parsed === null ||
        typeof parsed === 'string' ||
        typeof parsed === 'number' ||
        typeof parsed === 'boolean'
      ) {
        return ok(parsed);
      }
      return err(`unexpected literal ${expr.value}`);
    }
    case 'list':
      return collect(expr.elts, (e) =>
        e.kind === 'ellipsis' ? err('open lists have no JSON form') : schemaToJSON(e)
      );
    case 'struct': {
      const out: { [key: string]: JsonValue } = {};
      for (const d of expr.elts) {
        if (d.kind !== 'field') {
          return err(`unexpected ${d.kind} declaration in struct`);
        }
        const name = labelName(d.label);
        if (name === undefined) {
          return err('struct label is not a plain name');
        }
        const v = schemaToJSON(d.value);
        if (v.isErr()) return v;
        out[name] = v.value;
      }
      return ok(out);
    }
    default:
      return err(`cannot convert ${expr.kind} expression to JSON`);
  }
}
