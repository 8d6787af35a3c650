import { call, ident, selector, str } from '../../syntax/ast.js';
import { ErrorCode } from '../../errors/codes.js';
import { lookupFormat, type FormatHandler } from '../../versions/tables.js';
import { isIn, openAPILike } from '../../versions/version.js';
import { CoreType } from '../core-types.js';
import type { SchemaNode } from '../schema-node.js';
import type { SchemaState } from '../state.js';

export function constraintFormat(_key: string, n: SchemaNode, s: SchemaState): void {
  const name = s.decoder.strValue(n);
  if (name === undefined) {
    return;
  }
  // OpenAPI allows any format string, so it is never reported there.
  const report = s.decoder.cfg.strictKeywords && !isIn(s.schemaVersion, openAPILike);
  const info = lookupFormat(name);
  if (info === undefined) {
    if (report) {
      s.decoder.featureErrf(n, `unknown format ${JSON.stringify(name)}`, ErrorCode.UNKNOWN_FORMAT);
    }
    return;
  }
  if (!isIn(s.schemaVersion, info.versions)) {
    if (report) {
      s.decoder.featureErrf(
        n,
        `format ${JSON.stringify(name)} is not recognized in schema version ${s.schemaVersion}`,
        ErrorCode.UNKNOWN_FORMAT
      );
    }
    return;
  }
  if (info.handler !== undefined) {
    applyFormat(info.handler, n, s);
  }
}

function applyFormat(handler: FormatHandler, n: SchemaNode, s: SchemaState): void {
  const d = s.decoder;
  switch (handler) {
    case 'uri':
      s.add(CoreType.String, n, selector(d.addImport('net'), 'AbsURL'));
      return;
    case 'uriReference':
      s.add(CoreType.String, n, selector(d.addImport('net'), 'URL'));
      return;
    case 'dateTime':
      s.add(CoreType.String, n, selector(d.addImport('time'), 'Time'));
      return;
    case 'date':
      s.add(CoreType.String, n, call(selector(d.addImport('time'), 'Format'), str('2006-01-02')));
      return;
    case 'regex':
      s.add(CoreType.String, n, selector(d.addImport('regexp'), 'Valid'));
      return;
    case 'int32':
    case 'int64':
    case 'uint32':
    case 'uint64':
      s.add(CoreType.Number, n, ident(handler));
      return;
  }
}
