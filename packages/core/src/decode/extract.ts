import type { File } from '../syntax/ast.js';
import { ConfigurationError, ErrorList } from '../types/errors.js';
import { resolveExtractOptions, type ExtractOptions } from '../types/options.js';
import { err, ok, type Result } from '../types/result.js';
import { makeMapRef } from './ref.js';
import { Decoder } from './decoder.js';

/**
 * Translates the JSON Schema document `data` into a type-language file.
 *
 * Every error found is reported, not just the first; the file is only
 * returned when there are none.
 */
export function Extract(data: unknown, options: ExtractOptions = {}): Result<File, ErrorList> {
  let decoder: Decoder;
  try {
    decoder = new Decoder(resolveExtractOptions(options, makeMapRef), data);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return err(new ErrorList([error]));
    }
    throw error;
  }
  const file = decoder.decode();
  if (decoder.errors.length > 0 || file === undefined) {
    return err(new ErrorList(decoder.errors));
  }
  return ok(file);
}
