/**
 * One-call facades over Extract and Generate for callers that want text
 * or plain JSON rather than syntax trees. The CLI uses these.
 */
import type { HostValue } from './host/types.js';
import { Extract } from './decode/extract.js';
import { Generate } from './generate/generate.js';
import { schemaToJSON } from './syntax/json.js';
import { formatNode } from './syntax/print.js';
import { ErrorCode } from './errors/codes.js';
import { GenerationError, type ErrorList, type TranslationError } from './types/errors.js';
import type { ExtractOptions, GenerateOptions } from './types/options.js';
import { err, ok, type Result } from './types/result.js';
import type { JsonValue } from './util/json.js';

/**
 * Extracts `data` and formats the resulting file.
 *
 * @example
 * const out = extractSource({ type: 'string', minLength: 2 });
 * if (out.isOk()) console.log(out.value);
 */
export function extractSource(
  data: unknown,
  options: ExtractOptions = {}
): Result<string, ErrorList> {
  const file = Extract(data, options);
  return file.isErr() ? file : ok(formatNode(file.value));
}

/**
 * Generates a JSON Schema document for `value` as plain JSON.
 */
export function generateSchema(
  value: HostValue,
  options: GenerateOptions = {}
): Result<JsonValue, TranslationError> {
  const generated = Generate(value, options);
  if (generated.isErr()) {
    return generated;
  }
  const json = schemaToJSON(generated.value);
  if (json.isErr()) {
    return err(
      new GenerationError({ message: json.error, errorCode: ErrorCode.INTERNAL_ERROR })
    );
  }
  return ok(json.value);
}
