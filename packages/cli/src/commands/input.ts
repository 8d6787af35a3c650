import fs from 'node:fs';
import path from 'node:path';

import { ConfigurationError, ErrorCode, SchemaError } from '@typebridge/core';

export function resolvePath(file: string): string {
  return path.resolve(process.cwd(), file);
}

/**
 * Reads and parses a JSON file.
 *
 * @throws {ConfigurationError} When the file cannot be read
 * @throws {SchemaError} When the contents are not JSON
 */
export function readJsonFile(file: string): unknown {
  const abs = resolvePath(file);
  let raw: string;
  try {
    raw = fs.readFileSync(abs, 'utf8');
  } catch (error) {
    throw new ConfigurationError({
      message: `cannot read ${file}: ${error instanceof Error ? error.message : String(error)}`,
      ...(error instanceof Error ? { cause: error } : {}),
    });
  }
  try {
    const data: unknown = JSON.parse(raw);
    return data;
  } catch (error) {
    throw new SchemaError({
      message: `${file}: invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
      errorCode: ErrorCode.INVALID_VALUE,
    });
  }
}
