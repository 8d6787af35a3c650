import { err, ok, type Result } from '../types/result.js';

export function encodePointerToken(token: string): string {
  return token.replace(/~/g, '~0').replace(/\//g, '~1');
}

export function decodePointerToken(token: string): string {
  return token.replace(/~1/g, '/').replace(/~0/g, '~');
}

/**
 * Splits a JSON Pointer into unescaped tokens. The empty pointer has no
 * tokens; anything else must start with `/`.
 */
export function jsonPointerTokens(pointer: string): Result<string[], string> {
  if (pointer === '') {
    return ok([]);
  }
  if (!pointer.startsWith('/')) {
    return err(`${JSON.stringify(pointer)} is not a JSON pointer`);
  }
  return ok(pointer.slice(1).split('/').map(decodePointerToken));
}

export function jsonPointerFromTokens(tokens: readonly string[]): string {
  return tokens.map((t) => `/${encodePointerToken(t)}`).join('');
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}
