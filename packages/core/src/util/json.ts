export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

export function isJsonObject(value: JsonValue): value is { [key: string]: JsonValue } {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Serializes a JSON value with object keys sorted, so that equal values
 * produce equal strings.
 */
export function canonicalJSON(value: JsonValue): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJSON).join(',')}]`;
  }
  if (isJsonObject(value)) {
    const keys = Object.keys(value).sort();
    const parts: string[] = [];
    for (const k of keys) {
      const v = value[k];
      if (v !== undefined) parts.push(`${JSON.stringify(k)}:${canonicalJSON(v)}`);
    }
    return `{${parts.join(',')}}`;
  }
  if (typeof value === 'number') {
    return Object.is(value, -0) ? '0' : String(value);
  }
  return JSON.stringify(value);
}

/**
 * Narrows an arbitrary value to JSON. Returns undefined for values JSON
 * cannot represent (functions, undefined, non-finite numbers, cycles).
 */
export function toJsonValue(value: unknown, seen: Set<object> = new Set()): JsonValue | undefined {
  if (value === null || typeof value === 'boolean' || typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value !== 'object' || seen.has(value)) {
    return undefined;
  }
  seen.add(value);
  try {
    if (Array.isArray(value)) {
      const out: JsonValue[] = [];
      for (const item of value) {
        const v = toJsonValue(item, seen);
        if (v === undefined) return undefined;
        out.push(v);
      }
      return out;
    }
    const out: { [key: string]: JsonValue } = {};
    for (const [k, item] of Object.entries(value)) {
      const v = toJsonValue(item, seen);
      if (v === undefined) return undefined;
      out[k] = v;
    }
    return out;
  } finally {
    seen.delete(value);
  }
}
