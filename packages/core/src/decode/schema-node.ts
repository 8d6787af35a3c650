import { jsonKind, Kind, type KindSet } from '../host/kind.js';
import { indexSel, stringSel, type Path } from '../syntax/path.js';
import { isRecord, jsonPointerFromTokens } from '../util/json-pointer.js';

export type PathToken = string | number;

/**
 * A value inside the document being decoded, together with its location.
 * The location doubles as the error position and the identity of the node.
 */
export class SchemaNode {
  constructor(
    public readonly value: unknown,
    public readonly path: readonly PathToken[] = []
  ) {}

  /** JSON Pointer from the document root. */
  get pointer(): string {
    return jsonPointerFromTokens(this.path.map(String));
  }

  kind(): KindSet {
    if (typeof this.value === 'number' && !Number.isFinite(this.value)) {
      return Kind.Bottom;
    }
    return jsonKind(this.value);
  }

  is(kind: KindSet): boolean {
    return (this.kind() & kind) !== 0;
  }

  same(other: SchemaNode): boolean {
    return this.pointer === other.pointer;
  }

  /** Object members in document order; empty for non-objects. */
  fields(): Array<[string, SchemaNode]> {
    const value = this.value;
    if (!isRecord(value)) return [];
    return Object.keys(value).map((k) => [k, new SchemaNode(value[k], [...this.path, k])]);
  }

  /** Array elements; empty for non-arrays. */
  items(): SchemaNode[] {
    const value = this.value;
    if (!Array.isArray(value)) return [];
    return value.map((v: unknown, i) => new SchemaNode(v, [...this.path, i]));
  }

  field(name: string): SchemaNode | undefined {
    const value = this.value;
    if (!isRecord(value) || !Object.prototype.hasOwnProperty.call(value, name)) {
      return undefined;
    }
    return new SchemaNode(value[name], [...this.path, name]);
  }

  /**
   * Follows one JSON Pointer token. Array indices are decimal without
   * leading zeros.
   */
  lookupToken(token: string): SchemaNode | undefined {
    const value = this.value;
    if (Array.isArray(value)) {
      if (!/^(0|[1-9][0-9]*)$/.test(token)) return undefined;
      const i = Number(token);
      if (i >= value.length) return undefined;
      return new SchemaNode(value[i], [...this.path, i]);
    }
    return this.field(token);
  }

  lookup(tokens: readonly string[]): SchemaNode | undefined {
    let n: SchemaNode | undefined = this;
    for (const t of tokens) {
      n = n.lookupToken(t);
      if (n === undefined) return undefined;
    }
    return n;
  }

  /** Path of this node relative to `root`, which must be an ancestor. */
  relPath(root: SchemaNode): Path {
    if (root.path.length > this.path.length) {
      throw new Error(`${this.pointer} is not inside ${root.pointer}`);
    }
    root.path.forEach((t, i) => {
      if (this.path[i] !== t) {
        throw new Error(`${this.pointer} is not inside ${root.pointer}`);
      }
    });
    return this.path
      .slice(root.path.length)
      .map((t) => (typeof t === 'number' ? indexSel(t) : stringSel(t)));
  }
}
