/**
 * Outcome of an operation that can fail without throwing. Callers
 * narrow with `isOk()` or `isErr()` and then read `value` or `error`.
 */

export type Result<T, E> = Ok<T> | Err<E>;

export class Ok<T> {
  readonly ok = true;

  constructor(readonly value: T) {}

  isOk(): this is Ok<T> {
    return true;
  }

  isErr(): this is never {
    return false;
  }
}

export class Err<E> {
  readonly ok = false;

  constructor(readonly error: E) {}

  isOk(): this is never {
    return false;
  }

  isErr(): this is Err<E> {
    return true;
  }
}

export function ok<T>(value: T): Ok<T> {
  return new Ok(value);
}

export function err<E>(error: E): Err<E> {
  return new Err(error);
}

/**
 * Applies `f` to each input in order and gathers the values, stopping at
 * the first error.
 */
export function collect<A, T, E>(
  inputs: Iterable<A>,
  f: (input: A, index: number) => Result<T, E>
): Result<T[], E> {
  const out: T[] = [];
  let i = 0;
  for (const input of inputs) {
    const r = f(input, i++);
    if (r.isErr()) {
      return r;
    }
    out.push(r.value);
  }
  return ok(out);
}
