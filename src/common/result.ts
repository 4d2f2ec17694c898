/**
 * Outcome of an operation that can fail without throwing.
 */
export type Result<V, E> = { ok: true; value: V } | { ok: false; error: E };

export function ok<V>(value: V): Result<V, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}
