/**
 * A success-or-failure value for operations whose failure is expected and
 * must be handled by the caller rather than thrown.
 */
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export function isOk<T, E>(result: Result<T, E>): result is { ok: true; value: T } {
  return result.ok;
}

export function isErr<T, E>(result: Result<T, E>): result is { ok: false; error: E } {
  return !result.ok;
}

/**
 * Extract the success value, throwing on failure.
 *
 * An `Error` failure is rethrown as-is; anything else is wrapped in a
 * `TypeError` naming it.
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) return result.value;
  if (result.error instanceof Error) throw result.error;
  throw new TypeError(`Called unwrap() on a failed result: ${String(result.error)}`);
}
