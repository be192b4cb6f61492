/**
 * Result type for expected failures: undecodable files, rejected queries,
 * store errors returned to the orchestrator.
 *
 * @module
 */

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/**
 * The value of an Ok result
 *
 * @throws The contained error for an Err result
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) return result.value;
  throw result.error;
}
