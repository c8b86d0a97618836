// packages/variant-runtime/result.ts
// Outcome of the `*Safe` operations: `constructSafe`, `parseSafe`, `validateSafe`.

export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

/**
 * @example
 * ```ts
 * const price = Result.map(
 *   Ticket.constructSafe("Economy", route),
 *   (ticket) => ticket.payload.price,
 * );
 * Result.unwrapOr(price, 0);
 * ```
 */
export const Result = {
  ok<T, E = never>(value: T): Result<T, E> {
    return { ok: true, value };
  },

  err<T = never, E = unknown>(error: E): Result<T, E> {
    return { ok: false, error };
  },

  map<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
    return result.ok ? Result.ok(fn(result.value)) : result;
  },

  /** `fn` only runs on success; the first failure is passed through. */
  andThen<T, U, E>(
    result: Result<T, E>,
    fn: (value: T) => Result<U, E>,
  ): Result<U, E> {
    return result.ok ? fn(result.value) : result;
  },

  mapErr<T, E, F>(result: Result<T, E>, fn: (error: E) => F): Result<T, F> {
    return result.ok ? result : Result.err(fn(result.error));
  },

  unwrapOr<T, E>(result: Result<T, E>, fallback: T): T {
    return result.ok ? result.value : fallback;
  },
};
