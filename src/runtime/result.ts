/**
 * Synchronous Result for parse-time boundaries (config, launch configuration,
 * interpreter resolution). Async process work uses neverthrow's ResultAsync.
 */

export type Ok<T> = { readonly kind: 'ok'; readonly value: T };
export type Err<E> = { readonly kind: 'err'; readonly error: E };

export type Result<T, E> = Ok<T> | Err<E>;

export const ok = <T>(value: T): Result<T, never> => ({ kind: 'ok', value });
export const err = <E>(error: E): Result<never, E> => ({ kind: 'err', error });

export function map<T, E, U>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
  return result.kind === 'ok' ? ok(fn(result.value)) : result;
}
