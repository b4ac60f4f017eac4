import { isBase64Error, type Base64Error } from './core/errors'

/**
 * Result type for callers that prefer errors as values.
 *
 * The codec functions throw; {@link attempt} turns a thrown {@link Base64Error}
 * into an `Err` so that each call yields either bytes or exactly one error kind.
 */

export type Ok<T> = { readonly kind: 'ok'; readonly value: T }
export type Err<E> = { readonly kind: 'err'; readonly error: E }

export type Result<T, E> = Ok<T> | Err<E>

export const ok = <T>(value: T): Result<T, never> => ({ kind: 'ok', value })
export const err = <E>(error: E): Result<never, E> => ({ kind: 'err', error })

export function isOk<T, E>(result: Result<T, E>): result is Ok<T> {
  return result.kind === 'ok'
}

export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
  return result.kind === 'err'
}

/**
 * Runs `fn` and captures a thrown {@link Base64Error}. Any other exception is
 * a programming error and propagates.
 */
export function attempt<T>(fn: () => T): Result<T, Base64Error> {
  try {
    return ok(fn())
  } catch (error) {
    if (isBase64Error(error)) {
      return err(error)
    }
    throw error
  }
}
