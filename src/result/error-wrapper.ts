import type { ConstAccess, MutableAccess, Ownership } from '../shared/ownership.js'
import type { Constructor } from '../lifecycle/types.js'
import { ERROR_WRAPPER } from '../shared/brands.js'

/**
 * Tags a raw error so that constructors build the error branch, even when the
 * value and error types overlap.
 */
export type ErrorWrapper<E> = {
  readonly [ERROR_WRAPPER]: true
  error(access?: MutableAccess): E
  error(access: ConstAccess): Readonly<E>
}

export const wrapError = <E>(error: E): ErrorWrapper<E> => {
  function read(access?: MutableAccess): E
  function read(access: ConstAccess): Readonly<E>
  function read(_access: Ownership = 'mut'): E {
    return error
  }

  return {
    [ERROR_WRAPPER]: true,
    error: read,
  }
}

/** Builds the wrapped error directly from constructor arguments. */
export const wrapErrorInPlace = <E, A extends unknown[]>(
  type: Constructor<E, A>,
  ...args: A
): ErrorWrapper<E> => wrapError(new type(...args))

export const isErrorWrapper = (value: unknown): value is ErrorWrapper<unknown> =>
  typeof value === 'object' && value !== null && ERROR_WRAPPER in value
