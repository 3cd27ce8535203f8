import type { AnyCallable, Infallible } from './types.js'
import { INFALLIBLE } from '../shared/brands.js'

/**
 * Marks `fn` as guaranteed never to fail. Strict factories only accept
 * callbacks and in-place types carrying this mark.
 */
export const infallible = <F extends AnyCallable>(fn: F): Infallible<F> =>
  Object.assign(fn, { [INFALLIBLE]: true as const })

export const isInfallible = (fn: unknown): boolean =>
  typeof fn === 'function' && INFALLIBLE in fn && fn[INFALLIBLE] === true
