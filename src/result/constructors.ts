import type { AnyResult, ConvertSupported, Result, ResultConverters } from './types.js'
import type { TrapHandler } from '../trap/types.js'
import type { ConvertMode } from '../shared/ownership.js'
import type { Constructor } from '../lifecycle/types.js'
import type {
  And,
  CopySupported,
  DefaultStrictness,
  Gated,
  IsExactly,
  Or,
  Require,
  Strictness,
} from '../strictness/types.js'
import { type ErrorWrapper, isErrorWrapper, wrapError } from './error-wrapper.js'
import { createResult } from './result.js'
import { defaultTrap } from '../trap/trap.js'
import { duplicate, isCopyable } from '../lifecycle/payload.js'

export type ResultFactoryOptions = {
  trap?: TrapHandler
}

// from() never takes a wrapper (that is the error overload) or a whole result:
// nesting goes through ok(), unwrapping through clone() or convert().
type DirectValueSupported<T> =
  [T] extends [AnyResult] ? false
  : [T] extends [ErrorWrapper<unknown>] ? false
  : true

/**
 * Result constructors bound to one trap handler and one strictness. Results
 * built here, and every result derived from them by combinators, report
 * contract violations to that handler.
 */
export const createResults = <S extends Strictness = DefaultStrictness>(
  options: ResultFactoryOptions = {}
) => {
  const trap = options.trap ?? defaultTrap()

  function ok<E = never>(): Result<void, E, S>
  function ok<T, E = never>(value: T): Result<T, E, S>
  function ok(...args: [] | [unknown]): Result<void, unknown, S> | Result<unknown, unknown, S> {
    return createResult<unknown, unknown, S>({ hasValue: true, value: args[0] }, trap)
  }

  const err = <E, T = never>(wrapper: ErrorWrapper<E>): Result<T, E, S> =>
    createResult<T, E, S>({ hasValue: false, error: wrapper.error('move') }, trap)

  const error = <E, T = never>(value: E): Result<T, E, S> => err(wrapError(value))

  const inPlace = <T, A extends unknown[], E = never>(
    type: Gated<Constructor<T, A>, S>,
    ...args: A
  ): Result<T, E, S> => createResult<T, E, S>({ hasValue: true, value: new type(...args) }, trap)

  const inPlaceError = <E, A extends unknown[], T = never>(
    type: Gated<Constructor<E, A>, S>,
    ...args: A
  ): Result<T, E, S> => createResult<T, E, S>({ hasValue: false, error: new type(...args) }, trap)

  /**
   * Builds a result from a single argument. A wrapped error always selects the
   * error branch; anything else becomes the value.
   */
  function from<E, T = never>(wrapper: ErrorWrapper<E>): Result<T, E, S>
  function from<T, E = never>(value: T, ...gate: Require<DirectValueSupported<T>>): Result<T, E, S>
  function from(input: unknown, ..._gate: unknown[]): Result<unknown, unknown, S> {
    if (isErrorWrapper(input)) {
      return createResult<unknown, unknown, S>({ hasValue: false, error: input.error('move') }, trap)
    }
    return createResult<unknown, unknown, S>({ hasValue: true, value: input }, trap)
  }

  const copyOut = <P>(payload: P): P =>
    isCopyable(payload)
      ? duplicate(payload)
      : trap({ kind: 'not-copyable', message: 'payload owns a resource and has no clone()', payload })

  /**
   * Converting copy ('copy') or move ('move') of `source` into
   * `Result<T2, E2>`. Both converters pass the same strictness gate, so the
   * conversion is guaranteed only when both of them are. A copy hands the
   * converters copies of the payload and needs both halves to be copyable.
   */
  const convert = <T, E, T2, E2, M extends ConvertMode = 'copy'>(
    source: Result<T, E, S>,
    converters: ResultConverters<T, E, T2, E2, S>,
    mode?: M,
    ..._gate: Require<
      And<
        ConvertSupported<T2, E2, T, E, S>,
        Or<IsExactly<M, 'move'>, And<CopySupported<T, S>, CopySupported<E, S>>>
      >
    >
  ): Result<T2, E2, S> => {
    const moving = mode === 'move'
    if (source.hasValue()) {
      const value = moving ? source.value('move') : copyOut(source.value())
      return createResult<T2, E2, S>({ hasValue: true, value: converters.value(value) }, trap)
    }
    const cause = moving ? source.error('move') : copyOut(source.error())
    return createResult<T2, E2, S>({ hasValue: false, error: converters.error(cause) }, trap)
  }

  /** Runs code that may throw and captures the outcome as a result. */
  const attempt = <T, E>(fn: () => T, mapError: (cause: unknown) => E): Result<T, E, S> => {
    try {
      return createResult<T, E, S>({ hasValue: true, value: fn() }, trap)
    } catch (cause) {
      return createResult<T, E, S>({ hasValue: false, error: mapError(cause) }, trap)
    }
  }

  /**
   * All values in order, or a copy of the first error encountered. An error
   * that cannot be copied is moved out of its result.
   */
  const collect = <T, E>(results: readonly Result<T, E, S>[]): Result<T[], E, S> => {
    const values: T[] = []
    for (const result of results) {
      if (!result.hasValue()) {
        const error = isCopyable(result.error()) ? duplicate(result.error()) : result.error('move')
        return createResult<T[], E, S>({ hasValue: false, error }, trap)
      }
      values.push(result.value())
    }
    return createResult<T[], E, S>({ hasValue: true, value: values }, trap)
  }

  return {
    ok,
    err,
    error,
    inPlace,
    inPlaceError,
    from,
    convert,
    attempt,
    collect,
  }
}

export type ResultFactory<S extends Strictness = DefaultStrictness> = ReturnType<
  typeof createResults<S>
>

export const results = createResults()

export const Ok = results.ok

export const Err = results.error
