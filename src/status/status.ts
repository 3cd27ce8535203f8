import type { AlwaysSuccessStatus, Status } from './types.js'
import type { TrapHandler } from '../trap/types.js'
import type { ConstAccess, ConvertMode, MutableAccess, Ownership } from '../shared/ownership.js'
import type { Constructor } from '../lifecycle/types.js'
import type {
  CopySupported,
  DefaultStrictness,
  Gated,
  Not,
  Require,
  Strictness,
} from '../strictness/types.js'
import { type ErrorWrapper, isErrorWrapper } from '../result/error-wrapper.js'
import { destroyAt, duplicate, isCopyable } from '../lifecycle/payload.js'
import { defaultTrap } from '../trap/trap.js'
import { consumes } from '../shared/ownership.js'
import { ALWAYS_SUCCESS, STATUS, type Nullerr } from '../shared/brands.js'

type Outcome<E> = { readonly hasError: false } | { readonly hasError: true; readonly error: E }

type Phase = 'owned' | 'moved' | 'disposed'

export const createStatus = <E, S extends Strictness>(
  outcome: Outcome<E>,
  trap: TrapHandler
): Status<E, S> => {
  let phase: Phase = 'owned'

  const guard = (operation: string): void => {
    if (phase !== 'owned') {
      trap({ kind: 'moved-from', message: `${operation} on a ${phase} status` })
    }
  }

  const lend = (error: E, access: Ownership): E => {
    if (consumes(access)) phase = 'moved'
    return error
  }

  const copy = (error: E): E =>
    isCopyable(error)
      ? duplicate(error)
      : trap({ kind: 'not-copyable', message: 'error owns a resource and has no clone()', payload: error })

  const ok = (): boolean => !outcome.hasError

  function error(access?: MutableAccess): E
  function error(access: ConstAccess): Readonly<E>
  function error(access: Ownership = 'mut'): E {
    guard('error()')
    if (!outcome.hasError) {
      return trap({ kind: 'error-of-value', message: 'error() called on a successful status' })
    }
    return lend(outcome.error, access)
  }

  const errorOr = <G = E>(fallback: G, access: Ownership = 'mut'): E | G => {
    guard('errorOr()')
    return outcome.hasError ? lend(outcome.error, access) : fallback
  }

  const clone = (..._gate: Require<CopySupported<E, S>>): Status<E, S> => {
    guard('clone()')
    return createStatus<E, S>(
      outcome.hasError ? { hasError: true, error: copy(outcome.error) } : { hasError: false },
      trap
    )
  }

  const take = (): Status<E, S> => {
    guard('take()')
    phase = 'moved'
    return createStatus<E, S>(outcome, trap)
  }

  const convert = <G>(
    convertError: Gated<(error: E) => G, S>,
    mode: ConvertMode = 'copy'
  ): Status<G, S> => {
    guard('convert()')
    if (!outcome.hasError) {
      if (mode === 'move') phase = 'moved'
      return createStatus<G, S>({ hasError: false }, trap)
    }
    // The converter gets a copy, or the error itself when it cannot be copied
    const source =
      mode === 'move' || !isCopyable(outcome.error)
        ? lend(outcome.error, 'move')
        : duplicate(outcome.error)
    return createStatus<G, S>({ hasError: true, error: convertError(source) }, trap)
  }

  const dispose = (): void => {
    if (phase === 'owned' && outcome.hasError) destroyAt(outcome.error)
    phase = 'disposed'
  }

  return {
    [STATUS]: true,
    ok,
    hasError: () => outcome.hasError,
    toBoolean: ok,
    isMovedFrom: () => phase === 'moved',
    error,
    errorOr,
    clone,
    take,
    convert,
    dispose,
  }
}

export const createAlwaysSuccessStatus = (
  trap: TrapHandler = defaultTrap()
): AlwaysSuccessStatus => {
  function error(this: never): never {
    return trap({
      kind: 'always-success-error',
      message: 'error() reached on a status that cannot fail',
    })
  }

  return {
    [ALWAYS_SUCCESS]: true,
    ok: () => true,
    toBoolean: () => true,
    error,
  }
}

export type StatusFactoryOptions = {
  trap?: TrapHandler
}

type IsWrapperLike<E> = [E] extends [ErrorWrapper<unknown>] ? true : [E] extends [Status<unknown, Strictness>] ? true : false

export const createStatuses = <S extends Strictness = DefaultStrictness>(
  options: StatusFactoryOptions = {}
) => {
  const trap = options.trap ?? defaultTrap()

  /** A status holding no error. `nullerr` may be passed to say so explicitly. */
  const ok = <E = never>(_marker?: Nullerr): Status<E, S> =>
    createStatus<E, S>({ hasError: false }, trap)

  const fail = <E>(wrapper: ErrorWrapper<E>): Status<E, S> =>
    createStatus<E, S>({ hasError: true, error: wrapper.error('move') }, trap)

  const failInPlace = <E, A extends unknown[]>(
    type: Gated<Constructor<E, A>, S>,
    ...args: A
  ): Status<E, S> => createStatus<E, S>({ hasError: true, error: new type(...args) }, trap)

  /**
   * Builds a failed status straight from an error value. A wrapper is unwrapped
   * first; passing a status is rejected at compile time (use clone or take).
   */
  function from<E>(wrapper: ErrorWrapper<E>): Status<E, S>
  function from<E>(error: E, ...gate: Require<Not<IsWrapperLike<E>>>): Status<E, S>
  function from(input: unknown, ..._gate: unknown[]): Status<unknown, S> {
    const error = isErrorWrapper(input) ? input.error('move') : input
    return createStatus<unknown, S>({ hasError: true, error }, trap)
  }

  const alwaysSuccess = (): AlwaysSuccessStatus => createAlwaysSuccessStatus(trap)

  return {
    ok,
    fail,
    failInPlace,
    from,
    alwaysSuccess,
  }
}

export type StatusFactory<S extends Strictness = DefaultStrictness> = ReturnType<typeof createStatuses<S>>

export const isStatus = (value: unknown): value is Status<unknown, Strictness> =>
  typeof value === 'object' && value !== null && STATUS in value

export const isAlwaysSuccessStatus = (value: unknown): value is AlwaysSuccessStatus =>
  typeof value === 'object' && value !== null && ALWAYS_SUCCESS in value

export const statuses = createStatuses()
