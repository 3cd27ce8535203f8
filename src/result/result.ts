import type { AnyResult, Result } from './types.js'
import type { Status } from '../status/types.js'
import type { TrapHandler } from '../trap/types.js'
import type { ConstAccess, MutableAccess, Ownership } from '../shared/ownership.js'
import type { And, CopySupported, Gated, Require, Strictness } from '../strictness/types.js'
import { createStatus } from '../status/status.js'
import { destroyAt, duplicate, isCopyable } from '../lifecycle/payload.js'
import { consumes } from '../shared/ownership.js'
import { RESULT } from '../shared/brands.js'

export type Slot<T, E> =
  | { readonly hasValue: true; readonly value: T }
  | { readonly hasValue: false; readonly error: E }

type Phase = 'owned' | 'moved' | 'disposed'

export const createResult = <T, E, S extends Strictness>(
  slot: Slot<T, E>,
  trap: TrapHandler
): Result<T, E, S> => {
  let phase: Phase = 'owned'

  const guard = (operation: string): void => {
    if (phase !== 'owned') {
      trap({ kind: 'moved-from', message: `${operation} on a ${phase} result` })
    }
  }

  // Hands a payload out; under 'move' this container gives up ownership.
  const lend = <P>(payload: P, access: Ownership): P => {
    if (consumes(access)) phase = 'moved'
    return payload
  }

  const copy = <P>(payload: P): P =>
    isCopyable(payload)
      ? duplicate(payload)
      : trap({ kind: 'not-copyable', message: 'payload owns a resource and has no clone()', payload })

  // Payload for a new container: copied, unless moving or it cannot be copied,
  // in which case this container hands it over.
  const carry = <P>(payload: P, access: Ownership): P =>
    consumes(access) || !isCopyable(payload) ? lend(payload, 'move') : duplicate(payload)

  // A map that returns the borrowed payload itself must not give it two owners.
  const own = <P>(output: P, borrowed: unknown, access: Ownership): P =>
    !consumes(access) && typeof output === 'object' && output !== null && output === borrowed
      ? carry(output, access)
      : output

  const hasValue = (): boolean => slot.hasValue

  function value(access?: MutableAccess): T
  function value(access: ConstAccess): Readonly<T>
  function value(access: Ownership = 'mut'): T {
    guard('value()')
    if (!slot.hasValue) {
      return trap({
        kind: 'value-of-error',
        message: 'value() called on a result holding an error',
        payload: slot.error,
      })
    }
    return lend(slot.value, access)
  }

  function error(access?: MutableAccess): E
  function error(access: ConstAccess): Readonly<E>
  function error(access: Ownership = 'mut'): E {
    guard('error()')
    if (slot.hasValue) {
      return trap({
        kind: 'error-of-value',
        message: 'error() called on a result holding a value',
        payload: slot.value,
      })
    }
    return lend(slot.error, access)
  }

  const valueOr = <U = T>(fallback: U, access: Ownership = 'mut'): T | U => {
    guard('valueOr()')
    return slot.hasValue ? lend(slot.value, access) : fallback
  }

  const errorOr = <G = E>(fallback: G, access: Ownership = 'mut'): E | G => {
    guard('errorOr()')
    return slot.hasValue ? fallback : lend(slot.error, access)
  }

  const andThen = <U>(
    f: Gated<(value: T) => Result<U, E, S>, S>,
    access: Ownership = 'mut'
  ): Result<U, E, S> => {
    guard('andThen()')
    if (slot.hasValue) return f(lend(slot.value, access))
    return createResult<U, E, S>({ hasValue: false, error: carry(slot.error, access) }, trap)
  }

  const orElse = <G>(
    f: Gated<(error: E) => Result<T, G, S>, S>,
    access: Ownership = 'mut'
  ): Result<T, G, S> => {
    guard('orElse()')
    if (!slot.hasValue) return f(lend(slot.error, access))
    return createResult<T, G, S>({ hasValue: true, value: carry(slot.value, access) }, trap)
  }

  const transform = <U>(
    f: Gated<(value: T) => U, S>,
    access: Ownership = 'mut'
  ): Result<U, E, S> => {
    guard('transform()')
    if (slot.hasValue) {
      const mapped = f(lend(slot.value, access))
      return createResult<U, E, S>({ hasValue: true, value: own(mapped, slot.value, access) }, trap)
    }
    return createResult<U, E, S>({ hasValue: false, error: carry(slot.error, access) }, trap)
  }

  const transformError = <G>(
    f: Gated<(error: E) => G, S>,
    access: Ownership = 'mut'
  ): Result<T, G, S> => {
    guard('transformError()')
    if (!slot.hasValue) {
      const mapped = f(lend(slot.error, access))
      return createResult<T, G, S>({ hasValue: false, error: own(mapped, slot.error, access) }, trap)
    }
    return createResult<T, G, S>({ hasValue: true, value: carry(slot.value, access) }, trap)
  }

  const clone = (
    ..._gate: Require<And<CopySupported<T, S>, CopySupported<E, S>>>
  ): Result<T, E, S> => {
    guard('clone()')
    return createResult<T, E, S>(
      slot.hasValue
        ? { hasValue: true, value: copy(slot.value) }
        : { hasValue: false, error: copy(slot.error) },
      trap
    )
  }

  const take = (): Result<T, E, S> => {
    guard('take()')
    phase = 'moved'
    return createResult<T, E, S>(slot, trap)
  }

  const toStatus = (access: Ownership = 'mut'): Status<E, S> => {
    guard('toStatus()')
    if (slot.hasValue) {
      if (consumes(access)) phase = 'moved'
      return createStatus<E, S>({ hasError: false }, trap)
    }
    return createStatus<E, S>({ hasError: true, error: carry(slot.error, access) }, trap)
  }

  const dispose = (): void => {
    if (phase === 'owned') destroyAt(slot.hasValue ? slot.value : slot.error)
    phase = 'disposed'
  }

  return {
    [RESULT]: true,
    hasValue,
    ok: hasValue,
    toBoolean: hasValue,
    isMovedFrom: () => phase === 'moved',
    value,
    error,
    valueOr,
    errorOr,
    andThen,
    orElse,
    transform,
    transformError,
    clone,
    take,
    toStatus,
    dispose,
  }
}

export const isResult = (value: unknown): value is AnyResult =>
  typeof value === 'object' && value !== null && RESULT in value
