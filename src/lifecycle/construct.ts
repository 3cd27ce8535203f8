import type {
  Constructor,
  InPlaceCopy,
  InPlaceCreate,
  StatusLike,
  Storage,
} from './types.js'
import type { AlwaysSuccessStatus } from '../status/types.js'
import { createAlwaysSuccessStatus } from '../status/status.js'
import { duplicate, isCopyable } from './payload.js'
import { scopedLogger } from '../shared/logger.js'

const log = scopedLogger('lifecycle')

const hasInPlaceCreate = <T, A extends unknown[]>(
  type: InPlaceCreate<T, A, StatusLike> | Constructor<T, A>
): type is InPlaceCreate<T, A, StatusLike> =>
  'create' in type && typeof type.create === 'function'

const hasInPlaceCopy = <T>(
  type: InPlaceCopy<T, StatusLike> | undefined
): type is InPlaceCopy<T, StatusLike> =>
  type !== undefined && typeof type.copy === 'function'

/**
 * Constructs a T inside `storage`. A type with a static
 * `create(storage, ...args)` builds itself and its status is returned as is;
 * otherwise `new type(...args)` is placed in the cell, which cannot fail.
 */
export function constructAt<T, A extends unknown[], R extends StatusLike>(
  storage: Storage<T>,
  type: InPlaceCreate<T, A, R>,
  ...args: A
): R
export function constructAt<T, A extends unknown[]>(
  storage: Storage<T>,
  type: Constructor<T, A> & { create?: never },
  ...args: A
): AlwaysSuccessStatus
export function constructAt<T, A extends unknown[]>(
  storage: Storage<T>,
  type: InPlaceCreate<T, A, StatusLike> | Constructor<T, A>,
  ...args: A
): StatusLike {
  if (hasInPlaceCreate(type)) {
    const status = type.create(storage, ...args)
    if (!status.ok()) {
      log().debug('In-place create reported a failure')
    }
    return status
  }
  storage.emplace(new type(...args))
  return createAlwaysSuccessStatus(storage.trap)
}

/**
 * Copies `value` into `storage`, preferring the type's static
 * `copy(storage, value)` over the ordinary copy. A payload with dispose() and
 * no clone() has no ordinary copy.
 */
export function copyAt<T, R extends StatusLike>(
  storage: Storage<T>,
  value: T,
  type: InPlaceCopy<T, R>
): R
export function copyAt<T>(storage: Storage<T>, value: T): AlwaysSuccessStatus
export function copyAt<T>(
  storage: Storage<T>,
  value: T,
  type?: InPlaceCopy<T, StatusLike>
): StatusLike {
  if (hasInPlaceCopy(type)) {
    const status = type.copy(storage, value)
    if (!status.ok()) {
      log().debug('In-place copy reported a failure')
    }
    return status
  }
  if (!isCopyable(value)) {
    return storage.trap({
      kind: 'not-copyable',
      message: 'Cannot copy a payload that owns a resource and has no clone()',
      payload: value,
    })
  }
  storage.emplace(duplicate(value))
  return createAlwaysSuccessStatus(storage.trap)
}
