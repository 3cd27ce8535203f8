import type { Cloneable, Destroyable } from './types.js'

const isCloneable = <T>(value: T): value is T & Cloneable<T> =>
  typeof value === 'object' &&
  value !== null &&
  'clone' in value &&
  typeof value.clone === 'function'

export const isDestroyable = (value: unknown): value is Destroyable =>
  typeof value === 'object' &&
  value !== null &&
  'dispose' in value &&
  typeof value.dispose === 'function'

/**
 * Whether the ordinary copy can duplicate `value` without leaving two owners of
 * one resource: a payload with dispose() must bring its own clone().
 */
export const isCopyable = (value: unknown): boolean => isCloneable(value) || !isDestroyable(value)

const isPlainData = (value: object): boolean => {
  if (Array.isArray(value)) return true
  const prototype: unknown = Object.getPrototypeOf(value)
  return prototype === Object.prototype || prototype === null
}

const copyValue = (value: unknown, seen: WeakMap<object, unknown>): unknown => {
  if (isCloneable(value)) return value.clone()
  if (typeof value !== 'object' || value === null || !isPlainData(value)) return value

  const done = seen.get(value)
  if (done !== undefined) return done

  if (Array.isArray(value)) {
    const items: unknown[] = []
    seen.set(value, items)
    for (const item of value) {
      items.push(copyValue(item, seen))
    }
    return items
  }

  const record: Record<PropertyKey, unknown> = {}
  seen.set(value, record)
  for (const key of Reflect.ownKeys(value)) {
    if (Object.prototype.propertyIsEnumerable.call(value, key)) {
      record[key] = copyValue(Reflect.get(value, key), seen)
    }
  }
  if (Object.getPrototypeOf(value) === null) Object.setPrototypeOf(record, null)
  return record
}

/**
 * Ordinary copy of a payload. Primitives are values already; a payload with a
 * clone() method copies itself; arrays and plain records are copied member by
 * member; functions and other objects are shared, as a plain assignment would.
 */
export function duplicate<T>(value: T): T
export function duplicate(value: unknown): unknown {
  return copyValue(value, new WeakMap())
}

/** Ends the lifetime of a payload that owns resources. */
export const destroyAt = (value: unknown): void => {
  if (isDestroyable(value)) value.dispose()
}
