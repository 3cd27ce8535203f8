import type { TrapHandler } from '../trap/types.js'
import type { Result } from '../result/types.js'
import type { Status } from '../status/types.js'
import { STORAGE } from '../shared/brands.js'

export type Cloneable<T> = { clone(): T }

export type Destroyable = { dispose(): void }

export type Constructor<T, A extends unknown[]> = new (...args: A) => T

/** The part of any status a lifecycle caller can rely on. */
export type StatusLike = { ok(): boolean }

/**
 * Single-use cell. Starts empty, is constructed exactly once, and destroys its
 * occupant when disposed.
 */
export type Storage<T> = {
  readonly [STORAGE]: true
  /** Handler for misuse of this cell and of statuses reported about it. */
  readonly trap: TrapHandler
  isConstructed(): boolean
  emplace(value: T): void
  get(): T
  dispose(): void
}

/** A type with its own fallible in-place factory. */
export type InPlaceCreate<T, A extends unknown[], R extends StatusLike> = {
  create(storage: Storage<T>, ...args: A): R
}

/** A type with its own fallible in-place copy. */
export type InPlaceCopy<T, R extends StatusLike> = {
  copy(storage: Storage<T>, value: T): R
}

export type Allocator<T> = {
  /** Hands out `count` empty cells, or null when the request cannot be met. Never throws. */
  allocate(count: number): Storage<T>[] | null
  /** Returns a block to the allocator. A null block is ignored. */
  deallocate(block: Storage<T>[] | null, count: number): void
}

export type SlabHandle = number

export type SlabError =
  | { kind: 'allocation-failed'; capacity: number }
  | { kind: 'full'; capacity: number }
  | { kind: 'invalid-handle'; handle: SlabHandle }

/** Fixed-capacity set of cells addressed by handle. */
export type Slab<T> = {
  readonly capacity: number
  size(): number
  insert(value: T): Result<SlabHandle, SlabError>
  get(handle: SlabHandle): Result<T, SlabError>
  remove(handle: SlabHandle): Status<SlabError>
  dispose(): void
}
