import { INFALLIBLE } from '../shared/brands.js'

export type Strictness = 'strict' | 'relaxed'

/**
 * Project-wide strictness switch. Augment it to make every factory strict by
 * default:
 *
 * ```ts
 * declare module 'fallible' {
 *   interface StrictnessRegister { mode: 'strict' }
 * }
 * ```
 */
export interface StrictnessRegister {}

export type DefaultStrictness =
  StrictnessRegister extends { mode: infer M extends Strictness } ? M : 'relaxed'

export type AnyCallable =
  | ((...args: never[]) => unknown)
  | (abstract new (...args: never[]) => unknown)

export type InfallibleBrand = { readonly [INFALLIBLE]: true }

/** A function or class whose invocation is guaranteed never to fail. */
export type Infallible<F extends AnyCallable> = F & InfallibleBrand

type GateBrand<S extends Strictness> = S extends 'strict' ? InfallibleBrand : unknown

/**
 * Callback accepted by an operation under strictness `S`: any `F` when relaxed,
 * only an `Infallible<F>` when strict.
 */
export type Gated<F, S extends Strictness> = F & GateBrand<S>

/**
 * "Does this type support the operation?" Relaxed: the operation exists.
 * Strict: the operation exists and is branded infallible.
 */
export type Supports<Op, S extends Strictness> =
  [Op] extends [never] ? false
  : [Op] extends [undefined] ? false
  : S extends 'strict' ? ([Op] extends [InfallibleBrand] ? true : false)
  : true

// How a payload of type T is copied: its own clone() when it has one, the
// built-in copy otherwise. A payload that owns a resource (has dispose()) but
// cannot clone itself has no copy at all.
export type CopyOperation<T> =
  [T] extends [{ clone: infer C }] ? C
  : [T] extends [{ dispose(): void }] ? never
  : Infallible<() => T>

type EachCopySupported<T, S extends Strictness> =
  T extends unknown ? Supports<CopyOperation<T>, S> : never

/** Every member of T can be copied under strictness S. */
export type CopySupported<T, S extends Strictness> =
  [T] extends [never] ? true
  : false extends EachCopySupported<T, S> ? false
  : true

export type And<A extends boolean, B extends boolean> = [A] extends [true] ? B : false

export type Or<A extends boolean, B extends boolean> = [A] extends [true] ? true : B

export type Not<A extends boolean> = [A] extends [true] ? false : true

export type IsExactly<A, B> =
  [A] extends [B] ? ([B] extends [A] ? true : false) : false

/**
 * Rest-parameter gate: `method(...gate: Require<C>)` is callable with no
 * arguments when C is true and not callable at all otherwise.
 */
export type Require<C extends boolean> = [C] extends [true] ? [] : [unsupported: never]
