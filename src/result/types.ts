import { RESULT } from '../shared/brands.js'
import type { ConstAccess, MutableAccess, Ownership } from '../shared/ownership.js'
import type { Status } from '../status/types.js'
import type {
  And,
  CopySupported,
  DefaultStrictness,
  Gated,
  IsExactly,
  Not,
  Or,
  Require,
  Strictness,
} from '../strictness/types.js'

/**
 * Holds exactly one of a value of type T or an error of type E.
 *
 * The container owns its active member: `clone()` copies it, `take()` moves it
 * into a new container, `dispose()` destroys it once. `Result<void, E>` is the
 * no-value form.
 *
 * Converting to `Result<T2, E2>` is plain assignment when T is assignable to
 * T2 and E to E2; otherwise it goes through a factory's `convert()`.
 */
export type Result<T, E, S extends Strictness = DefaultStrictness> = {
  readonly [RESULT]: true

  hasValue(): boolean
  ok(): boolean
  toBoolean(): boolean
  isMovedFrom(): boolean

  /** Requires hasValue(); otherwise the trap handler runs. */
  value(access?: MutableAccess): T
  value(access: ConstAccess): Readonly<T>
  /** Requires !hasValue(); otherwise the trap handler runs. */
  error(access?: MutableAccess): E
  error(access: ConstAccess): Readonly<E>

  valueOr<U = T>(fallback: U, access?: Ownership): T | U
  errorOr<G = E>(fallback: G, access?: Ownership): E | G

  andThen<U>(f: Gated<(value: T) => Result<U, E, S>, S>, access?: Ownership): Result<U, E, S>
  orElse<G>(f: Gated<(error: E) => Result<T, G, S>, S>, access?: Ownership): Result<T, G, S>
  transform<U>(f: Gated<(value: T) => U, S>, access?: Ownership): Result<U, E, S>
  transformError<G>(f: Gated<(error: E) => G, S>, access?: Ownership): Result<T, G, S>

  clone(...gate: Require<And<CopySupported<T, S>, CopySupported<E, S>>>): Result<T, E, S>
  take(): Result<T, E, S>
  toStatus(access?: Ownership): Status<E, S>

  dispose(): void
}

export type ResultConverters<T, E, T2, E2, S extends Strictness> = {
  value: Gated<(value: T) => T2, S>
  error: Gated<(error: E) => E2, S>
}

type CanHold<Target, Source> = [Source] extends [Target] ? true : false

/**
 * Converting from `Result<U, G>` is ambiguous when the target value type could
 * hold the whole source (unless it is exactly boolean), or when the target
 * error type could.
 */
export type ConvertSupported<T, E, U, G, S extends Strictness> = And<
  Or<IsExactly<T, boolean>, Not<CanHold<T, Result<U, G, S>>>>,
  Not<CanHold<E, Result<U, G, S>>>
>

export type AnyResult = { readonly [RESULT]: true }

export type ResultOperator<T, E, U, G, S extends Strictness = DefaultStrictness> = (
  source: Result<T, E, S>
) => Result<U, G, S>
