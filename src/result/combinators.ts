import type { Result, ResultOperator } from './types.js'
import type { Ownership } from '../shared/ownership.js'
import type { DefaultStrictness, Gated, Infallible, Strictness } from '../strictness/types.js'
import { infallible, isInfallible } from '../strictness/infallible.js'

// Pipeable forms of the combinators. An operator built from an infallible
// callback is itself branded infallible; any other operator is not.

export function andThen<T, U, E, S extends Strictness = DefaultStrictness>(
  f: Infallible<(value: T) => Result<U, E, S>>,
  access?: Ownership
): Infallible<ResultOperator<T, E, U, E, S>>
export function andThen<T, U, E, S extends Strictness = DefaultStrictness>(
  f: Gated<(value: T) => Result<U, E, S>, S>,
  access?: Ownership
): ResultOperator<T, E, U, E, S>
export function andThen<T, U, E, S extends Strictness>(
  f: Gated<(value: T) => Result<U, E, S>, S>,
  access: Ownership = 'mut'
): ResultOperator<T, E, U, E, S> {
  const operator: ResultOperator<T, E, U, E, S> = (source) => source.andThen(f, access)
  return isInfallible(f) ? infallible(operator) : operator
}

export function orElse<T, E, G, S extends Strictness = DefaultStrictness>(
  f: Infallible<(error: E) => Result<T, G, S>>,
  access?: Ownership
): Infallible<ResultOperator<T, E, T, G, S>>
export function orElse<T, E, G, S extends Strictness = DefaultStrictness>(
  f: Gated<(error: E) => Result<T, G, S>, S>,
  access?: Ownership
): ResultOperator<T, E, T, G, S>
export function orElse<T, E, G, S extends Strictness>(
  f: Gated<(error: E) => Result<T, G, S>, S>,
  access: Ownership = 'mut'
): ResultOperator<T, E, T, G, S> {
  const operator: ResultOperator<T, E, T, G, S> = (source) => source.orElse(f, access)
  return isInfallible(f) ? infallible(operator) : operator
}

export function transform<T, U, E, S extends Strictness = DefaultStrictness>(
  f: Infallible<(value: T) => U>,
  access?: Ownership
): Infallible<ResultOperator<T, E, U, E, S>>
export function transform<T, U, E, S extends Strictness = DefaultStrictness>(
  f: Gated<(value: T) => U, S>,
  access?: Ownership
): ResultOperator<T, E, U, E, S>
export function transform<T, U, E, S extends Strictness>(
  f: Gated<(value: T) => U, S>,
  access: Ownership = 'mut'
): ResultOperator<T, E, U, E, S> {
  const operator: ResultOperator<T, E, U, E, S> = (source) => source.transform(f, access)
  return isInfallible(f) ? infallible(operator) : operator
}

export function transformError<T, E, G, S extends Strictness = DefaultStrictness>(
  f: Infallible<(error: E) => G>,
  access?: Ownership
): Infallible<ResultOperator<T, E, T, G, S>>
export function transformError<T, E, G, S extends Strictness = DefaultStrictness>(
  f: Gated<(error: E) => G, S>,
  access?: Ownership
): ResultOperator<T, E, T, G, S>
export function transformError<T, E, G, S extends Strictness>(
  f: Gated<(error: E) => G, S>,
  access: Ownership = 'mut'
): ResultOperator<T, E, T, G, S> {
  const operator: ResultOperator<T, E, T, G, S> = (source) => source.transformError(f, access)
  return isInfallible(f) ? infallible(operator) : operator
}

export type MatchHandlers<T, E, R, S extends Strictness> = {
  ok: Gated<(value: T) => R, S>
  err: Gated<(error: E) => R, S>
}

/** Folds a result into a single value. Borrows the active member. */
export const match = <T, E, R, S extends Strictness>(
  result: Result<T, E, S>,
  handlers: MatchHandlers<T, E, R, S>
): R => (result.hasValue() ? handlers.ok(result.value()) : handlers.err(result.error()))

export function pipe<A>(source: A): A
export function pipe<A, B>(source: A, ab: (a: A) => B): B
export function pipe<A, B, C>(source: A, ab: (a: A) => B, bc: (b: B) => C): C
export function pipe<A, B, C, D>(
  source: A,
  ab: (a: A) => B,
  bc: (b: B) => C,
  cd: (c: C) => D
): D
export function pipe<A, B, C, D, F>(
  source: A,
  ab: (a: A) => B,
  bc: (b: B) => C,
  cd: (c: C) => D,
  df: (d: D) => F
): F
export function pipe(source: unknown, ...operators: Array<(input: unknown) => unknown>): unknown {
  return operators.reduce((current, operator) => operator(current), source)
}
