import { describe, it, expect, vi, expectTypeOf } from 'vitest'
import { andThen, match, orElse, pipe, transform, transformError } from './combinators.js'
import { createResults } from './constructors.js'
import { infallible, isInfallible } from '../strictness/infallible.js'
import type { InfallibleBrand } from '../strictness/types.js'
import { throwTrap } from '../trap/trap.js'

const results = createResults({ trap: throwTrap })

describe('pipe', () => {
  it('returns the source when given no operators', () => {
    expect(pipe(5)).toBe(5)
  })

  it('applies operators left to right', () => {
    const result = pipe(
      results.ok<number, string>(2),
      transform<number, number, string>((x) => x + 1),
      andThen<number, string, string>((x) => results.ok<string, string>(`#${x}`))
    )

    expect(result.value()).toBe('#3')
  })

  it('skips value operators once an error is carried', () => {
    const f = vi.fn((x: number) => x + 1)
    const result = pipe(
      results.error<string, number>('e1'),
      transform<number, number, string>(f),
      transformError<number, string, number>((e) => e.length)
    )

    expect(f).not.toHaveBeenCalled()
    expect(result.error()).toBe(2)
  })

  it('recovers with orElse', () => {
    const result = pipe(
      results.error<string, number>('lost'),
      orElse<number, string, never>(() => results.ok<number, never>(0))
    )

    expect(result.value()).toBe(0)
  })
})

describe('operator branding', () => {
  it('brands operators built from infallible callbacks', () => {
    const operator = transform<number, number, string>(infallible((x: number) => x + 1))

    expectTypeOf(operator).toMatchTypeOf<InfallibleBrand>()
    expect(isInfallible(operator)).toBe(true)
    expect(operator(results.ok<number, string>(1)).value()).toBe(2)
  })

  it('leaves other operators unbranded', () => {
    const operator = transform<number, number, string>((x) => x + 1)

    expect(isInfallible(operator)).toBe(false)
  })
})

describe('match', () => {
  it('folds the value branch', () => {
    const folded = match(results.ok<number, string>(21), {
      ok: (value) => value * 2,
      err: (error) => error.length,
    })

    expect(folded).toBe(42)
  })

  it('folds the error branch', () => {
    const folded = match(results.error<string, number>('bad'), {
      ok: (value) => value * 2,
      err: (error) => error.length,
    })

    expect(folded).toBe(3)
  })
})
