import { describe, it, expect, vi, afterEach } from 'vitest'
import { resetConfig } from '../shared/config.js'
import { createResults } from '../result/constructors.js'
import {
  ContractViolationError,
  abortTrap,
  defaultTrap,
  isContractViolation,
  throwTrap,
  trapFor,
} from './trap.js'
import type { ContractViolation } from './types.js'

const violation: ContractViolation = {
  kind: 'value-of-error',
  message: 'value() called on a result holding an error',
  payload: 'e1',
}

describe('throwTrap', () => {
  it('throws a ContractViolationError carrying the violation', () => {
    let caught: unknown
    try {
      throwTrap(violation)
    } catch (error) {
      caught = error
    }

    expect(caught).toBeInstanceOf(ContractViolationError)
    expect(isContractViolation(caught)).toBe(true)
    if (isContractViolation(caught)) {
      expect(caught.violation).toBe(violation)
      expect(caught.name).toBe('ContractViolationError')
      expect(caught.message).toBe(
        'Contract violation (value-of-error): value() called on a result holding an error'
      )
    }
  })
})

describe('abortTrap', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('writes the violation to stderr, then aborts the process', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true)
    const abort = vi.spyOn(process, 'abort').mockImplementation(() => {
      throw new Error('aborted')
    })

    expect(() => abortTrap(violation)).toThrow('aborted')
    expect(write).toHaveBeenCalledWith(
      'fallible: contract violation (value-of-error): value() called on a result holding an error\n'
    )
    expect(abort).toHaveBeenCalledOnce()
  })
})

describe('trapFor', () => {
  it('maps each policy to its handler', () => {
    expect(trapFor('throw')).toBe(throwTrap)
    expect(trapFor('abort')).toBe(abortTrap)
  })

  it('resolves the default handler from configuration', () => {
    // The test environment sets RESULT_TRAP_POLICY=throw
    expect(defaultTrap()).toBe(defaultTrap())
    expect(() => defaultTrap()(violation)).toThrow(ContractViolationError)
  })
})

describe('defaultTrap', () => {
  afterEach(() => {
    vi.unstubAllEnvs()
    resetConfig()
  })

  it('reads no configuration until a violation happens', () => {
    vi.stubEnv('RESULT_TRAP_POLICY', 'explode')
    resetConfig()

    expect(() => createResults().ok(1).value()).not.toThrow()
  })
})

describe('isContractViolation', () => {
  it('rejects ordinary errors', () => {
    expect(isContractViolation(new Error('plain'))).toBe(false)
    expect(isContractViolation(violation)).toBe(false)
  })
})
