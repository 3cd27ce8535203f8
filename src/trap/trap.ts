import type { ContractViolation, TrapHandler, TrapPolicy } from './types.js'
import { loadConfig } from '../shared/config.js'
import { scopedLogger } from '../shared/logger.js'

const log = scopedLogger('trap')

export class ContractViolationError extends Error {
  readonly violation: ContractViolation

  constructor(violation: ContractViolation) {
    super(`Contract violation (${violation.kind}): ${violation.message}`)
    this.name = 'ContractViolationError'
    this.violation = violation
  }
}

const report = (violation: ContractViolation): void => {
  log().error(violation.message, { kind: violation.kind })
}

export const abortTrap: TrapHandler = (violation) => {
  // Transports may not flush before abort(); stderr gets the line first
  process.stderr.write(`fallible: contract violation (${violation.kind}): ${violation.message}\n`)
  report(violation)
  process.abort()
}

/**
 * Raises a ContractViolationError instead of halting. Only for hosts that opted
 * into recovering from programmer defects, such as test suites.
 */
export const throwTrap: TrapHandler = (violation) => {
  report(violation)
  throw new ContractViolationError(violation)
}

export const trapFor = (policy: TrapPolicy): TrapHandler =>
  policy === 'throw' ? throwTrap : abortTrap

let resolved: TrapHandler | undefined

// Configuration is read on the first violation, not when a factory is built.
const configuredTrap: TrapHandler = (violation) => {
  if (!resolved) {
    resolved = trapFor(loadConfig().trap.policy)
  }
  return resolved(violation)
}

/** The handler chosen by RESULT_TRAP_POLICY, resolved when first invoked. */
export const defaultTrap = (): TrapHandler => configuredTrap

export const isContractViolation = (error: unknown): error is ContractViolationError =>
  error instanceof ContractViolationError
