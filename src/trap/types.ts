export type ViolationKind =
  | 'value-of-error'
  | 'error-of-value'
  | 'always-success-error'
  | 'moved-from'
  | 'not-copyable'
  | 'storage-empty'
  | 'storage-occupied'
  | 'storage-destroyed'

export type ContractViolation = {
  kind: ViolationKind
  message: string
  // The payload that was active when the violation happened, if any
  payload?: unknown
}

/**
 * Invoked when a precondition is broken. Never returns: it halts the process,
 * throws, or otherwise diverts control away from the caller.
 */
export type TrapHandler = (violation: ContractViolation) => never

export type TrapPolicy = 'abort' | 'throw'
