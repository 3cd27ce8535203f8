export type { ContractViolation, TrapHandler, TrapPolicy, ViolationKind } from './types.js'
export {
  ContractViolationError,
  abortTrap,
  throwTrap,
  trapFor,
  defaultTrap,
  isContractViolation,
} from './trap.js'
