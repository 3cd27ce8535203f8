export type { AlwaysSuccessStatus, Status } from './types.js'
export {
  createStatuses,
  statuses,
  createAlwaysSuccessStatus,
  isStatus,
  isAlwaysSuccessStatus,
  type StatusFactory,
  type StatusFactoryOptions,
} from './status.js'
