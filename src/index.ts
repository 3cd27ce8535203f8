export * from './result/index.js'
export * from './status/index.js'
export * from './lifecycle/index.js'
export * from './strictness/index.js'
export * from './trap/index.js'
export { nullerr, type Nullerr } from './shared/brands.js'
export type { ConstAccess, ConvertMode, MutableAccess, Ownership } from './shared/ownership.js'
export { loadConfig, type Config } from './shared/config.js'
export { getLogger, scopedLogger } from './shared/logger.js'
