// Runtime brands. Each one marks an object built by this library so guards can
// recognise it without instanceof.

export const INFALLIBLE: unique symbol = Symbol('fallible.infallible')
export const RESULT: unique symbol = Symbol('fallible.result')
export const STATUS: unique symbol = Symbol('fallible.status')
export const ALWAYS_SUCCESS: unique symbol = Symbol('fallible.always-success')
export const ERROR_WRAPPER: unique symbol = Symbol('fallible.error-wrapper')
export const STORAGE: unique symbol = Symbol('fallible.storage')

/** Explicit "no error" argument for status constructors. */
export const nullerr: unique symbol = Symbol('fallible.nullerr')
export type Nullerr = typeof nullerr
