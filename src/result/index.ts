export type {
  AnyResult,
  ConvertSupported,
  Result,
  ResultConverters,
  ResultOperator,
} from './types.js'
export { isResult } from './result.js'
export {
  createResults,
  results,
  Ok,
  Err,
  type ResultFactory,
  type ResultFactoryOptions,
} from './constructors.js'
export {
  andThen,
  orElse,
  transform,
  transformError,
  match,
  pipe,
  type MatchHandlers,
} from './combinators.js'
export { wrapError, wrapErrorInPlace, isErrorWrapper, type ErrorWrapper } from './error-wrapper.js'
