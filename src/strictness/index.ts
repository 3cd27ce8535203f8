export type {
  Strictness,
  StrictnessRegister,
  DefaultStrictness,
  AnyCallable,
  InfallibleBrand,
  Infallible,
  Gated,
  Supports,
  CopyOperation,
  CopySupported,
  And,
  Or,
  Not,
  IsExactly,
  Require,
} from './types.js'
export { infallible, isInfallible } from './infallible.js'
