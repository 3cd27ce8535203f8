import { ALWAYS_SUCCESS, STATUS } from '../shared/brands.js'
import type { ConstAccess, ConvertMode, MutableAccess, Ownership } from '../shared/ownership.js'
import type {
  CopySupported,
  DefaultStrictness,
  Gated,
  Require,
  Strictness,
} from '../strictness/types.js'

/** Binary success/failure signal carrying an error of type E on failure. */
export type Status<E, S extends Strictness = DefaultStrictness> = {
  readonly [STATUS]: true
  ok(): boolean
  hasError(): boolean
  toBoolean(): boolean
  isMovedFrom(): boolean
  error(access?: MutableAccess): E
  error(access: ConstAccess): Readonly<E>
  errorOr<G = E>(fallback: G, access?: Ownership): E | G
  /** Copy; unavailable when E cannot be copied under strictness S. */
  clone(...gate: Require<CopySupported<E, S>>): Status<E, S>
  /** Move; this status is left moved-from. */
  take(): Status<E, S>
  convert<G>(convert: Gated<(error: E) => G, S>, mode?: ConvertMode): Status<G, S>
  dispose(): void
}

/** Returned by operations statically known never to fail. */
export type AlwaysSuccessStatus = {
  readonly [ALWAYS_SUCCESS]: true
  ok(): true
  toBoolean(): true
  /** Unreachable: there is no error to read. */
  error(this: never): never
}
