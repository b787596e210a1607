import type { ConfigScalar, ScalarKind } from "./scalar"
import type { SourceLocation } from "./source-location"

/**
 * Everything one resolution produced: the requested field, its coerced value
 * and the document it was read from.
 */
export type EmbeddedValue<K extends ScalarKind = ScalarKind> = Readonly<{
  field: string
  source: SourceLocation
}> &
  Extract<ConfigScalar, { kind: K }>
