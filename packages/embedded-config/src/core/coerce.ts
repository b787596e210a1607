import type { ConfigScalar, ScalarKind, ScalarOf } from "../ports/scalar"
import { unsupportedValueType } from "./errors/stage-errors"
import { describeTag } from "./value-tag"

/**
 * The scalar form of `value`, or `undefined` for tables, arrays, dates and
 * absent values.
 */
export function toScalar(value: unknown): ConfigScalar | undefined {
  switch (typeof value) {
    case "boolean":
      return { kind: "boolean", value }
    case "string":
      return { kind: "string", value }
    case "number":
      return { kind: "float", value }
    case "bigint":
      return { kind: "integer", value }
    default:
      return undefined
  }
}

export function isScalarOf<K extends ScalarKind>(
  scalar: ConfigScalar,
  kind: K,
): scalar is ScalarOf<K> {
  return scalar.kind === kind
}

/**
 * Converts a resolved node into a tagged scalar, matching its runtime type
 * exactly. Values are never cast between kinds: asking for a string where the
 * document holds a boolean fails.
 *
 * @throws CoercionError `unsupported_value_type`
 */
export function coerceValue(value: unknown): ConfigScalar
export function coerceValue<K extends ScalarKind>(value: unknown, expected: K): ScalarOf<K>
export function coerceValue(value: unknown, expected?: ScalarKind): ConfigScalar
export function coerceValue(value: unknown, expected?: ScalarKind): ConfigScalar {
  const scalar = toScalar(value)

  if (!scalar) throw unsupportedValueType(describeTag(value), expected)
  const { kind } = scalar
  if (expected !== undefined && !isScalarOf(scalar, expected)) {
    throw unsupportedValueType(kind, expected)
  }

  return scalar
}
