import type { ConfigScalar } from "../ports/scalar"

/**
 * Source text of a JavaScript/TypeScript literal for `scalar`, ready to be
 * spliced into generated code.
 *
 * Integers outside the safe range come out as bigint literals (`123n`) so no
 * digits are lost.
 */
export function renderLiteral(scalar: ConfigScalar): string {
  switch (scalar.kind) {
    case "boolean":
      return scalar.value ? "true" : "false"
    case "string":
      return JSON.stringify(scalar.value)
    case "float":
      return renderFloat(scalar.value)
    case "integer":
      return renderInteger(scalar.value)
  }
}

function renderFloat(value: number): string {
  if (Number.isNaN(value)) return "NaN"
  if (value === Infinity) return "Infinity"
  if (value === -Infinity) return "-Infinity"
  if (Object.is(value, -0)) return "-0"

  return String(value)
}

function renderInteger(value: bigint): string {
  const safe =
    value <= BigInt(Number.MAX_SAFE_INTEGER) && value >= BigInt(Number.MIN_SAFE_INTEGER)

  return safe ? value.toString() : `${value}n`
}
