/** Output types a resolved leaf can take. */
export type ScalarTypes = {
  boolean: boolean
  string: string
  float: number
  integer: bigint
}

export type ScalarKind = keyof ScalarTypes

export type ScalarValue = ScalarTypes[ScalarKind]

/**
 * A coerced leaf, tagged with its kind.
 *
 * @example
 * ```ts
 * { kind: "integer", value: 5n }
 * ```
 */
export type ConfigScalar = { [K in ScalarKind]: { kind: K; value: ScalarTypes[K] } }[ScalarKind]

export type ScalarOf<K extends ScalarKind> = Extract<ConfigScalar, { kind: K }>
