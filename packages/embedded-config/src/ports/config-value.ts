import type { TomlDate } from "smol-toml"

/**
 * A node of a parsed configuration document.
 *
 * Integers are kept as `bigint` so 64-bit values survive parsing; floats are
 * plain numbers. Dates never resolve to a scalar but can appear in a document.
 */
export type ConfigValue = boolean | string | number | bigint | TomlDate | ConfigArray | ConfigTable

export type ConfigArray = readonly ConfigValue[]

export type ConfigTable = { readonly [key: string]: ConfigValue }

/** A parsed document: always a table at the root, frozen after load. */
export type ConfigDocument = ConfigTable
