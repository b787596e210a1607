import { TomlDate } from "smol-toml"
import type { ConfigTable, ConfigValue } from "../ports/config-value"

/** Name of a node's runtime type, as it appears in error messages. */
export type ValueTag =
  | "boolean"
  | "string"
  | "float"
  | "integer"
  | "datetime"
  | "array"
  | "table"
  | "null"
  | "undefined"

export function isTable(value: ConfigValue): value is ConfigTable {
  return typeof value === "object" && !Array.isArray(value) && !(value instanceof TomlDate)
}

export function describeTag(value: unknown): ValueTag {
  switch (typeof value) {
    case "boolean":
      return "boolean"
    case "string":
      return "string"
    case "number":
      return "float"
    case "bigint":
      return "integer"
    case "undefined":
      return "undefined"
  }

  if (value === null) return "null"
  if (Array.isArray(value)) return "array"
  if (value instanceof Date) return "datetime"

  return "table"
}
