import type { ConfigDocument, ConfigValue } from "../ports/config-value"
import { missingField } from "./errors/stage-errors"
import { isTable } from "./value-tag"

/**
 * Splits a dotted path into its segments. Dots cannot be escaped.
 */
export function splitFieldPath(field: string): string[] {
  return field.split(".")
}

/**
 * Walks `document` along the dotted `field`, left to right.
 *
 * Every segment must name an own key of a table. The first segment that does
 * not (including an empty one) fails the whole lookup with the full path.
 *
 * @throws ResolutionError `missing_field`
 */
export function resolveField(document: ConfigDocument, field: string): ConfigValue {
  let node: ConfigValue = document

  for (const segment of splitFieldPath(field)) {
    if (segment === "" || !isTable(node) || !Object.hasOwn(node, segment)) {
      throw missingField(field)
    }
    node = node[segment]
  }

  return node
}
