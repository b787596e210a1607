import type { Logger } from "@embedcfg/logger"
import type { EmbeddedValue } from "../ports/embedded-value"
import type { Site } from "../ports/error"
import type { ScalarKind, ScalarTypes, ScalarValue } from "../ports/scalar"
import { coerceValue } from "./coerce"
import { EmbedConfigError, isMissingField } from "./errors/embed-config-error"
import { isStageError } from "./errors/stage-errors"
import { loadDocument } from "./load"
import { type LocatorOptions, locateSource } from "./locate"
import { loggerFromEnv } from "./logging"
import { resolveField } from "./resolve"

export type EmbedOptions = LocatorOptions & {
  /**
   * Kind the caller can accept. A leaf of any other kind fails with
   * `unsupported_value_type` instead of being converted.
   */
  expect?: ScalarKind

  /** @default a logger configured from `EMBEDCFG_LOG_*`, silent when unset */
  logger?: Logger
}

type ExpectingOptions<K extends ScalarKind> = EmbedOptions & { expect: K }

/**
 * Runs one full resolution of `field` and returns everything it produced.
 *
 * Nothing is shared between calls: the document (and the manifest, when it is
 * consulted) is read and parsed again every time.
 *
 * @throws EmbedConfigError for any failure of any stage
 */
export function inspectConfigValue<K extends ScalarKind>(
  field: string,
  options: ExpectingOptions<K>,
): EmbeddedValue<K>
export function inspectConfigValue(field: string, options?: EmbedOptions): EmbeddedValue
export function inspectConfigValue(field: string, options: EmbedOptions = {}): EmbeddedValue {
  const logger = (options.logger ?? loggerFromEnv(options.env)).child({
    module: "embedded-config",
    field,
  })
  const stageOptions = { ...options, logger }

  const { source, document } = atSite(field, "invocation", () => {
    const source = locateSource(stageOptions)
    const document = loadDocument(source.path, stageOptions)

    return { source, document }
  })

  const scalar = atSite(field, "field", () =>
    coerceValue(resolveField(document, field), options.expect),
  )

  logger.debug("config value resolved", {
    path: source.path,
    origin: source.origin,
    kind: scalar.kind,
  })

  return { field, source, ...scalar }
}

/**
 * Resolves `field` to a scalar value. Every failure is fatal.
 *
 * @example
 * ```ts
 * const port = embedConfigValue("server.port", { expect: "integer" }) // 8080n
 * ```
 *
 * @throws EmbedConfigError
 */
export function embedConfigValue<K extends ScalarKind>(
  field: string,
  options: ExpectingOptions<K>,
): ScalarTypes[K]
export function embedConfigValue(field: string, options?: EmbedOptions): ScalarValue
export function embedConfigValue(field: string, options: EmbedOptions = {}): ScalarValue {
  return inspectConfigValue(field, options).value
}

/**
 * Like {@link embedConfigValue}, but yields `undefined` when the document
 * simply lacks `field`. Every other failure (no location configured, an
 * unreadable or malformed document, a non-string manifest entry, an
 * unsupported value) is still thrown.
 *
 * @throws EmbedConfigError
 */
export function embedConfigValueOpt<K extends ScalarKind>(
  field: string,
  options: ExpectingOptions<K>,
): ScalarTypes[K] | undefined
export function embedConfigValueOpt(field: string, options?: EmbedOptions): ScalarValue | undefined
export function embedConfigValueOpt(
  field: string,
  options: EmbedOptions = {},
): ScalarValue | undefined {
  try {
    return embedConfigValue(field, options)
  } catch (err) {
    if (isMissingField(err)) return undefined
    throw err
  }
}

function atSite<T>(field: string, site: Site, run: () => T): T {
  try {
    return run()
  } catch (err) {
    if (isStageError(err)) throw new EmbedConfigError(field, site, err)
    throw err
  }
}
