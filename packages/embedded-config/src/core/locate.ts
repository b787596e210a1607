import path from "node:path"
import { createNullLogger, type Logger } from "@embedcfg/logger"
import { z } from "zod"
import { readEnvironment } from "../adapters/env/env-reader"
import type { ConfigDocument, ConfigValue } from "../ports/config-value"
import type { Environment } from "../ports/environment"
import type { ReadFile } from "../ports/read-file"
import type { SourceLocation } from "../ports/source-location"
import { ConfigError } from "./errors/config-error"
import {
  invalidLocationValue,
  type LocationError,
  missingLocationConfig,
} from "./errors/stage-errors"
import { loadDocument } from "./load"
import { resolveField } from "./resolve"
import { describeTag } from "./value-tag"

/** Variable holding a document path that bypasses the manifest. */
export const OVERRIDE_VARIABLE = "EMBEDDED_CONFIG_PATH"

/** Variable holding the project root the manifest lives in. */
export const ROOT_VARIABLE = "EMBEDDED_CONFIG_ROOT"

export const MANIFEST_FILE = "embedcfg.toml"

export const MANIFEST_FIELD = "package.metadata.embedded-config.path"

export const locatorSettingsSchema = z.object({
  overrideVariable: z.string().min(1).default(OVERRIDE_VARIABLE),
  rootVariable: z.string().min(1).default(ROOT_VARIABLE),
  manifestFile: z.string().min(1).default(MANIFEST_FILE),
})

export type LocatorSettings = z.output<typeof locatorSettingsSchema>

export type LocatorOptions = Partial<LocatorSettings> & {
  /** @default process.env */
  env?: Environment
  readFile?: ReadFile
  logger?: Logger
}

// Empty values count as unset.
const variableSchema = z
  .string()
  .optional()
  .transform((v) => (v === "" ? undefined : v))

const locationVariablesSchema = z.object({
  override: variableSchema,
  root: variableSchema,
})

export function parseLocatorSettings(options: Partial<LocatorSettings>): LocatorSettings {
  const result = locatorSettingsSchema.safeParse(options)

  if (!result.success) {
    throw new Error(`Locator settings validation failed:\n${z.prettifyError(result.error)}`)
  }

  return result.data
}

/**
 * Chooses the configuration document for one resolution.
 *
 * 1. A non-empty override variable wins and is used verbatim; the manifest is
 *    not read at all.
 * 2. Otherwise the root variable must be set, and the manifest under it must
 *    name the document (relative to the root) at {@link MANIFEST_FIELD}.
 *
 * The manifest goes through the same loader and resolver as the document
 * itself, so its load errors surface unchanged.
 *
 * @throws LocationError when neither source is configured, or the manifest
 * value is not a string
 * @throws LoadError when the manifest cannot be loaded
 */
export function locateSource(options: LocatorOptions = {}): SourceLocation {
  const settings = parseLocatorSettings({
    overrideVariable: options.overrideVariable,
    rootVariable: options.rootVariable,
    manifestFile: options.manifestFile,
  })
  const logger = (options.logger ?? createNullLogger()).child({ module: "locator" })
  const env = readEnvironment({ env: options.env })

  const variables = locationVariablesSchema.parse({
    override: env[settings.overrideVariable],
    root: env[settings.rootVariable],
  })

  if (variables.override !== undefined) {
    logger.debug("config source taken from override", {
      path: variables.override,
      origin: "override",
    })

    return { path: variables.override, origin: "override" }
  }

  if (env[settings.overrideVariable] === "") {
    logger.warn(`${settings.overrideVariable} is set but empty, ignoring it`)
  }

  const missing = () =>
    missingLocationConfig({
      override: settings.overrideVariable,
      root: settings.rootVariable,
      manifestFile: settings.manifestFile,
      manifestField: MANIFEST_FIELD,
    })

  if (variables.root === undefined) throw missing()

  const manifestPath = path.join(variables.root, settings.manifestFile)
  const manifest = loadDocument(manifestPath, { readFile: options.readFile, logger })

  const declared = declaredPath(manifest, missing)

  if (typeof declared !== "string") {
    throw invalidLocationValue(MANIFEST_FIELD, describeTag(declared))
  }

  const documentPath = path.isAbsolute(declared) ? declared : path.join(variables.root, declared)

  logger.debug("config source taken from manifest", {
    path: documentPath,
    origin: "manifest",
  })

  return { path: documentPath, origin: "manifest" }
}

function declaredPath(manifest: ConfigDocument, missing: () => LocationError): ConfigValue {
  try {
    return resolveField(manifest, MANIFEST_FIELD)
  } catch (err) {
    if (err instanceof ConfigError && err.code === "missing_field") throw missing()
    throw err
  }
}
