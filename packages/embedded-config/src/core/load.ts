import { createNullLogger, type Logger } from "@embedcfg/logger"
import { parse, TomlDate, TomlError } from "smol-toml"
import { readFileBytes } from "../adapters/fs/read-file"
import type { ConfigDocument, ConfigValue } from "../ports/config-value"
import type { ReadFile } from "../ports/read-file"
import { decodeUtf8 } from "./encoding/utf8"
import {
  invalidEncoding,
  parseError,
  sourceNotFound,
  sourceReadError,
} from "./errors/stage-errors"
import { isTable } from "./value-tag"

export type LoaderDeps = {
  /** @default fs.readFileSync */
  readFile?: ReadFile
  logger?: Logger
}

/**
 * Reads, decodes and parses the TOML document at `path`.
 *
 * The returned tree is deep-frozen. Nothing is cached: every call goes back to
 * the file.
 *
 * @throws LoadError `source_not_found`, `source_read_error`, `invalid_encoding` or `parse_error`
 */
export function loadDocument(path: string, deps: LoaderDeps = {}): ConfigDocument {
  const readFile = deps.readFile ?? readFileBytes
  const logger = deps.logger ?? createNullLogger()

  const bytes = readBytes(path, readFile)
  const decoded = decodeUtf8(bytes)

  if (!decoded.ok) throw invalidEncoding(path, decoded.byteOffset)

  const document = parseToml(path, decoded.text)

  logger.debug("config document loaded", { path, bytes: bytes.byteLength })

  deepFreeze(document)

  return document
}

function readBytes(path: string, readFile: ReadFile): Uint8Array {
  try {
    return readFile(path)
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") throw sourceNotFound(path, err)
    throw sourceReadError(path, err)
  }
}

function parseToml(path: string, text: string): ConfigDocument {
  try {
    return parse(text, { integersAsBigInt: true })
  } catch (err) {
    if (err instanceof TomlError) {
      throw parseError(path, err.message, { line: err.line, column: err.column, cause: err })
    }
    throw parseError(path, err instanceof Error ? err.message : String(err), { cause: err })
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err
}

function deepFreeze(value: ConfigValue): void {
  if (typeof value !== "object" || value instanceof TomlDate) return

  const children: readonly ConfigValue[] = isTable(value) ? Object.values(value) : value

  children.forEach(deepFreeze)
  Object.freeze(value)
}
