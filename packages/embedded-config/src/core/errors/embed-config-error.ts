import type { Site } from "../../ports/error"
import { ConfigError } from "./config-error"
import { errorChain } from "./error-chain"
import type { StageError, StageErrorCode } from "./stage-errors"

/**
 * The single error a resolution surfaces to its caller.
 *
 * Wraps the failing stage's error as `cause`, keeps its code and stage, and
 * records the requested field together with the site the failure belongs to.
 * Failures to find or read the document belong to the invocation; failures
 * tied to the field belong to the field literal.
 */
export class EmbedConfigError extends ConfigError<StageErrorCode> {
  readonly field: string
  readonly site: Site

  constructor(field: string, site: Site, cause: StageError) {
    super(describe(field, site, cause), {
      code: cause.code,
      stage: cause.stage,
      context: { field, site },
      cause,
    })

    this.field = field
    this.site = site
  }
}

function describe(field: string, site: Site, cause: StageError): string {
  if (site === "invocation") return `loading config: ${cause.message}`
  if (cause.stage === "coerce") return `${field} ${cause.message}`

  return cause.message
}

/**
 * Whether a failure means only that the requested field is absent from the
 * target document, as opposed to the document being unusable.
 */
export function isMissingField(err: unknown): boolean {
  return errorChain(err).some(
    (e) => e instanceof ConfigError && e.code === "missing_field" && e.stage === "resolve",
  )
}
