/**
 * How the document path was chosen.
 *
 * - `override`: taken verbatim from the override variable
 * - `manifest`: read from the manifest under the project root
 */
export type SourceOrigin = "override" | "manifest"

export type SourceLocation = Readonly<{
  path: string
  origin: SourceOrigin
}>
